import { z } from "zod";

export const OfferTypeEnum = z.enum(["savings_account", "credit_card", "app", "service"]);

export const CandidateContentItemSchema = z
  .object({
    type: z.enum(["education", "offer"]),
    title: z.string().min(1),
    rationale: z.string(),
    offerType: OfferTypeEnum.optional(),
  })
  .passthrough()
  .refine((item) => item.type !== "offer" || item.offerType !== undefined, {
    message: "offer items require an offerType",
    path: ["offerType"],
  });

// Caller-supplied fields (ids, links, offer payloads) ride along untouched.
export const GuardedContentItemSchema = z
  .object({
    type: z.enum(["education", "offer"]),
    title: z.string(),
    rationale: z.string(),
    offerType: OfferTypeEnum.optional(),
    disclosure: z.string(),
  })
  .passthrough();
