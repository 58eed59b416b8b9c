import { z } from "zod";

export const PersonaIdEnum = z.enum([
  "high_utilization",
  "variable_income",
  "credit_builder",
  "subscription_heavy",
  "savings_builder",
]);

export const TieBreakEnum = z.enum([
  "no_matches",
  "single_match",
  "priority",
  "signal_strength",
  "defined_order",
]);

export const DataAvailabilityTierEnum = z.enum(["new", "limited", "full_30", "full_180"]);

export const DecisionTraceSchema = z.object({
  matched: z.array(PersonaIdEnum),
  priorityGroup: z
    .object({
      priority: z.number().int(),
      candidates: z.array(PersonaIdEnum),
    })
    .nullable(),
  strengths: z.record(PersonaIdEnum, z.number()),
  tieBreak: TieBreakEnum,
  selected: PersonaIdEnum,
});

export const PersonaAssignmentSchema = z.object({
  userId: z.string().min(1),
  persona: PersonaIdEnum,
  displayName: z.string(),
  priority: z.number().int().min(1).max(5),
  signalStrength: z.number(),
  dataAvailability: DataAvailabilityTierEnum,
  windowType: z.enum(["30d", "180d", "none"]),
  disclaimer: z.string().nullable(),
  trace: DecisionTraceSchema,
  assignedAt: z.string(),
});

export type PersonaId = z.infer<typeof PersonaIdEnum>;
export type TieBreak = z.infer<typeof TieBreakEnum>;
export type DecisionTrace = z.infer<typeof DecisionTraceSchema>;
export type PersonaAssignment = z.infer<typeof PersonaAssignmentSchema>;
