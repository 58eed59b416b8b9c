import { z } from "zod";
import { GuardedContentItemSchema } from "../../guardrails/schemas";
import { DataAvailabilityTierEnum, PersonaAssignmentSchema } from "../../personas/schemas";

const windowTypeSchema = z.enum(["30d", "180d"]);

const dateWindowSchema = z.object({
  type: windowTypeSchema,
  start: z.string(),
  end: z.string(),
  days: z.number().int(),
});

export const signalBundleSchema = z.object({
  userId: z.string(),
  windowType: z.enum(["30d", "180d", "none"]),
  window: dateWindowSchema.nullable(),
  computedAt: z.string().nullable(),
  subscriptions: z.object({
    subscriptionsCount: z.number().int(),
    recurringMerchants: z.array(z.string()),
    monthlyRecurringSpend: z.number(),
    recurringSpendShare: z.number(),
  }),
  savings: z.object({
    netSavingsInflow: z.number(),
    savingsGrowthRate: z.number(),
    emergencyFundMonths: z.number(),
  }),
  credit: z.object({
    creditUtilization: z.number(),
    utilization30Flag: z.boolean(),
    utilization50Flag: z.boolean(),
    utilization80Flag: z.boolean(),
    minPaymentOnly: z.boolean(),
    interestCharges: z.number(),
    isOverdue: z.boolean(),
  }),
  income: z.object({
    payrollFrequency: z.enum(["monthly", "semi_monthly", "biweekly", "unknown"]),
    medianPayGapDays: z.number(),
    incomeVariability: z.number(),
    monthlyIncome: z.number(),
    cashFlowBufferMonths: z.number(),
  }),
});

export const availabilityResponseSchema = z.object({
  tier: DataAvailabilityTierEnum,
  dataAgeDays: z.number().int(),
  span: z.object({
    earliest: z.string().nullable(),
    latest: z.string().nullable(),
    totalDays: z.number().int(),
  }),
});

export const profileResponseSchema = z.object({
  userId: z.string(),
  tier: DataAvailabilityTierEnum,
  dataAgeDays: z.number().int(),
  canCompute30d: z.boolean(),
  canCompute180d: z.boolean(),
  signals30d: signalBundleSchema.nullable(),
  signals180d: signalBundleSchema.nullable(),
  disclaimer: z.string().nullable(),
});

export const personaResponseSchema = z.object({
  assignment: PersonaAssignmentSchema.nullable(),
});

export const personaHistoryResponseSchema = z.object({
  history: z.array(PersonaAssignmentSchema),
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const signalsQuerySchema = z.object({
  bypassCache: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
});

// Items stay unknown here; the enforcer validates each one after the consent gate.
export const guardrailsRequestSchema = z.object({
  candidates: z.array(z.unknown()),
  window: windowTypeSchema.optional(),
});

export const guardrailsResponseSchema = z.object({
  items: z.array(GuardedContentItemSchema),
});

export const consentResponseSchema = z.object({
  granted: z.boolean(),
  updatedAt: z.string().nullable(),
});
