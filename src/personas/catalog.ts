import type { SignalBundle } from "../types";
import type { PersonaId } from "./schemas";

export interface PersonaDefinition {
  id: PersonaId;
  displayName: string;
  /** 1 = most urgent. */
  priority: number;
  matches(signals: SignalBundle): boolean;
  strength(signals: SignalBundle): number;
}

/** Min-max scale clamped to [0, 1]. */
export function normalize(value: number, min: number, max: number): number {
  if (max === min) {
    return 0;
  }
  return Math.max(0, Math.min(1, (value - min) / (max - min)));
}

export const PERSONA_TABLE: readonly PersonaDefinition[] = [
  {
    id: "high_utilization",
    displayName: "High Utilization",
    priority: 1,
    matches: ({ credit }) =>
      credit.creditUtilization >= 50 ||
      credit.interestCharges > 0 ||
      credit.minPaymentOnly ||
      credit.isOverdue,
    strength: ({ credit }) =>
      normalize(credit.creditUtilization, 0, 100) +
      normalize(credit.interestCharges, 0, 500) +
      (credit.isOverdue ? 1 : 0),
  },
  {
    id: "variable_income",
    displayName: "Variable Income Budgeter",
    priority: 2,
    matches: ({ income }) => income.medianPayGapDays > 45 && income.cashFlowBufferMonths < 1,
    strength: ({ income }) =>
      normalize(income.medianPayGapDays, 0, 90) + (1 - normalize(income.cashFlowBufferMonths, 0, 3)),
  },
  {
    id: "credit_builder",
    displayName: "Credit Builder",
    priority: 3,
    // Absence of card activity rather than presence of a signal.
    matches: ({ credit }) =>
      !(
        credit.creditUtilization > 0 ||
        credit.utilization30Flag ||
        credit.utilization50Flag ||
        credit.utilization80Flag ||
        credit.interestCharges > 0
      ),
    strength: ({ credit }) => 1 - normalize(credit.creditUtilization, 0, 100),
  },
  {
    id: "subscription_heavy",
    displayName: "Subscription-Heavy",
    priority: 4,
    matches: ({ subscriptions }) =>
      subscriptions.subscriptionsCount >= 3 &&
      (subscriptions.monthlyRecurringSpend >= 50 || subscriptions.recurringSpendShare >= 10),
    strength: ({ subscriptions }) =>
      normalize(subscriptions.subscriptionsCount, 0, 10) +
      normalize(subscriptions.monthlyRecurringSpend, 0, 500) +
      normalize(subscriptions.recurringSpendShare, 0, 50),
  },
  {
    id: "savings_builder",
    displayName: "Savings Builder",
    priority: 5,
    matches: ({ savings, credit }) =>
      (savings.savingsGrowthRate >= 2 || savings.netSavingsInflow >= 200) &&
      credit.creditUtilization < 30,
    strength: ({ savings, credit }) =>
      normalize(savings.savingsGrowthRate, -10, 20) +
      normalize(savings.netSavingsInflow, 0, 1000) +
      (1 - normalize(credit.creditUtilization, 0, 30)),
  },
];

/** Final tie-break: earlier wins. */
export const TIE_BREAK_ORDER: readonly PersonaId[] = [
  "high_utilization",
  "variable_income",
  "credit_builder",
  "subscription_heavy",
  "savings_builder",
];

export const DEFAULT_PERSONA: PersonaId = "credit_builder";

export function findPersona(
  id: PersonaId,
  table: readonly PersonaDefinition[] = PERSONA_TABLE,
): PersonaDefinition {
  const definition = table.find((entry) => entry.id === id);
  if (!definition) {
    throw new Error(`Persona ${id} is missing from the persona table`);
  }
  return definition;
}
