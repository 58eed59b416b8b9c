import type { DetectorInput, SubscriptionSignals } from "../types";
import { daysBetween } from "./dates";
import { safeRatio, toMonthlyRate, totalDebits } from "./rates";

export const MIN_RECURRING_COUNT = 3;
export const RECURRING_SPAN_DAYS = 90;

interface MerchantCharge {
  date: string;
  amount: number;
}

export const EMPTY_SUBSCRIPTION_SIGNALS: SubscriptionSignals = {
  subscriptionsCount: 0,
  recurringMerchants: [],
  monthlyRecurringSpend: 0,
  recurringSpendShare: 0,
};

/**
 * Spend that accrued over the observed span: every charge but the last one
 * pays for one interval between charges.
 */
function monthlySpendForMerchant(charges: MerchantCharge[], spanDays: number): number {
  const total = charges.reduce((sum, charge) => sum + charge.amount, 0);
  if (spanDays <= 0) {
    return total;
  }
  const mean = total / charges.length;
  return ((mean * (charges.length - 1)) / spanDays) * 30;
}

export function detectSubscriptions({ transactions, windowDays }: DetectorInput): SubscriptionSignals {
  if (!transactions.length) {
    return { ...EMPTY_SUBSCRIPTION_SIGNALS, recurringMerchants: [] };
  }

  const byMerchant = new Map<string, MerchantCharge[]>();
  for (const transaction of transactions) {
    if (!transaction.merchantName || transaction.amount >= 0) {
      continue;
    }
    const charges = byMerchant.get(transaction.merchantName) ?? [];
    charges.push({ date: transaction.date, amount: Math.abs(transaction.amount) });
    byMerchant.set(transaction.merchantName, charges);
  }

  const recurringMerchants: string[] = [];
  let monthlyRecurringSpend = 0;

  for (const [merchant, charges] of byMerchant) {
    if (charges.length < MIN_RECURRING_COUNT) {
      continue;
    }
    const dates = charges.map((charge) => charge.date).sort();
    const spanDays = daysBetween(dates[0], dates[dates.length - 1]);
    if (spanDays > RECURRING_SPAN_DAYS) {
      continue;
    }
    recurringMerchants.push(merchant);
    monthlyRecurringSpend += monthlySpendForMerchant(charges, spanDays);
  }

  const monthlyTotalSpend = toMonthlyRate(totalDebits(transactions), windowDays);
  const recurringSpendShare = Math.min(safeRatio(monthlyRecurringSpend, monthlyTotalSpend) * 100, 100);

  return {
    subscriptionsCount: recurringMerchants.length,
    recurringMerchants,
    monthlyRecurringSpend,
    recurringSpendShare,
  };
}
