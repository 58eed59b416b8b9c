import type { TransactionRecord } from "../types";

/** Scales an in-window total to a 30-day rate. */
export function toMonthlyRate(total: number, windowDays: number): number {
  if (windowDays <= 0) {
    return 0;
  }
  return (total / windowDays) * 30;
}

export function totalDebits(transactions: TransactionRecord[]): number {
  return transactions.reduce(
    (sum, transaction) => (transaction.amount < 0 ? sum + Math.abs(transaction.amount) : sum),
    0,
  );
}

export function monthlyExpenseRate(transactions: TransactionRecord[], windowDays: number): number {
  return toMonthlyRate(totalDebits(transactions), windowDays);
}

export function safeRatio(numerator: number, denominator: number): number {
  if (!denominator) {
    return 0;
  }
  return numerator / denominator;
}
