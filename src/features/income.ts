import type { DetectorInput, IncomeSignals, PayrollFrequency, TransactionRecord } from "../types";
import { daysBetween } from "./dates";
import { monthlyExpenseRate, safeRatio, toMonthlyRate } from "./rates";

export const LARGE_DEPOSIT_THRESHOLD = 500;

export const EMPTY_INCOME_SIGNALS: IncomeSignals = {
  payrollFrequency: "unknown",
  medianPayGapDays: 0,
  incomeVariability: 0,
  monthlyIncome: 0,
  cashFlowBufferMonths: 0,
};

/**
 * Best-effort payroll detection: ACH credits, deposits whose merchant name
 * mentions payroll or a deposit, or large ACH/other credits.
 */
export function isPayrollDeposit(transaction: TransactionRecord): boolean {
  if (transaction.amount <= 0) {
    return false;
  }
  const merchant = (transaction.merchantName ?? "").toLowerCase();
  const channel: string = transaction.paymentChannel ?? "";
  return (
    channel === "ach" ||
    merchant.includes("payroll") ||
    merchant.includes("deposit") ||
    (transaction.amount >= LARGE_DEPOSIT_THRESHOLD && (channel === "ach" || channel === "other"))
  );
}

export function median(values: number[]): number {
  if (!values.length) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function classifyPayFrequency(medianGapDays: number): PayrollFrequency {
  if (medianGapDays >= 25) {
    return "monthly";
  }
  if (medianGapDays >= 13) {
    return "semi_monthly";
  }
  if (medianGapDays >= 12) {
    return "biweekly";
  }
  return "unknown";
}

/** Population coefficient of variation, as a percentage. */
export function coefficientOfVariation(values: number[]): number {
  if (!values.length) {
    return 0;
  }
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  if (mean <= 0) {
    return 0;
  }
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  return (Math.sqrt(variance) / mean) * 100;
}

export function detectIncome({ transactions, accounts, windowDays }: DetectorInput): IncomeSignals {
  if (!transactions.length) {
    return { ...EMPTY_INCOME_SIGNALS };
  }

  const checkingBalance = accounts
    .filter((account) => account.type === "depository" && account.subtype === "checking")
    .reduce((sum, account) => sum + account.balanceCurrent, 0);
  const cashFlowBufferMonths = safeRatio(checkingBalance, monthlyExpenseRate(transactions, windowDays));

  const deposits = transactions
    .filter(isPayrollDeposit)
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  if (!deposits.length) {
    return { ...EMPTY_INCOME_SIGNALS, cashFlowBufferMonths };
  }

  const gaps: number[] = [];
  for (let i = 1; i < deposits.length; i += 1) {
    gaps.push(daysBetween(deposits[i - 1].date, deposits[i].date));
  }
  const amounts = deposits.map((deposit) => deposit.amount);
  const medianGap = median(gaps);

  return {
    payrollFrequency: classifyPayFrequency(medianGap),
    medianPayGapDays: Math.trunc(medianGap),
    incomeVariability: coefficientOfVariation(amounts),
    monthlyIncome: toMonthlyRate(
      amounts.reduce((sum, amount) => sum + amount, 0),
      windowDays,
    ),
    cashFlowBufferMonths,
  };
}
