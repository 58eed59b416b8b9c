import { DataUnavailableError } from "../errors";
import type { AccountRecord, DetectorInput, SavingsSignals } from "../types";
import { monthlyExpenseRate, safeRatio, toMonthlyRate } from "./rates";

const SAVINGS_SUBTYPES = new Set(["savings", "money_market"]);

export const EMPTY_SAVINGS_SIGNALS: SavingsSignals = {
  netSavingsInflow: 0,
  savingsGrowthRate: 0,
  emergencyFundMonths: 0,
};

export function isSavingsAccount(account: AccountRecord): boolean {
  return account.type === "depository" && SAVINGS_SUBTYPES.has(account.subtype ?? "");
}

export function detectSavings({ transactions, accounts, windowDays }: DetectorInput): SavingsSignals {
  const savingsAccounts = accounts.filter(isSavingsAccount);
  if (!savingsAccounts.length) {
    throw new DataUnavailableError("savings", "User has no savings or money market accounts");
  }
  if (!transactions.length) {
    return { ...EMPTY_SAVINGS_SIGNALS };
  }

  const savingsIds = new Set(savingsAccounts.map((account) => account.id));
  const netInflow = transactions
    .filter((transaction) => savingsIds.has(transaction.accountId))
    .reduce((sum, transaction) => sum + transaction.amount, 0);

  const currentSavings = savingsAccounts.reduce((sum, account) => sum + account.balanceCurrent, 0);

  let savingsGrowthRate = 0;
  if (currentSavings > 0 && windowDays >= 30) {
    const estimatedStart = currentSavings - netInflow;
    if (estimatedStart > 0) {
      savingsGrowthRate = (netInflow / estimatedStart) * 100;
    }
  }

  return {
    netSavingsInflow: toMonthlyRate(netInflow, windowDays),
    savingsGrowthRate,
    emergencyFundMonths: safeRatio(currentSavings, monthlyExpenseRate(transactions, windowDays)),
  };
}
