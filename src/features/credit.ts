import { DataUnavailableError } from "../errors";
import type { CreditSignals, DetectorInput, LiabilityRecord } from "../types";

export const MIN_PAYMENT_MARGIN = 1.1;

export const EMPTY_CREDIT_SIGNALS: CreditSignals = {
  creditUtilization: 0,
  utilization30Flag: false,
  utilization50Flag: false,
  utilization80Flag: false,
  minPaymentOnly: false,
  interestCharges: 0,
  isOverdue: false,
};

export function detectCredit({ transactions, accounts, liabilities }: DetectorInput): CreditSignals {
  const cards = accounts.filter((account) => account.type === "credit");
  if (!cards.length) {
    throw new DataUnavailableError("credit", "User has no credit accounts");
  }

  const liabilityByAccount = new Map<string, LiabilityRecord>(
    liabilities.map((liability) => [liability.accountId, liability]),
  );

  let creditUtilization = 0;
  let interestCharges = 0;
  let totalMinimum = 0;
  let isOverdue = false;

  for (const card of cards) {
    const balance = card.balanceCurrent;
    const limit = card.creditLimit ?? 0;
    if (limit > 0) {
      creditUtilization = Math.max(creditUtilization, (balance / limit) * 100);
    }

    const liability = liabilityByAccount.get(card.id);
    if (!liability) {
      continue;
    }
    if (liability.isOverdue) {
      isOverdue = true;
    }
    if (liability.apr && balance > 0) {
      interestCharges += ((liability.apr / 100) * balance) / 12;
    }
    totalMinimum += liability.minimumPayment ?? 0;
  }

  // Heuristic: payments are inflows to a card account labelled as a payment.
  const cardIds = new Set(cards.map((card) => card.id));
  const totalPayments = transactions
    .filter(
      (transaction) =>
        cardIds.has(transaction.accountId) &&
        transaction.amount > 0 &&
        (transaction.merchantName ?? "").toLowerCase().includes("payment"),
    )
    .reduce((sum, transaction) => sum + transaction.amount, 0);

  const minPaymentOnly = !(totalMinimum > 0 && totalPayments > totalMinimum * MIN_PAYMENT_MARGIN);

  return {
    creditUtilization,
    utilization30Flag: creditUtilization >= 30,
    utilization50Flag: creditUtilization >= 50,
    utilization80Flag: creditUtilization >= 80,
    minPaymentOnly,
    interestCharges,
    isOverdue,
  };
}
