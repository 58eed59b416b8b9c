import type { AccountRecord, LiabilityRecord, SignalBundle, TransactionRecord, UserRecord } from "../types";
import { emptySignalBundle } from "../features/aggregator";

let sequence = 0;

export function createTransaction(
  overrides: Partial<TransactionRecord> & { date: string; amount: number },
): TransactionRecord {
  sequence += 1;
  return {
    id: `txn-${sequence}`,
    accountId: "checking-1",
    merchantName: null,
    categories: [],
    paymentChannel: null,
    pending: false,
    ...overrides,
  };
}

export function createAccount(overrides: Partial<AccountRecord> & { id: string }): AccountRecord {
  return {
    userId: "user-1",
    type: "depository",
    subtype: "checking",
    balanceCurrent: 0,
    balanceAvailable: null,
    creditLimit: null,
    ...overrides,
  };
}

export function createLiability(overrides: Partial<LiabilityRecord> & { accountId: string }): LiabilityRecord {
  return {
    apr: null,
    minimumPayment: null,
    isOverdue: false,
    ...overrides,
  };
}

export function createUser(id: string, granted = true): UserRecord {
  return {
    id,
    createdAt: "2025-01-01T00:00:00.000Z",
    consent: { granted, updatedAt: granted ? "2025-01-01T00:00:00.000Z" : null },
  };
}

/** Zero bundle with selected sections overridden. */
export function createBundle(overrides: {
  subscriptions?: Partial<SignalBundle["subscriptions"]>;
  savings?: Partial<SignalBundle["savings"]>;
  credit?: Partial<SignalBundle["credit"]>;
  income?: Partial<SignalBundle["income"]>;
} = {}): SignalBundle {
  const base = emptySignalBundle("user-1");
  return {
    ...base,
    subscriptions: { ...base.subscriptions, ...overrides.subscriptions },
    savings: { ...base.savings, ...overrides.savings },
    credit: { ...base.credit, ...overrides.credit },
    income: { ...base.income, ...overrides.income },
  };
}
