import { describe, expect, it } from "vitest";
import { createTransaction } from "../testing/fixtures";
import type { DetectorInput, TransactionRecord } from "../types";
import { detectSubscriptions } from "./subscriptions";

function input(transactions: TransactionRecord[], windowDays = 180): DetectorInput {
  return { transactions, accounts: [], liabilities: [], windowDays };
}

function charges(merchantName: string, amount: number, dates: string[]): TransactionRecord[] {
  return dates.map((date) => createTransaction({ date, amount, merchantName }));
}

describe("detectSubscriptions", () => {
  it("detects a monthly streaming charge and its monthly spend", () => {
    const result = detectSubscriptions(
      input([
        ...charges("Netflix", -14.99, ["2025-01-01", "2025-02-01", "2025-03-01", "2025-04-01"]),
        createTransaction({ date: "2025-02-15", amount: -1000, merchantName: "Landlord" }),
      ]),
    );

    expect(result.subscriptionsCount).toBe(1);
    expect(result.recurringMerchants).toEqual(["Netflix"]);
    expect(result.monthlyRecurringSpend).toBeCloseTo(14.99, 6);
    // 1059.96 of debits over 180 days is 176.66 a month.
    expect(result.recurringSpendShare).toBeCloseTo(8.485, 2);
  });

  it("needs at least three charges", () => {
    const result = detectSubscriptions(input(charges("Spotify", -9.99, ["2025-03-01", "2025-04-01"])));

    expect(result.subscriptionsCount).toBe(0);
    expect(result.monthlyRecurringSpend).toBe(0);
  });

  it("ignores merchants whose charges spread over more than 90 days", () => {
    const result = detectSubscriptions(input(charges("Gym", -40, ["2025-01-01", "2025-03-01", "2025-04-15"])));

    expect(result.recurringMerchants).toEqual([]);
  });

  it("counts only debits with a merchant name", () => {
    const result = detectSubscriptions(
      input([
        ...charges("Refunds Inc", 25, ["2025-03-01", "2025-03-08", "2025-03-15"]),
        createTransaction({ date: "2025-03-01", amount: -5 }),
        createTransaction({ date: "2025-03-08", amount: -5 }),
        createTransaction({ date: "2025-03-15", amount: -5 }),
      ]),
    );

    expect(result.subscriptionsCount).toBe(0);
  });

  it("counts the full spend when every charge lands on the same day", () => {
    const result = detectSubscriptions(input(charges("Arcade", -10, ["2025-03-01", "2025-03-01", "2025-03-01"]), 30));

    expect(result.monthlyRecurringSpend).toBe(30);
    expect(result.recurringSpendShare).toBe(100);
  });

  it("returns zeros for an empty window", () => {
    expect(detectSubscriptions(input([]))).toEqual({
      subscriptionsCount: 0,
      recurringMerchants: [],
      monthlyRecurringSpend: 0,
      recurringSpendShare: 0,
    });
  });
});
