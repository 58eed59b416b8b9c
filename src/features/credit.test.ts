import { describe, expect, it } from "vitest";
import { DataUnavailableError } from "../errors";
import { createAccount, createLiability, createTransaction } from "../testing/fixtures";
import { detectCredit } from "./credit";

const card = createAccount({ id: "card-1", type: "credit", subtype: "credit card", balanceCurrent: 4000, creditLimit: 5000 });

describe("detectCredit", () => {
  it("flags high utilization and interest on a carried balance", () => {
    const result = detectCredit({
      transactions: [
        createTransaction({ accountId: "card-1", date: "2025-05-03", amount: 120, merchantName: "Credit Card Payment" }),
      ],
      accounts: [card],
      liabilities: [createLiability({ accountId: "card-1", apr: 24, minimumPayment: 100 })],
      windowDays: 30,
    });

    expect(result.creditUtilization).toBeCloseTo(80, 6);
    expect(result.utilization30Flag).toBe(true);
    expect(result.utilization50Flag).toBe(true);
    expect(result.utilization80Flag).toBe(true);
    expect(result.interestCharges).toBeCloseTo(80, 6);
    expect(result.minPaymentOnly).toBe(false);
    expect(result.isOverdue).toBe(false);
  });

  it("treats payments within 10% of the minimum as minimum-only", () => {
    const result = detectCredit({
      transactions: [
        createTransaction({ accountId: "card-1", date: "2025-05-03", amount: 110, merchantName: "PAYMENT - THANK YOU" }),
        createTransaction({ accountId: "card-1", date: "2025-05-04", amount: 500, merchantName: "Refund" }),
      ],
      accounts: [card],
      liabilities: [createLiability({ accountId: "card-1", minimumPayment: 100, isOverdue: true })],
      windowDays: 30,
    });

    expect(result.minPaymentOnly).toBe(true);
    expect(result.isOverdue).toBe(true);
    expect(result.interestCharges).toBe(0);
  });

  it("reports the highest utilization across cards", () => {
    const result = detectCredit({
      transactions: [],
      accounts: [
        createAccount({ id: "card-1", type: "credit", balanceCurrent: 1000, creditLimit: 5000 }),
        createAccount({ id: "card-2", type: "credit", balanceCurrent: 1500, creditLimit: 2000 }),
      ],
      liabilities: [],
      windowDays: 30,
    });

    expect(result.creditUtilization).toBe(75);
    expect(result.utilization50Flag).toBe(true);
    expect(result.utilization80Flag).toBe(false);
  });

  it("skips cards without a limit", () => {
    const result = detectCredit({
      transactions: [],
      accounts: [createAccount({ id: "card-1", type: "credit", balanceCurrent: 300, creditLimit: null })],
      liabilities: [],
      windowDays: 30,
    });

    expect(result.creditUtilization).toBe(0);
    expect(result.utilization30Flag).toBe(false);
    expect(result.minPaymentOnly).toBe(true);
  });

  it("signals missing credit accounts", () => {
    expect(() =>
      detectCredit({ transactions: [], accounts: [createAccount({ id: "checking-1" })], liabilities: [], windowDays: 30 }),
    ).toThrow(DataUnavailableError);
  });
});
