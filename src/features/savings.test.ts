import { describe, expect, it } from "vitest";
import { DataUnavailableError } from "../errors";
import { createAccount, createTransaction } from "../testing/fixtures";
import { detectSavings, isSavingsAccount } from "./savings";

const checking = createAccount({ id: "checking-1", balanceCurrent: 2000 });
const savings = createAccount({ id: "savings-1", subtype: "savings", balanceCurrent: 6000 });

describe("detectSavings", () => {
  it("measures inflow, growth and emergency coverage", () => {
    const result = detectSavings({
      transactions: [
        createTransaction({ accountId: "savings-1", date: "2025-05-01", amount: 500 }),
        createTransaction({ accountId: "checking-1", date: "2025-05-02", amount: -1500 }),
      ],
      accounts: [checking, savings],
      liabilities: [],
      windowDays: 30,
    });

    expect(result.netSavingsInflow).toBeCloseTo(500, 6);
    expect(result.savingsGrowthRate).toBeCloseTo(9.0909, 3);
    expect(result.emergencyFundMonths).toBe(4);
  });

  it("scales the inflow of a long window to a monthly rate", () => {
    const result = detectSavings({
      transactions: [createTransaction({ accountId: "savings-1", date: "2025-03-01", amount: 1200 })],
      accounts: [savings],
      liabilities: [],
      windowDays: 180,
    });

    expect(result.netSavingsInflow).toBeCloseTo(200, 6);
    expect(result.emergencyFundMonths).toBe(0);
  });

  it("returns zeros when the window is empty", () => {
    expect(detectSavings({ transactions: [], accounts: [savings], liabilities: [], windowDays: 30 })).toEqual({
      netSavingsInflow: 0,
      savingsGrowthRate: 0,
      emergencyFundMonths: 0,
    });
  });

  it("signals missing savings accounts", () => {
    expect(() =>
      detectSavings({ transactions: [], accounts: [checking], liabilities: [], windowDays: 30 }),
    ).toThrow(DataUnavailableError);
  });

  it("treats money market accounts as savings", () => {
    expect(isSavingsAccount(createAccount({ id: "mm-1", subtype: "money_market" }))).toBe(true);
    expect(isSavingsAccount(createAccount({ id: "hsa-1", subtype: "hsa" }))).toBe(false);
  });
});
