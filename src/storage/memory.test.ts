import { describe, expect, it } from "vitest";
import type { PersonaAssignment } from "../personas/schemas";
import { createAccount, createLiability, createTransaction, createUser } from "../testing/fixtures";
import { emptySignalBundle } from "../features/aggregator";
import { InMemoryAssignmentStore, InMemoryFinancialStore, InMemorySignalCache } from "./memory";

function assignment(userId: string, assignedAt: string, persona: PersonaAssignment["persona"]): PersonaAssignment {
  return {
    userId,
    persona,
    displayName: persona,
    priority: 3,
    signalStrength: 0,
    dataAvailability: "new",
    windowType: "none",
    disclaimer: null,
    trace: { matched: [], priorityGroup: null, strengths: {}, tieBreak: "no_matches", selected: persona },
    assignedAt,
  };
}

describe("InMemoryFinancialStore", () => {
  const store = new InMemoryFinancialStore({
    users: [createUser("user-1"), createUser("user-2")],
    accounts: [
      createAccount({ id: "a-1", userId: "user-1" }),
      createAccount({ id: "b-1", userId: "user-2", type: "credit" }),
    ],
    liabilities: [createLiability({ accountId: "b-1", apr: 19.9 })],
    transactions: [
      createTransaction({ id: "t-2", accountId: "a-1", date: "2025-05-03", amount: -5 }),
      createTransaction({ id: "t-1", accountId: "a-1", date: "2025-05-01", amount: -5 }),
      createTransaction({ id: "t-3", accountId: "b-1", date: "2025-05-02", amount: -5 }),
    ],
  });

  it("scopes reads to the user's accounts and sorts by date", async () => {
    const transactions = await store.listTransactions("user-1", {
      start: "2025-05-01",
      end: "2025-05-31",
      includePending: false,
    });

    expect(transactions.map((transaction) => transaction.id)).toEqual(["t-1", "t-2"]);
    expect(await store.listLiabilities("user-1")).toEqual([]);
    expect((await store.listLiabilities("user-2"))[0].apr).toBe(19.9);
  });

  it("returns copies", async () => {
    const [account] = await store.listAccounts("user-1");
    account.balanceCurrent = 999;

    expect((await store.listAccounts("user-1"))[0].balanceCurrent).toBe(0);
  });

  it("updates consent only for known users", async () => {
    const at = new Date("2025-05-15T00:00:00.000Z");

    expect(await store.setConsent("user-2", false, at)).toBe(true);
    expect((await store.getUser("user-2"))?.consent).toEqual({ granted: false, updatedAt: "2025-05-15T00:00:00.000Z" });
    expect(await store.setConsent("ghost", true, at)).toBe(false);
  });
});

describe("InMemoryAssignmentStore", () => {
  it("lists history newest first and tracks the current assignment", async () => {
    const store = new InMemoryAssignmentStore();
    await store.record(assignment("user-1", "2025-05-01T00:00:00.000Z", "credit_builder"));
    await store.record(assignment("user-1", "2025-05-03T00:00:00.000Z", "savings_builder"));
    await store.record(assignment("user-1", "2025-05-02T00:00:00.000Z", "subscription_heavy"));
    await store.record(assignment("user-2", "2025-05-04T00:00:00.000Z", "high_utilization"));

    const history = await store.history("user-1", 2);
    expect(history.map((entry) => entry.persona)).toEqual(["savings_builder", "subscription_heavy"]);
    expect((await store.current("user-1"))?.persona).toBe("savings_builder");
    expect(await store.current("user-3")).toBeNull();
  });

  it("lets the later write win on equal timestamps", async () => {
    const store = new InMemoryAssignmentStore();
    await store.record(assignment("user-1", "2025-05-01T00:00:00.000Z", "credit_builder"));
    await store.record(assignment("user-1", "2025-05-01T00:00:00.000Z", "savings_builder"));

    expect((await store.current("user-1"))?.persona).toBe("savings_builder");
  });
});

describe("InMemorySignalCache", () => {
  it("hands out copies so callers cannot alter cached bundles", async () => {
    const cache = new InMemorySignalCache();
    const bundle = emptySignalBundle("user-1");
    await cache.write({ userId: "user-1", windowType: "30d", computedAt: "2025-05-15T00:00:00.000Z", bundle });

    bundle.subscriptions.recurringMerchants.push("Written after caching");
    const first = await cache.read("user-1", "30d");
    first?.bundle.subscriptions.recurringMerchants.push("Changed by a reader");
    const second = await cache.read("user-1", "30d");

    expect(second?.bundle.subscriptions.recurringMerchants).toEqual([]);
  });
});
