import { describe, expect, it } from "vitest";
import { ConsentError } from "../errors";
import { silentLogger } from "../logger";
import { InMemoryFinancialStore } from "../storage/memory";
import { createUser } from "../testing/fixtures";
import { ConsentManager } from "./consent";

function setup() {
  const store = new InMemoryFinancialStore({ users: [createUser("user-1", false)] });
  const manager = new ConsentManager(store, silentLogger, () => new Date("2025-05-15T10:00:00.000Z"));
  return { store, manager };
}

describe("ConsentManager", () => {
  it("requires an explicit opt-in", async () => {
    const { manager } = setup();

    expect(await manager.hasConsent("user-1")).toBe(false);
    await expect(manager.requireConsent("user-1")).rejects.toMatchObject({ code: "CONSENT_REQUIRED" });
  });

  it("records grants and revocations with a timestamp", async () => {
    const { manager } = setup();

    expect(await manager.grant("user-1")).toEqual({ granted: true, updatedAt: "2025-05-15T10:00:00.000Z" });
    expect(await manager.hasConsent("user-1")).toBe(true);
    await expect(manager.requireConsent("user-1")).resolves.toBeUndefined();

    await manager.revoke("user-1");
    expect(await manager.getConsent("user-1")).toEqual({ granted: false, updatedAt: "2025-05-15T10:00:00.000Z" });
  });

  it("rejects unknown users", async () => {
    const { manager } = setup();

    await expect(manager.getConsent("ghost")).rejects.toBeInstanceOf(ConsentError);
    await expect(manager.grant("ghost")).rejects.toMatchObject({ code: "USER_NOT_FOUND" });
    expect(await manager.hasConsent("ghost")).toBe(false);
  });
});
