import { describe, expect, it } from "vitest";
import { createBundle } from "../testing/fixtures";
import type { PersonaDefinition } from "./catalog";
import { selectPrimaryPersona } from "./prioritizer";

describe("selectPrimaryPersona", () => {
  it("falls back to credit builder when nothing matches", () => {
    expect(selectPrimaryPersona([], createBundle())).toEqual({
      persona: "credit_builder",
      trace: {
        matched: [],
        priorityGroup: null,
        strengths: {},
        tieBreak: "no_matches",
        selected: "credit_builder",
      },
    });
  });

  it("returns a single match as is", () => {
    const { persona, trace } = selectPrimaryPersona(["savings_builder"], createBundle());

    expect(persona).toBe("savings_builder");
    expect(trace.tieBreak).toBe("single_match");
  });

  it("prefers the most urgent priority", () => {
    const { persona, trace } = selectPrimaryPersona(["savings_builder", "subscription_heavy"], createBundle());

    expect(persona).toBe("subscription_heavy");
    expect(trace).toEqual({
      matched: ["savings_builder", "subscription_heavy"],
      priorityGroup: { priority: 4, candidates: ["subscription_heavy"] },
      strengths: {},
      tieBreak: "priority",
      selected: "subscription_heavy",
    });
  });

  describe("with personas sharing a priority", () => {
    function table(subscriptionStrength: number, savingsStrength: number): PersonaDefinition[] {
      return [
        {
          id: "savings_builder",
          displayName: "Savings Builder",
          priority: 1,
          matches: () => true,
          strength: () => savingsStrength,
        },
        {
          id: "subscription_heavy",
          displayName: "Subscription-Heavy",
          priority: 1,
          matches: () => true,
          strength: () => subscriptionStrength,
        },
      ];
    }

    it("breaks ties on signal strength", () => {
      const { persona, trace } = selectPrimaryPersona(
        ["subscription_heavy", "savings_builder"],
        createBundle(),
        table(0.5, 0.9),
      );

      expect(persona).toBe("savings_builder");
      expect(trace.tieBreak).toBe("signal_strength");
      expect(trace.strengths).toEqual({ subscription_heavy: 0.5, savings_builder: 0.9 });
    });

    it("falls back to the fixed persona order on equal strength", () => {
      const { persona, trace } = selectPrimaryPersona(
        ["savings_builder", "subscription_heavy"],
        createBundle(),
        table(0.7, 0.7),
      );

      expect(persona).toBe("subscription_heavy");
      expect(trace.tieBreak).toBe("defined_order");
      expect(trace.priorityGroup).toEqual({ priority: 1, candidates: ["savings_builder", "subscription_heavy"] });
    });
  });

  it("is deterministic for the same input", () => {
    const signals = createBundle({ credit: { creditUtilization: 90 } });
    const first = selectPrimaryPersona(["high_utilization", "subscription_heavy"], signals);
    const second = selectPrimaryPersona(["high_utilization", "subscription_heavy"], signals);

    expect(second).toEqual(first);
    expect(first.persona).toBe("high_utilization");
  });
});
