import { describe, expect, it } from "vitest";
import { NEUTRAL_REPLACEMENT, sanitizeTone, validateTone } from "./tone";

describe("validateTone", () => {
  it("passes neutral language", () => {
    expect(validateTone("Setting up autopay could lower your interest costs.")).toEqual({ valid: true, issues: [] });
  });

  it("reports every shaming phrase it finds", () => {
    const report = validateTone("You're overspending and making bad choices");

    expect(report.valid).toBe(false);
    expect(report.issues).toEqual([
      "Shaming language detected: 'you're overspending'",
      "Shaming language detected: 'bad choices'",
    ]);
  });

  it("matches curly apostrophes", () => {
    expect(validateTone("You’re overspending on takeout").valid).toBe(false);
  });

  it("gives the same answer on repeated calls", () => {
    const text = "Honestly, you are wasting money here.";

    expect(validateTone(text).valid).toBe(false);
    expect(validateTone(text).valid).toBe(false);
  });
});

describe("sanitizeTone", () => {
  it("replaces each shaming span with neutral wording", () => {
    expect(sanitizeTone("You're overspending and making bad choices")).toBe(
      `${NEUTRAL_REPLACEMENT} and making ${NEUTRAL_REPLACEMENT}`,
    );
  });

  it("rewrites direct insults", () => {
    expect(sanitizeTone("You're stupid with cards")).toBe(`${NEUTRAL_REPLACEMENT} with cards`);
    expect(validateTone("Honestly, you're being incompetent.").issues).toEqual([
      "Shaming language detected: 'you're being incompetent'",
    ]);
  });

  it("leaves neutral text unchanged", () => {
    const text = "Consider moving idle cash to savings.";

    expect(sanitizeTone(text)).toBe(text);
  });

  it("produces text that passes validation", () => {
    expect(validateTone(sanitizeTone("You are BAD WITH MONEY")).valid).toBe(true);
  });
});
