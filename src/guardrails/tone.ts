import phrases from "./shaming-phrases.json";

export const NEUTRAL_REPLACEMENT = "there's an opportunity to improve";

export interface TonePattern {
  phrase: string;
  pattern: RegExp;
  replacement: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Straight and curly apostrophes both match. */
function compilePhrase(phrase: string): RegExp {
  const source = escapeRegExp(phrase).replace(/'/g, "['’]");
  return new RegExp(source, "gi");
}

export const SHAMING_PATTERNS: readonly TonePattern[] = phrases.map((phrase) => ({
  phrase,
  pattern: compilePhrase(phrase),
  replacement: NEUTRAL_REPLACEMENT,
}));

export interface ToneReport {
  valid: boolean;
  issues: string[];
}

export function validateTone(text: string, patterns: readonly TonePattern[] = SHAMING_PATTERNS): ToneReport {
  const issues = patterns
    .filter(({ pattern }) => {
      pattern.lastIndex = 0;
      return pattern.test(text);
    })
    .map(({ phrase }) => `Shaming language detected: '${phrase}'`);
  return { valid: issues.length === 0, issues };
}

/** Replaces each shaming span in order; the item is kept. */
export function sanitizeTone(text: string, patterns: readonly TonePattern[] = SHAMING_PATTERNS): string {
  return patterns.reduce((current, { pattern, replacement }) => current.replace(pattern, replacement), text);
}
