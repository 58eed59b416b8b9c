import type { CandidateContentItem, GuardedContentItem } from "../types";

export const DISCLOSURE_TEXT =
  "This is educational content, not financial advice. " +
  "Consult a licensed financial advisor for personalized guidance.";

/** Idempotent: a rationale that already carries the disclosure is left as is. */
export function injectDisclosure(item: CandidateContentItem): GuardedContentItem {
  if (item.rationale.includes(DISCLOSURE_TEXT)) {
    return { ...item, disclosure: DISCLOSURE_TEXT };
  }
  const rationale = item.rationale.trim()
    ? `${item.rationale}\n\n${DISCLOSURE_TEXT}`
    : DISCLOSURE_TEXT;
  return { ...item, rationale, disclosure: DISCLOSURE_TEXT };
}
