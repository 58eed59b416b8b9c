import { ConsentError } from "../errors";
import type { Logger } from "../logger";
import type { FinancialDataStore } from "../storage/ports";
import type { AccountRecord, GuardedContentItem, SignalBundle } from "../types";
import type { ConsentManager } from "./consent";
import { injectDisclosure } from "./disclosure";
import { checkOfferEligibility } from "./eligibility";
import { CandidateContentItemSchema } from "./schemas";
import { sanitizeTone, validateTone } from "./tone";

export interface RejectedItem {
  title: string | null;
  reasons: string[];
}

export interface GuardrailsOutcome {
  consentActive: boolean;
  items: GuardedContentItem[];
  rejected: RejectedItem[];
  sanitizedCount: number;
}

export interface GuardrailsEnforcerDependencies {
  store: FinancialDataStore;
  consent: ConsentManager;
  logger: Logger;
}

function titleOf(candidate: unknown): string | null {
  if (candidate && typeof candidate === "object" && "title" in candidate && typeof candidate.title === "string") {
    return candidate.title;
  }
  return null;
}

/**
 * Consent gate, eligibility filter, tone sanitization and disclosure
 * injection, in that order. Survivors keep their relative order.
 */
export class GuardrailsEnforcer {
  constructor(private readonly deps: GuardrailsEnforcerDependencies) {}

  async enforce(userId: string, candidates: readonly unknown[], signals: SignalBundle): Promise<GuardrailsOutcome> {
    try {
      await this.deps.consent.requireConsent(userId);
    } catch (error) {
      if (error instanceof ConsentError) {
        this.deps.logger.warn(`User ${userId} does not have consent - blocking ${candidates.length} recommendations`);
        return { consentActive: false, items: [], rejected: [], sanitizedCount: 0 };
      }
      throw error;
    }

    let accounts: AccountRecord[] | null = null;
    const items: GuardedContentItem[] = [];
    const rejected: RejectedItem[] = [];
    let sanitizedCount = 0;

    for (const candidate of candidates) {
      const parsed = CandidateContentItemSchema.safeParse(candidate);
      if (!parsed.success) {
        const reasons = parsed.error.issues.map((issue) => `${issue.path.join(".") || "item"}: ${issue.message}`);
        this.deps.logger.warn(`Malformed content item dropped for user ${userId}: ${reasons.join(", ")}`);
        rejected.push({ title: titleOf(candidate), reasons });
        continue;
      }
      const item = parsed.data;

      if (item.type === "offer") {
        if (!accounts) {
          accounts = await this.deps.store.listAccounts(userId);
        }
        const eligibility = checkOfferEligibility(item, accounts, signals);
        if (!eligibility.eligible) {
          this.deps.logger.debug(
            `Offer '${item.title}' filtered for user ${userId}: ${eligibility.reasons.join(", ")}`,
          );
          rejected.push({ title: item.title, reasons: eligibility.reasons });
          continue;
        }
      }

      let rationale = item.rationale;
      const tone = validateTone(rationale);
      if (!tone.valid) {
        rationale = sanitizeTone(rationale);
        sanitizedCount += 1;
        this.deps.logger.info(`Tone sanitized for recommendation '${item.title}'`);
      }

      items.push(injectDisclosure({ ...item, rationale }));
    }

    this.deps.logger.info(
      `Guardrails enforced for user ${userId}: ${items.length}/${candidates.length} recommendations passed`,
    );

    return { consentActive: true, items, rejected, sanitizedCount };
  }
}
