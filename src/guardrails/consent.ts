import { ConsentError } from "../errors";
import type { Logger } from "../logger";
import type { FinancialDataStore } from "../storage/ports";
import type { ConsentState } from "../types";

export class ConsentManager {
  constructor(
    private readonly store: FinancialDataStore,
    private readonly logger: Logger,
    private readonly clock: () => Date,
  ) {}

  async getConsent(userId: string): Promise<ConsentState> {
    const user = await this.store.getUser(userId);
    if (!user) {
      throw new ConsentError(userId, "USER_NOT_FOUND");
    }
    return { ...user.consent };
  }

  /** Unknown users count as not consenting. */
  async hasConsent(userId: string): Promise<boolean> {
    const user = await this.store.getUser(userId);
    return Boolean(user?.consent.granted);
  }

  async requireConsent(userId: string): Promise<void> {
    if (!(await this.hasConsent(userId))) {
      throw new ConsentError(userId, "CONSENT_REQUIRED");
    }
  }

  async grant(userId: string): Promise<ConsentState> {
    return this.update(userId, true);
  }

  async revoke(userId: string): Promise<ConsentState> {
    return this.update(userId, false);
  }

  private async update(userId: string, granted: boolean): Promise<ConsentState> {
    const at = this.clock();
    const updated = await this.store.setConsent(userId, granted, at);
    if (!updated) {
      throw new ConsentError(userId, "USER_NOT_FOUND");
    }
    this.logger.info(`Consent ${granted ? "granted" : "revoked"} for user ${userId}`);
    return { granted, updatedAt: at.toISOString() };
  }
}
