import { DataUnavailableError } from "../errors";
import type { Logger } from "../logger";
import type { FinancialDataStore, SignalCacheEntry, SignalCacheStore } from "../storage/ports";
import type { DetectorInput, SignalBundle } from "../types";
import { EMPTY_CREDIT_SIGNALS, detectCredit } from "./credit";
import { EMPTY_INCOME_SIGNALS, detectIncome } from "./income";
import { EMPTY_SAVINGS_SIGNALS, detectSavings } from "./savings";
import { EMPTY_SUBSCRIPTION_SIGNALS, detectSubscriptions } from "./subscriptions";
import { WindowPartitioner, resolveWindow } from "./windowing";

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

export interface ComputeSignalsOptions {
  bypassCache?: boolean;
}

export interface SignalAggregatorDependencies {
  store: FinancialDataStore;
  cache?: SignalCacheStore;
  logger: Logger;
  clock: () => Date;
  cacheTtlMs?: number;
  cacheEnabled?: boolean;
}

/** All-zero bundle for users with no computable window. */
export function emptySignalBundle(userId: string): SignalBundle {
  return {
    userId,
    windowType: "none",
    window: null,
    computedAt: null,
    subscriptions: { ...EMPTY_SUBSCRIPTION_SIGNALS, recurringMerchants: [] },
    savings: { ...EMPTY_SAVINGS_SIGNALS },
    credit: { ...EMPTY_CREDIT_SIGNALS },
    income: { ...EMPTY_INCOME_SIGNALS },
  };
}

export class SignalAggregator {
  private readonly partitioner: WindowPartitioner;
  private readonly cacheTtlMs: number;
  private readonly cacheEnabled: boolean;

  constructor(private readonly deps: SignalAggregatorDependencies) {
    this.partitioner = new WindowPartitioner(deps.store, deps.logger);
    this.cacheTtlMs = deps.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.cacheEnabled = (deps.cacheEnabled ?? true) && Boolean(deps.cache);
  }

  get windows(): WindowPartitioner {
    return this.partitioner;
  }

  async computeSignals(
    userId: string,
    windowType: string,
    today: string,
    options: ComputeSignalsOptions = {},
  ): Promise<SignalBundle> {
    const window = resolveWindow(windowType, today);
    const now = this.deps.clock();

    if (this.cacheEnabled && !options.bypassCache) {
      const cached = await this.readFresh(userId, window.type, window.end, now);
      if (cached) {
        this.deps.logger.debug(`Using cached signals for user ${userId}, window ${window.type}`);
        return cached.bundle;
      }
    }

    const [{ transactions }, accounts, liabilities] = await Promise.all([
      this.partitioner.transactionsInWindow(userId, window.type, today),
      this.deps.store.listAccounts(userId),
      this.deps.store.listLiabilities(userId),
    ]);

    const input: DetectorInput = { transactions, accounts, liabilities, windowDays: window.days };
    const bundle: SignalBundle = {
      userId,
      windowType: window.type,
      window,
      computedAt: now.toISOString(),
      subscriptions: this.runDetector(userId, () => detectSubscriptions(input), {
        ...EMPTY_SUBSCRIPTION_SIGNALS,
        recurringMerchants: [],
      }),
      savings: this.runDetector(userId, () => detectSavings(input), { ...EMPTY_SAVINGS_SIGNALS }),
      credit: this.runDetector(userId, () => detectCredit(input), { ...EMPTY_CREDIT_SIGNALS }),
      income: this.runDetector(userId, () => detectIncome(input), { ...EMPTY_INCOME_SIGNALS }),
    };

    if (this.cacheEnabled && this.deps.cache) {
      await this.deps.cache.write({
        userId,
        windowType: window.type,
        computedAt: bundle.computedAt ?? now.toISOString(),
        bundle,
      });
    }

    this.deps.logger.info(
      `Computed signals for user ${userId}, window ${window.type}: ` +
        `${bundle.subscriptions.subscriptionsCount} subscriptions, ` +
        `${bundle.credit.creditUtilization.toFixed(1)}% utilization`,
    );

    return bundle;
  }

  private async readFresh(
    userId: string,
    windowType: SignalCacheEntry["windowType"],
    windowEnd: string,
    now: Date,
  ): Promise<SignalCacheEntry | null> {
    if (!this.deps.cache) {
      return null;
    }
    const entry = await this.deps.cache.read(userId, windowType);
    if (!entry) {
      return null;
    }
    const age = now.getTime() - new Date(entry.computedAt).getTime();
    if (age < 0 || age >= this.cacheTtlMs) {
      return null;
    }
    // A bundle for another reference day is stale even when recent.
    if (entry.bundle.window?.end !== windowEnd) {
      return null;
    }
    return entry;
  }

  private runDetector<T>(userId: string, detector: () => T, fallback: T): T {
    try {
      return detector();
    } catch (error) {
      if (error instanceof DataUnavailableError) {
        this.deps.logger.debug(`User ${userId}: ${error.message}; using zero-valued ${error.detector} signals`);
        return fallback;
      }
      throw error;
    }
  }
}
