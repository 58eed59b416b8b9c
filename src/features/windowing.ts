import { InvalidWindowError } from "../errors";
import type { Logger } from "../logger";
import type { FinancialDataStore } from "../storage/ports";
import type { DataSpan, DateWindow, TransactionRecord, WindowType } from "../types";
import { addDays, daysBetween } from "./dates";

export const WINDOW_DAYS: Record<WindowType, number> = {
  "30d": 30,
  "180d": 180,
};

export function isWindowType(value: string): value is WindowType {
  return Object.prototype.hasOwnProperty.call(WINDOW_DAYS, value);
}

/**
 * Trailing window ending the day before `today`. Data for `today` is still
 * in flight, so the reference day is never part of a window.
 */
export function resolveWindow(windowType: string, today: string): DateWindow {
  if (!isWindowType(windowType)) {
    throw new InvalidWindowError(windowType);
  }
  const days = WINDOW_DAYS[windowType];
  const end = addDays(today, -1);
  const start = addDays(end, -(days - 1));
  return { type: windowType, start, end, days };
}

export interface WindowFetchOptions {
  includePending?: boolean;
}

export class WindowPartitioner {
  constructor(
    private readonly store: FinancialDataStore,
    private readonly logger: Logger,
  ) {}

  async transactionsInWindow(
    userId: string,
    windowType: string,
    today: string,
    options: WindowFetchOptions = {},
  ): Promise<{ window: DateWindow; transactions: TransactionRecord[] }> {
    const window = resolveWindow(windowType, today);
    const transactions = await this.store.listTransactions(userId, {
      start: window.start,
      end: window.end,
      includePending: options.includePending ?? false,
    });
    this.logger.debug(
      `Found ${transactions.length} transactions for user ${userId} in ${window.type} window (${window.start} to ${window.end})`,
    );
    return { window, transactions };
  }

  async dataSpan(userId: string): Promise<DataSpan> {
    const range = await this.store.getTransactionDateRange(userId);
    if (!range) {
      return { earliest: null, latest: null, totalDays: 0 };
    }
    return {
      earliest: range.earliest,
      latest: range.latest,
      totalDays: daysBetween(range.earliest, range.latest) + 1,
    };
  }

  async dataAgeDays(userId: string, today: string): Promise<number> {
    const span = await this.dataSpan(userId);
    return dataAgeFromSpan(span, today);
  }
}

export function dataAgeFromSpan(span: DataSpan, today: string): number {
  if (!span.earliest) {
    return 0;
  }
  return daysBetween(span.earliest, today);
}
