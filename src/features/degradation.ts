import type { Logger } from "../logger";
import type { DataAvailabilityTier, DataSpan, DegradedSignals, SignalBundle } from "../types";
import { emptySignalBundle, type ComputeSignalsOptions, type SignalAggregator } from "./aggregator";
import { dataAgeFromSpan } from "./windowing";

export const NEW_USER_DISCLAIMER =
  "Welcome! We're still learning about your financial patterns. " +
  "As we gather more data, your insights will become more personalized.";

export const PRELIMINARY_DISCLAIMER =
  "We're building your financial profile. These are preliminary insights. " +
  "After 30 days of data, you'll receive more detailed recommendations.";

export function classifyDataAge(dataAgeDays: number): DataAvailabilityTier {
  if (dataAgeDays < 7) {
    return "new";
  }
  if (dataAgeDays < 30) {
    return "limited";
  }
  if (dataAgeDays < 180) {
    return "full_30";
  }
  return "full_180";
}

/** Prefers the 180-day bundle, then the 30-day one, then an all-zero placeholder. */
export function selectPrimarySignals(result: DegradedSignals): SignalBundle {
  return result.signals180d ?? result.signals30d ?? emptySignalBundle(result.userId);
}

export class DegradationController {
  constructor(
    private readonly aggregator: SignalAggregator,
    private readonly logger: Logger,
  ) {}

  async availability(
    userId: string,
    today: string,
  ): Promise<{ tier: DataAvailabilityTier; dataAgeDays: number; span: DataSpan }> {
    const span = await this.aggregator.windows.dataSpan(userId);
    const dataAgeDays = dataAgeFromSpan(span, today);
    return { tier: classifyDataAge(dataAgeDays), dataAgeDays, span };
  }

  async signalsWithDegradation(
    userId: string,
    today: string,
    options: ComputeSignalsOptions = {},
  ): Promise<DegradedSignals> {
    const { tier, dataAgeDays } = await this.availability(userId, today);
    const result: DegradedSignals = {
      userId,
      tier,
      dataAgeDays,
      canCompute30d: false,
      canCompute180d: false,
      signals30d: null,
      signals180d: null,
      disclaimer: null,
    };

    switch (tier) {
      case "new":
        result.disclaimer = NEW_USER_DISCLAIMER;
        this.logger.info(`User ${userId}: new user (<7 days of data), signals withheld`);
        break;
      case "limited":
        result.canCompute30d = true;
        result.signals30d = await this.aggregator.computeSignals(userId, "30d", today, options);
        result.disclaimer = PRELIMINARY_DISCLAIMER;
        this.logger.info(`User ${userId}: limited data (7-29 days), preliminary insights`);
        break;
      case "full_30":
        result.canCompute30d = true;
        result.signals30d = await this.aggregator.computeSignals(userId, "30d", today, options);
        break;
      case "full_180": {
        result.canCompute30d = true;
        result.canCompute180d = true;
        const [signals30d, signals180d] = await Promise.all([
          this.aggregator.computeSignals(userId, "30d", today, options),
          this.aggregator.computeSignals(userId, "180d", today, options),
        ]);
        result.signals30d = signals30d;
        result.signals180d = signals180d;
        break;
      }
    }

    return result;
  }

  async primarySignals(userId: string, today: string): Promise<SignalBundle> {
    return selectPrimarySignals(await this.signalsWithDegradation(userId, today));
  }
}
