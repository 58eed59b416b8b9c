import { SignalAggregator, type ComputeSignalsOptions } from "../features/aggregator";
import { toIsoDate } from "../features/dates";
import { DegradationController } from "../features/degradation";
import { ConsentManager } from "../guardrails/consent";
import { GuardrailsEnforcer, type GuardrailsOutcome } from "../guardrails/enforcer";
import { scopedLogger, silentLogger, type Logger } from "../logger";
import { PersonaAssigner, type PersonaAssignment } from "../personas/assignment";
import type { FinancialDataStore, PersonaAssignmentStore, SignalCacheStore } from "../storage/ports";
import type {
  ConsentState,
  DataAvailabilityTier,
  DataSpan,
  DegradedSignals,
  GuardedContentItem,
  SignalBundle,
} from "../types";

export interface PersonaEngineDependencies {
  store: FinancialDataStore;
  assignments: PersonaAssignmentStore;
  signalCache?: SignalCacheStore;
  logger?: Logger;
  clock?: () => Date;
  /** Fixed "today" (YYYY-MM-DD); defaults to the clock's UTC date. */
  referenceDate?: string | null;
  cacheTtlMs?: number;
  cacheEnabled?: boolean;
}

export interface DataAvailability {
  tier: DataAvailabilityTier;
  dataAgeDays: number;
  span: DataSpan;
}

export interface PersonaEngine {
  today(): string;
  computeSignals(userId: string, windowType: string, options?: ComputeSignalsOptions): Promise<SignalBundle>;
  getDataAvailability(userId: string): Promise<DataAvailability>;
  getSignalsWithDegradation(userId: string, options?: ComputeSignalsOptions): Promise<DegradedSignals>;
  getPrimarySignals(userId: string): Promise<SignalBundle>;
  assignPersona(userId: string): Promise<PersonaAssignment>;
  getCurrentPersona(userId: string): Promise<PersonaAssignment | null>;
  getPersonaHistory(userId: string, limit?: number): Promise<PersonaAssignment[]>;
  enforceGuardrails(userId: string, candidates: readonly unknown[], signals: SignalBundle): Promise<GuardedContentItem[]>;
  runGuardrails(userId: string, candidates: readonly unknown[], signals: SignalBundle): Promise<GuardrailsOutcome>;
  hasConsent(userId: string): Promise<boolean>;
  getConsent(userId: string): Promise<ConsentState>;
  grantConsent(userId: string): Promise<ConsentState>;
  revokeConsent(userId: string): Promise<ConsentState>;
}

export function createPersonaEngine(dependencies: PersonaEngineDependencies): PersonaEngine {
  const logger = dependencies.logger ?? silentLogger;
  const clock = dependencies.clock ?? (() => new Date());
  const today = () => dependencies.referenceDate ?? toIsoDate(clock());

  const aggregator = new SignalAggregator({
    store: dependencies.store,
    cache: dependencies.signalCache,
    logger: scopedLogger(logger, "signals"),
    clock,
    cacheTtlMs: dependencies.cacheTtlMs,
    cacheEnabled: dependencies.cacheEnabled,
  });
  const degradation = new DegradationController(aggregator, scopedLogger(logger, "signals"));
  const assigner = new PersonaAssigner({
    degradation,
    assignments: dependencies.assignments,
    logger: scopedLogger(logger, "personas"),
    clock,
  });
  const consent = new ConsentManager(dependencies.store, scopedLogger(logger, "consent"), clock);
  const guardrails = new GuardrailsEnforcer({
    store: dependencies.store,
    consent,
    logger: scopedLogger(logger, "guardrails"),
  });

  return {
    today,
    computeSignals: (userId, windowType, options) => aggregator.computeSignals(userId, windowType, today(), options),
    getDataAvailability: (userId) => degradation.availability(userId, today()),
    getSignalsWithDegradation: (userId, options) => degradation.signalsWithDegradation(userId, today(), options),
    getPrimarySignals: (userId) => degradation.primarySignals(userId, today()),
    assignPersona: (userId) => assigner.assign(userId, today()),
    getCurrentPersona: (userId) => assigner.current(userId),
    getPersonaHistory: (userId, limit) => assigner.history(userId, limit),
    async enforceGuardrails(userId, candidates, signals) {
      const outcome = await guardrails.enforce(userId, candidates, signals);
      return outcome.items;
    },
    runGuardrails: (userId, candidates, signals) => guardrails.enforce(userId, candidates, signals),
    hasConsent: (userId) => consent.hasConsent(userId),
    getConsent: (userId) => consent.getConsent(userId),
    grantConsent: (userId) => consent.grant(userId),
    revokeConsent: (userId) => consent.revoke(userId),
  };
}
