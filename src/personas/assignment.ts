import { selectPrimarySignals, type DegradationController } from "../features/degradation";
import type { Logger } from "../logger";
import type { PersonaAssignmentStore } from "../storage/ports";
import { PERSONA_TABLE, findPersona } from "./catalog";
import { matchPersonas } from "./matcher";
import { selectPrimaryPersona } from "./prioritizer";
import { PersonaAssignmentSchema, type PersonaAssignment } from "./schemas";

export type { PersonaAssignment } from "./schemas";

export interface PersonaAssignerDependencies {
  degradation: DegradationController;
  assignments: PersonaAssignmentStore;
  logger: Logger;
  clock: () => Date;
}

export class PersonaAssigner {
  constructor(private readonly deps: PersonaAssignerDependencies) {}

  async assign(userId: string, today: string): Promise<PersonaAssignment> {
    const degraded = await this.deps.degradation.signalsWithDegradation(userId, today);
    const signals = selectPrimarySignals(degraded);

    const matched = matchPersonas(signals, PERSONA_TABLE);
    const { persona, trace } = selectPrimaryPersona(matched, signals, PERSONA_TABLE);
    const definition = findPersona(persona);

    const assignment = PersonaAssignmentSchema.parse({
      userId,
      persona,
      displayName: definition.displayName,
      priority: definition.priority,
      signalStrength: definition.strength(signals),
      dataAvailability: degraded.tier,
      windowType: signals.windowType,
      disclaimer: degraded.disclaimer,
      trace,
      assignedAt: this.deps.clock().toISOString(),
    } satisfies PersonaAssignment);

    await this.deps.assignments.record(assignment);

    this.deps.logger.info(
      `Assigned persona '${definition.displayName}' to user ${userId} ` +
        `(priority ${definition.priority}, strength ${assignment.signalStrength.toFixed(2)}, ${trace.tieBreak})`,
    );

    return assignment;
  }

  current(userId: string): Promise<PersonaAssignment | null> {
    return this.deps.assignments.current(userId);
  }

  history(userId: string, limit = 20): Promise<PersonaAssignment[]> {
    return this.deps.assignments.history(userId, limit);
  }
}
