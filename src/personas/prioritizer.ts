import type { SignalBundle } from "../types";
import { DEFAULT_PERSONA, PERSONA_TABLE, TIE_BREAK_ORDER, findPersona, type PersonaDefinition } from "./catalog";
import type { DecisionTrace, PersonaId } from "./schemas";

export interface PersonaSelection {
  persona: PersonaId;
  trace: DecisionTrace;
}

/**
 * Picks exactly one persona: lowest priority number first, then the highest
 * signal strength, then the fixed persona order. Deterministic for a given
 * (matched, signals) pair.
 */
export function selectPrimaryPersona(
  matched: readonly PersonaId[],
  signals: SignalBundle,
  table: readonly PersonaDefinition[] = PERSONA_TABLE,
): PersonaSelection {
  const matchedIds = [...new Set(matched)];

  if (!matchedIds.length) {
    return {
      persona: DEFAULT_PERSONA,
      trace: {
        matched: [],
        priorityGroup: null,
        strengths: {},
        tieBreak: "no_matches",
        selected: DEFAULT_PERSONA,
      },
    };
  }

  if (matchedIds.length === 1) {
    return {
      persona: matchedIds[0],
      trace: {
        matched: matchedIds,
        priorityGroup: null,
        strengths: {},
        tieBreak: "single_match",
        selected: matchedIds[0],
      },
    };
  }

  const definitions = matchedIds.map((id) => findPersona(id, table));
  const topPriority = Math.min(...definitions.map((definition) => definition.priority));
  const candidates = definitions.filter((definition) => definition.priority === topPriority);
  const priorityGroup = { priority: topPriority, candidates: candidates.map((candidate) => candidate.id) };

  if (candidates.length === 1) {
    return {
      persona: candidates[0].id,
      trace: {
        matched: matchedIds,
        priorityGroup,
        strengths: {},
        tieBreak: "priority",
        selected: candidates[0].id,
      },
    };
  }

  const strengths: Partial<Record<PersonaId, number>> = {};
  for (const candidate of candidates) {
    strengths[candidate.id] = candidate.strength(signals);
  }
  const maxStrength = Math.max(...candidates.map((candidate) => strengths[candidate.id] ?? 0));
  const strongest = candidates.filter((candidate) => strengths[candidate.id] === maxStrength);

  if (strongest.length === 1) {
    return {
      persona: strongest[0].id,
      trace: {
        matched: matchedIds,
        priorityGroup,
        strengths,
        tieBreak: "signal_strength",
        selected: strongest[0].id,
      },
    };
  }

  const strongestIds = new Set(strongest.map((candidate) => candidate.id));
  const selected = TIE_BREAK_ORDER.find((id) => strongestIds.has(id)) ?? strongest[0].id;
  return {
    persona: selected,
    trace: {
      matched: matchedIds,
      priorityGroup,
      strengths,
      tieBreak: "defined_order",
      selected,
    },
  };
}
