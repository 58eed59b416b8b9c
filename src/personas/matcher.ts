import type { SignalBundle } from "../types";
import { PERSONA_TABLE, type PersonaDefinition } from "./catalog";
import type { PersonaId } from "./schemas";

/** Every persona whose rule holds, in table order. Order is not priority. */
export function matchPersonas(
  signals: SignalBundle,
  table: readonly PersonaDefinition[] = PERSONA_TABLE,
): PersonaId[] {
  return table.filter((persona) => persona.matches(signals)).map((persona) => persona.id);
}
