/**
 * Combat - Validation Module Exports
 */

export {
  // Command parsing
  parseCombatCommand,
  isCombatCommandName,
  camelizeKeys,
  toCamelKey,
  type CombatCommand,
  type CombatCommandName,
} from "./command-schemas";

export {
  // Persisted shapes
  combatantSnapshotSchema,
  encounterSchema,
  rosterCharacterSchema,
  rosterSchema,
} from "./persisted-schemas";

export {
  // WebSocket envelopes
  clientMessageSchema,
  connectionParamsSchema,
  submitChoiceSchema,
  type ConnectionParams,
} from "./client-message";
