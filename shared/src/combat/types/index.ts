/**
 * Combat - Type Exports
 *
 * Re-exports all combat types for convenient importing.
 */

// Roster characters and combatant snapshots
export * from "./entity";

// Encounter record, views and setup inputs
export * from "./state";

// WebSocket events and audiences
export * from "./events";

// Typed failures
export * from "./errors";
