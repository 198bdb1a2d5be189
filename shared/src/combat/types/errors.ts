/**
 * Combat - Typed failures
 *
 * Engine operations never throw at callers; they resolve to a CombatResult.
 */

export type CombatErrorCode =
  // Validation: nothing was written
  | "AlreadyActive"
  | "NoActiveCombat"
  | "UnknownCombatant"
  | "InvalidAmount"
  | "InvalidState"
  | "InvalidCommand"
  // Cooperative cancellation before the first write
  | "Cancelled"
  // Storage
  | "StorageUnavailable"
  | "PartialUpdate"
  // Persisted encounter failed its invariants and was force-ended
  | "CorruptEncounter";

const RETRYABLE: ReadonlySet<CombatErrorCode> = new Set<CombatErrorCode>([
  "Cancelled",
  "StorageUnavailable",
  "PartialUpdate",
]);

export interface CombatFailure {
  ok: false;
  code: CombatErrorCode;
  message: string;
  retryable: boolean;
  /** Which write had already landed, for PartialUpdate */
  committed?: "roster";
}

export interface CombatSuccess<T> {
  ok: true;
  value: T;
}

export type CombatResult<T> = CombatSuccess<T> | CombatFailure;

export function success<T>(value: T): CombatSuccess<T> {
  return { ok: true, value };
}

export function failure(code: CombatErrorCode, message: string): CombatFailure {
  return { ok: false, code, message, retryable: RETRYABLE.has(code) };
}
