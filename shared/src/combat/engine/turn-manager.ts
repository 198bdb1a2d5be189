/**
 * Combat - Turn Manager
 *
 * Handles initiative, turn order, and round progression.
 * Defeated combatants keep their slot in the order and are skipped.
 */

import type { CombatantSnapshot } from "../types/entity";

// ═══════════════════════════════════════════════════════════════════════════
// INITIATIVE SYSTEM
// ═══════════════════════════════════════════════════════════════════════════

export type D20Roller = () => number;

export const rollD20: D20Roller = () => Math.floor(Math.random() * 20) + 1;

export interface InitiativeEntry {
  combatantId: string;
  name: string;
  initiative: number;
  tiebreaker: number;
}

/**
 * Roll initiative unless a value was already supplied.
 */
export function resolveInitiative(
  supplied: number | undefined,
  modifier: number | undefined,
  roll: D20Roller
): number {
  if (supplied !== undefined) return supplied;
  return roll() + (modifier ?? 0);
}

/**
 * Total order: initiative desc, tiebreaker desc, name asc, id asc.
 */
export function compareInitiative(a: InitiativeEntry, b: InitiativeEntry): number {
  if (b.initiative !== a.initiative) {
    return b.initiative - a.initiative;
  }
  if (b.tiebreaker !== a.tiebreaker) {
    return b.tiebreaker - a.tiebreaker;
  }
  // Code-unit comparison so the order never depends on locale
  if (a.name !== b.name) {
    return a.name < b.name ? -1 : 1;
  }
  if (a.combatantId === b.combatantId) return 0;
  return a.combatantId < b.combatantId ? -1 : 1;
}

/**
 * Sort initiative entries by total (descending), then tiebreaker.
 */
export function sortInitiative(entries: InitiativeEntry[]): InitiativeEntry[] {
  return [...entries].sort(compareInitiative);
}

export function toInitiativeEntry(combatantId: string, combatant: CombatantSnapshot): InitiativeEntry {
  return {
    combatantId,
    name: combatant.name,
    initiative: combatant.initiative,
    tiebreaker: combatant.tiebreaker,
  };
}

/**
 * Acting order for a set of combatants.
 */
export function buildTurnOrder(combatants: Record<string, CombatantSnapshot>): string[] {
  const entries = Object.entries(combatants).map(([id, combatant]) => toInitiativeEntry(id, combatant));
  return sortInitiative(entries).map((entry) => entry.combatantId);
}

// ═══════════════════════════════════════════════════════════════════════════
// TURN ORDER MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════

export interface TurnOrderState {
  /** Combatant ids in acting order */
  order: string[];
  /** Index of current turn in order array */
  currentIndex: number;
  /** Current round number (1-indexed) */
  round: number;
}

export type DefeatedCheck = (combatantId: string) => boolean;

/**
 * Get the combatant whose turn it is.
 */
export function getCurrentTurnId(state: TurnOrderState): string | null {
  if (state.order.length === 0) return null;
  return state.order[state.currentIndex] ?? null;
}

/**
 * First index that is not defeated, or 0 when everyone is.
 */
export function firstActiveIndex(order: string[], isDefeated: DefeatedCheck): number {
  const index = order.findIndex((id) => !isDefeated(id));
  return index === -1 ? 0 : index;
}

/**
 * Advance to the next non-defeated combatant, handling round wrap.
 * Passing the end of the order starts exactly one new round.
 * When everyone is defeated the index moves by one position.
 */
export function advanceTurn(
  state: TurnOrderState,
  isDefeated: DefeatedCheck
): {
  newState: TurnOrderState;
  newRoundStarted: boolean;
} {
  const length = state.order.length;
  if (length === 0) {
    return { newState: state, newRoundStarted: false };
  }

  let steps = 1;
  for (let candidate = 1; candidate <= length; candidate++) {
    const id = state.order[(state.currentIndex + candidate) % length];
    if (id !== undefined && !isDefeated(id)) {
      steps = candidate;
      break;
    }
  }

  const rawIndex = state.currentIndex + steps;
  const newRoundStarted = rawIndex >= length;

  return {
    newState: {
      order: state.order,
      currentIndex: rawIndex % length,
      round: newRoundStarted ? state.round + 1 : state.round,
    },
    newRoundStarted,
  };
}

/**
 * Re-sort the order after an initiative change or an insertion, keeping the
 * turn with whoever held it.
 */
export function reorderTurnOrder(
  state: TurnOrderState,
  combatants: Record<string, CombatantSnapshot>
): TurnOrderState {
  const currentId = getCurrentTurnId(state);
  const entries: InitiativeEntry[] = [];
  for (const id of state.order) {
    const combatant = combatants[id];
    if (combatant) entries.push(toInitiativeEntry(id, combatant));
  }
  const order = sortInitiative(entries).map((entry) => entry.combatantId);
  const currentIndex = currentId === null ? 0 : order.indexOf(currentId);

  return {
    ...state,
    order,
    currentIndex: Math.max(0, currentIndex),
  };
}
