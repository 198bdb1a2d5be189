/**
 * Combat - Encounter
 *
 * Pure operations on the encounter record: creation, decoding from storage,
 * turn progression, per-combatant HP for non-player combatants, and the
 * roster-wins reconciliation of player-character copies.
 */

import type { CombatantSnapshot, RosterCharacter } from "../types/entity";
import { isCharacterDefeated, isPlayerCharacter } from "../types/entity";
import type { CombatantView, Encounter, EncounterView } from "../types/state";
import { encounterSchema } from "../validation/persisted-schemas";
import {
  advanceTurn,
  buildTurnOrder,
  firstActiveIndex,
  getCurrentTurnId,
  reorderTurnOrder,
} from "./turn-manager";
import type { TurnOrderState } from "./turn-manager";

// ═══════════════════════════════════════════════════════════════════════════
// CREATION
// ═══════════════════════════════════════════════════════════════════════════

export function createEncounter(
  id: string,
  combatants: Record<string, CombatantSnapshot>,
  surprisedIds: string[]
): Encounter {
  const turnOrder = buildTurnOrder(combatants);
  return {
    id,
    isActive: true,
    roundNumber: 1,
    turnOrder,
    currentTurnIndex: firstActiveIndex(turnOrder, (cid) => combatants[cid]?.isDefeated ?? true),
    surprisedIds,
    version: 1,
    combatants,
  };
}

export function snapshotFromRoster(
  character: RosterCharacter,
  initiative: number,
  tiebreaker: number
): CombatantSnapshot {
  return {
    name: character.name,
    kind: character.kind,
    initiative,
    tiebreaker,
    currentHp: character.currentHp,
    maxHp: character.maxHp,
    armorClass: character.armorClass,
    isDefeated: isCharacterDefeated(character),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// DECODING & INVARIANTS
// ═══════════════════════════════════════════════════════════════════════════

export type DecodeResult =
  | { ok: true; encounter: Encounter }
  | { ok: false; reason: string };

/**
 * Structural invariants of an active encounter. Returns the first violation.
 */
export function findInvariantViolation(encounter: Encounter): string | null {
  if (!encounter.isActive) return "encounter is not active";
  if (encounter.turnOrder.length === 0) return "turn order is empty";
  if (encounter.currentTurnIndex >= encounter.turnOrder.length) {
    return `turn index ${encounter.currentTurnIndex} is outside a turn order of ${encounter.turnOrder.length}`;
  }
  const seen = new Set<string>();
  for (const id of encounter.turnOrder) {
    if (seen.has(id)) return `turn order lists ${id} twice`;
    seen.add(id);
    if (!encounter.combatants[id]) return `turn order references unknown combatant ${id}`;
  }
  return null;
}

export function decodeEncounter(raw: unknown): DecodeResult {
  const parsed = encounterSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: issue ? `${issue.path.join(".")}: ${issue.message}` : "malformed encounter" };
  }
  const violation = findInvariantViolation(parsed.data);
  if (violation) return { ok: false, reason: violation };
  return { ok: true, encounter: parsed.data };
}

// ═══════════════════════════════════════════════════════════════════════════
// TURN PROGRESSION
// ═══════════════════════════════════════════════════════════════════════════

function turnState(encounter: Encounter): TurnOrderState {
  return {
    order: encounter.turnOrder,
    currentIndex: encounter.currentTurnIndex,
    round: encounter.roundNumber,
  };
}

export function currentCombatantId(encounter: Encounter): string | null {
  return getCurrentTurnId(turnState(encounter));
}

export function advanceEncounterTurn(encounter: Encounter): {
  encounter: Encounter;
  newRoundStarted: boolean;
} {
  const { newState, newRoundStarted } = advanceTurn(
    turnState(encounter),
    (id) => encounter.combatants[id]?.isDefeated ?? true
  );

  return {
    encounter: {
      ...encounter,
      roundNumber: newState.round,
      currentTurnIndex: newState.currentIndex,
      // Surprise only covers the opening round
      surprisedIds: newState.round >= 2 ? [] : encounter.surprisedIds,
    },
    newRoundStarted,
  };
}

export function setCombatantInitiative(encounter: Encounter, combatantId: string, initiative: number): Encounter {
  const combatant = encounter.combatants[combatantId];
  if (!combatant) return encounter;
  const combatants = { ...encounter.combatants, [combatantId]: { ...combatant, initiative } };
  const reordered = reorderTurnOrder(turnState(encounter), combatants);
  return {
    ...encounter,
    combatants,
    turnOrder: reordered.order,
    currentTurnIndex: reordered.currentIndex,
  };
}

export function insertCombatant(
  encounter: Encounter,
  combatantId: string,
  combatant: CombatantSnapshot,
  surprised: boolean
): Encounter {
  const combatants = { ...encounter.combatants, [combatantId]: combatant };
  const reordered = reorderTurnOrder(
    { ...turnState(encounter), order: [...encounter.turnOrder, combatantId] },
    combatants
  );
  return {
    ...encounter,
    combatants,
    turnOrder: reordered.order,
    currentTurnIndex: reordered.currentIndex,
    surprisedIds: surprised ? [...encounter.surprisedIds, combatantId] : encounter.surprisedIds,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// COMBATANT UPDATES
// ═══════════════════════════════════════════════════════════════════════════

/** HP change for combatants that live only in the encounter. */
export function adjustSnapshotHp(snapshot: CombatantSnapshot, delta: number): CombatantSnapshot {
  const currentHp = Math.max(0, Math.min(snapshot.maxHp, snapshot.currentHp + delta));
  const adjusted: CombatantSnapshot = { ...snapshot, currentHp, isDefeated: currentHp === 0 };
  // Healing back above 0 lifts the DM's mark
  if (snapshot.markedDefeated && currentHp > 0) adjusted.markedDefeated = false;
  return adjusted;
}

/**
 * DM override. The combatant keeps its place in the turn order and is
 * skipped from now on. Encounter-only combatants drop to 0 HP; a PC's HP
 * stays whatever the roster says.
 */
export function markSnapshotDefeated(snapshot: CombatantSnapshot): CombatantSnapshot {
  return {
    ...snapshot,
    currentHp: isPlayerCharacter(snapshot) ? snapshot.currentHp : 0,
    isDefeated: true,
    markedDefeated: true,
  };
}

export function syncSnapshotWithRoster(snapshot: CombatantSnapshot, character: RosterCharacter): CombatantSnapshot {
  return {
    ...snapshot,
    currentHp: character.currentHp,
    maxHp: character.maxHp,
    isDefeated: snapshot.markedDefeated === true || isCharacterDefeated(character),
  };
}

export function replaceCombatant(encounter: Encounter, combatantId: string, snapshot: CombatantSnapshot): Encounter {
  return { ...encounter, combatants: { ...encounter.combatants, [combatantId]: snapshot } };
}

/**
 * Re-derive every player-character copy from the roster (roster wins).
 * Returns the same object when nothing drifted.
 */
export function reconcileWithRoster(encounter: Encounter, roster: RosterCharacter[]): Encounter {
  let result = encounter;
  for (const character of roster) {
    const snapshot = encounter.combatants[character.id];
    if (!snapshot || !isPlayerCharacter(snapshot)) continue;
    const synced = syncSnapshotWithRoster(snapshot, character);
    if (
      synced.currentHp !== snapshot.currentHp ||
      synced.maxHp !== snapshot.maxHp ||
      synced.isDefeated !== snapshot.isDefeated
    ) {
      result = replaceCombatant(result, character.id, synced);
    }
  }
  return result;
}

export function bumpVersion(encounter: Encounter): Encounter {
  return { ...encounter, version: encounter.version + 1 };
}

// ═══════════════════════════════════════════════════════════════════════════
// VIEWS
// ═══════════════════════════════════════════════════════════════════════════

export function toCombatantView(encounter: Encounter, combatantId: string): CombatantView | null {
  const combatant = encounter.combatants[combatantId];
  if (!combatant) return null;
  return { ...combatant, id: combatantId, isSurprised: encounter.surprisedIds.includes(combatantId) };
}

export function toEncounterView(encounter: Encounter): EncounterView {
  const turnOrder: CombatantView[] = [];
  for (const id of encounter.turnOrder) {
    const view = toCombatantView(encounter, id);
    if (view) turnOrder.push(view);
  }
  return {
    id: encounter.id,
    isActive: encounter.isActive,
    roundNumber: encounter.roundNumber,
    currentTurnIndex: encounter.currentTurnIndex,
    currentCombatantId: currentCombatantId(encounter),
    turnOrder,
    version: encounter.version,
  };
}
