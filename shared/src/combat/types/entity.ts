/**
 * Combat - Participant Types
 *
 * Roster characters (authoritative, long-lived) and the combatant snapshots
 * an encounter keeps for every participant.
 */

// ═══════════════════════════════════════════════════════════════════════════
// KINDS & CONDITIONS
// ═══════════════════════════════════════════════════════════════════════════

export const COMBATANT_KINDS = ["PC", "NPC", "Enemy"] as const;

export type CombatantKind = (typeof COMBATANT_KINDS)[number];

/** Conditions owned by the vitals reducer. Any other string is free-form. */
export const CONDITION = {
  UNCONSCIOUS: "Unconscious",
  STABLE: "Stable",
  DEAD: "Dead",
} as const;

export const MAX_DEATH_SAVES = 3;

// ═══════════════════════════════════════════════════════════════════════════
// ROSTER CHARACTER (authoritative)
// ═══════════════════════════════════════════════════════════════════════════

export interface RosterCharacter {
  id: string;
  name: string;
  kind: CombatantKind;
  maxHp: number;
  currentHp: number;
  tempHp: number;
  armorClass: number;
  /** Set semantics, insertion order */
  conditions: string[];
  deathSaveSuccesses: number;
  deathSaveFailures: number;
  controllingPlayerId: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMBATANT SNAPSHOT (encounter copy)
// ═══════════════════════════════════════════════════════════════════════════

export interface CombatantSnapshot {
  name: string;
  kind: CombatantKind;
  initiative: number;
  /** Secondary-ability modifier used to break initiative ties */
  tiebreaker: number;
  currentHp: number;
  maxHp: number;
  armorClass: number;
  isDefeated: boolean;
  /** Taken out of the rotation by the DM; outlasts roster reconciliation */
  markedDefeated?: boolean;
}

export function hasCondition(character: Pick<RosterCharacter, "conditions">, condition: string): boolean {
  return character.conditions.includes(condition);
}

export function isPlayerCharacter(character: { kind: CombatantKind }): boolean {
  return character.kind === "PC";
}

/**
 * A PC stays in the rotation while dying (they still roll death saves);
 * only death takes them out. Everyone else is out at 0 HP.
 */
export function isCharacterDefeated(character: Pick<RosterCharacter, "kind" | "currentHp" | "conditions">): boolean {
  if (hasCondition(character, CONDITION.DEAD)) return true;
  return !isPlayerCharacter(character) && character.currentHp === 0;
}
