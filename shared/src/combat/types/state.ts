/**
 * Combat - Encounter State Types
 *
 * The persisted encounter record and the read views handed to clients.
 */

import type { CombatantSnapshot, RosterCharacter } from "./entity";

// ═══════════════════════════════════════════════════════════════════════════
// ENCOUNTER (persisted)
// ═══════════════════════════════════════════════════════════════════════════

export interface Encounter {
  id: string;
  isActive: boolean;
  /** 1-indexed */
  roundNumber: number;
  /** Combatant ids in acting order; defeated entries stay and are skipped */
  turnOrder: string[];
  currentTurnIndex: number;
  /** Cleared when round 2 begins */
  surprisedIds: string[];
  /** Bumped on every committed mutation */
  version: number;
  combatants: Record<string, CombatantSnapshot>;
}

// ═══════════════════════════════════════════════════════════════════════════
// VIEWS
// ═══════════════════════════════════════════════════════════════════════════

export interface CombatantView extends CombatantSnapshot {
  id: string;
  isSurprised: boolean;
}

export interface EncounterView {
  id: string;
  isActive: boolean;
  roundNumber: number;
  currentTurnIndex: number;
  currentCombatantId: string | null;
  turnOrder: CombatantView[];
  version: number;
}

/** What a (re)connecting client pulls to resynchronize. */
export interface CampaignSnapshot {
  campaignId: string;
  encounter: EncounterView | null;
  roster: RosterCharacter[];
}

// ═══════════════════════════════════════════════════════════════════════════
// SETUP INPUTS
// ═══════════════════════════════════════════════════════════════════════════

export interface PartyInitiative {
  characterId: string;
  /** Rolled as d20 + initiativeModifier when omitted */
  initiative?: number;
  initiativeModifier?: number;
  tiebreaker?: number;
  surprised?: boolean;
}

export interface CombatantSetup {
  id?: string;
  name: string;
  kind?: "NPC" | "Enemy";
  maxHp: number;
  currentHp?: number;
  armorClass: number;
  initiative?: number;
  initiativeModifier?: number;
  tiebreaker?: number;
  surprised?: boolean;
}

/** A roster character joining an encounter that is already running. */
export interface PartyMemberSetup extends PartyInitiative {
  kind: "PC";
}

export type NewCombatant = CombatantSetup | PartyMemberSetup;

export interface StartCombatInput {
  partyInitiatives: PartyInitiative[];
  enemies: CombatantSetup[];
}
