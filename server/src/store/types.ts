import type { Encounter, RosterCharacter } from "@shared/combat";

/**
 * Authoritative character roster for a campaign. Survives encounters.
 */
export interface RosterStore {
  listCharacters(campaignId: string): Promise<RosterCharacter[]>;
  getCharacter(campaignId: string, characterId: string): Promise<RosterCharacter | null>;
  /** Replaces an existing roster entry; throws when it does not exist. */
  saveCharacter(campaignId: string, character: RosterCharacter): Promise<void>;
}

/**
 * Ephemeral encounter snapshot for a campaign. At most one per campaign.
 */
export interface EncounterStore {
  /** Raw stored JSON, or null when no encounter exists. Decoding is the caller's job. */
  loadEncounter(campaignId: string): Promise<unknown>;
  saveEncounter(campaignId: string, encounter: Encounter): Promise<void>;
  clearEncounter(campaignId: string): Promise<void>;
}
