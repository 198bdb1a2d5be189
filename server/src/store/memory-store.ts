import type { Encounter, RosterCharacter } from "@shared/combat";
import type { EncounterStore, RosterStore } from "./types";

interface CampaignRecord {
  roster: Map<string, RosterCharacter>;
  encounter: unknown;
}

/**
 * In-process campaign storage. Values are cloned on the way in and out so
 * callers never share references with what is "persisted".
 */
export class MemoryCampaignStore implements RosterStore, EncounterStore {
  private campaigns = new Map<string, CampaignRecord>();

  private record(campaignId: string): CampaignRecord {
    let record = this.campaigns.get(campaignId);
    if (!record) {
      record = { roster: new Map(), encounter: null };
      this.campaigns.set(campaignId, record);
    }
    return record;
  }

  seed(campaignId: string, characters: RosterCharacter[]): void {
    const record = this.record(campaignId);
    for (const character of characters) {
      record.roster.set(character.id, structuredClone(character));
    }
  }

  /** Writes raw JSON as-is, bypassing encoding. */
  putRawEncounter(campaignId: string, raw: unknown): void {
    this.record(campaignId).encounter = structuredClone(raw);
  }

  async listCharacters(campaignId: string): Promise<RosterCharacter[]> {
    const record = this.campaigns.get(campaignId);
    if (!record) return [];
    return [...record.roster.values()].map((character) => structuredClone(character));
  }

  async getCharacter(campaignId: string, characterId: string): Promise<RosterCharacter | null> {
    const character = this.campaigns.get(campaignId)?.roster.get(characterId);
    return character ? structuredClone(character) : null;
  }

  async saveCharacter(campaignId: string, character: RosterCharacter): Promise<void> {
    const record = this.campaigns.get(campaignId);
    if (!record?.roster.has(character.id)) {
      throw new Error(`Character ${character.id} is not on the roster of campaign ${campaignId}`);
    }
    record.roster.set(character.id, structuredClone(character));
  }

  async loadEncounter(campaignId: string): Promise<unknown> {
    const raw = this.campaigns.get(campaignId)?.encounter ?? null;
    return raw === null ? null : structuredClone(raw);
  }

  async saveEncounter(campaignId: string, encounter: Encounter): Promise<void> {
    this.record(campaignId).encounter = structuredClone(encounter);
  }

  async clearEncounter(campaignId: string): Promise<void> {
    const record = this.campaigns.get(campaignId);
    if (record) record.encounter = null;
  }
}
