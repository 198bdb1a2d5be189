import type { Pool } from "pg";
import { z } from "zod";
import type { Encounter, RosterCharacter } from "@shared/combat";
import { rosterSchema } from "@shared/combat";
import type { EncounterStore, RosterStore } from "./types";

/** The slice of a pg Pool/Client this store uses. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export function queryableFromPool(pool: Pool): Queryable {
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
  };
}

const partyRowSchema = z.object({ party_state: rosterSchema });
const combatRowSchema = z.object({ active_combat: z.unknown() });

/**
 * Roster and encounter live side by side on the campaign row as two JSONB
 * columns; they are still written by two separate statements.
 */
export class PgCampaignStore implements RosterStore, EncounterStore {
  constructor(private readonly db: Queryable) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS campaigns (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL DEFAULT '',
        party_state JSONB NOT NULL DEFAULT '[]'::jsonb,
        active_combat JSONB,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );
    `);
  }

  async listCharacters(campaignId: string): Promise<RosterCharacter[]> {
    const result = await this.db.query(`SELECT party_state FROM campaigns WHERE id = $1`, [campaignId]);
    const row = result.rows[0];
    if (row === undefined) return [];
    const parsed = partyRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Stored roster for campaign ${campaignId} is malformed: ${parsed.error.message}`);
    }
    return parsed.data.party_state;
  }

  async getCharacter(campaignId: string, characterId: string): Promise<RosterCharacter | null> {
    const roster = await this.listCharacters(campaignId);
    return roster.find((character) => character.id === characterId) ?? null;
  }

  async saveCharacter(campaignId: string, character: RosterCharacter): Promise<void> {
    const result = await this.db.query(
      `
      UPDATE campaigns
      SET party_state = (
            SELECT jsonb_agg(CASE WHEN entry.elem->>'id' = $2 THEN $3::jsonb ELSE entry.elem END ORDER BY entry.ord)
            FROM jsonb_array_elements(party_state) WITH ORDINALITY AS entry(elem, ord)
          ),
          updated_at = now()
      WHERE id = $1
        AND party_state @> jsonb_build_array(jsonb_build_object('id', $2::text))
    `,
      [campaignId, character.id, JSON.stringify(character)]
    );
    if (!result.rowCount) {
      throw new Error(`Character ${character.id} is not on the roster of campaign ${campaignId}`);
    }
  }

  async loadEncounter(campaignId: string): Promise<unknown> {
    const result = await this.db.query(`SELECT active_combat FROM campaigns WHERE id = $1`, [campaignId]);
    const parsed = combatRowSchema.safeParse(result.rows[0]);
    if (!parsed.success) return null;
    return parsed.data.active_combat ?? null;
  }

  async saveEncounter(campaignId: string, encounter: Encounter): Promise<void> {
    const result = await this.db.query(
      `UPDATE campaigns SET active_combat = $2::jsonb, updated_at = now() WHERE id = $1`,
      [campaignId, JSON.stringify(encounter)]
    );
    if (!result.rowCount) {
      throw new Error(`Campaign ${campaignId} does not exist`);
    }
  }

  async clearEncounter(campaignId: string): Promise<void> {
    await this.db.query(`UPDATE campaigns SET active_combat = NULL, updated_at = now() WHERE id = $1`, [
      campaignId,
    ]);
  }
}
