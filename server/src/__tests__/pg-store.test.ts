import { describe, expect, it } from "vitest";
import type { Encounter } from "@shared/combat";
import type { Queryable } from "../store/pg-store";
import { PgCampaignStore } from "../store/pg-store";
import { makeCharacter } from "../test-utils/fixtures";

type QueryResult = { rows: unknown[]; rowCount: number | null };

/** Scripted stand-in for a pg pool: answers queries in order. */
class FakeDb implements Queryable {
  calls: Array<{ text: string; values?: unknown[] }> = [];

  constructor(private readonly results: QueryResult[] = []) {}

  async query(text: string, values?: unknown[]): Promise<QueryResult> {
    this.calls.push({ text, values });
    return this.results.shift() ?? { rows: [], rowCount: 0 };
  }
}

const ENCOUNTER: Encounter = {
  id: "enc-1",
  isActive: true,
  roundNumber: 1,
  turnOrder: ["goblin"],
  currentTurnIndex: 0,
  surprisedIds: [],
  version: 1,
  combatants: {
    goblin: {
      name: "Goblin",
      kind: "Enemy",
      initiative: 16,
      tiebreaker: 0,
      currentHp: 7,
      maxHp: 7,
      armorClass: 15,
      isDefeated: false,
    },
  },
};

describe("PgCampaignStore", () => {
  it("creates the campaigns table", async () => {
    const db = new FakeDb();
    await new PgCampaignStore(db).ensureSchema();
    expect(db.calls[0].text).toContain("CREATE TABLE IF NOT EXISTS campaigns");
  });

  it("reads the roster from party_state and fills defaults", async () => {
    const { tempHp: _t, conditions: _c, ...stored } = makeCharacter();
    const db = new FakeDb([{ rows: [{ party_state: [stored] }], rowCount: 1 }]);

    const roster = await new PgCampaignStore(db).listCharacters("camp-1");
    expect(roster).toEqual([makeCharacter()]);
    expect(db.calls[0].values).toEqual(["camp-1"]);
  });

  it("returns an empty roster for an unknown campaign", async () => {
    expect(await new PgCampaignStore(new FakeDb()).listCharacters("nowhere")).toEqual([]);
  });

  it("throws on a malformed roster", async () => {
    const db = new FakeDb([{ rows: [{ party_state: [{ id: "pc-1" }] }], rowCount: 1 }]);
    await expect(new PgCampaignStore(db).listCharacters("camp-1")).rejects.toThrow(
      /^Stored roster for campaign camp-1 is malformed/
    );
  });

  it("finds one character", async () => {
    const db = new FakeDb([{ rows: [{ party_state: [makeCharacter()] }], rowCount: 1 }]);
    expect((await new PgCampaignStore(db).getCharacter("camp-1", "pc-thorin"))?.name).toBe("Thorin");
  });

  it("updates a character in place", async () => {
    const db = new FakeDb([{ rows: [], rowCount: 1 }]);
    const character = makeCharacter({ currentHp: 3 });

    await new PgCampaignStore(db).saveCharacter("camp-1", character);
    expect(db.calls[0].values).toEqual(["camp-1", "pc-thorin", JSON.stringify(character)]);
  });

  it("throws when the character is not on the roster", async () => {
    const db = new FakeDb([{ rows: [], rowCount: 0 }]);
    await expect(new PgCampaignStore(db).saveCharacter("camp-1", makeCharacter())).rejects.toThrow(
      "Character pc-thorin is not on the roster of campaign camp-1"
    );
  });

  it("loads the raw encounter, or null when there is none", async () => {
    const db = new FakeDb([
      { rows: [{ active_combat: ENCOUNTER }], rowCount: 1 },
      { rows: [{ active_combat: null }], rowCount: 1 },
      { rows: [], rowCount: 0 },
    ]);
    const store = new PgCampaignStore(db);
    expect(await store.loadEncounter("camp-1")).toEqual(ENCOUNTER);
    expect(await store.loadEncounter("camp-1")).toBeNull();
    expect(await store.loadEncounter("nowhere")).toBeNull();
  });

  it("saves the encounter as JSON", async () => {
    const db = new FakeDb([{ rows: [], rowCount: 1 }]);
    await new PgCampaignStore(db).saveEncounter("camp-1", ENCOUNTER);
    expect(db.calls[0].values).toEqual(["camp-1", JSON.stringify(ENCOUNTER)]);
  });

  it("throws when saving to a missing campaign", async () => {
    const db = new FakeDb([{ rows: [], rowCount: 0 }]);
    await expect(new PgCampaignStore(db).saveEncounter("nowhere", ENCOUNTER)).rejects.toThrow(
      "Campaign nowhere does not exist"
    );
  });

  it("clears the encounter column", async () => {
    const db = new FakeDb();
    await new PgCampaignStore(db).clearEncounter("camp-1");
    expect(db.calls[0].text).toContain("active_combat = NULL");
  });
});
