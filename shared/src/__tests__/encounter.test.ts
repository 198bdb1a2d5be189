import { describe, expect, it } from "vitest";
import type { CombatantSnapshot, Encounter, RosterCharacter } from "../combat";
import {
  adjustSnapshotHp,
  advanceEncounterTurn,
  createEncounter,
  decodeEncounter,
  insertCombatant,
  markSnapshotDefeated,
  reconcileWithRoster,
  rosterSchema,
  setCombatantInitiative,
  snapshotFromRoster,
  toEncounterView,
} from "../combat";

function snapshot(overrides: Partial<CombatantSnapshot> = {}): CombatantSnapshot {
  return {
    name: "Goblin",
    kind: "Enemy",
    initiative: 10,
    tiebreaker: 0,
    currentHp: 7,
    maxHp: 7,
    armorClass: 15,
    isDefeated: false,
    ...overrides,
  };
}

function character(overrides: Partial<RosterCharacter> = {}): RosterCharacter {
  return {
    id: "pc-thorin",
    name: "Thorin",
    kind: "PC",
    maxHp: 12,
    currentHp: 12,
    tempHp: 0,
    armorClass: 16,
    conditions: [],
    deathSaveSuccesses: 0,
    deathSaveFailures: 0,
    controllingPlayerId: "user-1",
    ...overrides,
  };
}

function thorinAndGoblin(): Encounter {
  return createEncounter(
    "enc-1",
    {
      "pc-thorin": snapshotFromRoster(character(), 15, 1),
      goblin: snapshot({ initiative: 16 }),
    },
    []
  );
}

describe("createEncounter", () => {
  it("starts round 1 on the highest initiative", () => {
    const encounter = thorinAndGoblin();
    expect(encounter.turnOrder).toEqual(["goblin", "pc-thorin"]);
    expect(encounter.currentTurnIndex).toBe(0);
    expect(encounter.roundNumber).toBe(1);
    expect(encounter.version).toBe(1);
    expect(encounter.isActive).toBe(true);
  });

  it("starts on the first combatant who is not already down", () => {
    const encounter = createEncounter(
      "enc-2",
      {
        fast: snapshot({ name: "Fast", initiative: 20, currentHp: 0, isDefeated: true }),
        slow: snapshot({ name: "Slow", initiative: 5 }),
      },
      []
    );
    expect(encounter.currentTurnIndex).toBe(1);
  });
});

describe("decodeEncounter", () => {
  it("accepts a stored encounter and fills defaults", () => {
    const { surprisedIds: _s, version: _v, ...stored } = thorinAndGoblin();
    const decoded = decodeEncounter(JSON.parse(JSON.stringify(stored)));
    expect(decoded.ok).toBe(true);
    if (decoded.ok) {
      expect(decoded.encounter.surprisedIds).toEqual([]);
      expect(decoded.encounter.version).toBe(0);
    }
  });

  it("rejects an index outside the turn order", () => {
    const decoded = decodeEncounter({ ...thorinAndGoblin(), currentTurnIndex: 2 });
    expect(decoded).toEqual({ ok: false, reason: "turn index 2 is outside a turn order of 2" });
  });

  it("rejects references to unknown combatants", () => {
    const decoded = decodeEncounter({ ...thorinAndGoblin(), turnOrder: ["goblin", "ghost"] });
    expect(decoded).toEqual({ ok: false, reason: "turn order references unknown combatant ghost" });
  });

  it("rejects duplicate ids", () => {
    const decoded = decodeEncounter({ ...thorinAndGoblin(), turnOrder: ["goblin", "goblin"] });
    expect(decoded).toEqual({ ok: false, reason: "turn order lists goblin twice" });
  });

  it("rejects an empty turn order", () => {
    const decoded = decodeEncounter({ ...thorinAndGoblin(), turnOrder: [], currentTurnIndex: 0 });
    expect(decoded).toEqual({ ok: false, reason: "turn order is empty" });
  });

  it("rejects a combatant with more HP than its maximum", () => {
    const base = thorinAndGoblin();
    const decoded = decodeEncounter({
      ...base,
      combatants: { ...base.combatants, goblin: snapshot({ initiative: 16, currentHp: 50 }) },
    });
    expect(decoded).toEqual({ ok: false, reason: "combatants.goblin.currentHp: currentHp 50 exceeds maxHp 7" });
  });

  it("keeps the DM's defeated mark", () => {
    const base = thorinAndGoblin();
    const decoded = decodeEncounter({
      ...base,
      combatants: { ...base.combatants, goblin: snapshot({ initiative: 16, isDefeated: true, markedDefeated: true }) },
    });
    expect(decoded.ok && decoded.encounter.combatants.goblin.markedDefeated).toBe(true);
  });

  it("reports the first schema issue for malformed data", () => {
    const decoded = decodeEncounter({ ...thorinAndGoblin(), roundNumber: "two" });
    expect(decoded.ok).toBe(false);
    if (!decoded.ok) {
      expect(decoded.reason).toMatch(/^roundNumber: /);
    }
  });
});

describe("rosterSchema", () => {
  it("accepts a healthy roster and fills defaults", () => {
    const { tempHp: _t, conditions: _c, ...stored } = character();
    const parsed = rosterSchema.safeParse([stored]);
    expect(parsed.success && parsed.data).toEqual([character()]);
  });

  it("accepts a dying character with counters running", () => {
    const dying = character({ currentHp: 0, conditions: ["Unconscious"], deathSaveSuccesses: 1, deathSaveFailures: 2 });
    expect(rosterSchema.safeParse([dying]).success).toBe(true);
  });

  it("rejects more HP than the maximum", () => {
    const parsed = rosterSchema.safeParse([character({ currentHp: 20 })]);
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues.map((issue) => [issue.path, issue.message])).toEqual([
        [[0, "currentHp"], "currentHp 20 exceeds maxHp 12"],
      ]);
    }
  });

  it("rejects death save counters on a conscious character", () => {
    const parsed = rosterSchema.safeParse([character({ currentHp: 5, deathSaveFailures: 2 })]);
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues.map((issue) => [issue.path, issue.message])).toEqual([
        [[0, "deathSaveSuccesses"], "death save counters must be 0 while currentHp is above 0"],
      ]);
    }
  });
});

describe("advanceEncounterTurn", () => {
  it("skips a defeated combatant", () => {
    const base = thorinAndGoblin();
    const encounter: Encounter = {
      ...base,
      combatants: { ...base.combatants, goblin: snapshot({ initiative: 16, currentHp: 0, isDefeated: true }) },
    };
    const { encounter: next, newRoundStarted } = advanceEncounterTurn(encounter);
    expect(next.currentTurnIndex).toBe(1);
    expect(next.roundNumber).toBe(1);
    expect(newRoundStarted).toBe(false);
  });

  it("clears surprise once round 2 begins", () => {
    const encounter: Encounter = { ...thorinAndGoblin(), currentTurnIndex: 1, surprisedIds: ["goblin"] };
    const { encounter: next, newRoundStarted } = advanceEncounterTurn(encounter);
    expect(newRoundStarted).toBe(true);
    expect(next.roundNumber).toBe(2);
    expect(next.surprisedIds).toEqual([]);
  });

  it("keeps surprise during round 1", () => {
    const encounter: Encounter = { ...thorinAndGoblin(), surprisedIds: ["pc-thorin"] };
    expect(advanceEncounterTurn(encounter).encounter.surprisedIds).toEqual(["pc-thorin"]);
  });
});

describe("setCombatantInitiative", () => {
  it("re-sorts and keeps the current turn", () => {
    const encounter = setCombatantInitiative(thorinAndGoblin(), "pc-thorin", 18);
    expect(encounter.turnOrder).toEqual(["pc-thorin", "goblin"]);
    expect(encounter.currentTurnIndex).toBe(1);
    expect(encounter.combatants["pc-thorin"].initiative).toBe(18);
  });
});

describe("insertCombatant", () => {
  it("slots a newcomer by initiative", () => {
    const encounter = insertCombatant(thorinAndGoblin(), "wolf", snapshot({ name: "Wolf", initiative: 15 }), true);
    // Thorin and Wolf tie on 15; Thorin's tiebreaker is higher
    expect(encounter.turnOrder).toEqual(["goblin", "pc-thorin", "wolf"]);
    expect(encounter.currentTurnIndex).toBe(0);
    expect(encounter.surprisedIds).toEqual(["wolf"]);
  });
});

describe("adjustSnapshotHp", () => {
  it("clamps at zero and marks the combatant defeated", () => {
    expect(adjustSnapshotHp(snapshot(), -9)).toEqual(snapshot({ currentHp: 0, isDefeated: true }));
  });

  it("clamps at max HP", () => {
    expect(adjustSnapshotHp(snapshot({ currentHp: 3 }), 10).currentHp).toBe(7);
  });
});

describe("markSnapshotDefeated", () => {
  it("drops an enemy to 0 HP and marks it", () => {
    expect(markSnapshotDefeated(snapshot())).toEqual(
      snapshot({ currentHp: 0, isDefeated: true, markedDefeated: true })
    );
  });

  it("leaves a player character's HP alone", () => {
    const marked = markSnapshotDefeated(snapshotFromRoster(character({ currentHp: 5 }), 15, 0));
    expect([marked.currentHp, marked.isDefeated, marked.markedDefeated]).toEqual([5, true, true]);
  });

  it("is lifted when an enemy is healed back up", () => {
    const healed = adjustSnapshotHp(markSnapshotDefeated(snapshot()), 3);
    expect([healed.currentHp, healed.isDefeated, healed.markedDefeated]).toEqual([3, false, false]);
  });
});

describe("reconcileWithRoster", () => {
  it("keeps a marked player character out of the rotation", () => {
    const base = thorinAndGoblin();
    const encounter: Encounter = {
      ...base,
      combatants: { ...base.combatants, "pc-thorin": markSnapshotDefeated(base.combatants["pc-thorin"]) },
    };
    const reconciled = reconcileWithRoster(encounter, [character({ currentHp: 9 })]);
    expect(reconciled.combatants["pc-thorin"].currentHp).toBe(9);
    expect(reconciled.combatants["pc-thorin"].isDefeated).toBe(true);
  });

  it("copies the roster's HP over a drifted PC snapshot", () => {
    const encounter = thorinAndGoblin();
    const reconciled = reconcileWithRoster(encounter, [character({ currentHp: 4 })]);
    expect(reconciled.combatants["pc-thorin"].currentHp).toBe(4);
    expect(reconciled.combatants.goblin).toBe(encounter.combatants.goblin);
  });

  it("returns the same object when nothing drifted", () => {
    const encounter = thorinAndGoblin();
    expect(reconcileWithRoster(encounter, [character()])).toBe(encounter);
  });
});

describe("toEncounterView", () => {
  it("lists combatants in acting order with their ids", () => {
    const view = toEncounterView({ ...thorinAndGoblin(), surprisedIds: ["goblin"] });
    expect(view.currentCombatantId).toBe("goblin");
    expect(view.turnOrder.map((c) => [c.id, c.isSurprised])).toEqual([
      ["goblin", true],
      ["pc-thorin", false],
    ]);
  });
});
