import { describe, expect, it } from "vitest";
import type { VitalState } from "../combat";
import { applyVitalEvent, isDying } from "../combat";

function vitals(overrides: Partial<VitalState> = {}): VitalState {
  return {
    currentHp: 10,
    maxHp: 10,
    tempHp: 0,
    conditions: [],
    deathSaveSuccesses: 0,
    deathSaveFailures: 0,
    ...overrides,
  };
}

const dying = (overrides: Partial<VitalState> = {}) =>
  vitals({ currentHp: 0, conditions: ["Unconscious"], ...overrides });

describe("damage", () => {
  it("reduces HP above zero", () => {
    expect(applyVitalEvent(vitals(), { type: "damage", amount: 4 }).currentHp).toBe(6);
  });

  it("spends temporary HP first", () => {
    const after = applyVitalEvent(vitals({ tempHp: 3 }), { type: "damage", amount: 5 });
    expect(after.tempHp).toBe(0);
    expect(after.currentHp).toBe(8);
  });

  it("knocks a character unconscious at 0 HP with fresh counters", () => {
    const after = applyVitalEvent(vitals({ currentHp: 5, deathSaveFailures: 1 }), { type: "damage", amount: 7 });
    expect(after).toEqual(dying());
  });

  it("kills outright when the overflow reaches max HP", () => {
    const after = applyVitalEvent(vitals({ currentHp: 5, maxHp: 8 }), { type: "damage", amount: 15 });
    expect(after.currentHp).toBe(0);
    expect(after.conditions).toEqual(["Dead"]);
  });

  it("adds one failure when hit at 0 HP", () => {
    const after = applyVitalEvent(dying({ deathSaveFailures: 1 }), { type: "damage", amount: 2 });
    expect(after.deathSaveFailures).toBe(2);
    expect(after.conditions).toEqual(["Unconscious"]);
  });

  it("adds two failures on a critical hit at 0 HP", () => {
    const after = applyVitalEvent(dying(), { type: "damage", amount: 2, critical: true });
    expect(after.deathSaveFailures).toBe(2);
  });

  it("dies on the third failure", () => {
    const after = applyVitalEvent(dying({ deathSaveFailures: 2 }), { type: "damage", amount: 1 });
    expect(after.conditions).toEqual(["Dead"]);
    expect(after.deathSaveFailures).toBe(3);
  });

  it("dies when damage at 0 HP reaches max HP", () => {
    const after = applyVitalEvent(dying(), { type: "damage", amount: 10 });
    expect(after.conditions).toEqual(["Dead"]);
  });

  it("knocks a stable character back into dying", () => {
    const stable = dying({ conditions: ["Unconscious", "Stable"], deathSaveSuccesses: 3, deathSaveFailures: 1 });
    const after = applyVitalEvent(stable, { type: "damage", amount: 1 });
    expect(after.conditions).toEqual(["Unconscious"]);
    expect(after.deathSaveSuccesses).toBe(0);
    expect(after.deathSaveFailures).toBe(1);
    expect(isDying(after)).toBe(true);
  });

  it("ignores zero damage", () => {
    const state = vitals();
    expect(applyVitalEvent(state, { type: "damage", amount: 0 })).toBe(state);
  });
});

describe("healing", () => {
  it("caps at max HP", () => {
    expect(applyVitalEvent(vitals({ currentHp: 8 }), { type: "healing", amount: 5 }).currentHp).toBe(10);
  });

  it("wakes a dying character and clears counters", () => {
    const after = applyVitalEvent(dying({ deathSaveSuccesses: 2, deathSaveFailures: 1 }), {
      type: "healing",
      amount: 4,
    });
    expect(after).toEqual(vitals({ currentHp: 4 }));
  });

  it("stabilizes without restoring HP when healing for 0", () => {
    const after = applyVitalEvent(dying({ deathSaveFailures: 2 }), { type: "healing", amount: 0 });
    expect(after.currentHp).toBe(0);
    expect(after.conditions).toEqual(["Unconscious", "Stable"]);
    expect(after.deathSaveFailures).toBe(0);
  });

  it("does nothing for a dead character", () => {
    const dead = vitals({ currentHp: 0, conditions: ["Dead"], deathSaveFailures: 3 });
    expect(applyVitalEvent(dead, { type: "healing", amount: 5 })).toBe(dead);
  });
});

describe("death saves", () => {
  it("counts 10 or higher as a success", () => {
    const after = applyVitalEvent(dying(), { type: "death_save", roll: 10 });
    expect(after.deathSaveSuccesses).toBe(1);
    expect(after.deathSaveFailures).toBe(0);
  });

  it("counts 9 or lower as a failure", () => {
    expect(applyVitalEvent(dying(), { type: "death_save", roll: 9 }).deathSaveFailures).toBe(1);
  });

  it("counts a natural 1 as two failures", () => {
    expect(applyVitalEvent(dying(), { type: "death_save", roll: 1 }).deathSaveFailures).toBe(2);
  });

  it("revives at 1 HP on a natural 20", () => {
    const after = applyVitalEvent(dying({ deathSaveFailures: 2 }), { type: "death_save", roll: 20 });
    expect(after).toEqual(vitals({ currentHp: 1 }));
  });

  it("becomes stable on the third success", () => {
    const after = applyVitalEvent(dying({ deathSaveSuccesses: 2 }), { type: "death_save", roll: 15 });
    expect(after.deathSaveSuccesses).toBe(3);
    expect(after.conditions).toEqual(["Unconscious", "Stable"]);
    expect(isDying(after)).toBe(false);
  });

  it("dies on the third failure", () => {
    const after = applyVitalEvent(dying({ deathSaveFailures: 2 }), { type: "death_save", roll: 4 });
    expect(after.conditions).toEqual(["Dead"]);
    expect(after.deathSaveFailures).toBe(3);
  });

  it("ignores a save from a conscious character", () => {
    const state = vitals();
    expect(applyVitalEvent(state, { type: "death_save", roll: 1 })).toBe(state);
  });

  it("preserves fields outside the vitals", () => {
    const character = { ...dying(), id: "pc-1", name: "Test" };
    const after = applyVitalEvent(character, { type: "death_save", roll: 12 });
    expect(after.id).toBe("pc-1");
    expect(after.name).toBe("Test");
  });
});
