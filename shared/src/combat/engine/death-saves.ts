/**
 * Combat - Death Saves
 *
 * Pure reducer over a player character's vitals. Damage, healing and death
 * saving throws all go through applyVitalEvent so the counters, conditions
 * and HP move together.
 *
 * Rules:
 * - Dropping to 0 HP: Unconscious, counters reset
 * - Death save: 20 revives at 1 HP, 1 counts as two failures,
 *   10+ is a success, anything lower a failure
 * - 3 successes: Stable (still Unconscious); 3 failures: Dead
 * - Damage at 0 HP: one failure, two on a critical hit
 * - Damage left over at 0 HP >= max HP: Dead outright
 * - Healing at 0 HP wakes the character; healing for 0 only stabilizes
 */

import type { RosterCharacter } from "../types/entity";
import { CONDITION, MAX_DEATH_SAVES } from "../types/entity";

// ═══════════════════════════════════════════════════════════════════════════
// STATE & EVENTS
// ═══════════════════════════════════════════════════════════════════════════

export type VitalState = Pick<
  RosterCharacter,
  "currentHp" | "maxHp" | "tempHp" | "conditions" | "deathSaveSuccesses" | "deathSaveFailures"
>;

export type VitalEvent =
  | { type: "damage"; amount: number; critical?: boolean }
  | { type: "healing"; amount: number }
  | { type: "death_save"; roll: number };

// ═══════════════════════════════════════════════════════════════════════════
// CONDITION HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function withCondition(conditions: string[], condition: string): string[] {
  return conditions.includes(condition) ? conditions : [...conditions, condition];
}

function withoutConditions(conditions: string[], ...removed: string[]): string[] {
  return conditions.filter((c) => !removed.includes(c));
}

export function isDead(state: Pick<VitalState, "conditions">): boolean {
  return state.conditions.includes(CONDITION.DEAD);
}

export function isStable(state: Pick<VitalState, "conditions">): boolean {
  return state.conditions.includes(CONDITION.STABLE);
}

export function isDying(state: VitalState): boolean {
  return (
    state.currentHp === 0 &&
    state.conditions.includes(CONDITION.UNCONSCIOUS) &&
    !isStable(state) &&
    !isDead(state)
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// COUNTER TRANSITIONS
// ═══════════════════════════════════════════════════════════════════════════

function die<T extends VitalState>(state: T, failures: number): T {
  return {
    ...state,
    currentHp: 0,
    conditions: withCondition(
      withoutConditions(state.conditions, CONDITION.UNCONSCIOUS, CONDITION.STABLE),
      CONDITION.DEAD
    ),
    deathSaveFailures: failures,
  };
}

function addFailures<T extends VitalState>(state: T, count: number): T {
  const failures = Math.min(MAX_DEATH_SAVES, state.deathSaveFailures + count);
  if (failures >= MAX_DEATH_SAVES) {
    return die(state, failures);
  }
  return { ...state, deathSaveFailures: failures };
}

function addSuccess<T extends VitalState>(state: T): T {
  const successes = Math.min(MAX_DEATH_SAVES, state.deathSaveSuccesses + 1);
  if (successes >= MAX_DEATH_SAVES) {
    return {
      ...state,
      deathSaveSuccesses: successes,
      conditions: withCondition(state.conditions, CONDITION.STABLE),
    };
  }
  return { ...state, deathSaveSuccesses: successes };
}

function conscious<T extends VitalState>(state: T, currentHp: number): T {
  return {
    ...state,
    currentHp,
    conditions: withoutConditions(state.conditions, CONDITION.UNCONSCIOUS, CONDITION.STABLE),
    deathSaveSuccesses: 0,
    deathSaveFailures: 0,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// EVENT HANDLERS
// ═══════════════════════════════════════════════════════════════════════════

function applyDamage<T extends VitalState>(state: T, amount: number, critical: boolean): T {
  if (amount <= 0) return state;

  // Temporary HP soaks damage first
  const absorbed = Math.min(state.tempHp, amount);
  const tempHp = state.tempHp - absorbed;
  const remaining = amount - absorbed;
  const afterTemp: T = { ...state, tempHp };
  if (remaining === 0) return afterTemp;

  if (state.currentHp > 0) {
    if (remaining < state.currentHp) {
      return { ...afterTemp, currentHp: state.currentHp - remaining };
    }
    const overflow = remaining - state.currentHp;
    if (overflow >= state.maxHp) {
      return die({ ...afterTemp, deathSaveSuccesses: 0 }, 0);
    }
    return {
      ...afterTemp,
      currentHp: 0,
      conditions: withCondition(
        withoutConditions(state.conditions, CONDITION.STABLE),
        CONDITION.UNCONSCIOUS
      ),
      deathSaveSuccesses: 0,
      deathSaveFailures: 0,
    };
  }

  // Already at 0 HP
  if (remaining >= state.maxHp) {
    return die(afterTemp, state.deathSaveFailures);
  }

  const restarted: T = isStable(state)
    ? {
        ...afterTemp,
        conditions: withoutConditions(state.conditions, CONDITION.STABLE),
        deathSaveSuccesses: 0,
        deathSaveFailures: 0,
      }
    : afterTemp;

  return addFailures(
    { ...restarted, conditions: withCondition(restarted.conditions, CONDITION.UNCONSCIOUS) },
    critical ? 2 : 1
  );
}

function applyHealing<T extends VitalState>(state: T, amount: number): T {
  if (amount < 0) return state;

  if (state.currentHp === 0) {
    if (amount > 0) {
      return conscious(state, Math.min(state.maxHp, amount));
    }
    // Stabilize without restoring HP
    return {
      ...state,
      conditions: withCondition(withCondition(state.conditions, CONDITION.UNCONSCIOUS), CONDITION.STABLE),
      deathSaveSuccesses: 0,
      deathSaveFailures: 0,
    };
  }

  return { ...state, currentHp: Math.min(state.maxHp, state.currentHp + amount) };
}

function applyDeathSave<T extends VitalState>(state: T, roll: number): T {
  if (!isDying(state)) return state;

  if (roll === 20) {
    return conscious(state, 1);
  }
  if (roll === 1) {
    return addFailures(state, 2);
  }
  if (roll >= 10) {
    return addSuccess(state);
  }
  return addFailures(state, 1);
}

/**
 * Apply one vitals event. Events against a dead character change nothing.
 */
export function applyVitalEvent<T extends VitalState>(state: T, event: VitalEvent): T {
  if (isDead(state)) return state;

  switch (event.type) {
    case "damage":
      return applyDamage(state, event.amount, event.critical ?? false);
    case "healing":
      return applyHealing(state, event.amount);
    case "death_save":
      return applyDeathSave(state, event.roll);
  }
}
