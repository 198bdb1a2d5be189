/**
 * Combat - Persisted shape schemas
 *
 * Stored JSON is checked here before the engine trusts it, field by field
 * and then against the HP and death-save invariants.
 */

import { z } from "zod";
import { COMBATANT_KINDS, MAX_DEATH_SAVES } from "../types/entity";

const nonNegativeInt = z.number().int().min(0);

function checkHpWithinMax(value: { currentHp: number; maxHp: number }, ctx: z.RefinementCtx): void {
  if (value.currentHp > value.maxHp) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["currentHp"],
      message: `currentHp ${value.currentHp} exceeds maxHp ${value.maxHp}`,
    });
  }
}

export const combatantSnapshotSchema = z
  .object({
    name: z.string(),
    kind: z.enum(COMBATANT_KINDS),
    initiative: z.number().int(),
    tiebreaker: z.number().int().default(0),
    currentHp: nonNegativeInt,
    maxHp: z.number().int().min(1),
    armorClass: nonNegativeInt,
    isDefeated: z.boolean(),
    markedDefeated: z.boolean().optional(),
  })
  .superRefine(checkHpWithinMax);

export const encounterSchema = z.object({
  id: z.string().min(1),
  isActive: z.boolean(),
  roundNumber: z.number().int().min(1),
  turnOrder: z.array(z.string()),
  currentTurnIndex: nonNegativeInt,
  surprisedIds: z.array(z.string()).default([]),
  version: nonNegativeInt.default(0),
  combatants: z.record(z.string(), combatantSnapshotSchema),
});

export const rosterCharacterSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    kind: z.enum(COMBATANT_KINDS),
    maxHp: z.number().int().min(1),
    currentHp: nonNegativeInt,
    tempHp: nonNegativeInt.default(0),
    armorClass: nonNegativeInt,
    conditions: z.array(z.string()).default([]),
    deathSaveSuccesses: nonNegativeInt.max(MAX_DEATH_SAVES).default(0),
    deathSaveFailures: nonNegativeInt.max(MAX_DEATH_SAVES).default(0),
    controllingPlayerId: z.string().nullable().default(null),
  })
  .superRefine((character, ctx) => {
    checkHpWithinMax(character, ctx);
    // Counters only run while the character is down
    if (character.currentHp > 0 && (character.deathSaveSuccesses > 0 || character.deathSaveFailures > 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["deathSaveSuccesses"],
        message: "death save counters must be 0 while currentHp is above 0",
      });
    }
  });

export const rosterSchema = z.array(rosterCharacterSchema);
