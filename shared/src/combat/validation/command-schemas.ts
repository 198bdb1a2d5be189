/**
 * Combat - Command parsing
 *
 * Tool calls and DM UI messages arrive as loosely typed maps. Everything is
 * parsed here into the closed CombatCommand union before the engine sees it.
 * Keys may be snake_case or camelCase; integers may arrive as strings.
 */

import { z } from "zod";
import type { NewCombatant, StartCombatInput } from "../types/state";
import type { AtmospherePulsePayload, NarrativeMood, RollOutcome } from "../types/events";
import { NARRATIVE_MOODS, ROLL_OUTCOMES } from "../types/events";
import type { CombatResult } from "../types/errors";
import { failure, success } from "../types/errors";

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

export type CombatCommand =
  | { name: "start_combat"; input: StartCombatInput }
  | { name: "advance_turn" }
  | { name: "end_combat" }
  | { name: "add_combatant"; combatant: NewCombatant }
  | { name: "mark_defeated"; combatantId: string }
  | { name: "apply_damage"; combatantId: string; amount: number; critical: boolean }
  | { name: "apply_healing"; combatantId: string; amount: number }
  | { name: "set_initiative"; combatantId: string; value: number }
  | { name: "record_death_save"; characterId: string; roll: number }
  | { name: "set_condition"; characterId: string; condition: string; active: boolean }
  | { name: "get_game_state" }
  | { name: "display_read_aloud_text"; text: string }
  | { name: "present_player_choices"; choices: string[] }
  | { name: "atmosphere_pulse"; text: string; intensity: AtmospherePulsePayload["intensity"]; sensoryType: string | null }
  | { name: "set_narrative_anchor"; shortText: string; moodCategory: NarrativeMood | null }
  | { name: "trigger_group_insight"; text: string; relevantSkill: string; highlightEffect: boolean }
  | { name: "log_player_roll"; characterId: string; checkType: string; result: number; outcome: RollOutcome }
  | { name: "update_scene_image"; description: string; imageUri: string | null };

export type CombatCommandName = CombatCommand["name"];

// ═══════════════════════════════════════════════════════════════════════════
// KEY NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toCamelKey(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, next: string) => next.toUpperCase());
}

export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(camelizeKeys);
  if (!isPlainRecord(value)) return value;
  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    result[toCamelKey(key)] = camelizeKeys(inner);
  }
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════
// FIELD SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const integer = z.union([
  z.number().int(),
  z.string().trim().regex(/^-?\d+$/, "Expected an integer").transform(Number),
]);

const flag = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((v) => v === "true"),
]);

const onOff = z.union([
  z.boolean(),
  z.enum(["on", "off"]).transform((v) => v === "on"),
]);

const id = z.string().trim().min(1);

const nonBlank = z.string().trim().min(1);

/** Enum values are matched without regard to case ("High", "high"). */
function caseless<U extends string, T extends [U, ...U[]]>(values: T) {
  return z.string().trim().toLowerCase().pipe(z.enum(values));
}

const partyInitiativeSchema = z.object({
  characterId: id,
  initiative: integer.optional(),
  initiativeModifier: integer.optional(),
  tiebreaker: integer.optional(),
  surprised: flag.optional(),
});

const combatantSetupSchema = z.object({
  id: id.optional(),
  name: z.string().trim().min(1),
  kind: z.enum(["NPC", "Enemy"]).optional(),
  maxHp: integer,
  currentHp: integer.optional(),
  armorClass: integer,
  initiative: integer.optional(),
  initiativeModifier: integer.optional(),
  tiebreaker: integer.optional(),
  surprised: flag.optional(),
});

const partyMemberSchema = partyInitiativeSchema.extend({ kind: z.literal("PC") });

const newCombatantSchema = z.union([partyMemberSchema, combatantSetupSchema], {
  errorMap: () => ({
    message: "Expected name, maxHp and armorClass, or kind PC with a roster characterId",
  }),
});

const empty = z.object({});

type SchemaFor<K extends CombatCommandName> = z.ZodType<Extract<CombatCommand, { name: K }>, z.ZodTypeDef, unknown>;

const COMMAND_SCHEMAS: { [K in CombatCommandName]: SchemaFor<K> } = {
  start_combat: z
    .object({
      partyInitiatives: z.array(partyInitiativeSchema).default([]),
      enemies: z.array(combatantSetupSchema).default([]),
    })
    .transform((input) => ({ name: "start_combat" as const, input })),
  advance_turn: empty.transform(() => ({ name: "advance_turn" as const })),
  end_combat: empty.transform(() => ({ name: "end_combat" as const })),
  add_combatant: newCombatantSchema.transform((combatant) => ({ name: "add_combatant" as const, combatant })),
  mark_defeated: z
    .object({ combatantId: id })
    .transform((v) => ({ name: "mark_defeated" as const, ...v })),
  apply_damage: z
    .object({ combatantId: id, amount: integer, critical: flag.default(false) })
    .transform((v) => ({ name: "apply_damage" as const, ...v })),
  apply_healing: z
    .object({ combatantId: id, amount: integer })
    .transform((v) => ({ name: "apply_healing" as const, ...v })),
  set_initiative: z
    .object({ combatantId: id, value: integer })
    .transform((v) => ({ name: "set_initiative" as const, ...v })),
  record_death_save: z
    .object({ characterId: id, roll: integer })
    .transform((v) => ({ name: "record_death_save" as const, ...v })),
  set_condition: z
    .object({ characterId: id, condition: z.string().trim().min(1), state: onOff })
    .transform(({ characterId, condition, state }) => ({
      name: "set_condition" as const,
      characterId,
      condition,
      active: state,
    })),
  get_game_state: empty.transform(() => ({ name: "get_game_state" as const })),
  display_read_aloud_text: z
    .object({ text: nonBlank })
    .transform((v) => ({ name: "display_read_aloud_text" as const, ...v })),
  present_player_choices: z
    .object({ choices: z.array(z.string().trim().min(1)).min(1) })
    .transform((v) => ({ name: "present_player_choices" as const, ...v })),
  atmosphere_pulse: z
    .object({
      text: nonBlank,
      intensity: caseless(["low", "medium", "high"]).default("medium"),
      sensoryType: z.string().nullish(),
    })
    .transform(({ text, intensity, sensoryType }) => ({
      name: "atmosphere_pulse" as const,
      text,
      intensity,
      sensoryType: sensoryType ?? null,
    })),
  set_narrative_anchor: z
    .object({ shortText: nonBlank, moodCategory: caseless([...NARRATIVE_MOODS]).nullish() })
    .transform(({ shortText, moodCategory }) => ({
      name: "set_narrative_anchor" as const,
      shortText,
      moodCategory: moodCategory ?? null,
    })),
  trigger_group_insight: z
    .object({ text: nonBlank, relevantSkill: nonBlank, highlightEffect: flag.default(false) })
    .transform((v) => ({ name: "trigger_group_insight" as const, ...v })),
  log_player_roll: z
    .object({ characterId: id, checkType: nonBlank, result: integer, outcome: z.enum(ROLL_OUTCOMES) })
    .transform((v) => ({ name: "log_player_roll" as const, ...v })),
  update_scene_image: z
    .object({ description: nonBlank, imageUri: nonBlank.nullish() })
    .transform(({ description, imageUri }) => ({
      name: "update_scene_image" as const,
      description,
      imageUri: imageUri ?? null,
    })),
};

export function isCombatCommandName(name: string): name is CombatCommandName {
  return Object.prototype.hasOwnProperty.call(COMMAND_SCHEMAS, name);
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse a tool name and its raw arguments into a typed command.
 * Missing arguments are treated as an empty object.
 */
export function parseCombatCommand(name: string, args: unknown): CombatResult<CombatCommand> {
  if (!isCombatCommandName(name)) {
    return failure("InvalidCommand", `Unknown command: ${name}`);
  }

  const normalized = camelizeKeys(args ?? {});
  const parsed = COMMAND_SCHEMAS[name].safeParse(normalized);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    return failure("InvalidCommand", `Invalid arguments for ${name}: ${details}`);
  }
  return success(parsed.data);
}
