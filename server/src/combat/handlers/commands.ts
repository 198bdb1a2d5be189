/**
 * Combat command handler
 *
 * Handles: START_COMBAT, END_COMBAT, ADD_COMBATANT, MARK_DEFEATED,
 * ADVANCE_TURN, SET_INITIATIVE, APPLY_DAMAGE, APPLY_HEALING,
 * RECORD_DEATH_SAVE, SET_CONDITION
 */

import type { ClientMessageType, CombatCommandName } from "@shared/combat";
import type { HandlerContext } from "./index";
import { canIssueCommand } from "./permissions";

export const COMMAND_MESSAGES = {
  START_COMBAT: "start_combat",
  END_COMBAT: "end_combat",
  ADD_COMBATANT: "add_combatant",
  MARK_DEFEATED: "mark_defeated",
  ADVANCE_TURN: "advance_turn",
  SET_INITIATIVE: "set_initiative",
  APPLY_DAMAGE: "apply_damage",
  APPLY_HEALING: "apply_healing",
  RECORD_DEATH_SAVE: "record_death_save",
  SET_CONDITION: "set_condition",
} as const satisfies Partial<Record<ClientMessageType, CombatCommandName>>;

export type CommandMessageType = keyof typeof COMMAND_MESSAGES;

export function isCommandMessage(type: ClientMessageType): type is CommandMessageType {
  return Object.prototype.hasOwnProperty.call(COMMAND_MESSAGES, type);
}

export async function handleCombatCommand(
  ctx: HandlerContext,
  type: CommandMessageType,
  payload: Record<string, unknown>
): Promise<void> {
  const parsed = ctx.dispatcher.parse(COMMAND_MESSAGES[type], payload);
  if (!parsed.ok) {
    ctx.reject(parsed.message, parsed.code);
    return;
  }

  if (!canIssueCommand(ctx.session, parsed.value)) {
    ctx.reject("You are not allowed to do that", "PermissionDenied");
    return;
  }

  const result = await ctx.dispatcher.run(ctx.session.campaignId, parsed.value);
  if (!result.ok) {
    ctx.reject(result.message, result.code);
  }
}
