/**
 * Command Dispatcher
 *
 * Entry point for tool calls and DM commands: untyped arguments in, a typed
 * command out, then exactly one engine (or narration) operation.
 */

import type { CombatCommand, CombatResult } from "@shared/combat";
import { parseCombatCommand, success } from "@shared/combat";
import type { Logger } from "../logger";
import type { NotificationRouter } from "../realtime/notification-router";
import type { CombatEngine, OperationOptions } from "./CombatEngine";

export interface ToolResponse {
  success: boolean;
  result?: unknown;
  error?: string;
  code?: string;
  retryable?: boolean;
}

/** Shape returned to the narrator as the tool-call result. */
export function toToolResponse(result: CombatResult<unknown>): ToolResponse {
  if (result.ok) {
    return { success: true, result: result.value };
  }
  return { success: false, error: result.message, code: result.code, retryable: result.retryable };
}

const SCENE_PLACEHOLDER_COUNT = 10;

/** Picks one of the stock scene images; the same description always maps to the same one. */
export function placeholderSceneImage(description: string): string {
  let hash = 0;
  for (const char of description) {
    hash = (hash * 31 + char.charCodeAt(0)) | 0;
  }
  return `/images/scenes/placeholder_${Math.abs(hash) % SCENE_PLACEHOLDER_COUNT}.png`;
}

export class CommandDispatcher {
  constructor(
    private readonly engine: CombatEngine,
    private readonly router: NotificationRouter,
    private readonly logger: Logger
  ) {}

  parse(name: string, args: unknown): CombatResult<CombatCommand> {
    return parseCombatCommand(name, args);
  }

  async execute(
    campaignId: string,
    name: string,
    args: unknown,
    options: OperationOptions = {}
  ): Promise<CombatResult<unknown>> {
    const parsed = this.parse(name, args);
    if (!parsed.ok) {
      this.logger.warn("Rejected command", { campaignId, name, reason: parsed.message });
      return parsed;
    }
    return this.run(campaignId, parsed.value, options);
  }

  async run(campaignId: string, command: CombatCommand, options: OperationOptions = {}): Promise<CombatResult<unknown>> {
    this.logger.debug(`Running ${command.name}`, { campaignId });

    switch (command.name) {
      case "start_combat":
        return this.engine.startCombat(campaignId, command.input, options);
      case "advance_turn":
        return this.engine.advanceTurn(campaignId, options);
      case "end_combat":
        return this.engine.endCombat(campaignId, options);
      case "add_combatant":
        return this.engine.addCombatant(campaignId, command.combatant, options);
      case "mark_defeated":
        return this.engine.markDefeated(campaignId, command.combatantId, options);
      case "apply_damage":
        return this.engine.applyDamage(campaignId, command.combatantId, command.amount, {
          ...options,
          critical: command.critical,
        });
      case "apply_healing":
        return this.engine.applyHealing(campaignId, command.combatantId, command.amount, options);
      case "set_initiative":
        return this.engine.setInitiative(campaignId, command.combatantId, command.value, options);
      case "record_death_save":
        return this.engine.recordDeathSave(campaignId, command.characterId, command.roll, options);
      case "set_condition":
        return this.engine.setCondition(campaignId, command.characterId, command.condition, command.active, options);
      case "get_game_state":
        return this.engine.getSnapshot(campaignId);
      case "log_player_roll":
        return this.engine.logPlayerRoll(
          campaignId,
          {
            characterId: command.characterId,
            checkType: command.checkType,
            result: command.result,
            outcome: command.outcome,
          },
          options
        );

      // Narration: relayed, no campaign state involved
      case "display_read_aloud_text":
        this.router.notify(campaignId, "READ_ALOUD_TEXT", { text: command.text });
        return success({ audience: "dm" });
      case "present_player_choices":
        this.router.notify(campaignId, "PLAYER_CHOICES_PRESENTED", { choices: command.choices });
        return success({ audience: "players" });
      case "atmosphere_pulse":
        this.router.notify(campaignId, "ATMOSPHERE_PULSE", {
          text: command.text,
          intensity: command.intensity,
          sensoryType: command.sensoryType,
        });
        return success({ audience: "players" });
      case "set_narrative_anchor":
        this.router.notify(campaignId, "NARRATIVE_ANCHOR_UPDATED", {
          shortText: command.shortText,
          moodCategory: command.moodCategory,
        });
        return success({ audience: "players" });
      case "trigger_group_insight":
        this.router.notify(campaignId, "GROUP_INSIGHT_TRIGGERED", {
          text: command.text,
          relevantSkill: command.relevantSkill,
          highlightEffect: command.highlightEffect,
        });
        return success({ audience: "players" });
      case "update_scene_image": {
        const imageUri = command.imageUri ?? placeholderSceneImage(command.description);
        this.router.notify(campaignId, "SCENE_IMAGE_UPDATED", { imageUri, description: command.description });
        return success({ audience: "all", imageUri });
      }
    }
  }
}
