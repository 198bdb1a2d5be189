/**
 * Combat permissions helpers
 *
 * Centralized checks for who may issue which command.
 */

import type { CombatCommand } from "@shared/combat";
import type { ConnectionRecord } from "../../realtime/connection-registry";

export function canIssueCommand(session: ConnectionRecord, command: CombatCommand): boolean {
  if (session.isDm) return true;

  // Players roll their own death saves; everything else is the DM's call
  if (command.name === "record_death_save") {
    return session.characterId !== null && session.characterId === command.characterId;
  }
  return false;
}

export function canSubmitChoice(session: ConnectionRecord): boolean {
  return !session.isDm;
}
