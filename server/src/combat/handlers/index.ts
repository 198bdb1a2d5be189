/**
 * Client message handlers
 *
 * Each handler gets the sender's session and a way to answer that socket;
 * broadcasts go through the engine and the router.
 */

import type { CombatErrorCode } from "@shared/combat";
import type { ConnectionRecord } from "../../realtime/connection-registry";
import type { NotificationRouter } from "../../realtime/notification-router";
import type { CommandDispatcher } from "../command-dispatcher";

export interface HandlerContext {
  session: ConnectionRecord;
  dispatcher: CommandDispatcher;
  router: NotificationRouter;
  /** Sends ACTION_REJECTED to the sender only */
  reject: (reason: string, code: CombatErrorCode | "PermissionDenied") => void;
}

export { handleCombatCommand, isCommandMessage, COMMAND_MESSAGES, type CommandMessageType } from "./commands";
export { handleSubmitChoice } from "./narration";
export { canIssueCommand, canSubmitChoice } from "./permissions";
