/**
 * Narration handler
 *
 * Handles: SUBMIT_CHOICE
 */

import { submitChoiceSchema } from "@shared/combat";
import type { HandlerContext } from "./index";
import { canSubmitChoice } from "./permissions";

export function handleSubmitChoice(ctx: HandlerContext, payload: Record<string, unknown>): void {
  if (!canSubmitChoice(ctx.session)) {
    ctx.reject("Only players submit choices", "PermissionDenied");
    return;
  }

  const parsed = submitChoiceSchema.safeParse(payload);
  if (!parsed.success) {
    ctx.reject("A choice is required", "InvalidCommand");
    return;
  }

  ctx.router.notify(ctx.session.campaignId, "PLAYER_CHOICE_SUBMITTED", {
    characterId: ctx.session.characterId,
    userId: ctx.session.userId,
    choice: parsed.data.choice,
    submittedAt: new Date().toISOString(),
  });
}
