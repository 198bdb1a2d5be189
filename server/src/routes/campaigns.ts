import { Router } from "express";
import type { Request, Response } from "express";
import type { CombatErrorCode, CombatResult } from "@shared/combat";
import type { CombatEngine } from "../combat/CombatEngine";
import type { CommandDispatcher } from "../combat/command-dispatcher";
import { toToolResponse } from "../combat/command-dispatcher";
import type { Logger } from "../logger";
import type { ConnectionRegistry } from "../realtime/connection-registry";

export interface CampaignsRouterDeps {
  engine: CombatEngine;
  dispatcher: CommandDispatcher;
  registry: ConnectionRegistry;
  logger: Logger;
  commandTimeoutMs: number;
}

const STATUS_BY_CODE: Record<CombatErrorCode, number> = {
  InvalidCommand: 400,
  InvalidAmount: 400,
  UnknownCombatant: 404,
  AlreadyActive: 409,
  NoActiveCombat: 409,
  InvalidState: 409,
  CorruptEncounter: 409,
  StorageUnavailable: 503,
  PartialUpdate: 503,
  Cancelled: 504,
};

export function statusForResult(result: CombatResult<unknown>): number {
  return result.ok ? 200 : STATUS_BY_CODE[result.code];
}

export function createCampaignsRouter(deps: CampaignsRouterDeps): Router {
  const router = Router();

  router.get("/:campaignId/state", async (req: Request, res: Response) => {
    const result = await deps.engine.getSnapshot(req.params.campaignId);
    if (!result.ok) {
      return res.status(statusForResult(result)).json({ error: result.message, code: result.code });
    }
    res.json(result.value);
  });

  router.get("/:campaignId/connections", (req: Request, res: Response) => {
    const players = deps.registry.connectedPlayers(req.params.campaignId).map((record) => ({
      userId: record.userId,
      characterId: record.characterId,
      connectedAt: record.connectedAt,
    }));
    res.json({ players });
  });

  // Tool-call endpoint: the body is the raw argument map
  router.post("/:campaignId/commands/:name", async (req: Request, res: Response) => {
    const { campaignId, name } = req.params;
    const result = await deps.dispatcher.execute(campaignId, name, req.body ?? {}, {
      signal: AbortSignal.timeout(deps.commandTimeoutMs),
    });
    if (!result.ok) {
      deps.logger.warn(`${name} failed`, { campaignId, code: result.code, message: result.message });
    }
    res.status(statusForResult(result)).json(toToolResponse(result));
  });

  return router;
}
