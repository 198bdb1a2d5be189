import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import type { ServerConfig } from "./config";
import type { Logger } from "./logger";
import type { CampaignsRouterDeps } from "./routes/campaigns";
import { createCampaignsRouter } from "./routes/campaigns";

export interface AppDeps extends Omit<CampaignsRouterDeps, "commandTimeoutMs"> {
  config: ServerConfig;
  logger: Logger;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(cors(deps.config.allowedOrigins.length > 0 ? { origin: deps.config.allowedOrigins } : undefined));
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(
    "/api/campaigns",
    createCampaignsRouter({
      engine: deps.engine,
      dispatcher: deps.dispatcher,
      registry: deps.registry,
      logger: deps.logger.child("http"),
      commandTimeoutMs: deps.config.commandTimeoutMs,
    })
  );

  // Express 4 needs all four parameters to treat this as an error handler
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    deps.logger.error("Unhandled request error", { error: error instanceof Error ? error.message : String(error) });
    res.status(500).json({ error: "Internal server error", code: "Internal" });
  });

  return app;
}
