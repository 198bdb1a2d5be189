import http from "node:http";
import fs from "node:fs/promises";
import dotenv from "dotenv";
import { Pool } from "pg";
import { rosterSchema } from "@shared/combat";
import { createApp } from "./app";
import { CombatEngine } from "./combat/CombatEngine";
import { CommandDispatcher } from "./combat/command-dispatcher";
import { getConfig } from "./config";
import { createConsoleLogger } from "./logger";
import { ConnectionRegistry } from "./realtime/connection-registry";
import { GameHub } from "./realtime/GameHub";
import { NotificationRouter } from "./realtime/notification-router";
import { SocketTransport } from "./realtime/socket-transport";
import { MemoryCampaignStore } from "./store/memory-store";
import { PgCampaignStore, queryableFromPool } from "./store/pg-store";
import type { EncounterStore, RosterStore } from "./store/types";

dotenv.config();

async function createStores(
  databaseUrl: string | null,
  rosterSeedPath: string | null
): Promise<RosterStore & EncounterStore> {
  if (databaseUrl) {
    const store = new PgCampaignStore(queryableFromPool(new Pool({ connectionString: databaseUrl })));
    await store.ensureSchema();
    return store;
  }

  const store = new MemoryCampaignStore();
  if (rosterSeedPath) {
    // { "<campaignId>": [ ...roster characters ] }
    const seed: unknown = JSON.parse(await fs.readFile(rosterSeedPath, "utf-8"));
    if (typeof seed === "object" && seed !== null) {
      for (const [campaignId, characters] of Object.entries(seed)) {
        store.seed(campaignId, rosterSchema.parse(characters));
      }
    }
  }
  return store;
}

async function main(): Promise<void> {
  const config = getConfig();
  const logger = createConsoleLogger({ level: config.logLevel });

  const stores = await createStores(config.databaseUrl, config.rosterSeedPath);
  const registry = new ConnectionRegistry();
  const transport = new SocketTransport(registry, logger.child("transport"));
  const router = new NotificationRouter(transport, logger.child("router"));
  const engine = new CombatEngine({
    roster: stores,
    encounters: stores,
    router,
    logger: logger.child("combat"),
  });
  const dispatcher = new CommandDispatcher(engine, router, logger.child("dispatch"));
  const hub = new GameHub({ registry, transport, router, engine, dispatcher, logger: logger.child("hub") });

  const app = createApp({ config, logger, engine, dispatcher, registry });
  const server = http.createServer(app);
  hub.attach(server, config.wsPath);

  server.listen(config.port, config.host, () => {
    logger.info(`Encounter relay listening on ${config.host}:${config.port} (ws ${config.wsPath})`, {
      storage: config.databaseUrl ? "postgres" : "memory",
    });
  });
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
