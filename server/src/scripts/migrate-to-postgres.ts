import fs from "node:fs/promises";
import path from "node:path";
import dotenv from "dotenv";
import { Pool } from "pg";
import { rosterSchema } from "@shared/combat";
import { PgCampaignStore, queryableFromPool } from "../store/pg-store";

dotenv.config();

async function main(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error("Set DATABASE_URL to a Postgres connection string before running.");
  }

  const seedPath = path.resolve(process.argv[2] ?? process.env.ROSTER_SEED_PATH ?? "server/data/sample-roster.json");
  const pool = new Pool({ connectionString });

  try {
    const db = queryableFromPool(pool);
    await new PgCampaignStore(db).ensureSchema();

    const seed: unknown = JSON.parse(await fs.readFile(seedPath, "utf-8"));
    if (typeof seed !== "object" || seed === null) {
      throw new Error(`${seedPath} must map campaign ids to roster arrays`);
    }

    for (const [campaignId, characters] of Object.entries(seed)) {
      const roster = rosterSchema.parse(characters);
      await db.query(
        `
        INSERT INTO campaigns (id, party_state)
        VALUES ($1, $2::jsonb)
        ON CONFLICT (id) DO UPDATE SET party_state = EXCLUDED.party_state, updated_at = now()
      `,
        [campaignId, JSON.stringify(roster)]
      );
      console.info(`Seeded ${roster.length} characters into ${campaignId}`);
    }

    console.info("Migration finished successfully.");
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error("Migration failed:", error);
  process.exit(1);
});
