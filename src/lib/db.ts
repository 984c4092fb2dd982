import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { env } from "@/lib/env";

// Database is optional: callers fall back to the in-process store when
// DATABASE_URL is not configured (see getTeamStatsRepository()).

let cached:
  | {
      pool: pg.Pool;
      db: NodePgDatabase & { $client: pg.Pool };
    }
  | undefined;

export function isDatabaseConfigured(): boolean {
  return Boolean(env.DATABASE_URL);
}

export function getDb() {
  if (!env.DATABASE_URL) {
    throw new Error(
      "DATABASE_URL is not set. Configure a Postgres connection string to persist team stats."
    );
  }

  if (!cached) {
    const pool = new pg.Pool({
      connectionString: env.DATABASE_URL,
      max: env.DATABASE_POOL_MAX,
    });
    pool.on("error", (error) => {
      console.error(`[team-stats] idle postgres client error: ${error.message}`);
    });
    cached = { pool, db: drizzle(pool) };
  }

  return cached.db;
}
