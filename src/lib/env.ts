import { z } from "zod";

const envSchema = z.object({
  // Optional: without it the app runs against the in-process store (data is lost on restart).
  DATABASE_URL: z.string().min(1).optional(),

  // Upper bound for pooled Postgres connections.
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(50).optional(),

  // Shared code required for every mutating API call. Mutations are disabled when unset.
  ADMIN_CODE: z.string().min(8).optional(),

  // Row cap for the overall and per-game leaderboards.
  LEADERBOARD_LIMIT: z.coerce.number().int().min(1).max(500).optional(),
});

const parsed = envSchema.parse({
  DATABASE_URL: process.env.DATABASE_URL,
  DATABASE_POOL_MAX: process.env.DATABASE_POOL_MAX,
  ADMIN_CODE: process.env.ADMIN_CODE,
  LEADERBOARD_LIMIT: process.env.LEADERBOARD_LIMIT,
});

export const env = {
  ...parsed,
  DATABASE_POOL_MAX: parsed.DATABASE_POOL_MAX ?? 10,
  ADMIN_CODE: parsed.ADMIN_CODE?.trim() || undefined,
  LEADERBOARD_LIMIT: parsed.LEADERBOARD_LIMIT ?? 50,
};
