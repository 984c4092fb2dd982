import { getDb, isDatabaseConfigured } from "@/lib/db";
import { MemoryTeamStatsRepository } from "@/lib/stats/memoryRepository";
import { PgTeamStatsRepository } from "@/lib/stats/pgRepository";
import type { TeamStatsRepository } from "@/lib/stats/repository";

let repository: TeamStatsRepository | undefined;

/**
 * Postgres-backed repository when DATABASE_URL is set, otherwise a
 * process-wide in-memory one (handy for local development, not persisted).
 */
export function getTeamStatsRepository(): TeamStatsRepository {
  if (repository) return repository;

  if (isDatabaseConfigured()) {
    repository = new PgTeamStatsRepository(getDb());
  } else {
    console.warn("[team-stats] DATABASE_URL is not set; using the in-memory store (data is not persisted).");
    repository = new MemoryTeamStatsRepository();
  }
  return repository;
}

/** Swaps the process-wide repository; tests use it to start from an empty store. */
export function setTeamStatsRepository(next: TeamStatsRepository | undefined): void {
  repository = next;
}
