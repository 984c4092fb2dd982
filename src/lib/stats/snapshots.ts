import type { TeamStatsRepository } from "@/lib/stats/repository";
import { roundedRatio } from "@/lib/stats/utils";

export const AVERAGE_DECIMALS = 3;
export const ERA_DECIMALS = 2;
export const INNINGS_PER_GAME = 9;

/** Sort key shared by batting and pitching history: effective date, then record id. */
export type ChronologicalKey = {
  effectiveDate: string;
  id: number;
};

type DatedRow = {
  id: number;
  gameDate: string | null;
  createdAt: Date;
};

export type BattingSnapshotInput = DatedRow & { atBats: number; hits: number };
export type PitchingSnapshotInput = DatedRow & { inningsPitched: number; earnedRuns: number };

export type SnapshotResult = ChronologicalKey & { value: number };

export function battingAverage(hits: number, atBats: number): number {
  return roundedRatio(hits, atBats, AVERAGE_DECIMALS);
}

export function earnedRunAverage(earnedRuns: number, inningsPitched: number): number {
  return roundedRatio(earnedRuns * INNINGS_PER_GAME, inningsPitched, ERA_DECIMALS);
}

/**
 * The game's date when the record is linked to a dated game, otherwise the
 * record's creation day (UTC, YYYY-MM-DD). Blank game dates count as missing.
 */
export function effectiveDate(gameDate: string | null, createdAt: Date): string {
  const trimmed = gameDate?.trim();
  if (trimmed) return trimmed;
  return createdAt.toISOString().slice(0, 10);
}

// Dates are free-form strings, so they compare as text (ISO dates sort correctly).
export function compareChronological(a: ChronologicalKey, b: ChronologicalKey): number {
  if (a.effectiveDate < b.effectiveDate) return -1;
  if (a.effectiveDate > b.effectiveDate) return 1;
  return a.id - b.id;
}

export function sortChronologically<T extends DatedRow>(rows: readonly T[]): Array<T & ChronologicalKey> {
  return rows
    .map((row) => ({ ...row, effectiveDate: effectiveDate(row.gameDate, row.createdAt) }))
    .sort(compareChronological);
}

export function computeBattingSnapshots(rows: readonly BattingSnapshotInput[]): SnapshotResult[] {
  let atBats = 0;
  let hits = 0;
  return sortChronologically(rows).map((row) => {
    atBats += row.atBats;
    hits += row.hits;
    return { id: row.id, effectiveDate: row.effectiveDate, value: battingAverage(hits, atBats) };
  });
}

export function computePitchingSnapshots(rows: readonly PitchingSnapshotInput[]): SnapshotResult[] {
  let innings = 0;
  let earnedRuns = 0;
  return sortChronologically(rows).map((row) => {
    innings += row.inningsPitched;
    earnedRuns += row.earnedRuns;
    return {
      id: row.id,
      effectiveDate: row.effectiveDate,
      value: earnedRunAverage(earnedRuns, innings),
    };
  });
}

/**
 * Rewrites the running average stored on every batting record of the player.
 * Runs in one transaction that also holds the player's lock, so a failure
 * leaves the previous snapshots in place.
 */
export async function recomputeBattingSnapshots(
  repo: TeamStatsRepository,
  playerId: number
): Promise<SnapshotResult[]> {
  return repo.transaction([playerId], async (tx) => {
    const history = await tx.listBattingHistory(playerId);
    const snapshots = computeBattingSnapshots(history);
    for (const snapshot of snapshots) {
      await tx.setBattingSnapshot(snapshot.id, snapshot.value);
    }
    return snapshots;
  });
}

export async function recomputePitchingSnapshots(
  repo: TeamStatsRepository,
  playerId: number
): Promise<SnapshotResult[]> {
  return repo.transaction([playerId], async (tx) => {
    const history = await tx.listPitchingHistory(playerId);
    const snapshots = computePitchingSnapshots(history);
    for (const snapshot of snapshots) {
      await tx.setPitchingSnapshot(snapshot.id, snapshot.value);
    }
    return snapshots;
  });
}

export async function aggregateAverage(repo: TeamStatsRepository, playerId: number): Promise<number> {
  const totals = await repo.getBattingTotals(playerId);
  return battingAverage(totals.hits, totals.atBats);
}

export async function aggregateEra(repo: TeamStatsRepository, playerId: number): Promise<number> {
  const totals = await repo.getPitchingTotals(playerId);
  return earnedRunAverage(totals.earnedRuns, totals.inningsPitched);
}
