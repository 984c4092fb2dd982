import { DuplicatePlayerError, RecordNotFoundError } from "@/lib/stats/errors";
import type { TeamStatsRepository } from "@/lib/stats/repository";
import {
  aggregateAverage,
  aggregateEra,
  battingAverage,
  earnedRunAverage,
  recomputeBattingSnapshots,
  recomputePitchingSnapshots,
  sortChronologically,
} from "@/lib/stats/snapshots";
import type {
  BattingHistoryRow,
  BattingLeaderRow,
  BattingRecord,
  BattingRecordInput,
  BattingRecordPatch,
  Game,
  GameBattingLeaderRow,
  GameDetail,
  GameInput,
  GamePatch,
  GamePitchingLeaderRow,
  Leaderboard,
  PitchingHistoryRow,
  PitchingLeaderRow,
  PitchingRecord,
  PitchingRecordInput,
  PitchingRecordPatch,
  Player,
  PlayerChartSeries,
  PlayerDetail,
  PlayerInput,
  PlayerPatch,
  TeamSummary,
} from "@/lib/stats/types";
import { roundToDecimals } from "@/lib/stats/utils";
import { battingRecordSchema } from "@/lib/stats/validation";

export const DEFAULT_SEARCH_LIMIT = 20;
export const DEFAULT_LEADERBOARD_LIMIT = 50;

function patched<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

// ---------------------------------------------------------------------------
// Players
// ---------------------------------------------------------------------------

export async function searchPlayers(
  repo: TeamStatsRepository,
  params: { q?: string | null; limit?: number } = {}
): Promise<Player[]> {
  return repo.searchPlayers(params.q ?? null, params.limit ?? DEFAULT_SEARCH_LIMIT);
}

export async function listPlayers(repo: TeamStatsRepository): Promise<Player[]> {
  return repo.listPlayers();
}

export async function createPlayer(repo: TeamStatsRepository, input: PlayerInput): Promise<Player> {
  return repo.transaction([], async (tx) => {
    if (await tx.findPlayerByName(input.name)) {
      throw new DuplicatePlayerError(input.name);
    }
    return tx.insertPlayer(input);
  });
}

export async function updatePlayer(
  repo: TeamStatsRepository,
  playerId: number,
  patch: PlayerPatch
): Promise<Player> {
  return repo.transaction([playerId], async (tx) => {
    const existing = await tx.getPlayer(playerId);
    if (!existing) throw new RecordNotFoundError("player", playerId);
    const input: PlayerInput = {
      name: patched(patch.name, existing.name),
      position: patched(patch.position, existing.position),
      team: patched(patch.team, existing.team),
    };
    const sameName = await tx.findPlayerByName(input.name);
    if (sameName && sameName.id !== playerId) {
      throw new DuplicatePlayerError(input.name);
    }
    const updated = await tx.updatePlayer(playerId, input);
    if (!updated) throw new RecordNotFoundError("player", playerId);
    return updated;
  });
}

/** Removes the player together with every batting and pitching record they own. */
export async function deletePlayer(repo: TeamStatsRepository, playerId: number): Promise<void> {
  await repo.transaction([playerId], async (tx) => {
    const deleted = await tx.deletePlayer(playerId);
    if (!deleted) throw new RecordNotFoundError("player", playerId);
  });
}

function chartLabel(row: { gameDate: string | null; gameName: string | null; createdAt: Date }): string {
  return row.gameDate?.trim() || row.gameName || row.createdAt.toISOString().slice(0, 10);
}

function buildChartSeries(batting: BattingHistoryRow[], pitching: PitchingHistoryRow[]): PlayerChartSeries {
  let homeRuns = 0;
  let runsBattedIn = 0;
  let strikeouts = 0;
  let innings = 0;

  return {
    batting: {
      labels: batting.map(chartLabel),
      perGameAverage: batting.map((row) => row.perGameAverage),
      snapshotAverage: batting.map((row) => row.snapshotAverage),
      cumulativeHomeRuns: batting.map((row) => (homeRuns += row.homeRuns)),
      cumulativeRunsBattedIn: batting.map((row) => (runsBattedIn += row.runsBattedIn)),
    },
    pitching: {
      labels: pitching.map(chartLabel),
      perGameEra: pitching.map((row) => row.perGameEra),
      snapshotEra: pitching.map((row) => row.snapshotEra),
      cumulativeStrikeouts: pitching.map((row) => (strikeouts += row.strikeouts)),
      cumulativeInnings: pitching.map((row) => roundToDecimals((innings += row.inningsPitched), 1)),
    },
  };
}

export async function getPlayerDetail(repo: TeamStatsRepository, playerId: number): Promise<PlayerDetail> {
  const player = await repo.getPlayer(playerId);
  if (!player) throw new RecordNotFoundError("player", playerId);

  const [battingHistory, pitchingHistory, battingTotals, pitchingTotals, average, era] = await Promise.all([
    repo.listBattingHistory(playerId),
    repo.listPitchingHistory(playerId),
    repo.getBattingTotals(playerId),
    repo.getPitchingTotals(playerId),
    aggregateAverage(repo, playerId),
    aggregateEra(repo, playerId),
  ]);

  const batting: BattingHistoryRow[] = sortChronologically(battingHistory).map((row) => ({
    ...row,
    perGameAverage: battingAverage(row.hits, row.atBats),
  }));
  const pitching: PitchingHistoryRow[] = sortChronologically(pitchingHistory).map((row) => ({
    ...row,
    perGameEra: earnedRunAverage(row.earnedRuns, row.inningsPitched),
  }));

  return {
    player,
    batting,
    pitching,
    battingTotals,
    pitchingTotals,
    average,
    era,
    charts: buildChartSeries(batting, pitching),
  };
}

// ---------------------------------------------------------------------------
// Games
// ---------------------------------------------------------------------------

export async function listGames(repo: TeamStatsRepository): Promise<Game[]> {
  return repo.listGames();
}

export async function createGame(repo: TeamStatsRepository, input: GameInput): Promise<Game> {
  return repo.transaction([], (tx) => tx.insertGame(input));
}

async function recomputePlayers(tx: TeamStatsRepository, playerIds: readonly number[]): Promise<void> {
  await tx.transaction(playerIds, async (locked) => {
    for (const playerId of playerIds) {
      await recomputeBattingSnapshots(locked, playerId);
      await recomputePitchingSnapshots(locked, playerId);
    }
  });
}

/**
 * A game's date is part of every linked record's sort key, so editing it
 * recomputes the snapshots of every player who appeared in the game.
 */
export async function updateGame(repo: TeamStatsRepository, gameId: number, patch: GamePatch): Promise<Game> {
  return repo.transaction([], async (tx) => {
    const existing = await tx.getGame(gameId);
    if (!existing) throw new RecordNotFoundError("game", gameId);
    const input: GameInput = {
      name: patched(patch.name, existing.name),
      date: patched(patch.date, existing.date),
      location: patched(patch.location, existing.location),
    };
    const updated = await tx.updateGame(gameId, input);
    if (!updated) throw new RecordNotFoundError("game", gameId);
    if (existing.date !== updated.date) {
      await recomputePlayers(tx, await tx.listPlayerIdsForGame(gameId));
    }
    return updated;
  });
}

/** Detaches the game's records (they keep their stats) and reorders the affected histories. */
export async function deleteGame(repo: TeamStatsRepository, gameId: number): Promise<void> {
  await repo.transaction([], async (tx) => {
    const affected = await tx.listPlayerIdsForGame(gameId);
    const deleted = await tx.deleteGame(gameId);
    if (!deleted) throw new RecordNotFoundError("game", gameId);
    await recomputePlayers(tx, affected);
  });
}

function byAverageDesc<T extends { average: number; hits: number }>(a: T, b: T): number {
  return b.average - a.average || b.hits - a.hits;
}

function byEraAsc<T extends { era: number; strikeouts: number }>(a: T, b: T): number {
  return a.era - b.era || b.strikeouts - a.strikeouts;
}

export async function getGameDetail(repo: TeamStatsRepository, gameId: number): Promise<GameDetail> {
  const game = await repo.getGame(gameId);
  if (!game) throw new RecordNotFoundError("game", gameId);

  const [battingLines, pitchingLines] = await Promise.all([
    repo.listGameBatting(gameId),
    repo.listGamePitching(gameId),
  ]);

  return {
    game,
    batting: battingLines
      .map((line) => ({ ...line, average: battingAverage(line.hits, line.atBats) }))
      .sort((a, b) => byAverageDesc(a, b) || a.recordId - b.recordId),
    pitching: pitchingLines
      .map((line) => ({ ...line, era: earnedRunAverage(line.earnedRuns, line.inningsPitched) }))
      .sort((a, b) => byEraAsc(a, b) || a.recordId - b.recordId),
  };
}

// ---------------------------------------------------------------------------
// Batting / pitching records
// ---------------------------------------------------------------------------

async function assertReferences(
  tx: TeamStatsRepository,
  input: { playerId: number; gameId: number | null }
): Promise<void> {
  if (!(await tx.getPlayer(input.playerId))) {
    throw new RecordNotFoundError("player", input.playerId);
  }
  if (input.gameId !== null && !(await tx.getGame(input.gameId))) {
    throw new RecordNotFoundError("game", input.gameId);
  }
}

export async function createBattingRecord(
  repo: TeamStatsRepository,
  input: BattingRecordInput
): Promise<BattingRecord> {
  return repo.transaction([input.playerId], async (tx) => {
    await assertReferences(tx, input);
    const record = await tx.insertBattingRecord(input);
    const snapshots = await recomputeBattingSnapshots(tx, input.playerId);
    const snapshot = snapshots.find((entry) => entry.id === record.id);
    return { ...record, snapshotAverage: snapshot?.value ?? record.snapshotAverage };
  });
}

/**
 * Applies a patch to a batting record. The owning players are read first and
 * then locked together, so a record moving between two players never holds
 * one lock while waiting on the other. Both histories are recomputed: the
 * old owner lost an entry, the new one gained it.
 */
export async function updateBattingRecord(
  repo: TeamStatsRepository,
  recordId: number,
  patch: BattingRecordPatch
): Promise<BattingRecord> {
  return repo.transaction([], async (tx) => {
    const existing = await tx.getBattingRecord(recordId);
    if (!existing) throw new RecordNotFoundError("batting", recordId);
    const input: BattingRecordInput = battingRecordSchema.parse({
      playerId: patched(patch.playerId, existing.playerId),
      gameId: patched(patch.gameId, existing.gameId),
      atBats: patched(patch.atBats, existing.atBats),
      hits: patched(patch.hits, existing.hits),
      homeRuns: patched(patch.homeRuns, existing.homeRuns),
      runsBattedIn: patched(patch.runsBattedIn, existing.runsBattedIn),
    });

    const affected = [...new Set([existing.playerId, input.playerId])];
    return tx.transaction(affected, async (locked) => {
      await assertReferences(locked, input);
      const updated = await locked.updateBattingRecord(recordId, input);
      if (!updated) throw new RecordNotFoundError("batting", recordId);
      let snapshotAverage = updated.snapshotAverage;
      for (const playerId of affected) {
        const snapshots = await recomputeBattingSnapshots(locked, playerId);
        snapshotAverage = snapshots.find((entry) => entry.id === recordId)?.value ?? snapshotAverage;
      }
      return { ...updated, snapshotAverage };
    });
  });
}

export async function deleteBattingRecord(repo: TeamStatsRepository, recordId: number): Promise<void> {
  await repo.transaction([], async (tx) => {
    const existing = await tx.getBattingRecord(recordId);
    if (!existing) throw new RecordNotFoundError("batting", recordId);
    await tx.transaction([existing.playerId], async (locked) => {
      await locked.deleteBattingRecord(recordId);
      await recomputeBattingSnapshots(locked, existing.playerId);
    });
  });
}

export async function createPitchingRecord(
  repo: TeamStatsRepository,
  input: PitchingRecordInput
): Promise<PitchingRecord> {
  return repo.transaction([input.playerId], async (tx) => {
    await assertReferences(tx, input);
    const record = await tx.insertPitchingRecord(input);
    const snapshots = await recomputePitchingSnapshots(tx, input.playerId);
    const snapshot = snapshots.find((entry) => entry.id === record.id);
    return { ...record, snapshotEra: snapshot?.value ?? record.snapshotEra };
  });
}

export async function updatePitchingRecord(
  repo: TeamStatsRepository,
  recordId: number,
  patch: PitchingRecordPatch
): Promise<PitchingRecord> {
  return repo.transaction([], async (tx) => {
    const existing = await tx.getPitchingRecord(recordId);
    if (!existing) throw new RecordNotFoundError("pitching", recordId);
    const input: PitchingRecordInput = {
      playerId: patched(patch.playerId, existing.playerId),
      gameId: patched(patch.gameId, existing.gameId),
      inningsPitched: patched(patch.inningsPitched, existing.inningsPitched),
      earnedRuns: patched(patch.earnedRuns, existing.earnedRuns),
      strikeouts: patched(patch.strikeouts, existing.strikeouts),
      walks: patched(patch.walks, existing.walks),
    };

    const affected = [...new Set([existing.playerId, input.playerId])];
    return tx.transaction(affected, async (locked) => {
      await assertReferences(locked, input);
      const updated = await locked.updatePitchingRecord(recordId, input);
      if (!updated) throw new RecordNotFoundError("pitching", recordId);
      let snapshotEra = updated.snapshotEra;
      for (const playerId of affected) {
        const snapshots = await recomputePitchingSnapshots(locked, playerId);
        snapshotEra = snapshots.find((entry) => entry.id === recordId)?.value ?? snapshotEra;
      }
      return { ...updated, snapshotEra };
    });
  });
}

export async function deletePitchingRecord(repo: TeamStatsRepository, recordId: number): Promise<void> {
  await repo.transaction([], async (tx) => {
    const existing = await tx.getPitchingRecord(recordId);
    if (!existing) throw new RecordNotFoundError("pitching", recordId);
    await tx.transaction([existing.playerId], async (locked) => {
      await locked.deletePitchingRecord(recordId);
      await recomputePitchingSnapshots(locked, existing.playerId);
    });
  });
}

// ---------------------------------------------------------------------------
// Leaderboards
// ---------------------------------------------------------------------------

async function battingLeaders(repo: TeamStatsRepository): Promise<BattingLeaderRow[]> {
  const totals = await repo.sumBattingByPlayer();
  return totals
    .map((row) => ({ ...row, average: battingAverage(row.hits, row.atBats) }))
    .sort(
      (a, b) =>
        byAverageDesc(a, b) ||
        b.homeRuns - a.homeRuns ||
        b.runsBattedIn - a.runsBattedIn ||
        a.playerId - b.playerId
    );
}

async function pitchingLeaders(repo: TeamStatsRepository): Promise<PitchingLeaderRow[]> {
  const totals = await repo.sumPitchingByPlayer();
  return totals
    .map((row) => ({ ...row, era: earnedRunAverage(row.earnedRuns, row.inningsPitched) }))
    .sort((a, b) => byEraAsc(a, b) || a.playerId - b.playerId);
}

/** Every player, including those without records (home page tables). */
export async function getTeamSummary(repo: TeamStatsRepository): Promise<TeamSummary> {
  const [batting, pitching] = await Promise.all([battingLeaders(repo), pitchingLeaders(repo)]);
  return { batting, pitching };
}

export async function getLeaderboard(
  repo: TeamStatsRepository,
  params: { gameId?: number | null; limit?: number } = {}
): Promise<Leaderboard> {
  const limit = params.limit ?? DEFAULT_LEADERBOARD_LIMIT;
  const gameId = params.gameId ?? null;
  const games = await repo.listGames();

  if (gameId === null) {
    const [batting, pitching] = await Promise.all([battingLeaders(repo), pitchingLeaders(repo)]);
    return {
      gameId,
      games,
      batting: batting.filter((row) => row.atBats > 0).slice(0, limit),
      pitching: pitching.filter((row) => row.inningsPitched > 0).slice(0, limit),
    };
  }

  const [battingLines, pitchingLines] = await Promise.all([
    repo.listGameBatting(gameId),
    repo.listGamePitching(gameId),
  ]);

  const batting: GameBattingLeaderRow[] = battingLines
    .map((line) => ({ ...line, average: battingAverage(line.hits, line.atBats) }))
    .sort(
      (a, b) =>
        b.hits - a.hits ||
        b.homeRuns - a.homeRuns ||
        b.runsBattedIn - a.runsBattedIn ||
        b.average - a.average ||
        a.recordId - b.recordId
    );
  const pitching: GamePitchingLeaderRow[] = pitchingLines
    .map((line) => ({ ...line, era: earnedRunAverage(line.earnedRuns, line.inningsPitched) }))
    .sort((a, b) => byEraAsc(a, b) || a.recordId - b.recordId);

  return {
    gameId,
    games,
    batting: batting.slice(0, limit),
    pitching: pitching.slice(0, limit),
  };
}
