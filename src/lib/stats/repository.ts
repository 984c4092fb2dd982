import type {
  BattingCounts,
  BattingHistoryEntry,
  BattingRecord,
  BattingRecordInput,
  Game,
  GameBattingLine,
  GameInput,
  GamePitchingLine,
  PitchingCounts,
  PitchingHistoryEntry,
  PitchingRecord,
  PitchingRecordInput,
  Player,
  PlayerBattingTotals,
  PlayerInput,
  PlayerPitchingTotals,
} from "@/lib/stats/types";

/**
 * Storage seam for the team-stats service and the snapshot engine.
 *
 * Writes are expected to happen inside `transaction()`. The callback receives a
 * repository bound to the transaction; calling `transaction()` again on that
 * repository joins the open transaction (and, on Postgres, locks the extra
 * player rows) instead of starting a new one.
 */
export interface TeamStatsRepository {
  transaction<T>(
    playerIds: readonly number[],
    fn: (repo: TeamStatsRepository) => Promise<T>
  ): Promise<T>;

  searchPlayers(query: string | null, limit: number): Promise<Player[]>;
  listPlayers(): Promise<Player[]>;
  getPlayer(id: number): Promise<Player | undefined>;
  findPlayerByName(name: string): Promise<Player | undefined>;
  insertPlayer(input: PlayerInput): Promise<Player>;
  updatePlayer(id: number, input: PlayerInput): Promise<Player | undefined>;
  deletePlayer(id: number): Promise<boolean>;

  /** Dated games first (newest first), then undated; ties by id descending. */
  listGames(): Promise<Game[]>;
  getGame(id: number): Promise<Game | undefined>;
  insertGame(input: GameInput): Promise<Game>;
  updateGame(id: number, input: GameInput): Promise<Game | undefined>;
  deleteGame(id: number): Promise<boolean>;
  /** Distinct players with at least one batting or pitching record in the game. */
  listPlayerIdsForGame(gameId: number): Promise<number[]>;

  getBattingRecord(id: number): Promise<BattingRecord | undefined>;
  insertBattingRecord(input: BattingRecordInput): Promise<BattingRecord>;
  updateBattingRecord(id: number, input: BattingRecordInput): Promise<BattingRecord | undefined>;
  deleteBattingRecord(id: number): Promise<boolean>;
  /** Every batting record of the player, unordered, left-joined with its game. */
  listBattingHistory(playerId: number): Promise<BattingHistoryEntry[]>;
  setBattingSnapshot(recordId: number, snapshotAverage: number): Promise<void>;
  getBattingTotals(playerId: number): Promise<BattingCounts>;
  /** One row per player, players without records included with zero counts. */
  sumBattingByPlayer(): Promise<PlayerBattingTotals[]>;
  listGameBatting(gameId: number): Promise<GameBattingLine[]>;

  getPitchingRecord(id: number): Promise<PitchingRecord | undefined>;
  insertPitchingRecord(input: PitchingRecordInput): Promise<PitchingRecord>;
  updatePitchingRecord(id: number, input: PitchingRecordInput): Promise<PitchingRecord | undefined>;
  deletePitchingRecord(id: number): Promise<boolean>;
  listPitchingHistory(playerId: number): Promise<PitchingHistoryEntry[]>;
  setPitchingSnapshot(recordId: number, snapshotEra: number): Promise<void>;
  getPitchingTotals(playerId: number): Promise<PitchingCounts>;
  sumPitchingByPlayer(): Promise<PlayerPitchingTotals[]>;
  listGamePitching(gameId: number): Promise<GamePitchingLine[]>;
}

export const EMPTY_BATTING_COUNTS: BattingCounts = {
  atBats: 0,
  hits: 0,
  homeRuns: 0,
  runsBattedIn: 0,
};

export const EMPTY_PITCHING_COUNTS: PitchingCounts = {
  inningsPitched: 0,
  earnedRuns: 0,
  strikeouts: 0,
  walks: 0,
};

/** Player ids in the order their rows are locked: distinct, ascending. */
export function lockOrder(playerIds: readonly number[]): number[] {
  return [...new Set(playerIds)].sort((a, b) => a - b);
}
