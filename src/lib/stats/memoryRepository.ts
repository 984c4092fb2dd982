import {
  EMPTY_BATTING_COUNTS,
  EMPTY_PITCHING_COUNTS,
  lockOrder,
  type TeamStatsRepository,
} from "@/lib/stats/repository";
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

type MemoryState = {
  players: Map<number, Player>;
  games: Map<number, Game>;
  batting: Map<number, BattingRecord>;
  pitching: Map<number, PitchingRecord>;
  nextId: { player: number; game: number; batting: number; pitching: number };
};

export type MemoryRepositoryOptions = {
  /** Source of `createdAt` for new records. */
  clock?: () => Date;
  /** Called with the player ids each `transaction()` call locks, in lock order. */
  onLock?: (playerIds: number[]) => void;
};

function emptyState(): MemoryState {
  return {
    players: new Map(),
    games: new Map(),
    batting: new Map(),
    pitching: new Map(),
    nextId: { player: 1, game: 1, batting: 1, pitching: 1 },
  };
}

function byGameDateDesc(a: Game, b: Game): number {
  if (a.date === null && b.date !== null) return 1;
  if (a.date !== null && b.date === null) return -1;
  if (a.date !== null && b.date !== null && a.date !== b.date) return a.date < b.date ? 1 : -1;
  return b.id - a.id;
}

function addBatting(totals: BattingCounts, record: BattingRecord): BattingCounts {
  return {
    atBats: totals.atBats + record.atBats,
    hits: totals.hits + record.hits,
    homeRuns: totals.homeRuns + record.homeRuns,
    runsBattedIn: totals.runsBattedIn + record.runsBattedIn,
  };
}

function addPitching(totals: PitchingCounts, record: PitchingRecord): PitchingCounts {
  return {
    inningsPitched: totals.inningsPitched + record.inningsPitched,
    earnedRuns: totals.earnedRuns + record.earnedRuns,
    strikeouts: totals.strikeouts + record.strikeouts,
    walks: totals.walks + record.walks,
  };
}

/**
 * In-process store used when DATABASE_URL is not configured, and by tests.
 *
 * Transactions run one at a time. Each works on a copy of the state that
 * replaces the live state only when the callback resolves.
 */
export class MemoryTeamStatsRepository implements TeamStatsRepository {
  private state: MemoryState;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly options: MemoryRepositoryOptions;
  private readonly clock: () => Date;
  private readonly bound: boolean;

  constructor(options: MemoryRepositoryOptions = {}, state?: MemoryState) {
    this.options = options;
    this.clock = options.clock ?? (() => new Date());
    this.state = state ?? emptyState();
    this.bound = state !== undefined;
  }

  async transaction<T>(
    playerIds: readonly number[],
    fn: (repo: TeamStatsRepository) => Promise<T>
  ): Promise<T> {
    if (this.bound) {
      this.recordLock(playerIds);
      return fn(this);
    }

    const run = async () => {
      this.recordLock(playerIds);
      const draft = new MemoryTeamStatsRepository(this.options, structuredClone(this.state));
      const result = await fn(draft);
      this.state = draft.state;
      return result;
    };
    const next = this.queue.then(run, run);
    this.queue = next.catch(() => undefined);
    return next;
  }

  // Transactions already run one at a time, so locks are only reported.
  private recordLock(playerIds: readonly number[]): void {
    const ids = lockOrder(playerIds);
    if (ids.length > 0) this.options.onLock?.(ids);
  }

  async searchPlayers(query: string | null, limit: number): Promise<Player[]> {
    const needle = query?.trim().toLowerCase() ?? "";
    return [...this.state.players.values()]
      .filter((player) => !needle || player.name.toLowerCase().includes(needle))
      .sort((a, b) => a.name.localeCompare(b.name))
      .slice(0, limit)
      .map((player) => ({ ...player }));
  }

  async listPlayers(): Promise<Player[]> {
    return this.searchPlayers(null, Number.POSITIVE_INFINITY);
  }

  async getPlayer(id: number): Promise<Player | undefined> {
    const player = this.state.players.get(id);
    return player ? { ...player } : undefined;
  }

  async findPlayerByName(name: string): Promise<Player | undefined> {
    for (const player of this.state.players.values()) {
      if (player.name === name) return { ...player };
    }
    return undefined;
  }

  async insertPlayer(input: PlayerInput): Promise<Player> {
    const player: Player = { id: this.state.nextId.player++, ...input };
    this.state.players.set(player.id, player);
    return { ...player };
  }

  async updatePlayer(id: number, input: PlayerInput): Promise<Player | undefined> {
    if (!this.state.players.has(id)) return undefined;
    const player: Player = { id, ...input };
    this.state.players.set(id, player);
    return { ...player };
  }

  async deletePlayer(id: number): Promise<boolean> {
    if (!this.state.players.delete(id)) return false;
    for (const [recordId, record] of this.state.batting) {
      if (record.playerId === id) this.state.batting.delete(recordId);
    }
    for (const [recordId, record] of this.state.pitching) {
      if (record.playerId === id) this.state.pitching.delete(recordId);
    }
    return true;
  }

  async listGames(): Promise<Game[]> {
    return [...this.state.games.values()].sort(byGameDateDesc).map((game) => ({ ...game }));
  }

  async getGame(id: number): Promise<Game | undefined> {
    const game = this.state.games.get(id);
    return game ? { ...game } : undefined;
  }

  async insertGame(input: GameInput): Promise<Game> {
    const game: Game = { id: this.state.nextId.game++, ...input };
    this.state.games.set(game.id, game);
    return { ...game };
  }

  async updateGame(id: number, input: GameInput): Promise<Game | undefined> {
    if (!this.state.games.has(id)) return undefined;
    const game: Game = { id, ...input };
    this.state.games.set(id, game);
    return { ...game };
  }

  async deleteGame(id: number): Promise<boolean> {
    if (!this.state.games.delete(id)) return false;
    for (const record of this.state.batting.values()) {
      if (record.gameId === id) record.gameId = null;
    }
    for (const record of this.state.pitching.values()) {
      if (record.gameId === id) record.gameId = null;
    }
    return true;
  }

  async listPlayerIdsForGame(gameId: number): Promise<number[]> {
    const ids = new Set<number>();
    for (const record of this.state.batting.values()) {
      if (record.gameId === gameId) ids.add(record.playerId);
    }
    for (const record of this.state.pitching.values()) {
      if (record.gameId === gameId) ids.add(record.playerId);
    }
    return [...ids].sort((a, b) => a - b);
  }

  async getBattingRecord(id: number): Promise<BattingRecord | undefined> {
    const record = this.state.batting.get(id);
    return record ? { ...record } : undefined;
  }

  async insertBattingRecord(input: BattingRecordInput): Promise<BattingRecord> {
    const record: BattingRecord = {
      id: this.state.nextId.batting++,
      ...input,
      snapshotAverage: 0,
      createdAt: this.clock(),
    };
    this.state.batting.set(record.id, record);
    return { ...record };
  }

  async updateBattingRecord(id: number, input: BattingRecordInput): Promise<BattingRecord | undefined> {
    const existing = this.state.batting.get(id);
    if (!existing) return undefined;
    const record: BattingRecord = { ...existing, ...input };
    this.state.batting.set(id, record);
    return { ...record };
  }

  async deleteBattingRecord(id: number): Promise<boolean> {
    return this.state.batting.delete(id);
  }

  async listBattingHistory(playerId: number): Promise<BattingHistoryEntry[]> {
    return [...this.state.batting.values()]
      .filter((record) => record.playerId === playerId)
      .map((record) => {
        const game = record.gameId === null ? undefined : this.state.games.get(record.gameId);
        return { ...record, gameName: game?.name ?? null, gameDate: game?.date ?? null };
      });
  }

  async setBattingSnapshot(recordId: number, snapshotAverage: number): Promise<void> {
    const record = this.state.batting.get(recordId);
    if (record) record.snapshotAverage = snapshotAverage;
  }

  async getBattingTotals(playerId: number): Promise<BattingCounts> {
    let totals = { ...EMPTY_BATTING_COUNTS };
    for (const record of this.state.batting.values()) {
      if (record.playerId === playerId) totals = addBatting(totals, record);
    }
    return totals;
  }

  async sumBattingByPlayer(): Promise<PlayerBattingTotals[]> {
    return Promise.all(
      [...this.state.players.values()].map(async (player) => ({
        playerId: player.id,
        name: player.name,
        team: player.team,
        ...(await this.getBattingTotals(player.id)),
      }))
    );
  }

  async listGameBatting(gameId: number): Promise<GameBattingLine[]> {
    const lines: GameBattingLine[] = [];
    for (const record of this.state.batting.values()) {
      const player = this.state.players.get(record.playerId);
      if (record.gameId !== gameId || !player) continue;
      lines.push({
        recordId: record.id,
        playerId: player.id,
        name: player.name,
        team: player.team,
        atBats: record.atBats,
        hits: record.hits,
        homeRuns: record.homeRuns,
        runsBattedIn: record.runsBattedIn,
      });
    }
    return lines;
  }

  async getPitchingRecord(id: number): Promise<PitchingRecord | undefined> {
    const record = this.state.pitching.get(id);
    return record ? { ...record } : undefined;
  }

  async insertPitchingRecord(input: PitchingRecordInput): Promise<PitchingRecord> {
    const record: PitchingRecord = {
      id: this.state.nextId.pitching++,
      ...input,
      snapshotEra: 0,
      createdAt: this.clock(),
    };
    this.state.pitching.set(record.id, record);
    return { ...record };
  }

  async updatePitchingRecord(id: number, input: PitchingRecordInput): Promise<PitchingRecord | undefined> {
    const existing = this.state.pitching.get(id);
    if (!existing) return undefined;
    const record: PitchingRecord = { ...existing, ...input };
    this.state.pitching.set(id, record);
    return { ...record };
  }

  async deletePitchingRecord(id: number): Promise<boolean> {
    return this.state.pitching.delete(id);
  }

  async listPitchingHistory(playerId: number): Promise<PitchingHistoryEntry[]> {
    return [...this.state.pitching.values()]
      .filter((record) => record.playerId === playerId)
      .map((record) => {
        const game = record.gameId === null ? undefined : this.state.games.get(record.gameId);
        return { ...record, gameName: game?.name ?? null, gameDate: game?.date ?? null };
      });
  }

  async setPitchingSnapshot(recordId: number, snapshotEra: number): Promise<void> {
    const record = this.state.pitching.get(recordId);
    if (record) record.snapshotEra = snapshotEra;
  }

  async getPitchingTotals(playerId: number): Promise<PitchingCounts> {
    let totals = { ...EMPTY_PITCHING_COUNTS };
    for (const record of this.state.pitching.values()) {
      if (record.playerId === playerId) totals = addPitching(totals, record);
    }
    return totals;
  }

  async sumPitchingByPlayer(): Promise<PlayerPitchingTotals[]> {
    return Promise.all(
      [...this.state.players.values()].map(async (player) => ({
        playerId: player.id,
        name: player.name,
        team: player.team,
        ...(await this.getPitchingTotals(player.id)),
      }))
    );
  }

  async listGamePitching(gameId: number): Promise<GamePitchingLine[]> {
    const lines: GamePitchingLine[] = [];
    for (const record of this.state.pitching.values()) {
      const player = this.state.players.get(record.playerId);
      if (record.gameId !== gameId || !player) continue;
      lines.push({
        recordId: record.id,
        playerId: player.id,
        name: player.name,
        team: player.team,
        inningsPitched: record.inningsPitched,
        earnedRuns: record.earnedRuns,
        strikeouts: record.strikeouts,
        walks: record.walks,
      });
    }
    return lines;
  }
}
