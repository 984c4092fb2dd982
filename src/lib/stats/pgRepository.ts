import { asc, desc, eq, ilike, inArray, sql } from "drizzle-orm";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import { batting, games, pitching, players } from "@/db/schema";
import { DuplicatePlayerError } from "@/lib/stats/errors";
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

// Covers both the pooled handle and a transaction handle.
type Executor = PgDatabase<NodePgQueryResultHKT>;

const playerColumns = {
  id: players.id,
  name: players.name,
  position: players.position,
  team: players.team,
};

const gameColumns = {
  id: games.id,
  name: games.name,
  date: games.date,
  location: games.location,
};

const battingColumns = {
  id: batting.id,
  playerId: batting.playerId,
  gameId: batting.gameId,
  atBats: batting.atBats,
  hits: batting.hits,
  homeRuns: batting.homeRuns,
  runsBattedIn: batting.runsBattedIn,
  snapshotAverage: batting.snapshotAverage,
  createdAt: batting.createdAt,
};

const pitchingColumns = {
  id: pitching.id,
  playerId: pitching.playerId,
  gameId: pitching.gameId,
  inningsPitched: pitching.inningsPitched,
  earnedRuns: pitching.earnedRuns,
  strikeouts: pitching.strikeouts,
  walks: pitching.walks,
  snapshotEra: pitching.snapshotEra,
  createdAt: pitching.createdAt,
};

// SUM() over integer columns comes back as bigint text from node-postgres.
const battingSums = {
  atBats: sql<number>`coalesce(sum(${batting.atBats}), 0)`.mapWith(Number),
  hits: sql<number>`coalesce(sum(${batting.hits}), 0)`.mapWith(Number),
  homeRuns: sql<number>`coalesce(sum(${batting.homeRuns}), 0)`.mapWith(Number),
  runsBattedIn: sql<number>`coalesce(sum(${batting.runsBattedIn}), 0)`.mapWith(Number),
};

const pitchingSums = {
  inningsPitched: sql<number>`coalesce(sum(${pitching.inningsPitched}), 0)`.mapWith(Number),
  earnedRuns: sql<number>`coalesce(sum(${pitching.earnedRuns}), 0)`.mapWith(Number),
  strikeouts: sql<number>`coalesce(sum(${pitching.strikeouts}), 0)`.mapWith(Number),
  walks: sql<number>`coalesce(sum(${pitching.walks}), 0)`.mapWith(Number),
};

const UNIQUE_VIOLATION = "23505";

/**
 * True for a Postgres unique_violation, whether node-postgres raised it
 * directly or drizzle wrapped it (the driver error is then the `cause`).
 */
export function isUniqueViolation(error: unknown): boolean {
  for (let current: unknown = error; current instanceof Error; current = current.cause) {
    if ("code" in current && current.code === UNIQUE_VIOLATION) return true;
  }
  return false;
}

function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

export class PgTeamStatsRepository implements TeamStatsRepository {
  constructor(
    private readonly db: Executor,
    private readonly inTransaction = false
  ) {}

  async transaction<T>(
    playerIds: readonly number[],
    fn: (repo: TeamStatsRepository) => Promise<T>
  ): Promise<T> {
    if (this.inTransaction) {
      await this.lockPlayers(playerIds);
      return fn(this);
    }

    return this.db.transaction(
      async (tx) => {
        const repo = new PgTeamStatsRepository(tx, true);
        await repo.lockPlayers(playerIds);
        return fn(repo);
      },
      { isolationLevel: "serializable" }
    );
  }

  // Row locks on the owning players serialize concurrent writers of the same history.
  private async lockPlayers(playerIds: readonly number[]): Promise<void> {
    const ids = lockOrder(playerIds);
    if (ids.length === 0) return;
    await this.db
      .select({ id: players.id })
      .from(players)
      .where(inArray(players.id, ids))
      .orderBy(asc(players.id))
      .for("update");
  }

  async searchPlayers(query: string | null, limit: number): Promise<Player[]> {
    const needle = query?.trim();
    return this.db
      .select(playerColumns)
      .from(players)
      .where(needle ? ilike(players.name, `%${escapeLikePattern(needle)}%`) : undefined)
      .orderBy(asc(players.name))
      .limit(limit);
  }

  async listPlayers(): Promise<Player[]> {
    return this.db.select(playerColumns).from(players).orderBy(asc(players.name));
  }

  async getPlayer(id: number): Promise<Player | undefined> {
    const rows = await this.db.select(playerColumns).from(players).where(eq(players.id, id)).limit(1);
    return rows[0];
  }

  async findPlayerByName(name: string): Promise<Player | undefined> {
    const rows = await this.db.select(playerColumns).from(players).where(eq(players.name, name)).limit(1);
    return rows[0];
  }

  // The name check in the service races with concurrent writers; the unique index decides.
  async insertPlayer(input: PlayerInput): Promise<Player> {
    try {
      const [row] = await this.db.insert(players).values(input).returning(playerColumns);
      if (!row) throw new Error("Player insert returned no row");
      return row;
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicatePlayerError(input.name);
      throw error;
    }
  }

  async updatePlayer(id: number, input: PlayerInput): Promise<Player | undefined> {
    try {
      const rows = await this.db.update(players).set(input).where(eq(players.id, id)).returning(playerColumns);
      return rows[0];
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicatePlayerError(input.name);
      throw error;
    }
  }

  async deletePlayer(id: number): Promise<boolean> {
    const rows = await this.db.delete(players).where(eq(players.id, id)).returning({ id: players.id });
    return rows.length > 0;
  }

  async listGames(): Promise<Game[]> {
    return this.db
      .select(gameColumns)
      .from(games)
      .orderBy(sql`${games.date} is null`, desc(games.date), desc(games.id));
  }

  async getGame(id: number): Promise<Game | undefined> {
    const rows = await this.db.select(gameColumns).from(games).where(eq(games.id, id)).limit(1);
    return rows[0];
  }

  async insertGame(input: GameInput): Promise<Game> {
    const [row] = await this.db.insert(games).values(input).returning(gameColumns);
    if (!row) throw new Error("Game insert returned no row");
    return row;
  }

  async updateGame(id: number, input: GameInput): Promise<Game | undefined> {
    const rows = await this.db.update(games).set(input).where(eq(games.id, id)).returning(gameColumns);
    return rows[0];
  }

  async deleteGame(id: number): Promise<boolean> {
    const rows = await this.db.delete(games).where(eq(games.id, id)).returning({ id: games.id });
    return rows.length > 0;
  }

  async listPlayerIdsForGame(gameId: number): Promise<number[]> {
    const battingRows = await this.db
      .selectDistinct({ playerId: batting.playerId })
      .from(batting)
      .where(eq(batting.gameId, gameId));
    const pitchingRows = await this.db
      .selectDistinct({ playerId: pitching.playerId })
      .from(pitching)
      .where(eq(pitching.gameId, gameId));
    const ids = new Set([...battingRows, ...pitchingRows].map((row) => row.playerId));
    return [...ids].sort((a, b) => a - b);
  }

  async getBattingRecord(id: number): Promise<BattingRecord | undefined> {
    const rows = await this.db.select(battingColumns).from(batting).where(eq(batting.id, id)).limit(1);
    return rows[0];
  }

  async insertBattingRecord(input: BattingRecordInput): Promise<BattingRecord> {
    const [row] = await this.db.insert(batting).values(input).returning(battingColumns);
    if (!row) throw new Error("Batting insert returned no row");
    return row;
  }

  async updateBattingRecord(id: number, input: BattingRecordInput): Promise<BattingRecord | undefined> {
    const rows = await this.db.update(batting).set(input).where(eq(batting.id, id)).returning(battingColumns);
    return rows[0];
  }

  async deleteBattingRecord(id: number): Promise<boolean> {
    const rows = await this.db.delete(batting).where(eq(batting.id, id)).returning({ id: batting.id });
    return rows.length > 0;
  }

  async listBattingHistory(playerId: number): Promise<BattingHistoryEntry[]> {
    return this.db
      .select({ ...battingColumns, gameName: games.name, gameDate: games.date })
      .from(batting)
      .leftJoin(games, eq(games.id, batting.gameId))
      .where(eq(batting.playerId, playerId));
  }

  async setBattingSnapshot(recordId: number, snapshotAverage: number): Promise<void> {
    await this.db.update(batting).set({ snapshotAverage }).where(eq(batting.id, recordId));
  }

  async getBattingTotals(playerId: number): Promise<BattingCounts> {
    const rows = await this.db.select(battingSums).from(batting).where(eq(batting.playerId, playerId));
    return rows[0] ?? { ...EMPTY_BATTING_COUNTS };
  }

  async sumBattingByPlayer(): Promise<PlayerBattingTotals[]> {
    return this.db
      .select({ playerId: players.id, name: players.name, team: players.team, ...battingSums })
      .from(players)
      .leftJoin(batting, eq(batting.playerId, players.id))
      .groupBy(players.id);
  }

  async listGameBatting(gameId: number): Promise<GameBattingLine[]> {
    return this.db
      .select({
        recordId: batting.id,
        playerId: players.id,
        name: players.name,
        team: players.team,
        atBats: batting.atBats,
        hits: batting.hits,
        homeRuns: batting.homeRuns,
        runsBattedIn: batting.runsBattedIn,
      })
      .from(batting)
      .innerJoin(players, eq(players.id, batting.playerId))
      .where(eq(batting.gameId, gameId));
  }

  async getPitchingRecord(id: number): Promise<PitchingRecord | undefined> {
    const rows = await this.db.select(pitchingColumns).from(pitching).where(eq(pitching.id, id)).limit(1);
    return rows[0];
  }

  async insertPitchingRecord(input: PitchingRecordInput): Promise<PitchingRecord> {
    const [row] = await this.db.insert(pitching).values(input).returning(pitchingColumns);
    if (!row) throw new Error("Pitching insert returned no row");
    return row;
  }

  async updatePitchingRecord(id: number, input: PitchingRecordInput): Promise<PitchingRecord | undefined> {
    const rows = await this.db
      .update(pitching)
      .set(input)
      .where(eq(pitching.id, id))
      .returning(pitchingColumns);
    return rows[0];
  }

  async deletePitchingRecord(id: number): Promise<boolean> {
    const rows = await this.db.delete(pitching).where(eq(pitching.id, id)).returning({ id: pitching.id });
    return rows.length > 0;
  }

  async listPitchingHistory(playerId: number): Promise<PitchingHistoryEntry[]> {
    return this.db
      .select({ ...pitchingColumns, gameName: games.name, gameDate: games.date })
      .from(pitching)
      .leftJoin(games, eq(games.id, pitching.gameId))
      .where(eq(pitching.playerId, playerId));
  }

  async setPitchingSnapshot(recordId: number, snapshotEra: number): Promise<void> {
    await this.db.update(pitching).set({ snapshotEra }).where(eq(pitching.id, recordId));
  }

  async getPitchingTotals(playerId: number): Promise<PitchingCounts> {
    const rows = await this.db.select(pitchingSums).from(pitching).where(eq(pitching.playerId, playerId));
    return rows[0] ?? { ...EMPTY_PITCHING_COUNTS };
  }

  async sumPitchingByPlayer(): Promise<PlayerPitchingTotals[]> {
    return this.db
      .select({ playerId: players.id, name: players.name, team: players.team, ...pitchingSums })
      .from(players)
      .leftJoin(pitching, eq(pitching.playerId, players.id))
      .groupBy(players.id);
  }

  async listGamePitching(gameId: number): Promise<GamePitchingLine[]> {
    return this.db
      .select({
        recordId: pitching.id,
        playerId: players.id,
        name: players.name,
        team: players.team,
        inningsPitched: pitching.inningsPitched,
        earnedRuns: pitching.earnedRuns,
        strikeouts: pitching.strikeouts,
        walks: pitching.walks,
      })
      .from(pitching)
      .innerJoin(players, eq(players.id, pitching.playerId))
      .where(eq(pitching.gameId, gameId));
  }
}
