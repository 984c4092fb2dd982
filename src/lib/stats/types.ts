export type Player = {
  id: number;
  name: string;
  position: string | null;
  team: string | null;
};

export type Game = {
  id: number;
  name: string;
  date: string | null;
  location: string | null;
};

export type PlayerInput = Omit<Player, "id">;
export type GameInput = Omit<Game, "id">;

export type BattingCounts = {
  atBats: number;
  hits: number;
  homeRuns: number;
  runsBattedIn: number;
};

export type PitchingCounts = {
  inningsPitched: number;
  earnedRuns: number;
  strikeouts: number;
  walks: number;
};

export type BattingRecordInput = BattingCounts & {
  playerId: number;
  gameId: number | null;
};

export type PitchingRecordInput = PitchingCounts & {
  playerId: number;
  gameId: number | null;
};

// Update payloads: a field left undefined keeps its stored value.
export type PlayerPatch = Partial<PlayerInput>;
export type GamePatch = Partial<GameInput>;
export type BattingRecordPatch = Partial<BattingRecordInput>;
export type PitchingRecordPatch = Partial<PitchingRecordInput>;

export type BattingRecord = BattingRecordInput & {
  id: number;
  snapshotAverage: number;
  createdAt: Date;
};

export type PitchingRecord = PitchingRecordInput & {
  id: number;
  snapshotEra: number;
  createdAt: Date;
};

/** A record joined with its (optional) game, as read for one player's history. */
export type BattingHistoryEntry = BattingRecord & {
  gameName: string | null;
  gameDate: string | null;
};

export type PitchingHistoryEntry = PitchingRecord & {
  gameName: string | null;
  gameDate: string | null;
};

export type PlayerBattingTotals = BattingCounts & {
  playerId: number;
  name: string;
  team: string | null;
};

export type PlayerPitchingTotals = PitchingCounts & {
  playerId: number;
  name: string;
  team: string | null;
};

export type GameBattingLine = PlayerBattingTotals & { recordId: number };
export type GamePitchingLine = PlayerPitchingTotals & { recordId: number };

export type BattingLeaderRow = PlayerBattingTotals & { average: number };
export type PitchingLeaderRow = PlayerPitchingTotals & { era: number };

export type GameBattingLeaderRow = GameBattingLine & { average: number };
export type GamePitchingLeaderRow = GamePitchingLine & { era: number };

export type BattingHistoryRow = BattingHistoryEntry & {
  effectiveDate: string;
  perGameAverage: number;
};

export type PitchingHistoryRow = PitchingHistoryEntry & {
  effectiveDate: string;
  perGameEra: number;
};

export type PlayerChartSeries = {
  batting: {
    labels: string[];
    perGameAverage: number[];
    snapshotAverage: number[];
    cumulativeHomeRuns: number[];
    cumulativeRunsBattedIn: number[];
  };
  pitching: {
    labels: string[];
    perGameEra: number[];
    snapshotEra: number[];
    cumulativeStrikeouts: number[];
    cumulativeInnings: number[];
  };
};

export type PlayerDetail = {
  player: Player;
  batting: BattingHistoryRow[];
  pitching: PitchingHistoryRow[];
  battingTotals: BattingCounts;
  pitchingTotals: PitchingCounts;
  average: number;
  era: number;
  charts: PlayerChartSeries;
};

export type GameDetail = {
  game: Game;
  batting: GameBattingLeaderRow[];
  pitching: GamePitchingLeaderRow[];
};

export type TeamSummary = {
  batting: BattingLeaderRow[];
  pitching: PitchingLeaderRow[];
};

export type Leaderboard = {
  gameId: number | null;
  games: Game[];
  batting: Array<BattingLeaderRow | GameBattingLeaderRow>;
  pitching: Array<PitchingLeaderRow | GamePitchingLeaderRow>;
};
