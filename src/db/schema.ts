// Database schema lives here.
// Record tables carry the stored running snapshot (avg / era) next to the raw counts.

import { index, integer, pgTable, real, serial, text, timestamp } from "drizzle-orm/pg-core";

export const players = pgTable("players", {
  id: serial("id").primaryKey(),
  name: text("name").notNull().unique(),
  position: text("position"),
  team: text("team"),
});

export const games = pgTable("games", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  // Free-form date string; compared as text when ordering records.
  date: text("date"),
  location: text("location"),
});

export const batting = pgTable(
  "batting",
  {
    id: serial("id").primaryKey(),
    playerId: integer("player_id")
      .notNull()
      .references(() => players.id, { onDelete: "cascade" }),
    gameId: integer("game_id").references(() => games.id, { onDelete: "set null" }),
    atBats: integer("ab").default(0).notNull(),
    hits: integer("hits").default(0).notNull(),
    homeRuns: integer("hr").default(0).notNull(),
    runsBattedIn: integer("rbi").default(0).notNull(),
    snapshotAverage: real("avg").default(0).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [
    index("idx_batting_player").on(table.playerId),
    index("idx_batting_game").on(table.gameId),
  ]
);

export const pitching = pgTable(
  "pitching",
  {
    id: serial("id").primaryKey(),
    playerId: integer("player_id")
      .notNull()
      .references(() => players.id, { onDelete: "cascade" }),
    gameId: integer("game_id").references(() => games.id, { onDelete: "set null" }),
    inningsPitched: real("innings").default(0).notNull(),
    earnedRuns: integer("er").default(0).notNull(),
    strikeouts: integer("so").default(0).notNull(),
    walks: integer("bb").default(0).notNull(),
    snapshotEra: real("era").default(0).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [
    index("idx_pitching_player").on(table.playerId),
    index("idx_pitching_game").on(table.gameId),
  ]
);
