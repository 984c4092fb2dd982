import { z } from "zod";
import { blankToNull } from "@/lib/stats/utils";

const countSchema = z.coerce.number().int().min(0).max(10_000);

// Form posts send "" for untouched optional fields.
const optionalTextSchema = z
  .string()
  .max(200)
  .nullish()
  .transform((value) => blankToNull(value));

const optionalIdSchema = z.preprocess(
  (value) => (value === "" || value === undefined ? null : value),
  z.coerce.number().int().positive().nullable()
);

export const idParamSchema = z.coerce.number().int().positive();

export const playerInputSchema = z.object({
  name: z.string().trim().min(1, "Player name is required.").max(120),
  position: optionalTextSchema,
  team: optionalTextSchema,
});

export const gameInputSchema = z.object({
  name: z.string().trim().min(1, "Game name is required.").max(200),
  date: optionalTextSchema,
  location: optionalTextSchema,
});

export const playerPatchSchema = playerInputSchema.partial();

export const gamePatchSchema = gameInputSchema.partial();

const inningsSchema = z.coerce.number().finite().min(0).max(1_000);

const battingFieldsSchema = z.object({
  playerId: idParamSchema,
  gameId: optionalIdSchema,
  atBats: countSchema,
  hits: countSchema,
  homeRuns: countSchema,
  runsBattedIn: countSchema,
});

const pitchingFieldsSchema = z.object({
  playerId: idParamSchema,
  gameId: optionalIdSchema,
  inningsPitched: inningsSchema,
  earnedRuns: countSchema,
  strikeouts: countSchema,
  walks: countSchema,
});

function hitsWithinAtBats(value: { atBats: number; hits: number }): boolean {
  return value.hits <= value.atBats;
}

const HITS_ISSUE = { message: "Hits cannot exceed at-bats.", path: ["hits"] };

export const battingRecordInputSchema = battingFieldsSchema
  .extend({
    atBats: countSchema.default(0),
    hits: countSchema.default(0),
    homeRuns: countSchema.default(0),
    runsBattedIn: countSchema.default(0),
  })
  .refine(hitsWithinAtBats, HITS_ISSUE);

/** A batting record after a patch was applied; the same rules as a new record. */
export const battingRecordSchema = battingFieldsSchema.refine(hitsWithinAtBats, HITS_ISSUE);

// PATCH bodies: omitted fields keep their stored value.
export const battingRecordPatchSchema = battingFieldsSchema.partial();

export const pitchingRecordInputSchema = pitchingFieldsSchema.extend({
  inningsPitched: inningsSchema.default(0),
  earnedRuns: countSchema.default(0),
  strikeouts: countSchema.default(0),
  walks: countSchema.default(0),
});

export const pitchingRecordPatchSchema = pitchingFieldsSchema.partial();

export const playerSearchQuerySchema = z.object({
  q: z.string().max(120).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export const leaderboardQuerySchema = z.object({
  game_id: idParamSchema.optional(),
});

export const adminSessionSchema = z.object({
  code: z.string().trim().min(1),
});
