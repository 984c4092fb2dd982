import assert from "node:assert/strict";

// env.ts reads these when first imported, so route modules load after they are set.
process.env.ADMIN_CODE = "test-admin-code";
delete process.env.DATABASE_URL;

const ADMIN_HEADERS = { "content-type": "application/json", "x-admin-code": "test-admin-code" };

type ErrorBody = { error: string; message: string; kind?: string; id?: number; issues?: Array<{ path: unknown[] }> };
type DataBody<T> = { data: T };

function jsonRequest(path: string, method: string, body: unknown, headers: Record<string, string> = ADMIN_HEADERS) {
  return new Request(`http://localhost${path}`, {
    method,
    headers,
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

function getRequest(path: string) {
  return new Request(`http://localhost${path}`);
}

function params<T>(value: T) {
  return { params: Promise.resolve(value) };
}

async function readJson<T>(res: Response): Promise<T> {
  return (await res.json()) as T;
}

async function main() {
  const { setTeamStatsRepository } = await import("@/lib/stats/store");
  const { MemoryTeamStatsRepository } = await import("@/lib/stats/memoryRepository");
  const playersRoute = await import("@/app/api/players/route");
  const playerRoute = await import("@/app/api/players/[playerId]/route");
  const gamesRoute = await import("@/app/api/games/route");
  const gameRoute = await import("@/app/api/games/[gameId]/route");
  const battingRoute = await import("@/app/api/batting/route");
  const battingRecordRoute = await import("@/app/api/batting/[recordId]/route");
  const pitchingRoute = await import("@/app/api/pitching/route");
  const leaderboardRoute = await import("@/app/api/leaderboard/route");
  const sessionRoute = await import("@/app/api/admin/session/route");
  const healthRoute = await import("@/app/api/healthz/route");

  setTeamStatsRepository(new MemoryTeamStatsRepository({ clock: () => new Date("2024-06-01T12:00:00Z") }));

  const health = await healthRoute.GET();
  assert.equal(health.status, 200);
  assert.equal(await health.text(), "ok");

  // Admin gate
  const anonymous = await playersRoute.POST(
    jsonRequest("/api/players", "POST", { name: "Alice" }, { "content-type": "application/json" })
  );
  assert.equal(anonymous.status, 401);
  assert.equal(anonymous.headers.get("www-authenticate"), 'Bearer realm="team-stats-admin"');
  assert.equal((await readJson<ErrorBody>(anonymous)).error, "unauthorized");

  const wrongCode = await playersRoute.POST(
    jsonRequest("/api/players", "POST", { name: "Alice" }, { "x-admin-code": "not-the-code" })
  );
  assert.equal(wrongCode.status, 401);

  const badJson = await playersRoute.POST(jsonRequest("/api/players", "POST", "{"));
  assert.equal(badJson.status, 400);
  assert.equal((await readJson<ErrorBody>(badJson)).error, "invalid_json");

  const blankName = await playersRoute.POST(jsonRequest("/api/players", "POST", { name: "   " }));
  assert.equal(blankName.status, 400);
  assert.equal((await readJson<ErrorBody>(blankName)).error, "invalid_request");

  // Players and games
  const created = await playersRoute.POST(
    jsonRequest("/api/players", "POST", { name: " Alice ", position: "", team: "Blue" })
  );
  assert.equal(created.status, 201);
  assert.deepEqual((await readJson<DataBody<unknown>>(created)).data, {
    id: 1,
    name: "Alice",
    position: null,
    team: "Blue",
  });

  const duplicate = await playersRoute.POST(
    jsonRequest("/api/players", "POST", { name: "Alice" }, { authorization: "Bearer test-admin-code" })
  );
  assert.equal(duplicate.status, 409);
  assert.equal((await readJson<ErrorBody>(duplicate)).error, "duplicate_player");

  const opener = await gamesRoute.POST(
    jsonRequest("/api/games", "POST", { name: "Opener", date: "2024-04-01", location: "Home" })
  );
  assert.equal(opener.status, 201);
  assert.deepEqual((await readJson<DataBody<unknown>>(opener)).data, {
    id: 1,
    name: "Opener",
    date: "2024-04-01",
    location: "Home",
  });
  const earlier = await gamesRoute.POST(jsonRequest("/api/games", "POST", { name: "Scrimmage", date: "2024-03-25" }));
  assert.equal(earlier.status, 201);

  // Batting: form-style string values are coerced.
  const first = await battingRoute.POST(
    jsonRequest("/api/batting", "POST", { playerId: "1", gameId: "1", atBats: "10", hits: "3" })
  );
  assert.equal(first.status, 201);
  const firstRecord = (await readJson<DataBody<{ id: number; homeRuns: number; snapshotAverage: number }>>(first)).data;
  assert.equal(firstRecord.id, 1);
  assert.equal(firstRecord.homeRuns, 0);
  assert.equal(firstRecord.snapshotAverage, 0.3);

  const tooManyHits = await battingRoute.POST(
    jsonRequest("/api/batting", "POST", { playerId: 1, gameId: 1, atBats: 2, hits: 3 })
  );
  assert.equal(tooManyHits.status, 400);
  assert.deepEqual((await readJson<ErrorBody>(tooManyHits)).issues?.[0]?.path, ["hits"]);

  const missingPlayer = await battingRoute.POST(
    jsonRequest("/api/batting", "POST", { playerId: 99, gameId: "", atBats: 1, hits: 1 })
  );
  assert.equal(missingPlayer.status, 404);
  assert.deepEqual(await readJson<ErrorBody>(missingPlayer), {
    error: "not_found",
    message: "player 99 not found",
    kind: "player",
    id: 99,
  });

  // Backfilled earlier game corrects the later snapshot.
  const backfill = await battingRoute.POST(
    jsonRequest("/api/batting", "POST", { playerId: 1, gameId: 2, atBats: 10, hits: 5 })
  );
  assert.equal(backfill.status, 201);
  assert.equal((await readJson<DataBody<{ snapshotAverage: number }>>(backfill)).data.snapshotAverage, 0.5);

  type DetailBody = DataBody<{
    average: number;
    batting: Array<{ id: number; effectiveDate: string; snapshotAverage: number }>;
  }>;
  let detail = await playerRoute.GET(getRequest("/api/players/1"), params({ playerId: "1" }));
  assert.equal(detail.status, 200);
  let body = await readJson<DetailBody>(detail);
  assert.equal(body.data.average, 0.4);
  assert.deepEqual(
    body.data.batting.map((row) => [row.id, row.effectiveDate, row.snapshotAverage]),
    [
      [2, "2024-03-25", 0.5],
      [1, "2024-04-01", 0.4],
    ]
  );

  const pitching = await pitchingRoute.POST(
    jsonRequest("/api/pitching", "POST", { playerId: 1, gameId: 1, inningsPitched: "6", earnedRuns: 2 })
  );
  assert.equal(pitching.status, 201);
  assert.equal((await readJson<DataBody<{ snapshotEra: number }>>(pitching)).data.snapshotEra, 3);

  const search = await playersRoute.GET(getRequest("/api/players?q=ali"));
  assert.deepEqual(
    (await readJson<DataBody<Array<{ name: string }>>>(search)).data.map((player) => player.name),
    ["Alice"]
  );

  const badId = await playerRoute.GET(getRequest("/api/players/abc"), params({ playerId: "abc" }));
  assert.equal(badId.status, 400);
  const unknown = await playerRoute.GET(getRequest("/api/players/99"), params({ playerId: "99" }));
  assert.equal(unknown.status, 404);

  // Leaderboard
  type LeaderboardBody = {
    gameId: number | null;
    batting: Array<{ playerId: number; hits: number; average: number }>;
    pitching: Array<{ playerId: number; era: number }>;
  };
  const overall = await readJson<LeaderboardBody>(await leaderboardRoute.GET(getRequest("/api/leaderboard")));
  assert.equal(overall.gameId, null);
  assert.deepEqual(
    overall.batting.map((row) => [row.playerId, row.average]),
    [[1, 0.4]]
  );
  assert.deepEqual(
    overall.pitching.map((row) => [row.playerId, row.era]),
    [[1, 3]]
  );

  const perGame = await readJson<LeaderboardBody>(
    await leaderboardRoute.GET(getRequest("/api/leaderboard?game_id=2"))
  );
  assert.equal(perGame.gameId, 2);
  assert.deepEqual(
    perGame.batting.map((row) => [row.playerId, row.hits, row.average]),
    [[1, 5, 0.5]]
  );
  assert.deepEqual(perGame.pitching, []);

  const badGame = await leaderboardRoute.GET(getRequest("/api/leaderboard?game_id=x"));
  assert.equal(badGame.status, 400);

  // Deleting the backfilled record reverts the later snapshot.
  const deleted = await battingRecordRoute.DELETE(
    jsonRequest("/api/batting/2", "DELETE", {}),
    params({ recordId: "2" })
  );
  assert.equal(deleted.status, 200);
  assert.deepEqual(await readJson<unknown>(deleted), { deleted: true, id: 2 });

  detail = await playerRoute.GET(getRequest("/api/players/1"), params({ playerId: "1" }));
  body = await readJson<DetailBody>(detail);
  assert.deepEqual(
    body.data.batting.map((row) => [row.id, row.snapshotAverage]),
    [[1, 0.3]]
  );

  const missingRecord = await battingRecordRoute.DELETE(
    jsonRequest("/api/batting/2", "DELETE", {}),
    params({ recordId: "2" })
  );
  assert.equal(missingRecord.status, 404);

  // PATCH bodies only change the fields they carry.
  const resized = await battingRecordRoute.PATCH(
    jsonRequest("/api/batting/1", "PATCH", { atBats: "12" }),
    params({ recordId: "1" })
  );
  assert.equal(resized.status, 200);
  const resizedRecord = (
    await readJson<DataBody<{ gameId: number | null; atBats: number; hits: number; snapshotAverage: number }>>(resized)
  ).data;
  assert.deepEqual(
    [resizedRecord.gameId, resizedRecord.atBats, resizedRecord.hits, resizedRecord.snapshotAverage],
    [1, 12, 3, 0.25]
  );

  const hitsOverAtBats = await battingRecordRoute.PATCH(
    jsonRequest("/api/batting/1", "PATCH", { hits: 20 }),
    params({ recordId: "1" })
  );
  assert.equal(hitsOverAtBats.status, 400);
  assert.deepEqual((await readJson<ErrorBody>(hitsOverAtBats)).issues?.[0]?.path, ["hits"]);

  const renamed = await playerRoute.PATCH(
    jsonRequest("/api/players/1", "PATCH", { name: "Alicia", position: "SS" }),
    params({ playerId: "1" })
  );
  assert.equal(renamed.status, 200);
  assert.deepEqual((await readJson<DataBody<unknown>>(renamed)).data, {
    id: 1,
    name: "Alicia",
    position: "SS",
    team: "Blue",
  });

  const gameDeleted = await gameRoute.DELETE(jsonRequest("/api/games/1", "DELETE", {}), params({ gameId: "1" }));
  assert.equal(gameDeleted.status, 200);
  const gameGone = await gameRoute.GET(getRequest("/api/games/1"), params({ gameId: "1" }));
  assert.equal(gameGone.status, 404);

  // Admin session check
  const sessionInfo = await sessionRoute.GET();
  assert.deepEqual(await readJson<unknown>(sessionInfo), { configured: true });

  const accepted = await sessionRoute.POST(
    jsonRequest("/api/admin/session", "POST", { code: "test-admin-code" }, { "content-type": "application/json" })
  );
  assert.equal(accepted.status, 200);
  assert.deepEqual(await readJson<unknown>(accepted), { valid: true });

  const rejected = await sessionRoute.POST(
    jsonRequest("/api/admin/session", "POST", { code: "wrong-code" }, { "content-type": "application/json" })
  );
  assert.equal(rejected.status, 401);
  assert.deepEqual(await readJson<unknown>(rejected), { valid: false });

  const empty = await sessionRoute.POST(
    jsonRequest("/api/admin/session", "POST", {}, { "content-type": "application/json" })
  );
  assert.equal(empty.status, 400);

  console.log("api route tests passed");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
