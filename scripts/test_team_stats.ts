import assert from "node:assert/strict";
import { ZodError } from "zod";
import { DuplicatePlayerError, RecordNotFoundError, type RecordKind } from "@/lib/stats/errors";
import { MemoryTeamStatsRepository } from "@/lib/stats/memoryRepository";
import { isUniqueViolation } from "@/lib/stats/pgRepository";
import { computeBattingSnapshots } from "@/lib/stats/snapshots";
import {
  createBattingRecord,
  createGame,
  createPitchingRecord,
  createPlayer,
  deleteBattingRecord,
  deleteGame,
  deletePitchingRecord,
  deletePlayer,
  getGameDetail,
  getLeaderboard,
  getPlayerDetail,
  getTeamSummary,
  searchPlayers,
  updateBattingRecord,
  updateGame,
  updatePitchingRecord,
  updatePlayer,
} from "@/lib/stats/teamStats";

function newRepo(onLock?: (playerIds: number[]) => void) {
  return new MemoryTeamStatsRepository({ clock: () => new Date("2024-06-01T12:00:00Z"), onLock });
}

function notFound(kind: RecordKind, id: number) {
  return (err: unknown) => err instanceof RecordNotFoundError && err.kind === kind && err.id === id;
}

function batting(playerId: number, gameId: number | null, atBats: number, hits: number, homeRuns = 0, runsBattedIn = 0) {
  return { playerId, gameId, atBats, hits, homeRuns, runsBattedIn };
}

async function runPlayerTests() {
  const repo = newRepo();
  const alice = await createPlayer(repo, { name: "Alice", position: "C", team: "Blue" });
  const bob = await createPlayer(repo, { name: "Bob", position: null, team: "Red" });
  await createPlayer(repo, { name: "Alicia", position: null, team: null });

  await assert.rejects(createPlayer(repo, { name: "Alice", position: null, team: null }), DuplicatePlayerError);
  await assert.rejects(updatePlayer(repo, bob.id, { name: "Alice", position: null, team: null }), DuplicatePlayerError);
  await assert.rejects(updatePlayer(repo, 99, { name: "Nobody", position: null, team: null }), notFound("player", 99));

  const renamed = await updatePlayer(repo, alice.id, { name: "Alice", position: "1B", team: "Blue" });
  assert.deepEqual(renamed, { id: alice.id, name: "Alice", position: "1B", team: "Blue" });

  const found = await searchPlayers(repo, { q: "ALI" });
  assert.deepEqual(
    found.map((player) => player.name),
    ["Alice", "Alicia"]
  );
  assert.equal((await searchPlayers(repo, { limit: 1 })).length, 1);

  await createBattingRecord(repo, batting(bob.id, null, 3, 1));
  await deletePlayer(repo, bob.id);
  await assert.rejects(getPlayerDetail(repo, bob.id), notFound("player", bob.id));
  assert.equal(await repo.getBattingRecord(1), undefined);
  await assert.rejects(deletePlayer(repo, bob.id), notFound("player", bob.id));
}

async function runRecordMoveAndGameTests() {
  const repo = newRepo();
  const alice = await createPlayer(repo, { name: "Alice", position: null, team: null });
  const bob = await createPlayer(repo, { name: "Bob", position: null, team: null });
  const opener = await createGame(repo, { name: "Opener", date: "2024-04-01", location: "Home" });
  const rematch = await createGame(repo, { name: "Rematch", date: "2024-04-10", location: null });

  const r1 = await createBattingRecord(repo, batting(alice.id, opener.id, 10, 3, 1, 2));
  assert.equal(r1.snapshotAverage, 0.3);
  const r2 = await createBattingRecord(repo, batting(alice.id, rematch.id, 10, 5, 0, 1));
  assert.equal(r2.snapshotAverage, 0.4);
  const r3 = await createBattingRecord(repo, batting(bob.id, rematch.id, 4, 2));
  assert.equal(r3.snapshotAverage, 0.5);

  await assert.rejects(createBattingRecord(repo, batting(99, null, 1, 1)), notFound("player", 99));
  await assert.rejects(createBattingRecord(repo, batting(alice.id, 99, 1, 1)), notFound("game", 99));

  // Moving a record recomputes the player who lost it and the one who gained it.
  const moved = await updateBattingRecord(repo, r1.id, batting(bob.id, opener.id, 10, 3, 1, 2));
  assert.equal(moved.playerId, bob.id);
  assert.equal(moved.snapshotAverage, 0.3);

  let aliceDetail = await getPlayerDetail(repo, alice.id);
  assert.deepEqual(
    aliceDetail.batting.map((row) => [row.id, row.snapshotAverage]),
    [[r2.id, 0.5]]
  );
  assert.equal(aliceDetail.average, 0.5);

  let bobDetail = await getPlayerDetail(repo, bob.id);
  assert.deepEqual(
    bobDetail.batting.map((row) => [row.id, row.snapshotAverage]),
    [
      [r1.id, 0.3],
      [r3.id, 0.357],
    ]
  );
  assert.equal(bobDetail.average, 0.357);
  assert.deepEqual(bobDetail.battingTotals, { atBats: 14, hits: 5, homeRuns: 1, runsBattedIn: 2 });

  await assert.rejects(updateBattingRecord(repo, 99, batting(bob.id, null, 1, 1)), notFound("batting", 99));

  // Moving the rematch before the opener reorders Bob's history.
  await updateGame(repo, rematch.id, { name: "Rematch", date: "2024-03-01", location: null });
  bobDetail = await getPlayerDetail(repo, bob.id);
  assert.deepEqual(
    bobDetail.batting.map((row) => [row.id, row.effectiveDate, row.perGameAverage, row.snapshotAverage]),
    [
      [r3.id, "2024-03-01", 0.5, 0.5],
      [r1.id, "2024-04-01", 0.3, 0.357],
    ]
  );
  assert.deepEqual(bobDetail.charts.batting.labels, ["2024-03-01", "2024-04-01"]);
  assert.deepEqual(bobDetail.charts.batting.cumulativeHomeRuns, [0, 1]);
  assert.deepEqual(bobDetail.charts.batting.cumulativeRunsBattedIn, [0, 2]);

  // Deleting the game keeps the records; they fall back to their creation day.
  await deleteGame(repo, rematch.id);
  await assert.rejects(getGameDetail(repo, rematch.id), notFound("game", rematch.id));
  await assert.rejects(deleteGame(repo, rematch.id), notFound("game", rematch.id));

  bobDetail = await getPlayerDetail(repo, bob.id);
  assert.deepEqual(
    bobDetail.batting.map((row) => [row.id, row.gameId, row.effectiveDate, row.snapshotAverage]),
    [
      [r1.id, opener.id, "2024-04-01", 0.3],
      [r3.id, null, "2024-06-01", 0.357],
    ]
  );
  assert.deepEqual(bobDetail.charts.batting.labels, ["2024-04-01", "2024-06-01"]);

  aliceDetail = await getPlayerDetail(repo, alice.id);
  assert.deepEqual(
    aliceDetail.batting.map((row) => [row.gameId, row.snapshotAverage]),
    [[null, 0.5]]
  );

  await deleteBattingRecord(repo, r1.id);
  bobDetail = await getPlayerDetail(repo, bob.id);
  assert.deepEqual(
    bobDetail.batting.map((row) => [row.id, row.snapshotAverage]),
    [[r3.id, 0.5]]
  );
  await assert.rejects(deleteBattingRecord(repo, r1.id), notFound("batting", r1.id));
}

async function runPitchingTests() {
  const repo = newRepo();
  const alice = await createPlayer(repo, { name: "Alice", position: "P", team: null });
  const bob = await createPlayer(repo, { name: "Bob", position: "P", team: null });
  const game = await createGame(repo, { name: "Opener", date: "2024-04-01", location: null });

  const record = await createPitchingRecord(repo, {
    playerId: alice.id,
    gameId: game.id,
    inningsPitched: 6,
    earnedRuns: 2,
    strikeouts: 7,
    walks: 1,
  });
  assert.equal(record.snapshotEra, 3);

  const moved = await updatePitchingRecord(repo, record.id, {
    playerId: bob.id,
    gameId: game.id,
    inningsPitched: 4.5,
    earnedRuns: 2,
    strikeouts: 7,
    walks: 1,
  });
  assert.equal(moved.snapshotEra, 4);

  const aliceDetail = await getPlayerDetail(repo, alice.id);
  assert.equal(aliceDetail.pitching.length, 0);
  assert.equal(aliceDetail.era, 0);

  const bobDetail = await getPlayerDetail(repo, bob.id);
  assert.deepEqual(
    bobDetail.pitching.map((row) => [row.id, row.perGameEra, row.snapshotEra]),
    [[record.id, 4, 4]]
  );
  assert.deepEqual(bobDetail.charts.pitching.cumulativeInnings, [4.5]);
  assert.deepEqual(bobDetail.charts.pitching.cumulativeStrikeouts, [7]);

  await deletePitchingRecord(repo, record.id);
  assert.equal((await getPlayerDetail(repo, bob.id)).era, 0);
  await assert.rejects(deletePitchingRecord(repo, record.id), notFound("pitching", record.id));
}

async function runRollbackTests() {
  const repo = newRepo();
  const alice = await createPlayer(repo, { name: "Alice", position: null, team: null });
  const record = await createBattingRecord(repo, batting(alice.id, null, 4, 2));
  assert.equal(record.snapshotAverage, 0.5);

  await assert.rejects(
    repo.transaction([alice.id], async (tx) => {
      await tx.setBattingSnapshot(record.id, 0.999);
      throw new Error("write failed");
    }),
    /write failed/
  );
  assert.equal((await repo.getBattingRecord(record.id))?.snapshotAverage, 0.5);

  await assert.rejects(
    updateBattingRecord(repo, record.id, batting(alice.id, 42, 4, 4)),
    notFound("game", 42)
  );
  assert.equal((await repo.getBattingRecord(record.id))?.hits, 2);

  // A failed transaction does not block the ones queued after it.
  const next = await createPlayer(repo, { name: "Dana", position: null, team: null });
  assert.equal(next.name, "Dana");
}

async function runLeaderboardTests() {
  const repo = newRepo();
  const a = await createPlayer(repo, { name: "Avery", position: null, team: "Blue" });
  const b = await createPlayer(repo, { name: "Blake", position: null, team: "Blue" });
  const c = await createPlayer(repo, { name: "Cam", position: null, team: "Blue" });
  const d = await createPlayer(repo, { name: "Drew", position: "P", team: "Blue" });
  const g1 = await createGame(repo, { name: "Opener", date: "2024-04-01", location: null });
  const g2 = await createGame(repo, { name: "Second", date: "2024-04-05", location: null });

  await createBattingRecord(repo, batting(a.id, g1.id, 10, 4, 0, 1));
  await createBattingRecord(repo, batting(b.id, g1.id, 10, 4, 2, 0));
  await createBattingRecord(repo, batting(c.id, g2.id, 3, 3));
  await createPitchingRecord(repo, {
    playerId: a.id,
    gameId: g1.id,
    inningsPitched: 3,
    earnedRuns: 0,
    strikeouts: 4,
    walks: 0,
  });
  await createPitchingRecord(repo, {
    playerId: d.id,
    gameId: g1.id,
    inningsPitched: 9,
    earnedRuns: 3,
    strikeouts: 6,
    walks: 2,
  });

  const overall = await getLeaderboard(repo);
  assert.equal(overall.gameId, null);
  assert.deepEqual(
    overall.games.map((game) => game.id),
    [g2.id, g1.id]
  );
  assert.deepEqual(
    overall.batting.map((row) => [row.playerId, row.average]),
    [
      [c.id, 1],
      [b.id, 0.4],
      [a.id, 0.4],
    ]
  );
  assert.deepEqual(
    overall.pitching.map((row) => [row.playerId, row.era]),
    [
      [a.id, 0],
      [d.id, 3],
    ]
  );

  const capped = await getLeaderboard(repo, { limit: 1 });
  assert.deepEqual(
    capped.batting.map((row) => row.playerId),
    [c.id]
  );
  assert.deepEqual(
    capped.pitching.map((row) => row.playerId),
    [a.id]
  );

  const perGame = await getLeaderboard(repo, { gameId: g1.id });
  assert.equal(perGame.gameId, g1.id);
  assert.deepEqual(
    perGame.batting.map((row) => row.playerId),
    [b.id, a.id]
  );
  assert.deepEqual(
    perGame.pitching.map((row) => row.playerId),
    [a.id, d.id]
  );

  const unknownGame = await getLeaderboard(repo, { gameId: 99 });
  assert.deepEqual(unknownGame.batting, []);
  assert.deepEqual(unknownGame.pitching, []);

  const summary = await getTeamSummary(repo);
  assert.deepEqual(
    summary.batting.map((row) => row.playerId),
    [c.id, b.id, a.id, d.id]
  );
  assert.deepEqual(
    summary.pitching.map((row) => row.playerId),
    [a.id, b.id, c.id, d.id]
  );

  const detail = await getGameDetail(repo, g1.id);
  assert.deepEqual(
    detail.batting.map((row) => [row.playerId, row.average]),
    [
      [a.id, 0.4],
      [b.id, 0.4],
    ]
  );
  assert.deepEqual(
    detail.pitching.map((row) => [row.playerId, row.era]),
    [
      [a.id, 0],
      [d.id, 3],
    ]
  );
}

async function runPartialUpdateTests() {
  const repo = newRepo();
  const alice = await createPlayer(repo, { name: "Alice", position: "C", team: "Blue" });
  const game = await createGame(repo, { name: "Opener", date: "2024-04-01", location: "Home" });
  const record = await createBattingRecord(repo, batting(alice.id, game.id, 10, 3, 2, 4));
  assert.equal(record.snapshotAverage, 0.3);

  const updated = await updateBattingRecord(repo, record.id, { atBats: 12 });
  assert.deepEqual(
    [updated.playerId, updated.gameId, updated.atBats, updated.hits, updated.homeRuns, updated.runsBattedIn],
    [alice.id, game.id, 12, 3, 2, 4]
  );
  assert.equal(updated.snapshotAverage, 0.25);

  // The merged record is checked, not just the fields sent.
  await assert.rejects(updateBattingRecord(repo, record.id, { atBats: 2 }), ZodError);
  assert.equal((await repo.getBattingRecord(record.id))?.atBats, 12);

  const detached = await updateBattingRecord(repo, record.id, { gameId: null });
  assert.equal(detached.gameId, null);
  assert.equal(detached.hits, 3);

  const pitching = await createPitchingRecord(repo, {
    playerId: alice.id,
    gameId: game.id,
    inningsPitched: 6,
    earnedRuns: 2,
    strikeouts: 5,
    walks: 1,
  });
  const fewerRuns = await updatePitchingRecord(repo, pitching.id, { earnedRuns: 1 });
  assert.deepEqual(
    [fewerRuns.gameId, fewerRuns.inningsPitched, fewerRuns.earnedRuns, fewerRuns.strikeouts, fewerRuns.walks],
    [game.id, 6, 1, 5, 1]
  );
  assert.equal(fewerRuns.snapshotEra, 1.5);

  assert.deepEqual(await updatePlayer(repo, alice.id, { position: "CF" }), {
    id: alice.id,
    name: "Alice",
    position: "CF",
    team: "Blue",
  });
  assert.deepEqual(await updatePlayer(repo, alice.id, { team: null }), {
    id: alice.id,
    name: "Alice",
    position: "CF",
    team: null,
  });
  assert.deepEqual(await updateGame(repo, game.id, { location: "Away" }), {
    id: game.id,
    name: "Opener",
    date: "2024-04-01",
    location: "Away",
  });
}

async function runRoundingTests() {
  const repo = newRepo();
  const alice = await createPlayer(repo, { name: "Alice", position: null, team: null });

  const single = await createBattingRecord(repo, batting(alice.id, null, 16, 1));
  assert.equal(single.snapshotAverage, 0.062);
  const outing = await createPitchingRecord(repo, {
    playerId: alice.id,
    gameId: null,
    inningsPitched: 8,
    earnedRuns: 1,
    strikeouts: 0,
    walks: 0,
  });
  assert.equal(outing.snapshotEra, 1.12);

  const detail = await getPlayerDetail(repo, alice.id);
  assert.equal(detail.average, 0.062);
  assert.equal(detail.era, 1.12);
}

async function runLockOrderTests() {
  const locks: number[][] = [];
  const repo = newRepo((playerIds) => locks.push(playerIds));
  const alice = await createPlayer(repo, { name: "Alice", position: null, team: null });
  const bob = await createPlayer(repo, { name: "Bob", position: null, team: null });
  const record = await createBattingRecord(repo, batting(bob.id, null, 4, 1));
  const outing = await createPitchingRecord(repo, {
    playerId: bob.id,
    gameId: null,
    inningsPitched: 3,
    earnedRuns: 1,
    strikeouts: 2,
    walks: 0,
  });

  // Both owners are locked in one ascending request before any per-player lock.
  locks.length = 0;
  await updateBattingRecord(repo, record.id, { playerId: alice.id });
  assert.deepEqual(locks, [[alice.id, bob.id], [bob.id], [alice.id]]);

  locks.length = 0;
  await updatePitchingRecord(repo, outing.id, { playerId: alice.id });
  assert.deepEqual(locks, [[alice.id, bob.id], [bob.id], [alice.id]]);

  locks.length = 0;
  await updateBattingRecord(repo, record.id, { hits: 2 });
  assert.deepEqual(locks, [[alice.id], [alice.id]]);
}

async function runConcurrentWriteTests() {
  const repo = newRepo();
  const alice = await createPlayer(repo, { name: "Alice", position: null, team: null });
  const g1 = await createGame(repo, { name: "Game 1", date: "2024-04-01", location: null });
  const g2 = await createGame(repo, { name: "Game 2", date: "2024-04-08", location: null });
  const g3 = await createGame(repo, { name: "Game 3", date: "2024-04-15", location: null });
  const r1 = await createBattingRecord(repo, batting(alice.id, g2.id, 4, 1));
  const r2 = await createBattingRecord(repo, batting(alice.id, g3.id, 4, 2));

  await Promise.all([
    createBattingRecord(repo, batting(alice.id, g1.id, 3, 3)),
    updateBattingRecord(repo, r1.id, { hits: 4 }),
    createBattingRecord(repo, batting(alice.id, null, 5, 1)),
    updateBattingRecord(repo, r2.id, { gameId: g1.id, atBats: 6 }),
    createBattingRecord(repo, batting(alice.id, g3.id, 2, 0)),
  ]);

  const history = await repo.listBattingHistory(alice.id);
  assert.equal(history.length, 5);
  const stored = new Map(history.map((row) => [row.id, row.snapshotAverage]));
  const expected = new Map(computeBattingSnapshots(history).map((entry) => [entry.id, entry.value]));
  assert.deepEqual(stored, expected);

  // 2/6 and 5/9 on 2024-04-01, 9/13, 9/15, then 10/20 on the creation day.
  assert.deepEqual(
    computeBattingSnapshots(history).map((entry) => entry.value),
    [0.333, 0.556, 0.692, 0.6, 0.5]
  );
}

function runUniqueViolationTests() {
  const driverError = Object.assign(new Error("duplicate key value violates unique constraint"), { code: "23505" });
  assert.equal(isUniqueViolation(driverError), true);
  assert.equal(isUniqueViolation(new Error("Failed query: insert into players", { cause: driverError })), true);
  assert.equal(isUniqueViolation(Object.assign(new Error("deadlock detected"), { code: "40P01" })), false);
  assert.equal(isUniqueViolation({ code: "23505" }), false);
  assert.equal(isUniqueViolation(undefined), false);
}

async function main() {
  await runPlayerTests();
  await runRecordMoveAndGameTests();
  await runPitchingTests();
  await runRollbackTests();
  await runLeaderboardTests();
  await runPartialUpdateTests();
  await runRoundingTests();
  await runLockOrderTests();
  await runConcurrentWriteTests();
  runUniqueViolationTests();
  console.log("team stats tests passed");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
