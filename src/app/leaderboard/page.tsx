import Link from "next/link";
import { BattingTable, PitchingTable } from "../_components/StatTables";
import TeamPageShell from "../_components/TeamPageShell";
import { env } from "@/lib/env";
import { getTeamStatsRepository } from "@/lib/stats/store";
import { getLeaderboard } from "@/lib/stats/teamStats";
import { idParamSchema } from "@/lib/stats/validation";

export const dynamic = "force-dynamic";

export default async function LeaderboardPage({
  searchParams,
}: {
  searchParams: Promise<{ game_id?: string }>;
}) {
  const params = await searchParams;
  const parsedGameId = idParamSchema.safeParse(params.game_id);
  const gameId = parsedGameId.success ? parsedGameId.data : null;

  const leaderboard = await getLeaderboard(getTeamStatsRepository(), {
    gameId,
    limit: env.LEADERBOARD_LIMIT,
  });
  const selectedGame = leaderboard.games.find((game) => game.id === gameId);

  const chip = (active: boolean) =>
    `rounded-full border px-3 py-1 text-xs ${
      active
        ? "border-black bg-black text-white dark:border-white dark:bg-white dark:text-black"
        : "border-black/10 bg-white text-black hover:bg-zinc-50 dark:border-white/10 dark:bg-white/5 dark:text-white dark:hover:bg-white/10"
    }`;

  return (
    <TeamPageShell
      title="Leaderboard"
      description={selectedGame ? `Single-game lines for ${selectedGame.name}.` : "Overall leaders across all games."}
    >
      <section className="mt-6 flex flex-wrap gap-2">
        <Link className={chip(gameId === null)} href="/leaderboard">
          All games
        </Link>
        {leaderboard.games.map((game) => (
          <Link key={game.id} className={chip(game.id === gameId)} href={`/leaderboard?game_id=${game.id}`}>
            {game.date ? `${game.date} · ${game.name}` : game.name}
          </Link>
        ))}
      </section>

      {selectedGame ? (
        <p className="mt-4 text-sm">
          <Link className="text-zinc-600 hover:underline dark:text-zinc-400" href={`/games/${selectedGame.id}`}>
            Game details →
          </Link>
        </p>
      ) : null}

      <BattingTable title="Batting" rows={leaderboard.batting} emptyMessage="No batting records yet." />
      <PitchingTable title="Pitching" rows={leaderboard.pitching} emptyMessage="No pitching records yet." />
    </TeamPageShell>
  );
}
