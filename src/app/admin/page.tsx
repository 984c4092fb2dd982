import Link from "next/link";
import TeamPageShell from "../_components/TeamPageShell";
import AdminCodePanel from "./AdminCodePanel";
import AdminForms from "./AdminForms";
import AdminDeleteButton from "../_components/AdminDeleteButton";
import { isAdminConfigured } from "@/lib/adminAuth";
import { formatOptional } from "@/lib/format";
import { getTeamStatsRepository } from "@/lib/stats/store";
import { listGames, listPlayers } from "@/lib/stats/teamStats";

export const dynamic = "force-dynamic";

export default async function AdminPage() {
  const repo = getTeamStatsRepository();
  const [players, games] = await Promise.all([listPlayers(repo), listGames(repo)]);

  return (
    <TeamPageShell
      title="Admin"
      description="Record players, games and stat lines. Every change recomputes the running averages."
    >
      <AdminCodePanel configured={isAdminConfigured()} />
      <AdminForms players={players} games={games} />

      <section className="mt-8">
        <h2 className="text-lg font-semibold text-black dark:text-white">Games</h2>
        <ul className="mt-3 divide-y divide-black/10 rounded-xl border border-black/10 bg-white dark:divide-white/10 dark:border-white/10 dark:bg-white/5">
          {games.map((game) => (
            <li key={game.id} className="flex items-center justify-between gap-3 px-4 py-3 text-sm">
              <Link className="text-black hover:underline dark:text-white" href={`/games/${game.id}`}>
                {game.name}
              </Link>
              <span className="text-zinc-500 dark:text-zinc-400">
                {formatOptional(game.date)} · {formatOptional(game.location)}
              </span>
              <AdminDeleteButton
                label="Delete"
                path={`/api/games/${game.id}`}
                confirmMessage={`Delete ${game.name}? Its records stay on the players.`}
              />
            </li>
          ))}
          {games.length === 0 ? (
            <li className="px-4 py-3 text-sm text-zinc-600 dark:text-zinc-400">No games yet.</li>
          ) : null}
        </ul>
      </section>
    </TeamPageShell>
  );
}
