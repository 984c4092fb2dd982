import Link from "next/link";
import TeamPageShell from "../_components/TeamPageShell";
import { formatOptional } from "@/lib/format";
import { getTeamStatsRepository } from "@/lib/stats/store";
import { searchPlayers } from "@/lib/stats/teamStats";

export const dynamic = "force-dynamic";

export default async function SearchPage({ searchParams }: { searchParams: Promise<{ q?: string }> }) {
  const params = await searchParams;
  const q = (params.q ?? "").trim().slice(0, 120);
  const results = q ? await searchPlayers(getTeamStatsRepository(), { q, limit: 100 }) : [];

  return (
    <TeamPageShell title="Search players">
      <form action="/search" className="mt-6 flex gap-2">
        <input
          type="search"
          name="q"
          defaultValue={q}
          placeholder="Player name"
          className="min-w-[280px] rounded-md border border-black/10 bg-white px-3 py-2 text-sm text-black dark:border-white/10 dark:bg-black/20 dark:text-white"
        />
        <button
          type="submit"
          className="rounded-md border border-black/10 px-3 py-2 text-sm text-black hover:bg-zinc-100 dark:border-white/10 dark:text-white dark:hover:bg-white/10"
        >
          Search
        </button>
      </form>

      {q ? (
        <ul className="mt-6 divide-y divide-black/10 rounded-xl border border-black/10 bg-white dark:divide-white/10 dark:border-white/10 dark:bg-white/5">
          {results.map((player) => (
            <li key={player.id} className="flex items-center justify-between px-4 py-3 text-sm">
              <Link className="font-medium text-black hover:underline dark:text-white" href={`/players/${player.id}`}>
                {player.name}
              </Link>
              <span className="text-zinc-500 dark:text-zinc-400">
                {formatOptional(player.position)} · {formatOptional(player.team)}
              </span>
            </li>
          ))}
          {results.length === 0 ? (
            <li className="px-4 py-3 text-sm text-zinc-600 dark:text-zinc-400">No players match “{q}”.</li>
          ) : null}
        </ul>
      ) : null}
    </TeamPageShell>
  );
}
