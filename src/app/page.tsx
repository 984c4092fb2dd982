import { BattingTable, PitchingTable } from "./_components/StatTables";
import TeamPageShell from "./_components/TeamPageShell";
import { getTeamStatsRepository } from "@/lib/stats/store";
import { getTeamSummary } from "@/lib/stats/teamStats";

export const dynamic = "force-dynamic";

export default async function Home() {
  const summary = await getTeamSummary(getTeamStatsRepository());

  return (
    <TeamPageShell title="Team stats" description="Season totals for every player on the roster.">
      <BattingTable title="Batting" rows={summary.batting} emptyMessage="No players yet." />
      <PitchingTable title="Pitching" rows={summary.pitching} emptyMessage="No players yet." />
    </TeamPageShell>
  );
}
