import Link from "next/link";
import { formatAverage, formatEra, formatInnings, formatOptional } from "@/lib/format";
import type { BattingLeaderRow, GameBattingLeaderRow, GamePitchingLeaderRow, PitchingLeaderRow } from "@/lib/stats/types";

const TH = "px-3 py-2 text-left text-xs font-medium uppercase tracking-wide text-zinc-500 dark:text-zinc-400";
const TD = "px-3 py-2 text-zinc-600 dark:text-zinc-400";

type BattingProps = {
  title: string;
  rows: Array<BattingLeaderRow | GameBattingLeaderRow>;
  emptyMessage: string;
};

export function BattingTable({ title, rows, emptyMessage }: BattingProps) {
  return (
    <section className="mt-8">
      <h2 className="text-lg font-semibold text-black dark:text-white">{title}</h2>
      <div className="mt-3 overflow-x-auto rounded-xl border border-black/10 bg-white dark:border-white/10 dark:bg-white/5">
        <table className="w-full text-sm">
          <thead>
            <tr>
              <th className={TH}>#</th>
              <th className={TH}>Player</th>
              <th className={TH}>Team</th>
              <th className={TH}>AB</th>
              <th className={TH}>H</th>
              <th className={TH}>HR</th>
              <th className={TH}>RBI</th>
              <th className={TH}>AVG</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((row, idx) => (
              <tr key={"recordId" in row ? `r-${row.recordId}` : `p-${row.playerId}`} className="border-t border-black/10 dark:border-white/10">
                <td className={TD}>{idx + 1}</td>
                <td className="px-3 py-2 text-black dark:text-white">
                  <Link className="hover:underline" href={`/players/${row.playerId}`}>
                    {row.name}
                  </Link>
                </td>
                <td className={TD}>{formatOptional(row.team)}</td>
                <td className={TD}>{row.atBats}</td>
                <td className={TD}>{row.hits}</td>
                <td className={TD}>{row.homeRuns}</td>
                <td className={TD}>{row.runsBattedIn}</td>
                <td className="px-3 py-2 font-medium text-black dark:text-white">{formatAverage(row.average)}</td>
              </tr>
            ))}
            {rows.length === 0 ? (
              <tr>
                <td className="px-3 py-4 text-zinc-600 dark:text-zinc-400" colSpan={8}>
                  {emptyMessage}
                </td>
              </tr>
            ) : null}
          </tbody>
        </table>
      </div>
    </section>
  );
}

type PitchingProps = {
  title: string;
  rows: Array<PitchingLeaderRow | GamePitchingLeaderRow>;
  emptyMessage: string;
};

export function PitchingTable({ title, rows, emptyMessage }: PitchingProps) {
  return (
    <section className="mt-8">
      <h2 className="text-lg font-semibold text-black dark:text-white">{title}</h2>
      <div className="mt-3 overflow-x-auto rounded-xl border border-black/10 bg-white dark:border-white/10 dark:bg-white/5">
        <table className="w-full text-sm">
          <thead>
            <tr>
              <th className={TH}>#</th>
              <th className={TH}>Player</th>
              <th className={TH}>Team</th>
              <th className={TH}>IP</th>
              <th className={TH}>ER</th>
              <th className={TH}>SO</th>
              <th className={TH}>BB</th>
              <th className={TH}>ERA</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((row, idx) => (
              <tr key={"recordId" in row ? `r-${row.recordId}` : `p-${row.playerId}`} className="border-t border-black/10 dark:border-white/10">
                <td className={TD}>{idx + 1}</td>
                <td className="px-3 py-2 text-black dark:text-white">
                  <Link className="hover:underline" href={`/players/${row.playerId}`}>
                    {row.name}
                  </Link>
                </td>
                <td className={TD}>{formatOptional(row.team)}</td>
                <td className={TD}>{formatInnings(row.inningsPitched)}</td>
                <td className={TD}>{row.earnedRuns}</td>
                <td className={TD}>{row.strikeouts}</td>
                <td className={TD}>{row.walks}</td>
                <td className="px-3 py-2 font-medium text-black dark:text-white">{formatEra(row.era)}</td>
              </tr>
            ))}
            {rows.length === 0 ? (
              <tr>
                <td className="px-3 py-4 text-zinc-600 dark:text-zinc-400" colSpan={8}>
                  {emptyMessage}
                </td>
              </tr>
            ) : null}
          </tbody>
        </table>
      </div>
    </section>
  );
}
