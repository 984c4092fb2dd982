import { NextResponse } from "next/server";
import { env } from "@/lib/env";
import { statsApiErrorResponse } from "@/lib/stats/apiError";
import { getTeamStatsRepository } from "@/lib/stats/store";
import { getLeaderboard } from "@/lib/stats/teamStats";
import { leaderboardQuerySchema } from "@/lib/stats/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  try {
    const { searchParams } = new URL(request.url);
    const query = leaderboardQuerySchema.parse({
      game_id: searchParams.get("game_id") || undefined,
    });
    const leaderboard = await getLeaderboard(getTeamStatsRepository(), {
      gameId: query.game_id ?? null,
      limit: env.LEADERBOARD_LIMIT,
    });
    return NextResponse.json(leaderboard, { headers: { "cache-control": "no-store" } });
  } catch (error) {
    return statsApiErrorResponse(error, "Failed to build leaderboard");
  }
}
