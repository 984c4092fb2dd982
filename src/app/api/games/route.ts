import { NextResponse } from "next/server";
import { requireAdmin } from "@/lib/adminAuth";
import { invalidJsonResponse, NO_STORE, readJsonBody, statsApiErrorResponse } from "@/lib/stats/apiError";
import { getTeamStatsRepository } from "@/lib/stats/store";
import { createGame, listGames } from "@/lib/stats/teamStats";
import { gameInputSchema } from "@/lib/stats/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const games = await listGames(getTeamStatsRepository());
    return NextResponse.json({ data: games }, { headers: NO_STORE });
  } catch (error) {
    return statsApiErrorResponse(error, "Failed to list games");
  }
}

export async function POST(request: Request) {
  const denied = requireAdmin(request);
  if (denied) return denied;

  const parsed = await readJsonBody(request);
  if (!parsed.ok) return invalidJsonResponse();

  try {
    const input = gameInputSchema.parse(parsed.body);
    const game = await createGame(getTeamStatsRepository(), input);
    return NextResponse.json({ data: game }, { status: 201, headers: NO_STORE });
  } catch (error) {
    return statsApiErrorResponse(error, "Failed to create game");
  }
}
