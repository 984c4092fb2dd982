import { NextResponse } from "next/server";
import { requireAdmin } from "@/lib/adminAuth";
import { invalidJsonResponse, NO_STORE, readJsonBody, statsApiErrorResponse } from "@/lib/stats/apiError";
import { getTeamStatsRepository } from "@/lib/stats/store";
import { createPlayer, searchPlayers } from "@/lib/stats/teamStats";
import { playerInputSchema, playerSearchQuerySchema } from "@/lib/stats/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request) {
  try {
    const { searchParams } = new URL(request.url);
    const query = playerSearchQuerySchema.parse({
      q: searchParams.get("q") ?? undefined,
      limit: searchParams.get("limit") ?? undefined,
    });
    const players = await searchPlayers(getTeamStatsRepository(), query);
    return NextResponse.json({ data: players }, { headers: NO_STORE });
  } catch (error) {
    return statsApiErrorResponse(error, "Failed to search players");
  }
}

export async function POST(request: Request) {
  const denied = requireAdmin(request);
  if (denied) return denied;

  const parsed = await readJsonBody(request);
  if (!parsed.ok) return invalidJsonResponse();

  try {
    const input = playerInputSchema.parse(parsed.body);
    const player = await createPlayer(getTeamStatsRepository(), input);
    return NextResponse.json({ data: player }, { status: 201, headers: NO_STORE });
  } catch (error) {
    return statsApiErrorResponse(error, "Failed to create player");
  }
}
