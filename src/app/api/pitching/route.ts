import { NextResponse } from "next/server";
import { requireAdmin } from "@/lib/adminAuth";
import { invalidJsonResponse, NO_STORE, readJsonBody, statsApiErrorResponse } from "@/lib/stats/apiError";
import { getTeamStatsRepository } from "@/lib/stats/store";
import { createPitchingRecord } from "@/lib/stats/teamStats";
import { pitchingRecordInputSchema } from "@/lib/stats/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: Request) {
  const denied = requireAdmin(request);
  if (denied) return denied;

  const parsed = await readJsonBody(request);
  if (!parsed.ok) return invalidJsonResponse();

  try {
    const input = pitchingRecordInputSchema.parse(parsed.body);
    const record = await createPitchingRecord(getTeamStatsRepository(), input);
    return NextResponse.json({ data: record }, { status: 201, headers: NO_STORE });
  } catch (error) {
    return statsApiErrorResponse(error, "Failed to add pitching record");
  }
}
