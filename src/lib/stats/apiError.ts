import { NextResponse } from "next/server";
import { ZodError } from "zod";
import { DuplicatePlayerError, RecordNotFoundError } from "@/lib/stats/errors";

export const NO_STORE = { "cache-control": "no-store" };

export function statsApiErrorResponse(error: unknown, fallbackMessage = "Storage request failed") {
  if (error instanceof ZodError) {
    return NextResponse.json(
      {
        error: "invalid_request",
        message: "Invalid request parameters.",
        issues: error.issues,
      },
      { status: 400, headers: NO_STORE }
    );
  }

  if (error instanceof RecordNotFoundError) {
    return NextResponse.json(
      { error: "not_found", message: error.message, kind: error.kind, id: error.id },
      { status: 404, headers: NO_STORE }
    );
  }

  if (error instanceof DuplicatePlayerError) {
    return NextResponse.json(
      { error: "duplicate_player", message: error.message },
      { status: 409, headers: NO_STORE }
    );
  }

  const message = error instanceof Error ? error.message : fallbackMessage;
  console.error(`[stats-api] ${fallbackMessage}: ${message}`);
  return NextResponse.json(
    {
      error: "storage_error",
      message: fallbackMessage,
    },
    { status: 500, headers: NO_STORE }
  );
}

/** Parses a JSON request body; `ok: false` means the body was not valid JSON. */
export async function readJsonBody(request: Request): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await request.json() };
  } catch {
    return { ok: false };
  }
}

export function invalidJsonResponse() {
  return NextResponse.json(
    { error: "invalid_json", message: "Invalid JSON body" },
    { status: 400, headers: NO_STORE }
  );
}
