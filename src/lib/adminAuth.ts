import { NextResponse } from "next/server";
import { timingSafeEqual } from "node:crypto";
import { env } from "@/lib/env";

export const ADMIN_CODE_HEADER = "x-admin-code";

function parseBearerToken(authorization: string | null): string | null {
  if (!authorization) return null;
  const value = authorization.trim();
  const prefix = "Bearer ";
  if (!value.startsWith(prefix)) return null;
  const token = value.slice(prefix.length).trim();
  return token || null;
}

export function codesEqual(expected: string, provided: string): boolean {
  const left = Buffer.from(expected);
  const right = Buffer.from(provided);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

export function getProvidedAdminCode(request: Request): string | null {
  const custom = request.headers.get(ADMIN_CODE_HEADER);
  if (custom && custom.trim()) return custom.trim();
  return parseBearerToken(request.headers.get("authorization"));
}

export function isAdminConfigured(): boolean {
  return Boolean(env.ADMIN_CODE);
}

/**
 * Capability check for mutating routes. Returns the response to send when the
 * request is not allowed, or null when the caller presented the admin code.
 */
export function requireAdmin(request: Request): NextResponse | null {
  const expected = env.ADMIN_CODE;
  if (!expected) {
    return NextResponse.json(
      {
        error: "admin_disabled",
        message: "Mutations are disabled: ADMIN_CODE is not configured on the server.",
      },
      { status: 503, headers: { "cache-control": "no-store" } }
    );
  }

  const provided = getProvidedAdminCode(request);
  if (!provided || !codesEqual(expected, provided)) {
    return NextResponse.json(
      { error: "unauthorized", message: "Missing or invalid admin code." },
      {
        status: 401,
        headers: {
          "cache-control": "no-store",
          "www-authenticate": 'Bearer realm="team-stats-admin"',
        },
      }
    );
  }

  return null;
}
