import { NextResponse } from "next/server";
import { codesEqual, isAdminConfigured } from "@/lib/adminAuth";
import { env } from "@/lib/env";
import { invalidJsonResponse, NO_STORE, readJsonBody } from "@/lib/stats/apiError";
import { adminSessionSchema } from "@/lib/stats/validation";

export const runtime = "nodejs";

// Lets the admin console verify a code before storing it in the browser.
// Nothing is stored server-side: every mutation carries the code itself.
export async function GET() {
  return NextResponse.json({ configured: isAdminConfigured() }, { headers: NO_STORE });
}

export async function POST(request: Request) {
  const expected = env.ADMIN_CODE;
  if (!expected) {
    return NextResponse.json(
      { error: "admin_disabled", message: "ADMIN_CODE is not configured on the server." },
      { status: 503, headers: NO_STORE }
    );
  }

  const parsed = await readJsonBody(request);
  if (!parsed.ok) return invalidJsonResponse();

  const body = adminSessionSchema.safeParse(parsed.body);
  if (!body.success) {
    return NextResponse.json(
      { error: "invalid_request", message: "Enter the admin code.", issues: body.error.issues },
      { status: 400, headers: NO_STORE }
    );
  }

  const valid = codesEqual(expected, body.data.code);
  return NextResponse.json({ valid }, { status: valid ? 200 : 401, headers: NO_STORE });
}
