// Browser-side helpers shared by the admin console and the delete buttons.

export const ADMIN_CODE_STORAGE_KEY = "team_stats_admin_code";

export function readStoredAdminCode(): string {
  if (typeof window === "undefined") return "";
  try {
    return window.localStorage.getItem(ADMIN_CODE_STORAGE_KEY)?.trim() ?? "";
  } catch {
    return "";
  }
}

export function storeAdminCode(code: string | null): boolean {
  try {
    if (code) {
      window.localStorage.setItem(ADMIN_CODE_STORAGE_KEY, code);
    } else {
      window.localStorage.removeItem(ADMIN_CODE_STORAGE_KEY);
    }
    return true;
  } catch {
    return false;
  }
}

/** Sends an admin mutation; throws with the server's message when it fails. */
export async function sendAdminRequest(
  path: string,
  method: "POST" | "PATCH" | "DELETE",
  payload?: unknown
): Promise<unknown> {
  const adminCode = readStoredAdminCode();
  if (!adminCode) {
    throw new Error("Admin code is not set. Save it in the admin panel first.");
  }

  const res = await fetch(path, {
    method,
    headers: {
      "content-type": "application/json",
      "x-admin-code": adminCode,
    },
    body: payload === undefined ? undefined : JSON.stringify(payload),
  });

  if (!res.ok) {
    let message = `Request failed: ${res.status}`;
    try {
      const json = (await res.json()) as { message?: string; error?: string };
      if (json?.message) message = json.message;
      else if (json?.error) message = json.error;
    } catch {
      // ignore non-json error body
    }
    throw new Error(message);
  }

  return res.json();
}
