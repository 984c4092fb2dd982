"use client";

import { useState } from "react";
import { readStoredAdminCode, storeAdminCode } from "@/lib/adminClient";

type Props = {
  configured: boolean;
};

export default function AdminCodePanel({ configured }: Props) {
  const [value, setValue] = useState(() => readStoredAdminCode());
  const [saved, setSaved] = useState(() => Boolean(readStoredAdminCode()));
  const [checking, setChecking] = useState(false);
  const [message, setMessage] = useState<string | null>(null);

  async function save() {
    const next = value.trim();
    if (!next) {
      setMessage("Enter the admin code before saving.");
      setSaved(false);
      return;
    }
    setChecking(true);
    setMessage(null);
    try {
      const res = await fetch("/api/admin/session", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ code: next }),
      });
      if (res.status === 401) {
        setMessage("That code was rejected.");
        return;
      }
      if (!res.ok) {
        setMessage(`Verification failed: ${res.status}`);
        return;
      }
      if (storeAdminCode(next)) {
        setSaved(true);
        setMessage("Code verified and saved in this browser.");
      } else {
        setMessage("Failed to save the code in browser storage.");
      }
    } catch (err: unknown) {
      setMessage(err instanceof Error ? err.message : String(err));
    } finally {
      setChecking(false);
    }
  }

  function clear() {
    storeAdminCode(null);
    setValue("");
    setSaved(false);
    setMessage("Code cleared from this browser.");
  }

  return (
    <section className="mt-8 rounded-xl border border-black/10 bg-white/80 p-4 dark:border-white/10 dark:bg-white/5">
      <div className="flex flex-wrap items-center gap-2">
        <span className="text-sm font-medium text-zinc-700 dark:text-zinc-200">Admin code</span>
        <span
          className={`text-xs ${configured ? "text-emerald-600 dark:text-emerald-400" : "text-amber-600 dark:text-amber-400"}`}
        >
          server {configured ? "configured" : "missing"}
        </span>
        <span className={`text-xs ${saved ? "text-emerald-600 dark:text-emerald-400" : "text-zinc-500 dark:text-zinc-400"}`}>
          browser code {saved ? "set" : "not set"}
        </span>
      </div>

      <div className="mt-3 flex flex-wrap items-center gap-2">
        <input
          type="password"
          placeholder="ADMIN_CODE"
          value={value}
          onChange={(event) => setValue(event.target.value)}
          className="min-w-[280px] rounded-md border border-black/10 bg-white px-2 py-1 text-sm text-black dark:border-white/10 dark:bg-black/20 dark:text-white"
        />
        <button
          type="button"
          onClick={save}
          disabled={checking || !configured}
          className="rounded-md border border-black/10 px-2 py-1 text-sm text-black hover:bg-zinc-100 disabled:cursor-not-allowed disabled:opacity-60 dark:border-white/10 dark:text-white dark:hover:bg-white/10"
        >
          {checking ? "Checking…" : "Verify & save"}
        </button>
        <button
          type="button"
          onClick={clear}
          className="rounded-md border border-black/10 px-2 py-1 text-sm text-black hover:bg-zinc-100 dark:border-white/10 dark:text-white dark:hover:bg-white/10"
        >
          Clear
        </button>
      </div>

      {message ? <p className="mt-2 text-xs text-zinc-500 dark:text-zinc-400">{message}</p> : null}
    </section>
  );
}
