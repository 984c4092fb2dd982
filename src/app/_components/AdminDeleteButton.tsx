"use client";

import { useRouter } from "next/navigation";
import { useState } from "react";
import { sendAdminRequest } from "@/lib/adminClient";

type Props = {
  label: string;
  path: string;
  confirmMessage: string;
  redirectTo?: string;
};

export default function AdminDeleteButton({ label, path, confirmMessage, redirectTo }: Props) {
  const router = useRouter();
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  async function run() {
    if (loading) return;
    if (!window.confirm(confirmMessage)) return;
    setError(null);
    setLoading(true);
    try {
      await sendAdminRequest(path, "DELETE");
      if (redirectTo) {
        router.push(redirectTo);
      } else {
        router.refresh();
      }
    } catch (err: unknown) {
      setError(err instanceof Error ? err.message : String(err));
    } finally {
      setLoading(false);
    }
  }

  return (
    <span className="inline-flex flex-col gap-1">
      <button
        type="button"
        onClick={run}
        disabled={loading}
        className="rounded-md border border-rose-500/30 px-2 py-1 text-xs text-rose-600 hover:bg-rose-50 disabled:cursor-not-allowed disabled:opacity-60 dark:text-rose-400 dark:hover:bg-white/10"
      >
        {loading ? "Deleting…" : label}
      </button>
      {error ? <span className="text-[10px] text-rose-500">{error}</span> : null}
    </span>
  );
}
