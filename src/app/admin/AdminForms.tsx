"use client";

import { useRouter } from "next/navigation";
import { useState, type FormEvent } from "react";
import { sendAdminRequest } from "@/lib/adminClient";
import type { Game, Player } from "@/lib/stats/types";

type Props = {
  players: Player[];
  games: Game[];
};

type FormKind = "player" | "game" | "batting" | "pitching";

const ENDPOINTS: Record<FormKind, string> = {
  player: "/api/players",
  game: "/api/games",
  batting: "/api/batting",
  pitching: "/api/pitching",
};

const INPUT =
  "rounded-md border border-black/10 bg-white px-2 py-1 text-sm text-black dark:border-white/10 dark:bg-black/20 dark:text-white";
const BUTTON =
  "rounded-md border border-black/10 px-3 py-1 text-sm text-black hover:bg-zinc-100 disabled:cursor-not-allowed disabled:opacity-60 dark:border-white/10 dark:text-white dark:hover:bg-white/10";
const CARD = "rounded-xl border border-black/10 bg-white p-4 dark:border-white/10 dark:bg-white/5";

// The API coerces numeric strings, so form values are posted as entered.
function formPayload(form: HTMLFormElement): Record<string, string> {
  const payload: Record<string, string> = {};
  new FormData(form).forEach((value, key) => {
    if (typeof value === "string") payload[key] = value.trim();
  });
  return payload;
}

function PlayerSelect({ players }: { players: Player[] }) {
  return (
    <select name="playerId" required className={INPUT} defaultValue="">
      <option value="" disabled>
        Player
      </option>
      {players.map((player) => (
        <option key={player.id} value={player.id}>
          {player.name}
        </option>
      ))}
    </select>
  );
}

function GameSelect({ games }: { games: Game[] }) {
  return (
    <select name="gameId" className={INPUT} defaultValue="">
      <option value="">No game</option>
      {games.map((game) => (
        <option key={game.id} value={game.id}>
          {game.date ? `${game.date} · ${game.name}` : game.name}
        </option>
      ))}
    </select>
  );
}

function CountInput({ name, label, step }: { name: string; label: string; step?: string }) {
  return (
    <label className="flex flex-col gap-1 text-xs text-zinc-500 dark:text-zinc-400">
      {label}
      <input name={name} type="number" min="0" step={step ?? "1"} defaultValue="0" className={`${INPUT} w-24`} />
    </label>
  );
}

export default function AdminForms({ players, games }: Props) {
  const router = useRouter();
  const [pending, setPending] = useState<FormKind | null>(null);
  const [status, setStatus] = useState<{ kind: FormKind; ok: boolean; text: string } | null>(null);

  async function submit(kind: FormKind, event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    if (pending) return;
    const form = event.currentTarget;
    setPending(kind);
    setStatus(null);
    try {
      await sendAdminRequest(ENDPOINTS[kind], "POST", formPayload(form));
      form.reset();
      setStatus({ kind, ok: true, text: "Saved." });
      router.refresh();
    } catch (err: unknown) {
      setStatus({ kind, ok: false, text: err instanceof Error ? err.message : String(err) });
    } finally {
      setPending(null);
    }
  }

  function statusLine(kind: FormKind) {
    if (!status || status.kind !== kind) return null;
    return (
      <p className={`mt-2 text-xs ${status.ok ? "text-emerald-600 dark:text-emerald-400" : "text-rose-500"}`}>
        {status.text}
      </p>
    );
  }

  return (
    <section className="mt-8 grid grid-cols-1 gap-4 md:grid-cols-2">
      <form className={CARD} onSubmit={(event) => submit("player", event)}>
        <h2 className="text-sm font-semibold text-black dark:text-white">Add player</h2>
        <div className="mt-3 flex flex-wrap gap-2">
          <input name="name" required placeholder="Name" className={INPUT} />
          <input name="position" placeholder="Position" className={INPUT} />
          <input name="team" placeholder="Team" className={INPUT} />
        </div>
        <button type="submit" disabled={pending !== null} className={`${BUTTON} mt-3`}>
          {pending === "player" ? "Saving…" : "Add player"}
        </button>
        {statusLine("player")}
      </form>

      <form className={CARD} onSubmit={(event) => submit("game", event)}>
        <h2 className="text-sm font-semibold text-black dark:text-white">Add game</h2>
        <div className="mt-3 flex flex-wrap gap-2">
          <input name="name" required placeholder="Name" className={INPUT} />
          <input name="date" type="date" className={INPUT} />
          <input name="location" placeholder="Location" className={INPUT} />
        </div>
        <button type="submit" disabled={pending !== null} className={`${BUTTON} mt-3`}>
          {pending === "game" ? "Saving…" : "Add game"}
        </button>
        {statusLine("game")}
      </form>

      <form className={CARD} onSubmit={(event) => submit("batting", event)}>
        <h2 className="text-sm font-semibold text-black dark:text-white">Add batting line</h2>
        <div className="mt-3 flex flex-wrap gap-2">
          <PlayerSelect players={players} />
          <GameSelect games={games} />
        </div>
        <div className="mt-3 flex flex-wrap gap-2">
          <CountInput name="atBats" label="AB" />
          <CountInput name="hits" label="H" />
          <CountInput name="homeRuns" label="HR" />
          <CountInput name="runsBattedIn" label="RBI" />
        </div>
        <button type="submit" disabled={pending !== null || players.length === 0} className={`${BUTTON} mt-3`}>
          {pending === "batting" ? "Saving…" : "Add batting"}
        </button>
        {statusLine("batting")}
      </form>

      <form className={CARD} onSubmit={(event) => submit("pitching", event)}>
        <h2 className="text-sm font-semibold text-black dark:text-white">Add pitching line</h2>
        <div className="mt-3 flex flex-wrap gap-2">
          <PlayerSelect players={players} />
          <GameSelect games={games} />
        </div>
        <div className="mt-3 flex flex-wrap gap-2">
          <CountInput name="inningsPitched" label="IP" step="0.1" />
          <CountInput name="earnedRuns" label="ER" />
          <CountInput name="strikeouts" label="SO" />
          <CountInput name="walks" label="BB" />
        </div>
        <button type="submit" disabled={pending !== null || players.length === 0} className={`${BUTTON} mt-3`}>
          {pending === "pitching" ? "Saving…" : "Add pitching"}
        </button>
        {statusLine("pitching")}
      </form>
    </section>
  );
}
