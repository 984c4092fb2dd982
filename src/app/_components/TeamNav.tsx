import Link from "next/link";

const NAV_ITEMS = [
  { href: "/", label: "Team" },
  { href: "/leaderboard", label: "Leaderboard" },
  { href: "/search", label: "Search" },
  { href: "/admin", label: "Admin" },
] as const;

export default function TeamNav() {
  return (
    <nav className="flex flex-wrap gap-2">
      {NAV_ITEMS.map((item) => (
        <Link
          key={item.href}
          className="rounded-full border border-black/10 bg-white px-3 py-1 text-xs text-black hover:bg-zinc-50 dark:border-white/10 dark:bg-white/5 dark:text-white dark:hover:bg-white/10"
          href={item.href}
        >
          {item.label}
        </Link>
      ))}
    </nav>
  );
}
