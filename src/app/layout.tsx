import type { Metadata } from "next";
import GlobalFooter from "@/components/layout/GlobalFooter";
import "./globals.css";

export const metadata: Metadata = {
  title: "Team stats",
  description: "Batting and pitching records with running AVG and ERA.",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body className="flex min-h-screen flex-col bg-zinc-50 antialiased dark:bg-black">
        <div className="flex-1">{children}</div>
        <GlobalFooter />
      </body>
    </html>
  );
}
