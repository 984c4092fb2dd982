import { defineConfig } from "drizzle-kit";

// drizzle-kit config: `npm run db:push` creates or updates the tables in src/db/schema.ts.
// https://orm.drizzle.team/kit-docs/overview
export default defineConfig({
  dialect: "postgresql",
  schema: "./src/db/schema.ts",
  out: "./src/db/migrations",
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "",
  },
});
