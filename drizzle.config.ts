/**
 * MIGRATION CONVENTIONS
 *
 * SAFE operations (backward-compatible, can run while old code serves traffic):
 *   - CREATE TABLE
 *   - ADD COLUMN (with DEFAULT or nullable)
 *   - CREATE INDEX
 *
 * UNSAFE operations (require expand-contract):
 *   - DROP TABLE / DROP COLUMN: stop reading it first, drop in a later release
 *   - RENAME COLUMN: add new column, backfill, update code, drop old in next release
 *
 * Drizzle-kit generates migrations from schema diffs. After changing src/db/schema/,
 * run `npm run db:generate`, review the SQL, and keep statements separated by
 * `--> statement-breakpoint` so src/db/migrate.ts can apply them.
 */
import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: "./src/db/schema/index.ts",
  out: "./drizzle/migrations",
  dialect: "postgresql",
  dbCredentials: { url: process.env.DATABASE_URL || "postgres://localhost:5432/housing" },
});
