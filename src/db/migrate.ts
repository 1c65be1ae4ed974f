import { readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { sql } from "drizzle-orm";
import { bigint, pgTable, text } from "drizzle-orm/pg-core";
import type { DrizzleDb } from "./index.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Bookkeeping table; deliberately not part of the application schema. */
const migrations = pgTable("__migrations", {
  name: text("name").primaryKey(),
  appliedAt: bigint("applied_at", { mode: "number" }).notNull(),
});

/** Separator between statements inside one migration file. */
const STATEMENT_BREAKPOINT = "--> statement-breakpoint";

/**
 * Resolve the migrations folder.
 *
 * __dirname is <root>/src/db under Vitest and <root>/dist/db in production;
 * both sit two levels below the project root.
 */
export function defaultMigrationsFolder(): string {
  return path.resolve(__dirname, "../../drizzle/migrations");
}

/** Split a migration file into individual statements. */
export function splitStatements(source: string): string[] {
  return source
    .split(STATEMENT_BREAKPOINT)
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Apply every pending `.sql` migration in lexical order.
 *
 * Applied files are recorded in `__migrations`, so re-running is a no-op.
 * Returns the names of the files applied by this call.
 */
export async function runMigrations(db: DrizzleDb, migrationsFolder = defaultMigrationsFolder()): Promise<string[]> {
  await db.execute(
    sql.raw(`CREATE TABLE IF NOT EXISTS "__migrations" ("name" text PRIMARY KEY, "applied_at" bigint NOT NULL)`),
  );

  const applied = new Set((await db.select({ name: migrations.name }).from(migrations)).map((r) => r.name));

  const files = readdirSync(migrationsFolder)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const newlyApplied: string[] = [];
  for (const file of files) {
    if (applied.has(file)) continue;
    const statements = splitStatements(readFileSync(path.join(migrationsFolder, file), "utf8"));
    await db.transaction(async (tx) => {
      for (const statement of statements) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(migrations).values({ name: file, appliedAt: Date.now() });
    });
    newlyApplied.push(file);
  }
  return newlyApplied;
}
