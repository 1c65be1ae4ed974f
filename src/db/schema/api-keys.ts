import { bigint, boolean, index, pgTable, serial, uniqueIndex, varchar } from "drizzle-orm/pg-core";

export const apiKeys = pgTable(
  "api_keys",
  {
    id: serial("id").primaryKey(),
    name: varchar("name", { length: 100 }).notNull(),
    description: varchar("description", { length: 500 }),
    /** scrypt digest of the raw API key. The raw key is NEVER stored. */
    keyHash: varchar("key_hash", { length: 255 }).notNull(),
    /** First 8 characters of the raw key. Narrows candidate lookup only. */
    keyPrefix: varchar("key_prefix", { length: 8 }).notNull(),
    isActive: boolean("is_active").notNull().default(true),
    /** Unix epoch ms. Null = not soft-deleted. */
    deletedAt: bigint("deleted_at", { mode: "number" }),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    updatedAt: bigint("updated_at", { mode: "number" })
      .notNull()
      .$onUpdate(() => Date.now()),
  },
  (table) => [
    uniqueIndex("idx_api_keys_key_hash").on(table.keyHash),
    index("idx_api_keys_key_prefix").on(table.keyPrefix),
    index("idx_api_keys_is_active").on(table.isActive),
  ],
);
