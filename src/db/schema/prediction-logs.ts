import { bigint, doublePrecision, index, integer, jsonb, pgTable, serial, varchar } from "drizzle-orm/pg-core";
import { apiKeys } from "./api-keys.js";

/**
 * Audit trail of every inference. Rows outlive the key that produced them:
 * hard-deleting an API key nulls `api_key_id` instead of cascading.
 */
export const predictionLogs = pgTable(
  "prediction_logs",
  {
    id: serial("id").primaryKey(),
    apiKeyId: integer("api_key_id").references(() => apiKeys.id, { onDelete: "set null" }),
    inputFeatures: jsonb("input_features").$type<Record<string, unknown>>().notNull(),
    predictedPrice: doublePrecision("predicted_price").notNull(),
    responseTimeMs: integer("response_time_ms"),
    requestType: varchar("request_type", { length: 10 }).$type<"single" | "batch">().notNull().default("single"),
    batchId: varchar("batch_id", { length: 36 }),
    createdAt: bigint("created_at", { mode: "number" }).notNull(),
    updatedAt: bigint("updated_at", { mode: "number" })
      .notNull()
      .$onUpdate(() => Date.now()),
  },
  (table) => [
    index("idx_prediction_logs_api_key").on(table.apiKeyId),
    index("idx_prediction_logs_batch").on(table.batchId),
  ],
);
