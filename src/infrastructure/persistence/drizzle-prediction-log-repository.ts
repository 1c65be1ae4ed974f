import { asc, count, desc, eq } from "drizzle-orm";
import type { DrizzleDb } from "../../db/index.js";
import { predictionLogs } from "../../db/schema/prediction-logs.js";
import type {
  NewPredictionLog,
  PredictionLog,
  PredictionLogRepository,
} from "../../domain/repositories/prediction-log-repository.js";

type PredictionLogRow = typeof predictionLogs.$inferSelect;

function toPredictionLog(row: PredictionLogRow): PredictionLog {
  return {
    id: row.id,
    apiKeyId: row.apiKeyId,
    inputFeatures: row.inputFeatures,
    predictedPrice: row.predictedPrice,
    responseTimeMs: row.responseTimeMs,
    requestType: row.requestType,
    batchId: row.batchId,
    createdAt: new Date(row.createdAt),
  };
}

export class DrizzlePredictionLogRepository implements PredictionLogRepository {
  constructor(private readonly db: DrizzleDb) {}

  async create(entry: NewPredictionLog): Promise<PredictionLog> {
    const [log] = await this.createBatch([entry]);
    return log;
  }

  async createBatch(entries: NewPredictionLog[]): Promise<PredictionLog[]> {
    if (entries.length === 0) return [];
    const now = Date.now();
    const rows = await this.db
      .insert(predictionLogs)
      .values(
        entries.map((e) => ({
          apiKeyId: e.apiKeyId,
          inputFeatures: e.inputFeatures,
          predictedPrice: e.predictedPrice,
          responseTimeMs: e.responseTimeMs ?? null,
          requestType: e.requestType ?? "single",
          batchId: e.batchId ?? null,
          createdAt: now,
          updatedAt: now,
        })),
      )
      .returning();
    // serial ids follow insertion order
    return rows.sort((a, b) => a.id - b.id).map(toPredictionLog);
  }

  async getById(id: number): Promise<PredictionLog | null> {
    const rows = await this.db.select().from(predictionLogs).where(eq(predictionLogs.id, id)).limit(1);
    return rows.length > 0 ? toPredictionLog(rows[0]) : null;
  }

  async getByApiKey(apiKeyId: number, skip = 0, limit = 100): Promise<PredictionLog[]> {
    const rows = await this.db
      .select()
      .from(predictionLogs)
      .where(eq(predictionLogs.apiKeyId, apiKeyId))
      .orderBy(desc(predictionLogs.createdAt), desc(predictionLogs.id))
      .offset(skip)
      .limit(limit);
    return rows.map(toPredictionLog);
  }

  async getByBatchId(batchId: string): Promise<PredictionLog[]> {
    const rows = await this.db
      .select()
      .from(predictionLogs)
      .where(eq(predictionLogs.batchId, batchId))
      .orderBy(asc(predictionLogs.id));
    return rows.map(toPredictionLog);
  }

  async getRecent(limit = 100): Promise<PredictionLog[]> {
    const rows = await this.db
      .select()
      .from(predictionLogs)
      .orderBy(desc(predictionLogs.createdAt), desc(predictionLogs.id))
      .limit(limit);
    return rows.map(toPredictionLog);
  }

  async countByApiKey(apiKeyId: number): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(predictionLogs)
      .where(eq(predictionLogs.apiKeyId, apiKeyId));
    return row?.value ?? 0;
  }

  async countAll(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(predictionLogs);
    return row?.value ?? 0;
  }
}
