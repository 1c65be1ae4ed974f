/**
 * Repository Interface: PredictionLogRepository (ASYNC)
 *
 * Append-only audit trail of inferences. `apiKeyId` is null when the request
 * was unauthenticated or the key has since been hard-deleted.
 */

export type PredictionRequestType = "single" | "batch";

export interface PredictionLog {
  id: number;
  apiKeyId: number | null;
  inputFeatures: Record<string, unknown>;
  predictedPrice: number;
  responseTimeMs: number | null;
  requestType: PredictionRequestType;
  batchId: string | null;
  createdAt: Date;
}

export interface NewPredictionLog {
  apiKeyId: number | null;
  inputFeatures: Record<string, unknown>;
  predictedPrice: number;
  responseTimeMs?: number | null;
  requestType?: PredictionRequestType;
  batchId?: string | null;
}

export interface PredictionLogRepository {
  create(entry: NewPredictionLog): Promise<PredictionLog>;

  /** Insert several rows at once; returned in input order. */
  createBatch(entries: NewPredictionLog[]): Promise<PredictionLog[]>;

  getById(id: number): Promise<PredictionLog | null>;

  /** Logs owned by one key, newest first. */
  getByApiKey(apiKeyId: number, skip?: number, limit?: number): Promise<PredictionLog[]>;

  getByBatchId(batchId: string): Promise<PredictionLog[]>;

  /** Most recent logs across all keys, newest first. */
  getRecent(limit?: number): Promise<PredictionLog[]>;

  countByApiKey(apiKeyId: number): Promise<number>;

  countAll(): Promise<number>;
}
