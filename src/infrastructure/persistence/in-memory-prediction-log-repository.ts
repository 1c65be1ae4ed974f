import type {
  NewPredictionLog,
  PredictionLog,
  PredictionLogRepository,
} from "../../domain/repositories/prediction-log-repository.js";

function newestFirst(a: PredictionLog, b: PredictionLog): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

export class InMemoryPredictionLogRepository implements PredictionLogRepository {
  private readonly logs = new Map<number, PredictionLog>();
  private nextId = 1;

  async create(entry: NewPredictionLog): Promise<PredictionLog> {
    const log: PredictionLog = {
      id: this.nextId++,
      apiKeyId: entry.apiKeyId,
      inputFeatures: { ...entry.inputFeatures },
      predictedPrice: entry.predictedPrice,
      responseTimeMs: entry.responseTimeMs ?? null,
      requestType: entry.requestType ?? "single",
      batchId: entry.batchId ?? null,
      createdAt: new Date(),
    };
    this.logs.set(log.id, log);
    return { ...log };
  }

  async createBatch(entries: NewPredictionLog[]): Promise<PredictionLog[]> {
    const created: PredictionLog[] = [];
    for (const entry of entries) {
      created.push(await this.create(entry));
    }
    return created;
  }

  async getById(id: number): Promise<PredictionLog | null> {
    const log = this.logs.get(id);
    return log ? { ...log } : null;
  }

  async getByApiKey(apiKeyId: number, skip = 0, limit = 100): Promise<PredictionLog[]> {
    return [...this.logs.values()]
      .filter((l) => l.apiKeyId === apiKeyId)
      .sort(newestFirst)
      .slice(skip, skip + limit)
      .map((l) => ({ ...l }));
  }

  async getByBatchId(batchId: string): Promise<PredictionLog[]> {
    return [...this.logs.values()].filter((l) => l.batchId === batchId).map((l) => ({ ...l }));
  }

  async getRecent(limit = 100): Promise<PredictionLog[]> {
    return [...this.logs.values()]
      .sort(newestFirst)
      .slice(0, limit)
      .map((l) => ({ ...l }));
  }

  async countByApiKey(apiKeyId: number): Promise<number> {
    let n = 0;
    for (const log of this.logs.values()) {
      if (log.apiKeyId === apiKeyId) n++;
    }
    return n;
  }

  async countAll(): Promise<number> {
    return this.logs.size;
  }
}
