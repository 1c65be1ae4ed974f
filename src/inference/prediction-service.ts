import { randomUUID } from "node:crypto";
import { PredictionError, ValidationError } from "../api/errors.js";
import { logger } from "../config/logger.js";
import type { PredictionLogRepository } from "../domain/repositories/prediction-log-repository.js";
import { encodeFeatures, type HouseFeatures, MAX_BATCH_SIZE } from "./features.js";
import type { RegressionModel } from "./model.js";

export interface BatchPrediction {
  batchId: string;
  prices: number[];
}

/** Round reported prices to 8 decimal places. */
function roundPrice(value: number): number {
  return Math.round(value * 1e8) / 1e8;
}

/**
 * Runs the model and records every inference in the audit log, attributed to
 * the caller's key id.
 */
export class PredictionService {
  constructor(
    private readonly model: RegressionModel,
    private readonly logs: PredictionLogRepository,
  ) {}

  private infer(features: HouseFeatures): number {
    const raw = this.model.predict(encodeFeatures(features));
    if (!Number.isFinite(raw)) {
      logger.error("Prediction produced a non-finite value", { value: String(raw) });
      throw new PredictionError();
    }
    return roundPrice(raw);
  }

  async predict(features: HouseFeatures, apiKeyId: number | null): Promise<number> {
    const started = performance.now();
    const price = this.infer(features);
    const responseTimeMs = Math.round(performance.now() - started);

    await this.logs.create({
      apiKeyId,
      inputFeatures: { ...features },
      predictedPrice: price,
      responseTimeMs,
      requestType: "single",
    });
    return price;
  }

  async predictBatch(houses: HouseFeatures[], apiKeyId: number | null): Promise<BatchPrediction> {
    if (houses.length === 0 || houses.length > MAX_BATCH_SIZE) {
      throw new ValidationError(`Batch size must be between 1 and ${MAX_BATCH_SIZE}`);
    }
    const started = performance.now();
    const prices = houses.map((h) => this.infer(h));
    const responseTimeMs = Math.round(performance.now() - started);
    const batchId = randomUUID();

    await this.logs.createBatch(
      houses.map((h, i) => ({
        apiKeyId,
        inputFeatures: { ...h },
        predictedPrice: prices[i],
        responseTimeMs,
        requestType: "batch" as const,
        batchId,
      })),
    );
    logger.info("Batch prediction completed", { batchId, count: prices.length, apiKeyId });
    return { batchId, prices };
  }
}
