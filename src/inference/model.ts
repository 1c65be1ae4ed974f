import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { ModelLoadError } from "../api/errors.js";
import { logger } from "../config/logger.js";
import { FEATURE_COLUMNS } from "./features.js";

/** A loaded regression model: encoded feature vector in, price out. */
export interface RegressionModel {
  readonly features: readonly string[];
  predict(vector: readonly number[]): number;
}

const artifactSchema = z.object({
  features: z.array(z.string()),
  coefficients: z.array(z.number().finite()),
  intercept: z.number().finite(),
});

export type ModelArtifact = z.infer<typeof artifactSchema>;

/** Linear regression over the encoded feature vector. */
export class LinearRegressionModel implements RegressionModel {
  readonly features: readonly string[];
  private readonly coefficients: readonly number[];
  private readonly intercept: number;

  constructor(artifact: ModelArtifact) {
    const { features, coefficients, intercept } = artifact;
    if (features.length !== FEATURE_COLUMNS.length || features.some((f, i) => f !== FEATURE_COLUMNS[i])) {
      throw new ModelLoadError(`Model features do not match the encoder: expected [${FEATURE_COLUMNS.join(", ")}]`);
    }
    if (coefficients.length !== features.length) {
      throw new ModelLoadError(`Model has ${coefficients.length} coefficients for ${features.length} features`);
    }
    this.features = features;
    this.coefficients = coefficients;
    this.intercept = intercept;
  }

  predict(vector: readonly number[]): number {
    if (vector.length !== this.coefficients.length) {
      throw new RangeError(`Expected ${this.coefficients.length} features, got ${vector.length}`);
    }
    return vector.reduce((sum, x, i) => sum + x * this.coefficients[i], this.intercept);
  }

  /**
   * Load a JSON model artifact from disk. Called once at startup; the
   * instance is passed to whatever needs it.
   */
  static async load(path: string): Promise<LinearRegressionModel> {
    const fullPath = resolve(path);
    let raw: string;
    try {
      raw = await readFile(fullPath, "utf-8");
    } catch (err) {
      throw new ModelLoadError(`Model file not found: ${fullPath}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ModelLoadError(`Model file is not valid JSON: ${fullPath}`, { cause: err });
    }

    const parsed = artifactSchema.safeParse(json);
    if (!parsed.success) {
      throw new ModelLoadError(`Model file has an invalid shape: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }

    const model = new LinearRegressionModel(parsed.data);
    logger.info("Model loaded", { path: fullPath, features: model.features.length });
    return model;
  }
}
