import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ModelLoadError } from "../api/errors.js";
import { FEATURE_COLUMNS } from "./features.js";
import { LinearRegressionModel } from "./model.js";

describe("LinearRegressionModel", () => {
  const coefficients = FEATURE_COLUMNS.map((_, i) => i + 1);

  it("computes intercept plus the weighted sum", () => {
    const model = new LinearRegressionModel({ features: [...FEATURE_COLUMNS], coefficients, intercept: 10 });
    const vector = FEATURE_COLUMNS.map(() => 1);
    // 10 + (1 + 2 + ... + 13)
    expect(model.predict(vector)).toBe(101);
  });

  it("rejects a vector of the wrong length", () => {
    const model = new LinearRegressionModel({ features: [...FEATURE_COLUMNS], coefficients, intercept: 0 });
    expect(() => model.predict([1, 2])).toThrow(RangeError);
  });

  it("rejects features out of encoder order", () => {
    const swapped = [...FEATURE_COLUMNS];
    [swapped[0], swapped[1]] = [swapped[1], swapped[0]];
    expect(() => new LinearRegressionModel({ features: swapped, coefficients, intercept: 0 })).toThrow(ModelLoadError);
  });

  it("rejects a coefficient count mismatch", () => {
    expect(
      () => new LinearRegressionModel({ features: [...FEATURE_COLUMNS], coefficients: [1], intercept: 0 }),
    ).toThrow(/1 coefficients for 13 features/);
  });

  describe("load", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "model-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("loads the shipped artifact", async () => {
      const model = await LinearRegressionModel.load("models/model.json");
      expect(model.features).toEqual(FEATURE_COLUMNS);
    });

    it("fails on a missing file", async () => {
      await expect(LinearRegressionModel.load(join(dir, "absent.json"))).rejects.toThrow(/Model file not found/);
    });

    it("fails on invalid JSON", async () => {
      const path = join(dir, "broken.json");
      await writeFile(path, "{not json");
      await expect(LinearRegressionModel.load(path)).rejects.toThrow(/not valid JSON/);
    });

    it("fails on the wrong shape", async () => {
      const path = join(dir, "shape.json");
      await writeFile(path, JSON.stringify({ features: [], coefficients: "x", intercept: 0 }));
      await expect(LinearRegressionModel.load(path)).rejects.toBeInstanceOf(ModelLoadError);
    });
  });
});
