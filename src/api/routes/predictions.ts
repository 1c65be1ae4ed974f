import { Hono, type MiddlewareHandler } from "hono";
import type { AuthEnv } from "../../auth/index.js";
import { batchPredictionSchema, houseFeaturesSchema } from "../../inference/features.js";
import type { PredictionService } from "../../inference/prediction-service.js";
import { parseJsonBody } from "../validation.js";

const CURRENCY = "USD";

export interface PredictionRouteDeps {
  predictions: PredictionService;
  requireAuth: MiddlewareHandler<AuthEnv>;
}

/** POST /predict and /predict/batch. */
export function createPredictionRoutes({ predictions, requireAuth }: PredictionRouteDeps) {
  const routes = new Hono<AuthEnv>();
  routes.use("*", requireAuth);

  routes.post("/", async (c) => {
    const features = await parseJsonBody(c, houseFeaturesSchema);
    const price = await predictions.predict(features, c.get("identity").id);
    return c.json({ predicted_price: price, currency: CURRENCY });
  });

  routes.post("/batch", async (c) => {
    const { houses } = await parseJsonBody(c, batchPredictionSchema);
    const { prices } = await predictions.predictBatch(houses, c.get("identity").id);
    return c.json({
      predictions: prices.map((price) => ({ predicted_price: price, currency: CURRENCY })),
      count: prices.length,
    });
  });

  return routes;
}
