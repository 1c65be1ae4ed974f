import { Hono, type MiddlewareHandler } from "hono";
import type { AuthEnv } from "../../auth/index.js";
import type { PredictionLog, PredictionLogRepository } from "../../domain/repositories/prediction-log-repository.js";
import { AuthorizationError, NotFoundError } from "../errors.js";
import { parseIdParam, parsePagination } from "../validation.js";

function toResponse(log: PredictionLog) {
  return {
    id: log.id,
    api_key_id: log.apiKeyId,
    input_features: log.inputFeatures,
    predicted_price: log.predictedPrice,
    response_time_ms: log.responseTimeMs,
    request_type: log.requestType,
    batch_id: log.batchId,
    created_at: log.createdAt.toISOString(),
  };
}

export interface LogRouteDeps {
  logs: PredictionLogRepository;
  requireAuth: MiddlewareHandler<AuthEnv>;
}

/** Read access to the caller's own prediction audit trail. */
export function createLogRoutes({ logs, requireAuth }: LogRouteDeps) {
  const routes = new Hono<AuthEnv>();
  routes.use("*", requireAuth);

  routes.get("/", async (c) => {
    const { id } = c.get("identity");
    const { skip, limit } = parsePagination(c);
    const [page, total] = await Promise.all([logs.getByApiKey(id, skip, limit), logs.countByApiKey(id)]);
    return c.json({ logs: page.map(toResponse), total, skip, limit });
  });

  routes.get("/stats", async (c) => {
    const [totalPredictions, mine] = await Promise.all([logs.countAll(), logs.countByApiKey(c.get("identity").id)]);
    return c.json({ total_predictions: totalPredictions, predictions_by_user: mine });
  });

  routes.get("/:id", async (c) => {
    const log = await logs.getById(parseIdParam(c));
    if (!log) throw new NotFoundError("Prediction log not found");
    if (log.apiKeyId !== c.get("identity").id) throw new AuthorizationError("Not authorized to view this log");
    return c.json(toResponse(log));
  });

  return routes;
}
