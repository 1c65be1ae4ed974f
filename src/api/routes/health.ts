import { Hono } from "hono";
import { logger } from "../../config/logger.js";

export type ComponentCheck = () => Promise<void>;

export interface HealthRouteOptions {
  version: string;
  environment: string;
  /** Named dependency probes; each throws when its component is unhealthy. */
  checks: Record<string, ComponentCheck>;
}

// Public, unauthenticated, used by load balancers and monitoring.
export function createHealthRoutes({ version, environment, checks }: HealthRouteOptions) {
  const routes = new Hono();

  const base = () => ({ timestamp: new Date().toISOString(), version, environment });

  routes.get("/", (c) => c.json({ status: "healthy", ...base() }));

  routes.get("/detailed", async (c) => {
    const components: Record<string, "healthy" | "unhealthy"> = {};
    await Promise.all(
      Object.entries(checks).map(async ([name, check]) => {
        try {
          await check();
          components[name] = "healthy";
        } catch (err) {
          logger.error("Health check failed", { component: name, error: err instanceof Error ? err.message : String(err) });
          components[name] = "unhealthy";
        }
      }),
    );
    const healthy = Object.values(components).every((s) => s === "healthy");
    return c.json({ status: healthy ? "healthy" : "degraded", ...base(), components });
  });

  return routes;
}
