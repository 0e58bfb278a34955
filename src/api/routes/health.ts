import { Hono } from "hono";

/**
 * Liveness probe. Public, unauthenticated, no dependencies: it answers as
 * long as the process can serve requests.
 */
export function createHealthRoutes(clock: () => Date = () => new Date()): Hono {
  const routes = new Hono();

  routes.get("/", (c) => c.json({ status: "healthy", timestamp: clock().toISOString() }));

  return routes;
}
