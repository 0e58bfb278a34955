import { Hono } from "hono";
import { requireSession, type SessionCookieOptions, type SessionEnv, type SessionService } from "../../auth/index.js";
import type { AnalyticsConfig } from "../../config/index.js";
import { logger } from "../../config/logger.js";
import { buildEmbedConfig } from "../../embed/embed-config.js";
import { EmbedConfigurationError, UpstreamTokenError } from "../../embed/errors.js";
import type { EmbedTokenMinter } from "../../embed/token-minter.js";

export interface DashboardRouteDeps {
  sessions: SessionService;
  cookie: SessionCookieOptions;
  minter: EmbedTokenMinter;
  analytics: AnalyticsConfig;
}

export function createDashboardRoutes(deps: DashboardRouteDeps): Hono<SessionEnv> {
  const routes = new Hono<SessionEnv>();

  // GET /api/dashboard/embed-config: mint a fresh token for the session's user
  routes.get("/embed-config", requireSession(deps.sessions, deps.cookie), async (c) => {
    const user = c.get("user");

    try {
      const token = await deps.minter.mint(user);
      return c.json(buildEmbedConfig(deps.analytics, user, token));
    } catch (err) {
      if (err instanceof EmbedConfigurationError) {
        logger.error("Embed token mint skipped: workspace not configured", { missing: err.missing });
        return c.json({ error: "Embedding is not configured", message: err.message, missing: [...err.missing] }, 500);
      }
      if (err instanceof UpstreamTokenError) {
        logger.error("Embed token mint failed", { userId: user.id, step: err.step, status: err.status });
        return c.json(
          {
            error: "Token exchange failed",
            message: err.message,
            step: err.step,
            upstreamStatus: err.status,
            upstreamBody: err.body,
          },
          502,
        );
      }
      throw err;
    }
  });

  return routes;
}
