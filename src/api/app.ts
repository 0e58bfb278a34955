import type { ErrorHandler } from "hono";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import type { SessionCookieOptions, SessionService } from "../auth/index.js";
import type { AnalyticsConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import type { EmbedTokenMinter } from "../embed/token-minter.js";
import { createAuthRoutes } from "./routes/auth.js";
import { createDashboardRoutes } from "./routes/dashboard.js";
import { createHealthRoutes } from "./routes/health.js";

export interface AppDeps {
  sessions: SessionService;
  cookie: SessionCookieOptions;
  minter: EmbedTokenMinter;
  analytics: AnalyticsConfig;
  /** The one frontend origin allowed to call the API with credentials. */
  uiOrigin: string;
  clock?: () => Date;
}

// Global error handler for errors thrown by routes and middleware.
export const errorHandler: ErrorHandler = (err, c) => {
  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  // Return a safe error response to the client
  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use(
    "/*",
    cors({
      origin: [deps.uiOrigin],
      credentials: true,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
    }),
  );
  app.use(
    "/*",
    secureHeaders({
      contentSecurityPolicy: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
      strictTransportSecurity: "max-age=31536000; includeSubDomains; preload",
      xFrameOptions: "DENY",
      referrerPolicy: "no-referrer",
    }),
  );

  app.route("/api/health", createHealthRoutes(deps.clock));
  app.route("/api/auth", createAuthRoutes({ sessions: deps.sessions, cookie: deps.cookie }));
  app.route(
    "/api/dashboard",
    createDashboardRoutes({
      sessions: deps.sessions,
      cookie: deps.cookie,
      minter: deps.minter,
      analytics: deps.analytics,
    }),
  );

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError(errorHandler);

  return app;
}
