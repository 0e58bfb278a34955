/**
 * Auth routes: identity-selection login backed by a cookie session.
 *
 * - POST /api/auth/login        bind a session to a directory user
 * - POST /api/auth/logout       revoke the session (always succeeds)
 * - GET  /api/auth/current-user profile of the bound user
 *
 * No password is checked. This is a demo placeholder, not a production
 * authentication contract.
 */

import { Hono } from "hono";
import { z } from "zod";
import {
  clearSessionCookie,
  readSessionCookie,
  requireSession,
  type SessionCookieOptions,
  type SessionEnv,
  type SessionService,
  writeSessionCookie,
} from "../../auth/index.js";
import { logger } from "../../config/logger.js";
import { toUserProfile } from "../../users/user-directory.js";

export interface AuthRouteDeps {
  sessions: SessionService;
  cookie: SessionCookieOptions;
}

const loginBodySchema = z.object({
  username: z.string().min(1),
});

export function createAuthRoutes(deps: AuthRouteDeps): Hono<SessionEnv> {
  const routes = new Hono<SessionEnv>();

  routes.post("/login", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }

    const parsed = loginBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "Username is required" }, 400);
    }

    const { username } = parsed.data;
    const result = await deps.sessions.login(username);
    if (!result.ok) {
      logger.warn("Login rejected", { username, reason: result.reason });
      return c.json({ error: "Invalid username" }, 401);
    }

    // A fresh login replaces whatever session this client held before.
    await deps.sessions.logout(readSessionCookie(c, deps.cookie));
    writeSessionCookie(c, deps.cookie, result.session.id);
    logger.info("User logged in", { userId: result.user.id, username });

    return c.json({ success: true, user: toUserProfile(result.user) });
  });

  routes.post("/logout", async (c) => {
    const sessionId = readSessionCookie(c, deps.cookie);
    await deps.sessions.logout(sessionId);
    clearSessionCookie(c, deps.cookie);
    if (sessionId) logger.info("User logged out");
    return c.json({ success: true });
  });

  routes.get("/current-user", requireSession(deps.sessions, deps.cookie), (c) => {
    return c.json(toUserProfile(c.get("user")));
  });

  return routes;
}
