/**
 * Auth: cookie-carried login sessions and the middleware that gates routes.
 *
 * Provides:
 * - `SessionService` for login, logout and current-user resolution
 * - `requireSession` middleware for Hono routes
 * - Session cookie helpers shared by the auth routes
 */

import type { Context, Next } from "hono";
import { deleteCookie, getCookie, setCookie } from "hono/cookie";
import type { DirectoryUser } from "../users/user-directory.js";
import type { SessionService } from "./session-service.js";

export type { SessionRecord } from "./repository-types.js";
export type { ISessionRepository } from "./session-repository.js";
export type { AuthenticatedSession, LoginResult } from "./session-service.js";
export { SessionService } from "./session-service.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SessionEnv {
  Variables: {
    user: DirectoryUser;
  };
}

export interface SessionCookieOptions {
  name: string;
  /** Cookie lifetime in milliseconds; matches the session TTL. */
  ttlMs: number;
  /** Set the Secure attribute (production deployments behind TLS). */
  secure: boolean;
}

// ---------------------------------------------------------------------------
// Cookie helpers
// ---------------------------------------------------------------------------

export function readSessionCookie(c: Context, cookie: SessionCookieOptions): string | undefined {
  return getCookie(c, cookie.name);
}

export function writeSessionCookie(c: Context, cookie: SessionCookieOptions, sessionId: string): void {
  setCookie(c, cookie.name, sessionId, {
    path: "/",
    httpOnly: true,
    secure: cookie.secure,
    sameSite: "Lax",
    maxAge: Math.floor(cookie.ttlMs / 1000),
  });
}

export function clearSessionCookie(c: Context, cookie: SessionCookieOptions): void {
  deleteCookie(c, cookie.name, { path: "/" });
}

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

/**
 * Create a `requireSession` middleware that rejects requests without a live
 * session with 401.
 *
 * On success, sets `c.set("user", DirectoryUser)`.
 */
export function requireSession(sessions: SessionService, cookie: SessionCookieOptions) {
  return async (c: Context<SessionEnv>, next: Next) => {
    const resolved = await sessions.currentUser(readSessionCookie(c, cookie));
    if (!resolved) {
      return c.json({ error: "Authentication required" }, 401);
    }

    c.set("user", resolved.user);
    return next();
  };
}
