import type { SessionRecord } from "./repository-types.js";

/**
 * Storage for login sessions. Implementations may live in process memory or
 * in an external store, so every operation is async.
 */
export interface ISessionRepository {
  create(session: SessionRecord): Promise<SessionRecord>;
  /** Returns the session, or null when unknown or expired (expired rows are removed). */
  get(sessionId: string): Promise<SessionRecord | null>;
  revoke(sessionId: string): Promise<boolean>;
  purgeExpired(): Promise<number>;
  count(): Promise<number>;
}
