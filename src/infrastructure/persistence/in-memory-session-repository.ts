import type { SessionRecord } from "../../auth/repository-types.js";
import type { ISessionRepository } from "../../auth/session-repository.js";

/**
 * Process-local session storage. Sessions disappear on restart; use the
 * Drizzle repository when they should survive one.
 */
export class InMemorySessionRepository implements ISessionRepository {
  private readonly sessions = new Map<string, SessionRecord>();

  async create(session: SessionRecord): Promise<SessionRecord> {
    this.sessions.set(session.id, { ...session });
    return session;
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    const session = this.sessions.get(sessionId);
    if (!session) return null;

    if (Date.now() > session.expiresAt) {
      this.sessions.delete(sessionId);
      return null;
    }

    return { ...session };
  }

  async revoke(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async purgeExpired(): Promise<number> {
    const now = Date.now();
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (now > session.expiresAt) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    return this.sessions.size;
  }
}
