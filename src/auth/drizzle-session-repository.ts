import { eq, lt, sql } from "drizzle-orm";
import type { SessionDb } from "../db/index.js";
import { sessions } from "../db/schema/index.js";
import type { SessionRecord } from "./repository-types.js";
import type { ISessionRepository } from "./session-repository.js";

export class DrizzleSessionRepository implements ISessionRepository {
  constructor(private readonly db: SessionDb) {}

  async create(session: SessionRecord): Promise<SessionRecord> {
    this.db
      .insert(sessions)
      .values({
        id: session.id,
        userId: session.userId,
        username: session.username,
        createdAt: session.createdAt,
        expiresAt: session.expiresAt,
      })
      .run();
    return session;
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    const row = this.db.select().from(sessions).where(eq(sessions.id, sessionId)).get();
    if (!row) return null;

    if (Date.now() > row.expiresAt) {
      this.db.delete(sessions).where(eq(sessions.id, sessionId)).run();
      return null;
    }

    return {
      id: row.id,
      userId: row.userId,
      username: row.username,
      createdAt: row.createdAt,
      expiresAt: row.expiresAt,
    };
  }

  async revoke(sessionId: string): Promise<boolean> {
    const result = this.db.delete(sessions).where(eq(sessions.id, sessionId)).run();
    return result.changes > 0;
  }

  async purgeExpired(): Promise<number> {
    const result = this.db.delete(sessions).where(lt(sessions.expiresAt, Date.now())).run();
    return result.changes;
  }

  async count(): Promise<number> {
    return this.db.select({ count: sql<number>`count(*)` }).from(sessions).get()?.count ?? 0;
  }
}
