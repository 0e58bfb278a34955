import { randomUUID } from "node:crypto";
import type { DirectoryUser, IUserDirectory } from "../users/user-directory.js";
import type { SessionRecord } from "./repository-types.js";
import type { ISessionRepository } from "./session-repository.js";

export type LoginResult =
  | { ok: true; user: DirectoryUser; session: SessionRecord }
  | { ok: false; reason: "unknown_user" };

/** A session that resolved to a user still present in the directory. */
export interface AuthenticatedSession {
  user: DirectoryUser;
  session: SessionRecord;
}

export interface SessionServiceOptions {
  /** Session lifetime in milliseconds. */
  ttlMs: number;
}

/**
 * Binds login sessions to directory users.
 *
 * Login is identity selection only: any username present in the directory is
 * accepted without a credential check. The session id is the handle the
 * caller keeps (the HTTP layer stores it in a cookie).
 */
export class SessionService {
  constructor(
    private readonly repo: ISessionRepository,
    private readonly directory: IUserDirectory,
    private readonly options: SessionServiceOptions,
  ) {}

  async login(username: string): Promise<LoginResult> {
    const user = this.directory.findByUsername(username);
    if (!user) return { ok: false, reason: "unknown_user" };

    const now = Date.now();
    const session = await this.repo.create({
      id: randomUUID(),
      userId: user.id,
      username,
      createdAt: now,
      expiresAt: now + this.options.ttlMs,
    });
    return { ok: true, user, session };
  }

  /** Revoke the session if it exists. Unknown or missing ids are ignored. */
  async logout(sessionId: string | undefined): Promise<void> {
    if (!sessionId) return;
    await this.repo.revoke(sessionId);
  }

  /**
   * Resolve the user bound to a session. Returns null when there is no
   * session, it has expired, or its user has left the directory.
   */
  async currentUser(sessionId: string | undefined): Promise<AuthenticatedSession | null> {
    if (!sessionId) return null;

    const session = await this.repo.get(sessionId);
    if (!session) return null;

    const user = this.directory.findByUsername(session.username);
    if (!user || user.id !== session.userId) return null;

    return { user, session };
  }

  purgeExpired(): Promise<number> {
    return this.repo.purgeExpired();
  }
}
