/** A stored login session. Timestamps are epoch milliseconds. */
export interface SessionRecord {
  id: string;
  userId: string;
  username: string;
  createdAt: number;
  expiresAt: number;
}
