import type { Session, Turn } from "../types.js";
import type { AuthUser } from "../types/user.js";

/**
 * Durable session records. Implementations surface I/O faults as
 * `STORAGE_UNAVAILABLE` and missing records as `NOT_FOUND`.
 */
export interface SessionStore {
  create(session: Session): Promise<void>;
  read(sessionId: string): Promise<Session>;
  /**
   * Appends turns in order as one write. Appends to the same session are
   * serialized; the returned session reflects this append.
   */
  append(sessionId: string, ...turns: Turn[]): Promise<Session>;
  delete(sessionId: string): Promise<void>;
  listByOwner(owner: string): Promise<Session[]>;
  close(): Promise<void>;
}

export type UserRecord = {
  uid: string;
  email: string | null;
  name: string | null;
  createdAt: string;
  lastLoginAt: string;
};

export interface UserStore {
  /** Creates the record on first sight, refreshes it afterwards. */
  recordLogin(user: AuthUser): Promise<UserRecord>;
  find(uid: string): Promise<UserRecord | null>;
}
