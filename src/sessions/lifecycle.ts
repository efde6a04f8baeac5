import type { SessionStore } from "../store/types.js";
import { ANONYMOUS_OWNER, type Session, type SessionSummary } from "../types.js";
import { AppError } from "../utils/errors.js";
import { assertValidSessionId, generateSessionId, isValidSessionId } from "./sessionId.js";

const PREVIEW_LENGTH = 100;

/**
 * Identity-owned sessions are visible to their owner only. Anonymous sessions
 * are reachable by whoever holds the (unguessable) identifier.
 */
export function canAccess(session: Session, owner: string): boolean {
  return session.owner === ANONYMOUS_OWNER || session.owner === owner;
}

/** Cuts on code points so a surrogate pair is never split. */
function truncate(text: string, maxChars: number): string {
  return Array.from(text).slice(0, maxChars).join("");
}

export function summarize(session: Session): SessionSummary {
  const firstQuestion = session.turns.find((turn) => turn.role === "user");
  return {
    sessionId: session.sessionId,
    createdAt: session.createdAt,
    lastActivityAt: session.lastActivityAt,
    preview: firstQuestion ? truncate(firstQuestion.content, PREVIEW_LENGTH) : "",
    turnCount: session.turns.length
  };
}

export class SessionLifecycle {
  private readonly store: SessionStore;

  constructor(store: SessionStore) {
    this.store = store;
  }

  validateIdentifier(raw: unknown): boolean {
    return isValidSessionId(raw);
  }

  async create(owner?: string | null): Promise<string> {
    const now = new Date().toISOString();
    const sessionId = generateSessionId();
    await this.store.create({
      sessionId,
      owner: owner ?? ANONYMOUS_OWNER,
      createdAt: now,
      lastActivityAt: now,
      turns: []
    });
    console.log(`[sessions] created ${sessionId} for ${owner ?? ANONYMOUS_OWNER}`);
    return sessionId;
  }

  /** Loads a session the caller may use, or throws the matching taxonomy error. */
  async get(rawId: unknown, owner: string): Promise<Session> {
    const sessionId = assertValidSessionId(rawId);
    const session = await this.store.read(sessionId);
    if (!canAccess(session, owner)) {
      throw new AppError("UNAUTHORIZED", `${owner} may not access session ${sessionId}`);
    }
    return session;
  }

  async delete(rawId: unknown, owner: string): Promise<void> {
    const session = await this.get(rawId, owner);
    await this.store.delete(session.sessionId);
    console.log(`[sessions] deleted ${session.sessionId}`);
  }

  async list(owner: string): Promise<SessionSummary[]> {
    if (owner === ANONYMOUS_OWNER) {
      return [];
    }
    const sessions = await this.store.listByOwner(owner);
    return sessions
      .map(summarize)
      .sort(
        (a, b) =>
          b.createdAt.localeCompare(a.createdAt) ||
          b.lastActivityAt.localeCompare(a.lastActivityAt)
      );
  }

  /** Confirms the target session is usable; the caller moves its own pointer. */
  async switch(rawId: unknown, owner: string): Promise<string> {
    const session = await this.get(rawId, owner);
    return session.sessionId;
  }
}
