import type { SessionStore } from "../store/types.js";
import type { Session, Turn } from "../types.js";
import { MAX_CONTEXT_TURNS } from "../utils/config.js";

export function clampContextSize(requested: number): number {
  if (!Number.isFinite(requested)) {
    return MAX_CONTEXT_TURNS;
  }
  return Math.min(MAX_CONTEXT_TURNS, Math.max(1, Math.floor(requested)));
}

/** Most recent `maxTurns` turns, oldest first. */
export function recentTurns(turns: readonly Turn[], maxTurns: number): Turn[] {
  return turns.slice(-clampContextSize(maxTurns));
}

export class ContextAssembler {
  private readonly store: SessionStore;
  readonly maxTurns: number;

  constructor(store: SessionStore, maxTurns: number) {
    this.store = store;
    this.maxTurns = clampContextSize(maxTurns);
  }

  async buildContext(sessionId: string): Promise<Turn[]> {
    return this.fromSession(await this.store.read(sessionId));
  }

  /** Same selection for a session the caller has already loaded. */
  fromSession(session: Session): Turn[] {
    return recentTurns(session.turns, this.maxTurns);
  }
}
