import { mkdir, open, readdir, readFile, rename, rm } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { assertValidSessionId, isValidSessionId } from "../sessions/sessionId.js";
import type { Session, Turn } from "../types.js";
import { AppError, isAppError } from "../utils/errors.js";
import { KeyedMutex } from "../utils/keyedMutex.js";
import type { SessionStore } from "./types.js";

const turnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string()
});

export const sessionRecordSchema = z.object({
  sessionId: z.string(),
  owner: z.string(),
  createdAt: z.string(),
  lastActivityAt: z.string(),
  turns: z.array(turnSchema)
});

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseRecord(raw: string, sessionId: string): Session | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = sessionRecordSchema.safeParse(parsed);
  if (!result.success || result.data.sessionId !== sessionId) {
    return null;
  }
  return result.data;
}

/**
 * Writes `contents` to a sibling temp file, flushes it to disk and renames it
 * over `target`, so readers see either the old record or the new one.
 */
export async function writeFileAtomic(target: string, contents: string): Promise<void> {
  const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
  const handle = await open(temp, "w");
  try {
    await handle.writeFile(contents, "utf-8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  try {
    await rename(temp, target);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

/** One pretty-printed JSON file per session under `<dataDir>/sessions`. */
export class FileSessionStore implements SessionStore {
  private readonly sessionsDir: string;
  private readonly locks = new KeyedMutex();
  private ready: Promise<void> | null = null;

  constructor(dataDir: string) {
    this.sessionsDir = path.join(dataDir, "sessions");
  }

  async create(session: Session): Promise<void> {
    const file = this.pathFor(session.sessionId);
    await this.locks.runExclusive(session.sessionId, async () => {
      await this.ensureDir();
      await this.write(file, session);
    });
  }

  async read(sessionId: string): Promise<Session> {
    return this.load(this.pathFor(sessionId), sessionId);
  }

  async append(sessionId: string, ...turns: Turn[]): Promise<Session> {
    const file = this.pathFor(sessionId);
    return this.locks.runExclusive(sessionId, async () => {
      const session = await this.load(file, sessionId);
      const last = turns[turns.length - 1];
      const next: Session = {
        ...session,
        lastActivityAt: last ? last.timestamp : session.lastActivityAt,
        turns: [...session.turns, ...turns]
      };
      await this.write(file, next);
      return next;
    });
  }

  async delete(sessionId: string): Promise<void> {
    const file = this.pathFor(sessionId);
    await this.locks.runExclusive(sessionId, async () => {
      try {
        await rm(file);
      } catch (error) {
        if (isMissing(error)) {
          throw new AppError("NOT_FOUND", `Session ${sessionId} does not exist`);
        }
        throw new AppError("STORAGE_UNAVAILABLE", `Failed to delete session ${sessionId}`, {
          cause: error
        });
      }
    });
  }

  async listByOwner(owner: string): Promise<Session[]> {
    let entries: string[];
    try {
      entries = await readdir(this.sessionsDir);
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw new AppError("STORAGE_UNAVAILABLE", "Failed to list sessions", { cause: error });
    }

    const sessions: Session[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(".json")) {
        continue;
      }
      const sessionId = entry.slice(0, -".json".length);
      if (!isValidSessionId(sessionId)) {
        continue;
      }
      let raw: string;
      try {
        raw = await this.readRaw(this.pathFor(sessionId), sessionId);
      } catch (error) {
        // deleted between readdir and read
        if (isAppError(error, "NOT_FOUND")) {
          continue;
        }
        throw error;
      }
      const session = parseRecord(raw, sessionId);
      if (!session) {
        console.warn(`[store] skipping unreadable session record ${sessionId}`);
        continue;
      }
      if (session.owner === owner) {
        sessions.push(session);
      }
    }
    return sessions;
  }

  async close(): Promise<void> {
    // every write is flushed before its promise resolves
  }

  private pathFor(sessionId: string): string {
    return path.join(this.sessionsDir, `${assertValidSessionId(sessionId)}.json`);
  }

  private ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.sessionsDir, { recursive: true })
        .then(() => undefined)
        .catch((error: unknown) => {
          this.ready = null;
          throw new AppError("STORAGE_UNAVAILABLE", "Failed to create sessions directory", {
            cause: error
          });
        });
    }
    return this.ready;
  }

  private async load(file: string, sessionId: string): Promise<Session> {
    const session = parseRecord(await this.readRaw(file, sessionId), sessionId);
    if (!session) {
      throw new AppError("STORAGE_UNAVAILABLE", `Session ${sessionId} has a corrupted record`);
    }
    return session;
  }

  private async readRaw(file: string, sessionId: string): Promise<string> {
    try {
      return await readFile(file, "utf-8");
    } catch (error) {
      if (isMissing(error)) {
        throw new AppError("NOT_FOUND", `Session ${sessionId} does not exist`);
      }
      throw new AppError("STORAGE_UNAVAILABLE", `Failed to read session ${sessionId}`, {
        cause: error
      });
    }
  }

  private async write(file: string, session: Session): Promise<void> {
    try {
      await writeFileAtomic(file, `${JSON.stringify(session, null, 2)}\n`);
    } catch (error) {
      throw new AppError("STORAGE_UNAVAILABLE", `Failed to write session ${session.sessionId}`, {
        cause: error
      });
    }
  }
}
