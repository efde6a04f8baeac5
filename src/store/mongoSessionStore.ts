import { ChatSession, type ChatSessionRecord } from "../models/ChatSession.js";
import { User } from "../models/User.js";
import { assertValidSessionId } from "../sessions/sessionId.js";
import type { Session, Turn } from "../types.js";
import type { AuthUser } from "../types/user.js";
import { disconnectDatabase } from "../db.js";
import { AppError, isAppError } from "../utils/errors.js";
import { KeyedMutex } from "../utils/keyedMutex.js";
import type { SessionStore, UserRecord, UserStore } from "./types.js";

function toSession(record: ChatSessionRecord): Session {
  return {
    sessionId: record.sessionId,
    owner: record.owner,
    createdAt: record.createdAt,
    lastActivityAt: record.lastActivityAt,
    turns: record.turns.map((turn) => ({
      role: turn.role,
      content: turn.content,
      timestamp: turn.timestamp
    }))
  };
}

async function guard<T>(action: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (isAppError(error)) {
      throw error;
    }
    throw new AppError("STORAGE_UNAVAILABLE", `MongoDB ${action} failed`, { cause: error });
  }
}

/** One `ChatSession` document per session with the turns embedded. */
export class MongoSessionStore implements SessionStore {
  private readonly locks = new KeyedMutex();

  async create(session: Session): Promise<void> {
    assertValidSessionId(session.sessionId);
    await guard("create", async () => {
      await ChatSession.create(session);
    });
  }

  async read(sessionId: string): Promise<Session> {
    assertValidSessionId(sessionId);
    return guard("read", async () => {
      const record = await ChatSession.findOne({ sessionId }).lean<ChatSessionRecord>();
      if (!record) {
        throw new AppError("NOT_FOUND", `Session ${sessionId} does not exist`);
      }
      return toSession(record);
    });
  }

  async append(sessionId: string, ...turns: Turn[]): Promise<Session> {
    assertValidSessionId(sessionId);
    return this.locks.runExclusive(sessionId, () =>
      guard("append", async () => {
        const last = turns[turns.length - 1];
        const update = last
          ? { $push: { turns: { $each: turns } }, $set: { lastActivityAt: last.timestamp } }
          : {};
        const record = await ChatSession.findOneAndUpdate({ sessionId }, update, {
          new: true
        }).lean<ChatSessionRecord>();
        if (!record) {
          throw new AppError("NOT_FOUND", `Session ${sessionId} does not exist`);
        }
        return toSession(record);
      })
    );
  }

  async delete(sessionId: string): Promise<void> {
    assertValidSessionId(sessionId);
    await this.locks.runExclusive(sessionId, () =>
      guard("delete", async () => {
        const result = await ChatSession.deleteOne({ sessionId });
        if (result.deletedCount === 0) {
          throw new AppError("NOT_FOUND", `Session ${sessionId} does not exist`);
        }
      })
    );
  }

  async listByOwner(owner: string): Promise<Session[]> {
    return guard("list", async () => {
      const records = await ChatSession.find({ owner }).lean<ChatSessionRecord[]>();
      return records.map(toSession);
    });
  }

  async close(): Promise<void> {
    await disconnectDatabase();
  }
}

export class MongoUserStore implements UserStore {
  async recordLogin(user: AuthUser): Promise<UserRecord> {
    return guard("user upsert", async () => {
      const now = new Date().toISOString();
      const record = await User.findOneAndUpdate(
        { uid: user.uid },
        {
          $set: { email: user.email, lastLoginAt: now },
          $setOnInsert: { uid: user.uid, name: user.name, createdAt: now }
        },
        { upsert: true, new: true }
      ).lean<UserRecord>();
      if (!record) {
        throw new AppError("STORAGE_UNAVAILABLE", `User ${user.uid} upsert returned nothing`);
      }
      return {
        uid: record.uid,
        email: record.email,
        name: record.name,
        createdAt: record.createdAt,
        lastLoginAt: record.lastLoginAt
      };
    });
  }

  async find(uid: string): Promise<UserRecord | null> {
    return guard("user lookup", async () => {
      const record = await User.findOne({ uid }).lean<UserRecord>();
      return record
        ? {
            uid: record.uid,
            email: record.email,
            name: record.name,
            createdAt: record.createdAt,
            lastLoginAt: record.lastLoginAt
          }
        : null;
    });
  }
}
