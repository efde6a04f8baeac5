import { mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { AuthUser } from "../types/user.js";
import { AppError } from "../utils/errors.js";
import { KeyedMutex } from "../utils/keyedMutex.js";
import { writeFileAtomic } from "./fileSessionStore.js";
import type { UserRecord, UserStore } from "./types.js";

const userRecordSchema = z.object({
  uid: z.string(),
  email: z.string().nullable(),
  name: z.string().nullable(),
  createdAt: z.string(),
  lastLoginAt: z.string()
});

const usersFileSchema = z.record(userRecordSchema);

type UsersFile = z.infer<typeof usersFileSchema>;

/** All user records in a single `<dataDir>/users.json`, keyed by uid. */
export class FileUserStore implements UserStore {
  private readonly dataDir: string;
  private readonly file: string;
  private readonly lock = new KeyedMutex();

  constructor(dataDir: string) {
    this.dataDir = dataDir;
    this.file = path.join(dataDir, "users.json");
  }

  async recordLogin(user: AuthUser): Promise<UserRecord> {
    return this.lock.runExclusive("users", async () => {
      const users = await this.load();
      const now = new Date().toISOString();
      const existing = users[user.uid];
      const record: UserRecord = {
        uid: user.uid,
        email: user.email,
        name: existing?.name ?? user.name,
        createdAt: existing?.createdAt ?? now,
        lastLoginAt: now
      };
      users[user.uid] = record;
      try {
        await mkdir(this.dataDir, { recursive: true });
        await writeFileAtomic(this.file, `${JSON.stringify(users, null, 2)}\n`);
      } catch (error) {
        throw new AppError("STORAGE_UNAVAILABLE", "Failed to write users file", { cause: error });
      }
      return record;
    });
  }

  async find(uid: string): Promise<UserRecord | null> {
    const users = await this.load();
    return users[uid] ?? null;
  }

  private async load(): Promise<UsersFile> {
    let raw: string;
    try {
      raw = await readFile(this.file, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return {};
      }
      throw new AppError("STORAGE_UNAVAILABLE", "Failed to read users file", { cause: error });
    }
    try {
      return usersFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new AppError("STORAGE_UNAVAILABLE", "users.json is corrupted", { cause: error });
    }
  }
}
