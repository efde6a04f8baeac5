import assert from "node:assert/strict";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import test from "node:test";
import { FileUserStore } from "../src/store/fileUserStore.js";
import { isAppError } from "../src/utils/errors.js";
import { withTempDir } from "./helpers.js";

test("recordLogin creates a user on first sight", async () => {
  await withTempDir(async (dir) => {
    const users = new FileUserStore(dir);
    const record = await users.recordLogin({ uid: "u1", email: "ada@example.edu", name: "Ada" });

    assert.equal(record.uid, "u1");
    assert.equal(record.createdAt, record.lastLoginAt);
    assert.deepEqual(await users.find("u1"), record);
  });
});

test("later logins keep createdAt and the stored name, refresh the email", async () => {
  await withTempDir(async (dir) => {
    const users = new FileUserStore(dir);
    const first = await users.recordLogin({ uid: "u1", email: "ada@example.edu", name: "Ada" });
    const second = await users.recordLogin({ uid: "u1", email: "ada@cs.example.edu", name: "A. L." });

    assert.equal(second.createdAt, first.createdAt);
    assert.equal(second.name, "Ada");
    assert.equal(second.email, "ada@cs.example.edu");
    assert.ok(second.lastLoginAt >= first.lastLoginAt);
  });
});

test("find returns null for unknown users and before any login", async () => {
  await withTempDir(async (dir) => {
    assert.equal(await new FileUserStore(dir).find("nobody"), null);
  });
});

test("a corrupted users file is STORAGE_UNAVAILABLE", async () => {
  await withTempDir(async (dir) => {
    await writeFile(path.join(dir, "users.json"), "[1, 2", "utf-8");
    await assert.rejects(new FileUserStore(dir).find("u1"), (error) =>
      isAppError(error, "STORAGE_UNAVAILABLE")
    );
  });
});
