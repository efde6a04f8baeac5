import assert from "node:assert/strict";
import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import test from "node:test";
import {
  DisabledInteractionLog,
  JsonlInteractionLog,
  toInteractionRecord,
  type InteractionInput
} from "../src/services/analytics.js";
import { withTempDir } from "./helpers.js";

const INTERACTION: InteractionInput = {
  sessionId: "s-1",
  owner: "anonymous",
  ipAddress: "127.0.0.1",
  userAgent: "node-test",
  question: "Library hours?",
  answer: "8am to 10pm.",
  generationTimeMs: 1234,
  streamed: true
};

test("toInteractionRecord adds lengths and rounds the generation time", () => {
  assert.deepEqual(toInteractionRecord(INTERACTION, new Date("2026-02-01T10:00:00.000Z")), {
    timestamp: "2026-02-01T10:00:00.000Z",
    sessionId: "s-1",
    owner: "anonymous",
    ipAddress: "127.0.0.1",
    userAgent: "node-test",
    question: "Library hours?",
    questionLength: 14,
    answer: "8am to 10pm.",
    answerLength: 12,
    generationTimeSeconds: 1.23,
    streamed: true
  });
});

test("JsonlInteractionLog appends one JSON object per line", async () => {
  await withTempDir(async (dir) => {
    const log = new JsonlInteractionLog(path.join(dir, "nested"));
    log.record(INTERACTION);
    log.record({ ...INTERACTION, sessionId: "s-2", streamed: false });
    await log.flush();

    const lines = (await readFile(log.file, "utf-8")).trimEnd().split("\n");
    assert.equal(lines.length, 2);
    assert.match(lines[0] ?? "", /^\{"timestamp":"[^"]+","sessionId":"s-1",/);
    assert.match(lines[1] ?? "", /"sessionId":"s-2".*"streamed":false,"questionLength":14,/);
  });
});

test("a failing sink never rejects the caller", async () => {
  await withTempDir(async (dir) => {
    const blocker = path.join(dir, "not-a-directory");
    await writeFile(blocker, "", "utf-8");
    const log = new JsonlInteractionLog(blocker);

    log.record(INTERACTION);
    await log.flush();

    assert.equal(await readFile(blocker, "utf-8"), "");
  });
});

test("the disabled log accepts records and flushes immediately", async () => {
  const log = new DisabledInteractionLog();
  log.record();
  await log.flush();
});
