import assert from "node:assert/strict";
import test from "node:test";
import {
  SESSION_ID_MAX_LENGTH,
  assertValidSessionId,
  generateSessionId,
  isValidSessionId
} from "../src/sessions/sessionId.js";
import { isAppError } from "../src/utils/errors.js";

test("generateSessionId returns distinct url-safe identifiers", () => {
  const ids = new Set<string>();
  for (let i = 0; i < 100; i += 1) {
    const id = generateSessionId();
    assert.equal(id.length, 43);
    assert.ok(isValidSessionId(id));
    ids.add(id);
  }
  assert.equal(ids.size, 100);
});

test("isValidSessionId accepts the url-safe alphabet up to the length limit", () => {
  assert.ok(isValidSessionId("abc_DEF-123"));
  assert.ok(isValidSessionId("a".repeat(SESSION_ID_MAX_LENGTH)));
});

test("isValidSessionId rejects traversal, separators and oversized values", () => {
  for (const raw of ["", "../../etc/passwd", "a/b", "a b", "id.json", "a".repeat(65), 42, null]) {
    assert.equal(isValidSessionId(raw), false, `accepted ${JSON.stringify(raw)}`);
  }
});

test("assertValidSessionId throws INVALID_IDENTIFIER", () => {
  assert.equal(assertValidSessionId("abc"), "abc");
  assert.throws(
    () => assertValidSessionId("../../etc/passwd"),
    (error) => isAppError(error, "INVALID_IDENTIFIER")
  );
});
