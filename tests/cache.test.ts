import assert from "node:assert/strict";
import test from "node:test";
import { TTLCache } from "../src/utils/cache.js";
import { delay } from "./helpers.js";

test("entries expire after their ttl", async () => {
  const cache = new TTLCache<string>(15);
  cache.set("library hours", "8am-10pm");
  cache.set("gym hours", "6am-11pm", 0);

  assert.equal(cache.get("library hours"), "8am-10pm");
  await delay(30);
  assert.equal(cache.get("library hours"), undefined);
  assert.equal(cache.get("gym hours"), "6am-11pm");
});

test("the oldest insert is evicted at capacity", () => {
  const cache = new TTLCache<number>(0, 2);
  cache.set("a", 1);
  cache.set("b", 2);
  cache.set("a", 3);
  cache.set("c", 4);

  assert.equal(cache.get("b"), undefined);
  assert.equal(cache.get("a"), 3);
  assert.equal(cache.get("c"), 4);
  assert.equal(cache.size, 2);
});
