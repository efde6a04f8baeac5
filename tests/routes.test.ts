import assert from "node:assert/strict";
import { Writable } from "node:stream";
import test from "node:test";
import { z } from "zod";
import { createApp } from "../src/app.js";
import { ChatCoordinator } from "../src/chat/coordinator.js";
import { ContextAssembler } from "../src/chat/context.js";
import type { TokenVerifier } from "../src/middleware/auth.js";
import { DisabledInteractionLog } from "../src/services/analytics.js";
import { InferenceClient } from "../src/services/inference.js";
import { ToolRunner } from "../src/services/tools.js";
import { SessionLifecycle } from "../src/sessions/lifecycle.js";
import { isValidSessionId } from "../src/sessions/sessionId.js";
import { sseSink } from "../src/routes/chat.js";
import { FileSessionStore, sessionRecordSchema } from "../src/store/fileSessionStore.js";
import { FileUserStore } from "../src/store/fileUserStore.js";
import { AppError } from "../src/utils/errors.js";
import { ScriptedEngine, delay, startServer, withTempDir, type EngineStep } from "./helpers.js";
import type { Session } from "../src/types.js";

const ADA_TOKEN = "test-token-ada";

const verifyToken: TokenVerifier = async (token) => {
  if (token === ADA_TOKEN) {
    return { uid: "ada-uid", email: "ada@example.edu", name: "Ada" };
  }
  throw new Error("invalid token");
};

const sessionBody = z.object({ session: sessionRecordSchema });
const sessionIdBody = z.object({ sessionId: z.string() });

type Client = {
  engine: ScriptedEngine;
  call(
    path: string,
    init?: { method?: string; body?: unknown; rawBody?: string; token?: string; signal?: AbortSignal }
  ): Promise<Response>;
};

/** File store whose reads take a while, so a caller can leave mid-load. */
class SlowReadStore extends FileSessionStore {
  private readonly readDelayMs: number;

  constructor(dir: string, readDelayMs: number) {
    super(dir);
    this.readDelayMs = readDelayMs;
  }

  override async read(sessionId: string): Promise<Session> {
    await delay(this.readDelayMs);
    return super.read(sessionId);
  }
}

async function withApp(
  steps: EngineStep[],
  run: (client: Client) => Promise<void>,
  options: { readDelayMs?: number } = {}
) {
  await withTempDir(async (dir) => {
    const sessions = options.readDelayMs
      ? new SlowReadStore(dir, options.readDelayMs)
      : new FileSessionStore(dir);
    const engine = new ScriptedEngine(steps);
    const lifecycle = new SessionLifecycle(sessions);
    const coordinator = new ChatCoordinator({
      lifecycle,
      store: sessions,
      context: new ContextAssembler(sessions, 6),
      inference: new InferenceClient({
        engine,
        tools: new ToolRunner(null),
        systemPrompt: "SYS",
        chunkTimeoutMs: 1_000,
        requestTimeoutMs: 1_000
      }),
      interactions: new DisabledInteractionLog()
    });
    const app = createApp({ coordinator, lifecycle, users: new FileUserStore(dir), verifyToken });
    const server = await startServer(app);

    const client: Client = {
      engine,
      call: (path, init = {}) => {
        const headers: Record<string, string> = {};
        if (init.token) {
          headers.Authorization = `Bearer ${init.token}`;
        }
        let body: string | undefined = init.rawBody;
        if (init.body !== undefined) {
          body = JSON.stringify(init.body);
        }
        if (body !== undefined) {
          headers["Content-Type"] = "application/json";
        }
        return fetch(`${server.baseUrl}${path}`, {
          method: init.method ?? (body === undefined ? "GET" : "POST"),
          headers,
          body,
          signal: init.signal
        });
      }
    };

    try {
      await run(client);
    } finally {
      await server.close();
    }
  });
}

function errorBody(code: string, message: string) {
  return { error: { code, message } };
}

test("GET /health answers ok", async () => {
  await withApp([], async (client) => {
    const response = await client.call("/health");
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { ok: true });
  });
});

test("POST /api/chat answers a guest and persists the exchange", async () => {
  await withApp([{ reply: { kind: "answer", content: "8am to 10pm." } }], async (client) => {
    const response = await client.call("/api/chat", {
      body: { question: "What are the library hours?" }
    });
    assert.equal(response.status, 200);
    const { sessionId } = sessionIdBody.parse(await response.json());
    assert.ok(isValidSessionId(sessionId));

    const stored = sessionBody.parse(await (await client.call(`/api/sessions/${sessionId}`)).json());
    assert.equal(stored.session.owner, "anonymous");
    assert.deepEqual(
      stored.session.turns.map((entry) => entry.content),
      ["What are the library hours?", "8am to 10pm."]
    );
  });
});

test("POST /api/chat rejects bad bodies with BAD_REQUEST", async () => {
  await withApp([], async (client) => {
    const missing = await client.call("/api/chat", { body: {} });
    assert.equal(missing.status, 400);
    assert.deepEqual(await missing.json(), errorBody("BAD_REQUEST", "The request body is invalid."));

    const malformed = await client.call("/api/chat", { rawBody: '{"question": ' });
    assert.equal(malformed.status, 400);
    assert.deepEqual(await malformed.json(), errorBody("BAD_REQUEST", "The request body is invalid."));
  });
});

test("POST /api/chat maps identifier problems to the error taxonomy", async () => {
  await withApp([], async (client) => {
    const invalid = await client.call("/api/chat", {
      body: { question: "Hi", sessionId: "../../etc/passwd" }
    });
    assert.equal(invalid.status, 400);
    assert.deepEqual(
      await invalid.json(),
      errorBody("INVALID_IDENTIFIER", "The session identifier is invalid.")
    );

    const unknown = await client.call("/api/chat", { body: { question: "Hi", sessionId: "abcdef" } });
    assert.equal(unknown.status, 404);
    assert.deepEqual(await unknown.json(), errorBody("NOT_FOUND", "Session not found."));
  });
});

test("POST /api/chat/stream sends chunk events then done", async () => {
  const steps: EngineStep[] = [
    {
      events: [
        { kind: "token", text: "Hello" },
        { kind: "token", text: " there" }
      ]
    }
  ];
  await withApp(steps, async (client) => {
    const response = await client.call("/api/chat/stream", { body: { question: "Hi" } });

    assert.equal(response.status, 200);
    assert.match(response.headers.get("content-type") ?? "", /^text\/event-stream/);
    assert.ok(isValidSessionId(response.headers.get("x-session-id")));
    assert.equal(
      await response.text(),
      'event: chunk\ndata: {"token":"Hello"}\n\n' +
        'event: chunk\ndata: {"token":" there"}\n\n' +
        'event: done\ndata: {"done":true}\n\n'
    );
  });
});

test("POST /api/chat/stream ends with an error event when the engine fails", async () => {
  await withApp([{ error: new AppError("ENGINE_UNAVAILABLE", "connection refused") }], async (client) => {
    const response = await client.call("/api/chat/stream", { body: { question: "Hi" } });

    assert.equal(response.status, 200);
    assert.equal(
      await response.text(),
      'event: error\ndata: {"error":"The assistant is unavailable right now.","code":"ENGINE_UNAVAILABLE"}\n\n'
    );
  });
});

test("POST /api/chat/stream reports preparation errors as JSON", async () => {
  await withApp([], async (client) => {
    const response = await client.call("/api/chat/stream", {
      body: { question: "Hi", sessionId: "abcdef" }
    });

    assert.equal(response.status, 404);
    assert.match(response.headers.get("content-type") ?? "", /^application\/json/);
    assert.deepEqual(await response.json(), errorBody("NOT_FOUND", "Session not found."));
  });
});

test("POST /api/chat/stream commits nothing when the caller leaves mid-stream", async () => {
  const steps: EngineStep[] = [{ events: [{ kind: "token", text: "Partial" }], hang: true }];
  await withApp(steps, async (client) => {
    const disconnect = new AbortController();
    const response = await client.call("/api/chat/stream", {
      body: { question: "Hi" },
      signal: disconnect.signal
    });
    const sessionId = response.headers.get("x-session-id") ?? "";
    assert.ok(response.body);
    const reader = response.body.getReader();
    const first = await reader.read();
    assert.equal(
      new TextDecoder().decode(first.value),
      'event: chunk\ndata: {"token":"Partial"}\n\n'
    );

    disconnect.abort();
    await delay(100);

    const stored = sessionBody.parse(await (await client.call(`/api/sessions/${sessionId}`)).json());
    assert.deepEqual(stored.session.turns, []);
  });
});

test("POST /api/chat/stream generates nothing when the caller leaves during context loading", async () => {
  await withApp(
    [{ events: [{ kind: "token", text: "Too late" }] }],
    async (client) => {
      const created = await client.call("/api/sessions", { method: "POST" });
      const { sessionId } = sessionIdBody.parse(await created.json());

      const disconnect = new AbortController();
      const pending = client.call("/api/chat/stream", {
        body: { question: "Hi", sessionId },
        signal: disconnect.signal
      });
      await delay(50);
      disconnect.abort();
      await assert.rejects(pending);
      await delay(400);

      const stored = sessionBody.parse(await (await client.call(`/api/sessions/${sessionId}`)).json());
      assert.deepEqual(stored.session.turns, []);
      assert.equal(client.engine.calls.length, 0);
    },
    { readDelayMs: 300 }
  );
});

test("sseSink holds the next chunk until a full buffer drains", async () => {
  const written: string[] = [];
  let release: () => void = () => undefined;
  const target = new Writable({
    highWaterMark: 4,
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk.toString());
      release = () => callback();
    }
  });
  const sink = sseSink(target);

  const pending = sink.chunk("hello");
  assert.ok(pending instanceof Promise);
  const early = await Promise.race([
    pending.then(() => "drained"),
    delay(20).then(() => "waiting")
  ]);
  assert.equal(early, "waiting");
  assert.deepEqual(written, ['event: chunk\ndata: {"token":"hello"}\n\n']);

  release();
  await pending;
});

test("sseSink does not wait while the buffer has room", () => {
  const target = new Writable({
    write(_chunk: Buffer, _encoding, callback) {
      callback();
    }
  });

  assert.equal(sseSink(target).chunk("hi"), undefined);
});

test("session listing requires a valid token", async () => {
  await withApp([], async (client) => {
    const anonymous = await client.call("/api/sessions");
    assert.equal(anonymous.status, 401);
    assert.deepEqual(
      await anonymous.json(),
      errorBody("UNAUTHENTICATED", "A valid auth token is required.")
    );

    const forged = await client.call("/api/sessions", { token: "test-token-forged" });
    assert.equal(forged.status, 401);
  });
});

test("signed-in users manage their own sessions", async () => {
  await withApp([], async (client) => {
    const created = await client.call("/api/sessions", { method: "POST", token: ADA_TOKEN });
    assert.equal(created.status, 201);
    const { sessionId } = sessionIdBody.parse(await created.json());

    const listing = await client.call("/api/sessions", { token: ADA_TOKEN });
    const listed = z
      .object({ sessions: z.array(z.object({ sessionId: z.string(), turnCount: z.number() })) })
      .parse(await listing.json());
    assert.deepEqual(listed.sessions, [{ sessionId, turnCount: 0 }]);

    const stranger = await client.call(`/api/sessions/${sessionId}`);
    assert.equal(stranger.status, 403);
    assert.deepEqual(
      await stranger.json(),
      errorBody("UNAUTHORIZED", "You do not have access to this session.")
    );

    const switched = await client.call(`/api/sessions/${sessionId}/switch`, {
      method: "POST",
      token: ADA_TOKEN
    });
    assert.deepEqual(await switched.json(), { sessionId });

    const deleted = await client.call(`/api/sessions/${sessionId}`, {
      method: "DELETE",
      token: ADA_TOKEN
    });
    assert.deepEqual(await deleted.json(), { deleted: true });

    const gone = await client.call(`/api/sessions/${sessionId}`, { token: ADA_TOKEN });
    assert.equal(gone.status, 404);
  });
});

test("chatting while signed in assigns the session to the user", async () => {
  await withApp([{ reply: { kind: "answer", content: "Hi Ada." } }], async (client) => {
    const response = await client.call("/api/chat", { body: { question: "Hello" }, token: ADA_TOKEN });
    const { sessionId } = sessionIdBody.parse(await response.json());

    const own = sessionBody.parse(
      await (await client.call(`/api/sessions/${sessionId}`, { token: ADA_TOKEN })).json()
    );
    assert.equal(own.session.owner, "ada@example.edu");
    assert.equal((await client.call(`/api/sessions/${sessionId}`)).status, 403);
  });
});

test("GET /api/me returns the stored profile", async () => {
  await withApp([], async (client) => {
    const response = await client.call("/api/me", { token: ADA_TOKEN });
    assert.equal(response.status, 200);
    const me = z
      .object({
        uid: z.string(),
        owner: z.string(),
        email: z.string().nullable(),
        name: z.string().nullable(),
        createdAt: z.string()
      })
      .parse(await response.json());

    assert.equal(me.uid, "ada-uid");
    assert.equal(me.owner, "ada@example.edu");
    assert.equal(me.name, "Ada");
  });
});
