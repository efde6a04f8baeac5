import { createServer, type RequestListener } from "node:http";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { InteractionInput, InteractionLog } from "../src/services/analytics.js";
import type {
  EngineCallOptions,
  EngineEvent,
  EngineMessage,
  EngineReply,
  InferenceEngine,
  ToolDefinition
} from "../src/services/engine.js";
import type { SearchProvider, SearchResult } from "../src/services/search.js";
import type { SessionStore } from "../src/store/types.js";
import type { Session, Turn } from "../src/types.js";
import { AppError } from "../src/utils/errors.js";

export async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), "campus-assistant-"));
  try {
    return await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Rejects once `signal` aborts; stands in for an engine that stopped answering. */
export function untilAborted(signal: AbortSignal | undefined): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (!signal) {
      reject(new Error("untilAborted needs a signal"));
      return;
    }
    if (signal.aborted) {
      reject(new Error("aborted"));
      return;
    }
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

export type EngineStep = {
  /** Resolved by `chat`. */
  reply?: EngineReply;
  /** Yielded by `chatStream`, in order. */
  events?: EngineEvent[];
  /** Thrown after any events. */
  error?: Error;
  /** Waits for the call's signal to abort after any events. */
  hang?: boolean;
};

export type EngineCall = {
  messages: EngineMessage[];
  tools: ToolDefinition[] | undefined;
  streamed: boolean;
};

const FALLBACK_STEP: EngineStep = {
  reply: { kind: "answer", content: "OK" },
  events: [{ kind: "token", text: "OK" }]
};

/** Plays back one step per engine call; falls back to a plain "OK" once the script runs out. */
export class ScriptedEngine implements InferenceEngine {
  readonly calls: EngineCall[] = [];
  private readonly steps: EngineStep[];

  constructor(steps: EngineStep[] = []) {
    this.steps = [...steps];
  }

  async chat(messages: EngineMessage[], options: EngineCallOptions = {}): Promise<EngineReply> {
    const step = this.next(messages, options, false);
    if (step.error) {
      throw step.error;
    }
    if (step.hang) {
      await untilAborted(options.signal);
    }
    return step.reply ?? { kind: "answer", content: "" };
  }

  async *chatStream(
    messages: EngineMessage[],
    options: EngineCallOptions = {}
  ): AsyncGenerator<EngineEvent> {
    const step = this.next(messages, options, true);
    for (const event of step.events ?? []) {
      yield event;
    }
    if (step.error) {
      throw step.error;
    }
    if (step.hang) {
      await untilAborted(options.signal);
    }
  }

  private next(messages: EngineMessage[], options: EngineCallOptions, streamed: boolean) {
    this.calls.push({ messages, tools: options.tools, streamed });
    return this.steps.shift() ?? FALLBACK_STEP;
  }
}

export class StaticSearch implements SearchProvider {
  readonly queries: string[] = [];
  private readonly results: SearchResult[] | Error;

  constructor(results: SearchResult[] | Error) {
    this.results = results;
  }

  async search(query: string): Promise<SearchResult[]> {
    this.queries.push(query);
    if (this.results instanceof Error) {
      throw this.results;
    }
    return this.results;
  }
}

/** In-process session store that records which operations were attempted. */
export class MemorySessionStore implements SessionStore {
  readonly sessions = new Map<string, Session>();
  readonly calls: string[] = [];
  failAppends = false;

  async create(session: Session): Promise<void> {
    this.calls.push("create");
    this.sessions.set(session.sessionId, structuredClone(session));
  }

  async read(sessionId: string): Promise<Session> {
    this.calls.push("read");
    return structuredClone(this.get(sessionId));
  }

  async append(sessionId: string, ...turns: Turn[]): Promise<Session> {
    this.calls.push("append");
    if (this.failAppends) {
      throw new AppError("STORAGE_UNAVAILABLE", "disk full");
    }
    const session = this.get(sessionId);
    session.turns.push(...turns);
    session.lastActivityAt = turns[turns.length - 1]?.timestamp ?? session.lastActivityAt;
    return structuredClone(session);
  }

  async delete(sessionId: string): Promise<void> {
    this.calls.push("delete");
    this.get(sessionId);
    this.sessions.delete(sessionId);
  }

  async listByOwner(owner: string): Promise<Session[]> {
    this.calls.push("list");
    return [...this.sessions.values()].filter((session) => session.owner === owner);
  }

  async close(): Promise<void> {}

  private get(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new AppError("NOT_FOUND", `Session ${sessionId} does not exist`);
    }
    return session;
  }
}

export class RecordingInteractionLog implements InteractionLog {
  readonly records: InteractionInput[] = [];

  record(interaction: InteractionInput): void {
    this.records.push(interaction);
  }

  async flush(): Promise<void> {}
}

export type TestServer = {
  baseUrl: string;
  close(): Promise<void>;
};

export async function startServer(handler: RequestListener): Promise<TestServer> {
  const server = createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Test server has no TCP address");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      })
  };
}

export async function readBody(req: AsyncIterable<Buffer | string>): Promise<string> {
  let body = "";
  for await (const chunk of req) {
    body += chunk.toString();
  }
  return body;
}

export function turn(role: Turn["role"], content: string, timestamp: string): Turn {
  return { role, content, timestamp };
}
