import type { InferenceClient } from "../services/inference.js";
import type { InteractionLog } from "../services/analytics.js";
import type { SessionLifecycle } from "../sessions/lifecycle.js";
import type { SessionStore } from "../store/types.js";
import type { ChatAnswer, ChatRequest, Turn } from "../types.js";
import {
  AppError,
  describeError,
  toAppError,
  toErrorPayload,
  type ErrorPayload
} from "../utils/errors.js";
import type { ContextAssembler } from "./context.js";

export type ChatRunState =
  | "Idle"
  | "ContextLoaded"
  | "Generating"
  | "Completing"
  | "Done"
  | "Errored";

const NEXT_STATE: Partial<Record<ChatRunState, ChatRunState>> = {
  Idle: "ContextLoaded",
  ContextLoaded: "Generating",
  Generating: "Completing",
  Completing: "Done"
};

/** Receives one request's push events. Exactly one of `done`/`error` ends it. */
export interface StreamSink {
  /** May return a promise to hold back the next chunk until the reader catches up. */
  chunk(token: string): void | Promise<void>;
  done(): void;
  error(payload: ErrorPayload["error"]): void;
}

/** State of one question/answer exchange. */
export class ChatRun {
  readonly question: string;
  readonly request: ChatRequest;
  readonly askedAt = new Date();
  readonly history: ChatRunState[] = ["Idle"];
  sessionId: string | null = null;
  context: Turn[] = [];
  error: AppError | null = null;
  committed = false;
  /** Set when prepare created the session for this run. */
  createdSession = false;

  constructor(request: ChatRequest) {
    this.request = request;
    this.question = request.question.trim();
  }

  get state(): ChatRunState {
    return this.history[this.history.length - 1] ?? "Idle";
  }

  advance(next: ChatRunState): void {
    if (NEXT_STATE[this.state] !== next) {
      throw new Error(`Invalid chat run transition ${this.state} -> ${next}`);
    }
    this.history.push(next);
  }

  fail(error: AppError): AppError {
    if (this.state !== "Done" && this.state !== "Errored") {
      this.error = error;
      this.history.push("Errored");
    }
    return error;
  }
}

export type ChatCoordinatorOptions = {
  lifecycle: SessionLifecycle;
  store: SessionStore;
  context: ContextAssembler;
  inference: InferenceClient;
  interactions: InteractionLog;
};

/**
 * Runs one exchange: load context, call the engine, forward chunks, commit
 * the turn pair. Requests on the same session may read context before an
 * earlier request has committed; only the appends are serialized.
 */
export class ChatCoordinator {
  private readonly lifecycle: SessionLifecycle;
  private readonly store: SessionStore;
  private readonly context: ContextAssembler;
  private readonly inference: InferenceClient;
  private readonly interactions: InteractionLog;

  constructor(options: ChatCoordinatorOptions) {
    this.lifecycle = options.lifecycle;
    this.store = options.store;
    this.context = options.context;
    this.inference = options.inference;
    this.interactions = options.interactions;
  }

  /** Idle -> ContextLoaded. Throws before any response has been started. */
  async prepare(request: ChatRequest): Promise<ChatRun> {
    const run = new ChatRun(request);
    try {
      if (!run.question) {
        throw new AppError("BAD_REQUEST", "Question is empty");
      }
      if (request.sessionId === undefined) {
        run.sessionId = await this.lifecycle.create(request.caller.owner);
        run.createdSession = true;
      } else {
        const session = await this.lifecycle.get(request.sessionId, request.caller.owner);
        run.sessionId = session.sessionId;
        run.context = this.context.fromSession(session);
      }
      run.advance("ContextLoaded");
      return run;
    } catch (error) {
      throw run.fail(toAppError(error));
    }
  }

  async answer(request: ChatRequest): Promise<ChatAnswer> {
    const run = await this.prepare(request);
    const sessionId = this.sessionOf(run);
    run.advance("Generating");
    let answer: string;
    try {
      answer = await this.inference.ask(run.question, run.context);
    } catch (error) {
      const failure = run.fail(toAppError(error));
      console.error(`[chat] session ${sessionId} failed: ${describeError(failure)}`);
      await this.discardCreated(run);
      throw failure;
    }
    run.advance("Completing");
    await this.commit(run, answer, false);
    run.advance("Done");
    return { sessionId, answer };
  }

  /**
   * ContextLoaded -> Done | Errored. Never rejects: engine failures become a
   * terminal error event. On cancellation nothing is committed and no
   * terminal event is sent, since nobody is listening. A session created by
   * prepare is kept even on failure: its id already went out in the headers.
   */
  async stream(run: ChatRun, sink: StreamSink, signal?: AbortSignal): Promise<ChatRun> {
    const sessionId = this.sessionOf(run);
    run.advance("Generating");
    const chunks: string[] = [];
    try {
      const tokens = this.inference.askStreaming(run.question, run.context, { signal });
      for await (const token of tokens) {
        chunks.push(token);
        await sink.chunk(token);
      }
      if (signal?.aborted) {
        throw new AppError("CANCELLED", "Caller disconnected at end of stream");
      }
    } catch (error) {
      const failure = run.fail(toAppError(error));
      if (failure.code === "CANCELLED") {
        console.log(
          `[chat] session ${sessionId} cancelled after ${chunks.length} chunks; partial answer discarded`
        );
        return run;
      }
      console.error(`[chat] session ${sessionId} stream failed: ${describeError(failure)}`);
      sink.error(toErrorPayload(failure).error);
      return run;
    }

    run.advance("Completing");
    await this.commit(run, chunks.join(""), true);
    run.advance("Done");
    sink.done();
    return run;
  }

  /** ContextLoaded -> Errored for a caller that left before generation began. */
  async abandon(run: ChatRun): Promise<ChatRun> {
    const sessionId = this.sessionOf(run);
    run.fail(new AppError("CANCELLED", "Caller disconnected before generation"));
    console.log(`[chat] session ${sessionId} cancelled before streaming`);
    await this.discardCreated(run);
    return run;
  }

  /** A session made for a failed run was never handed out, so it goes too. */
  private async discardCreated(run: ChatRun): Promise<void> {
    if (!run.createdSession || !run.sessionId) {
      return;
    }
    try {
      await this.store.delete(run.sessionId);
    } catch (error) {
      console.error(
        `[chat] session ${run.sessionId} left behind after failure: ${describeError(error)}`
      );
    }
  }

  /** Best effort: a storage fault is logged and does not revoke the answer. */
  private async commit(run: ChatRun, answer: string, streamed: boolean): Promise<void> {
    const sessionId = this.sessionOf(run);
    const answeredAt = new Date();
    try {
      await this.store.append(
        sessionId,
        { role: "user", content: run.question, timestamp: run.askedAt.toISOString() },
        { role: "assistant", content: answer, timestamp: answeredAt.toISOString() }
      );
      run.committed = true;
    } catch (error) {
      console.error(
        `[chat] session ${sessionId} answer delivered but not saved: ${describeError(error)}`
      );
    }

    const elapsedMs = answeredAt.getTime() - run.askedAt.getTime();
    console.log(`[chat] session ${sessionId} answered in ${(elapsedMs / 1000).toFixed(2)}s`);
    this.interactions.record({
      sessionId,
      owner: run.request.caller.owner,
      ipAddress: run.request.caller.ipAddress ?? null,
      userAgent: run.request.caller.userAgent ?? null,
      question: run.question,
      answer,
      generationTimeMs: elapsedMs,
      streamed
    });
  }

  private sessionOf(run: ChatRun): string {
    if (!run.sessionId) {
      throw new Error("Chat run has no session; call prepare() first");
    }
    return run.sessionId;
  }
}
