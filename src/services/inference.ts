import { buildMessages } from "../chat/prompt.js";
import type { Turn } from "../types.js";
import { AppError, describeError } from "../utils/errors.js";
import { TokenStream } from "../utils/tokenStream.js";
import type { EngineMessage, EngineReply, InferenceEngine, ToolRequest } from "./engine.js";
import type { ToolRunner } from "./tools.js";

export type InferenceClientOptions = {
  engine: InferenceEngine;
  tools: ToolRunner;
  systemPrompt: string;
  chunkTimeoutMs: number;
  requestTimeoutMs: number;
};

const TOOL_UNAVAILABLE_NOTE =
  "The requested lookup is unavailable right now. Answer from the information you already have.";

function assertNever(value: never): never {
  throw new Error(`Unhandled engine reply: ${JSON.stringify(value)}`);
}

/**
 * Wraps the engine with the fixed prompt, timeouts and the single tool round
 * trip. At most one tool request is honoured per question; the follow-up call
 * is made without tools.
 */
export class InferenceClient {
  private readonly engine: InferenceEngine;
  private readonly tools: ToolRunner;
  private readonly systemPrompt: string;
  private readonly chunkTimeoutMs: number;
  private readonly requestTimeoutMs: number;

  constructor(options: InferenceClientOptions) {
    this.engine = options.engine;
    this.tools = options.tools;
    this.systemPrompt = options.systemPrompt;
    this.chunkTimeoutMs = options.chunkTimeoutMs;
    this.requestTimeoutMs = options.requestTimeoutMs;
  }

  async ask(question: string, context: readonly Turn[]): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);

    try {
      const messages = buildMessages(this.systemPrompt, context, question);
      const reply = await this.engine.chat(messages, {
        tools: this.tools.definitions,
        signal: controller.signal
      });
      switch (reply.kind) {
        case "answer":
          return reply.content;
        case "tool_request": {
          const followUp = await this.withToolResult(messages, reply, controller.signal);
          const final = this.finalAnswer(
            await this.engine.chat(followUp, { signal: controller.signal })
          );
          return (reply.content ?? "") + final;
        }
        default:
          return assertNever(reply);
      }
    } catch (error) {
      if (timedOut) {
        throw new AppError(
          "ENGINE_TIMEOUT",
          `No answer within ${this.requestTimeoutMs}ms`,
          { cause: error }
        );
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  askStreaming(
    question: string,
    context: readonly Turn[],
    options: { signal?: AbortSignal } = {}
  ): TokenStream {
    const messages = buildMessages(this.systemPrompt, context, question);
    return new TokenStream((signal) => this.generate(messages, signal), {
      chunkTimeoutMs: this.chunkTimeoutMs,
      signal: options.signal
    });
  }

  private async *generate(messages: EngineMessage[], signal: AbortSignal): AsyncGenerator<string> {
    let request: ToolRequest | null = null;
    let preface = "";
    for await (const event of this.engine.chatStream(messages, {
      tools: this.tools.definitions,
      signal
    })) {
      switch (event.kind) {
        case "token":
          if (!request) {
            preface += event.text;
          }
          yield event.text;
          break;
        case "tool_request":
          request ??= preface ? { ...event, content: preface } : event;
          break;
        default:
          assertNever(event);
      }
    }
    if (!request) {
      return;
    }

    const followUp = await this.withToolResult(messages, request, signal);
    for await (const event of this.engine.chatStream(followUp, { signal })) {
      if (event.kind === "token") {
        yield event.text;
      } else {
        console.warn(`[inference] ignoring second tool request "${event.name}"`);
      }
    }
  }

  private finalAnswer(reply: EngineReply): string {
    if (reply.kind === "answer") {
      return reply.content;
    }
    console.warn(`[inference] ignoring second tool request "${reply.name}"`);
    return "";
  }

  /** Degrades to a note in place of the tool result when the tool fails. */
  private async withToolResult(
    messages: EngineMessage[],
    request: ToolRequest,
    signal: AbortSignal
  ): Promise<EngineMessage[]> {
    let result: string;
    try {
      result = await this.tools.run(request, signal);
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      console.warn(`[inference] tool ${request.name} failed: ${describeError(error)}`);
      result = TOOL_UNAVAILABLE_NOTE;
    }
    return [
      ...messages,
      {
        role: "assistant",
        content: request.content ?? "",
        toolCalls: [{ name: request.name, args: request.args }]
      },
      { role: "tool", name: request.name, content: result }
    ];
  }
}
