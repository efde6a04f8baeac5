import { z } from "zod";
import { AppError } from "../utils/errors.js";
import { fetchJson, fetchLines, HttpError } from "../utils/http.js";
import type {
  EngineCallOptions,
  EngineEvent,
  EngineMessage,
  EngineReply,
  InferenceEngine,
  ToolDefinition
} from "./engine.js";

const toolCallSchema = z.object({
  function: z.object({
    name: z.string(),
    arguments: z.record(z.unknown()).default({})
  })
});

const ollamaMessageSchema = z.object({
  role: z.string().optional(),
  content: z.string().default(""),
  tool_calls: z.array(toolCallSchema).optional()
});

export const ollamaChatResponseSchema = z.object({
  message: ollamaMessageSchema.optional(),
  done: z.boolean().optional(),
  error: z.string().optional()
});

export type OllamaChatResponse = z.infer<typeof ollamaChatResponseSchema>;

type OllamaMessage = {
  role: string;
  content: string;
  tool_calls?: Array<{ function: { name: string; arguments: Record<string, unknown> } }>;
  tool_name?: string;
};

export type OllamaEngineOptions = {
  baseUrl: string;
  model: string;
};

function normalizeBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

export function toOllamaMessage(message: EngineMessage): OllamaMessage {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: message.content };
    case "assistant":
      return message.toolCalls?.length
        ? {
            role: "assistant",
            content: message.content,
            tool_calls: message.toolCalls.map((call) => ({
              function: { name: call.name, arguments: call.args }
            }))
          }
        : { role: "assistant", content: message.content };
    case "tool":
      return { role: "tool", content: message.content, tool_name: message.name };
  }
}

function toOllamaTool(tool: ToolDefinition) {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters
    }
  };
}

/** Maps one complete reply (or one streamed chunk) into engine events. */
export function mapOllamaChunk(chunk: OllamaChatResponse): EngineEvent[] {
  if (chunk.error) {
    throw new AppError("ENGINE_UNAVAILABLE", `Ollama reported: ${chunk.error}`);
  }
  const events: EngineEvent[] = [];
  const message = chunk.message;
  if (message?.content) {
    events.push({ kind: "token", text: message.content });
  }
  const call = message?.tool_calls?.[0];
  if (call) {
    events.push({ kind: "tool_request", name: call.function.name, args: call.function.arguments });
  }
  return events;
}

export function mapOllamaReply(response: OllamaChatResponse): EngineReply {
  if (response.error) {
    throw new AppError("ENGINE_UNAVAILABLE", `Ollama reported: ${response.error}`);
  }
  const content = response.message?.content ?? "";
  const call = response.message?.tool_calls?.[0];
  if (call) {
    return {
      kind: "tool_request",
      name: call.function.name,
      args: call.function.arguments,
      ...(content ? { content } : {})
    };
  }
  return { kind: "answer", content };
}

function toEngineError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof HttpError && error.timedOut) {
    return new AppError("ENGINE_TIMEOUT", `Ollama timed out (${error.url})`, { cause: error });
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new AppError("ENGINE_UNAVAILABLE", `Ollama request failed: ${detail}`, { cause: error });
}

/** Talks to a local Ollama server through its `/api/chat` endpoint. */
export class OllamaEngine implements InferenceEngine {
  private readonly url: string;
  private readonly model: string;

  constructor(options: OllamaEngineOptions) {
    this.url = `${normalizeBase(options.baseUrl)}/api/chat`;
    this.model = options.model;
  }

  async chat(messages: EngineMessage[], options: EngineCallOptions = {}): Promise<EngineReply> {
    try {
      const response = await fetchJson(this.url, ollamaChatResponseSchema, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: this.body(messages, options, false),
        signal: options.signal
      });
      return mapOllamaReply(response);
    } catch (error) {
      throw toEngineError(error);
    }
  }

  async *chatStream(
    messages: EngineMessage[],
    options: EngineCallOptions = {}
  ): AsyncGenerator<EngineEvent> {
    const lines = fetchLines(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: this.body(messages, options, true),
      signal: options.signal
    });
    try {
      for await (const line of lines) {
        let parsed: unknown;
        try {
          parsed = JSON.parse(line);
        } catch (error) {
          throw new AppError("ENGINE_UNAVAILABLE", "Ollama sent a malformed stream line", {
            cause: error
          });
        }
        const chunk = ollamaChatResponseSchema.safeParse(parsed);
        if (!chunk.success) {
          throw new AppError("ENGINE_UNAVAILABLE", `Unexpected Ollama chunk: ${chunk.error.message}`);
        }
        yield* mapOllamaChunk(chunk.data);
        if (chunk.data.done) {
          return;
        }
      }
    } catch (error) {
      throw toEngineError(error);
    }
  }

  private body(messages: EngineMessage[], options: EngineCallOptions, stream: boolean): string {
    return JSON.stringify({
      model: this.model,
      messages: messages.map(toOllamaMessage),
      stream,
      ...(options.tools?.length ? { tools: options.tools.map(toOllamaTool) } : {})
    });
  }
}
