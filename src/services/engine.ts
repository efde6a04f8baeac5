export type ToolRequest = {
  kind: "tool_request";
  name: string;
  args: Record<string, unknown>;
  /** Text the engine wrote before asking for the tool. */
  content?: string;
};

export type PlainAnswer = {
  kind: "answer";
  content: string;
};

/** What a single-shot engine call resolves to. */
export type EngineReply = PlainAnswer | ToolRequest;

/** What a streaming engine call yields, in engine order. */
export type EngineEvent = { kind: "token"; text: string } | ToolRequest;

export type EngineMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: Array<Pick<ToolRequest, "name" | "args">> }
  | { role: "tool"; name: string; content: string };

export type ToolDefinition = {
  name: string;
  description: string;
  /** JSON Schema for the arguments object. */
  parameters: {
    type: "object";
    properties: Record<string, { type: string; description: string }>;
    required: string[];
  };
};

export type EngineCallOptions = {
  tools?: ToolDefinition[];
  signal?: AbortSignal;
};

/**
 * The local model engine. Implementations raise `ENGINE_UNAVAILABLE` when the
 * engine cannot be reached and `ENGINE_TIMEOUT` when it stops answering.
 */
export interface InferenceEngine {
  chat(messages: EngineMessage[], options?: EngineCallOptions): Promise<EngineReply>;
  chatStream(messages: EngineMessage[], options?: EngineCallOptions): AsyncIterable<EngineEvent>;
}
