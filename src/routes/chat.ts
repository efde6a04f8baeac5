import type { Request } from "express";
import { z } from "zod";
import type { ChatCoordinator, StreamSink } from "../chat/coordinator.js";
import { callerOf } from "../middleware/auth.js";
import { asyncHandler } from "../middleware/errors.js";
import type { ChatRequest } from "../types.js";
import { AppError } from "../utils/errors.js";

export const MAX_QUESTION_LENGTH = 4_000;

const chatBodySchema = z.object({
  question: z.string().trim().min(1).max(MAX_QUESTION_LENGTH),
  sessionId: z.string().optional()
});

function parseChatRequest(req: Request): ChatRequest {
  const body = chatBodySchema.safeParse(req.body);
  if (!body.success) {
    throw new AppError("BAD_REQUEST", `Invalid chat body: ${body.error.message}`);
  }
  return {
    question: body.data.question,
    sessionId: body.data.sessionId,
    caller: callerOf(req)
  };
}

/** The slice of a writable response the event framing needs. */
export interface SseTarget {
  readonly destroyed: boolean;
  write(chunk: string): boolean;
  once(event: "drain" | "close", listener: () => void): unknown;
  off(event: "drain" | "close", listener: () => void): unknown;
}

function writeSse(target: SseTarget, event: string, data: unknown): boolean {
  return target.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

function drained(target: SseTarget): Promise<void> {
  return new Promise((resolve) => {
    const settle = () => {
      target.off("drain", settle);
      target.off("close", settle);
      resolve();
    };
    target.once("drain", settle);
    target.once("close", settle);
  });
}

/**
 * Chunks wait for the socket to drain once its buffer is full, so a slow
 * reader holds back the engine instead of growing the buffer. Terminal
 * events are single small writes and are not awaited.
 */
export function sseSink(target: SseTarget): StreamSink {
  return {
    chunk: (token) => {
      if (!writeSse(target, "chunk", { token }) && !target.destroyed) {
        return drained(target);
      }
    },
    done: () => {
      writeSse(target, "done", { done: true });
    },
    error: ({ code, message }) => {
      writeSse(target, "error", { error: message, code });
    }
  };
}

export function createChatRoutes(coordinator: ChatCoordinator) {
  const postChat = asyncHandler(async (req, res) => {
    const response = await coordinator.answer(parseChatRequest(req));
    res.status(200).json(response);
  });

  const postChatStream = asyncHandler(async (req, res) => {
    // listen before context loading so a caller gone during prepare is seen
    const disconnect = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        disconnect.abort();
      }
    });

    // validation and context loading fail as plain JSON, before the stream opens
    const run = await coordinator.prepare(parseChatRequest(req));
    if (disconnect.signal.aborted || res.destroyed) {
      await coordinator.abandon(run);
      return;
    }

    res.status(200);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.setHeader("X-Session-Id", run.sessionId ?? "");
    res.flushHeaders();

    try {
      await coordinator.stream(run, sseSink(res), disconnect.signal);
    } finally {
      if (!res.writableEnded) {
        res.end();
      }
    }
  });

  return { postChat, postChatStream };
}
