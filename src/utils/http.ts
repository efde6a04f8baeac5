import { setDefaultResultOrder } from "node:dns";
import type { z } from "zod";

try {
  setDefaultResultOrder("ipv4first");
} catch (error) {
  console.warn("[http] ipv4first resolution unsupported:", error);
}

export class HttpError extends Error {
  readonly status?: number;
  readonly url: string;
  readonly body?: string;
  readonly timedOut: boolean;

  constructor(
    message: string,
    details: { url: string; status?: number; body?: string; timedOut?: boolean }
  ) {
    super(message);
    this.name = "HttpError";
    this.url = details.url;
    this.status = details.status;
    this.body = details.body;
    this.timedOut = details.timedOut ?? false;
  }
}

type FetchOptions = RequestInit & {
  timeoutMs?: number;
};

function isAbortError(error: unknown): boolean {
  return (
    (error instanceof DOMException || error instanceof Error) &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

function linkSignals(
  outer: AbortSignal | null | undefined,
  timeoutMs: number | undefined
): {
  signal: AbortSignal;
  abort: () => void;
  timedOut: () => boolean;
  dispose: () => void;
} {
  const controller = new AbortController();
  let expired = false;
  const timeoutId = timeoutMs
    ? setTimeout(() => {
        expired = true;
        controller.abort();
      }, timeoutMs)
    : undefined;
  const onAbort = () => controller.abort();
  if (outer?.aborted) {
    controller.abort();
  } else {
    outer?.addEventListener("abort", onAbort, { once: true });
  }
  return {
    signal: controller.signal,
    abort: () => controller.abort(),
    timedOut: () => expired,
    dispose: () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      outer?.removeEventListener("abort", onAbort);
    }
  };
}

function wrapFailure(error: unknown, url: string, timedOut: boolean): Error {
  if (error instanceof HttpError) {
    return error;
  }
  if (isAbortError(error)) {
    return timedOut
      ? new HttpError("Request timed out", { url, timedOut: true })
      : new HttpError("Request aborted", { url });
  }
  if (error instanceof Error) {
    return new HttpError(error.message, { url });
  }
  return new HttpError("Unknown request error", { url });
}

export async function fetchJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: FetchOptions = {}
): Promise<T> {
  const { timeoutMs, signal: outer, ...init } = options;
  const link = linkSignals(outer, timeoutMs);

  try {
    const response = await fetch(url, { ...init, signal: link.signal });

    const text = await response.text();
    if (!response.ok) {
      throw new HttpError(`Request failed with status ${response.status}`, {
        status: response.status,
        url,
        body: text
      });
    }

    let parsed: unknown;
    try {
      parsed = text ? JSON.parse(text) : {};
    } catch {
      throw new HttpError("Failed to parse JSON response", {
        status: response.status,
        url,
        body: text
      });
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new HttpError(`Unexpected response shape: ${result.error.message}`, {
        status: response.status,
        url,
        body: text
      });
    }
    return result.data;
  } catch (error) {
    throw wrapFailure(error, url, link.timedOut());
  } finally {
    link.dispose();
  }
}

/**
 * Streams a response body as text lines (newline-delimited JSON and similar).
 * Blank lines are skipped. Aborting `signal` cancels the underlying request.
 */
export async function* fetchLines(
  url: string,
  options: FetchOptions = {}
): AsyncGenerator<string> {
  const { timeoutMs, signal: outer, ...init } = options;
  const link = linkSignals(outer, timeoutMs);

  try {
    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: link.signal });
    } catch (error) {
      throw wrapFailure(error, url, link.timedOut());
    }
    if (!response.ok || !response.body) {
      const text = await response.text();
      throw new HttpError(`Request failed with status ${response.status}`, {
        status: response.status,
        url,
        body: text
      });
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffered = "";
    let finished = false;
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        buffered += decoder.decode(value, { stream: true });
        let newline = buffered.indexOf("\n");
        while (newline !== -1) {
          const line = buffered.slice(0, newline).trim();
          buffered = buffered.slice(newline + 1);
          if (line) {
            yield line;
          }
          newline = buffered.indexOf("\n");
        }
      }
      const tail = (buffered + decoder.decode()).trim();
      finished = true;
      if (tail) {
        yield tail;
      }
    } catch (error) {
      throw wrapFailure(error, url, link.timedOut());
    } finally {
      if (!finished) {
        // consumer stopped early: drop the connection
        link.abort();
      }
      reader.releaseLock();
    }
  } finally {
    link.dispose();
  }
}
