import { AppError } from "./errors.js";

export type TokenProducer = (signal: AbortSignal) => AsyncIterable<string>;

export type TokenStreamOptions = {
  /** Longest wait for any single chunk, including the first. */
  chunkTimeoutMs: number;
  /** Caller-side cancellation, e.g. the client disconnecting. */
  signal?: AbortSignal;
};

/**
 * Finite, single-pass, cancellable sequence of text chunks. Iteration ending
 * normally is the end-of-answer sentinel. A chunk that does not arrive within
 * `chunkTimeoutMs` fails the iteration with `ENGINE_TIMEOUT`; cancellation
 * fails it with `CANCELLED`. Either way the producer's signal is aborted so
 * the engine request is released.
 */
export class TokenStream implements AsyncIterable<string> {
  private readonly controller = new AbortController();
  private readonly options: TokenStreamOptions;
  private readonly produce: TokenProducer;
  private consumed = false;

  constructor(produce: TokenProducer, options: TokenStreamOptions) {
    this.produce = produce;
    this.options = options;
    const outer = options.signal;
    if (outer?.aborted) {
      this.controller.abort();
    } else {
      outer?.addEventListener("abort", () => this.cancel(), { once: true });
    }
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    this.controller.abort();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    if (this.consumed) {
      throw new Error("TokenStream can only be iterated once");
    }
    this.consumed = true;

    const iterator = this.produce(this.controller.signal)[Symbol.asyncIterator]();
    let settled = true;
    try {
      while (true) {
        if (this.controller.signal.aborted) {
          throw new AppError("CANCELLED", "Stream cancelled by caller");
        }
        settled = false;
        const result = await this.nextChunk(iterator);
        settled = true;
        if (result.done) {
          return;
        }
        yield result.value;
      }
    } finally {
      this.controller.abort();
      // a pending next() is released by the abort; only a parked producer can be closed
      if (settled && iterator.return) {
        await iterator.return();
      }
    }
  }

  private nextChunk(iterator: AsyncIterator<string>): Promise<IteratorResult<string>> {
    const signal = this.controller.signal;
    return new Promise<IteratorResult<string>>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new AppError("CANCELLED", "Stream cancelled by caller"));
      };
      const timer = setTimeout(() => {
        signal.removeEventListener("abort", onAbort);
        reject(
          new AppError(
            "ENGINE_TIMEOUT",
            `No chunk received within ${this.options.chunkTimeoutMs}ms`
          )
        );
        this.controller.abort();
      }, this.options.chunkTimeoutMs);
      signal.addEventListener("abort", onAbort, { once: true });

      void iterator.next().then(
        (result) => {
          clearTimeout(timer);
          signal.removeEventListener("abort", onAbort);
          resolve(result);
        },
        (error: unknown) => {
          clearTimeout(timer);
          signal.removeEventListener("abort", onAbort);
          reject(error);
        }
      );
    });
  }
}
