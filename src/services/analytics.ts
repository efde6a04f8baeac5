import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { describeError } from "../utils/errors.js";

export type InteractionRecord = {
  timestamp: string;
  sessionId: string;
  owner: string;
  ipAddress: string | null;
  userAgent: string | null;
  question: string;
  questionLength: number;
  answer: string;
  answerLength: number;
  generationTimeSeconds: number;
  streamed: boolean;
};

export type InteractionInput = Omit<
  InteractionRecord,
  "timestamp" | "questionLength" | "answerLength" | "generationTimeSeconds"
> & { generationTimeMs: number };

/** Write-only analytics sink. `record` never blocks or fails the caller. */
export interface InteractionLog {
  record(interaction: InteractionInput): void;
  flush(): Promise<void>;
}

export function toInteractionRecord(
  input: InteractionInput,
  now: Date = new Date()
): InteractionRecord {
  const { generationTimeMs, ...rest } = input;
  return {
    timestamp: now.toISOString(),
    ...rest,
    questionLength: input.question.length,
    answerLength: input.answer.length,
    generationTimeSeconds: Math.round(generationTimeMs / 10) / 100
  };
}

/** Appends one JSON object per line to `<dataDir>/analytics.jsonl`. */
export class JsonlInteractionLog implements InteractionLog {
  private readonly dataDir: string;
  readonly file: string;
  private tail: Promise<void> = Promise.resolve();

  constructor(dataDir: string) {
    this.dataDir = dataDir;
    this.file = path.join(dataDir, "analytics.jsonl");
  }

  record(interaction: InteractionInput): void {
    const line = `${JSON.stringify(toInteractionRecord(interaction))}\n`;
    this.tail = this.tail
      .then(async () => {
        await mkdir(this.dataDir, { recursive: true });
        await appendFile(this.file, line, "utf-8");
      })
      .catch((error: unknown) => {
        console.error(`[analytics] failed to record interaction: ${describeError(error)}`);
      });
  }

  flush(): Promise<void> {
    return this.tail;
  }
}

export class DisabledInteractionLog implements InteractionLog {
  record(): void {}

  async flush(): Promise<void> {}
}
