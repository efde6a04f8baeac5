export type Role = "user" | "assistant";

export type Turn = {
  role: Role;
  content: string;
  timestamp: string;
};

/** Owner marker for sessions started without a signed-in identity. */
export const ANONYMOUS_OWNER = "anonymous";

export type Session = {
  sessionId: string;
  owner: string;
  createdAt: string;
  lastActivityAt: string;
  turns: Turn[];
};

export type SessionSummary = {
  sessionId: string;
  createdAt: string;
  lastActivityAt: string;
  preview: string;
  turnCount: number;
};

export type Caller = {
  owner: string;
  ipAddress?: string;
  userAgent?: string;
};

export type ChatRequest = {
  question: string;
  sessionId?: string;
  caller: Caller;
};

export type ChatAnswer = {
  sessionId: string;
  answer: string;
};
