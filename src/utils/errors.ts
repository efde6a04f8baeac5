export type ErrorCode =
  | "BAD_REQUEST"
  | "INVALID_IDENTIFIER"
  | "UNAUTHENTICATED"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "STORAGE_UNAVAILABLE"
  | "ENGINE_UNAVAILABLE"
  | "ENGINE_TIMEOUT"
  | "TOOL_INVOCATION_FAILED"
  | "CANCELLED"
  | "INTERNAL";

export type ErrorPayload = {
  error: {
    code: ErrorCode;
    message: string;
  };
};

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  BAD_REQUEST: 400,
  INVALID_IDENTIFIER: 400,
  UNAUTHENTICATED: 401,
  UNAUTHORIZED: 403,
  NOT_FOUND: 404,
  STORAGE_UNAVAILABLE: 503,
  ENGINE_UNAVAILABLE: 502,
  ENGINE_TIMEOUT: 504,
  TOOL_INVOCATION_FAILED: 502,
  CANCELLED: 499,
  INTERNAL: 500
};

const PUBLIC_MESSAGES: Record<ErrorCode, string> = {
  BAD_REQUEST: "The request body is invalid.",
  INVALID_IDENTIFIER: "The session identifier is invalid.",
  UNAUTHENTICATED: "A valid auth token is required.",
  UNAUTHORIZED: "You do not have access to this session.",
  NOT_FOUND: "Session not found.",
  STORAGE_UNAVAILABLE: "Chat history is temporarily unavailable.",
  ENGINE_UNAVAILABLE: "The assistant is unavailable right now.",
  ENGINE_TIMEOUT: "The assistant took too long to respond.",
  TOOL_INVOCATION_FAILED: "A lookup needed for this answer failed.",
  CANCELLED: "The request was cancelled.",
  INTERNAL: "An error occurred while generating the response."
};

/**
 * Error carrying a stable taxonomy code. `message` is for the operational log
 * only; callers see {@link AppError.publicMessage}.
 */
export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? PUBLIC_MESSAGES[code], options);
    this.name = "AppError";
    this.code = code;
  }

  get status(): number {
    return STATUS_BY_CODE[this.code];
  }

  get publicMessage(): string {
    return PUBLIC_MESSAGES[this.code];
  }
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  return new AppError("INTERNAL", message, { cause: error });
}

export function toErrorPayload(error: unknown): ErrorPayload {
  const appError = toAppError(error);
  return {
    error: { code: appError.code, message: appError.publicMessage }
  };
}

export function describeError(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
