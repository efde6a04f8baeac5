import type { NextFunction, Request, RequestHandler, Response } from "express";
import { AppError, describeError, toAppError, toErrorPayload } from "../utils/errors.js";

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not await handlers; forward rejections to the error middleware. */
export function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    void handler(req, res).catch(next);
  };
}

function classify(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  // body-parser marks malformed JSON and oversized bodies with a 4xx status
  if (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return new AppError("BAD_REQUEST", error.message, { cause: error });
  }
  return toAppError(error);
}

export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    next(error);
    return;
  }
  const appError = classify(error);
  if (appError.status >= 500) {
    console.error(`[http] ${req.method} ${req.path} failed: ${describeError(error)}`);
  }
  res.status(appError.status).json(toErrorPayload(appError));
}
