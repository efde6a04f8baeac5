import type { Request, Response, NextFunction, RequestHandler } from "express";
import { getApps, initializeApp, applicationDefault } from "firebase-admin/app";
import { getAuth } from "firebase-admin/auth";
import type { UserStore } from "../store/types.js";
import { ANONYMOUS_OWNER, type Caller } from "../types.js";
import { ownerOf, type AuthUser } from "../types/user.js";
import { AppError, describeError, toErrorPayload } from "../utils/errors.js";

export type TokenVerifier = (token: string) => Promise<AuthUser>;

function initFirebaseAdmin(projectId: string | undefined) {
  if (getApps().length) {
    return;
  }
  initializeApp({
    credential: applicationDefault(),
    projectId
  });
}

export function createFirebaseVerifier(projectId: string | undefined): TokenVerifier {
  return async (token) => {
    initFirebaseAdmin(projectId);
    const decoded = await getAuth().verifyIdToken(token);
    return {
      uid: decoded.uid,
      email: decoded.email ?? null,
      name: typeof decoded.name === "string" ? decoded.name : null
    };
  };
}

function bearerToken(req: Request): string | null {
  const header = req.headers.authorization ?? "";
  const match = header.match(/^Bearer\s+(.+)$/i);
  return match?.[1] ?? null;
}

function reject(res: Response, message: string) {
  res.status(401).json(toErrorPayload(new AppError("UNAUTHENTICATED", message)));
}

/** Identity of the request for session ownership checks. */
export function callerOf(req: Request): Caller {
  return {
    owner: req.user ? ownerOf(req.user) : ANONYMOUS_OWNER,
    ipAddress: req.ip,
    userAgent: req.get("user-agent")
  };
}

export type AuthMiddleware = {
  requireAuth: RequestHandler;
  /** Lets guests through; a token that is present must still be valid. */
  optionalAuth: RequestHandler;
};

export function createAuthMiddleware(verify: TokenVerifier, users: UserStore): AuthMiddleware {
  async function authenticate(
    req: Request,
    res: Response,
    next: NextFunction,
    required: boolean
  ) {
    const token = bearerToken(req);
    if (!token) {
      if (required) {
        reject(res, "Missing auth token");
        return;
      }
      next();
      return;
    }

    let user: AuthUser;
    try {
      user = await verify(token);
    } catch (error) {
      console.warn(`[auth] token rejected: ${describeError(error)}`);
      reject(res, "Invalid auth token");
      return;
    }
    req.user = user;
    try {
      await users.recordLogin(user);
    } catch (error) {
      console.error(`[auth] could not record login for ${user.uid}: ${describeError(error)}`);
    }
    next();
  }

  return {
    requireAuth: (req, res, next) => {
      void authenticate(req, res, next, true).catch(next);
    },
    optionalAuth: (req, res, next) => {
      void authenticate(req, res, next, false).catch(next);
    }
  };
}
