import type { AuthUser } from "./user.js";

declare global {
  namespace Express {
    interface Request {
      /** Set by the auth middleware when a valid bearer token was sent. */
      user?: AuthUser;
    }
  }
}

export {};
