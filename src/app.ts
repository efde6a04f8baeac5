import express from "express";
import cors from "cors";
import type { ChatCoordinator } from "./chat/coordinator.js";
import { createAuthMiddleware, type TokenVerifier } from "./middleware/auth.js";
import { errorHandler } from "./middleware/errors.js";
import { createChatRoutes } from "./routes/chat.js";
import { createSessionRoutes } from "./routes/sessions.js";
import { createUserRoutes } from "./routes/user.js";
import type { SessionLifecycle } from "./sessions/lifecycle.js";
import type { UserStore } from "./store/types.js";

export type AppDependencies = {
  coordinator: ChatCoordinator;
  lifecycle: SessionLifecycle;
  users: UserStore;
  verifyToken: TokenVerifier;
};

export function createApp(deps: AppDependencies) {
  const app = express();
  const { requireAuth, optionalAuth } = createAuthMiddleware(deps.verifyToken, deps.users);
  const { postChat, postChatStream } = createChatRoutes(deps.coordinator);
  const sessions = createSessionRoutes(deps.lifecycle);
  const { getMe } = createUserRoutes(deps.users);

  app.use(cors({ exposedHeaders: ["X-Session-Id"] }));
  app.use(express.json({ limit: "1mb" }));

  app.post("/api/chat", optionalAuth, postChat);
  app.post("/chat", optionalAuth, postChat);
  app.post("/api/chat/stream", optionalAuth, postChatStream);
  app.post("/chat/stream", optionalAuth, postChatStream);

  app.get("/api/sessions", requireAuth, sessions.getSessions);
  app.post("/api/sessions", optionalAuth, sessions.postSession);
  app.get("/api/sessions/:sessionId", optionalAuth, sessions.getSession);
  app.delete("/api/sessions/:sessionId", optionalAuth, sessions.deleteSession);
  app.post("/api/sessions/:sessionId/switch", optionalAuth, sessions.switchSession);

  app.get("/api/me", requireAuth, getMe);

  app.get("/health", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.use(errorHandler);

  return app;
}
