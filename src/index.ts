import type { Server } from "node:http";
import path from "node:path";
import dotenv from "dotenv";
import { createApp } from "./app.js";
import { ChatCoordinator } from "./chat/coordinator.js";
import { ContextAssembler } from "./chat/context.js";
import { buildSystemPrompt } from "./chat/prompt.js";
import { connectToDatabase } from "./db.js";
import { createFirebaseVerifier } from "./middleware/auth.js";
import {
  DisabledInteractionLog,
  JsonlInteractionLog,
  type InteractionLog
} from "./services/analytics.js";
import { InferenceClient } from "./services/inference.js";
import { OllamaEngine } from "./services/ollama.js";
import { InstantAnswerSearch } from "./services/search.js";
import { ToolRunner } from "./services/tools.js";
import { SessionLifecycle } from "./sessions/lifecycle.js";
import { FileSessionStore } from "./store/fileSessionStore.js";
import { FileUserStore } from "./store/fileUserStore.js";
import { MongoSessionStore, MongoUserStore } from "./store/mongoSessionStore.js";
import type { SessionStore, UserStore } from "./store/types.js";
import { loadConfig, loadKnowledge } from "./utils/config.js";
import {
  getEngineConfig,
  getFirebaseProjectId,
  getPort,
  getSearchConfig,
  getStorageConfig,
  isAnalyticsEnabled,
  type StorageConfig
} from "./utils/env.js";
import { describeError } from "./utils/errors.js";

dotenv.config();

async function openStores(
  storage: StorageConfig
): Promise<{ sessions: SessionStore; users: UserStore }> {
  if (storage.driver === "mongo") {
    await connectToDatabase(storage.mongoUri);
    return { sessions: new MongoSessionStore(), users: new MongoUserStore() };
  }
  const dataDir = path.resolve(storage.dataDir);
  console.log(`[store] keeping sessions under ${dataDir}`);
  return { sessions: new FileSessionStore(dataDir), users: new FileUserStore(dataDir) };
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}

async function start() {
  const config = loadConfig();
  const storage = getStorageConfig();
  const engineConfig = getEngineConfig();
  const searchConfig = getSearchConfig();

  const { sessions, users } = await openStores(storage);
  const lifecycle = new SessionLifecycle(sessions);
  const interactions: InteractionLog = isAnalyticsEnabled()
    ? new JsonlInteractionLog(path.resolve(storage.dataDir))
    : new DisabledInteractionLog();

  const inference = new InferenceClient({
    engine: new OllamaEngine({ baseUrl: engineConfig.baseUrl, model: engineConfig.model }),
    tools: new ToolRunner(
      searchConfig.enabled ? new InstantAnswerSearch(searchConfig.baseUrl) : null
    ),
    systemPrompt: buildSystemPrompt({
      persona: config.assistant.persona,
      knowledge: loadKnowledge(config.assistant.knowledgeFile)
    }),
    chunkTimeoutMs: engineConfig.chunkTimeoutMs,
    requestTimeoutMs: engineConfig.requestTimeoutMs
  });

  const coordinator = new ChatCoordinator({
    lifecycle,
    store: sessions,
    context: new ContextAssembler(sessions, config.context.maxTurns),
    inference,
    interactions
  });

  const app = createApp({
    coordinator,
    lifecycle,
    users,
    verifyToken: createFirebaseVerifier(getFirebaseProjectId())
  });

  const port = getPort();
  const server = app.listen(port, () => {
    console.log(
      `${config.assistant.name} listening on http://localhost:${port} (model ${engineConfig.model}, ${storage.driver} storage)`
    );
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`[server] ${signal} received, shutting down`);
    try {
      await closeServer(server);
      await interactions.flush();
      await sessions.close();
    } catch (error) {
      console.error(`[server] unclean shutdown: ${describeError(error)}`);
      process.exitCode = 1;
    }
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }
}

start().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
