export type StorageConfig =
  | { driver: "file"; dataDir: string }
  | { driver: "mongo"; dataDir: string; mongoUri: string };

export type EngineConfig = {
  baseUrl: string;
  model: string;
  chunkTimeoutMs: number;
  requestTimeoutMs: number;
};

export type SearchConfig = {
  enabled: boolean;
  baseUrl: string;
};

const DEFAULT_BASES = {
  ollama: "http://localhost:11434",
  search: "https://api.duckduckgo.com"
};

const DEFAULT_MODEL = "llama3.1";

function getEnv(name: string): string | undefined {
  const value = process.env[name];
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return value.trim();
}

function requireEnv(name: string, context: string): string {
  const value = getEnv(name);
  if (!value) {
    throw new Error(`Missing ${name}. Required for ${context}.`);
  }
  return value;
}

function getNumberEnv(name: string, fallback: number): number {
  const raw = getEnv(name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}".`);
  }
  return value;
}

function getFlagEnv(name: string, fallback: boolean): boolean {
  const raw = getEnv(name)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  return !["0", "false", "no", "off"].includes(raw);
}

export function getPort(): number {
  return getNumberEnv("PORT", 8080);
}

export function getStorageConfig(): StorageConfig {
  const dataDir = getEnv("DATA_DIR") ?? "data";
  const driver = getEnv("STORAGE_DRIVER")?.toLowerCase() ?? "file";
  if (driver === "mongo") {
    return {
      driver: "mongo",
      dataDir,
      mongoUri: requireEnv("MONGODB_URI", "the mongo storage driver")
    };
  }
  if (driver !== "file") {
    throw new Error(`Unknown STORAGE_DRIVER "${driver}". Use "file" or "mongo".`);
  }
  return { driver: "file", dataDir };
}

export function getEngineConfig(): EngineConfig {
  return {
    baseUrl: getEnv("OLLAMA_BASE") ?? DEFAULT_BASES.ollama,
    model: getEnv("OLLAMA_MODEL") ?? DEFAULT_MODEL,
    chunkTimeoutMs: getNumberEnv("ENGINE_CHUNK_TIMEOUT_MS", 30_000),
    requestTimeoutMs: getNumberEnv("ENGINE_REQUEST_TIMEOUT_MS", 120_000)
  };
}

export function getSearchConfig(): SearchConfig {
  return {
    enabled: getFlagEnv("SEARCH_ENABLED", true),
    baseUrl: getEnv("SEARCH_BASE") ?? DEFAULT_BASES.search
  };
}

export function getFirebaseProjectId(): string | undefined {
  return getEnv("FIREBASE_PROJECT_ID");
}

export function isAnalyticsEnabled(): boolean {
  return getFlagEnv("ANALYTICS_ENABLED", true);
}
