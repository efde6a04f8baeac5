import { readFileSync } from "node:fs";
import { z } from "zod";

export type AppConfig = {
  assistant: {
    name: string;
    persona: string[];
    knowledgeFile?: string;
  };
  context: {
    maxTurns: number;
  };
};

export const MAX_CONTEXT_TURNS = 10;

const configSchema = z.object({
  assistant: z.object({
    name: z.string().min(1),
    persona: z.array(z.string()).min(1),
    knowledgeFile: z.string().min(1).optional()
  }),
  context: z.object({
    maxTurns: z.number().int().min(1).max(MAX_CONTEXT_TURNS)
  })
});

export const DEFAULT_CONFIG: AppConfig = {
  assistant: {
    name: "Campus Assistant",
    persona: [
      "You are Campus Assistant, an AI helper for students, faculty, and staff of the university.",
      "Be factual and concise. It is fine to say \"I don't know\" when you are unsure."
    ]
  },
  context: {
    maxTurns: 6
  }
};

export const PROJECT_ROOT = new URL("../../", import.meta.url);

export function loadConfig(path: URL = new URL("config.json", PROJECT_ROOT)): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch {
    return DEFAULT_CONFIG;
  }
  try {
    const parsed = configSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      console.warn(`[config] ${path.pathname} is invalid, using defaults:`, parsed.error.message);
      return DEFAULT_CONFIG;
    }
    return parsed.data;
  } catch (error) {
    console.warn(`[config] ${path.pathname} is not valid JSON, using defaults:`, error);
    return DEFAULT_CONFIG;
  }
}

/**
 * Reads the knowledge base the content refresh job writes. JSON files are
 * re-serialized so the prompt text does not depend on source formatting.
 */
export function loadKnowledge(file: string | undefined): string | undefined {
  if (!file) {
    return undefined;
  }
  const url = new URL(file, PROJECT_ROOT);
  let raw: string;
  try {
    raw = readFileSync(url, "utf-8");
  } catch {
    console.warn(`[config] knowledge file ${file} not found, continuing without it`);
    return undefined;
  }
  if (!file.endsWith(".json")) {
    return raw.trim() || undefined;
  }
  try {
    return JSON.stringify(JSON.parse(raw), null, 2);
  } catch (error) {
    console.warn(`[config] knowledge file ${file} is not valid JSON, ignoring:`, error);
    return undefined;
  }
}
