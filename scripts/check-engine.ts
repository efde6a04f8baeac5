import dotenv from "dotenv";
import { z } from "zod";
import { getEngineConfig, getSearchConfig } from "../src/utils/env.js";
import { describeError } from "../src/utils/errors.js";
import { fetchJson } from "../src/utils/http.js";

dotenv.config();

type CheckResult = {
  name: string;
  ok: boolean;
  skipped?: boolean;
  details?: string;
};

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([])
});

const instantAnswerProbe = z.object({ Heading: z.string().optional() }).passthrough();

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}${path}`;
}

async function checkOllama(base: string, model: string): Promise<CheckResult> {
  try {
    const data = await fetchJson(joinUrl(base, "/api/tags"), tagsSchema, { timeoutMs: 5_000 });
    const names = data.models.map((entry) => entry.name);
    const found = names.some((name) => name === model || name.startsWith(`${model}:`));
    return {
      name: "Ollama",
      ok: found,
      details: found ? `model ${model} available` : `model ${model} missing (have: ${names.join(", ") || "none"})`
    };
  } catch (error) {
    return { name: "Ollama", ok: false, details: describeError(error) };
  }
}

async function checkSearch(base: string): Promise<CheckResult> {
  try {
    const url = new URL(base);
    url.searchParams.set("q", "university");
    url.searchParams.set("format", "json");
    url.searchParams.set("no_html", "1");
    const data = await fetchJson(url.toString(), instantAnswerProbe, { timeoutMs: 5_000 });
    return { name: "Web search", ok: true, details: data.Heading || "reachable" };
  } catch (error) {
    return { name: "Web search", ok: false, details: describeError(error) };
  }
}

async function main() {
  const engine = getEngineConfig();
  const search = getSearchConfig();

  const results = await Promise.all([
    checkOllama(engine.baseUrl, engine.model),
    search.enabled
      ? checkSearch(search.baseUrl)
      : Promise.resolve({ name: "Web search", ok: true, skipped: true, details: "disabled" })
  ]);
  const failures = results.filter((result) => !result.ok && !result.skipped);

  for (const result of results) {
    const status = result.skipped ? "SKIP" : result.ok ? "OK" : "FAIL";
    console.log(`${status} - ${result.name}: ${result.details ?? ""}`);
  }

  if (failures.length > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(`Unexpected error: ${describeError(error)}`);
  process.exitCode = 1;
});
