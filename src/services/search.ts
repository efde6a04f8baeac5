import { z } from "zod";
import { TTLCache } from "../utils/cache.js";
import { AppError } from "../utils/errors.js";
import { fetchJson } from "../utils/http.js";

export type SearchResult = {
  title: string;
  snippet: string;
  url: string;
};

export interface SearchProvider {
  search(query: string, signal?: AbortSignal): Promise<SearchResult[]>;
}

type RelatedTopic = {
  Text?: string;
  FirstURL?: string;
  Name?: string;
  Topics?: RelatedTopic[];
};

const relatedTopicSchema: z.ZodType<RelatedTopic> = z.lazy(() =>
  z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Name: z.string().optional(),
    Topics: z.array(relatedTopicSchema).optional()
  })
);

export const instantAnswerSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  AbstractSource: z.string().optional(),
  RelatedTopics: z.array(relatedTopicSchema).optional()
});

export type InstantAnswer = z.infer<typeof instantAnswerSchema>;

export const MAX_SEARCH_RESULTS = 5;
const SEARCH_TIMEOUT_MS = 8_000;

function normalizeBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

function buildSearchUrl(baseUrl: string, query: string): string {
  const url = new URL(`${normalizeBase(baseUrl)}/`);
  url.searchParams.set("q", query);
  url.searchParams.set("format", "json");
  url.searchParams.set("no_html", "1");
  url.searchParams.set("skip_disambig", "1");
  return url.toString();
}

function flattenTopics(topics: RelatedTopic[]): RelatedTopic[] {
  return topics.flatMap((topic) => (topic.Topics ? flattenTopics(topic.Topics) : [topic]));
}

/** Topic text reads "Title - description"; the title is the part before the dash. */
function splitTopicText(text: string): { title: string; snippet: string } {
  const index = text.indexOf(" - ");
  if (index === -1) {
    return { title: text, snippet: text };
  }
  return { title: text.slice(0, index), snippet: text.slice(index + 3) };
}

export function mapInstantAnswer(answer: InstantAnswer): SearchResult[] {
  const results: SearchResult[] = [];
  if (answer.AbstractText && answer.AbstractURL) {
    results.push({
      title: answer.Heading || answer.AbstractSource || answer.AbstractURL,
      snippet: answer.AbstractText,
      url: answer.AbstractURL
    });
  }
  for (const topic of flattenTopics(answer.RelatedTopics ?? [])) {
    if (results.length >= MAX_SEARCH_RESULTS) {
      break;
    }
    if (!topic.Text || !topic.FirstURL) {
      continue;
    }
    results.push({ ...splitTopicText(topic.Text), url: topic.FirstURL });
  }
  return results;
}

export function formatSearchResults(query: string, results: SearchResult[]): string {
  if (!results.length) {
    return `Web search for "${query}" returned no results.`;
  }
  const lines = [`Web search results for "${query}":`];
  results.forEach((result, index) => {
    lines.push(`${index + 1}. ${result.title}: ${result.snippet} (${result.url})`);
  });
  return lines.join("\n");
}

/** DuckDuckGo instant-answer lookups, cached per normalized query. */
export class InstantAnswerSearch implements SearchProvider {
  private readonly baseUrl: string;
  private readonly cache = new TTLCache<SearchResult[]>(10 * 60 * 1000, 200);

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl;
  }

  async search(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
    const key = query.trim().toLowerCase();
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }
    try {
      const answer = await fetchJson(buildSearchUrl(this.baseUrl, query), instantAnswerSchema, {
        headers: { Accept: "application/json" },
        timeoutMs: SEARCH_TIMEOUT_MS,
        signal
      });
      const results = mapInstantAnswer(answer);
      this.cache.set(key, results);
      return results;
    } catch (error) {
      throw new AppError("TOOL_INVOCATION_FAILED", `Web search failed for "${query}"`, {
        cause: error
      });
    }
  }
}
