import { z } from "zod";
import { AppError } from "../utils/errors.js";
import type { ToolDefinition, ToolRequest } from "./engine.js";
import { formatSearchResults, type SearchProvider } from "./search.js";

export const WEB_SEARCH_TOOL: ToolDefinition = {
  name: "web_search",
  description:
    "Search the web for current information that the university data does not cover.",
  parameters: {
    type: "object",
    properties: {
      query: { type: "string", description: "The search query to look up on the web" }
    },
    required: ["query"]
  }
};

const webSearchArgs = z.object({ query: z.string().trim().min(1) });

/** Runs the side actions the engine may request. */
export class ToolRunner {
  private readonly search: SearchProvider | null;

  constructor(search: SearchProvider | null) {
    this.search = search;
  }

  get definitions(): ToolDefinition[] {
    return this.search ? [WEB_SEARCH_TOOL] : [];
  }

  async run(request: ToolRequest, signal?: AbortSignal): Promise<string> {
    if (request.name !== WEB_SEARCH_TOOL.name || !this.search) {
      throw new AppError("TOOL_INVOCATION_FAILED", `Unknown tool "${request.name}"`);
    }
    const args = webSearchArgs.safeParse(request.args);
    if (!args.success) {
      throw new AppError("TOOL_INVOCATION_FAILED", `Bad web_search arguments: ${args.error.message}`);
    }
    const results = await this.search.search(args.data.query, signal);
    return formatSearchResults(args.data.query, results);
  }
}
