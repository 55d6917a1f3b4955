import type { ToolDefinition } from "../ToolTypes.js";
import { isObject, optionalNumberArg, stringArg } from "../ToolArgs.js";

export interface WebSearchOptions {
  apiKey: string;
  baseUrl?: string;
  maxResults?: number;
}

export interface WebSearchHit {
  title: string;
  link: string;
  snippet: string;
}

const DEFAULT_SERPER_URL = "https://google.serper.dev/search";

const readHits = (payload: unknown, limit: number): WebSearchHit[] => {
  if (!isObject(payload) || !Array.isArray(payload.organic)) return [];
  const hits: WebSearchHit[] = [];
  for (const entry of payload.organic) {
    if (!isObject(entry)) continue;
    hits.push({
      title: typeof entry.title === "string" ? entry.title : "",
      link: typeof entry.link === "string" ? entry.link : "",
      snippet: typeof entry.snippet === "string" ? entry.snippet : "",
    });
    if (hits.length >= limit) break;
  }
  return hits;
};

const readAnswer = (payload: unknown): string | undefined => {
  if (!isObject(payload) || !isObject(payload.answerBox)) return undefined;
  const { answer, snippet } = payload.answerBox;
  if (typeof answer === "string") return answer;
  return typeof snippet === "string" ? snippet : undefined;
};

export const createWebSearchTool = (options: WebSearchOptions): ToolDefinition => ({
  name: "web_search",
  description: "Search the web and return the top results with links.",
  category: "web_search",
  inputSchema: {
    type: "object",
    required: ["query"],
    properties: {
      query: { type: "string" },
      limit: { type: "integer" },
    },
  },
  handler: async (args, context) => {
    const query = stringArg(args, "query");
    const limit = optionalNumberArg(args, "limit") ?? options.maxResults ?? 5;
    const response = await fetch(options.baseUrl ?? DEFAULT_SERPER_URL, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-api-key": options.apiKey,
      },
      body: JSON.stringify({ q: query, num: limit }),
      signal: context.signal,
    });
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Web search failed (${response.status}): ${body}`);
    }
    const payload: unknown = await response.json();
    const answer = readAnswer(payload);
    const hits = readHits(payload, limit);
    const lines = hits.map((hit, index) => `${index + 1}. ${hit.title}\n   ${hit.link}\n   ${hit.snippet}`);
    if (answer) lines.unshift(`Answer: ${answer}`);
    return {
      output: lines.length ? lines.join("\n") : `No results for "${query}"`,
      data: { answer, hits },
    };
  },
});
