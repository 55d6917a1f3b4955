import type { ToolDefinition } from "../ToolTypes.js";
import { isObject, stringArg } from "../ToolArgs.js";

export interface ReferenceLookupOptions {
  /** Wikipedia language edition, e.g. "en". */
  language: string;
  baseUrl?: string;
}

const resolveBaseUrl = (options: ReferenceLookupOptions): string => {
  const base = options.baseUrl ?? `https://${options.language}.wikipedia.org/api/rest_v1`;
  return base.endsWith("/") ? base.slice(0, -1) : base;
};

export const createReferenceLookupTool = (options: ReferenceLookupOptions): ToolDefinition => ({
  name: "reference_lookup",
  description: "Look up an encyclopedia summary for a topic.",
  category: "reference",
  inputSchema: {
    type: "object",
    required: ["topic"],
    properties: {
      topic: { type: "string" },
    },
  },
  handler: async (args, context) => {
    const topic = stringArg(args, "topic").trim();
    const title = encodeURIComponent(topic.replace(/\s+/g, "_"));
    const response = await fetch(`${resolveBaseUrl(options)}/page/summary/${title}`, {
      headers: { accept: "application/json" },
      signal: context.signal,
    });
    if (response.status === 404) {
      return { output: `No reference entry found for "${topic}"`, data: { found: false } };
    }
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Reference lookup failed (${response.status}): ${body}`);
    }
    const payload: unknown = await response.json();
    if (!isObject(payload)) {
      throw new Error("Reference lookup returned an unexpected payload");
    }
    const heading = typeof payload.title === "string" ? payload.title : topic;
    const extract = typeof payload.extract === "string" ? payload.extract : "";
    return {
      output: extract ? `${heading}\n${extract}` : heading,
      data: { found: true, title: heading, extract },
    };
  },
});
