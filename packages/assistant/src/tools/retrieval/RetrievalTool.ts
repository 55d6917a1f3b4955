import { RETRIEVAL_TOOL_NAME } from "@sidekick/shared";
import type { RetrievalBackend } from "../../retrieval/RetrievalTypes.js";
import type { ToolDefinition } from "../ToolTypes.js";
import { optionalNumberArg, stringArg } from "../ToolArgs.js";

export const createRetrievalTool = (backend: RetrievalBackend): ToolDefinition => ({
  name: RETRIEVAL_TOOL_NAME,
  description: "Search the documents indexed in the current workspace and return the most relevant passages.",
  category: "retrieval",
  inputSchema: {
    type: "object",
    required: ["query"],
    properties: {
      query: { type: "string" },
      topK: { type: "integer" },
    },
  },
  handler: async (args, context) => {
    if (context.workspaceId === null) {
      throw new Error("Retrieval requires a workspace");
    }
    const query = stringArg(args, "query");
    const topK = optionalNumberArg(args, "topK") ?? context.retrievalCount;
    const passages = await backend.retrieve(
      { ownerId: context.userId, workspaceId: context.workspaceId },
      query,
      topK,
    );
    if (passages.length === 0) {
      return { output: `No passages found for "${query}"`, data: { passages } };
    }
    const output = passages
      .map((passage, index) => `[${index + 1}] ${passage.documentId} (score ${passage.score.toFixed(2)})\n${passage.text}`)
      .join("\n\n");
    return { output, data: { passages } };
  },
});
