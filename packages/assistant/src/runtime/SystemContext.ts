import type { WorkspaceConfig } from "@sidekick/shared";
import type { ToolRegistryView } from "../tools/ToolRegistry.js";

export interface SystemContextInput {
  workspaceId: string | null;
  config: WorkspaceConfig;
  view: ToolRegistryView;
  persona?: string;
}

export const DEFAULT_PERSONA =
  "You are Sidekick, a personal assistant that works inside the user's folders. " +
  "Answer directly when you can; call tools when they help you finish the task.";

/**
 * Assembles the system prompt for one exchange from the workspace settings and
 * the tools actually present in the view.
 */
export const buildSystemContext = (input: SystemContextInput): string => {
  const { workspaceId, config, view } = input;
  const lines = [input.persona ?? DEFAULT_PERSONA, ""];

  if (workspaceId === null) {
    lines.push("No workspace is selected. You have the user's scratch folder and no indexed documents.");
  } else {
    lines.push(`Workspace: "${workspaceId}".`);
    lines.push(
      `Documents in this workspace are indexed in chunks of ${config.chunkSize} characters ` +
        `with ${config.chunkOverlap} characters of overlap.`,
    );
  }

  const names = view.names();
  lines.push(names.length ? `Available tools: ${names.join(", ")}.` : "No tools are available; answer from the conversation.");

  if (view.hasRetrieval) {
    lines.push(
      `Document retrieval is available and returns up to ${config.retrievalCount} passages. ` +
        "Use it before answering questions about the workspace documents and cite the passages you rely on.",
    );
  } else {
    lines.push("Document retrieval is not available in this conversation.");
  }

  lines.push("If a tool fails, read the error and either try a different approach or explain the problem.");
  return lines.join("\n");
};
