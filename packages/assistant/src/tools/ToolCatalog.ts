import type { SidekickConfig } from "../config/Config.js";
import type { RetrievalBackend } from "../retrieval/RetrievalTypes.js";
import { createCodeExecutionTool } from "./code/CodeExecutionTool.js";
import { createFileTools } from "./filesystem/FileTools.js";
import { createNotificationTool } from "./notification/NotificationTool.js";
import { createReferenceLookupTool } from "./reference/ReferenceLookupTool.js";
import { createRetrievalTool } from "./retrieval/RetrievalTool.js";
import { createWebSearchTool } from "./search/WebSearchTool.js";
import { ToolRegistry } from "./ToolRegistry.js";

/**
 * Registers every tool the configuration can back. Tools that need a
 * credential or a backend are left out when it is missing.
 */
export const buildToolRegistry = (config: SidekickConfig, retrieval?: RetrievalBackend): ToolRegistry => {
  const registry = new ToolRegistry();
  for (const tool of createFileTools()) {
    registry.register(tool);
  }
  if (Object.keys(config.codeExecution.interpreters).length > 0) {
    registry.register(
      createCodeExecutionTool({
        interpreters: config.codeExecution.interpreters,
        timeoutMs: config.codeExecution.timeoutMs,
      }),
    );
  }
  registry.register(createReferenceLookupTool({ language: config.reference.language }));
  if (config.webSearch.apiKey) {
    registry.register(
      createWebSearchTool({
        apiKey: config.webSearch.apiKey,
        baseUrl: config.webSearch.baseUrl,
        maxResults: config.webSearch.maxResults,
      }),
    );
  }
  if (config.notifications.token && config.notifications.user) {
    registry.register(
      createNotificationTool({ token: config.notifications.token, user: config.notifications.user }),
    );
  }
  if (retrieval) {
    registry.register(createRetrievalTool(retrieval));
  }
  return registry;
};
