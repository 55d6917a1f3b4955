export * from "./config/Config.js";
export * from "./config/ConfigLoader.js";
export * from "./providers/ProviderTypes.js";
export * from "./providers/ProviderRegistry.js";
export * from "./providers/OpenAiCompatibleProvider.js";
export * from "./retrieval/RetrievalTypes.js";
export * from "./retrieval/HttpRetrievalClient.js";
export * from "./tools/ToolTypes.js";
export * from "./tools/ToolArgs.js";
export * from "./tools/ToolRegistry.js";
export * from "./tools/ToolCatalog.js";
export * from "./tools/filesystem/FileTools.js";
export * from "./tools/code/CodeExecutionTool.js";
export * from "./tools/search/WebSearchTool.js";
export * from "./tools/reference/ReferenceLookupTool.js";
export * from "./tools/notification/NotificationTool.js";
export * from "./tools/retrieval/RetrievalTool.js";
export * from "./runtime/RunLogger.js";
export * from "./runtime/Timeouts.js";
export * from "./runtime/DecisionStep.js";
export * from "./runtime/HistoryMapper.js";
export * from "./runtime/SystemContext.js";
export * from "./runtime/ToolDispatcher.js";
export * from "./runtime/ControlLoop.js";
export * from "./runtime/WorkspaceService.js";
export * from "./runtime/Assistant.js";
