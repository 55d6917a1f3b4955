import path from "node:path";
import { DEFAULT_WORKSPACE_CONFIG, PathHelper, type WorkspaceConfig } from "@sidekick/shared";
import type { CodeInterpreter } from "../tools/code/CodeExecutionTool.js";

export interface LimitsConfig {
  maxIterations: number;
  maxToolCallsPerTurn: number;
  maxToolCallsPerExchange: number;
  decisionTimeoutMs: number;
  toolTimeoutMs: number;
  toolConcurrency: number;
  historyWindow: number;
  maxToolOutputChars: number;
}

export interface ToolConfig {
  /** User-level allow list; empty enables every registered tool. */
  enabled: string[];
}

export interface CodeExecutionConfig {
  interpreters: Record<string, CodeInterpreter>;
  timeoutMs: number;
}

export interface RetrievalConfig {
  baseUrl?: string;
  authToken?: string;
  timeoutMs: number;
}

export interface WebSearchConfig {
  apiKey?: string;
  baseUrl?: string;
  maxResults: number;
}

export interface ReferenceConfig {
  language: string;
}

export interface NotificationConfig {
  token?: string;
  user?: string;
}

export interface LoggingConfig {
  directory: string;
}

export interface SidekickConfig {
  dataDir: string;
  userId: string;
  provider: string;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  limits: LimitsConfig;
  tools: ToolConfig;
  codeExecution: CodeExecutionConfig;
  retrieval: RetrievalConfig;
  webSearch: WebSearchConfig;
  reference: ReferenceConfig;
  notifications: NotificationConfig;
  workspaceDefaults: WorkspaceConfig;
  logging: LoggingConfig;
}

export const DEFAULT_DATA_DIR = PathHelper.getGlobalSidekickDir();

export const DEFAULT_LIMITS: LimitsConfig = {
  maxIterations: 6,
  maxToolCallsPerTurn: 4,
  maxToolCallsPerExchange: 12,
  decisionTimeoutMs: 60_000,
  toolTimeoutMs: 30_000,
  toolConcurrency: 1,
  historyWindow: 40,
  maxToolOutputChars: 8_000,
};

export const DEFAULT_CODE_EXECUTION: CodeExecutionConfig = {
  interpreters: {
    python: { command: "python3", args: ["-c"] },
  },
  timeoutMs: 10_000,
};

export const DEFAULT_RETRIEVAL: RetrievalConfig = {
  timeoutMs: 15_000,
};

export const DEFAULT_WEB_SEARCH: WebSearchConfig = {
  maxResults: 5,
};

export const DEFAULT_REFERENCE: ReferenceConfig = {
  language: "en",
};

export const DEFAULT_LOGGING: LoggingConfig = {
  directory: path.join(DEFAULT_DATA_DIR, "logs"),
};

export const createDefaultConfig = (): SidekickConfig => ({
  dataDir: DEFAULT_DATA_DIR,
  userId: "local",
  provider: "openai",
  model: "",
  limits: { ...DEFAULT_LIMITS },
  tools: { enabled: [] },
  codeExecution: {
    ...DEFAULT_CODE_EXECUTION,
    interpreters: { ...DEFAULT_CODE_EXECUTION.interpreters },
  },
  retrieval: { ...DEFAULT_RETRIEVAL },
  webSearch: { ...DEFAULT_WEB_SEARCH },
  reference: { ...DEFAULT_REFERENCE },
  notifications: {},
  workspaceDefaults: { ...DEFAULT_WORKSPACE_CONFIG, enabledTools: [] },
  logging: { ...DEFAULT_LOGGING },
});
