import { PathHelper, type WorkspaceStore } from "@sidekick/shared";
import { ConversationRepository } from "@sidekick/db";
import type { SidekickConfig } from "../config/Config.js";
import { createDefaultProviderRegistry } from "../providers/ProviderRegistry.js";
import type { Provider } from "../providers/ProviderTypes.js";
import { HttpRetrievalClient } from "../retrieval/HttpRetrievalClient.js";
import type { RetrievalBackend } from "../retrieval/RetrievalTypes.js";
import { buildToolRegistry } from "../tools/ToolCatalog.js";
import { ControlLoop } from "./ControlLoop.js";
import { createRunLoggerFactory } from "./RunLogger.js";
import { WorkspaceService } from "./WorkspaceService.js";

export interface AssistantOverrides {
  store?: WorkspaceStore;
  provider?: Provider;
  retrieval?: RetrievalBackend;
}

export interface Assistant {
  loop: ControlLoop;
  workspaces: WorkspaceService;
  close(): Promise<void>;
}

export const createRetrievalBackend = (config: SidekickConfig): RetrievalBackend | undefined => {
  if (!config.retrieval.baseUrl) return undefined;
  return new HttpRetrievalClient({
    baseUrl: config.retrieval.baseUrl,
    authToken: config.retrieval.authToken,
    timeoutMs: config.retrieval.timeoutMs,
  });
};

export const createProvider = (config: SidekickConfig): Provider =>
  createDefaultProviderRegistry().create(config.provider, {
    model: config.model,
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.limits.decisionTimeoutMs,
  });

/**
 * Wires the store, provider, retrieval backend and tool catalog described by a
 * resolved configuration. Overrides replace the default implementations.
 */
export const createAssistant = async (
  config: SidekickConfig,
  overrides: AssistantOverrides = {},
): Promise<Assistant> => {
  let repository: ConversationRepository | undefined;
  let store = overrides.store;
  if (!store) {
    repository = await ConversationRepository.create(config.dataDir, config.workspaceDefaults);
    store = repository;
  }
  const retrieval = overrides.retrieval ?? createRetrievalBackend(config);
  const resolveWorkspaceRoot = (userId: string, workspaceId: string | null): string =>
    PathHelper.getWorkspaceFolder(config.dataDir, userId, workspaceId);

  const loop = new ControlLoop({
    store,
    provider: overrides.provider ?? createProvider(config),
    tools: buildToolRegistry(config, retrieval),
    limits: config.limits,
    userEnabledTools: config.tools.enabled,
    noWorkspaceConfig: { ...config.workspaceDefaults, retrievalEnabled: false },
    resolveWorkspaceRoot,
    createLogger: createRunLoggerFactory(config.logging.directory),
    maxTokens: config.maxTokens,
    temperature: config.temperature,
  });
  const workspaces = new WorkspaceService({ store, retrieval, resolveWorkspaceRoot });

  return {
    loop,
    workspaces,
    close: async () => {
      await repository?.close();
    },
  };
};
