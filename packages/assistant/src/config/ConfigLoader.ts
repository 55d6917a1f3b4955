import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import {
  SidekickError,
  mergeWorkspaceConfig,
  validateWorkspaceConfig,
  type WorkspaceConfigPatch,
} from "@sidekick/shared";
import type { CodeInterpreter } from "../tools/code/CodeExecutionTool.js";
import { isObject } from "../tools/ToolArgs.js";
import {
  createDefaultConfig,
  type CodeExecutionConfig,
  type LimitsConfig,
  type LoggingConfig,
  type NotificationConfig,
  type ReferenceConfig,
  type RetrievalConfig,
  type SidekickConfig,
  type ToolConfig,
  type WebSearchConfig,
} from "./Config.js";

export interface ConfigSource {
  dataDir?: string;
  userId?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  limits?: Partial<LimitsConfig>;
  tools?: Partial<ToolConfig>;
  codeExecution?: Partial<CodeExecutionConfig>;
  retrieval?: Partial<RetrievalConfig>;
  webSearch?: Partial<WebSearchConfig>;
  reference?: Partial<ReferenceConfig>;
  notifications?: Partial<NotificationConfig>;
  workspaceDefaults?: WorkspaceConfigPatch;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
  /** Chat needs a model; workspace administration does not. */
  requireModel?: boolean;
}

const CONFIG_FILE_CANDIDATES = [
  path.join(".sidekick", "config.yaml"),
  path.join(".sidekick", "config.yml"),
  "sidekick.config.json",
];

const invalid = (message: string): SidekickError => new SidekickError({ code: "invalid_config", message });

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw invalid(`Invalid ${label}: expected number.`);
  }
  return parsed;
};

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw invalid(`Invalid ${label}: expected boolean.`);
};

const parseList = (value: string | undefined): string[] | undefined => {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
};

const normalizeString = (value: unknown, label: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw invalid(`Invalid ${label}: expected string.`);
  }
  return value;
};

const normalizeNumber = (value: unknown, label: string): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw invalid(`Invalid ${label}: expected number.`);
  }
  return value;
};

const normalizeBoolean = (value: unknown, label: string): boolean | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw invalid(`Invalid ${label}: expected boolean.`);
  }
  return value;
};

const normalizeStringList = (value: unknown, label: string): string[] | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || value.some((entry) => typeof entry !== "string")) {
    throw invalid(`Invalid ${label}: expected list of strings.`);
  }
  return value.filter((entry): entry is string => typeof entry === "string");
};

const normalizeSection = (value: unknown, label: string): Record<string, unknown> | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isObject(value)) {
    throw invalid(`Invalid ${label}: expected object.`);
  }
  return value;
};

// Copies the defined entries of a layer over its base; undefined never erases a lower layer.
const overlay = <T extends object>(base: T, patch: Partial<T> | undefined): T => {
  const next = { ...base };
  if (!patch) return next;
  for (const key in patch) {
    const value = patch[key];
    if (value !== undefined) next[key] = value;
  }
  return next;
};

const normalizeInterpreters = (value: unknown, label: string): Record<string, CodeInterpreter> | undefined => {
  const section = normalizeSection(value, label);
  if (!section) return undefined;
  const interpreters: Record<string, CodeInterpreter> = {};
  for (const [language, entry] of Object.entries(section)) {
    const spec = normalizeSection(entry, `${label}.${language}`);
    const command = normalizeString(spec?.command, `${label}.${language}.command`);
    if (!command) {
      throw invalid(`Invalid ${label}.${language}.command: expected string.`);
    }
    interpreters[language] = {
      command,
      args: normalizeStringList(spec?.args, `${label}.${language}.args`) ?? [],
    };
  }
  return interpreters;
};

const normalizeLimits = (value: unknown, label: string): Partial<LimitsConfig> | undefined => {
  const section = normalizeSection(value, label);
  if (!section) return undefined;
  return {
    maxIterations: normalizeNumber(section.maxIterations, `${label}.maxIterations`),
    maxToolCallsPerTurn: normalizeNumber(section.maxToolCallsPerTurn, `${label}.maxToolCallsPerTurn`),
    maxToolCallsPerExchange: normalizeNumber(section.maxToolCallsPerExchange, `${label}.maxToolCallsPerExchange`),
    decisionTimeoutMs: normalizeNumber(section.decisionTimeoutMs, `${label}.decisionTimeoutMs`),
    toolTimeoutMs: normalizeNumber(section.toolTimeoutMs, `${label}.toolTimeoutMs`),
    toolConcurrency: normalizeNumber(section.toolConcurrency, `${label}.toolConcurrency`),
    historyWindow: normalizeNumber(section.historyWindow, `${label}.historyWindow`),
    maxToolOutputChars: normalizeNumber(section.maxToolOutputChars, `${label}.maxToolOutputChars`),
  };
};

const normalizeWorkspaceDefaults = (value: unknown, label: string): WorkspaceConfigPatch | undefined => {
  const section = normalizeSection(value, label);
  if (!section) return undefined;
  return {
    chunkSize: normalizeNumber(section.chunkSize, `${label}.chunkSize`),
    chunkOverlap: normalizeNumber(section.chunkOverlap, `${label}.chunkOverlap`),
    retrievalCount: normalizeNumber(section.retrievalCount, `${label}.retrievalCount`),
    enabledTools: normalizeStringList(section.enabledTools, `${label}.enabledTools`),
    retrievalEnabled: normalizeBoolean(section.retrievalEnabled, `${label}.retrievalEnabled`),
  };
};

/** Validates an untyped document (parsed YAML or JSON) into a config layer. */
export const normalizeConfigSource = (value: unknown, label = "config"): ConfigSource => {
  const root = normalizeSection(value, label) ?? {};
  const tools = normalizeSection(root.tools, `${label}.tools`);
  const codeExecution = normalizeSection(root.codeExecution, `${label}.codeExecution`);
  const retrieval = normalizeSection(root.retrieval, `${label}.retrieval`);
  const webSearch = normalizeSection(root.webSearch, `${label}.webSearch`);
  const reference = normalizeSection(root.reference, `${label}.reference`);
  const notifications = normalizeSection(root.notifications, `${label}.notifications`);
  const logging = normalizeSection(root.logging, `${label}.logging`);

  return {
    dataDir: normalizeString(root.dataDir, `${label}.dataDir`),
    userId: normalizeString(root.userId, `${label}.userId`),
    provider: normalizeString(root.provider, `${label}.provider`),
    model: normalizeString(root.model, `${label}.model`),
    apiKey: normalizeString(root.apiKey, `${label}.apiKey`),
    baseUrl: normalizeString(root.baseUrl, `${label}.baseUrl`),
    temperature: normalizeNumber(root.temperature, `${label}.temperature`),
    maxTokens: normalizeNumber(root.maxTokens, `${label}.maxTokens`),
    limits: normalizeLimits(root.limits, `${label}.limits`),
    tools: tools && { enabled: normalizeStringList(tools.enabled, `${label}.tools.enabled`) },
    codeExecution:
      codeExecution && {
        interpreters: normalizeInterpreters(codeExecution.interpreters, `${label}.codeExecution.interpreters`),
        timeoutMs: normalizeNumber(codeExecution.timeoutMs, `${label}.codeExecution.timeoutMs`),
      },
    retrieval:
      retrieval && {
        baseUrl: normalizeString(retrieval.baseUrl, `${label}.retrieval.baseUrl`),
        authToken: normalizeString(retrieval.authToken, `${label}.retrieval.authToken`),
        timeoutMs: normalizeNumber(retrieval.timeoutMs, `${label}.retrieval.timeoutMs`),
      },
    webSearch:
      webSearch && {
        apiKey: normalizeString(webSearch.apiKey, `${label}.webSearch.apiKey`),
        baseUrl: normalizeString(webSearch.baseUrl, `${label}.webSearch.baseUrl`),
        maxResults: normalizeNumber(webSearch.maxResults, `${label}.webSearch.maxResults`),
      },
    reference:
      reference && { language: normalizeString(reference.language, `${label}.reference.language`) },
    notifications:
      notifications && {
        token: normalizeString(notifications.token, `${label}.notifications.token`),
        user: normalizeString(notifications.user, `${label}.notifications.user`),
      },
    workspaceDefaults: normalizeWorkspaceDefaults(root.workspaceDefaults, `${label}.workspaceDefaults`),
    logging: logging && { directory: normalizeString(logging.directory, `${label}.logging.directory`) },
  };
};

const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_FILE_CANDIDATES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const readConfigFile = async (configPath?: string): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  if (!existsSync(configPath)) {
    throw invalid(`Config file not found: ${configPath}`);
  }
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new SidekickError({
      code: "invalid_config",
      message: `Could not parse ${configPath}`,
      cause: error,
    });
  }
  return normalizeConfigSource(parsed, path.basename(configPath));
};

export const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const limits: Partial<LimitsConfig> = {
    maxIterations: parseNumberStrict(env.SIDEKICK_MAX_ITERATIONS, "SIDEKICK_MAX_ITERATIONS"),
    maxToolCallsPerTurn: parseNumberStrict(env.SIDEKICK_MAX_TOOL_CALLS_PER_TURN, "SIDEKICK_MAX_TOOL_CALLS_PER_TURN"),
    maxToolCallsPerExchange: parseNumberStrict(
      env.SIDEKICK_MAX_TOOL_CALLS_PER_EXCHANGE,
      "SIDEKICK_MAX_TOOL_CALLS_PER_EXCHANGE",
    ),
    decisionTimeoutMs: parseNumberStrict(env.SIDEKICK_DECISION_TIMEOUT_MS, "SIDEKICK_DECISION_TIMEOUT_MS"),
    toolTimeoutMs: parseNumberStrict(env.SIDEKICK_TOOL_TIMEOUT_MS, "SIDEKICK_TOOL_TIMEOUT_MS"),
    toolConcurrency: parseNumberStrict(env.SIDEKICK_TOOL_CONCURRENCY, "SIDEKICK_TOOL_CONCURRENCY"),
    historyWindow: parseNumberStrict(env.SIDEKICK_HISTORY_WINDOW, "SIDEKICK_HISTORY_WINDOW"),
  };

  const workspaceDefaults: WorkspaceConfigPatch = {
    chunkSize: parseNumberStrict(env.SIDEKICK_CHUNK_SIZE, "SIDEKICK_CHUNK_SIZE"),
    chunkOverlap: parseNumberStrict(env.SIDEKICK_CHUNK_OVERLAP, "SIDEKICK_CHUNK_OVERLAP"),
    retrievalCount: parseNumberStrict(env.SIDEKICK_RETRIEVAL_COUNT, "SIDEKICK_RETRIEVAL_COUNT"),
    retrievalEnabled: parseBooleanStrict(env.SIDEKICK_RETRIEVAL_ENABLED, "SIDEKICK_RETRIEVAL_ENABLED"),
  };

  const enabledTools = parseList(env.SIDEKICK_TOOLS_ENABLED);

  return {
    dataDir: env.SIDEKICK_DATA_DIR || undefined,
    userId: env.SIDEKICK_USER || undefined,
    provider: env.SIDEKICK_PROVIDER || undefined,
    model: env.SIDEKICK_MODEL || undefined,
    apiKey: env.SIDEKICK_API_KEY || env.OPENAI_API_KEY || undefined,
    baseUrl: env.SIDEKICK_BASE_URL || undefined,
    temperature: parseNumberStrict(env.SIDEKICK_TEMPERATURE, "SIDEKICK_TEMPERATURE"),
    maxTokens: parseNumberStrict(env.SIDEKICK_MAX_TOKENS, "SIDEKICK_MAX_TOKENS"),
    limits,
    tools: enabledTools ? { enabled: enabledTools } : undefined,
    codeExecution: {
      timeoutMs: parseNumberStrict(env.SIDEKICK_CODE_TIMEOUT_MS, "SIDEKICK_CODE_TIMEOUT_MS"),
    },
    retrieval: {
      baseUrl: env.SIDEKICK_RETRIEVAL_BASE_URL || undefined,
      authToken: env.SIDEKICK_RETRIEVAL_TOKEN || undefined,
    },
    webSearch: {
      apiKey: env.SIDEKICK_WEB_SEARCH_API_KEY || env.SERPER_API_KEY || undefined,
    },
    reference: {
      language: env.SIDEKICK_REFERENCE_LANGUAGE || undefined,
    },
    notifications: {
      token: env.PUSHOVER_TOKEN || undefined,
      user: env.PUSHOVER_USER || undefined,
    },
    workspaceDefaults,
    logging: env.SIDEKICK_LOG_DIR ? { directory: env.SIDEKICK_LOG_DIR } : undefined,
  };
};

const mergeConfigs = (defaults: SidekickConfig, ...layers: Array<ConfigSource | undefined>): SidekickConfig => {
  let merged = defaults;
  for (const layer of layers) {
    if (!layer) continue;
    merged = {
      dataDir: layer.dataDir ?? merged.dataDir,
      userId: layer.userId ?? merged.userId,
      provider: layer.provider ?? merged.provider,
      model: layer.model ?? merged.model,
      apiKey: layer.apiKey ?? merged.apiKey,
      baseUrl: layer.baseUrl ?? merged.baseUrl,
      temperature: layer.temperature ?? merged.temperature,
      maxTokens: layer.maxTokens ?? merged.maxTokens,
      limits: overlay(merged.limits, layer.limits),
      tools: overlay(merged.tools, layer.tools),
      codeExecution: overlay(merged.codeExecution, layer.codeExecution),
      retrieval: overlay(merged.retrieval, layer.retrieval),
      webSearch: overlay(merged.webSearch, layer.webSearch),
      reference: overlay(merged.reference, layer.reference),
      notifications: overlay(merged.notifications, layer.notifications),
      workspaceDefaults: mergeWorkspaceConfig(merged.workspaceDefaults, layer.workspaceDefaults ?? {}),
      logging: overlay(merged.logging, layer.logging),
    };
  }
  return merged;
};

const assertValid = (config: SidekickConfig): void => {
  const errors: string[] = [];
  const positiveInteger = (value: number, label: string): void => {
    if (!Number.isInteger(value) || value < 1) errors.push(label);
  };
  const { limits } = config;
  positiveInteger(limits.maxIterations, "limits.maxIterations");
  positiveInteger(limits.maxToolCallsPerTurn, "limits.maxToolCallsPerTurn");
  positiveInteger(limits.maxToolCallsPerExchange, "limits.maxToolCallsPerExchange");
  positiveInteger(limits.toolConcurrency, "limits.toolConcurrency");
  positiveInteger(limits.historyWindow, "limits.historyWindow");
  positiveInteger(limits.decisionTimeoutMs, "limits.decisionTimeoutMs");
  positiveInteger(limits.toolTimeoutMs, "limits.toolTimeoutMs");
  positiveInteger(limits.maxToolOutputChars, "limits.maxToolOutputChars");
  positiveInteger(config.codeExecution.timeoutMs, "codeExecution.timeoutMs");
  positiveInteger(config.retrieval.timeoutMs, "retrieval.timeoutMs");
  positiveInteger(config.webSearch.maxResults, "webSearch.maxResults");
  if (config.maxTokens !== undefined) positiveInteger(config.maxTokens, "maxTokens");
  if (config.temperature !== undefined && (config.temperature < 0 || config.temperature > 2)) {
    errors.push("temperature");
  }
  const workspaceProblem = validateWorkspaceConfig(config.workspaceDefaults);
  if (workspaceProblem) errors.push(`workspaceDefaults (${workspaceProblem})`);
  if (errors.length) {
    throw invalid(`Invalid config values: ${errors.join(", ")}`);
  }
};

const assertRequired = (config: SidekickConfig): void => {
  const missing: string[] = [];
  if (!config.provider) missing.push("provider");
  if (!config.model) missing.push("model");
  if (missing.length) {
    throw invalid(`Missing required config: ${missing.join(", ")}`);
  }
};

/**
 * Resolves configuration from defaults, the config file, `SIDEKICK_*`
 * environment variables and CLI flags, later layers winning.
 */
export const loadConfig = async (options: LoadConfigOptions = {}): Promise<SidekickConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ? path.resolve(cwd, options.configPath) : findConfigFile(cwd);
  const fileConfig = await readConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  const merged = mergeConfigs(createDefaultConfig(), fileConfig, envConfig, options.cli);
  const dataDir = path.resolve(cwd, merged.dataDir);
  const logDirSet = [fileConfig, envConfig, options.cli].some((layer) => layer?.logging?.directory);
  const finalized: SidekickConfig = {
    ...merged,
    dataDir,
    logging: {
      directory: logDirSet ? path.resolve(cwd, merged.logging.directory) : path.join(dataDir, "logs"),
    },
  };

  assertValid(finalized);
  if (options.requireModel) assertRequired(finalized);
  return finalized;
};
