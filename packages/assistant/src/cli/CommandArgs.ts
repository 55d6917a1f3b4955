import type { WorkspaceConfigPatch } from "@sidekick/shared";
import type { ConfigSource } from "../config/ConfigLoader.js";
import type { AssistantOverrides } from "../runtime/Assistant.js";

export interface CommandContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  write?: (line: string) => void;
  writeError?: (line: string) => void;
  overrides?: AssistantOverrides;
}

export interface CommonArgs {
  configPath?: string;
  cli: ConfigSource;
  positionals: string[];
  workspaceId?: string;
  patch: WorkspaceConfigPatch;
  json: boolean;
}

const parseNumberArg = (value: string, flag: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${flag}: expected number.`);
  }
  return parsed;
};

const parseBooleanArg = (value: string, flag: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(`Invalid ${flag}: expected boolean.`);
};

const parseListArg = (value: string): string[] =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);

/**
 * Parses the flags shared by every subcommand. Unknown `--flags` are errors;
 * everything else is collected as a positional.
 */
export const parseArgs = (argv: string[]): CommonArgs => {
  const parsed: CommonArgs = { cli: {}, positionals: [], patch: {}, json: false };
  const limits: NonNullable<ConfigSource["limits"]> = {};

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (arg === "--") {
      parsed.positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith("--")) {
      parsed.positionals.push(arg);
      continue;
    }
    if (arg === "--json") {
      parsed.json = true;
      continue;
    }
    if (next === undefined) {
      throw new Error(`Missing value for ${arg}`);
    }
    i += 1;
    switch (arg) {
      case "--workspace":
        parsed.workspaceId = next;
        break;
      case "--config":
        parsed.configPath = next;
        break;
      case "--user":
        parsed.cli.userId = next;
        break;
      case "--data-dir":
        parsed.cli.dataDir = next;
        break;
      case "--provider":
        parsed.cli.provider = next;
        break;
      case "--model":
        parsed.cli.model = next;
        break;
      case "--api-key":
        parsed.cli.apiKey = next;
        break;
      case "--base-url":
        parsed.cli.baseUrl = next;
        break;
      case "--temperature":
        parsed.cli.temperature = parseNumberArg(next, arg);
        break;
      case "--max-iterations":
        limits.maxIterations = parseNumberArg(next, arg);
        break;
      case "--max-tool-calls":
        limits.maxToolCallsPerExchange = parseNumberArg(next, arg);
        break;
      case "--log-dir":
        parsed.cli.logging = { directory: next };
        break;
      case "--chunk-size":
        parsed.patch.chunkSize = parseNumberArg(next, arg);
        break;
      case "--chunk-overlap":
        parsed.patch.chunkOverlap = parseNumberArg(next, arg);
        break;
      case "--retrieval-count":
        parsed.patch.retrievalCount = parseNumberArg(next, arg);
        break;
      case "--tools":
        parsed.patch.enabledTools = next === "all" ? [] : parseListArg(next);
        break;
      case "--retrieval":
        parsed.patch.retrievalEnabled = parseBooleanArg(next, arg);
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  if (Object.keys(limits).length) {
    parsed.cli.limits = limits;
  }
  return parsed;
};

export const writer = (context: CommandContext): ((line: string) => void) =>
  context.write ?? ((line: string) => console.log(line));

export const errorWriter = (context: CommandContext): ((line: string) => void) =>
  context.writeError ?? ((line: string) => console.error(line));
