#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describeError } from "@sidekick/shared";
import { CHAT_USAGE, ChatCommand } from "./cli/ChatCommand.js";
import { WORKSPACE_USAGE, WorkspaceCommand } from "./cli/WorkspaceCommand.js";

const HELP_TEXT =
  "Usage: sidekick <command> [options]\n" +
  "\n" +
  "Commands:\n" +
  "  chat       Send a message to the assistant, optionally inside a workspace.\n" +
  "  workspace  Create, configure, list, delete or index workspaces.\n" +
  "\n" +
  "Options:\n" +
  "  --help, -h     Show help\n" +
  "  --version, -v  Show version\n" +
  "\n" +
  `${CHAT_USAGE}\n\n${WORKSPACE_USAGE}`;

const resolveReal = (value: string): string => {
  try {
    return fs.realpathSync(value);
  } catch {
    return path.resolve(value);
  }
};

export const runCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const [command, ...rest] = argv;
  if (!command || command === "--help" || command === "-h" || command === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (command === "--version" || command === "-v" || command === "version") {
    console.log("0.1.0");
    return;
  }
  if (command === "chat") {
    await ChatCommand.run(rest);
    return;
  }
  if (command === "workspace") {
    await WorkspaceCommand.run(rest);
    return;
  }
  throw new Error(`Unknown command: ${command}\n\n${HELP_TEXT}`);
};

const isMain = (() => {
  const scriptPath = process.argv[1];
  if (!scriptPath) return false;
  const current = fileURLToPath(import.meta.url);
  return resolveReal(scriptPath) === resolveReal(current);
})();

if (isMain) {
  runCli().catch((error) => {
    console.error(describeError(error));
    process.exitCode = 1;
  });
}
