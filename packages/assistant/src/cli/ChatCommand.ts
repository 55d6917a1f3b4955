import { createInterface } from "node:readline/promises";
import process from "node:process";
import { loadConfig } from "../config/ConfigLoader.js";
import { createAssistant } from "../runtime/Assistant.js";
import type { ExchangeOutcome } from "../runtime/ControlLoop.js";
import { errorWriter, parseArgs, writer, type CommandContext } from "./CommandArgs.js";

export const CHAT_USAGE =
  "Usage: sidekick chat [--workspace <id>] [--user <id>] [--config <file>] [--model <model>] [message...]\n" +
  "Without a message, starts an interactive session (empty line or /exit to quit).";

const report = (outcome: ExchangeOutcome, context: CommandContext): void => {
  writer(context)(outcome.answer);
  const warn = errorWriter(context);
  if (outcome.status !== "answered") {
    warn(`[${outcome.status}] after ${outcome.iterations} step(s), ${outcome.toolCallsExecuted} tool call(s)`);
  }
  if (!outcome.persisted) {
    warn(`Conversation was not saved: ${outcome.persistenceError ?? "unknown error"}`);
  }
};

export class ChatCommand {
  static async run(argv: string[], context: CommandContext = {}): Promise<void> {
    const args = parseArgs(argv);
    const config = await loadConfig({
      cwd: context.cwd,
      env: context.env,
      cli: args.cli,
      configPath: args.configPath,
      requireModel: true,
    });
    const assistant = await createAssistant(config, context.overrides);
    const workspaceId = args.workspaceId ?? null;

    try {
      if (args.positionals.length > 0) {
        const outcome = await assistant.loop.respond(args.positionals.join(" "), workspaceId, config.userId);
        report(outcome, context);
        if (outcome.status !== "answered") process.exitCode = 2;
        return;
      }

      const rl = createInterface({ input: process.stdin, output: process.stdout });
      try {
        for (;;) {
          const line = (await rl.question("> ")).trim();
          if (!line || line === "/exit") break;
          report(await assistant.loop.respond(line, workspaceId, config.userId), context);
        }
      } finally {
        rl.close();
      }
    } finally {
      await assistant.close();
    }
  }
}
