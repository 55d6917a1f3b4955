import type { Workspace, WorkspaceConfig } from "@sidekick/shared";
import { loadConfig } from "../config/ConfigLoader.js";
import { createAssistant } from "../runtime/Assistant.js";
import { errorWriter, parseArgs, writer, type CommandContext } from "./CommandArgs.js";

export const WORKSPACE_USAGE =
  "Usage: sidekick workspace <create|config|delete|list|index> [id] [options]\n" +
  "\n" +
  "Options for create and config:\n" +
  "  --chunk-size <n>        Characters per indexed chunk\n" +
  "  --chunk-overlap <n>     Characters shared by neighbouring chunks\n" +
  "  --retrieval-count <n>   Passages returned per retrieval\n" +
  "  --tools <a,b|all>       Tools enabled in this workspace\n" +
  "  --retrieval <on|off>    Enable document retrieval\n" +
  "  --json                  Print JSON";

export const formatConfig = (config: WorkspaceConfig): string[] => [
  `chunkSize: ${config.chunkSize}`,
  `chunkOverlap: ${config.chunkOverlap}`,
  `retrievalCount: ${config.retrievalCount}`,
  `enabledTools: ${config.enabledTools.length ? config.enabledTools.join(", ") : "(all)"}`,
  `retrievalEnabled: ${config.retrievalEnabled ? "yes" : "no"}`,
];

const formatWorkspace = (workspace: Workspace): string =>
  `${workspace.id}\tretrieval=${workspace.config.retrievalEnabled ? "on" : "off"}\tupdated=${workspace.updatedAt}`;

export class WorkspaceCommand {
  static async run(argv: string[], context: CommandContext = {}): Promise<void> {
    const [action, ...rest] = argv;
    const args = parseArgs(rest);
    const out = writer(context);
    if (!action || action === "help") {
      out(WORKSPACE_USAGE);
      return;
    }
    const id = args.positionals[0] ?? args.workspaceId ?? "";
    if (action !== "list" && !id) {
      throw new Error(`Missing workspace id.\n${WORKSPACE_USAGE}`);
    }

    const config = await loadConfig({ cwd: context.cwd, env: context.env, cli: args.cli, configPath: args.configPath });
    const assistant = await createAssistant(config, context.overrides);
    const { workspaces } = assistant;
    const userId = config.userId;
    const print = (value: unknown, lines: string[]): void => {
      if (args.json) {
        out(JSON.stringify(value, null, 2));
      } else {
        lines.forEach((line) => out(line));
      }
    };

    try {
      switch (action) {
        case "create": {
          const workspace = await workspaces.create(userId, id, args.patch);
          print(workspace, [`Created workspace ${workspace.id}`, ...formatConfig(workspace.config)]);
          return;
        }
        case "config": {
          const hasPatch = Object.keys(args.patch).length > 0;
          const updated = hasPatch
            ? await workspaces.configure(userId, id, args.patch)
            : (await workspaces.get(userId, id)).config;
          print(updated, formatConfig(updated));
          return;
        }
        case "delete": {
          const removed = await workspaces.remove(userId, id);
          if (!removed) {
            errorWriter(context)(`Workspace not found: ${id}`);
            process.exitCode = 1;
            return;
          }
          print({ deleted: id }, [`Deleted workspace ${id}`]);
          return;
        }
        case "list": {
          const list = await workspaces.list(userId);
          print(list, list.length ? list.map(formatWorkspace) : ["No workspaces"]);
          return;
        }
        case "index": {
          const result = await workspaces.indexDocuments(userId, id);
          print(result, [
            `Indexed ${result.documents} document(s) into ${result.chunks} chunk(s)`,
            ...result.skipped.map((file) => `skipped: ${file}`),
          ]);
          return;
        }
        default:
          throw new Error(`Unknown workspace action: ${action}\n${WORKSPACE_USAGE}`);
      }
    } finally {
      await assistant.close();
    }
  }
}
