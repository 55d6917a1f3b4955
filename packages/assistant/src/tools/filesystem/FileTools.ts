import { promises as fs } from "node:fs";
import path from "node:path";
import type { ToolContext, ToolDefinition } from "../ToolTypes.js";
import { optionalNumberArg, optionalStringArg, stringArg } from "../ToolArgs.js";

const resolveWorkspacePath = (context: ToolContext, targetPath: string): string => {
  const resolved = path.resolve(context.workspaceRoot, targetPath);
  const relative = path.relative(context.workspaceRoot, resolved);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error("Path is outside the workspace folder");
  }
  return resolved;
};

const toRelative = (context: ToolContext, targetPath: string): string => {
  return path.relative(context.workspaceRoot, targetPath) || ".";
};

const listFilesRecursive = async (
  basePath: string,
  maxDepth: number,
  currentDepth = 0,
  entries: string[] = [],
): Promise<string[]> => {
  if (currentDepth > maxDepth) return entries;
  const dirEntries = await fs.readdir(basePath, { withFileTypes: true });
  dirEntries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of dirEntries) {
    const fullPath = path.join(basePath, entry.name);
    entries.push(fullPath);
    if (entry.isDirectory()) {
      await listFilesRecursive(fullPath, maxDepth, currentDepth + 1, entries);
    }
  }
  return entries;
};

// Splits one CSV record honouring double-quoted fields; enough to preview a header row.
const splitCsvLine = (line: string): string[] => {
  const cells: string[] = [];
  let current = "";
  let quoted = false;
  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (char === "\"") {
      if (quoted && line[index + 1] === "\"") {
        current += "\"";
        index += 1;
      } else {
        quoted = !quoted;
      }
    } else if (char === "," && !quoted) {
      cells.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  cells.push(current);
  return cells;
};

export const createFileTools = (): ToolDefinition[] => {
  return [
    {
      name: "read_file",
      description: "Read a text file from the workspace folder.",
      category: "file",
      inputSchema: {
        type: "object",
        required: ["path"],
        properties: {
          path: { type: "string" },
        },
      },
      handler: async (args, context) => {
        const resolved = resolveWorkspacePath(context, stringArg(args, "path"));
        const content = await fs.readFile(resolved, "utf8");
        return { output: content };
      },
    },
    {
      name: "write_file",
      description: "Write content to a file inside the workspace folder.",
      category: "file",
      inputSchema: {
        type: "object",
        required: ["path", "content"],
        properties: {
          path: { type: "string" },
          content: { type: "string" },
        },
      },
      handler: async (args, context) => {
        const resolved = resolveWorkspacePath(context, stringArg(args, "path"));
        await fs.mkdir(path.dirname(resolved), { recursive: true });
        await fs.writeFile(resolved, stringArg(args, "content"), "utf8");
        return { output: `Wrote ${toRelative(context, resolved)}` };
      },
    },
    {
      name: "list_files",
      description: "List files under a directory within the workspace folder.",
      category: "file",
      inputSchema: {
        type: "object",
        properties: {
          path: { type: "string" },
          maxDepth: { type: "integer" },
        },
      },
      handler: async (args, context) => {
        const target = optionalStringArg(args, "path") ?? ".";
        const maxDepth = optionalNumberArg(args, "maxDepth") ?? 2;
        const resolved = resolveWorkspacePath(context, target);
        await fs.mkdir(context.workspaceRoot, { recursive: true });
        const entries = await listFilesRecursive(resolved, maxDepth);
        const relativeEntries = entries.map((entry) => toRelative(context, entry));
        return { output: relativeEntries.join("\n"), data: { entries: relativeEntries } };
      },
    },
    {
      name: "read_csv_snippet",
      description: "Return the header and first data row of a CSV file in the workspace folder.",
      category: "file",
      inputSchema: {
        type: "object",
        required: ["path"],
        properties: {
          path: { type: "string" },
        },
      },
      handler: async (args, context) => {
        const resolved = resolveWorkspacePath(context, stringArg(args, "path"));
        const content = await fs.readFile(resolved, "utf8");
        const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
        if (lines.length === 0) {
          return { output: "[CSV is empty]", data: { header: [], firstRow: [] } };
        }
        const snippet = lines.slice(0, 2);
        const [header, firstRow] = snippet.map(splitCsvLine);
        return { output: snippet.join("\n"), data: { header, firstRow: firstRow ?? [] } };
      },
    },
  ];
};
