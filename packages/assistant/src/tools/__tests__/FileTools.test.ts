import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { createFileTools } from "../filesystem/FileTools.js";
import type { ToolContext, ToolDefinition } from "../ToolTypes.js";

const setup = (): { context: ToolContext; tool: (name: string) => ToolDefinition } => {
  const root = mkdtempSync(path.join(os.tmpdir(), "sidekick-files-"));
  const tools = createFileTools();
  return {
    context: { userId: "u1", workspaceId: "ws", workspaceRoot: root, retrievalCount: 4 },
    tool: (name) => {
      const found = tools.find((candidate) => candidate.name === name);
      if (!found) throw new Error(`missing tool ${name}`);
      return found;
    },
  };
};

test("write_file then read_file round trips inside the folder", { concurrency: false }, async () => {
  const { context, tool } = setup();

  const written = await tool("write_file").handler({ path: "notes/todo.md", content: "buy milk" }, context);
  const read = await tool("read_file").handler({ path: "notes/todo.md" }, context);

  assert.equal(written.output, `Wrote ${path.join("notes", "todo.md")}`);
  assert.equal(read.output, "buy milk");
  assert.equal(readFileSync(path.join(context.workspaceRoot, "notes", "todo.md"), "utf8"), "buy milk");
});

test("paths outside the folder are refused", { concurrency: false }, async () => {
  const { context, tool } = setup();
  await assert.rejects(() => tool("read_file").handler({ path: "../secret.txt" }, context), {
    message: "Path is outside the workspace folder",
  });
  await assert.rejects(() => tool("write_file").handler({ path: "/etc/passwd", content: "x" }, context), {
    message: "Path is outside the workspace folder",
  });
});

test("list_files returns sorted relative paths", { concurrency: false }, async () => {
  const { context, tool } = setup();
  writeFileSync(path.join(context.workspaceRoot, "b.txt"), "b");
  writeFileSync(path.join(context.workspaceRoot, "a.txt"), "a");
  mkdirSync(path.join(context.workspaceRoot, "sub"));
  writeFileSync(path.join(context.workspaceRoot, "sub", "c.txt"), "c");

  const result = await tool("list_files").handler({}, context);

  assert.equal(result.output, ["a.txt", "b.txt", "sub", path.join("sub", "c.txt")].join("\n"));
});

test("read_csv_snippet returns the header and first row", { concurrency: false }, async () => {
  const { context, tool } = setup();
  writeFileSync(path.join(context.workspaceRoot, "stock.csv"), 'name,"qty, approx"\napple,3\npear,5\n');
  writeFileSync(path.join(context.workspaceRoot, "empty.csv"), "\n\n");

  const snippet = await tool("read_csv_snippet").handler({ path: "stock.csv" }, context);
  const empty = await tool("read_csv_snippet").handler({ path: "empty.csv" }, context);

  assert.equal(snippet.output, 'name,"qty, approx"\napple,3');
  assert.deepEqual(snippet.data, { header: ["name", "qty, approx"], firstRow: ["apple", "3"] });
  assert.equal(empty.output, "[CSV is empty]");
});
