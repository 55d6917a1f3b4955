import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { createCodeExecutionTool } from "../code/CodeExecutionTool.js";
import type { ToolContext } from "../ToolTypes.js";
import { ToolRegistry } from "../ToolRegistry.js";
import { ToolDispatcher } from "../../runtime/ToolDispatcher.js";

const tool = createCodeExecutionTool({
  interpreters: { node: { command: process.execPath, args: ["-e"] } },
  timeoutMs: 5_000,
});

const context = (): ToolContext => ({
  userId: "u1",
  workspaceId: null,
  workspaceRoot: mkdtempSync(path.join(os.tmpdir(), "sidekick-code-")),
  retrievalCount: 4,
});

test("run_code prints stdout from the default interpreter", { concurrency: false }, async () => {
  const result = await tool.handler({ code: "console.log(6 * 7)" }, context());
  assert.equal(result.output, "42\n");
  assert.deepEqual(result.data, { language: "node", stdout: "42\n", stderr: "", exitCode: 0 });
});

test("run_code runs inside the workspace folder", { concurrency: false }, async () => {
  const ctx = context();
  const result = await tool.handler({ code: "console.log(process.cwd())", language: "node" }, ctx);
  assert.equal(result.output.trim(), ctx.workspaceRoot);
});

test("non-zero exits and unknown languages fail", { concurrency: false }, async () => {
  await assert.rejects(() => tool.handler({ code: "process.exit(3)" }, context()), {
    message: "Code exited with code 3",
  });
  await assert.rejects(() => tool.handler({ code: "puts 1", language: "ruby" }, context()), {
    message: "Language not allowed: ruby",
  });
  assert.deepEqual(tool.inputSchema.properties.language.enum, ["node"]);
});

const busyLoop = (ms: number): string => `const end = Date.now() + ${ms}; while (Date.now() < end) {} console.log("done")`;

test("the interpreter timeout stops runaway code", { concurrency: false }, async () => {
  const strict = createCodeExecutionTool({
    interpreters: { node: { command: process.execPath, args: ["-e"] } },
    timeoutMs: 100,
  });
  await assert.rejects(() => strict.handler({ code: busyLoop(5_000) }, context()), {
    message: "Code execution stopped by SIGTERM",
  });
});

test("run_code yields to the event loop and honours the dispatcher timeout", { concurrency: false }, async () => {
  const registry = new ToolRegistry();
  registry.register(tool);
  const dispatcher = new ToolDispatcher({
    view: registry.createView({
      workspaceId: null,
      userEnabledTools: [],
      workspaceEnabledTools: [],
      retrievalEnabled: false,
    }),
    context: context(),
    maxCallsPerTurn: 4,
    maxCallsPerExchange: 4,
    timeoutMs: 150,
  });
  let ticks = 0;
  const ticker = setInterval(() => {
    ticks += 1;
  }, 10);
  const started = Date.now();

  try {
    const [result] = await dispatcher.dispatch([
      { id: "c1", name: "run_code", args: { code: busyLoop(3_000) }, turnIndex: 1 },
    ]);

    assert.deepEqual(result, {
      requestId: "c1",
      name: "run_code",
      ok: false,
      error: "Tool run_code timed out after 150 ms",
    });
    assert.ok(Date.now() - started < 2_000);
    assert.ok(ticks > 0);
  } finally {
    clearInterval(ticker);
  }
});
