import test from "node:test";
import assert from "node:assert/strict";
import { parseArgs } from "../CommandArgs.js";

test("flags split into config, workspace patch and positionals", { concurrency: false }, () => {
  const parsed = parseArgs([
    "--workspace",
    "recipes",
    "--model",
    "small-model",
    "--max-iterations",
    "3",
    "--max-tool-calls",
    "9",
    "--chunk-size",
    "500",
    "--tools",
    "read_file, run_code",
    "--retrieval",
    "off",
    "--json",
    "hello",
    "--",
    "--not-a-flag",
  ]);

  assert.deepEqual(parsed, {
    workspaceId: "recipes",
    cli: { model: "small-model", limits: { maxIterations: 3, maxToolCallsPerExchange: 9 } },
    patch: { chunkSize: 500, enabledTools: ["read_file", "run_code"], retrievalEnabled: false },
    positionals: ["hello", "--not-a-flag"],
    json: true,
  });
});

test("--tools all clears the allow list", { concurrency: false }, () => {
  assert.deepEqual(parseArgs(["--tools", "all"]).patch, { enabledTools: [] });
});

test("bad flags are reported", { concurrency: false }, () => {
  assert.throws(() => parseArgs(["--model"]), { message: "Missing value for --model" });
  assert.throws(() => parseArgs(["--colour", "red"]), { message: "Unknown option: --colour" });
  assert.throws(() => parseArgs(["--chunk-size", "big"]), { message: "Invalid --chunk-size: expected number." });
  assert.throws(() => parseArgs(["--retrieval", "sometimes"]), { message: "Invalid --retrieval: expected boolean." });
});
