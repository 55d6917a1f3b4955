import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { RunLogger, createRunLoggerFactory } from "../RunLogger.js";

test("RunLogger appends one JSON line per event", { concurrency: false }, async () => {
  const dir = path.join(mkdtempSync(path.join(os.tmpdir(), "sidekick-log-")), "logs");
  const logger = new RunLogger(dir, "exchange-1");

  await logger.log("exchange_start", { userId: "u1" });
  await logger.log("exchange_end", { status: "answered" });

  const lines = readFileSync(path.join(dir, "exchange-1.jsonl"), "utf8").trim().split("\n");
  assert.equal(lines.length, 2);
  const first: unknown = JSON.parse(lines[0]);
  assert.ok(typeof first === "object" && first !== null);
  assert.equal(Reflect.get(first, "type"), "exchange_start");
  assert.deepEqual(Reflect.get(first, "data"), { userId: "u1" });
  assert.equal(typeof Reflect.get(first, "timestamp"), "string");
});

test("factory loggers write under the configured directory", { concurrency: false }, async () => {
  const dir = mkdtempSync(path.join(os.tmpdir(), "sidekick-log-"));
  const logger = createRunLoggerFactory(dir)("abc");
  await logger.log("tool_call", { name: "read_file" });
  assert.ok(readFileSync(path.join(dir, "abc.jsonl"), "utf8").includes('"type":"tool_call"'));
});
