import test from "node:test";
import assert from "node:assert/strict";
import { SidekickError, describeError, isSidekickError } from "../errors/SidekickError.js";

test("errors carry a code and details", { concurrency: false }, () => {
  const cause = new Error("root");
  const error = new SidekickError({ code: "invalid_config", message: "bad", details: { key: "x" }, cause });
  assert.equal(error.name, "SidekickError");
  assert.deepEqual(error.details, { key: "x" });
  assert.equal(error.cause, cause);
  assert.equal(isSidekickError(error), true);
  assert.equal(isSidekickError(error, "invalid_config"), true);
  assert.equal(isSidekickError(error, "tool_timeout"), false);
  assert.equal(isSidekickError(new Error("plain")), false);
});

test("describeError reads messages and stringifies the rest", { concurrency: false }, () => {
  assert.equal(describeError(new SidekickError({ code: "tool_timeout", message: "slow" })), "slow");
  assert.equal(describeError("text"), "text");
  assert.equal(describeError(42), "42");
});
