import test from "node:test";
import assert from "node:assert/strict";
import { createDefaultConfig } from "../../config/Config.js";
import { buildToolRegistry } from "../ToolCatalog.js";
import { FakeRetrievalBackend } from "../../runtime/__tests__/TestDoubles.js";

const names = (registry: ReturnType<typeof buildToolRegistry>): string[] => registry.list().map((tool) => tool.name);

test("defaults register file, code and reference tools", { concurrency: false }, () => {
  assert.deepEqual(names(buildToolRegistry(createDefaultConfig())), [
    "read_file",
    "write_file",
    "list_files",
    "read_csv_snippet",
    "run_code",
    "reference_lookup",
  ]);
});

test("credentials and a backend add the remaining tools", { concurrency: false }, () => {
  const config = createDefaultConfig();
  config.codeExecution.interpreters = {};
  config.webSearch.apiKey = "test-key";
  config.notifications = { token: "test-token", user: "test-user" };

  assert.deepEqual(names(buildToolRegistry(config, new FakeRetrievalBackend())), [
    "read_file",
    "write_file",
    "list_files",
    "read_csv_snippet",
    "reference_lookup",
    "web_search",
    "send_notification",
    "retrieve_documents",
  ]);
});

test("notifications need both token and user", { concurrency: false }, () => {
  const config = createDefaultConfig();
  config.notifications = { token: "test-token" };
  assert.equal(names(buildToolRegistry(config)).includes("send_notification"), false);
});
