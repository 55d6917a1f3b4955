import test from "node:test";
import assert from "node:assert/strict";
import { createWebSearchTool } from "../search/WebSearchTool.js";
import type { ToolContext } from "../ToolTypes.js";
import { jsonResponse, withFetch } from "./FetchStub.js";

const context: ToolContext = { userId: "u1", workspaceId: null, workspaceRoot: "/tmp/unused", retrievalCount: 4 };

test("web_search posts the query and formats hits", { concurrency: false }, async () => {
  const tool = createWebSearchTool({ apiKey: "test-key", baseUrl: "http://search.test/search", maxResults: 2 });
  await withFetch(
    () =>
      jsonResponse({
        answerBox: { answer: "Rome" },
        organic: [
          { title: "Rome - Wiki", link: "http://a.test/rome", snippet: "Capital of Italy." },
          { title: "Visit Rome", link: "http://b.test/rome", snippet: "Travel guide." },
          { title: "Third", link: "http://c.test", snippet: "Ignored." },
        ],
      }),
    async (requests) => {
      const result = await tool.handler({ query: "capital of italy" }, context);

      assert.equal(
        result.output,
        [
          "Answer: Rome",
          "1. Rome - Wiki",
          "   http://a.test/rome",
          "   Capital of Italy.",
          "2. Visit Rome",
          "   http://b.test/rome",
          "   Travel guide.",
        ].join("\n"),
      );
      assert.equal(requests[0].url, "http://search.test/search");
      assert.equal(requests[0].method, "POST");
      assert.equal(requests[0].headers.get("x-api-key"), "test-key");
      assert.deepEqual(JSON.parse(requests[0].body), { q: "capital of italy", num: 2 });
    },
  );
});

test("web_search reports empty results and HTTP errors", { concurrency: false }, async () => {
  const tool = createWebSearchTool({ apiKey: "test-key", baseUrl: "http://search.test/search" });
  await withFetch(
    () => jsonResponse({ organic: [] }),
    async () => {
      const result = await tool.handler({ query: "zzzz" }, context);
      assert.equal(result.output, 'No results for "zzzz"');
    },
  );
  await withFetch(
    () => new Response("forbidden", { status: 403 }),
    async () => {
      await assert.rejects(() => tool.handler({ query: "x" }, context), {
        message: "Web search failed (403): forbidden",
      });
    },
  );
});
