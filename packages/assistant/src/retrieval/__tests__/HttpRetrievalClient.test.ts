import test from "node:test";
import assert from "node:assert/strict";
import { HttpRetrievalClient } from "../HttpRetrievalClient.js";
import { jsonResponse, withFetch } from "../../tools/__tests__/FetchStub.js";

const scope = { ownerId: "user 1", workspaceId: "recipes" };

test("search posts to the scoped endpoint and ranks passages", { concurrency: false }, async () => {
  const client = new HttpRetrievalClient({ baseUrl: "http://rag.test/", authToken: "test-token" });
  await withFetch(
    () =>
      jsonResponse({
        passages: [
          { document_id: "a.md", text: "low", score: 0.1 },
          { document_id: "b.md", text: "high", score: 0.9 },
          { document_id: "c.md", score: 0.5 },
          { document_id: "d.md", text: "mid", score: 0.4 },
        ],
      }),
    async (requests) => {
      const passages = await client.retrieve(scope, "soup", 2);

      assert.deepEqual(passages, [
        { documentId: "b.md", text: "high", score: 0.9 },
        { documentId: "d.md", text: "mid", score: 0.4 },
      ]);
      assert.equal(requests[0].url, "http://rag.test/v1/owners/user%201/workspaces/recipes/search");
      assert.equal(requests[0].headers.get("authorization"), "Bearer test-token");
      assert.deepEqual(JSON.parse(requests[0].body), { query: "soup", top_k: 2 });
    },
  );
});

test("index sends chunking settings and reads counts", { concurrency: false }, async () => {
  const client = new HttpRetrievalClient({ baseUrl: "http://rag.test" });
  await withFetch(
    () => jsonResponse({ documents: 1, chunks: 3 }),
    async (requests) => {
      const report = await client.index(scope, [{ id: "a.md", text: "hello" }], 500, 50);

      assert.deepEqual(report, { documents: 1, chunks: 3 });
      assert.equal(requests[0].headers.get("authorization"), null);
      assert.deepEqual(JSON.parse(requests[0].body), {
        documents: [{ id: "a.md", text: "hello" }],
        chunk_size: 500,
        chunk_overlap: 50,
      });
    },
  );
});

test("drop deletes the workspace index and errors carry the status", { concurrency: false }, async () => {
  const client = new HttpRetrievalClient({ baseUrl: "http://rag.test" });
  await withFetch(
    () => new Response(null, { status: 204 }),
    async (requests) => {
      await client.dropIndex(scope);
      assert.equal(requests[0].method, "DELETE");
      assert.equal(requests[0].url, "http://rag.test/v1/owners/user%201/workspaces/recipes");
    },
  );
  await withFetch(
    () => new Response("index missing", { status: 500 }),
    async () => {
      await assert.rejects(() => client.retrieve(scope, "q", 1), {
        message: "Retrieval search failed (500): index missing",
      });
    },
  );
});
