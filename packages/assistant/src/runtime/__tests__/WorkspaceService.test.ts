import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { isSidekickError } from "@sidekick/shared";
import { WorkspaceService } from "../WorkspaceService.js";
import { FakeRetrievalBackend, MemoryWorkspaceStore } from "./TestDoubles.js";

const setup = (withRetrieval = true) => {
  const dataDir = mkdtempSync(path.join(os.tmpdir(), "sidekick-ws-"));
  const store = new MemoryWorkspaceStore();
  const retrieval = new FakeRetrievalBackend();
  const resolveWorkspaceRoot = (userId: string, workspaceId: string | null): string =>
    path.join(dataDir, userId, workspaceId ?? "scratch");
  const service = new WorkspaceService({
    store,
    retrieval: withRetrieval ? retrieval : undefined,
    resolveWorkspaceRoot,
    maxDocumentBytes: 64,
  });
  return { service, store, retrieval, root: (id: string) => resolveWorkspaceRoot("u1", id) };
};

test("create makes the folder and applies the initial config", { concurrency: false }, async () => {
  const { service, root } = setup();

  const workspace = await service.create("u1", "recipes", { chunkSize: 400, chunkOverlap: 40 });

  assert.equal(existsSync(root("recipes")), true);
  assert.equal(workspace.config.chunkSize, 400);
  assert.equal((await service.get("u1", "recipes")).config.chunkOverlap, 40);
});

test("configure rejects unknown workspaces and invalid values", { concurrency: false }, async () => {
  const { service } = setup();
  await assert.rejects(
    () => service.configure("u1", "ghost", { retrievalCount: 2 }),
    (error: unknown) => isSidekickError(error, "workspace_not_found") && error.message === "Workspace not found: ghost",
  );
  await service.create("u1", "notes");
  await assert.rejects(() => service.configure("u1", "notes", { chunkOverlap: 5000 }), {
    message: "chunkOverlap must be smaller than chunkSize",
  });
  assert.deepEqual(await service.configure("u1", "notes", { retrievalCount: 2 }), {
    chunkSize: 1000,
    chunkOverlap: 200,
    retrievalCount: 2,
    enabledTools: [],
    retrievalEnabled: true,
  });
});

test("list is per user and remove drops the index", { concurrency: false }, async () => {
  const { service, retrieval } = setup();
  await service.create("u1", "b");
  await service.create("u1", "a");
  await service.create("u2", "c");

  assert.deepEqual(
    (await service.list("u1")).map((workspace) => workspace.id),
    ["a", "b"],
  );
  assert.equal(await service.remove("u1", "a"), true);
  assert.equal(await service.remove("u1", "a"), false);
  assert.deepEqual(retrieval.dropped, [{ ownerId: "u1", workspaceId: "a" }]);
});

test("indexing sends text documents with the workspace chunking", { concurrency: false }, async () => {
  const { service, retrieval, root } = setup();
  await service.create("u1", "recipes", { chunkSize: 300, chunkOverlap: 30 });
  const folder = root("recipes");
  writeFileSync(path.join(folder, "soup.md"), "Simmer gently.");
  writeFileSync(path.join(folder, "photo.png"), "binary");
  writeFileSync(path.join(folder, "blank.txt"), "   \n");
  writeFileSync(path.join(folder, "huge.txt"), "x".repeat(100));
  writeFileSync(path.join(folder, ".hidden.md"), "secret");
  mkdirSync(path.join(folder, "desserts"));
  writeFileSync(path.join(folder, "desserts", "pie.txt"), "Bake 40 minutes.");

  const result = await service.indexDocuments("u1", "recipes");

  assert.deepEqual(result, {
    documents: 2,
    chunks: 4,
    skipped: ["blank.txt", "huge.txt", "photo.png"],
  });
  assert.equal(retrieval.indexed.length, 1);
  const call = retrieval.indexed[0];
  assert.deepEqual(call.scope, { ownerId: "u1", workspaceId: "recipes" });
  assert.equal(call.chunkSize, 300);
  assert.equal(call.chunkOverlap, 30);
  assert.deepEqual(
    call.documents.map((document) => document.id),
    ["desserts/pie.txt", "soup.md"],
  );
});

test("indexing an empty folder skips the backend", { concurrency: false }, async () => {
  const { service, retrieval } = setup();
  await service.create("u1", "empty");
  assert.deepEqual(await service.indexDocuments("u1", "empty"), { documents: 0, chunks: 0, skipped: [] });
  assert.equal(retrieval.indexed.length, 0);
});

test("indexing needs a retrieval backend", { concurrency: false }, async () => {
  const { service } = setup(false);
  await service.create("u1", "notes");
  await assert.rejects(() => service.indexDocuments("u1", "notes"), {
    message: "No retrieval backend is configured; set retrieval.baseUrl",
  });
});
