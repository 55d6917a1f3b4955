import type {
  IndexReport,
  RetrievalBackend,
  RetrievalDocument,
  RetrievedPassage,
  WorkspaceScope,
} from "./RetrievalTypes.js";
import { isObject } from "../tools/ToolArgs.js";

export interface HttpRetrievalClientOptions {
  baseUrl: string;
  authToken?: string;
  timeoutMs?: number;
}

const readPassages = (payload: unknown): RetrievedPassage[] => {
  const entries = isObject(payload) && Array.isArray(payload.passages) ? payload.passages : [];
  const passages: RetrievedPassage[] = [];
  for (const entry of entries) {
    if (!isObject(entry) || typeof entry.text !== "string") continue;
    passages.push({
      documentId: typeof entry.document_id === "string" ? entry.document_id : "",
      text: entry.text,
      score: typeof entry.score === "number" ? entry.score : 0,
    });
  }
  return passages.sort((a, b) => b.score - a.score);
};

const readCount = (payload: unknown, key: string): number => {
  if (!isObject(payload)) return 0;
  const value = payload[key];
  return typeof value === "number" ? value : 0;
};

/**
 * Client for a retrieval service exposing per-workspace indexes over HTTP.
 */
export class HttpRetrievalClient implements RetrievalBackend {
  constructor(private options: HttpRetrievalClientOptions) {}

  private resolveBaseUrl(): string {
    const base = this.options.baseUrl.trim();
    return base.endsWith("/") ? base.slice(0, -1) : base;
  }

  private scopeUrl(scope: WorkspaceScope, suffix: string): string {
    const owner = encodeURIComponent(scope.ownerId);
    const workspace = encodeURIComponent(scope.workspaceId);
    return `${this.resolveBaseUrl()}/v1/owners/${owner}/workspaces/${workspace}${suffix}`;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.options.authToken) headers.authorization = `Bearer ${this.options.authToken}`;
    return headers;
  }

  private async request(url: string, init: RequestInit, label: string): Promise<unknown> {
    const response = await fetch(url, {
      ...init,
      headers: this.buildHeaders(),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000),
    });
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Retrieval ${label} failed (${response.status}): ${body}`);
    }
    if (response.status === 204) return undefined;
    return response.json();
  }

  async retrieve(scope: WorkspaceScope, query: string, topK: number): Promise<RetrievedPassage[]> {
    const payload = await this.request(
      this.scopeUrl(scope, "/search"),
      { method: "POST", body: JSON.stringify({ query, top_k: topK }) },
      "search",
    );
    return readPassages(payload).slice(0, topK);
  }

  async index(
    scope: WorkspaceScope,
    documents: RetrievalDocument[],
    chunkSize: number,
    chunkOverlap: number,
  ): Promise<IndexReport> {
    const payload = await this.request(
      this.scopeUrl(scope, "/documents"),
      {
        method: "POST",
        body: JSON.stringify({
          documents,
          chunk_size: chunkSize,
          chunk_overlap: chunkOverlap,
        }),
      },
      "index",
    );
    return { documents: readCount(payload, "documents"), chunks: readCount(payload, "chunks") };
  }

  async dropIndex(scope: WorkspaceScope): Promise<void> {
    await this.request(this.scopeUrl(scope, ""), { method: "DELETE" }, "drop");
  }
}
