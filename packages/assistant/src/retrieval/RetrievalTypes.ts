export interface WorkspaceScope {
  ownerId: string;
  workspaceId: string;
}

export interface RetrievalDocument {
  /** Stable id, usually the path relative to the workspace folder. */
  id: string;
  text: string;
  metadata?: Record<string, string>;
}

export interface RetrievedPassage {
  documentId: string;
  text: string;
  score: number;
}

export interface IndexReport {
  documents: number;
  chunks: number;
}

/**
 * Embedding/vector retrieval backend. Every call is scoped to one workspace of
 * one owner; implementations must never answer from another scope's index.
 */
export interface RetrievalBackend {
  retrieve(scope: WorkspaceScope, query: string, topK: number): Promise<RetrievedPassage[]>;
  index(
    scope: WorkspaceScope,
    documents: RetrievalDocument[],
    chunkSize: number,
    chunkOverlap: number,
  ): Promise<IndexReport>;
  dropIndex(scope: WorkspaceScope): Promise<void>;
}
