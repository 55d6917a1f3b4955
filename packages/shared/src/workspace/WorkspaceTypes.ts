export const RETRIEVAL_TOOL_NAME = "retrieve_documents";

export interface WorkspaceConfig {
  chunkSize: number;
  chunkOverlap: number;
  retrievalCount: number;
  enabledTools: string[];
  retrievalEnabled: boolean;
}

export type WorkspaceConfigPatch = Partial<WorkspaceConfig>;

export const DEFAULT_WORKSPACE_CONFIG: WorkspaceConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  retrievalCount: 4,
  enabledTools: [],
  retrievalEnabled: true,
};

export interface Workspace {
  id: string;
  ownerId: string;
  config: WorkspaceConfig;
  createdAt: string;
  updatedAt: string;
}

export interface ToolInvocationRequest {
  id: string;
  name: string;
  args: unknown;
  /** Index of the history turn that carried the request. */
  turnIndex: number;
}

export type ToolInvocationResult =
  | { requestId: string; name: string; ok: true; output: string; data?: unknown }
  | { requestId: string; name: string; ok: false; error: string };

export type ConversationTurn =
  | { role: "user"; content: string; ts: number }
  | { role: "assistant"; content: string; ts: number; toolCalls?: ToolInvocationRequest[] }
  | { role: "tool"; content: string; ts: number; result: ToolInvocationResult };

export type ConversationRole = ConversationTurn["role"];

export interface ConversationSnapshot {
  history: ConversationTurn[];
  /** Null in no-workspace mode. */
  config: WorkspaceConfig | null;
}

/**
 * Persistence contract for conversation history and workspace configuration.
 * Every operation is keyed by the (user, workspace) pair; a null workspace
 * addresses the user's no-workspace history.
 */
export interface WorkspaceStore {
  load(userId: string, workspaceId: string | null): Promise<ConversationSnapshot>;
  append(userId: string, workspaceId: string | null, turns: ConversationTurn[]): Promise<void>;
  getConfig(userId: string, workspaceId: string): Promise<WorkspaceConfig | undefined>;
  setConfig(userId: string, workspaceId: string, patch: WorkspaceConfigPatch): Promise<WorkspaceConfig>;
  ensureWorkspace(userId: string, workspaceId: string): Promise<Workspace>;
  getWorkspace(userId: string, workspaceId: string): Promise<Workspace | undefined>;
  listWorkspaces(userId: string): Promise<Workspace[]>;
  deleteWorkspace(userId: string, workspaceId: string): Promise<boolean>;
}

export const mergeWorkspaceConfig = (base: WorkspaceConfig, patch: WorkspaceConfigPatch): WorkspaceConfig => ({
  chunkSize: patch.chunkSize ?? base.chunkSize,
  chunkOverlap: patch.chunkOverlap ?? base.chunkOverlap,
  retrievalCount: patch.retrievalCount ?? base.retrievalCount,
  enabledTools: patch.enabledTools ? [...new Set(patch.enabledTools)] : [...base.enabledTools],
  retrievalEnabled: patch.retrievalEnabled ?? base.retrievalEnabled,
});

export const validateWorkspaceConfig = (config: WorkspaceConfig): string | undefined => {
  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    return "chunkSize must be a positive integer";
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    return "chunkOverlap must be a non-negative integer";
  }
  if (config.chunkOverlap >= config.chunkSize) {
    return "chunkOverlap must be smaller than chunkSize";
  }
  if (!Number.isInteger(config.retrievalCount) || config.retrievalCount <= 0) {
    return "retrievalCount must be a positive integer";
  }
  return undefined;
};
