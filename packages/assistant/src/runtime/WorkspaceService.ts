import { promises as fs } from "node:fs";
import path from "node:path";
import {
  SidekickError,
  type Workspace,
  type WorkspaceConfig,
  type WorkspaceConfigPatch,
  type WorkspaceStore,
} from "@sidekick/shared";
import type { IndexReport, RetrievalBackend, RetrievalDocument } from "../retrieval/RetrievalTypes.js";

export const INDEXABLE_EXTENSIONS = [".txt", ".md", ".markdown", ".csv", ".json", ".html"];

export interface WorkspaceServiceOptions {
  store: WorkspaceStore;
  retrieval?: RetrievalBackend;
  resolveWorkspaceRoot: (userId: string, workspaceId: string | null) => string;
  maxDocumentBytes?: number;
}

export interface IndexResult extends IndexReport {
  skipped: string[];
}

const collectFiles = async (root: string, current: string, files: string[]): Promise<void> => {
  const entries = await fs.readdir(current, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const fullPath = path.join(current, entry.name);
    if (entry.isDirectory()) {
      await collectFiles(root, fullPath, files);
    } else if (entry.isFile()) {
      files.push(path.relative(root, fullPath));
    }
  }
};

/**
 * Workspace administration: creation, configuration, listing, deletion and
 * document indexing. Conversations go through the control loop instead.
 */
export class WorkspaceService {
  constructor(private options: WorkspaceServiceOptions) {}

  async create(userId: string, workspaceId: string, patch?: WorkspaceConfigPatch): Promise<Workspace> {
    const workspace = await this.options.store.ensureWorkspace(userId, workspaceId);
    await fs.mkdir(this.options.resolveWorkspaceRoot(userId, workspaceId), { recursive: true });
    if (!patch || Object.keys(patch).length === 0) {
      return workspace;
    }
    const config = await this.options.store.setConfig(userId, workspaceId, patch);
    return { ...workspace, config };
  }

  async configure(userId: string, workspaceId: string, patch: WorkspaceConfigPatch): Promise<WorkspaceConfig> {
    await this.require(userId, workspaceId);
    return this.options.store.setConfig(userId, workspaceId, patch);
  }

  async get(userId: string, workspaceId: string): Promise<Workspace> {
    return this.require(userId, workspaceId);
  }

  async list(userId: string): Promise<Workspace[]> {
    return this.options.store.listWorkspaces(userId);
  }

  /** Removes the workspace, its history and its index; files in its folder are left in place. */
  async remove(userId: string, workspaceId: string): Promise<boolean> {
    const removed = await this.options.store.deleteWorkspace(userId, workspaceId);
    if (removed && this.options.retrieval) {
      await this.options.retrieval.dropIndex({ ownerId: userId, workspaceId });
    }
    return removed;
  }

  /**
   * Reads the text documents in the workspace folder and sends them to the
   * retrieval backend using the workspace's chunking settings.
   */
  async indexDocuments(userId: string, workspaceId: string): Promise<IndexResult> {
    const retrieval = this.options.retrieval;
    if (!retrieval) {
      throw new SidekickError({
        code: "invalid_config",
        message: "No retrieval backend is configured; set retrieval.baseUrl",
      });
    }
    const workspace = await this.require(userId, workspaceId);
    const root = this.options.resolveWorkspaceRoot(userId, workspaceId);
    await fs.mkdir(root, { recursive: true });

    const files: string[] = [];
    await collectFiles(root, root, files);
    const maxBytes = this.options.maxDocumentBytes ?? 2 * 1024 * 1024;
    const documents: RetrievalDocument[] = [];
    const skipped: string[] = [];
    for (const relative of files) {
      const fullPath = path.join(root, relative);
      const stat = await fs.stat(fullPath);
      if (!INDEXABLE_EXTENSIONS.includes(path.extname(relative).toLowerCase()) || stat.size > maxBytes) {
        skipped.push(relative);
        continue;
      }
      const text = await fs.readFile(fullPath, "utf8");
      if (!text.trim()) {
        skipped.push(relative);
        continue;
      }
      documents.push({ id: relative.split(path.sep).join("/"), text, metadata: { path: relative } });
    }

    if (documents.length === 0) {
      return { documents: 0, chunks: 0, skipped };
    }
    const report = await retrieval.index(
      { ownerId: userId, workspaceId },
      documents,
      workspace.config.chunkSize,
      workspace.config.chunkOverlap,
    );
    return { ...report, skipped };
  }

  private async require(userId: string, workspaceId: string): Promise<Workspace> {
    const workspace = await this.options.store.getWorkspace(userId, workspaceId);
    if (!workspace) {
      throw new SidekickError({
        code: "workspace_not_found",
        message: `Workspace not found: ${workspaceId}`,
        details: { userId, workspaceId },
      });
    }
    return workspace;
  }
}
