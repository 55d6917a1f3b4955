import { Database } from "sqlite";
import {
  DEFAULT_WORKSPACE_CONFIG,
  KeyedLock,
  SidekickError,
  mergeWorkspaceConfig,
  pairKey,
  validateWorkspaceConfig,
  type ConversationSnapshot,
  type ConversationTurn,
  type ToolInvocationRequest,
  type ToolInvocationResult,
  type Workspace,
  type WorkspaceConfig,
  type WorkspaceConfigPatch,
  type WorkspaceStore,
} from "@sidekick/shared";
import { Connection } from "../sqlite/connection.js";
import { SidekickMigrations } from "../migrations/SidekickMigrations.js";

const NO_WORKSPACE = "";

interface WorkspaceRow {
  owner_id: string;
  id: string;
  config_json: string;
  created_at: string;
  updated_at: string;
}

interface TurnRow {
  role: string;
  content: string;
  tool_calls_json: string | null;
  result_json: string | null;
  ts: number;
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseJson = (raw: string, label: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new SidekickError({
      code: "persistence_failed",
      message: `Corrupt ${label} in conversation store`,
      cause: error,
    });
  }
};

const readNumber = (source: Record<string, unknown>, key: keyof WorkspaceConfig): number | undefined => {
  const value = source[key];
  return typeof value === "number" ? value : undefined;
};

const parseConfig = (raw: string, defaults: WorkspaceConfig): WorkspaceConfig => {
  const parsed = parseJson(raw, "workspace config");
  if (!isObject(parsed)) return { ...defaults };
  const enabledTools = Array.isArray(parsed.enabledTools)
    ? parsed.enabledTools.filter((entry): entry is string => typeof entry === "string")
    : undefined;
  return mergeWorkspaceConfig(defaults, {
    chunkSize: readNumber(parsed, "chunkSize"),
    chunkOverlap: readNumber(parsed, "chunkOverlap"),
    retrievalCount: readNumber(parsed, "retrievalCount"),
    enabledTools,
    retrievalEnabled: typeof parsed.retrievalEnabled === "boolean" ? parsed.retrievalEnabled : undefined,
  });
};

const parseToolCalls = (raw: string): ToolInvocationRequest[] => {
  const parsed = parseJson(raw, "tool calls");
  if (!Array.isArray(parsed)) return [];
  const requests: ToolInvocationRequest[] = [];
  for (const entry of parsed) {
    if (!isObject(entry)) continue;
    if (typeof entry.id !== "string" || typeof entry.name !== "string") continue;
    requests.push({
      id: entry.id,
      name: entry.name,
      args: entry.args,
      turnIndex: typeof entry.turnIndex === "number" ? entry.turnIndex : 0,
    });
  }
  return requests;
};

const parseResult = (raw: string): ToolInvocationResult => {
  const parsed = parseJson(raw, "tool result");
  if (!isObject(parsed) || typeof parsed.requestId !== "string" || typeof parsed.name !== "string") {
    throw new SidekickError({ code: "persistence_failed", message: "Corrupt tool result in conversation store" });
  }
  if (parsed.ok === true) {
    const output = typeof parsed.output === "string" ? parsed.output : "";
    return "data" in parsed
      ? { requestId: parsed.requestId, name: parsed.name, ok: true, output, data: parsed.data }
      : { requestId: parsed.requestId, name: parsed.name, ok: true, output };
  }
  return {
    requestId: parsed.requestId,
    name: parsed.name,
    ok: false,
    error: typeof parsed.error === "string" ? parsed.error : "tool failed",
  };
};

const mapTurnRow = (row: TurnRow): ConversationTurn => {
  if (row.role === "user") {
    return { role: "user", content: row.content, ts: row.ts };
  }
  if (row.role === "assistant") {
    const toolCalls = row.tool_calls_json ? parseToolCalls(row.tool_calls_json) : undefined;
    return toolCalls && toolCalls.length > 0
      ? { role: "assistant", content: row.content, ts: row.ts, toolCalls }
      : { role: "assistant", content: row.content, ts: row.ts };
  }
  if (row.role === "tool" && row.result_json) {
    return { role: "tool", content: row.content, ts: row.ts, result: parseResult(row.result_json) };
  }
  throw new SidekickError({
    code: "persistence_failed",
    message: `Unexpected turn role in conversation store: ${row.role}`,
  });
};

const turnColumns = (turn: ConversationTurn): [string | null, string | null] => {
  if (turn.role === "assistant") {
    return [turn.toolCalls?.length ? JSON.stringify(turn.toolCalls) : null, null];
  }
  if (turn.role === "tool") {
    return [null, JSON.stringify(turn.result)];
  }
  return [null, null];
};

const requireWorkspaceId = (workspaceId: string): string => {
  if (!workspaceId.trim()) {
    throw new SidekickError({ code: "workspace_not_found", message: "Workspace id must not be empty" });
  }
  return workspaceId;
};

/**
 * sqlite-backed WorkspaceStore. Every query filters on both the user and the
 * workspace column; writes for one pair go through a keyed lock so sequence
 * numbers are assigned without interleaving.
 */
export class ConversationRepository implements WorkspaceStore {
  private writes = new KeyedLock();

  constructor(
    private db: Database,
    private connection?: Connection,
    private defaults: WorkspaceConfig = DEFAULT_WORKSPACE_CONFIG,
  ) {}

  static async create(dataDir?: string, defaults?: WorkspaceConfig): Promise<ConversationRepository> {
    const connection = await Connection.openDataDir(dataDir);
    await SidekickMigrations.run(connection.db);
    return new ConversationRepository(connection.db, connection, defaults);
  }

  async close(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
    }
  }

  async load(userId: string, workspaceId: string | null): Promise<ConversationSnapshot> {
    const config = workspaceId === null ? null : (await this.ensureWorkspace(userId, workspaceId)).config;
    const rows = await this.db.all<TurnRow[]>(
      `SELECT role, content, tool_calls_json, result_json, ts
       FROM conversation_turns
       WHERE user_id = ? AND workspace_id = ?
       ORDER BY seq ASC`,
      userId,
      workspaceId ?? NO_WORKSPACE,
    );
    return { history: rows.map(mapTurnRow), config };
  }

  /**
   * Appends turns to a pair's log. A workspace must still exist when the write
   * lands; a workspace deleted while an exchange was running stays deleted.
   */
  async append(userId: string, workspaceId: string | null, turns: ConversationTurn[]): Promise<void> {
    if (turns.length === 0) return;
    const scope = workspaceId === null ? NO_WORKSPACE : requireWorkspaceId(workspaceId);
    await this.writes.withLock(pairKey(userId, workspaceId), async () => {
      if (workspaceId !== null) {
        const exists = await this.db.get<{ found: number }>(
          "SELECT 1 AS found FROM workspaces WHERE owner_id = ? AND id = ?",
          userId,
          workspaceId,
        );
        if (!exists) {
          throw new SidekickError({
            code: "workspace_not_found",
            message: `Workspace not found: ${workspaceId}`,
            details: { userId, workspaceId },
          });
        }
      }
      const row = await this.db.get<{ seq: number }>(
        "SELECT COALESCE(MAX(seq), -1) AS seq FROM conversation_turns WHERE user_id = ? AND workspace_id = ?",
        userId,
        scope,
      );
      const start = (row?.seq ?? -1) + 1;
      const batch = turns.map((turn) => {
        const [toolCalls, result] = turnColumns(turn);
        return { role: turn.role, content: turn.content, toolCalls, result, ts: turn.ts };
      });
      // One JSON parameter per batch keeps the bound-parameter count fixed.
      await this.db.run(
        `INSERT INTO conversation_turns
           (user_id, workspace_id, seq, role, content, tool_calls_json, result_json, ts)
         SELECT ?, ?, ? + CAST(key AS INTEGER),
                json_extract(value, '$.role'),
                json_extract(value, '$.content'),
                json_extract(value, '$.toolCalls'),
                json_extract(value, '$.result'),
                json_extract(value, '$.ts')
         FROM json_each(?)`,
        userId,
        scope,
        start,
        JSON.stringify(batch),
      );
    });
  }

  async getWorkspace(userId: string, workspaceId: string): Promise<Workspace | undefined> {
    const row = await this.db.get<WorkspaceRow>(
      "SELECT owner_id, id, config_json, created_at, updated_at FROM workspaces WHERE owner_id = ? AND id = ?",
      userId,
      workspaceId,
    );
    return row ? this.mapWorkspaceRow(row) : undefined;
  }

  async ensureWorkspace(userId: string, workspaceId: string): Promise<Workspace> {
    requireWorkspaceId(workspaceId);
    const now = new Date().toISOString();
    await this.db.run(
      `INSERT OR IGNORE INTO workspaces (owner_id, id, config_json, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?)`,
      userId,
      workspaceId,
      JSON.stringify(this.defaults),
      now,
      now,
    );
    const workspace = await this.getWorkspace(userId, workspaceId);
    if (!workspace) {
      throw new SidekickError({
        code: "persistence_failed",
        message: `Workspace ${workspaceId} could not be created`,
      });
    }
    return workspace;
  }

  async listWorkspaces(userId: string): Promise<Workspace[]> {
    const rows = await this.db.all<WorkspaceRow[]>(
      "SELECT owner_id, id, config_json, created_at, updated_at FROM workspaces WHERE owner_id = ? ORDER BY id ASC",
      userId,
    );
    return rows.map((row) => this.mapWorkspaceRow(row));
  }

  async getConfig(userId: string, workspaceId: string): Promise<WorkspaceConfig | undefined> {
    return (await this.getWorkspace(userId, workspaceId))?.config;
  }

  async setConfig(userId: string, workspaceId: string, patch: WorkspaceConfigPatch): Promise<WorkspaceConfig> {
    return this.writes.withLock(pairKey(userId, workspaceId), async () => {
      const workspace = await this.ensureWorkspace(userId, workspaceId);
      const next = mergeWorkspaceConfig(workspace.config, patch);
      const invalid = validateWorkspaceConfig(next);
      if (invalid) {
        throw new SidekickError({ code: "invalid_config", message: invalid, details: { workspaceId } });
      }
      await this.db.run(
        "UPDATE workspaces SET config_json = ?, updated_at = ? WHERE owner_id = ? AND id = ?",
        JSON.stringify(next),
        new Date().toISOString(),
        userId,
        workspaceId,
      );
      return next;
    });
  }

  async deleteWorkspace(userId: string, workspaceId: string): Promise<boolean> {
    requireWorkspaceId(workspaceId);
    return this.writes.withLock(pairKey(userId, workspaceId), async () => {
      await this.db.run(
        "DELETE FROM conversation_turns WHERE user_id = ? AND workspace_id = ?",
        userId,
        workspaceId,
      );
      const result = await this.db.run("DELETE FROM workspaces WHERE owner_id = ? AND id = ?", userId, workspaceId);
      return (result.changes ?? 0) > 0;
    });
  }

  private mapWorkspaceRow(row: WorkspaceRow): Workspace {
    return {
      id: row.id,
      ownerId: row.owner_id,
      config: parseConfig(row.config_json, this.defaults),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
