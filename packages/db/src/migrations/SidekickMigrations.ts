import { Database } from "sqlite";

/**
 * Schema for the sidekick database (`~/.sidekick/sidekick.db` by default).
 * Workspaces are keyed by (owner_id, id) so two owners may reuse a folder name
 * without sharing anything. Turns in no-workspace mode use an empty
 * workspace_id.
 */
export class SidekickMigrations {
  static async run(db: Database): Promise<void> {
    await db.exec(`
      CREATE TABLE IF NOT EXISTS workspaces (
        owner_id TEXT NOT NULL,
        id TEXT NOT NULL,
        config_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (owner_id, id)
      );

      CREATE TABLE IF NOT EXISTS conversation_turns (
        user_id TEXT NOT NULL,
        workspace_id TEXT NOT NULL DEFAULT '',
        seq INTEGER NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'tool')),
        content TEXT NOT NULL,
        tool_calls_json TEXT,
        result_json TEXT,
        ts INTEGER NOT NULL,
        PRIMARY KEY (user_id, workspace_id, seq)
      );

      CREATE INDEX IF NOT EXISTS idx_workspaces_owner ON workspaces(owner_id);
    `);
  }
}
