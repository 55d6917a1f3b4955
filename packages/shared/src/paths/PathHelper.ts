import { createHash } from "node:crypto";
import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";

const PLAIN_SEGMENT = /^[a-zA-Z0-9_-][a-zA-Z0-9._-]{0,63}$/;

// Plain ids are used as-is; anything else gets a readable prefix and a digest of
// the raw id after "~", a character plain ids never contain.
const safeSegment = (value: string): string => {
  if (PLAIN_SEGMENT.test(value)) return value;
  const cleaned = value.replace(/[^a-zA-Z0-9._-]+/g, "_").replace(/^\.+/, "_").slice(0, 48) || "_";
  const digest = createHash("sha256").update(value).digest("hex").slice(0, 16);
  return `${cleaned}~${digest}`;
};

/**
 * Utility helpers for resolving sidekick paths.
 * Every per-user and per-workspace location is derived here so that callers
 * never build folder paths from raw identifiers themselves.
 */
export class PathHelper {
  static getGlobalSidekickDir(): string {
    const envHome = process.env.HOME ?? process.env.USERPROFILE;
    const homeDir = envHome && envHome.trim().length > 0 ? envHome : os.homedir();
    return path.join(homeDir, ".sidekick");
  }

  static getDatabasePath(dataDir: string = this.getGlobalSidekickDir()): string {
    return path.join(dataDir, "sidekick.db");
  }

  static getUserDir(dataDir: string, userId: string): string {
    return path.join(dataDir, "users", safeSegment(userId));
  }

  /**
   * Folder backing a workspace's files. The no-workspace mode gets a scratch
   * folder per user so file tools still have a root to work in.
   */
  static getWorkspaceFolder(dataDir: string, userId: string, workspaceId: string | null): string {
    const userDir = this.getUserDir(dataDir, userId);
    if (workspaceId === null) {
      return path.join(userDir, "scratch");
    }
    return path.join(userDir, "workspaces", safeSegment(workspaceId));
  }

  static async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }
}
