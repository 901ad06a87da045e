import fs from "fs";
import path from "path";
import type { MemoryStore } from "./memory-store.js";
import { logger } from "./logger.js";
import type { Memory } from "./types.js";

export const DEFAULT_MAX_BACKUPS = 10;
const EXPORT_PAGE_SIZE = 500;

export interface BackupResult {
  backupPath: string;
  memoriesBackedUp: number;
  timestamp: string;
}

/** Folder name for a backup taken at `date`, e.g. memory_backup_20260301_142501_789. */
export function backupFolderName(date: Date): string {
  const stamp = date.toISOString().replace(/[-:]/g, "").replace("T", "_").replace(".", "_").slice(0, 19);
  return `memory_backup_${stamp}`;
}

export class BackupManager {
  constructor(
    private readonly backupDir: string,
    private readonly maxBackups = DEFAULT_MAX_BACKUPS,
  ) {}

  /**
   * Snapshot the live database through SQLite's online backup API and write a JSON
   * export of every live record beside it. Older folders beyond `maxBackups` are removed.
   */
  async createBackup(store: MemoryStore, now: Date = new Date()): Promise<BackupResult> {
    const backupPath = this.freeFolder(backupFolderName(now));
    fs.mkdirSync(backupPath, { recursive: true });

    await store.backupTo(path.join(backupPath, "memory.db"));

    const memories: Memory[] = [];
    for (let offset = 0; ; offset += EXPORT_PAGE_SIZE) {
      const page = store.getAll(EXPORT_PAGE_SIZE, offset);
      memories.push(...page);
      if (page.length < EXPORT_PAGE_SIZE) break;
    }

    const exportData = {
      export_timestamp: now.toISOString(),
      total_memories: memories.length,
      memories,
    };
    fs.writeFileSync(path.join(backupPath, "memories_export.json"), JSON.stringify(exportData, null, 2), "utf-8");

    this.pruneBackups();
    logger.info(`Backup written to ${backupPath}`, { memories: memories.length });

    return {
      backupPath,
      memoriesBackedUp: memories.length,
      timestamp: now.toISOString(),
    };
  }

  /** `name` under the backup directory, suffixed -02, -03, ... while taken. Suffixes sort after the bare name. */
  private freeFolder(name: string): string {
    let candidate = path.join(this.backupDir, name);
    for (let n = 2; fs.existsSync(candidate); n++) {
      candidate = path.join(this.backupDir, `${name}-${String(n).padStart(2, "0")}`);
    }
    return candidate;
  }

  /** Keep the newest `maxBackups` backup folders. */
  pruneBackups(): string[] {
    if (!fs.existsSync(this.backupDir)) return [];

    const dirs = fs
      .readdirSync(this.backupDir)
      .filter((d) => d.startsWith("memory_backup_") && fs.statSync(path.join(this.backupDir, d)).isDirectory())
      .sort()
      .reverse(); // newest first

    const removed = dirs.slice(this.maxBackups);
    for (const old of removed) {
      fs.rmSync(path.join(this.backupDir, old), { recursive: true, force: true });
    }
    return removed;
  }
}
