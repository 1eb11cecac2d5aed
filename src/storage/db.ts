import Database from "better-sqlite3";
import { dirname, join } from "node:path";
import { ensureDir } from "../config/paths.js";

export const IN_MEMORY = ":memory:";

export function defaultDatabasePath(stateDir: string): string {
  return join(stateDir, "bot.db");
}

/**
 * Shared SQLite handle carried by every context. Plugins own their tables
 * and create them from their init hook.
 */
export class BotDatabase {
  private readonly db: Database.Database;

  constructor(readonly path: string) {
    if (path !== IN_MEMORY) ensureDir(dirname(path));
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
  }

  raw(): Database.Database {
    return this.db;
  }

  hasTable(name: string): boolean {
    const row = this.db
      .prepare<[string], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
      )
      .get(name);
    return row !== undefined;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
