import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  /**
   * @param dbPath - File name under `data/`, an absolute path, or `:memory:`
   */
  constructor(dbPath: string = 'threads.db') {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(process.cwd(), 'data', dbPath);

    if (this.dbPath !== IN_MEMORY) {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS threads (
        thread_id TEXT PRIMARY KEY,
        thread_name TEXT NOT NULL DEFAULT '',
        origin_application TEXT NOT NULL DEFAULT '',
        created_on INTEGER NOT NULL DEFAULT 0,
        updated_on INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS turns (
        request_id TEXT PRIMARY KEY,
        thread_id TEXT NOT NULL,
        user_text TEXT NOT NULL,
        state TEXT NOT NULL DEFAULT 'receiving',
        error TEXT,
        started_at TEXT NOT NULL,
        finished_at TEXT,
        FOREIGN KEY (thread_id) REFERENCES threads(thread_id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_turn_thread ON turns(thread_id);

      CREATE TABLE IF NOT EXISTS thread_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        thread_id TEXT NOT NULL,
        message_index INTEGER NOT NULL,
        role TEXT NOT NULL,
        request_id TEXT NOT NULL,
        remote_message_id INTEGER,
        payload TEXT NOT NULL,
        created_at TEXT NOT NULL,
        UNIQUE(thread_id, message_index),
        UNIQUE(request_id, role),
        FOREIGN KEY (thread_id) REFERENCES threads(thread_id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_message_thread ON thread_messages(thread_id, message_index);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    totalThreads: number;
    totalMessages: number;
    totalTurns: number;
    erroredTurns: number;
    databaseSize: number;
  } {
    const count = (sql: string): number =>
      this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

    // File size; zero for in-memory databases
    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalThreads: count('SELECT COUNT(*) as count FROM threads'),
      totalMessages: count('SELECT COUNT(*) as count FROM thread_messages'),
      totalTurns: count('SELECT COUNT(*) as count FROM turns'),
      erroredTurns: count("SELECT COUNT(*) as count FROM turns WHERE state = 'errored'"),
      databaseSize,
    };
  }
}
