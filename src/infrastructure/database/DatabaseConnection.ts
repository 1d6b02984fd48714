import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

/**
 * Database connection manager for the job history mirror.
 * Pass ':memory:' for a throwaway database.
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/jobs.db') {
    this.dbPath = dbPath === ':memory:' ? dbPath : path.resolve(dbPath);

    if (this.dbPath !== ':memory:') {
      // Ensure data directory exists
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        fingerprint TEXT NOT NULL,
        status TEXT NOT NULL,
        progress INTEGER DEFAULT 0,
        message TEXT NOT NULL,
        request TEXT NOT NULL,
        result TEXT,
        error TEXT,
        attempt_count INTEGER NOT NULL DEFAULT 0,
        cancel_requested INTEGER NOT NULL DEFAULT 0,
        attached_requests INTEGER NOT NULL DEFAULT 1,
        from_cache INTEGER NOT NULL DEFAULT 0,
        estimated_cost_usd REAL NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        started_at TEXT,
        finished_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_job_status ON jobs(status);
      CREATE INDEX IF NOT EXISTS idx_job_fingerprint ON jobs(fingerprint);
      CREATE INDEX IF NOT EXISTS idx_job_created ON jobs(created_at);
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
}
