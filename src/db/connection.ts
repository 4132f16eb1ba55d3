import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

export const DEFAULT_DATA_DIR = '.driftwatch';
export const DEFAULT_DB_FILE = 'driftwatch.db';

const IN_MEMORY = ':memory:';

let instance: DatabaseConnection | null = null;

export class DatabaseConnection {
  private db: Database.Database | null = null;
  private dbPath: string;

  constructor(dbPath?: string) {
    this.dbPath = dbPath ?? resolve(process.cwd(), DEFAULT_DATA_DIR, DEFAULT_DB_FILE);
  }

  /** Open the database connection, creating the directory and file if needed. */
  open(): Database.Database {
    if (this.db) return this.db;

    if (this.dbPath !== IN_MEMORY) {
      const dir = dirname(this.dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);

    // WAL lets readers (the CLI) run while a host process is writing
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    return this.db;
  }

  /** Close the database connection. */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}

/** Get or create the shared DatabaseConnection singleton used by the CLI. */
export function getConnection(dbPath?: string): DatabaseConnection {
  if (!instance) {
    instance = new DatabaseConnection(dbPath);
  }
  return instance;
}
