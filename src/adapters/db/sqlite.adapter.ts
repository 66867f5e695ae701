import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { getDataDir } from '../storage/paths.js';
import { createComponentLogger } from '../../lib/logger.js';

const log = createComponentLogger('db');

export interface Migration {
  version: number;
  name: string;
  up: string;
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: `
      -- Cloud credentials (encrypted payload)
      CREATE TABLE IF NOT EXISTS credentials (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        provider TEXT NOT NULL,
        encrypted_data TEXT NOT NULL,
        user_id TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      -- Virtual machines
      CREATE TABLE IF NOT EXISTS vms (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        provider TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'creating',
        instance_id TEXT,
        instance_type TEXT NOT NULL,
        region TEXT NOT NULL,
        public_ip TEXT,
        private_ip TEXT,
        credential_id INTEGER NOT NULL REFERENCES credentials(id),
        user_id TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      -- Operation history; vm_id and credential_id are plain columns so rows
      -- outlive the records they describe
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event_type TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        timestamp TEXT NOT NULL,
        user_id TEXT NOT NULL,
        vm_id INTEGER,
        credential_id INTEGER,
        parameters TEXT,
        result TEXT,
        error_message TEXT,
        duration REAL
      );

      CREATE INDEX IF NOT EXISTS idx_credentials_user ON credentials(user_id);
      CREATE INDEX IF NOT EXISTS idx_vms_user ON vms(user_id);
      CREATE INDEX IF NOT EXISTS idx_vms_credential ON vms(credential_id);
      CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events(timestamp);
      CREATE INDEX IF NOT EXISTS idx_events_user ON events(user_id);
      CREATE INDEX IF NOT EXISTS idx_events_type_status ON events(event_type, status);
    `,
  },
  {
    version: 2,
    name: 'vm_zone',
    up: `
      ALTER TABLE vms ADD COLUMN zone TEXT;
    `,
  },
];

export class SqliteAdapter {
  private db: Database.Database;
  private static instance: SqliteAdapter | null = null;

  private constructor(dbPath?: string) {
    const finalPath = dbPath ?? path.join(getDataDir(), 'vmledger.db');
    if (finalPath !== ':memory:') {
      const dir = path.dirname(finalPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }
    this.db = new Database(finalPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  static getInstance(dbPath?: string): SqliteAdapter {
    if (!SqliteAdapter.instance) {
      SqliteAdapter.instance = new SqliteAdapter(dbPath);
    }
    return SqliteAdapter.instance;
  }

  static resetInstance(): void {
    if (SqliteAdapter.instance) {
      SqliteAdapter.instance.close();
      SqliteAdapter.instance = null;
    }
  }

  getDb(): Database.Database {
    return this.db;
  }

  migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    const appliedVersions = new Set(
      this.db
        .prepare<[], { version: number }>('SELECT version FROM schema_migrations')
        .all()
        .map((row) => row.version)
    );

    for (const migration of migrations) {
      if (!appliedVersions.has(migration.version)) {
        this.db.transaction(() => {
          this.db.exec(migration.up);
          this.db
            .prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
            .run(migration.version, migration.name);
        })();
        log.info({ version: migration.version, name: migration.name }, 'Applied migration');
      }
    }
  }

  close(): void {
    this.db.close();
  }
}

export function getDb(): Database.Database {
  return SqliteAdapter.getInstance().getDb();
}

export function initializeDatabase(dbPath?: string): SqliteAdapter {
  const adapter = SqliteAdapter.getInstance(dbPath);
  adapter.migrate();
  return adapter;
}
