/**
 * SQLite Database Infrastructure
 * Manages the connection, schema migrations and the key-value table backing the report cache
 */

import Database, { type Database as DatabaseType, type Statement } from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { KeyValueStore } from './kv-store.js';

// ============================================
// Types
// ============================================

export interface DatabaseConfig {
  /** Path to SQLite database file, or `:memory:` */
  path: string;
  /** Enable WAL mode for better concurrent access */
  walMode: boolean;
  /** Busy timeout in milliseconds */
  busyTimeout: number;
}

export interface MigrationInfo {
  version: number;
  appliedAt: number;
  description: string;
}

// ============================================
// Schema Migrations
// ============================================

interface Migration {
  version: number;
  description: string;
  up: string;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Create kv_entries table',
    up: `
      CREATE TABLE IF NOT EXISTS kv_entries (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `,
  },
];

const VersionRowSchema = z.object({ version: z.number() });
const MigrationRowSchema = z.object({
  version: z.number(),
  appliedAt: z.number(),
  description: z.string(),
});
const ValueRowSchema = z.object({ value: z.string() });

// ============================================
// Database Manager
// ============================================

export class DatabaseManager {
  private db: DatabaseType | null = null;
  private config: DatabaseConfig;
  private preparedStatements = new Map<string, Statement>();

  constructor(config: Partial<DatabaseConfig> = {}) {
    this.config = {
      path: '.metar-cache/cache.db',
      walMode: true,
      busyTimeout: 5000,
      ...config,
    };
  }

  /**
   * Initialize the database connection and run migrations
   */
  initialize(): void {
    if (this.db) {
      return;
    }

    const inMemory = this.config.path === ':memory:';
    const dbDir = dirname(this.config.path);
    if (!inMemory && dbDir && !existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }

    this.db = new Database(this.config.path);

    // WAL is meaningless for in-memory databases
    if (this.config.walMode && !inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    if (this.config.busyTimeout) {
      this.db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
    }
    this.db.pragma('synchronous = NORMAL');

    this.runMigrations();
  }

  /**
   * Get the database connection
   */
  getDb(): DatabaseType {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Get or create a prepared statement
   */
  prepare(sql: string): Statement {
    let stmt = this.preparedStatements.get(sql);
    if (!stmt) {
      stmt = this.getDb().prepare(sql);
      this.preparedStatements.set(sql, stmt);
    }
    return stmt;
  }

  private runMigrations(): void {
    const db = this.getDb();

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        applied_at INTEGER NOT NULL,
        description TEXT NOT NULL
      );
    `);

    const current = VersionRowSchema.parse(
      db.prepare('SELECT COALESCE(MAX(version), 0) as version FROM schema_migrations').get()
    );

    for (const migration of MIGRATIONS) {
      if (migration.version <= current.version) {
        continue;
      }

      db.transaction(() => {
        db.exec(migration.up);
        db.prepare(
          'INSERT INTO schema_migrations (version, applied_at, description) VALUES (?, ?, ?)'
        ).run(migration.version, Date.now(), migration.description);
      })();

      console.log(`Migration ${migration.version}: ${migration.description}`);
    }
  }

  /**
   * Get applied migrations
   */
  getMigrations(): MigrationInfo[] {
    const rows = this.getDb().prepare(
      'SELECT version, applied_at as appliedAt, description FROM schema_migrations ORDER BY version'
    ).all();
    return z.array(MigrationRowSchema).parse(rows);
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db) {
      this.preparedStatements.clear();

      if (this.config.walMode && this.config.path !== ':memory:') {
        try {
          this.db.pragma('wal_checkpoint(TRUNCATE)');
        } catch (error) {
          console.warn('[sqlite] WAL checkpoint on close failed:', error);
        }
      }

      this.db.close();
      this.db = null;
    }
  }

  isInitialized(): boolean {
    return this.db !== null;
  }
}

// ============================================
// SQLite Key-Value Store
// ============================================

/**
 * Stores each key as one row. The upsert is a single statement, so a
 * reader sees either the previous row or the new one.
 */
export class SqliteKeyValueStore implements KeyValueStore {
  constructor(private readonly database: DatabaseManager) {
    database.initialize();
  }

  async get(key: string): Promise<string | undefined> {
    const row = this.database.prepare('SELECT value FROM kv_entries WHERE key = ?').get(key);
    if (row === undefined) return undefined;
    return ValueRowSchema.parse(row).value;
  }

  async set(key: string, value: string): Promise<void> {
    this.database.prepare(`
      INSERT INTO kv_entries (key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        updated_at = excluded.updated_at
    `).run(key, value, Date.now());
  }

  close(): void {
    this.database.close();
  }
}
