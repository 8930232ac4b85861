/**
 * Database Layer with better-sqlite3
 *
 * A single SQLite connection shared by every repository. Domain modules
 * own their DDL (see each module's schema.ts) and talk to the connection
 * through the raw* helpers below.
 *
 * - WAL mode for concurrent reads
 * - Foreign keys enforced (cascading deletes between datasets, runs and items)
 * - Uniqueness invariants expressed as table constraints
 */

import BetterSqlite3 from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

const SCHEMA_VERSION = 1;

export class Database {
  private sqlite: BetterSqlite3.Database;
  private dbPath: string;

  constructor(dbPath: string) {
    // Handle special SQLite paths (in-memory, temp)
    const isSpecialPath = dbPath === ':memory:' || dbPath === '';

    if (isSpecialPath) {
      this.dbPath = dbPath;
    } else {
      // Normalize path to .db extension
      this.dbPath = dbPath.replace(/\.[^.]+$/, '') + '.db';

      const dir = dirname(this.dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.sqlite = new BetterSqlite3(this.dbPath);
  }

  async init(): Promise<void> {
    this.sqlite.pragma('journal_mode = WAL');
    this.sqlite.pragma('foreign_keys = ON');
    this.sqlite.pragma(`user_version = ${SCHEMA_VERSION}`);

    console.log(`[Database] Initialized SQLite at ${this.dbPath || ':temp:'}`);
  }

  get path(): string {
    return this.dbPath;
  }

  /**
   * Execute a raw SQL SELECT query. Returns rows.
   */
  rawQuery(sql: string, params?: unknown[]): unknown[] {
    const stmt = this.sqlite.prepare(sql);
    return params ? stmt.all(...params) : stmt.all();
  }

  /**
   * Execute a raw SQL SELECT query and return the first row, if any.
   */
  rawGet(sql: string, params?: unknown[]): unknown {
    const stmt = this.sqlite.prepare(sql);
    return params ? stmt.get(...params) : stmt.get();
  }

  /**
   * Execute a raw SQL mutation (INSERT/UPDATE/DELETE). Returns affected row count.
   */
  rawRun(sql: string, params?: unknown[]): number {
    const stmt = this.sqlite.prepare(sql);
    const result = params ? stmt.run(...params) : stmt.run();
    return result.changes;
  }

  /**
   * Execute raw SQL with multiple statements (for DDL like CREATE TABLE, CREATE INDEX).
   * Does not return results. Use for schema setup only.
   */
  rawExec(sql: string): void {
    this.sqlite.exec(sql);
  }

  /**
   * Run `fn` inside a transaction. Nested calls become savepoints, so a
   * repository method that opens its own transaction can be composed into
   * a larger one.
   */
  transaction<T>(fn: () => T): T {
    return this.sqlite.transaction(fn)();
  }

  flush(): void {
    // Checkpoint WAL to main database file for clean state.
    this.sqlite.pragma('wal_checkpoint(TRUNCATE)');
  }

  close(): void {
    this.flush();
    this.sqlite.close();
  }
}

/**
 * True when `error` is a SQLite UNIQUE / PRIMARY KEY constraint violation.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

/**
 * Parse a JSON TEXT column, returning `fallback` for NULL or malformed data.
 */
export function parseJsonColumn<T>(value: string | null, fallback: T): T {
  if (value === null || value === '') return fallback;
  try {
    return JSON.parse(value) as T;
  } catch {
    return fallback;
  }
}

/**
 * Narrow a TEXT enum column to its union type. The CHECK constraints keep
 * stored values in range; an unexpected value means a corrupted row.
 */
export function parseEnumColumn<T extends string>(values: readonly T[], value: string, column: string): T {
  const match = values.find(candidate => candidate === value);
  if (match === undefined) {
    throw new Error(`Unexpected value '${value}' in column ${column}`);
  }
  return match;
}

// ============================================================================
// Singleton Instance
// ============================================================================

let db: Database | null = null;

export async function initDb(dbPath: string): Promise<Database> {
  if (!db) {
    db = new Database(dbPath);
    await db.init();
  }
  return db;
}

export function getDb(): Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDb() first.');
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    db.close();
    db = null;
  }
}
