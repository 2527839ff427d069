import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { dirname } from 'path';
import { mkdirSync, existsSync } from 'fs';
import { Logger } from '../utils/logger.js';
import { allTables } from '../schemas/index.js';

export interface DatabaseConfig {
  path: string;
  wal?: boolean;
  timeout?: number;
  verbose?: boolean;
  busyTimeoutMs?: number;
}

export type KnowledgeDb = BaseSQLiteDatabase<'sync', Database.RunResult, typeof allTables>;

export interface Migration {
  version: string;
  sql: string;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: '001_file_knowledge',
    sql: `
      CREATE TABLE IF NOT EXISTS file_knowledge (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        path TEXT NOT NULL UNIQUE,
        repo TEXT NOT NULL,
        file_type TEXT NOT NULL,
        technology TEXT NOT NULL,
        summary TEXT NOT NULL,
        key_elements TEXT NOT NULL DEFAULT '[]',
        dependencies TEXT NOT NULL DEFAULT '[]',
        tags TEXT NOT NULL DEFAULT '[]',
        content_hash TEXT NOT NULL,
        indexed_at TEXT NOT NULL,
        first_indexed_at TEXT NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}'
      );

      CREATE INDEX IF NOT EXISTS idx_file_knowledge_repo_file_type ON file_knowledge(repo, file_type);
      CREATE INDEX IF NOT EXISTS idx_file_knowledge_technology ON file_knowledge(technology);
      CREATE INDEX IF NOT EXISTS idx_file_knowledge_indexed_at ON file_knowledge(indexed_at);
    `,
  },
];

const RETRYABLE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED']);
const IN_MEMORY_PATH = ':memory:';

export class DatabaseManager {
  private readonly sqlite: Database.Database;
  private readonly drizzleDb: KnowledgeDb;
  private readonly logger: Logger;
  private readonly config: Required<Omit<DatabaseConfig, 'path'>>;
  readonly dbPath: string;
  private initialized = false;

  constructor(config: DatabaseConfig) {
    this.logger = new Logger('database');
    this.dbPath = config.path;
    this.config = {
      wal: config.path !== IN_MEMORY_PATH,
      timeout: 30000,
      verbose: false,
      busyTimeoutMs: 30000,
      ...config,
    };

    if (this.dbPath !== IN_MEMORY_PATH) {
      const dbDir = dirname(this.dbPath);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.sqlite = this.open();
    this.initializePragmas();

    this.drizzleDb = drizzle(this.sqlite, {
      schema: allTables,
      logger: this.config.verbose
        ? { logQuery: (query: string, params: unknown[]) => this.logger.debug('SQL Query', { query, params }) }
        : false,
    });

    this.logger.debug('Database opened', { dbPath: this.dbPath, walMode: this.config.wal });
  }

  private open(): Database.Database {
    try {
      return new Database(this.dbPath, {
        verbose: this.config.verbose ? (message?: unknown) => this.logger.debug(String(message)) : undefined,
        timeout: this.config.timeout,
        fileMustExist: false,
      });
    } catch (error) {
      this.logger.error('Failed to open database', { dbPath: this.dbPath, error });
      throw error;
    }
  }

  private initializePragmas(): void {
    if (this.config.wal) {
      this.sqlite.pragma('journal_mode = WAL');
    }
    this.sqlite.pragma(`busy_timeout = ${this.config.busyTimeoutMs}`);
    this.sqlite.pragma('synchronous = NORMAL');
    this.sqlite.pragma('cache_size = -64000'); // 64MB cache
    this.sqlite.pragma('temp_store = MEMORY');
  }

  /**
   * Creates the migration ledger and applies every pending migration in order.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      this.sqlite.exec(`
        CREATE TABLE IF NOT EXISTS _migrations (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          version TEXT NOT NULL UNIQUE,
          applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
        )
      `);

      const applied = new Set(this.getAppliedMigrations());
      for (const migration of MIGRATIONS) {
        if (applied.has(migration.version)) continue;

        this.logger.info(`Applying migration: ${migration.version}`);
        const apply = this.sqlite.transaction(() => {
          this.sqlite.exec(migration.sql);
          this.sqlite.prepare('INSERT OR IGNORE INTO _migrations (version) VALUES (?)').run(migration.version);
        });
        apply.immediate();
      }

      this.initialized = true;
    } catch (error) {
      this.logger.error('Failed to initialize database', { dbPath: this.dbPath, error });
      throw error;
    }
  }

  getAppliedMigrations(): string[] {
    const rows: unknown[] = this.sqlite.prepare('SELECT version FROM _migrations ORDER BY id').all();
    return rows.flatMap((row) =>
      typeof row === 'object' && row !== null && 'version' in row && typeof row.version === 'string'
        ? [row.version]
        : []
    );
  }

  /**
   * Runs `fn` inside a BEGIN IMMEDIATE transaction so concurrent writers on the
   * same file serialise. Busy/locked failures are retried with backoff.
   */
  transaction<T>(fn: (tx: KnowledgeDb) => T, retries = 5): T {
    let lastError: unknown;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        return this.drizzleDb.transaction((tx) => fn(tx), { behavior: 'immediate' });
      } catch (error) {
        lastError = error;

        if (attempt < retries && this.isRetryableError(error)) {
          const delay = Math.min(50 * Math.pow(2, attempt), 2000) + Math.random() * 50;
          this.logger.warn(`Transaction busy, retrying in ${Math.round(delay)}ms`, {
            attempt: attempt + 1,
            totalAttempts: retries + 1,
            errorCode: this.getErrorCode(error),
          });
          this.sleep(delay);
          continue;
        }
        break;
      }
    }

    throw lastError;
  }

  private isRetryableError(error: unknown): boolean {
    return error instanceof Database.SqliteError && RETRYABLE_CODES.has(error.code);
  }

  private getErrorCode(error: unknown): string {
    return error instanceof Database.SqliteError ? error.code : 'UNKNOWN';
  }

  private sleep(ms: number): void {
    // better-sqlite3 is synchronous, so the retry wait is too
    const start = Date.now();
    while (Date.now() - start < ms) {
      // busy wait
    }
  }

  async healthCheck(): Promise<{ status: 'healthy' | 'unhealthy'; details: Record<string, string | boolean> }> {
    try {
      const journalMode: unknown = this.sqlite.pragma('journal_mode', { simple: true });
      return {
        status: 'healthy',
        details: {
          initialized: this.initialized,
          journalMode: String(journalMode),
        },
      };
    } catch (error) {
      this.logger.error('Health check failed', error);
      return {
        status: 'unhealthy',
        details: {
          initialized: this.initialized,
          error: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }

  get drizzle(): KnowledgeDb {
    return this.drizzleDb;
  }

  close(): void {
    if (this.sqlite.open) {
      this.sqlite.close();
      this.logger.debug('Database closed', { dbPath: this.dbPath });
    }
  }
}
