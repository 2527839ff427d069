import { count, getTableName, type SQL } from 'drizzle-orm';
import type { SQLiteTable } from 'drizzle-orm/sqlite-core';
import { z } from 'zod';
import { Logger } from '../utils/logger.js';
import { KnowledgeBaseError, ValidationError } from '../utils/errors.js';
import type { DatabaseManager } from '../database/index.js';

// Repository configuration interface
export interface RepositoryConfig<TTable extends SQLiteTable, TInsert> {
  table: TTable;
  insertSchema: z.ZodType<TInsert, z.ZodTypeDef, unknown>;
  loggerCategory?: string;
}

export class RepositoryError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly tableName: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'RepositoryError';
  }
}

/**
 * Shared plumbing for Drizzle-backed repositories: insert validation, error
 * wrapping and logging.
 *
 * @template TTable - Drizzle table type
 * @template TInsert - Row shape written by inserts and replaces
 */
export abstract class BaseRepository<TTable extends SQLiteTable, TInsert> {
  protected readonly logger: Logger;
  protected readonly table: TTable;
  protected readonly insertSchema: z.ZodType<TInsert, z.ZodTypeDef, unknown>;
  protected readonly tableName: string;

  constructor(
    protected readonly drizzleManager: DatabaseManager,
    config: RepositoryConfig<TTable, TInsert>
  ) {
    this.table = config.table;
    this.insertSchema = config.insertSchema;
    this.tableName = getTableName(config.table);
    this.logger = new Logger(config.loggerCategory || `repository-${this.tableName}`);
  }

  /**
   * Count records, optionally restricted by a where clause
   */
  async count(where?: SQL): Promise<number> {
    const table: SQLiteTable = this.table;
    return this.run('count', () => {
      const result = this.drizzleManager.drizzle
        .select({ value: count() })
        .from(table)
        .where(where)
        .get();
      return result?.value ?? 0;
    });
  }

  protected validateInsert(data: TInsert): TInsert {
    const parsed = this.insertSchema.safeParse(data);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, `Invalid ${this.tableName} row`);
    }
    return parsed.data;
  }

  /**
   * Runs a storage operation, passing domain errors through and wrapping
   * everything else in a RepositoryError.
   */
  protected run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof KnowledgeBaseError || error instanceof RepositoryError) {
        throw error;
      }
      this.logger.error(`Failed to ${operation}`, { table: this.tableName, error });
      throw new RepositoryError(
        `Failed to ${operation} in ${this.tableName}: ${error instanceof Error ? error.message : String(error)}`,
        operation,
        this.tableName,
        error
      );
    }
  }
}
