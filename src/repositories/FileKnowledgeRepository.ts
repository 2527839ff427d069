import { and, asc, count, desc, eq, inArray, max, sql, type SQL } from 'drizzle-orm';
import type { DatabaseManager } from '../database/index.js';
import {
  fileKnowledge,
  insertFileKnowledgeSchema,
  toFileRecord,
  type FileRecord,
  type FileRecordInput,
  type FileType,
  type NewFileKnowledgeRow,
  type Technology,
  type UpsertResult,
} from '../schemas/index.js';
import { BaseRepository, RepositoryError } from './BaseRepository.js';

export interface FileRecordFilter {
  repo?: string;
  fileType?: FileType;
  technology?: Technology;
  limit?: number;
}

export interface DependencyEdges {
  path: string;
  dependencies: string[];
}

export interface GroupCount {
  key: string;
  count: number;
}

export interface KnowledgeTotals {
  totalCount: number;
  mostRecentIndexedAt: string | null;
  totalDependencies: number;
}

export type Clock = () => Date;

// Keeps IN (...) lists well under SQLite's bound-parameter limit
const LOOKUP_CHUNK_SIZE = 500;

/**
 * Canonical store of per-file knowledge, keyed by exact path.
 */
export class FileKnowledgeRepository extends BaseRepository<typeof fileKnowledge, NewFileKnowledgeRow> {
  constructor(
    drizzleManager: DatabaseManager,
    private readonly clock: Clock = () => new Date()
  ) {
    super(drizzleManager, {
      table: fileKnowledge,
      insertSchema: insertFileKnowledgeSchema,
      loggerCategory: 'file-knowledge-repository',
    });
  }

  /**
   * Creates, replaces or leaves a record untouched depending on whether the
   * path exists and whether its content hash changed. The read and the write
   * share one IMMEDIATE transaction.
   */
  async upsert(input: FileRecordInput): Promise<UpsertResult> {
    return this.run('upsert', () =>
      this.drizzleManager.transaction((tx): UpsertResult => {
        const existing = tx.select().from(fileKnowledge).where(eq(fileKnowledge.path, input.path)).get();

        if (existing && existing.contentHash === input.contentHash) {
          return { outcome: 'unchanged', record: toFileRecord(existing) };
        }

        const now = this.clock().toISOString();
        const row = this.validateInsert({
          path: input.path,
          repo: input.repo,
          fileType: input.fileType,
          technology: input.technology,
          summary: input.summary,
          keyElements: input.keyElements,
          dependencies: input.dependencies,
          tags: input.tags,
          contentHash: input.contentHash,
          indexedAt: now,
          firstIndexedAt: existing ? existing.firstIndexedAt : now,
          metadata: input.metadata,
        });

        if (!existing) {
          const created = tx.insert(fileKnowledge).values(row).returning().get();
          if (!created) {
            throw new RepositoryError('Insert returned no row', 'upsert', this.tableName);
          }
          this.logger.debug('Created file record', { path: row.path });
          return { outcome: 'created', record: toFileRecord(created) };
        }

        const replaced = tx
          .update(fileKnowledge)
          .set({
            repo: row.repo,
            fileType: row.fileType,
            technology: row.technology,
            summary: row.summary,
            keyElements: row.keyElements,
            dependencies: row.dependencies,
            tags: row.tags,
            contentHash: row.contentHash,
            indexedAt: row.indexedAt,
            metadata: row.metadata,
          })
          .where(eq(fileKnowledge.path, row.path))
          .returning()
          .get();
        if (!replaced) {
          throw new RepositoryError('Update returned no row', 'upsert', this.tableName);
        }
        this.logger.debug('Replaced file record', { path: row.path });
        return { outcome: 'replaced', record: toFileRecord(replaced) };
      })
    );
  }

  async get(path: string): Promise<FileRecord | null> {
    return this.run('get', () => {
      const row = this.drizzleManager.drizzle
        .select()
        .from(fileKnowledge)
        .where(eq(fileKnowledge.path, path))
        .get();
      return row ? toFileRecord(row) : null;
    });
  }

  /**
   * Looks up several paths at once. Unknown paths are simply absent from the map.
   */
  async getMany(paths: readonly string[]): Promise<Map<string, FileRecord>> {
    const unique = [...new Set(paths)];
    return this.run('getMany', () => {
      const found = new Map<string, FileRecord>();
      for (let offset = 0; offset < unique.length; offset += LOOKUP_CHUNK_SIZE) {
        const chunk = unique.slice(offset, offset + LOOKUP_CHUNK_SIZE);
        const rows = this.drizzleManager.drizzle
          .select()
          .from(fileKnowledge)
          .where(inArray(fileKnowledge.path, chunk))
          .all();
        for (const row of rows) {
          found.set(row.path, toFileRecord(row));
        }
      }
      return found;
    });
  }

  /**
   * Lists records matching every given filter, most recently indexed first.
   */
  async list(filter: FileRecordFilter = {}): Promise<FileRecord[]> {
    const conditions: SQL[] = [];
    if (filter.repo !== undefined) conditions.push(eq(fileKnowledge.repo, filter.repo));
    if (filter.fileType !== undefined) conditions.push(eq(fileKnowledge.fileType, filter.fileType));
    if (filter.technology !== undefined) conditions.push(eq(fileKnowledge.technology, filter.technology));

    return this.run('list', () => {
      const query = this.drizzleManager.drizzle
        .select()
        .from(fileKnowledge)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(fileKnowledge.indexedAt), asc(fileKnowledge.path));

      const rows = filter.limit !== undefined ? query.limit(filter.limit).all() : query.all();
      return rows.map(toFileRecord);
    });
  }

  async all(): Promise<FileRecord[]> {
    return this.list();
  }

  /**
   * Every record's declared outgoing edges, for building the dependency graph.
   */
  async dependencyEdges(): Promise<DependencyEdges[]> {
    return this.run('dependencyEdges', () =>
      this.drizzleManager.drizzle
        .select({ path: fileKnowledge.path, dependencies: fileKnowledge.dependencies })
        .from(fileKnowledge)
        .orderBy(asc(fileKnowledge.path))
        .all()
    );
  }

  async countBy(dimension: 'repo' | 'fileType' | 'technology'): Promise<GroupCount[]> {
    const column = fileKnowledge[dimension];
    return this.run('countBy', () =>
      this.drizzleManager.drizzle
        .select({ key: column, count: count() })
        .from(fileKnowledge)
        .groupBy(column)
        .orderBy(asc(column))
        .all()
    );
  }

  async totals(): Promise<KnowledgeTotals> {
    return this.run('totals', () => {
      const result = this.drizzleManager.drizzle
        .select({
          totalCount: count(),
          mostRecentIndexedAt: max(fileKnowledge.indexedAt),
          totalDependencies: sql<number>`coalesce(sum(json_array_length(${fileKnowledge.dependencies})), 0)`.mapWith(Number),
        })
        .from(fileKnowledge)
        .get();

      return {
        totalCount: result?.totalCount ?? 0,
        mostRecentIndexedAt: result?.mostRecentIndexedAt ?? null,
        totalDependencies: result?.totalDependencies ?? 0,
      };
    });
  }
}
