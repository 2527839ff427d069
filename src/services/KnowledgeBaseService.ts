import { Logger } from '../utils/logger.js';
import { NotFoundError, ValidationError, toErrorBody, type ErrorBody } from '../utils/errors.js';
import type { DatabaseManager } from '../database/index.js';
import type { FileRecord, FileRecordInput, FileType, Technology, UpsertResult } from '../schemas/index.js';
import { FileKnowledgeInputSchema } from '../schemas/tools/knowledgeBase.js';
import { FileKnowledgeRepository, type Clock } from '../repositories/FileKnowledgeRepository.js';
import { CategoryIndexService, type KnowledgeStats } from './CategoryIndexService.js';
import { KnowledgeSearchService, compareByRecency, type SearchHit, type SearchOptions } from './KnowledgeSearchService.js';
import { DependencyGraphService, DEFAULT_MAX_DEPTH, type DependencyAnalysis } from './DependencyGraphService.js';

export const DEFAULT_RELATED_LIMIT = 10;
export const DEFAULT_TYPE_LIMIT = 50;
const MAX_LIST_LIMIT = 200;

export interface KnowledgeBaseServiceOptions {
  clock?: Clock;
}

export type BatchItemResult =
  | ({ index: number; path: string | null } & UpsertResult)
  | { index: number; path: string | null; error: ErrorBody['error'] };

export interface BatchSummary {
  created: number;
  unchanged: number;
  replaced: number;
  failed: number;
}

export interface BatchResult {
  results: BatchItemResult[];
  summary: BatchSummary;
}

export interface FileContext {
  record: FileRecord;
  dependents: string[];
}

export interface RelatedFile {
  record: FileRecord;
  signals: number;
  /** Lower-cased tags shared with the queried file. */
  sharedTags: string[];
  /** The queried file lists this record among its dependencies. */
  dependsOn: boolean;
  /** This record lists the queried file among its dependencies. */
  dependedOnBy: boolean;
}

export interface SearchByTypeParams {
  fileType?: FileType;
  technology?: Technology;
  repo?: string;
  limit?: number;
}

export interface SearchParams extends SearchOptions {
  query: string;
}

/**
 * Entry point for every knowledge base operation. Validates caller input,
 * then delegates to the store, search, category and dependency services.
 */
export class KnowledgeBaseService {
  private readonly logger = new Logger('knowledge-base');
  readonly repository: FileKnowledgeRepository;
  private readonly categoryIndex: CategoryIndexService;
  private readonly searchService: KnowledgeSearchService;
  private readonly dependencyGraph: DependencyGraphService;

  constructor(db: DatabaseManager, options: KnowledgeBaseServiceOptions = {}) {
    this.repository = new FileKnowledgeRepository(db, options.clock);
    this.categoryIndex = new CategoryIndexService(this.repository);
    this.searchService = new KnowledgeSearchService(this.repository);
    this.dependencyGraph = new DependencyGraphService(this.repository);
  }

  /**
   * Validates and stores one file record.
   */
  async indexFile(input: unknown): Promise<UpsertResult> {
    const parsed = FileKnowledgeInputSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid file knowledge');
    }

    const data = parsed.data;
    const record: FileRecordInput = {
      path: data.path,
      repo: data.repo,
      fileType: data.file_type,
      technology: data.technology,
      summary: data.summary,
      keyElements: data.key_elements,
      dependencies: data.dependencies,
      tags: data.tags,
      contentHash: data.content_hash,
      metadata: data.metadata,
    };

    const result = await this.repository.upsert(record);
    this.logger.info(`Indexed ${result.record.path}: ${result.outcome}`, { repo: result.record.repo });
    return result;
  }

  /**
   * Indexes every item independently and in order. A failing item is
   * reported in place and never affects its neighbours.
   */
  async indexBatch(items: readonly unknown[]): Promise<BatchResult> {
    const results: BatchItemResult[] = [];
    const summary: BatchSummary = { created: 0, unchanged: 0, replaced: 0, failed: 0 };

    for (const [index, item] of items.entries()) {
      const path = pathOf(item);
      try {
        const result = await this.indexFile(item);
        summary[result.outcome]++;
        results.push({ index, path, ...result });
      } catch (error) {
        summary.failed++;
        this.logger.warn(`Batch item ${index} failed`, { path, error });
        results.push({ index, path, error: toErrorBody(error).error });
      }
    }

    this.logger.info('Batch indexed', summary);
    return { results, summary };
  }

  async search(params: SearchParams): Promise<SearchHit[]> {
    const { query, ...options } = params;
    return this.searchService.search(query, options);
  }

  /**
   * Returns the record for `path` with the indexed files that depend on it.
   */
  async getFileContext(path: string): Promise<FileContext> {
    const record = await this.repository.get(path);
    if (!record) {
      throw new NotFoundError(path);
    }
    const dependents = await this.dependencyGraph.directDependents(path);
    return { record, dependents };
  }

  /**
   * Ranks other records by shared tags and direct dependency edges in either
   * direction. Each shared tag counts once; each edge direction counts once.
   */
  async findRelated(path: string, limit: number = DEFAULT_RELATED_LIMIT): Promise<RelatedFile[]> {
    assertLimit(limit);

    const source = await this.repository.get(path);
    if (!source) {
      this.logger.debug('find_related on unknown path', { path });
      return [];
    }

    const sourceTags = new Set(source.tags.map((tag) => tag.toLowerCase()));
    const sourceDependencies = new Set(source.dependencies);
    const related: RelatedFile[] = [];

    for (const candidate of await this.repository.all()) {
      if (candidate.path === source.path) continue;

      const sharedTags = [...new Set(candidate.tags.map((tag) => tag.toLowerCase()))]
        .filter((tag) => sourceTags.has(tag))
        .sort();
      const dependsOn = sourceDependencies.has(candidate.path);
      const dependedOnBy = candidate.dependencies.includes(source.path);
      const signals = sharedTags.length + (dependsOn ? 1 : 0) + (dependedOnBy ? 1 : 0);

      if (signals > 0) {
        related.push({ record: candidate, signals, sharedTags, dependsOn, dependedOnBy });
      }
    }

    related.sort((a, b) => b.signals - a.signals || compareByRecency(a.record, b.record));
    return related.slice(0, limit);
  }

  async searchByType(params: SearchByTypeParams): Promise<FileRecord[]> {
    if (params.fileType === undefined && params.technology === undefined) {
      throw new ValidationError('At least one of file_type or technology is required', [
        { path: 'file_type', message: 'Required when technology is absent' },
        { path: 'technology', message: 'Required when file_type is absent' },
      ]);
    }
    const limit = params.limit ?? DEFAULT_TYPE_LIMIT;
    assertLimit(limit);

    return this.repository.list({
      fileType: params.fileType,
      technology: params.technology,
      repo: params.repo,
      limit,
    });
  }

  async getStats(): Promise<KnowledgeStats> {
    return this.categoryIndex.computeStats();
  }

  async analyzeDependencies(path: string, maxDepth: number = DEFAULT_MAX_DEPTH): Promise<DependencyAnalysis> {
    return this.dependencyGraph.analyze(path, maxDepth);
  }
}

function pathOf(item: unknown): string | null {
  if (typeof item === 'object' && item !== null && 'path' in item && typeof item.path === 'string') {
    return item.path;
  }
  return null;
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`, [
      { path: 'limit', message: `Expected 1..${MAX_LIST_LIMIT}, received ${limit}` },
    ]);
  }
}
