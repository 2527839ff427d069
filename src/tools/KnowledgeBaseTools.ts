/**
 * MCP tools for the repository knowledge base
 * Thin adapters over KnowledgeBaseService: parse arguments, call the facade,
 * shape the snake_case response.
 */

import { z } from 'zod';
import type { McpTool, McpToolCollection } from '../schemas/tools/index.js';
import type { FileRecord } from '../schemas/index.js';
import { toToolInputSchema } from '../utils/jsonSchemaUtils.js';
import { ValidationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import type { KnowledgeBaseService } from '../services/KnowledgeBaseService.js';
import type { KnowledgeStats } from '../services/CategoryIndexService.js';
import type { DependencyAnalysis } from '../services/DependencyGraphService.js';
import {
  AnalyzeDependenciesSchema,
  FileKnowledgeInputSchema,
  FindRelatedSchema,
  GetFileContextSchema,
  GetStatsSchema,
  IndexBatchEnvelopeSchema,
  IndexBatchSchema,
  SearchByTypeSchema,
  SearchKnowledgeSchema,
  type DependencyAnalysisResponse,
  type FileContextResponse,
  type FileRecordResponse,
  type FindRelatedResponse,
  type IndexBatchResponse,
  type IndexFileResponse,
  type SearchByTypeResponse,
  type SearchKnowledgeResponse,
  type StatsResponse,
} from '../schemas/tools/knowledgeBase.js';

const logger = new Logger('knowledge-base-tools');

export function toRecordResponse(record: FileRecord): FileRecordResponse {
  return {
    path: record.path,
    repo: record.repo,
    file_type: record.fileType,
    technology: record.technology,
    summary: record.summary,
    key_elements: record.keyElements,
    dependencies: record.dependencies,
    tags: record.tags,
    content_hash: record.contentHash,
    indexed_at: record.indexedAt,
    first_indexed_at: record.firstIndexedAt,
    metadata: record.metadata,
  };
}

export function toStatsResponse(stats: KnowledgeStats): StatsResponse {
  return {
    total_count: stats.totalCount,
    by_repo: stats.byRepo,
    by_file_type: stats.byFileType,
    by_technology: stats.byTechnology,
    most_recent_indexed_at: stats.mostRecentIndexedAt,
    total_dependencies: stats.totalDependencies,
  };
}

export function toAnalysisResponse(analysis: DependencyAnalysis): DependencyAnalysisResponse {
  return {
    root: analysis.root,
    indexed: analysis.indexed,
    direct_dependencies: analysis.directDependencies,
    direct_dependents: analysis.directDependents,
    dependency_depth_map: analysis.dependencyDepthMap,
    depth: analysis.depth,
  };
}

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown, tool: string): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, `Invalid arguments for ${tool}`);
  }
  return parsed.data;
}

export class KnowledgeBaseMcpTools implements McpToolCollection {
  constructor(private readonly knowledgeBase: KnowledgeBaseService) {}

  /**
   * Get all knowledge base MCP tools
   */
  getTools(): McpTool[] {
    return [
      {
        name: 'index_file',
        description: 'Store or update the knowledge record for one file. Same path and content_hash is a no-op (outcome "unchanged"); a new hash replaces the record (outcome "replaced"). Returns: outcome, record.',
        inputSchema: toToolInputSchema(FileKnowledgeInputSchema),
        handler: this.indexFile.bind(this),
        annotations: { idempotentHint: true, destructiveHint: false },
      },
      {
        name: 'index_batch',
        description: 'Index many files at once. Items are processed independently and in order; invalid items are reported without affecting the rest. Returns: results[{index, path, outcome, record} | {index, path, error}], summary{created, unchanged, replaced, failed}.',
        inputSchema: toToolInputSchema(IndexBatchSchema),
        handler: this.indexBatch.bind(this),
        annotations: { idempotentHint: true, destructiveHint: false },
      },
      {
        name: 'search_knowledge',
        description: 'Keyword search over indexed files. Per query term: exact tag +3, summary substring +2, key element substring +1, path substring +1. Optional filters: repo, file_type, technology, tags. Returns: count, results[{record, score, matched_terms, matches}].',
        inputSchema: toToolInputSchema(SearchKnowledgeSchema),
        handler: this.searchKnowledge.bind(this),
        annotations: { readOnlyHint: true },
      },
      {
        name: 'get_file_context',
        description: 'Get the full knowledge record for an exact path plus the indexed files that depend on it. Returns: record, dependents[].',
        inputSchema: toToolInputSchema(GetFileContextSchema),
        handler: this.getFileContext.bind(this),
        annotations: { readOnlyHint: true },
      },
      {
        name: 'find_related',
        description: 'Find files related to a path by shared tags (one signal per tag) and direct dependency edges in either direction (one signal each). Returns: count, related[{record, signals, shared_tags, depends_on, depended_on_by}].',
        inputSchema: toToolInputSchema(FindRelatedSchema),
        handler: this.findRelated.bind(this),
        annotations: { readOnlyHint: true },
      },
      {
        name: 'search_by_type',
        description: 'List files by file_type and/or technology (at least one), optionally within one repo, most recently indexed first. Returns: count, files[].',
        inputSchema: toToolInputSchema(SearchByTypeSchema),
        handler: this.searchByType.bind(this),
        annotations: { readOnlyHint: true },
      },
      {
        name: 'get_stats',
        description: 'Knowledge base statistics. Returns: total_count, by_repo, by_file_type, by_technology, most_recent_indexed_at, total_dependencies.',
        inputSchema: toToolInputSchema(GetStatsSchema),
        handler: this.getStats.bind(this),
        annotations: { readOnlyHint: true },
      },
      {
        name: 'analyze_dependencies',
        description: 'Breadth-first dependency analysis from a root path, bounded by max_depth (default 10). Returns: root, indexed, direct_dependencies, direct_dependents, dependency_depth_map, depth.',
        inputSchema: toToolInputSchema(AnalyzeDependenciesSchema),
        handler: this.analyzeDependencies.bind(this),
        annotations: { readOnlyHint: true },
      },
    ];
  }

  private async indexFile(args: Record<string, unknown>): Promise<IndexFileResponse> {
    const result = await this.knowledgeBase.indexFile(args);
    return { outcome: result.outcome, record: toRecordResponse(result.record) };
  }

  private async indexBatch(args: Record<string, unknown>): Promise<IndexBatchResponse> {
    const { files } = parseArgs(IndexBatchEnvelopeSchema, args, 'index_batch');
    const batch = await this.knowledgeBase.indexBatch(files);

    return {
      results: batch.results.map((item) =>
        'error' in item
          ? { index: item.index, path: item.path, error: item.error }
          : { index: item.index, path: item.path, outcome: item.outcome, record: toRecordResponse(item.record) }
      ),
      summary: batch.summary,
    };
  }

  private async searchKnowledge(args: Record<string, unknown>): Promise<SearchKnowledgeResponse> {
    const input = parseArgs(SearchKnowledgeSchema, args, 'search_knowledge');
    const hits = await this.knowledgeBase.search({
      query: input.query,
      limit: input.limit,
      repo: input.repo,
      fileType: input.file_type,
      technology: input.technology,
      tags: input.tags,
    });

    logger.debug('search_knowledge', { query: input.query, count: hits.length });
    return {
      count: hits.length,
      results: hits.map((hit) => ({
        record: toRecordResponse(hit.record),
        score: hit.score,
        matched_terms: hit.matchedTerms,
        matches: hit.matches,
      })),
    };
  }

  private async getFileContext(args: Record<string, unknown>): Promise<FileContextResponse> {
    const { path } = parseArgs(GetFileContextSchema, args, 'get_file_context');
    const context = await this.knowledgeBase.getFileContext(path);
    return { record: toRecordResponse(context.record), dependents: context.dependents };
  }

  private async findRelated(args: Record<string, unknown>): Promise<FindRelatedResponse> {
    const { path, limit } = parseArgs(FindRelatedSchema, args, 'find_related');
    const related = await this.knowledgeBase.findRelated(path, limit);
    return {
      count: related.length,
      related: related.map((item) => ({
        record: toRecordResponse(item.record),
        signals: item.signals,
        shared_tags: item.sharedTags,
        depends_on: item.dependsOn,
        depended_on_by: item.dependedOnBy,
      })),
    };
  }

  private async searchByType(args: Record<string, unknown>): Promise<SearchByTypeResponse> {
    const input = parseArgs(SearchByTypeSchema, args, 'search_by_type');
    const files = await this.knowledgeBase.searchByType({
      fileType: input.file_type,
      technology: input.technology,
      repo: input.repo,
      limit: input.limit,
    });
    return { count: files.length, files: files.map(toRecordResponse) };
  }

  private async getStats(args: Record<string, unknown>): Promise<StatsResponse> {
    parseArgs(GetStatsSchema, args, 'get_stats');
    return toStatsResponse(await this.knowledgeBase.getStats());
  }

  private async analyzeDependencies(args: Record<string, unknown>): Promise<DependencyAnalysisResponse> {
    const { path, max_depth } = parseArgs(AnalyzeDependenciesSchema, args, 'analyze_dependencies');
    return toAnalysisResponse(await this.knowledgeBase.analyzeDependencies(path, max_depth));
  }
}
