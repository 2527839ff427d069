import { z } from 'zod';
import {
  fileTypeSchema,
  metadataSchema,
  technologySchema,
  type FileMetadata,
  type FileType,
  type Technology,
  type UpsertOutcome,
} from '../fileKnowledge.js';
import type { MatchField } from '../../services/KnowledgeSearchService.js';
import type { ErrorBody } from '../../utils/errors.js';

const nonBlankString = (maxLength?: number) =>
  (maxLength === undefined ? z.string() : z.string().max(maxLength))
    .refine((value) => value.trim().length > 0, { message: 'Must not be blank' });

// ===============================================
// Knowledge Base Tool Request Schemas
// ===============================================

export const FileKnowledgeInputSchema = z.object({
  path: nonBlankString().describe("Unique key for the file, typically a repository-relative path. Compared by exact match"),
  repo: nonBlankString().describe("Name of the repository the file belongs to"),
  file_type: fileTypeSchema.describe("Kind of file (e.g., 'bicep', 'terraform', 'typescript', 'python', 'markdown')"),
  technology: technologySchema.describe("Technology area the file belongs to (e.g., 'infrastructure-as-code', 'backend', 'frontend', 'devops')"),
  summary: nonBlankString().describe("Free-text summary of what the file does"),
  key_elements: z.array(z.string()).default([]).describe("Notable elements defined in the file: resources, classes, functions, parameters"),
  dependencies: z.array(nonBlankString()).default([]).describe("Paths of files this file depends on. Targets need not be indexed"),
  tags: z.array(nonBlankString()).default([]).describe("Free-form tags; matched case-insensitively"),
  content_hash: nonBlankString(128).describe("Hash of the file content. Re-indexing with the same hash is a no-op"),
  metadata: metadataSchema.default({}).describe("Additional JSON metadata (strings, finite numbers, booleans, arrays and objects; no nulls)"),
}).describe("Store or update the knowledge record for a single file. If a record with the same path and content hash already exists nothing changes; a different hash replaces the record.");

export const IndexBatchSchema = z.object({
  files: z.array(FileKnowledgeInputSchema).describe("Files to index. Each item is validated and stored independently"),
}).describe("Index many files in one call. A failing item does not affect the others; the response reports an outcome or error per item plus summary counts.");

// Items are validated one by one inside the batch so one bad item cannot reject the rest
export const IndexBatchEnvelopeSchema = z.object({
  files: z.array(z.unknown()),
});

export const SearchKnowledgeSchema = z.object({
  query: z.string().describe("Keywords to search for. Split on whitespace and matched case-insensitively against tags, summary, key elements and path"),
  limit: z.number().int().min(1).max(200).default(50).describe("Maximum number of results to return (1-200)"),
  repo: z.string().optional().describe("Only search files from this repository"),
  file_type: fileTypeSchema.optional().describe("Only search files of this type"),
  technology: technologySchema.optional().describe("Only search files in this technology area"),
  tags: z.array(z.string()).optional().describe("Only search files carrying at least one of these tags"),
}).describe("Keyword search over indexed file knowledge. Exact tag matches weigh 3, summary matches 2, key element and path matches 1 each; results are ordered by score, then recency, then path.");

export const GetFileContextSchema = z.object({
  path: z.string().min(1).describe("Exact path of the indexed file"),
}).describe("Get the full knowledge record for a file together with the paths of indexed files that depend on it.");

export const FindRelatedSchema = z.object({
  path: z.string().min(1).describe("Exact path of the file to find relatives for"),
  limit: z.number().int().min(1).max(200).default(10).describe("Maximum number of related files to return (1-200)"),
}).describe("Find files related to a given file through shared tags and direct dependency edges in either direction. Unknown paths yield an empty list.");

export const SearchByTypeSchema = z.object({
  file_type: fileTypeSchema.optional().describe("File type to filter by"),
  technology: technologySchema.optional().describe("Technology area to filter by"),
  repo: z.string().optional().describe("Only return files from this repository"),
  limit: z.number().int().min(1).max(200).default(50).describe("Maximum number of files to return (1-200)"),
}).describe("List indexed files by file type and/or technology, most recently indexed first. At least one of file_type or technology is required.");

export const GetStatsSchema = z.object({}).describe("Aggregate statistics over the knowledge base: totals by repository, file type and technology, last indexing time and declared dependency count.");

export const AnalyzeDependenciesSchema = z.object({
  path: z.string().min(1).describe("Root file path for the traversal"),
  max_depth: z.number().int().min(0).max(50).default(10).describe("Maximum number of hops to follow (0-50)"),
}).describe("Analyze a file's dependencies: its direct dependencies, the files that depend on it, and the breadth-first depth of every transitively reachable dependency.");

export type FileKnowledgeInput = z.infer<typeof FileKnowledgeInputSchema>;
export type SearchKnowledgeInput = z.infer<typeof SearchKnowledgeSchema>;
export type GetFileContextInput = z.infer<typeof GetFileContextSchema>;
export type FindRelatedInput = z.infer<typeof FindRelatedSchema>;
export type SearchByTypeInput = z.infer<typeof SearchByTypeSchema>;
export type AnalyzeDependenciesInput = z.infer<typeof AnalyzeDependenciesSchema>;

// ===============================================
// Knowledge Base Tool Response Types
// ===============================================

export interface FileRecordResponse {
  path: string;
  repo: string;
  file_type: FileType;
  technology: Technology;
  summary: string;
  key_elements: string[];
  dependencies: string[];
  tags: string[];
  content_hash: string;
  indexed_at: string;
  first_indexed_at: string;
  metadata: FileMetadata;
}

export interface IndexFileResponse {
  outcome: UpsertOutcome;
  record: FileRecordResponse;
}

export type BatchItemResponse =
  | { index: number; path: string | null; outcome: UpsertOutcome; record: FileRecordResponse }
  | { index: number; path: string | null; error: ErrorBody['error'] };

export interface IndexBatchResponse {
  results: BatchItemResponse[];
  summary: Record<UpsertOutcome | 'failed', number>;
}

export interface SearchKnowledgeResponse {
  count: number;
  results: Array<{
    record: FileRecordResponse;
    score: number;
    matched_terms: string[];
    matches: Array<{ term: string; fields: MatchField[] }>;
  }>;
}

export interface FileContextResponse {
  record: FileRecordResponse;
  dependents: string[];
}

export interface FindRelatedResponse {
  count: number;
  related: Array<{
    record: FileRecordResponse;
    signals: number;
    shared_tags: string[];
    depends_on: boolean;
    depended_on_by: boolean;
  }>;
}

export interface SearchByTypeResponse {
  count: number;
  files: FileRecordResponse[];
}

export interface StatsResponse {
  total_count: number;
  by_repo: Record<string, number>;
  by_file_type: Record<string, number>;
  by_technology: Record<string, number>;
  most_recent_indexed_at: string | null;
  total_dependencies: number;
}

export interface DependencyAnalysisResponse {
  root: string;
  indexed: boolean;
  direct_dependencies: string[];
  direct_dependents: string[];
  dependency_depth_map: Record<string, number>;
  depth: number;
}
