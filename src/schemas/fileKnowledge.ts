import { z } from 'zod';
import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { createInsertSchema } from 'drizzle-zod';

export const FILE_TYPES = [
  'bicep',
  'terraform',
  'helm',
  'yaml',
  'csharp',
  'python',
  'javascript',
  'typescript',
  'powershell',
  'bash',
  'markdown',
  'dockerfile',
  'env',
  'json',
  'other',
] as const;

export const TECHNOLOGIES = [
  'infrastructure-as-code',
  'backend',
  'frontend',
  'devops',
  'testing',
  'documentation',
  'configuration',
  'other',
] as const;

export const fileTypeSchema = z.enum(FILE_TYPES);
export const technologySchema = z.enum(TECHNOLOGIES);

export type FileType = z.infer<typeof fileTypeSchema>;
export type Technology = z.infer<typeof technologySchema>;

/**
 * Values allowed inside a record's metadata bag. Nulls, NaN and anything
 * that does not survive a JSON round trip are rejected.
 */
export type MetadataValue =
  | string
  | number
  | boolean
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export const metadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.array(metadataValueSchema),
    z.record(z.string(), metadataValueSchema),
  ])
);

export const metadataSchema = z.record(z.string(), metadataValueSchema);
export type FileMetadata = z.infer<typeof metadataSchema>;

const nonBlank = (schema: z.ZodString) =>
  schema.refine((value) => value.trim().length > 0, { message: 'Must not be blank' });

// One row per indexed file, keyed by its opaque path
export const fileKnowledge = sqliteTable('file_knowledge', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  path: text('path').notNull().unique(),
  repo: text('repo').notNull(),
  fileType: text('file_type', { enum: FILE_TYPES }).notNull(),
  technology: text('technology', { enum: TECHNOLOGIES }).notNull(),
  summary: text('summary').notNull(),
  keyElements: text('key_elements', { mode: 'json' }).$type<string[]>().notNull(),
  dependencies: text('dependencies', { mode: 'json' }).$type<string[]>().notNull(),
  tags: text('tags', { mode: 'json' }).$type<string[]>().notNull(),
  contentHash: text('content_hash').notNull(),
  indexedAt: text('indexed_at').notNull(), // ISO datetime string
  firstIndexedAt: text('first_indexed_at').notNull(), // ISO datetime string
  metadata: text('metadata', { mode: 'json' }).$type<FileMetadata>().notNull(),
}, (table) => ({
  repoFileTypeIdx: index('idx_file_knowledge_repo_file_type').on(table.repo, table.fileType),
  technologyIdx: index('idx_file_knowledge_technology').on(table.technology),
  indexedAtIdx: index('idx_file_knowledge_indexed_at').on(table.indexedAt),
}));

export const insertFileKnowledgeSchema = createInsertSchema(fileKnowledge, {
  path: (schema) => nonBlank(schema),
  repo: (schema) => nonBlank(schema),
  summary: (schema) => nonBlank(schema),
  contentHash: (schema) => nonBlank(schema.max(128)),
  keyElements: z.array(z.string()),
  dependencies: z.array(z.string()),
  tags: z.array(z.string()),
  indexedAt: z.string().datetime(),
  firstIndexedAt: z.string().datetime(),
  metadata: metadataSchema,
});

export type FileKnowledgeRow = typeof fileKnowledge.$inferSelect;
export type NewFileKnowledgeRow = typeof fileKnowledge.$inferInsert;

/**
 * Canonical per-file knowledge record as seen by services and tools.
 */
export interface FileRecord {
  path: string;
  repo: string;
  fileType: FileType;
  technology: Technology;
  summary: string;
  keyElements: string[];
  dependencies: string[];
  tags: string[];
  contentHash: string;
  indexedAt: string;
  firstIndexedAt: string;
  metadata: FileMetadata;
}

/** Fields a caller supplies; timestamps are assigned by the store. */
export type FileRecordInput = Omit<FileRecord, 'indexedAt' | 'firstIndexedAt'>;

export type UpsertOutcome = 'created' | 'unchanged' | 'replaced';

export interface UpsertResult {
  outcome: UpsertOutcome;
  record: FileRecord;
}

export function toFileRecord(row: FileKnowledgeRow): FileRecord {
  return {
    path: row.path,
    repo: row.repo,
    fileType: row.fileType,
    technology: row.technology,
    summary: row.summary,
    keyElements: row.keyElements,
    dependencies: row.dependencies,
    tags: row.tags,
    contentHash: row.contentHash,
    indexedAt: row.indexedAt,
    firstIndexedAt: row.firstIndexedAt,
    metadata: row.metadata,
  };
}
