import { Logger } from '../utils/logger.js';
import { InvalidQueryError, ValidationError } from '../utils/errors.js';
import type { FileRecord, FileType, Technology } from '../schemas/index.js';
import type { FileKnowledgeRepository } from '../repositories/FileKnowledgeRepository.js';

export type MatchField = 'tag' | 'summary' | 'key_element' | 'path';

export const MATCH_WEIGHTS: Readonly<Record<MatchField, number>> = {
  tag: 3,
  summary: 2,
  key_element: 1,
  path: 1,
};

export const DEFAULT_SEARCH_LIMIT = 50;
export const MAX_SEARCH_LIMIT = 200;

export interface TermMatch {
  term: string;
  fields: MatchField[];
}

export interface ScoredMatch {
  score: number;
  matchedTerms: string[];
  matches: TermMatch[];
}

export interface SearchHit extends ScoredMatch {
  record: FileRecord;
}

export interface SearchOptions {
  limit?: number;
  repo?: string;
  fileType?: FileType;
  technology?: Technology;
  /** Keep records carrying at least one of these tags (case-insensitive). */
  tags?: string[];
}

/**
 * Lower-cases the query and splits it on whitespace. Repeated terms count once.
 */
export function tokenizeQuery(query: string): string[] {
  const terms: string[] = [];
  for (const term of query.toLowerCase().split(/\s+/)) {
    if (term.length > 0 && !terms.includes(term)) {
      terms.push(term);
    }
  }
  return terms;
}

/**
 * Scores one record against already tokenized terms. Every term contributes
 * independently: +3 for an exact tag, +2 when inside the summary, +1 when
 * inside any key element and +1 when inside the path.
 */
export function scoreRecord(record: FileRecord, terms: readonly string[]): ScoredMatch {
  const tags = new Set(record.tags.map((tag) => tag.toLowerCase()));
  const summary = record.summary.toLowerCase();
  const keyElements = record.keyElements.map((element) => element.toLowerCase());
  const path = record.path.toLowerCase();

  let score = 0;
  const matches: TermMatch[] = [];

  for (const term of terms) {
    const fields: MatchField[] = [];
    if (tags.has(term)) fields.push('tag');
    if (summary.includes(term)) fields.push('summary');
    if (keyElements.some((element) => element.includes(term))) fields.push('key_element');
    if (path.includes(term)) fields.push('path');

    if (fields.length > 0) {
      score += fields.reduce((sum, field) => sum + MATCH_WEIGHTS[field], 0);
      matches.push({ term, fields });
    }
  }

  return { score, matchedTerms: matches.map((match) => match.term), matches };
}

/** Most recently indexed first, then by path. */
export function compareByRecency(a: FileRecord, b: FileRecord): number {
  if (a.indexedAt !== b.indexedAt) return a.indexedAt > b.indexedAt ? -1 : 1;
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  return 0;
}

export function hasAnyTag(record: FileRecord, wanted: ReadonlySet<string>): boolean {
  return record.tags.some((tag) => wanted.has(tag.toLowerCase()));
}

export class KnowledgeSearchService {
  private readonly logger = new Logger('knowledge-search');

  constructor(private readonly repository: FileKnowledgeRepository) {}

  /**
   * Ranks every record matching the filters by keyword score. Records scoring
   * zero are dropped; ties fall back to recency then path.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    const terms = tokenizeQuery(query);
    if (terms.length === 0) {
      throw new InvalidQueryError('Search query must contain at least one term');
    }

    const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SEARCH_LIMIT) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_SEARCH_LIMIT}`, [
        { path: 'limit', message: `Expected 1..${MAX_SEARCH_LIMIT}, received ${limit}` },
      ]);
    }

    const candidates = await this.repository.list({
      repo: options.repo,
      fileType: options.fileType,
      technology: options.technology,
    });

    const wantedTags = options.tags && options.tags.length > 0
      ? new Set(options.tags.map((tag) => tag.toLowerCase()))
      : undefined;

    const hits: SearchHit[] = [];
    for (const record of candidates) {
      if (wantedTags && !hasAnyTag(record, wantedTags)) continue;
      const scored = scoreRecord(record, terms);
      if (scored.score > 0) {
        hits.push({ record, ...scored });
      }
    }

    hits.sort((a, b) => b.score - a.score || compareByRecency(a.record, b.record));

    this.logger.debug('Search completed', {
      terms,
      candidates: candidates.length,
      hits: hits.length,
    });

    return hits.slice(0, limit);
  }
}
