import { Logger } from '../utils/logger.js';
import type { FileKnowledgeRepository, GroupCount } from '../repositories/FileKnowledgeRepository.js';

export interface KnowledgeStats {
  totalCount: number;
  byRepo: Record<string, number>;
  byFileType: Record<string, number>;
  byTechnology: Record<string, number>;
  mostRecentIndexedAt: string | null;
  totalDependencies: number;
}

/**
 * Aggregate view over the record store. Computed from SQL aggregates on every
 * call, so it can never drift from the records themselves.
 */
export class CategoryIndexService {
  private readonly logger = new Logger('category-index');

  constructor(private readonly repository: FileKnowledgeRepository) {}

  async computeStats(): Promise<KnowledgeStats> {
    const [byRepo, byFileType, byTechnology, totals] = await Promise.all([
      this.repository.countBy('repo'),
      this.repository.countBy('fileType'),
      this.repository.countBy('technology'),
      this.repository.totals(),
    ]);

    const stats: KnowledgeStats = {
      totalCount: totals.totalCount,
      byRepo: toCountMap(byRepo),
      byFileType: toCountMap(byFileType),
      byTechnology: toCountMap(byTechnology),
      mostRecentIndexedAt: totals.mostRecentIndexedAt,
      totalDependencies: totals.totalDependencies,
    };

    this.logger.debug('Computed knowledge stats', { totalCount: stats.totalCount });
    return stats;
  }
}

function toCountMap(groups: GroupCount[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const group of groups) {
    counts[group.key] = group.count;
  }
  return counts;
}
