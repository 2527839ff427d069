import { Logger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import type { DependencyEdges, FileKnowledgeRepository } from '../repositories/FileKnowledgeRepository.js';

export const DEFAULT_MAX_DEPTH = 10;
export const MAX_ALLOWED_DEPTH = 50;

export interface DependencyAnalysis {
  root: string;
  indexed: boolean;
  directDependencies: string[];
  directDependents: string[];
  /** Shortest hop count from the root, in breadth-first visiting order. */
  dependencyDepthMap: Record<string, number>;
  /** Greatest depth reached by the traversal. */
  depth: number;
}

/**
 * Directed graph over file paths. An edge A -> B exists when record A lists B
 * among its dependencies; B need not be indexed.
 */
export class DependencyGraph {
  private readonly outgoing = new Map<string, readonly string[]>();
  private readonly incoming = new Map<string, Set<string>>();

  static fromRecords(records: Iterable<DependencyEdges>): DependencyGraph {
    const graph = new DependencyGraph();
    for (const record of records) {
      graph.addRecord(record.path, record.dependencies);
    }
    return graph;
  }

  private addRecord(path: string, dependencies: readonly string[]): void {
    this.outgoing.set(path, [...dependencies]);
    for (const dependency of dependencies) {
      let dependents = this.incoming.get(dependency);
      if (!dependents) {
        dependents = new Set();
        this.incoming.set(dependency, dependents);
      }
      dependents.add(path);
    }
  }

  hasRecord(path: string): boolean {
    return this.outgoing.has(path);
  }

  /** The record's own dependency list, or [] when the path is not indexed. */
  directDependencies(path: string): string[] {
    return [...(this.outgoing.get(path) ?? [])];
  }

  /** Every indexed path whose dependency list contains `path`, sorted. */
  directDependents(path: string): string[] {
    return [...(this.incoming.get(path) ?? [])].sort();
  }

  /**
   * Breadth-first walk over outgoing edges. The root is depth 0, each node
   * keeps the depth of its first visit and nodes at `maxDepth` are recorded
   * but not expanded, so cycles terminate.
   */
  transitiveDepth(path: string, maxDepth: number = DEFAULT_MAX_DEPTH): Map<string, number> {
    const depths = new Map<string, number>([[path, 0]]);
    const queue: string[] = [path];

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      const depth = depths.get(current) ?? 0;
      if (depth >= maxDepth) continue;

      for (const next of this.outgoing.get(current) ?? []) {
        if (!depths.has(next)) {
          depths.set(next, depth + 1);
          queue.push(next);
        }
      }
    }

    return depths;
  }

  analyze(path: string, maxDepth: number = DEFAULT_MAX_DEPTH): DependencyAnalysis {
    const depths = this.transitiveDepth(path, maxDepth);
    let depth = 0;
    for (const value of depths.values()) {
      if (value > depth) depth = value;
    }

    return {
      root: path,
      indexed: this.hasRecord(path),
      directDependencies: this.directDependencies(path),
      directDependents: this.directDependents(path),
      dependencyDepthMap: Object.fromEntries(depths),
      depth,
    };
  }
}

/**
 * Builds a fresh graph from the store for every query; nothing is cached.
 */
export class DependencyGraphService {
  private readonly logger = new Logger('dependency-graph');

  constructor(private readonly repository: FileKnowledgeRepository) {}

  async loadGraph(): Promise<DependencyGraph> {
    return DependencyGraph.fromRecords(await this.repository.dependencyEdges());
  }

  async directDependents(path: string): Promise<string[]> {
    const graph = await this.loadGraph();
    return graph.directDependents(path);
  }

  async analyze(path: string, maxDepth: number = DEFAULT_MAX_DEPTH): Promise<DependencyAnalysis> {
    if (!Number.isInteger(maxDepth) || maxDepth < 0 || maxDepth > MAX_ALLOWED_DEPTH) {
      throw new ValidationError(`max_depth must be an integer between 0 and ${MAX_ALLOWED_DEPTH}`, [
        { path: 'max_depth', message: `Expected 0..${MAX_ALLOWED_DEPTH}, received ${maxDepth}` },
      ]);
    }

    const graph = await this.loadGraph();
    const analysis = graph.analyze(path, maxDepth);

    this.logger.debug('Analyzed dependencies', {
      root: path,
      indexed: analysis.indexed,
      reached: Object.keys(analysis.dependencyDepthMap).length,
      depth: analysis.depth,
    });

    return analysis;
  }
}
