/** Read-only readiness and impact answers over a fresh graph snapshot per call. */

import type { DependencyGraph } from '../utils/dependencyGraph.js';
import { NotFoundError } from '../utils/errors.js';

export interface GraphSnapshot {
  graph: DependencyGraph;
  /** Archived specs stay in the graph but are never offered as work. */
  archived: ReadonlySet<string>;
}

export type SnapshotProvider = () => GraphSnapshot;

export interface BlockedSpec {
  specId: string;
  unmet: string[];
}

export class ReadinessEngine {
  constructor(private readonly snapshot: SnapshotProvider) {}

  /** Open specs whose dependencies are all complete. */
  readySpecs(): string[] {
    const { graph, archived } = this.snapshot();
    return graph.ready().filter((id) => isOpen(graph, archived, id));
  }

  /** Open specs with at least one incomplete dependency. */
  blockedSpecs(): BlockedSpec[] {
    const { graph, archived } = this.snapshot();
    const result: BlockedSpec[] = [];
    for (const [specId, unmet] of graph.blocked()) {
      if (isOpen(graph, archived, specId)) result.push({ specId, unmet });
    }
    return result;
  }

  /** Every spec that transitively depends on `specId`. */
  impact(specId: string): string[] {
    return this.known(specId).impactOf(specId);
  }

  /** Everything `specId` transitively depends on, dependencies first. */
  dependencyChainOf(specId: string): string[] {
    const graph = this.known(specId);
    const upstream = new Set(graph.upstreamOf(specId));
    return graph.topologicalOrder().filter((id) => upstream.has(id));
  }

  unmetDependencies(specId: string): string[] {
    return this.known(specId).unmetDependencies(specId);
  }

  isBlocked(specId: string): boolean {
    return this.unmetDependencies(specId).length > 0;
  }

  private known(specId: string): DependencyGraph {
    const { graph } = this.snapshot();
    if (!graph.hasNode(specId)) throw new NotFoundError('spec', specId);
    return graph;
  }
}

function isOpen(graph: DependencyGraph, archived: ReadonlySet<string>, id: string): boolean {
  return graph.statusOf(id) !== 'complete' && !archived.has(id);
}
