/**
 * Reconciles diagram text with the lineage store. The diagram supplies topology
 * only; statuses always come from the store.
 */

import {
  compareEdges,
  edgeKey,
  type DependencyEdge,
  type DivergenceReport,
  type SyncReport,
} from '../models/graph.js';
import { parseDiagram, renderDiagram } from '../utils/graphCodec.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { parseSpecId } from '../utils/specId.js';
import type { LineageStore } from './lineageStore.js';

export interface SyncEngineOptions {
  store: LineageStore;
  /** Register ids the diagram mentions but the store lacks as stub specs. */
  autoRegister: boolean;
  logger?: Logger;
}

export interface FileToStoreOptions {
  /** Delete store edges the diagram no longer has. */
  prune?: boolean;
}

function toEdge(edge: DependencyEdge): DependencyEdge {
  return { dependent: edge.dependent, dependency: edge.dependency };
}

export class SyncEngine {
  private readonly store: LineageStore;
  private readonly autoRegister: boolean;
  private readonly logger: Logger;

  constructor(options: SyncEngineOptions) {
    this.store = options.store;
    this.autoRegister = options.autoRegister;
    this.logger = options.logger ?? silentLogger;
  }

  /** Three-way comparison of the diagram against the store, without writing. */
  compare(text: string): DivergenceReport {
    const parsed = parseDiagram(text);
    const fileEdges = parsed.graph.edges();
    const storeEdges = this.store.listEdges().map(toEdge);
    const storeKeys = new Set(storeEdges.map(edgeKey));
    const fileKeys = new Set(fileEdges.map(edgeKey));

    return {
      fileOnly: fileEdges.filter((e) => !storeKeys.has(edgeKey(e))),
      storeOnly: storeEdges.filter((e) => !fileKeys.has(edgeKey(e))).sort(compareEdges),
      shared: fileEdges.filter((e) => storeKeys.has(edgeKey(e))),
      unknownNodes: parsed.graph.nodes().filter((id) => !this.store.hasSpec(id)),
    };
  }

  /**
   * Bring the store in line with the diagram. File-only edges are inserted unless
   * they would close a cycle; store-only edges are removed only with `prune`.
   * Every write happens in one transaction, so a second identical run writes nothing.
   */
  syncFileToStore(text: string, options: FileToStoreOptions = {}): SyncReport {
    const parsed = parseDiagram(text);
    const divergence = this.compare(text);

    const report: SyncReport = {
      added: [],
      removed: [],
      storeOnly: [],
      unchanged: divergence.shared.length,
      registered: [],
      unknownNodes: [],
      dangling: [],
      warnings: parsed.warnings,
      cycles: [...parsed.cycles],
    };

    this.store.transaction(() => {
      if (options.prune) {
        for (const edge of divergence.storeOnly) {
          this.store.removeEdge(edge.dependent, edge.dependency);
          report.removed.push(edge);
        }
      } else {
        report.storeOnly = divergence.storeOnly;
      }

      const unknown = new Set(divergence.unknownNodes);
      if (this.autoRegister) {
        for (const id of divergence.unknownNodes) {
          this.store.putSpec({ id, title: id, component: parseSpecId(id)?.component ?? null, stub: true });
          report.registered.push(id);
        }
        unknown.clear();
      } else {
        report.unknownNodes = divergence.unknownNodes;
      }

      // Replay onto the surviving store topology so the file cannot smuggle in a cycle.
      const graph = this.store.loadGraph();
      for (const edge of divergence.fileOnly) {
        if (unknown.has(edge.dependent) || unknown.has(edge.dependency)) {
          report.dangling.push(edge);
          continue;
        }
        const result = graph.addEdge(edge.dependent, edge.dependency);
        if (!result.ok) {
          report.cycles.push(result.error);
          continue;
        }
        this.store.putEdge(edge.dependent, edge.dependency);
        report.added.push(edge);
      }
    });

    this.logger.info('Synced diagram into store', {
      added: report.added.length,
      removed: report.removed.length,
      storeOnly: report.storeOnly.length,
      registered: report.registered.length,
      dangling: report.dangling.length,
      cycles: report.cycles.map((c) => c.path.join(' -> ')),
    });
    return report;
  }

  /**
   * Render the store's graph as diagram text. The previous text's header and footer
   * are reused, and it is returned unchanged when the topology has not moved.
   */
  syncStoreToFile(previousText?: string): string {
    const layout = previousText !== undefined ? parseDiagram(previousText).layout : undefined;
    return renderDiagram(this.store.loadGraph(), layout);
  }
}
