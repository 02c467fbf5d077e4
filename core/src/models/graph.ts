/** Graph-facing types shared by the graph model, diagram codec and sync engine. */

import type { CycleError } from '../utils/errors.js';

/** `dependent` cannot be ready until `dependency` is complete. */
export interface DependencyEdge {
  dependent: string;
  dependency: string;
}

export type EdgeResult =
  | { ok: true; added: boolean }
  | { ok: false; error: CycleError };

export interface ParseWarning {
  line: number;
  text: string;
  reason: string;
}

export type GraphAuthority = 'store' | 'file';

export type SyncDirection = 'file-to-store' | 'store-to-file' | 'bidirectional';

export interface SyncReport {
  added: DependencyEdge[];
  removed: DependencyEdge[];
  /** Present in the store but not in the file, left in place because pruning was off. */
  storeOnly: DependencyEdge[];
  unchanged: number;
  registered: string[];
  unknownNodes: string[];
  dangling: DependencyEdge[];
  warnings: ParseWarning[];
  cycles: CycleError[];
}

export interface DivergenceReport {
  fileOnly: DependencyEdge[];
  storeOnly: DependencyEdge[];
  shared: DependencyEdge[];
  unknownNodes: string[];
}

export function edgeKey(edge: DependencyEdge): string {
  return `${edge.dependent}\u0000${edge.dependency}`;
}

export function compareEdges(a: DependencyEdge, b: DependencyEdge): number {
  if (a.dependent !== b.dependent) return a.dependent < b.dependent ? -1 : 1;
  if (a.dependency === b.dependency) return 0;
  return a.dependency < b.dependency ? -1 : 1;
}
