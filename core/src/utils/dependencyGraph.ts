/** Spec dependency graph: cycle-safe edges, readiness, impact and topological order. */

import type { SpecStatus } from '../models/lineage.js';
import { compareEdges, type DependencyEdge, type EdgeResult } from '../models/graph.js';
import { CycleError, NotFoundError } from './errors.js';

export interface GraphNodeInput {
  id: string;
  status?: SpecStatus;
}

export interface BuildResult {
  graph: DependencyGraph;
  rejected: CycleError[];
}

export class DependencyGraph {
  /** dependent -> dependencies */
  private deps = new Map<string, Set<string>>();
  /** dependency -> dependents */
  private rdeps = new Map<string, Set<string>>();
  private status = new Map<string, SpecStatus>();

  /** Build a graph from node and edge lists, collecting edges rejected as cycles. */
  static build(nodes: GraphNodeInput[], edges: DependencyEdge[]): BuildResult {
    const graph = new DependencyGraph();
    for (const node of nodes) graph.addNode(node.id, node.status);
    const rejected: CycleError[] = [];
    for (const edge of edges) {
      const result = graph.addEdge(edge.dependent, edge.dependency);
      if (!result.ok) rejected.push(result.error);
    }
    return { graph, rejected };
  }

  /** Add a node, or update its status when it already exists and a status is given. */
  addNode(id: string, status?: SpecStatus): void {
    if (!this.deps.has(id)) {
      this.deps.set(id, new Set());
      this.rdeps.set(id, new Set());
      this.status.set(id, status ?? 'not_started');
    } else if (status) {
      this.status.set(id, status);
    }
  }

  hasNode(id: string): boolean {
    return this.deps.has(id);
  }

  setStatus(id: string, status: SpecStatus): void {
    if (!this.hasNode(id)) throw new NotFoundError('node', id);
    this.status.set(id, status);
  }

  statusOf(id: string): SpecStatus {
    const s = this.status.get(id);
    if (!s) throw new NotFoundError('node', id);
    return s;
  }

  hasEdge(dependent: string, dependency: string): boolean {
    return this.deps.get(dependent)?.has(dependency) ?? false;
  }

  /**
   * Add `dependent -> dependency`. Rejects the edge when `dependent` is reachable
   * from `dependency`; the graph is left untouched in that case.
   */
  addEdge(dependent: string, dependency: string): EdgeResult {
    if (dependent === dependency) {
      return { ok: false, error: new CycleError([dependent, dependent]) };
    }
    if (this.hasEdge(dependent, dependency)) return { ok: true, added: false };

    const path = this.findPath(dependency, dependent);
    if (path) {
      return { ok: false, error: new CycleError([dependent, ...path]) };
    }

    this.addNode(dependent);
    this.addNode(dependency);
    this.deps.get(dependent)?.add(dependency);
    this.rdeps.get(dependency)?.add(dependent);
    return { ok: true, added: true };
  }

  /** Remove an edge. Returns true if it existed. Nodes are kept. */
  removeEdge(dependent: string, dependency: string): boolean {
    const out = this.deps.get(dependent);
    if (!out || !out.has(dependency)) return false;
    out.delete(dependency);
    this.rdeps.get(dependency)?.delete(dependent);
    return true;
  }

  nodes(): string[] {
    return [...this.deps.keys()].sort();
  }

  edges(): DependencyEdge[] {
    const result: DependencyEdge[] = [];
    for (const [dependent, deps] of this.deps) {
      for (const dependency of deps) result.push({ dependent, dependency });
    }
    return result.sort(compareEdges);
  }

  dependenciesOf(id: string): string[] {
    const deps = this.deps.get(id);
    if (!deps) throw new NotFoundError('node', id);
    return [...deps].sort();
  }

  dependentsOf(id: string): string[] {
    const rdeps = this.rdeps.get(id);
    if (!rdeps) throw new NotFoundError('node', id);
    return [...rdeps].sort();
  }

  /** Nodes with no edge in either direction. */
  isolatedNodes(): string[] {
    return this.nodes().filter(
      (id) => (this.deps.get(id)?.size ?? 0) === 0 && (this.rdeps.get(id)?.size ?? 0) === 0,
    );
  }

  /** Dependencies of `id` that are not complete. */
  unmetDependencies(id: string): string[] {
    return this.dependenciesOf(id).filter((dep) => this.status.get(dep) !== 'complete');
  }

  /** Nodes whose every dependency is complete, whatever their own status. */
  ready(): string[] {
    return this.nodes().filter((id) => this.unmetDependencies(id).length === 0);
  }

  /** Nodes with at least one incomplete dependency, mapped to those dependencies. */
  blocked(): Map<string, string[]> {
    const result = new Map<string, string[]>();
    for (const id of this.nodes()) {
      const unmet = this.unmetDependencies(id);
      if (unmet.length > 0) result.set(id, unmet);
    }
    return result;
  }

  /** Everything that transitively depends on `id`. */
  impactOf(id: string): string[] {
    return this.closure(id, this.rdeps);
  }

  /** Everything `id` transitively depends on. */
  upstreamOf(id: string): string[] {
    return this.closure(id, this.deps);
  }

  /** Dependencies before dependents (Kahn's algorithm, ties broken by id). */
  topologicalOrder(): string[] {
    const inDegree = new Map<string, number>();
    for (const [node, deps] of this.deps) inDegree.set(node, deps.size);

    const queue = this.nodes().filter((n) => inDegree.get(n) === 0);
    const result: string[] = [];
    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      result.push(node);
      for (const dependent of this.dependentsOf(node)) {
        const deg = (inDegree.get(dependent) ?? 1) - 1;
        inDegree.set(dependent, deg);
        if (deg === 0) queue.push(dependent);
      }
    }
    return result;
  }

  /** Depth-first search along dependency edges; returns the path from `from` to `to`, inclusive. */
  private findPath(from: string, to: string): string[] | null {
    const visited = new Set<string>();
    const walk = (node: string): string[] | null => {
      if (node === to) return [node];
      visited.add(node);
      for (const next of [...(this.deps.get(node) ?? [])].sort()) {
        if (visited.has(next)) continue;
        const rest = walk(next);
        if (rest) return [node, ...rest];
      }
      return null;
    };
    return this.hasNode(from) ? walk(from) : null;
  }

  private closure(id: string, adjacency: Map<string, Set<string>>): string[] {
    if (!this.hasNode(id)) throw new NotFoundError('node', id);
    const seen = new Set<string>();
    const queue = [id];
    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      for (const next of adjacency.get(node) ?? []) {
        if (next === id || seen.has(next)) continue;
        seen.add(next);
        queue.push(next);
      }
    }
    return [...seen].sort();
  }
}
