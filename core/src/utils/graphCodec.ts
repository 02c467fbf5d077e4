/**
 * Diagram text codec. One declaration per line: a bare identifier declares a node,
 * `A --> B` declares that A depends on B. Header, fence, comment and blank lines are
 * structural and survive a render when the topology did not change.
 */

import { edgeKey, type DependencyEdge, type ParseWarning } from '../models/graph.js';
import { DependencyGraph } from './dependencyGraph.js';
import type { CycleError } from './errors.js';

export const DEFAULT_HEADER = 'graph TD';
const INDENT = '    ';

const ID_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const EDGE_RE = /^(\S+?)\s*-->\s*(\S+)$/;
const HEADER_RE = /^(graph|flowchart)(\s+(TD|TB|BT|LR|RL))?$/i;
const RESERVED_RE = /^(graph|flowchart)$/i;
const FENCE_RE = /^```/;
const COMMENT_RE = /^%%/;

/** What a parse saw, kept so an unchanged graph renders back to the same bytes. */
export interface DiagramLayout {
  text: string;
  header: string[];
  footer: string[];
  nodes: string[];
  edges: DependencyEdge[];
}

export interface ParseResult {
  graph: DependencyGraph;
  warnings: ParseWarning[];
  /** Edges excluded because they closed a cycle with earlier lines. */
  cycles: CycleError[];
  layout: DiagramLayout;
}

type LineKind =
  | { kind: 'structural' }
  | { kind: 'node'; id: string }
  | { kind: 'edge'; edge: DependencyEdge }
  | { kind: 'invalid'; reason: string };

/** A bare identifier the diagram can hold; header keywords would read back as a header. */
export function isValidIdentifier(token: string): boolean {
  return ID_RE.test(token) && !RESERVED_RE.test(token);
}

function classify(line: string): LineKind {
  const trimmed = line.trim();
  if (trimmed === '' || HEADER_RE.test(trimmed) || FENCE_RE.test(trimmed) || COMMENT_RE.test(trimmed)) {
    return { kind: 'structural' };
  }

  const edge = EDGE_RE.exec(trimmed);
  if (edge) {
    const [, dependent, dependency] = edge;
    if (!isValidIdentifier(dependent) || !isValidIdentifier(dependency)) {
      return { kind: 'invalid', reason: 'edge endpoints must be bare identifiers' };
    }
    return { kind: 'edge', edge: { dependent, dependency } };
  }

  if (isValidIdentifier(trimmed)) return { kind: 'node', id: trimmed };
  return { kind: 'invalid', reason: 'unrecognized declaration' };
}

/** Parse diagram text. Never throws: bad lines become warnings, cycle-closing edges are excluded. */
export function parseDiagram(text: string): ParseResult {
  const lines = text.split('\n').map((l) => l.replace(/\r$/, ''));
  const graph = new DependencyGraph();
  const warnings: ParseWarning[] = [];
  const cycles: CycleError[] = [];
  const kinds = lines.map(classify);

  for (let i = 0; i < lines.length; i++) {
    const entry = kinds[i];
    switch (entry.kind) {
      case 'node':
        graph.addNode(entry.id);
        break;
      case 'edge': {
        const result = graph.addEdge(entry.edge.dependent, entry.edge.dependency);
        if (!result.ok) cycles.push(result.error);
        break;
      }
      case 'invalid':
        warnings.push({ line: i + 1, text: lines[i], reason: entry.reason });
        break;
      case 'structural':
        break;
    }
  }

  const firstDecl = kinds.findIndex((k) => k.kind !== 'structural');
  let lastDecl = -1;
  for (let i = kinds.length - 1; i >= 0; i--) {
    if (kinds[i].kind !== 'structural') {
      lastDecl = i;
      break;
    }
  }

  const header = firstDecl === -1 ? trimBlank(lines) : trimBlank(lines.slice(0, firstDecl));
  const footer = lastDecl === -1 ? [] : trimBlank(lines.slice(lastDecl + 1));

  return {
    graph,
    warnings,
    cycles,
    layout: { text, header, footer, nodes: graph.nodes(), edges: graph.edges() },
  };
}

function trimBlank(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') start++;
  while (end > start && lines[end - 1].trim() === '') end--;
  return lines.slice(start, end);
}

function sameTopology(graph: DependencyGraph, layout: DiagramLayout): boolean {
  const nodes = graph.nodes();
  const edges = graph.edges();
  if (nodes.length !== layout.nodes.length || edges.length !== layout.edges.length) return false;
  if (nodes.some((n, i) => n !== layout.nodes[i])) return false;
  const known = new Set(layout.edges.map(edgeKey));
  return edges.every((e) => known.has(edgeKey(e)));
}

/**
 * Render a graph deterministically: isolated nodes sorted, then edges sorted by
 * dependent and dependency. With a layout whose topology matches, the original text
 * is returned unchanged.
 */
export function renderDiagram(graph: DependencyGraph, layout?: DiagramLayout): string {
  if (layout && sameTopology(graph, layout)) return layout.text;

  const header = layout && layout.header.length > 0 ? layout.header : [DEFAULT_HEADER];
  const lines = [...header];
  for (const id of graph.isolatedNodes()) lines.push(`${INDENT}${id}`);
  for (const edge of graph.edges()) lines.push(`${INDENT}${edge.dependent} --> ${edge.dependency}`);
  if (layout) lines.push(...layout.footer);
  return lines.join('\n') + '\n';
}
