/**
 * Backlog markdown: one `### <spec-id>` section per spec with an attribute table.
 *
 *   ### CORE-002-auth
 *   **Scope:** Login and sessions
 *   | **Weight** | STANDARD |
 *   | **Status** | 🟨 |
 *   | **Depends On** | CORE-001 |
 */

import type { SpecStatus, SpecWeight } from '../models/lineage.js';
import { SPEC_WEIGHTS } from '../models/lineage.js';
import type { ParseWarning } from '../models/graph.js';
import { isValidIdentifier } from './graphCodec.js';

export interface BacklogEntry {
  id: string;
  title: string;
  weight: SpecWeight;
  status: SpecStatus;
  archived: boolean;
  /** As written; may be id prefixes such as `CORE-001`. */
  dependsOn: string[];
  /** Line of the `###` heading, 1-based. */
  line: number;
}

export interface BacklogParseResult {
  entries: BacklogEntry[];
  warnings: ParseWarning[];
}

const STATUS_MARKS: Record<string, { status: SpecStatus; archived: boolean }> = {
  '⬜': { status: 'not_started', archived: false },
  '🟨': { status: 'in_progress', archived: false },
  '🟩': { status: 'complete', archived: false },
  '🚫': { status: 'not_started', archived: true },
};

const HEADING_RE = /^###\s+(\S+)\s*$/;
const SCOPE_RE = /\*\*Scope:\*\*\s*(.+)/;
const NONE_VALUES = new Set(['', '-', 'none', '(none)']);

function tableValue(body: string, key: string): string | null {
  const match = new RegExp(`\\|\\s*\\*\\*${key}\\*\\*\\s*\\|\\s*(.+?)\\s*\\|`).exec(body);
  return match ? match[1].trim() : null;
}

function isWeight(value: string): value is SpecWeight {
  return SPEC_WEIGHTS.some((w) => w === value);
}

/** Parse backlog text. Sections with unusable ids or values become warnings. */
export function parseBacklog(text: string): BacklogParseResult {
  const lines = text.split('\n').map((l) => l.replace(/\r$/, ''));
  const entries: BacklogEntry[] = [];
  const warnings: ParseWarning[] = [];

  const sections: { id: string; line: number; body: string[] }[] = [];
  for (let i = 0; i < lines.length; i++) {
    const heading = HEADING_RE.exec(lines[i]);
    if (heading) {
      sections.push({ id: heading[1], line: i + 1, body: [] });
    } else if (lines[i].startsWith('#')) {
      // A heading of another level ends the current section.
      sections.push({ id: '', line: i + 1, body: [] });
    } else if (sections.length > 0) {
      sections[sections.length - 1].body.push(lines[i]);
    }
  }

  for (const section of sections) {
    if (section.id === '') continue;
    const heading = lines[section.line - 1];
    if (!isValidIdentifier(section.id)) {
      warnings.push({ line: section.line, text: heading, reason: 'spec id must be a bare identifier' });
      continue;
    }

    const body = section.body.join('\n');
    const weightRaw = (tableValue(body, 'Weight') ?? 'STANDARD').toUpperCase();
    const statusRaw = tableValue(body, 'Status') ?? '⬜';
    const dependsRaw = tableValue(body, 'Depends On') ?? '';

    if (!isWeight(weightRaw)) {
      warnings.push({ line: section.line, text: heading, reason: `unknown weight ${weightRaw}` });
      continue;
    }
    const mark = STATUS_MARKS[statusRaw];
    if (!mark) {
      warnings.push({ line: section.line, text: heading, reason: `unknown status ${statusRaw}` });
      continue;
    }

    const dependsOn = NONE_VALUES.has(dependsRaw.toLowerCase())
      ? []
      : dependsRaw.split(/[,\s]+/).filter(Boolean);

    entries.push({
      id: section.id,
      title: SCOPE_RE.exec(body)?.[1].trim() ?? section.id,
      weight: weightRaw,
      status: mark.status,
      archived: mark.archived,
      dependsOn,
      line: section.line,
    });
  }

  return { entries, warnings };
}

/**
 * Resolve a dependency reference to a known id: an exact match first, then the
 * single id it is a prefix of (`CORE-001` -> `CORE-001-setup`). Null when none or ambiguous.
 */
export function resolveReference(reference: string, knownIds: readonly string[]): string | null {
  if (knownIds.includes(reference)) return reference;
  const lower = reference.toLowerCase();
  const exact = knownIds.filter((id) => id.toLowerCase() === lower);
  if (exact.length === 1) return exact[0];
  const prefixed = knownIds.filter((id) => id.toLowerCase().startsWith(`${lower}-`));
  return prefixed.length === 1 ? prefixed[0] : null;
}
