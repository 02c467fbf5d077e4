import { describe, it, expect } from 'vitest';
import { CycleError, type MergeResult, type SpecProgressReport } from 'specloom-core';
import {
  columns,
  formatBlocked,
  formatGraphCheck,
  formatIdList,
  formatMerge,
  formatProgress,
  formatSyncReport,
} from '../format.js';

describe('columns', () => {
  it('pads every column but the last', () => {
    expect(columns([
      ['A', 'complete', 'Setup'],
      ['CORE-002', 'blocked', 'Auth'],
    ])).toBe('A         complete  Setup\nCORE-002  blocked   Auth');
  });

  it('renders nothing for no rows', () => {
    expect(columns([])).toBe('');
  });
});

describe('formatters', () => {
  it('lists blocked specs with what they wait on', () => {
    expect(formatBlocked([{ specId: 'C', unmet: ['A', 'B'] }])).toBe('C blocked by A, B');
    expect(formatBlocked([])).toBe('Nothing is blocked.');
  });

  it('falls back to the empty message', () => {
    expect(formatIdList([], 'No specs are ready.')).toBe('No specs are ready.');
    expect(formatIdList(['A', 'B'], 'unused')).toBe('A\nB');
  });

  it('summarizes a graph check', () => {
    const text = formatGraphCheck({
      ok: false,
      warnings: [{ line: 4, text: '    ???', reason: 'unrecognized declaration' }],
      cycles: [new CycleError(['B', 'A', 'B'])],
      dangling: ['Q'],
      fileOnly: [{ dependent: 'Q', dependency: 'A' }],
      storeOnly: [],
    });
    expect(text).toBe([
      'Graph has cycles',
      '  cycle: B -> A -> B',
      '  line 4: unrecognized declaration: ???',
      '  unregistered: Q',
      '  only in file:  Q --> A',
    ].join('\n'));
  });

  it('summarizes a sync', () => {
    expect(formatSyncReport(null, true)).toBe('Diagram rewritten.');
    expect(formatSyncReport({
      added: [{ dependent: 'B', dependency: 'A' }],
      removed: [],
      storeOnly: [{ dependent: 'C', dependency: 'A' }],
      unchanged: 2,
      registered: ['X'],
      unknownNodes: [],
      dangling: [],
      warnings: [],
      cycles: [],
    }, false)).toBe([
      '1 added, 0 removed, 2 unchanged',
      '  registered stubs: X',
      '  only in store: C --> A',
      'Diagram unchanged.',
    ].join('\n'));
  });

  it('shows why a merged spec stays open', () => {
    const result: MergeResult = {
      handle: {
        id: 1,
        spec_id: 'A',
        path: '/wt/A',
        branch: 'spec/A',
        state: 'merged',
        forced: false,
        created_at: '2026-01-01T00:00:00.000Z',
        updated_at: '2026-01-01T00:00:00.000Z',
      },
      specCompleted: false,
      completionBlockers: ['no plan'],
      worktreeRemoved: false,
      branchDeleted: true,
      warnings: ['worktree removal failed: busy'],
    };
    expect(formatMerge(result)).toBe('Merged spec/A\nA stays open: no plan\nwarning: worktree removal failed: busy');
  });

  it('renders progress with dependents', () => {
    const report: SpecProgressReport = {
      spec_id: 'B',
      title: 'Beta',
      status: 'in_progress',
      has_plan: true,
      total_tasks: 3,
      completed: 1,
      active: 1,
      blocked: 0,
      minutes_spent: 45,
      derived_status: 'in_progress',
      unmet: [],
      dependents: ['C'],
    };
    expect(formatProgress(report)).toBe([
      'B  Beta',
      '  status:    in_progress',
      '  plan:      yes',
      '  tasks:     1/3 completed, 1 active, 0 blocked',
      '  minutes:   45',
      '  dependents: C',
    ].join('\n'));
  });
});
