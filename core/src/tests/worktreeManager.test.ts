import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { LineageStore } from '../services/lineageStore.js';
import { ReadinessEngine } from '../services/readinessEngine.js';
import { WorktreeManager } from '../services/worktreeManager.js';
import {
  AlreadyActiveError,
  NotFoundError,
  NotReadyError,
  UncommittedChangesError,
  ValidationError,
} from '../utils/errors.js';
import { MemoryVcs } from './helpers/memoryVcs.js';

const ROOT = path.join(path.sep, 'wt');

let store: LineageStore;
let vcs: MemoryVcs;
let manager: WorktreeManager;

beforeEach(() => {
  store = LineageStore.open({ path: ':memory:' });
  vcs = new MemoryVcs();
  const readiness = new ReadinessEngine(() => ({ graph: store.loadGraph(), archived: new Set<string>() }));
  manager = new WorktreeManager({
    store,
    vcs,
    readiness,
    worktreeRoot: ROOT,
    baseBranch: 'main',
    branchPrefix: 'spec/',
    removeOnMerge: true,
    deleteBranchOnMerge: true,
  });

  store.putSpec({ id: 'A' });
  store.putSpec({ id: 'X' });
  store.putEdge('X', 'A');
});

afterEach(() => {
  store.close();
});

describe('WorktreeManager.create', () => {
  it('refuses a blocked spec and reserves nothing', async () => {
    await expect(manager.create('X')).rejects.toThrow(NotReadyError);
    await expect(manager.create('X')).rejects.toThrow('X is blocked by: A');
    expect(store.listWorktrees()).toEqual([]);
    expect(vcs.calls).toEqual([]);
  });

  it('creates a blocked spec when forced and flags the audit event', async () => {
    const handle = await manager.create('X', { force: true });

    expect(handle).toMatchObject({
      spec_id: 'X',
      path: path.join(ROOT, 'X'),
      branch: 'spec/X',
      state: 'active',
      forced: true,
    });
    const created = store.listEvents('X').find((e) => e.type === 'worktree_created');
    expect(created).toMatchObject({
      forced: true,
      detail: { path: path.join(ROOT, 'X'), branch: 'spec/X', unmet: ['A'] },
    });
    expect(store.getSpec('X').status).toBe('in_progress');
    expect(vcs.calls).toEqual([
      { op: 'createBranch', branch: 'spec/X', base: 'main' },
      { op: 'addWorktree', branch: 'spec/X', path: path.join(ROOT, 'X') },
    ]);
  });

  it('does not flag a ready spec even when force is passed', async () => {
    const handle = await manager.create('A', { force: true });
    expect(handle.forced).toBe(false);
    const created = store.listEvents('A').find((e) => e.type === 'worktree_created');
    expect(created?.forced).toBe(false);
  });

  it('refuses a second live worktree', async () => {
    await manager.create('A');
    await expect(manager.create('A')).rejects.toThrow(AlreadyActiveError);
  });

  it('reuses an existing branch', async () => {
    vcs.branches.add('spec/A');
    await manager.create('A');
    expect(vcs.calls.map((c) => c.op)).toEqual(['addWorktree']);
  });

  it('abandons the reservation when git fails', async () => {
    vcs.failOn('addWorktree');
    await expect(manager.create('A')).rejects.toThrow('addWorktree failed');

    expect(store.getLiveWorktree('A')).toBeNull();
    expect(store.listWorktrees().map((h) => h.state)).toEqual(['abandoned']);
    expect(store.getSpec('A').status).toBe('not_started');

    vcs.clearFailure('addWorktree');
    const handle = await manager.create('A');
    expect(handle.state).toBe('active');
  });

  it('serializes concurrent creates for one spec', async () => {
    const results = await Promise.allSettled([manager.create('A'), manager.create('A')]);
    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    const rejected = results[1];
    if (rejected.status === 'rejected') {
      expect(rejected.reason).toBeInstanceOf(AlreadyActiveError);
    }
  });

  it('throws NotFoundError for an unknown spec', async () => {
    await expect(manager.create('NOPE')).rejects.toThrow('Unknown spec: NOPE');
  });

  it('keeps worktree paths under the root', () => {
    expect(manager.pathFor('A')).toBe(path.join(ROOT, 'A'));
    expect(() => manager.pathFor('../../escape')).toThrow(ValidationError);
  });
});

describe('WorktreeManager.merge', () => {
  beforeEach(async () => {
    await manager.create('A');
    vcs.calls.length = 0;
  });

  it('needs a live worktree', async () => {
    await expect(manager.merge('X')).rejects.toThrow(NotFoundError);
  });

  it('leaves a reservation that is still being set up alone', async () => {
    store.reserveWorktree({ spec_id: 'X', path: path.join(ROOT, 'X'), branch: 'spec/X' });

    await expect(manager.merge('X')).rejects.toThrow('Unknown worktree: X');
    expect(vcs.calls.filter((c) => c.op === 'merge')).toEqual([]);
    expect(store.getLiveWorktree('X')?.state).toBe('created');
  });

  it('refuses a dirty worktree', async () => {
    vcs.dirty.add(path.join(ROOT, 'A'));
    await expect(manager.merge('A')).rejects.toThrow(UncommittedChangesError);
    expect(store.getLiveWorktree('A')?.state).toBe('active');
  });

  it('merges, cleans up and leaves an unplanned spec open', async () => {
    const result = await manager.merge('A');

    expect(result).toMatchObject({
      specCompleted: false,
      completionBlockers: ['no plan'],
      worktreeRemoved: true,
      branchDeleted: true,
      warnings: [],
    });
    expect(result.handle.state).toBe('merged');
    expect(store.getSpec('A').status).toBe('in_progress');
    expect(vcs.calls).toEqual([
      { op: 'merge', branch: 'spec/A', into: 'main' },
      { op: 'removeWorktree', path: path.join(ROOT, 'A'), force: false },
      { op: 'deleteBranch', branch: 'spec/A' },
    ]);
  });

  it('completes the spec when its plan is done', async () => {
    store.putPlan({ spec_id: 'A', title: 'Plan' });

    const result = await manager.merge('A');
    expect(result.specCompleted).toBe(true);
    expect(store.getSpec('A').status).toBe('complete');
    const events = store.listEvents('A');
    expect(events[events.length - 1]).toMatchObject({
      type: 'worktree_merged',
      detail: { branch: 'spec/A', into: 'main', specCompleted: true },
    });
  });

  it('reports cleanup failures instead of throwing', async () => {
    vcs.failOn('removeWorktree');
    const result = await manager.merge('A');

    expect(result.handle.state).toBe('merged');
    expect(result.worktreeRemoved).toBe(false);
    expect(result.branchDeleted).toBe(true);
    expect(result.warnings).toEqual(['worktree removal failed: removeWorktree failed']);
  });

  it('keeps the worktree and branch when asked', async () => {
    await manager.merge('A', { removeWorktree: false, deleteBranch: false });
    expect(vcs.calls.map((c) => c.op)).toEqual(['merge']);
  });

  it('leaves the handle live when the merge itself fails', async () => {
    vcs.failOn('merge');
    await expect(manager.merge('A')).rejects.toThrow('merge failed');
    expect(store.getLiveWorktree('A')?.state).toBe('active');
  });
});

describe('WorktreeManager.abandon and status', () => {
  it('abandons a worktree without touching the spec status', async () => {
    await manager.create('A');
    const result = await manager.abandon('A');

    expect(result.handle.state).toBe('abandoned');
    expect(result.worktreeRemoved).toBe(true);
    expect(vcs.calls[vcs.calls.length - 1]).toEqual({ op: 'removeWorktree', path: path.join(ROOT, 'A'), force: true });
    expect(store.getSpec('A').status).toBe('in_progress');
    expect(store.listEvents('A').map((e) => e.type)).toContain('worktree_abandoned');

    await expect(manager.create('A')).resolves.toMatchObject({ state: 'active' });
  });

  it('abandon needs a live worktree', async () => {
    await expect(manager.abandon('A')).rejects.toThrow('Unknown worktree: A');
  });

  it('lists live handles with their spec status', async () => {
    await manager.create('A');
    await manager.create('X', { force: true });
    await manager.abandon('X');

    expect(manager.status().map((s) => [s.spec_id, s.state, s.spec_status])).toEqual([
      ['A', 'active', 'in_progress'],
    ]);
  });
});
