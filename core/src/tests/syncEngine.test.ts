import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LineageStore } from '../services/lineageStore.js';
import { SyncEngine } from '../services/syncEngine.js';

let store: LineageStore;
let sync: SyncEngine;

function edges(): string[] {
  return store.listEdges().map((e) => `${e.dependent}->${e.dependency}`);
}

beforeEach(() => {
  store = LineageStore.open({ path: ':memory:' });
  store.putSpec({ id: 'A' });
  store.putSpec({ id: 'B' });
  sync = new SyncEngine({ store, autoRegister: true });
});

afterEach(() => {
  store.close();
});

describe('SyncEngine.syncFileToStore', () => {
  it('inserts file-only edges and registers unknown ids as stubs', () => {
    const report = sync.syncFileToStore('graph TD\n    B --> A\n    CORE-007-extra --> B\n');

    expect(report.added).toEqual([
      { dependent: 'B', dependency: 'A' },
      { dependent: 'CORE-007-extra', dependency: 'B' },
    ]);
    expect(report.registered).toEqual(['CORE-007-extra']);
    expect(report.unchanged).toBe(0);
    expect(report.cycles).toEqual([]);
    expect(store.getSpec('CORE-007-extra')).toMatchObject({ stub: true, component: 'CORE', status: 'not_started' });
    expect(edges()).toEqual(['B->A', 'CORE-007-extra->B']);
  });

  it('is a no-op the second time', () => {
    const text = 'graph TD\n    B --> A\n    C --> B\n';
    sync.syncFileToStore(text);
    const eventsBefore = store.listEvents().length;

    const report = sync.syncFileToStore(text);
    expect(report.added).toEqual([]);
    expect(report.registered).toEqual([]);
    expect(report.unchanged).toBe(2);
    expect(store.listEvents()).toHaveLength(eventsBefore);
  });

  it('flags store-only edges and removes them only when pruning', () => {
    store.putEdge('B', 'A');

    const kept = sync.syncFileToStore('graph TD\n    A\n    B\n');
    expect(kept.storeOnly).toEqual([{ dependent: 'B', dependency: 'A' }]);
    expect(kept.removed).toEqual([]);
    expect(edges()).toEqual(['B->A']);

    const pruned = sync.syncFileToStore('graph TD\n    A\n    B\n', { prune: true });
    expect(pruned.removed).toEqual([{ dependent: 'B', dependency: 'A' }]);
    expect(pruned.storeOnly).toEqual([]);
    expect(edges()).toEqual([]);
  });

  it('excludes a file edge that would close a cycle with the store', () => {
    store.putEdge('B', 'A');

    const report = sync.syncFileToStore('graph TD\n    A --> B\n');
    expect(report.added).toEqual([]);
    expect(report.cycles.map((c) => c.path)).toEqual([['A', 'B', 'A']]);
    expect(edges()).toEqual(['B->A']);
  });

  it('replays onto the pruned topology', () => {
    store.putEdge('B', 'A');

    const report = sync.syncFileToStore('graph TD\n    A --> B\n', { prune: true });
    expect(report.removed).toEqual([{ dependent: 'B', dependency: 'A' }]);
    expect(report.added).toEqual([{ dependent: 'A', dependency: 'B' }]);
    expect(report.cycles).toEqual([]);
    expect(edges()).toEqual(['A->B']);
  });

  it('reports cycles and warnings from the text itself', () => {
    const report = sync.syncFileToStore('graph TD\n    A --> B\n    B --> A\n    not an id\n');
    expect(report.cycles.map((c) => c.path)).toEqual([['B', 'A', 'B']]);
    expect(report.warnings).toEqual([{ line: 4, text: '    not an id', reason: 'unrecognized declaration' }]);
    expect(edges()).toEqual(['A->B']);
  });

  it('reports dangling edges when auto-registration is off', () => {
    const strict = new SyncEngine({ store, autoRegister: false });
    const report = strict.syncFileToStore('graph TD\n    X --> A\n    B --> A\n');

    expect(report.unknownNodes).toEqual(['X']);
    expect(report.dangling).toEqual([{ dependent: 'X', dependency: 'A' }]);
    expect(report.added).toEqual([{ dependent: 'B', dependency: 'A' }]);
    expect(report.registered).toEqual([]);
    expect(store.hasSpec('X')).toBe(false);
  });
});

describe('SyncEngine.syncStoreToFile', () => {
  it('renders the store graph', () => {
    store.putSpec({ id: 'C' });
    store.putEdge('B', 'A');
    expect(sync.syncStoreToFile()).toBe('graph TD\n    C\n    B --> A\n');
  });

  it('returns the previous text when the topology matches', () => {
    store.putEdge('B', 'A');
    const previous = '%% team graph\ngraph LR\nB-->A\n';
    expect(sync.syncStoreToFile(previous)).toBe(previous);
  });

  it('keeps the previous header when the topology moved', () => {
    store.putEdge('B', 'A');
    expect(sync.syncStoreToFile('graph LR\n    A\n    B\n')).toBe('graph LR\n    B --> A\n');
  });
});

describe('SyncEngine.compare', () => {
  it('splits edges three ways without writing', () => {
    store.putSpec({ id: 'C' });
    store.putEdge('B', 'A');
    store.putEdge('C', 'A');

    const report = sync.compare('graph TD\n    B --> A\n    C --> B\n    Q --> A\n');
    expect(report).toEqual({
      fileOnly: [
        { dependent: 'C', dependency: 'B' },
        { dependent: 'Q', dependency: 'A' },
      ],
      storeOnly: [{ dependent: 'C', dependency: 'A' }],
      shared: [{ dependent: 'B', dependency: 'A' }],
      unknownNodes: ['Q'],
    });
    expect(store.hasSpec('Q')).toBe(false);
  });
});
