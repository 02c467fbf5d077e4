import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { defaultConfig, loadConfig, parseConfig } from './config.js';
import { ConfigError } from './errors.js';

let tmpDir: string;

function writeConfig(content: string): void {
  fs.mkdirSync(path.join(tmpDir, '.specloom'), { recursive: true });
  fs.writeFileSync(path.join(tmpDir, '.specloom', 'config.yml'), content, 'utf-8');
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'specloom-config-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('defaultConfig', () => {
  it('fills every section', () => {
    const config = defaultConfig();
    expect(config.spec_id).toEqual({
      template: '{component}-{NNN}-{slug}',
      padding: 3,
      project: null,
      components: [],
    });
    expect(config.lineage).toEqual({ path: '.specloom/lineage.db', auto_register: true });
    expect(config.graph).toEqual({ path: 'deps.mermaid', authority: 'store' });
    expect(config.worktrees).toEqual({
      base_branch: 'main',
      branch_prefix: 'spec/',
      root: '../worktrees',
      remove_on_merge: true,
      delete_branch_on_merge: true,
    });
  });
});

describe('loadConfig', () => {
  it('falls back to defaults when the file is missing', () => {
    const loaded = loadConfig(tmpDir, {});
    expect(loaded.config).toEqual(defaultConfig());
    expect(loaded.paths.lineage).toBe(path.join(tmpDir, '.specloom', 'lineage.db'));
    expect(loaded.paths.graph).toBe(path.join(tmpDir, 'deps.mermaid'));
    expect(loaded.paths.worktreeRoot).toBe(path.resolve(tmpDir, '..', 'worktrees'));
  });

  it('reads YAML and merges it over the defaults', () => {
    writeConfig([
      'spec_id:',
      '  components: [CORE, API]',
      'graph:',
      '  authority: file',
      'worktrees:',
      '  base_branch: develop',
      '',
    ].join('\n'));

    const { config } = loadConfig(tmpDir, {});
    expect(config.spec_id.components).toEqual(['CORE', 'API']);
    expect(config.spec_id.padding).toBe(3);
    expect(config.graph.authority).toBe('file');
    expect(config.worktrees.base_branch).toBe('develop');
    expect(config.worktrees.branch_prefix).toBe('spec/');
  });

  it('lets the environment override the store path', () => {
    expect(loadConfig(tmpDir, { SPECLOOM_DB: ':memory:' }).paths.lineage).toBe(':memory:');
    expect(loadConfig(tmpDir, { SPECLOOM_DB: 'other.db' }).paths.lineage).toBe(path.join(tmpDir, 'other.db'));
  });

  it('rejects unknown keys', () => {
    writeConfig('graph:\n  colour: red\n');
    expect(() => loadConfig(tmpDir, {})).toThrow(ConfigError);
    expect(() => loadConfig(tmpDir, {})).toThrow(/graph: Unrecognized key/);
  });

  it('reports unparseable YAML', () => {
    writeConfig('graph: [unclosed\n');
    expect(() => loadConfig(tmpDir, {})).toThrow(/YAML parse error/);
  });
});

describe('parseConfig', () => {
  it('requires the {NNN} placeholder in the id template', () => {
    expect(() => parseConfig({ spec_id: { template: '{component}-{slug}' } })).toThrow(
      'spec_id.template: template must contain {NNN}',
    );
  });

  it('rejects an unknown graph authority', () => {
    try {
      parseConfig({ graph: { authority: 'both' } }, 'test.yml');
      expect.unreachable('parseConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.code).toBe('INVALID_CONFIG');
      expect(err.file).toBe('test.yml');
    }
  });
});
