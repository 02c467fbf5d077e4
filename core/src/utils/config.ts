/** Project configuration: `.specloom/config.yml` validated with zod, every key defaulted. */

import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import {
  CONFIG_FILE,
  DB_PATH_ENV,
  DEFAULT_BACKLOG_PATH,
  DEFAULT_GRAPH_PATH,
  DEFAULT_LINEAGE_PATH,
  DEFAULT_LOG_DIR,
} from './constants.js';
import { ConfigError, errorMessage } from './errors.js';

const SpecIdSchema = z.object({
  template: z.string().min(1).max(200).refine(
    (t) => t.includes('{NNN}'),
    { message: 'template must contain {NNN}' },
  ).default('{component}-{NNN}-{slug}'),
  padding: z.number().int().min(1).max(10).default(3),
  project: z.string().max(50).nullable().default(null),
  components: z.array(z.string().max(50)).max(100).default([]),
}).strict();

const LineageSchema = z.object({
  path: z.string().min(1).default(DEFAULT_LINEAGE_PATH),
  auto_register: z.boolean().default(true),
}).strict();

const GraphSchema = z.object({
  path: z.string().min(1).default(DEFAULT_GRAPH_PATH),
  authority: z.enum(['store', 'file']).default('store'),
}).strict();

const WorktreesSchema = z.object({
  base_branch: z.string().min(1).default('main'),
  branch_prefix: z.string().default('spec/'),
  root: z.string().min(1).default('../worktrees'),
  remove_on_merge: z.boolean().default(true),
  delete_branch_on_merge: z.boolean().default(true),
}).strict();

const BacklogSchema = z.object({
  path: z.string().min(1).default(DEFAULT_BACKLOG_PATH),
}).strict();

const LoggingSchema = z.object({
  dir: z.string().min(1).default(DEFAULT_LOG_DIR),
  console: z.boolean().default(true),
}).strict();

export const ConfigSchema = z.object({
  spec_id: SpecIdSchema.default({}),
  lineage: LineageSchema.default({}),
  graph: GraphSchema.default({}),
  worktrees: WorktreesSchema.default({}),
  backlog: BacklogSchema.default({}),
  logging: LoggingSchema.default({}),
}).strict();

export type SpecloomConfig = z.infer<typeof ConfigSchema>;

export interface LoadedConfig {
  config: SpecloomConfig;
  projectDir: string;
  /** Absolute paths derived from the config. */
  paths: {
    lineage: string;
    graph: string;
    backlog: string;
    logDir: string;
    worktreeRoot: string;
  };
}

export function defaultConfig(): SpecloomConfig {
  return ConfigSchema.parse({});
}

/** Validate an already-parsed config object. Throws ConfigError listing every issue. */
export function parseConfig(raw: unknown, source = CONFIG_FILE): SpecloomConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(source, issues);
  }
  return result.data;
}

function resolvePath(projectDir: string, p: string): string {
  if (p === ':memory:') return p;
  return path.resolve(projectDir, p);
}

/** Load the project config, falling back to defaults when the file does not exist. */
export function loadConfig(projectDir: string, env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const file = path.join(projectDir, CONFIG_FILE);
  let raw: unknown = {};
  if (fs.existsSync(file)) {
    try {
      raw = parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
      throw new ConfigError(file, [`YAML parse error: ${errorMessage(err)}`]);
    }
  }
  const config = parseConfig(raw, file);

  const lineagePath = env[DB_PATH_ENV] ?? config.lineage.path;
  return {
    config,
    projectDir,
    paths: {
      lineage: resolvePath(projectDir, lineagePath),
      graph: resolvePath(projectDir, config.graph.path),
      backlog: resolvePath(projectDir, config.backlog.path),
      logDir: resolvePath(projectDir, config.logging.dir),
      worktreeRoot: resolvePath(projectDir, config.worktrees.root),
    },
  };
}
