/**
 * Command surface of the engine: every operator action, composed from the store,
 * the sync engine, the readiness engine and the worktree manager.
 */

import fs from 'node:fs';
import path from 'node:path';
import type {
  CodeChangeInput,
  CodeChangeRecord,
  DerivedSpecStatus,
  LifecycleEvent,
  Plan,
  Spec,
  SpecProgress,
  SpecStatus,
  SpecWeight,
  StoredEdge,
  Task,
  TaskContext,
  VelocityPoint,
  WorktreeHandle,
} from '../models/lineage.js';
import type { DependencyEdge, ParseWarning, SyncDirection, SyncReport } from '../models/graph.js';
import { loadConfig, type LoadedConfig } from '../utils/config.js';
import { DependencyGraph } from '../utils/dependencyGraph.js';
import { ValidationError, type CycleError } from '../utils/errors.js';
import { isValidIdentifier, parseDiagram } from '../utils/graphCodec.js';
import { EngineLogger, silentLogger, type Logger } from '../utils/logger.js';
import {
  generateSpecId,
  isKnownComponent,
  nextSpecNumber,
  parseSpecId,
  requiresComponent,
  slugify,
} from '../utils/specId.js';
import { parseBacklog, resolveReference } from '../utils/backlogParser.js';
import { GitService, type VcsCapability } from './gitService.js';
import { LineageStore, type CompleteTaskResult } from './lineageStore.js';
import { ReadinessEngine, type BlockedSpec, type GraphSnapshot } from './readinessEngine.js';
import { SyncEngine } from './syncEngine.js';
import {
  WorktreeManager,
  type AbandonResult,
  type CreateOptions,
  type MergeOptions,
  type MergeResult,
  type WorktreeStatus,
} from './worktreeManager.js';

export interface LifecycleServiceOptions {
  loaded: LoadedConfig;
  store: LineageStore;
  vcs: VcsCapability;
  logger?: Logger;
}

export interface RegisterSpecInput {
  title: string;
  component?: string | null;
  weight?: SpecWeight;
  /** Explicit id; generated from the configured template when omitted. */
  id?: string;
  specPath?: string | null;
}

export interface SpecSummary extends Spec {
  derived_status: DerivedSpecStatus;
}

export interface SpecProgressReport extends SpecProgress {
  derived_status: DerivedSpecStatus;
  unmet: string[];
  dependents: string[];
}

export interface GraphCheckReport {
  /** False when the diagram text contains a cycle. */
  ok: boolean;
  warnings: ParseWarning[];
  cycles: CycleError[];
  /** Ids the diagram references that are not registered. */
  dangling: string[];
  fileOnly: DependencyEdge[];
  storeOnly: DependencyEdge[];
}

export interface GraphSyncResult {
  report: SyncReport | null;
  /** Whether the diagram file was rewritten. */
  written: boolean;
}

export interface BacklogImportReport {
  registered: string[];
  /** Existing, non-stub specs left as they were. */
  skipped: string[];
  archived: string[];
  edges: DependencyEdge[];
  unresolved: { specId: string; reference: string }[];
  cycles: CycleError[];
  warnings: ParseWarning[];
}

export class LifecycleService {
  readonly store: LineageStore;
  readonly sync: SyncEngine;
  readonly readiness: ReadinessEngine;
  readonly worktrees: WorktreeManager;
  private readonly loaded: LoadedConfig;
  private readonly logger: Logger;

  constructor(options: LifecycleServiceOptions) {
    const { loaded, store, vcs } = options;
    const { config, paths } = loaded;
    this.loaded = loaded;
    this.store = store;
    this.logger = options.logger ?? silentLogger;
    this.sync = new SyncEngine({ store, autoRegister: config.lineage.auto_register, logger: this.logger });
    this.readiness = new ReadinessEngine(() => this.snapshot());
    this.worktrees = new WorktreeManager({
      store,
      vcs,
      readiness: this.readiness,
      worktreeRoot: paths.worktreeRoot,
      baseBranch: config.worktrees.base_branch,
      branchPrefix: config.worktrees.branch_prefix,
      removeOnMerge: config.worktrees.remove_on_merge,
      deleteBranchOnMerge: config.worktrees.delete_branch_on_merge,
      logger: this.logger,
    });
  }

  get config(): LoadedConfig {
    return this.loaded;
  }

  close(): void {
    this.store.close();
  }

  // ============================================================================
  // Specs
  // ============================================================================

  /** Register a spec, generating its id from the template unless one is given. */
  registerSpec(input: RegisterSpecInput): Spec {
    const settings = this.loaded.config.spec_id;
    const component = input.component ?? null;
    if (component && !isKnownComponent(settings, component)) {
      throw new ValidationError(
        `Unknown component ${component}; expected one of: ${settings.components.join(', ')}`,
        [component],
      );
    }

    let id = input.id;
    if (!id) {
      if (requiresComponent(settings) && !component) {
        throw new ValidationError('The spec id template needs a component');
      }
      const existing = this.store.listSpecs({ includeArchived: true }).map((s) => s.id);
      id = generateSpecId(settings, nextSpecNumber(existing, component), slugify(input.title), component);
    }
    const specId = id;
    if (!isValidIdentifier(specId)) {
      throw new ValidationError(`Invalid spec id: ${JSON.stringify(specId)}`, [specId]);
    }

    const spec = this.mutateGraph(() =>
      this.store.putSpec({
        id: specId,
        title: input.title,
        component: component?.toUpperCase() ?? null,
        weight: input.weight,
        spec_path: input.specPath ?? null,
      }),
    );
    this.logger.info('Spec registered', { specId: spec.id });
    return spec;
  }

  listSpecs(options: { includeArchived?: boolean; component?: string } = {}): SpecSummary[] {
    const blocked = new Set(this.readiness.blockedSpecs().map((b) => b.specId));
    return this.store.listSpecs(options).map((spec): SpecSummary => ({
      ...spec,
      derived_status: spec.status !== 'complete' && blocked.has(spec.id) ? 'blocked' : spec.status,
    }));
  }

  setSpecStatus(specId: string, status: SpecStatus, options: { force?: boolean } = {}): Spec {
    return this.store.setSpecStatus(specId, status, { force: options.force, reason: 'set by operator' });
  }

  archiveSpec(specId: string): Spec {
    return this.store.archiveSpec(specId);
  }

  specProgress(specId: string): SpecProgressReport {
    const progress = this.store.getSpecProgress(specId);
    const unmet = this.readiness.unmetDependencies(specId);
    return {
      ...progress,
      derived_status: progress.status !== 'complete' && unmet.length > 0 ? 'blocked' : progress.status,
      unmet,
      dependents: this.store.getDependents(specId),
    };
  }

  events(specId?: string): LifecycleEvent[] {
    return this.store.listEvents(specId);
  }

  velocity(days?: number): VelocityPoint[] {
    return this.store.getVelocity(days);
  }

  // ============================================================================
  // Dependencies and the diagram
  // ============================================================================

  /** Sync the diagram in, add the edge to the store, then rewrite the diagram. */
  addDependency(dependent: string, dependency: string): StoredEdge {
    const edge = this.mutateGraph(() => this.store.putEdge(dependent, dependency));
    this.logger.info('Dependency added', { dependent, dependency });
    return edge;
  }

  removeDependency(dependent: string, dependency: string): void {
    this.mutateGraph(() => this.store.removeEdge(dependent, dependency));
    this.logger.info('Dependency removed', { dependent, dependency });
  }

  /** Specs directly depending on `specId`. */
  dependents(specId: string): string[] {
    return this.store.getDependents(specId);
  }

  checkGraph(): GraphCheckReport {
    const text = this.readDiagram() ?? '';
    const parsed = parseDiagram(text);
    const divergence = this.sync.compare(text);
    return {
      ok: parsed.cycles.length === 0,
      warnings: parsed.warnings,
      cycles: parsed.cycles,
      dangling: divergence.unknownNodes,
      fileOnly: divergence.fileOnly,
      storeOnly: divergence.storeOnly,
    };
  }

  /** The diagram text the store's graph renders to, without writing it. */
  renderGraph(): string {
    return this.sync.syncStoreToFile(this.readDiagram() ?? undefined);
  }

  syncGraph(options: { direction?: SyncDirection; prune?: boolean } = {}): GraphSyncResult {
    const direction = options.direction ?? 'bidirectional';
    const text = this.readDiagram();
    let report: SyncReport | null = null;
    if (direction !== 'store-to-file' && text !== null) {
      report = this.sync.syncFileToStore(text, { prune: options.prune });
    }
    let written = false;
    if (direction !== 'file-to-store') {
      written = this.writeDiagram(this.sync.syncStoreToFile(text ?? undefined), text);
    }
    return { report, written };
  }

  // ============================================================================
  // Readiness
  // ============================================================================

  listReady(): string[] {
    return this.readiness.readySpecs();
  }

  listBlocked(): BlockedSpec[] {
    return this.readiness.blockedSpecs();
  }

  impact(specId: string): string[] {
    return this.readiness.impact(specId);
  }

  dependencyChain(specId: string): string[] {
    return this.readiness.dependencyChainOf(specId);
  }

  // ============================================================================
  // Worktrees
  // ============================================================================

  createWorktree(specId: string, options?: CreateOptions): Promise<WorktreeHandle> {
    return this.worktrees.create(specId, options);
  }

  mergeWorktree(specId: string, options?: MergeOptions): Promise<MergeResult> {
    return this.worktrees.merge(specId, options);
  }

  abandonWorktree(specId: string, options?: { removeWorktree?: boolean }): Promise<AbandonResult> {
    return this.worktrees.abandon(specId, options);
  }

  listWorktrees(): WorktreeStatus[] {
    return this.worktrees.status();
  }

  // ============================================================================
  // Plans, tasks and code changes
  // ============================================================================

  setPlan(specId: string, title: string, summary?: string): Plan {
    return this.store.putPlan({ spec_id: specId, title, summary: summary ?? null }, { replace: true });
  }

  addTask(specId: string, taskId: string, title: string, notes?: string): Task {
    return this.store.putTask({ id: taskId, spec_id: specId, title, notes: notes ?? null });
  }

  startTask(taskId: string): Task {
    return this.store.startTask(taskId);
  }

  completeTask(taskId: string, options: { actualMinutes?: number } = {}): CompleteTaskResult {
    const result = this.store.completeTask(taskId, options);
    if (result.specCompleted) {
      this.logger.info('Spec completed', { specId: result.task.spec_id, taskId });
    }
    return result;
  }

  recordChange(input: CodeChangeInput): CodeChangeRecord {
    return this.store.appendCodeChange(input);
  }

  taskContext(taskId: string): TaskContext {
    return this.store.getTaskContext(taskId);
  }

  // ============================================================================
  // Backlog
  // ============================================================================

  /**
   * Register the specs and edges a backlog file describes. Existing specs are left
   * alone unless they are stubs; 🚫 entries are archived.
   */
  importBacklog(text?: string): BacklogImportReport {
    const source = text ?? fs.readFileSync(this.loaded.paths.backlog, 'utf-8');
    const { entries, warnings } = parseBacklog(source);
    const report: BacklogImportReport = {
      registered: [],
      skipped: [],
      archived: [],
      edges: [],
      unresolved: [],
      cycles: [],
      warnings,
    };

    this.mutateGraph(() => {
      for (const entry of entries) {
        const existing = this.store.findSpec(entry.id);
        if (existing && !existing.stub) {
          report.skipped.push(entry.id);
        } else {
          this.store.putSpec(
            {
              id: entry.id,
              title: entry.title,
              weight: entry.weight,
              status: entry.status === 'complete' ? 'in_progress' : entry.status,
              component: existing?.component ?? parseSpecId(entry.id)?.component ?? null,
            },
            { replace: existing !== null },
          );
          if (entry.status === 'complete') {
            // Finished before lineage was tracked: an audited override.
            this.store.setSpecStatus(entry.id, 'complete', { force: true, reason: 'backlog import' });
          }
          report.registered.push(entry.id);
        }
        if (entry.archived && !existing?.archived_at) {
          this.store.archiveSpec(entry.id);
          report.archived.push(entry.id);
        }
      }

      const known = this.store.listSpecs({ includeArchived: true }).map((s) => s.id);
      const graph = this.store.loadGraph();
      for (const entry of entries) {
        for (const reference of entry.dependsOn) {
          const dependency = resolveReference(reference, known);
          if (!dependency) {
            report.unresolved.push({ specId: entry.id, reference });
            continue;
          }
          if (graph.hasEdge(entry.id, dependency)) continue;
          const result = graph.addEdge(entry.id, dependency);
          if (!result.ok) {
            report.cycles.push(result.error);
            continue;
          }
          this.store.putEdge(entry.id, dependency);
          report.edges.push({ dependent: entry.id, dependency });
        }
      }
    });

    this.logger.info('Backlog imported', {
      registered: report.registered.length,
      edges: report.edges.length,
      unresolved: report.unresolved.length,
    });
    return report;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  /**
   * Run a store mutation between a file-to-store sync and a store-to-file rewrite.
   * The store writes share one transaction; the file is written after it commits.
   */
  private mutateGraph<T>(fn: () => T): T {
    const text = this.readDiagram();
    const result = this.store.transaction(() => {
      if (text !== null) this.sync.syncFileToStore(text);
      return fn();
    });
    this.writeDiagram(this.sync.syncStoreToFile(text ?? undefined), text);
    return result;
  }

  private readDiagram(): string | null {
    const file = this.loaded.paths.graph;
    return fs.existsSync(file) ? fs.readFileSync(file, 'utf-8') : null;
  }

  /** Write the diagram through a temp file and rename. Returns false when unchanged. */
  private writeDiagram(next: string, previous: string | null): boolean {
    if (next === previous) return false;
    const file = this.loaded.paths.graph;
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const tmp = `${file}.tmp`;
    fs.writeFileSync(tmp, next, 'utf-8');
    fs.renameSync(tmp, file);
    this.logger.debug('Diagram written', { file });
    return true;
  }

  /** Graph for readiness answers: topology per the configured authority, statuses from the store. */
  private snapshot(): GraphSnapshot {
    const specs = this.store.listSpecs({ includeArchived: true });
    const archived = new Set(specs.filter((s) => s.archived_at !== null).map((s) => s.id));
    if (this.loaded.config.graph.authority === 'store') {
      return { graph: this.store.loadGraph(), archived };
    }

    const text = this.readDiagram() ?? '';
    const graph = new DependencyGraph();
    for (const spec of specs) graph.addNode(spec.id, spec.status);
    for (const edge of parseDiagram(text).graph.edges()) {
      const result = graph.addEdge(edge.dependent, edge.dependency);
      if (!result.ok) this.logger.warn('Diagram edge skipped', { error: result.error.message });
    }
    return { graph, archived };
  }
}

export interface OpenWorkspaceOptions {
  env?: NodeJS.ProcessEnv;
  vcs?: VcsCapability;
  logger?: Logger;
  quiet?: boolean;
  verbose?: boolean;
}

/** Load the project's config and open its store, logger and git capability. */
export function openWorkspace(projectDir: string, options: OpenWorkspaceOptions = {}): LifecycleService {
  const loaded = loadConfig(projectDir, options.env);
  const logger = options.logger ?? new EngineLogger({
    logDir: loaded.paths.logDir,
    quiet: options.quiet || !loaded.config.logging.console,
    verbose: options.verbose,
  });
  const store = LineageStore.open({ path: loaded.paths.lineage, logger });
  if (store.migrationError) {
    logger.warn('Lineage store opened on an older schema', {
      version: store.schemaVersion,
      error: store.migrationError.message,
    });
  }
  const vcs = options.vcs ?? new GitService(projectDir);
  return new LifecycleService({ loaded, store, vcs, logger });
}
