/**
 * Lineage store: durable specs, dependency edges, plans, tasks, code changes,
 * worktree handles and audit events on SQLite. Opening a store runs pending
 * migrations; every operation declares the schema version it needs.
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import Database from 'better-sqlite3';
import type {
  CodeChangeInput,
  CodeChangeRecord,
  CodeLocation,
  ChangeType,
  DependencyType,
  LifecycleEvent,
  LifecycleEventType,
  MigrationRecord,
  Plan,
  Spec,
  SpecInput,
  SpecProgress,
  SpecStatus,
  SpecWeight,
  StoredEdge,
  Task,
  TaskContext,
  TaskInput,
  TaskStatus,
  VelocityPoint,
  WorktreeHandle,
  WorktreeState,
} from '../models/lineage.js';
import { DependencyGraph } from '../utils/dependencyGraph.js';
import { isValidIdentifier } from '../utils/graphCodec.js';
import {
  AlreadyActiveError,
  ConflictError,
  IncompleteSpecError,
  MigrationError,
  NotFoundError,
  ValidationError,
} from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { BUSY_TIMEOUT_MS } from '../utils/constants.js';
import { MIGRATIONS, SCHEMA, appliedMigrations, runMigrations, type Migration, type MigrationRunResult } from './migrations.js';

export interface LineageStoreOptions {
  /** Database file, or `:memory:`. */
  path: string;
  logger?: Logger;
  migrations?: Migration[];
  clock?: () => Date;
}

export interface ReplaceOption {
  replace?: boolean;
}

export interface StatusChangeOptions {
  force?: boolean;
  reason?: string;
}

export interface EventOptions {
  forced?: boolean;
  detail?: Record<string, unknown>;
}

export interface CompleteTaskResult {
  task: Task;
  specCompleted: boolean;
}

// ============================================================================
// Row shapes
// ============================================================================

interface SpecRow {
  id: string;
  title: string;
  component: string | null;
  status: SpecStatus;
  weight: SpecWeight;
  spec_path: string | null;
  stub: number;
  archived_at?: string | null;
  created_at: string;
  updated_at: string;
}

interface TaskRow {
  id: string;
  spec_id: string;
  title: string;
  status: TaskStatus;
  notes?: string | null;
  actual_minutes: number | null;
  started_at: string | null;
  completed_at: string | null;
  created_at: string;
}

interface ChangeRow {
  id: string;
  spec_id: string;
  task_id: string | null;
  change_type: ChangeType;
  commit_sha: string | null;
  lines_added: number;
  lines_removed: number;
  created_at: string;
}

interface LocationRow {
  change_id: string;
  file_path: string;
  symbol: string | null;
}

interface WorktreeRow {
  id: number;
  spec_id: string;
  path: string;
  branch: string;
  state: WorktreeState;
  forced: number;
  created_at: string;
  updated_at: string;
}

interface EventRow {
  id: number;
  spec_id: string;
  type: LifecycleEventType;
  forced: number;
  detail: string;
  created_at: string;
}

function toSpec(row: SpecRow): Spec {
  return { ...row, stub: row.stub === 1, archived_at: row.archived_at ?? null };
}

function toTask(row: TaskRow): Task {
  return { ...row, notes: row.notes ?? null };
}

function toWorktree(row: WorktreeRow): WorktreeHandle {
  return { ...row, forced: row.forced === 1 };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toEvent(row: EventRow): LifecycleEvent {
  const parsed: unknown = JSON.parse(row.detail);
  return { ...row, forced: row.forced === 1, detail: isRecord(parsed) ? parsed : {} };
}

const DAY_MS = 86_400_000;

export class LineageStore {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private migration: MigrationRunResult;

  private constructor(db: Database.Database, options: LineageStoreOptions) {
    this.db = db;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
    this.migration = runMigrations(db, options.migrations ?? MIGRATIONS, {
      logger: this.logger,
      clock: this.clock,
    });
  }

  /** Open (creating if needed) a store and bring its schema up to date. */
  static open(options: LineageStoreOptions): LineageStore {
    if (options.path !== ':memory:') {
      fs.mkdirSync(path.dirname(options.path), { recursive: true });
    }
    const db = new Database(options.path);
    try {
      if (options.path !== ':memory:') db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
      return new LineageStore(db, options);
    } catch (err) {
      db.close();
      throw err;
    }
  }

  get schemaVersion(): number {
    return this.migration.to;
  }

  get migrationError(): MigrationError | null {
    return this.migration.error;
  }

  listMigrations(): MigrationRecord[] {
    return appliedMigrations(this.db);
  }

  /** Re-run every migration against the current schema. Returns the run result. */
  remigrate(migrations: Migration[] = MIGRATIONS): MigrationRunResult {
    this.migration = runMigrations(this.db, migrations, {
      logger: this.logger,
      clock: this.clock,
      force: true,
    });
    return this.migration;
  }

  close(): void {
    this.db.close();
  }

  /** Run `fn` in one write transaction (a savepoint when nested). */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  private require(version: number): void {
    if (this.schemaVersion >= version) return;
    throw this.migration.error ?? new MigrationError(version, 'schema version not applied');
  }

  private now(): string {
    return this.clock().toISOString();
  }

  // ============================================================================
  // Specs
  // ============================================================================

  findSpec(id: string): Spec | null {
    this.require(SCHEMA.specs);
    const row = this.db.prepare<[string], SpecRow>('SELECT * FROM specs WHERE id = ?').get(id);
    return row ? toSpec(row) : null;
  }

  getSpec(id: string): Spec {
    const spec = this.findSpec(id);
    if (!spec) throw new NotFoundError('spec', id);
    return spec;
  }

  hasSpec(id: string): boolean {
    return this.findSpec(id) !== null;
  }

  listSpecs(options: { includeArchived?: boolean; component?: string } = {}): Spec[] {
    this.require(SCHEMA.specs);
    const rows = this.db.prepare<[], SpecRow>('SELECT * FROM specs ORDER BY id').all();
    return rows
      .map(toSpec)
      .filter((s) => options.includeArchived || s.archived_at === null)
      .filter((s) => !options.component || s.component === options.component);
  }

  /**
   * Register a spec. An existing id is a conflict unless `replace` is set. A
   * requested status goes through {@link setSpecStatus}, so completing still
   * needs a plan and no open tasks.
   */
  putSpec(input: SpecInput, options: ReplaceOption = {}): Spec {
    this.require(SCHEMA.specs);
    if (!isValidIdentifier(input.id)) {
      throw new ValidationError(`Invalid spec id: ${JSON.stringify(input.id)}`, [input.id]);
    }
    return this.transaction(() => {
      const existing = this.findSpec(input.id);
      const now = this.now();

      if (existing) {
        if (!options.replace) throw new ConflictError('spec', input.id);
        this.db.prepare<[string, string | null, SpecWeight, string | null, number, string, string]>(`
          UPDATE specs SET title = ?, component = ?, weight = ?, spec_path = ?, stub = ?, updated_at = ?
          WHERE id = ?
        `).run(
          input.title ?? existing.title,
          input.component !== undefined ? input.component : existing.component,
          input.weight ?? existing.weight,
          input.spec_path !== undefined ? input.spec_path : existing.spec_path,
          (input.stub ?? false) ? 1 : 0,
          now,
          input.id,
        );
      } else {
        this.db.prepare<[string, string, string | null, SpecWeight, string | null, number, string, string]>(`
          INSERT INTO specs (id, title, component, status, weight, spec_path, stub, created_at, updated_at)
          VALUES (?, ?, ?, 'not_started', ?, ?, ?, ?, ?)
        `).run(
          input.id,
          input.title ?? '',
          input.component ?? null,
          input.weight ?? 'STANDARD',
          input.spec_path ?? null,
          input.stub ? 1 : 0,
          now,
          now,
        );
        this.auditIfAvailable(input.id, 'spec_registered', { detail: { stub: input.stub ?? false } });
      }

      if (input.status) return this.setSpecStatus(input.id, input.status);
      return this.getSpec(input.id);
    });
  }

  /**
   * Why a spec cannot be complete yet: a missing plan or open tasks.
   * Empty when it may be completed.
   */
  completionBlockers(specId: string): string[] {
    this.require(SCHEMA.lineage);
    this.getSpec(specId);
    const reasons: string[] = [];
    if (!this.findPlan(specId)) reasons.push('no plan');
    const open = this.db
      .prepare<[string], { id: string }>("SELECT id FROM tasks WHERE spec_id = ? AND status <> 'completed' ORDER BY id")
      .all(specId)
      .map((r) => r.id);
    if (open.length > 0) reasons.push(`open tasks: ${open.join(', ')}`);
    return reasons;
  }

  /**
   * Set a spec's status. Completing requires a plan and all tasks completed
   * unless `force` is set; forced changes are flagged in the audit trail.
   */
  setSpecStatus(id: string, status: SpecStatus, options: StatusChangeOptions = {}): Spec {
    this.require(SCHEMA.specs);
    return this.transaction(() => {
      const spec = this.getSpec(id);
      if (spec.status === status) return spec;

      if (status === 'complete' && !options.force) {
        const blockers = this.completionBlockers(id);
        if (blockers.length > 0) throw new IncompleteSpecError(id, blockers);
      }

      this.db.prepare<[SpecStatus, string, string]>('UPDATE specs SET status = ?, updated_at = ? WHERE id = ?')
        .run(status, this.now(), id);
      this.auditIfAvailable(id, 'status_changed', {
        forced: options.force ?? false,
        detail: { from: spec.status, to: status, ...(options.reason ? { reason: options.reason } : {}) },
      });
      return this.getSpec(id);
    });
  }

  /** Archive a spec. Archived specs keep their edges but drop out of listings. */
  archiveSpec(id: string): Spec {
    this.require(SCHEMA.notesAndArchive);
    return this.transaction(() => {
      const spec = this.getSpec(id);
      if (spec.archived_at) return spec;
      const now = this.now();
      this.db.prepare<[string, string, string]>('UPDATE specs SET archived_at = ?, updated_at = ? WHERE id = ?')
        .run(now, now, id);
      this.auditIfAvailable(id, 'status_changed', { detail: { archived: true } });
      return this.getSpec(id);
    });
  }

  // ============================================================================
  // Dependency edges
  // ============================================================================

  findEdge(dependent: string, dependency: string): StoredEdge | null {
    this.require(SCHEMA.specs);
    const row = this.db
      .prepare<[string, string], StoredEdge>('SELECT * FROM dependencies WHERE dependent = ? AND dependency = ?')
      .get(dependent, dependency);
    return row ?? null;
  }

  listEdges(): StoredEdge[] {
    this.require(SCHEMA.specs);
    return this.db
      .prepare<[], StoredEdge>('SELECT * FROM dependencies ORDER BY dependent, dependency')
      .all();
  }

  /**
   * Record that `dependent` depends on `dependency`. Both specs must exist, the
   * edge must be new, and it must not close a cycle.
   */
  putEdge(dependent: string, dependency: string, options: { type?: DependencyType } = {}): StoredEdge {
    this.require(SCHEMA.specs);
    return this.transaction(() => {
      this.getSpec(dependent);
      this.getSpec(dependency);
      if (this.findEdge(dependent, dependency)) {
        throw new ConflictError('edge', `${dependent} --> ${dependency}`);
      }

      const result = this.loadGraph().addEdge(dependent, dependency);
      if (!result.ok) throw result.error;

      this.db.prepare<[string, string, DependencyType, string]>(
        'INSERT INTO dependencies (dependent, dependency, dependency_type, created_at) VALUES (?, ?, ?, ?)',
      ).run(dependent, dependency, options.type ?? 'hard', this.now());
      this.auditIfAvailable(dependent, 'dependency_added', { detail: { dependency } });

      const edge = this.findEdge(dependent, dependency);
      if (!edge) throw new NotFoundError('edge', `${dependent} --> ${dependency}`);
      return edge;
    });
  }

  removeEdge(dependent: string, dependency: string): void {
    this.require(SCHEMA.specs);
    this.transaction(() => {
      const info = this.db
        .prepare<[string, string]>('DELETE FROM dependencies WHERE dependent = ? AND dependency = ?')
        .run(dependent, dependency);
      if (info.changes === 0) throw new NotFoundError('edge', `${dependent} --> ${dependency}`);
      this.auditIfAvailable(dependent, 'dependency_removed', { detail: { dependency } });
    });
  }

  /** Specs that directly depend on `specId`, i.e. are held up if it slips. */
  getDependents(specId: string): string[] {
    this.getSpec(specId);
    return this.db
      .prepare<[string], { dependent: string }>('SELECT dependent FROM dependencies WHERE dependency = ? ORDER BY dependent')
      .all(specId)
      .map((r) => r.dependent);
  }

  /** Project every spec and edge into a fresh graph. */
  loadGraph(): DependencyGraph {
    const nodes = this.listSpecs({ includeArchived: true }).map((s) => ({ id: s.id, status: s.status }));
    const edges = this.listEdges();
    const { graph, rejected } = DependencyGraph.build(nodes, edges);
    if (rejected.length > 0) throw rejected[0];
    return graph;
  }

  // ============================================================================
  // Plans and tasks
  // ============================================================================

  private findPlan(specId: string): Plan | null {
    const row = this.db.prepare<[string], Plan>('SELECT * FROM plans WHERE spec_id = ?').get(specId);
    return row ?? null;
  }

  getPlan(specId: string): Plan | null {
    this.require(SCHEMA.lineage);
    this.getSpec(specId);
    return this.findPlan(specId);
  }

  putPlan(input: { spec_id: string; title: string; summary?: string | null }, options: ReplaceOption = {}): Plan {
    this.require(SCHEMA.lineage);
    return this.transaction(() => {
      this.getSpec(input.spec_id);
      const existing = this.findPlan(input.spec_id);
      if (existing && !options.replace) throw new ConflictError('plan', input.spec_id);

      if (existing) {
        this.db.prepare<[string, string | null, string]>('UPDATE plans SET title = ?, summary = ? WHERE spec_id = ?')
          .run(input.title, input.summary ?? null, input.spec_id);
      } else {
        this.db.prepare<[string, string, string | null, string]>(
          'INSERT INTO plans (spec_id, title, summary, created_at) VALUES (?, ?, ?, ?)',
        ).run(input.spec_id, input.title, input.summary ?? null, this.now());
      }
      const plan = this.findPlan(input.spec_id);
      if (!plan) throw new NotFoundError('plan', input.spec_id);
      return plan;
    });
  }

  private findTask(id: string): Task | null {
    const row = this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id);
    return row ? toTask(row) : null;
  }

  getTask(id: string): Task {
    this.require(SCHEMA.lineage);
    const task = this.findTask(id);
    if (!task) throw new NotFoundError('task', id);
    return task;
  }

  putTask(input: TaskInput, options: ReplaceOption = {}): Task {
    this.require(SCHEMA.notesAndArchive);
    return this.transaction(() => {
      this.getSpec(input.spec_id);
      const existing = this.findTask(input.id);
      if (existing && !options.replace) throw new ConflictError('task', input.id);

      if (existing) {
        this.db.prepare<[string, string, TaskStatus, string | null, string]>(
          'UPDATE tasks SET spec_id = ?, title = ?, status = ?, notes = ? WHERE id = ?',
        ).run(input.spec_id, input.title, input.status ?? existing.status, input.notes ?? existing.notes, input.id);
      } else {
        this.db.prepare<[string, string, string, TaskStatus, string | null, string]>(
          'INSERT INTO tasks (id, spec_id, title, status, notes, created_at) VALUES (?, ?, ?, ?, ?, ?)',
        ).run(input.id, input.spec_id, input.title, input.status ?? 'pending', input.notes ?? null, this.now());
      }
      return this.getTask(input.id);
    });
  }

  listTasksForSpec(specId: string): Task[] {
    this.require(SCHEMA.lineage);
    this.getSpec(specId);
    return this.db
      .prepare<[string], TaskRow>('SELECT * FROM tasks WHERE spec_id = ? ORDER BY id')
      .all(specId)
      .map(toTask);
  }

  /** Mark a task active; a not-started spec moves to in progress with it. */
  startTask(taskId: string): Task {
    this.require(SCHEMA.lineage);
    return this.transaction(() => {
      const task = this.getTask(taskId);
      if (task.status === 'completed') throw new ConflictError('task', taskId, 'is already completed');
      this.db.prepare<[string, string]>(
        "UPDATE tasks SET status = 'active', started_at = COALESCE(started_at, ?) WHERE id = ?",
      ).run(this.now(), taskId);

      const spec = this.getSpec(task.spec_id);
      if (spec.status === 'not_started') {
        this.setSpecStatus(spec.id, 'in_progress', { reason: `task ${taskId} started` });
      }
      return this.getTask(taskId);
    });
  }

  /**
   * Mark a task completed. When that leaves the spec with a plan and no open
   * tasks, the spec becomes complete in the same transaction.
   */
  completeTask(taskId: string, options: { actualMinutes?: number } = {}): CompleteTaskResult {
    this.require(SCHEMA.lineage);
    return this.transaction(() => {
      const task = this.getTask(taskId);
      this.db.prepare<[string, number | null, string]>(`
        UPDATE tasks SET status = 'completed', completed_at = ?, actual_minutes = COALESCE(?, actual_minutes)
        WHERE id = ?
      `).run(this.now(), options.actualMinutes ?? null, taskId);

      const spec = this.getSpec(task.spec_id);
      let specCompleted = false;
      if (spec.status !== 'complete' && this.completionBlockers(spec.id).length === 0) {
        this.setSpecStatus(spec.id, 'complete', { reason: 'all tasks completed' });
        specCompleted = true;
      }
      return { task: this.getTask(taskId), specCompleted };
    });
  }

  // ============================================================================
  // Code changes
  // ============================================================================

  /** Append a code change. Linked to a task when one is given, else to the spec. */
  appendCodeChange(input: CodeChangeInput): CodeChangeRecord {
    this.require(SCHEMA.lineage);
    if (input.locations.length === 0) {
      throw new ValidationError('A code change needs at least one location');
    }

    return this.transaction(() => {
      let specId = input.spec_id;
      if (input.task_id) {
        const task = this.getTask(input.task_id);
        if (specId && specId !== task.spec_id) {
          throw new ConflictError('task', task.id, `belongs to ${task.spec_id}, not ${specId}`);
        }
        specId = task.spec_id;
      }
      if (!specId) throw new ValidationError('A code change needs a spec_id or a task_id');
      this.getSpec(specId);

      const id = `ch_${crypto.randomUUID().replace(/-/g, '').slice(0, 12)}`;
      this.db.prepare<[string, string, string | null, ChangeType, string | null, number, number, string]>(`
        INSERT INTO code_changes (id, spec_id, task_id, change_type, commit_sha, lines_added, lines_removed, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        id,
        specId,
        input.task_id ?? null,
        input.change_type,
        input.commit_sha ?? null,
        input.lines_added ?? 0,
        input.lines_removed ?? 0,
        this.now(),
      );

      const insertLocation = this.db.prepare<[string, number, string, string | null]>(
        'INSERT INTO code_change_locations (change_id, position, file_path, symbol) VALUES (?, ?, ?, ?)',
      );
      input.locations.forEach((loc, i) => insertLocation.run(id, i, loc.file_path, loc.symbol ?? null));

      const [record] = this.hydrateChanges(
        this.db.prepare<[string], ChangeRow>('SELECT * FROM code_changes WHERE id = ?').all(id),
      );
      return record;
    });
  }

  listCodeChanges(filter: { specId?: string; taskId?: string } = {}): CodeChangeRecord[] {
    this.require(SCHEMA.lineage);
    let sql = 'SELECT * FROM code_changes WHERE 1=1';
    const params: string[] = [];
    if (filter.specId) {
      sql += ' AND spec_id = ?';
      params.push(filter.specId);
    }
    if (filter.taskId) {
      sql += ' AND task_id = ?';
      params.push(filter.taskId);
    }
    sql += ' ORDER BY created_at, id';
    return this.hydrateChanges(this.db.prepare<string[], ChangeRow>(sql).all(...params));
  }

  private hydrateChanges(rows: ChangeRow[]): CodeChangeRecord[] {
    const stmt = this.db.prepare<[string], LocationRow>(
      'SELECT change_id, file_path, symbol FROM code_change_locations WHERE change_id = ? ORDER BY position',
    );
    return rows.map((row) => {
      const locations: CodeLocation[] = stmt.all(row.id).map((l) => ({ file_path: l.file_path, symbol: l.symbol }));
      return { ...row, locations };
    });
  }

  // ============================================================================
  // Audit events
  // ============================================================================

  recordEvent(specId: string, type: LifecycleEventType, options: EventOptions = {}): LifecycleEvent {
    this.require(SCHEMA.audit);
    this.getSpec(specId);
    const info = this.db.prepare<[string, LifecycleEventType, number, string, string]>(
      'INSERT INTO lifecycle_events (spec_id, type, forced, detail, created_at) VALUES (?, ?, ?, ?, ?)',
    ).run(specId, type, options.forced ? 1 : 0, JSON.stringify(options.detail ?? {}), this.now());
    const row = this.db
      .prepare<[number], EventRow>('SELECT * FROM lifecycle_events WHERE id = ?')
      .get(Number(info.lastInsertRowid));
    if (!row) throw new NotFoundError('spec', specId);
    return toEvent(row);
  }

  listEvents(specId?: string): LifecycleEvent[] {
    this.require(SCHEMA.audit);
    const rows = specId
      ? this.db.prepare<[string], EventRow>('SELECT * FROM lifecycle_events WHERE spec_id = ? ORDER BY id').all(specId)
      : this.db.prepare<[], EventRow>('SELECT * FROM lifecycle_events ORDER BY id').all();
    return rows.map(toEvent);
  }

  /** Spec-level bookkeeping events are written once the audit table exists. */
  private auditIfAvailable(specId: string, type: LifecycleEventType, options: EventOptions): void {
    if (this.schemaVersion >= SCHEMA.audit) this.recordEvent(specId, type, options);
  }

  // ============================================================================
  // Worktree handles
  // ============================================================================

  getLiveWorktree(specId: string): WorktreeHandle | null {
    this.require(SCHEMA.audit);
    const row = this.db
      .prepare<[string], WorktreeRow>("SELECT * FROM worktrees WHERE spec_id = ? AND state IN ('created', 'active')")
      .get(specId);
    return row ? toWorktree(row) : null;
  }

  getWorktree(id: number): WorktreeHandle {
    this.require(SCHEMA.audit);
    const row = this.db.prepare<[number], WorktreeRow>('SELECT * FROM worktrees WHERE id = ?').get(id);
    if (!row) throw new NotFoundError('worktree', String(id));
    return toWorktree(row);
  }

  listWorktrees(options: { liveOnly?: boolean } = {}): WorktreeHandle[] {
    this.require(SCHEMA.audit);
    const sql = options.liveOnly
      ? "SELECT * FROM worktrees WHERE state IN ('created', 'active') ORDER BY spec_id, id"
      : 'SELECT * FROM worktrees ORDER BY spec_id, id';
    return this.db.prepare<[], WorktreeRow>(sql).all().map(toWorktree);
  }

  /** Write a `created` handle. Fails if the spec already has a live one. */
  reserveWorktree(input: { spec_id: string; path: string; branch: string; forced?: boolean }): WorktreeHandle {
    this.require(SCHEMA.audit);
    return this.transaction(() => {
      this.getSpec(input.spec_id);
      const live = this.getLiveWorktree(input.spec_id);
      if (live) throw new AlreadyActiveError(input.spec_id, live.path);
      const now = this.now();
      const info = this.db.prepare<[string, string, string, number, string, string]>(`
        INSERT INTO worktrees (spec_id, path, branch, state, forced, created_at, updated_at)
        VALUES (?, ?, ?, 'created', ?, ?, ?)
      `).run(input.spec_id, input.path, input.branch, input.forced ? 1 : 0, now, now);
      return this.getWorktree(Number(info.lastInsertRowid));
    });
  }

  transitionWorktree(id: number, state: WorktreeState): WorktreeHandle {
    this.require(SCHEMA.audit);
    const info = this.db.prepare<[WorktreeState, string, number]>(
      'UPDATE worktrees SET state = ?, updated_at = ? WHERE id = ?',
    ).run(state, this.now(), id);
    if (info.changes === 0) throw new NotFoundError('worktree', String(id));
    return this.getWorktree(id);
  }

  // ============================================================================
  // Queries
  // ============================================================================

  getSpecProgress(specId: string): SpecProgress {
    this.require(SCHEMA.lineage);
    const spec = this.getSpec(specId);
    const row = this.db.prepare<[string], {
      total: number;
      completed: number | null;
      active: number | null;
      blocked: number | null;
      minutes: number | null;
    }>(`
      SELECT
        COUNT(*) AS total,
        SUM(status = 'completed') AS completed,
        SUM(status = 'active') AS active,
        SUM(status = 'blocked') AS blocked,
        SUM(actual_minutes) AS minutes
      FROM tasks WHERE spec_id = ?
    `).get(specId);

    return {
      spec_id: spec.id,
      title: spec.title,
      status: spec.status,
      has_plan: this.findPlan(specId) !== null,
      total_tasks: row?.total ?? 0,
      completed: row?.completed ?? 0,
      active: row?.active ?? 0,
      blocked: row?.blocked ?? 0,
      minutes_spent: row?.minutes ?? 0,
    };
  }

  /** Tasks completed per UTC day over the last `days` days. */
  getVelocity(days = 14): VelocityPoint[] {
    this.require(SCHEMA.lineage);
    const since = new Date(this.clock().getTime() - days * DAY_MS).toISOString();
    return this.db.prepare<[string], VelocityPoint>(`
      SELECT
        substr(completed_at, 1, 10) AS day,
        COUNT(*) AS completed,
        COALESCE(SUM(actual_minutes), 0) AS total_minutes
      FROM tasks
      WHERE status = 'completed' AND completed_at >= ?
      GROUP BY day
      ORDER BY day
    `).all(since);
  }

  /** Everything needed to pick a task up: its spec, plan, siblings and recorded changes. */
  getTaskContext(taskId: string): TaskContext {
    const task = this.getTask(taskId);
    return {
      task,
      spec: this.getSpec(task.spec_id),
      plan: this.findPlan(task.spec_id),
      sibling_tasks: this.listTasksForSpec(task.spec_id).filter((t) => t.id !== taskId),
      changes: this.listCodeChanges({ taskId }),
    };
  }
}
