/**
 * Forward-only schema migrations for the lineage store. Each migration checks the
 * shape it is about to create, so running the whole list again changes nothing.
 */

import type Database from 'better-sqlite3';
import type { MigrationRecord } from '../models/lineage.js';
import { MigrationError, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

export interface MigrationRunResult {
  from: number;
  to: number;
  applied: number[];
  /** Set when a migration failed; the schema stays at `to`. */
  error: MigrationError | null;
}

export interface RunMigrationsOptions {
  logger?: Logger;
  /** Re-run `up` for already-applied versions too. */
  force?: boolean;
  clock?: () => Date;
}

/** Schema version at which each store feature becomes available. */
export const SCHEMA = {
  specs: 1,
  lineage: 2,
  audit: 3,
  notesAndArchive: 4,
} as const;

export function hasTable(db: Database.Database, table: string): boolean {
  const row = db
    .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table);
  return row !== undefined;
}

export function hasColumn(db: Database.Database, table: string, column: string): boolean {
  const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return columns.some((c) => c.name === column);
}

function addColumnIfMissing(db: Database.Database, table: string, column: string, ddl: string): void {
  if (!hasColumn(db, table, column)) {
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${ddl}`);
  }
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'specs_and_dependencies',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS specs (
          id TEXT PRIMARY KEY,
          title TEXT NOT NULL DEFAULT '',
          component TEXT,
          status TEXT NOT NULL DEFAULT 'not_started'
            CHECK (status IN ('not_started', 'in_progress', 'complete')),
          weight TEXT NOT NULL DEFAULT 'STANDARD'
            CHECK (weight IN ('LIGHTWEIGHT', 'STANDARD', 'FORMAL')),
          spec_path TEXT,
          stub INTEGER NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS dependencies (
          dependent TEXT NOT NULL REFERENCES specs(id),
          dependency TEXT NOT NULL REFERENCES specs(id),
          dependency_type TEXT NOT NULL DEFAULT 'hard' CHECK (dependency_type IN ('hard', 'soft')),
          created_at TEXT NOT NULL,
          PRIMARY KEY (dependent, dependency),
          CHECK (dependent <> dependency)
        );

        CREATE INDEX IF NOT EXISTS idx_dependencies_dependency ON dependencies(dependency);
      `);
    },
  },
  {
    version: 2,
    name: 'plans_tasks_code_changes',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS plans (
          spec_id TEXT PRIMARY KEY REFERENCES specs(id),
          title TEXT NOT NULL,
          summary TEXT,
          created_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS tasks (
          id TEXT PRIMARY KEY,
          spec_id TEXT NOT NULL REFERENCES specs(id),
          title TEXT NOT NULL,
          status TEXT NOT NULL DEFAULT 'pending'
            CHECK (status IN ('pending', 'active', 'completed', 'blocked')),
          actual_minutes INTEGER,
          started_at TEXT,
          completed_at TEXT,
          created_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_tasks_spec ON tasks(spec_id);

        CREATE TABLE IF NOT EXISTS code_changes (
          id TEXT PRIMARY KEY,
          spec_id TEXT NOT NULL REFERENCES specs(id),
          task_id TEXT REFERENCES tasks(id),
          change_type TEXT NOT NULL CHECK (change_type IN ('added', 'modified', 'deleted', 'renamed')),
          commit_sha TEXT,
          lines_added INTEGER NOT NULL DEFAULT 0,
          lines_removed INTEGER NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS code_change_locations (
          change_id TEXT NOT NULL REFERENCES code_changes(id),
          position INTEGER NOT NULL,
          file_path TEXT NOT NULL,
          symbol TEXT,
          PRIMARY KEY (change_id, position)
        );

        CREATE INDEX IF NOT EXISTS idx_code_changes_spec ON code_changes(spec_id);
        CREATE INDEX IF NOT EXISTS idx_code_changes_task ON code_changes(task_id);
      `);
    },
  },
  {
    version: 3,
    name: 'worktrees_and_audit_events',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS worktrees (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          spec_id TEXT NOT NULL REFERENCES specs(id),
          path TEXT NOT NULL,
          branch TEXT NOT NULL,
          state TEXT NOT NULL CHECK (state IN ('created', 'active', 'merged', 'abandoned')),
          forced INTEGER NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE UNIQUE INDEX IF NOT EXISTS idx_worktrees_live
          ON worktrees(spec_id) WHERE state IN ('created', 'active');

        CREATE TABLE IF NOT EXISTS lifecycle_events (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          spec_id TEXT NOT NULL REFERENCES specs(id),
          type TEXT NOT NULL,
          forced INTEGER NOT NULL DEFAULT 0,
          detail TEXT NOT NULL DEFAULT '{}',
          created_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_events_spec ON lifecycle_events(spec_id);
      `);
    },
  },
  {
    version: 4,
    name: 'task_notes_and_spec_archive',
    up(db) {
      addColumnIfMissing(db, 'tasks', 'notes', 'TEXT');
      addColumnIfMissing(db, 'specs', 'archived_at', 'TEXT');
    },
  },
];

export const LATEST_SCHEMA_VERSION = Math.max(...MIGRATIONS.map((m) => m.version));

function ensureBookkeeping(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);
}

/** Highest applied migration version, 0 for a fresh database. */
export function currentSchemaVersion(db: Database.Database): number {
  if (!hasTable(db, 'schema_migrations')) return 0;
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
    .get();
  return row?.version ?? 0;
}

/** Applied migrations, oldest first. */
export function appliedMigrations(db: Database.Database): MigrationRecord[] {
  if (!hasTable(db, 'schema_migrations')) return [];
  return db
    .prepare<[], MigrationRecord>('SELECT version, name, applied_at FROM schema_migrations ORDER BY version')
    .all();
}

function isApplied(db: Database.Database, version: number): boolean {
  const row = db
    .prepare<[number], { version: number }>('SELECT version FROM schema_migrations WHERE version = ?')
    .get(version);
  return row !== undefined;
}

function validate(migrations: Migration[]): Migration[] {
  const sorted = [...migrations].sort((a, b) => a.version - b.version);
  for (let i = 0; i < sorted.length; i++) {
    const { version } = sorted[i];
    if (!Number.isInteger(version) || version < 1) {
      throw new Error(`Migration versions must be positive integers, got ${version}`);
    }
    if (i > 0 && sorted[i - 1].version === version) {
      throw new Error(`Duplicate migration version ${version}`);
    }
  }
  return sorted;
}

/**
 * Apply every migration above the recorded high-water mark, in ascending order.
 * The whole run holds one exclusive transaction; each version runs in a nested
 * savepoint. A failing migration is rolled back alone and stops the run, earlier
 * versions commit, and the error is returned, not thrown, so the caller can keep
 * serving operations that the older schema supports.
 */
export function runMigrations(
  db: Database.Database,
  migrations: Migration[] = MIGRATIONS,
  options: RunMigrationsOptions = {},
): MigrationRunResult {
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? (() => new Date());
  const sorted = validate(migrations);
  const latest = sorted.length > 0 ? sorted[sorted.length - 1].version : 0;

  ensureBookkeeping(db);

  const run = db.transaction((): MigrationRunResult => {
    // Read under the lock: another process may have migrated since we opened.
    const from = currentSchemaVersion(db);
    if (from > latest) {
      throw new MigrationError(from, `schema v${from} is newer than the supported v${latest}`);
    }

    const pending = sorted.filter((m) => options.force || m.version > from);
    if (pending.length > 0 && from < latest) {
      logger.info(`Migrating lineage schema v${from} -> v${latest}`);
    }

    const applied: number[] = [];
    let error: MigrationError | null = null;

    for (const migration of pending) {
      const apply = db.transaction((): boolean => {
        const done = isApplied(db, migration.version);
        if (done && !options.force) return false;
        migration.up(db);
        if (!done) {
          db.prepare<[number, string, string]>(
            'INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)',
          ).run(migration.version, migration.name, clock().toISOString());
        }
        return !done;
      });

      try {
        if (apply()) {
          applied.push(migration.version);
          logger.info(`Applied migration ${migration.version}`, { name: migration.name });
        }
      } catch (err) {
        error = err instanceof MigrationError
          ? err
          : new MigrationError(migration.version, errorMessage(err), err);
        logger.error(`Migration ${migration.version} failed`, { name: migration.name, error: error.message });
        break;
      }
    }

    return { from, to: currentSchemaVersion(db), applied, error };
  });

  return run.exclusive();
}
