/** Error taxonomy for the lifecycle engine. Every error names the identifiers it concerns. */

export type ErrorCode =
  | 'CYCLE'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'NOT_READY'
  | 'ALREADY_ACTIVE'
  | 'UNCOMMITTED_CHANGES'
  | 'INCOMPLETE_SPEC'
  | 'MIGRATION_FAILED'
  | 'INVALID_CONFIG'
  | 'INVALID_INPUT';

export class SpecloomError extends Error {
  readonly code: ErrorCode;
  readonly ids: string[];

  constructor(code: ErrorCode, message: string, ids: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpecloomError';
    this.code = code;
    this.ids = ids;
  }
}

/** An edge was rejected because it would close a cycle. `path` starts and ends on the same id. */
export class CycleError extends SpecloomError {
  readonly path: string[];

  constructor(path: string[]) {
    super('CYCLE', `Dependency cycle: ${path.join(' -> ')}`, [...new Set(path)]);
    this.name = 'CycleError';
    this.path = path;
  }
}

export type EntityKind = 'spec' | 'edge' | 'plan' | 'task' | 'worktree' | 'code_change' | 'node';

export class NotFoundError extends SpecloomError {
  readonly entity: EntityKind;
  readonly id: string;

  constructor(entity: EntityKind, id: string) {
    super('NOT_FOUND', `Unknown ${entity}: ${id}`, [id]);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

export class ConflictError extends SpecloomError {
  readonly entity: EntityKind;
  readonly id: string;

  constructor(entity: EntityKind, id: string, detail = 'already exists') {
    super('CONFLICT', `${entity} ${id} ${detail}`, [id]);
    this.name = 'ConflictError';
    this.entity = entity;
    this.id = id;
  }
}

export class NotReadyError extends SpecloomError {
  readonly specId: string;
  readonly unmet: string[];

  constructor(specId: string, unmet: string[]) {
    super('NOT_READY', `${specId} is blocked by: ${unmet.join(', ')}`, [specId, ...unmet]);
    this.name = 'NotReadyError';
    this.specId = specId;
    this.unmet = unmet;
  }
}

export class AlreadyActiveError extends SpecloomError {
  readonly specId: string;
  readonly path: string;

  constructor(specId: string, path: string) {
    super('ALREADY_ACTIVE', `${specId} already has a live worktree at ${path}`, [specId]);
    this.name = 'AlreadyActiveError';
    this.specId = specId;
    this.path = path;
  }
}

export class UncommittedChangesError extends SpecloomError {
  readonly specId: string;
  readonly path: string;

  constructor(specId: string, path: string) {
    super('UNCOMMITTED_CHANGES', `Worktree for ${specId} has uncommitted changes: ${path}`, [specId]);
    this.name = 'UncommittedChangesError';
    this.specId = specId;
    this.path = path;
  }
}

/** A spec was asked to become complete before its lineage allows it. */
export class IncompleteSpecError extends SpecloomError {
  readonly specId: string;
  readonly reasons: string[];

  constructor(specId: string, reasons: string[]) {
    super('INCOMPLETE_SPEC', `${specId} cannot be completed: ${reasons.join('; ')}`, [specId]);
    this.name = 'IncompleteSpecError';
    this.specId = specId;
    this.reasons = reasons;
  }
}

export class MigrationError extends SpecloomError {
  readonly version: number;

  constructor(version: number, message: string, cause?: unknown) {
    super('MIGRATION_FAILED', `Migration ${version} failed: ${message}`, [String(version)], { cause });
    this.name = 'MigrationError';
    this.version = version;
  }
}

export class ConfigError extends SpecloomError {
  readonly file: string;

  constructor(file: string, issues: string[]) {
    super('INVALID_CONFIG', `Invalid config ${file}: ${issues.join('; ')}`, [file]);
    this.name = 'ConfigError';
    this.file = file;
  }
}

/** Input rejected before anything was written. */
export class ValidationError extends SpecloomError {
  constructor(message: string, ids: string[] = []) {
    super('INVALID_INPUT', message, ids);
    this.name = 'ValidationError';
  }
}

/** Narrow an unknown thrown value to a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
