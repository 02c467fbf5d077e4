/**
 * Per-spec worktree lifecycle: `created` (reserved) -> `active` -> `merged` | `abandoned`.
 * Operations on one spec id run one at a time; different specs proceed in parallel.
 */

import path from 'node:path';
import type { SpecStatus, WorktreeHandle } from '../models/lineage.js';
import { KeyedLock } from '../utils/keyedLock.js';
import {
  AlreadyActiveError,
  NotFoundError,
  NotReadyError,
  UncommittedChangesError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';
import { isValidIdentifier } from '../utils/graphCodec.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { VcsCapability } from './gitService.js';
import type { LineageStore } from './lineageStore.js';
import type { ReadinessEngine } from './readinessEngine.js';

export interface WorktreeManagerOptions {
  store: LineageStore;
  vcs: VcsCapability;
  readiness: ReadinessEngine;
  /** Directory that holds one worktree per spec. */
  worktreeRoot: string;
  baseBranch: string;
  branchPrefix: string;
  removeOnMerge: boolean;
  deleteBranchOnMerge: boolean;
  logger?: Logger;
}

export interface CreateOptions {
  /** Create even when dependencies are incomplete; the audit event is flagged. */
  force?: boolean;
}

export interface MergeOptions {
  removeWorktree?: boolean;
  deleteBranch?: boolean;
}

export interface MergeResult {
  handle: WorktreeHandle;
  specCompleted: boolean;
  /** Why the spec stayed open, when it did. */
  completionBlockers: string[];
  worktreeRemoved: boolean;
  branchDeleted: boolean;
  /** Cleanup steps that failed after the merge itself succeeded. */
  warnings: string[];
}

export interface AbandonResult {
  handle: WorktreeHandle;
  worktreeRemoved: boolean;
  warnings: string[];
}

export interface WorktreeStatus extends WorktreeHandle {
  spec_status: SpecStatus;
}

export class WorktreeManager {
  private readonly lock = new KeyedLock();
  private readonly logger: Logger;

  constructor(private readonly options: WorktreeManagerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  branchFor(specId: string): string {
    return `${this.options.branchPrefix}${specId}`;
  }

  pathFor(specId: string): string {
    if (!isValidIdentifier(specId)) {
      throw new ValidationError(`Invalid spec id: ${JSON.stringify(specId)}`, [specId]);
    }
    return path.join(this.options.worktreeRoot, specId);
  }

  /**
   * Reserve a handle, create the branch if needed and add the worktree.
   * A git failure abandons the reservation and rethrows.
   */
  create(specId: string, opts: CreateOptions = {}): Promise<WorktreeHandle> {
    return this.lock.run(specId, async () => {
      const { store, vcs, readiness, baseBranch } = this.options;
      const spec = store.getSpec(specId);
      const live = store.getLiveWorktree(specId);
      if (live) throw new AlreadyActiveError(specId, live.path);

      const unmet = readiness.unmetDependencies(specId);
      if (unmet.length > 0 && !opts.force) throw new NotReadyError(specId, unmet);
      const forced = unmet.length > 0;

      const branch = this.branchFor(specId);
      const worktreePath = this.pathFor(specId);
      const reserved = store.reserveWorktree({ spec_id: specId, path: worktreePath, branch, forced });

      try {
        const existing = await vcs.listBranches(branch);
        if (!existing.includes(branch)) await vcs.createBranch(branch, baseBranch);
        await vcs.addWorktree(branch, worktreePath);
      } catch (err) {
        store.transaction(() => {
          store.transitionWorktree(reserved.id, 'abandoned');
          store.recordEvent(specId, 'worktree_abandoned', { detail: { path: worktreePath, error: errorMessage(err) } });
        });
        this.logger.error('Worktree creation failed', { specId, error: errorMessage(err) });
        throw err;
      }

      const handle = store.transaction(() => {
        const active = store.transitionWorktree(reserved.id, 'active');
        store.recordEvent(specId, 'worktree_created', {
          forced,
          detail: { path: worktreePath, branch, ...(forced ? { unmet } : {}) },
        });
        if (spec.status === 'not_started') {
          store.setSpecStatus(specId, 'in_progress', { reason: 'worktree created' });
        }
        return active;
      });
      this.logger.info('Worktree created', { specId, path: worktreePath, branch, forced });
      return handle;
    });
  }

  /**
   * Merge the spec branch into the base branch. The handle, the audit event and any
   * resulting spec completion are committed together; cleanup failures are reported.
   */
  merge(specId: string, opts: MergeOptions = {}): Promise<MergeResult> {
    return this.lock.run(specId, async () => {
      const { store, vcs, baseBranch } = this.options;
      // A `created` handle is still being set up by whoever reserved it.
      const live = store.getLiveWorktree(specId);
      if (!live || live.state !== 'active') throw new NotFoundError('worktree', specId);
      if (await vcs.hasUncommittedChanges(live.path)) {
        throw new UncommittedChangesError(specId, live.path);
      }

      await vcs.merge(live.branch, baseBranch);

      const { handle, specCompleted, blockers } = store.transaction(() => {
        const merged = store.transitionWorktree(live.id, 'merged');
        const spec = store.getSpec(specId);
        const reasons = spec.status === 'complete' ? [] : store.completionBlockers(specId);
        const completes = spec.status !== 'complete' && reasons.length === 0;
        if (completes) store.setSpecStatus(specId, 'complete', { reason: 'worktree merged' });
        store.recordEvent(specId, 'worktree_merged', {
          detail: { branch: live.branch, into: baseBranch, specCompleted: completes },
        });
        return { handle: merged, specCompleted: completes, blockers: reasons };
      });

      const result: MergeResult = {
        handle,
        specCompleted,
        completionBlockers: blockers,
        worktreeRemoved: false,
        branchDeleted: false,
        warnings: [],
      };

      if (opts.removeWorktree ?? this.options.removeOnMerge) {
        try {
          await vcs.removeWorktree(live.path);
          result.worktreeRemoved = true;
        } catch (err) {
          result.warnings.push(`worktree removal failed: ${errorMessage(err)}`);
        }
      }
      if (opts.deleteBranch ?? this.options.deleteBranchOnMerge) {
        try {
          await vcs.deleteBranch(live.branch);
          result.branchDeleted = true;
        } catch (err) {
          result.warnings.push(`branch deletion failed: ${errorMessage(err)}`);
        }
      }

      for (const warning of result.warnings) this.logger.warn(warning, { specId });
      this.logger.info('Worktree merged', { specId, branch: live.branch, specCompleted });
      return result;
    });
  }

  /** Give up on a spec's worktree. The spec's status is left as it is. */
  abandon(specId: string, opts: { removeWorktree?: boolean } = {}): Promise<AbandonResult> {
    return this.lock.run(specId, async () => {
      const { store, vcs } = this.options;
      const live = store.getLiveWorktree(specId);
      if (!live) throw new NotFoundError('worktree', specId);

      const handle = store.transaction(() => {
        const abandoned = store.transitionWorktree(live.id, 'abandoned');
        store.recordEvent(specId, 'worktree_abandoned', { detail: { path: live.path, branch: live.branch } });
        return abandoned;
      });

      const result: AbandonResult = { handle, worktreeRemoved: false, warnings: [] };
      if (opts.removeWorktree ?? true) {
        try {
          await vcs.removeWorktree(live.path, { force: true });
          result.worktreeRemoved = true;
        } catch (err) {
          result.warnings.push(`worktree removal failed: ${errorMessage(err)}`);
          this.logger.warn('Worktree removal failed', { specId, error: errorMessage(err) });
        }
      }
      this.logger.info('Worktree abandoned', { specId, path: live.path });
      return result;
    });
  }

  /** Live handles with the status of their spec. */
  status(): WorktreeStatus[] {
    const { store } = this.options;
    return store.listWorktrees({ liveOnly: true }).map((handle) => ({
      ...handle,
      spec_status: store.getSpec(handle.spec_id).status,
    }));
  }
}
