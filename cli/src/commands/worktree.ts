import { formatMerge, formatWorktrees } from '../format.js';
import { print, printJson, withService, type GlobalOptions } from '../workspace.js';

export interface WorktreeCreateOptions extends GlobalOptions {
  force?: boolean;
}

export async function runWorktreeCreate(specId: string, options: WorktreeCreateOptions): Promise<void> {
  await withService(options, async (service) => {
    const handle = await service.createWorktree(specId, { force: options.force });
    if (options.json) printJson(handle);
    else print(`Worktree for ${specId} at ${handle.path} on ${handle.branch}${handle.forced ? ' (forced)' : ''}`);
  });
}

export interface WorktreeMergeOptions extends GlobalOptions {
  keepWorktree?: boolean;
  keepBranch?: boolean;
}

export async function runWorktreeMerge(specId: string, options: WorktreeMergeOptions): Promise<void> {
  await withService(options, async (service) => {
    const result = await service.mergeWorktree(specId, {
      // Unset flags fall back to the configured cleanup.
      removeWorktree: options.keepWorktree ? false : undefined,
      deleteBranch: options.keepBranch ? false : undefined,
    });
    if (options.json) printJson(result);
    else print(formatMerge(result));
  });
}

export interface WorktreeAbandonOptions extends GlobalOptions {
  keepWorktree?: boolean;
}

export async function runWorktreeAbandon(specId: string, options: WorktreeAbandonOptions): Promise<void> {
  await withService(options, async (service) => {
    const result = await service.abandonWorktree(specId, {
      removeWorktree: !options.keepWorktree,
    });
    if (options.json) {
      printJson(result);
      return;
    }
    print(`Abandoned worktree for ${specId}`);
    for (const w of result.warnings) print(`warning: ${w}`);
  });
}

export async function runWorktreeList(options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const worktrees = service.listWorktrees();
    if (options.json) printJson(worktrees);
    else print(formatWorktrees(worktrees));
  });
}
