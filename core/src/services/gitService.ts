/** Git operations the worktree manager needs, behind a capability interface. */

import { simpleGit, type SimpleGit } from 'simple-git';

export interface VcsCapability {
  /** Create `branch` pointing at `base`. */
  createBranch(branch: string, base: string): Promise<void>;
  /** Check `branch` out into a new worktree at `worktreePath`. */
  addWorktree(branch: string, worktreePath: string): Promise<void>;
  removeWorktree(worktreePath: string, options?: { force?: boolean }): Promise<void>;
  /** Merge `branch` into `into` with a merge commit. */
  merge(branch: string, into: string): Promise<void>;
  hasUncommittedChanges(worktreePath: string): Promise<boolean>;
  /** Local branch names matching a git branch pattern. */
  listBranches(pattern: string): Promise<string[]>;
  deleteBranch(branch: string): Promise<void>;
}

export class GitService implements VcsCapability {
  private readonly git: SimpleGit;

  constructor(repoPath: string) {
    this.git = simpleGit(repoPath);
  }

  async createBranch(branch: string, base: string): Promise<void> {
    await this.git.branch([branch, base]);
  }

  async addWorktree(branch: string, worktreePath: string): Promise<void> {
    await this.git.raw(['worktree', 'add', worktreePath, branch]);
  }

  async removeWorktree(worktreePath: string, options: { force?: boolean } = {}): Promise<void> {
    const args = ['worktree', 'remove', worktreePath];
    if (options.force) args.push('--force');
    await this.git.raw(args);
  }

  async merge(branch: string, into: string): Promise<void> {
    await this.git.checkout(into);
    await this.git.merge(['--no-ff', '--no-edit', branch]);
  }

  async hasUncommittedChanges(worktreePath: string): Promise<boolean> {
    const status = await simpleGit(worktreePath).status();
    return !status.isClean();
  }

  async listBranches(pattern: string): Promise<string[]> {
    const summary = await this.git.branch(['--list', pattern]);
    return summary.all;
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.git.deleteLocalBranch(branch);
  }
}
