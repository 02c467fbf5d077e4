import { vi, describe, it, expect, beforeEach } from 'vitest';

const { mockGit, simpleGitMock } = vi.hoisted(() => {
  const mockGit = {
    branch: vi.fn().mockResolvedValue({ all: [] }),
    raw: vi.fn().mockResolvedValue(''),
    checkout: vi.fn().mockResolvedValue(undefined),
    merge: vi.fn().mockResolvedValue({ failed: false }),
    status: vi.fn().mockResolvedValue({ isClean: () => true }),
    deleteLocalBranch: vi.fn().mockResolvedValue({ success: true }),
  };
  return { mockGit, simpleGitMock: vi.fn(() => mockGit) };
});

vi.mock('simple-git', () => ({ simpleGit: simpleGitMock }));

import { GitService } from './gitService.js';

describe('GitService', () => {
  let git: GitService;

  beforeEach(() => {
    vi.clearAllMocks();
    git = new GitService('/repo');
  });

  it('opens the repository it was given', () => {
    expect(simpleGitMock).toHaveBeenCalledWith('/repo');
  });

  it('createBranch branches from the base', async () => {
    await git.createBranch('spec/CORE-001', 'main');
    expect(mockGit.branch).toHaveBeenCalledWith(['spec/CORE-001', 'main']);
  });

  it('addWorktree checks the branch out at the path', async () => {
    await git.addWorktree('spec/CORE-001', '/worktrees/CORE-001');
    expect(mockGit.raw).toHaveBeenCalledWith(['worktree', 'add', '/worktrees/CORE-001', 'spec/CORE-001']);
  });

  it('removeWorktree forces only when asked', async () => {
    await git.removeWorktree('/worktrees/CORE-001');
    await git.removeWorktree('/worktrees/CORE-002', { force: true });
    expect(mockGit.raw).toHaveBeenNthCalledWith(1, ['worktree', 'remove', '/worktrees/CORE-001']);
    expect(mockGit.raw).toHaveBeenNthCalledWith(2, ['worktree', 'remove', '/worktrees/CORE-002', '--force']);
  });

  it('merge checks out the target and merges with a merge commit', async () => {
    await git.merge('spec/CORE-001', 'main');
    expect(mockGit.checkout).toHaveBeenCalledWith('main');
    expect(mockGit.merge).toHaveBeenCalledWith(['--no-ff', '--no-edit', 'spec/CORE-001']);
  });

  it('hasUncommittedChanges inspects the worktree itself', async () => {
    mockGit.status.mockResolvedValueOnce({ isClean: () => false });
    expect(await git.hasUncommittedChanges('/worktrees/CORE-001')).toBe(true);
    expect(simpleGitMock).toHaveBeenLastCalledWith('/worktrees/CORE-001');
    expect(await git.hasUncommittedChanges('/worktrees/CORE-001')).toBe(false);
  });

  it('listBranches returns the matching local branches', async () => {
    mockGit.branch.mockResolvedValueOnce({ all: ['spec/CORE-001'] });
    expect(await git.listBranches('spec/CORE-001')).toEqual(['spec/CORE-001']);
    expect(mockGit.branch).toHaveBeenCalledWith(['--list', 'spec/CORE-001']);
  });

  it('deleteBranch deletes the local branch', async () => {
    await git.deleteBranch('spec/CORE-001');
    expect(mockGit.deleteLocalBranch).toHaveBeenCalledWith('spec/CORE-001');
  });

  it('propagates git failures', async () => {
    mockGit.raw.mockRejectedValueOnce(new Error("fatal: 'spec/X' is already checked out"));
    await expect(git.addWorktree('spec/X', '/w/X')).rejects.toThrow('already checked out');
  });
});
