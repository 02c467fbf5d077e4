#!/usr/bin/env -S node --import tsx

import { Command, Option } from 'commander';
import type { SpecStatus } from 'specloom-core';
import {
  parseChangeType,
  parseCount,
  parseDirection,
  parseStatus,
  parseWeight,
} from './parsers.js';
import type { GlobalOptions } from './workspace.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('specloom')
    .description('Dependency-aware spec lifecycle and lineage tracking')
    .version('0.1.0')
    .option('-C, --cwd <dir>', 'Project directory (default: current directory)')
    .option('--json', 'Print results as JSON')
    .option('-q, --quiet', 'Do not mirror engine log lines to the console')
    .option('--verbose', 'Mirror debug log lines to the console');

  // ── specs ────────────────────────────────────────────────────────────
  const spec = program.command('spec').description('Register and inspect specs');

  spec
    .command('add <title>')
    .description('Register a spec; the id comes from the configured template unless --id is given')
    .option('-c, --component <component>', 'Component the spec belongs to')
    .addOption(new Option('-w, --weight <weight>', 'LIGHTWEIGHT, STANDARD or FORMAL').argParser(parseWeight))
    .option('--id <id>', 'Use this id instead of generating one')
    .option('--path <file>', 'Path of the spec document')
    .action(async (title: string, _opts: unknown, cmd: Command) => {
      const { runSpecAdd } = await import('./commands/spec.js');
      await runSpecAdd(title, cmd.optsWithGlobals());
    });

  spec
    .command('status')
    .description('Set a spec status')
    .argument('<spec>', 'Spec id')
    .argument('<status>', 'not_started, in_progress or complete', parseStatus)
    .option('--force', 'Complete even without a plan or with open tasks (audited)')
    .action(async (specId: string, status: SpecStatus, _opts: unknown, cmd: Command) => {
      const { runSpecStatus } = await import('./commands/spec.js');
      await runSpecStatus(specId, status, cmd.optsWithGlobals());
    });

  spec
    .command('archive <spec>')
    .description('Archive a spec; it keeps its edges but drops out of listings')
    .action(async (specId: string, _opts: unknown, cmd: Command) => {
      const { runSpecArchive } = await import('./commands/spec.js');
      await runSpecArchive(specId, cmd.optsWithGlobals());
    });

  spec
    .command('progress <spec>')
    .description('Task progress, readiness and dependents of a spec')
    .action(async (specId: string, _opts: unknown, cmd: Command) => {
      const { runSpecProgress } = await import('./commands/spec.js');
      await runSpecProgress(specId, cmd.optsWithGlobals());
    });

  spec
    .command('list')
    .description('List specs with their derived status')
    .option('-a, --all', 'Include archived specs')
    .option('-c, --component <component>', 'Only specs of this component')
    .action(async (_opts: unknown, cmd: Command) => {
      const { runSpecList } = await import('./commands/spec.js');
      await runSpecList(cmd.optsWithGlobals());
    });

  // ── dependencies ─────────────────────────────────────────────────────
  const dep = program.command('dep').description('Edit and check the dependency graph');

  dep
    .command('add <spec> <dependsOn>')
    .description('Record that <spec> depends on <dependsOn>')
    .action(async (specId: string, dependsOn: string, _opts: unknown, cmd: Command) => {
      const { runDepAdd } = await import('./commands/dep.js');
      await runDepAdd(specId, dependsOn, cmd.optsWithGlobals<GlobalOptions>());
    });

  dep
    .command('rm <spec> <dependsOn>')
    .description('Remove a dependency edge')
    .action(async (specId: string, dependsOn: string, _opts: unknown, cmd: Command) => {
      const { runDepRemove } = await import('./commands/dep.js');
      await runDepRemove(specId, dependsOn, cmd.optsWithGlobals<GlobalOptions>());
    });

  dep
    .command('check')
    .description('Report cycles, bad lines, unregistered ids and drift between file and store')
    .action(async (_opts: unknown, cmd: Command) => {
      const { runDepCheck } = await import('./commands/dep.js');
      await runDepCheck(cmd.optsWithGlobals<GlobalOptions>());
    });

  dep
    .command('show')
    .description('Print the diagram the store renders to')
    .action(async (_opts: unknown, cmd: Command) => {
      const { runDepShow } = await import('./commands/dep.js');
      await runDepShow(cmd.optsWithGlobals<GlobalOptions>());
    });

  dep
    .command('sync')
    .description('Reconcile the diagram file and the store')
    .addOption(
      new Option('-d, --direction <direction>', 'file-to-store, store-to-file or bidirectional')
        .argParser(parseDirection),
    )
    .option('--prune', 'Remove store edges that are missing from the file')
    .action(async (_opts: unknown, cmd: Command) => {
      const { runDepSync } = await import('./commands/dep.js');
      await runDepSync(cmd.optsWithGlobals());
    });

  dep
    .command('dependents <spec>')
    .description('Specs that directly depend on <spec>')
    .action(async (specId: string, _opts: unknown, cmd: Command) => {
      const { runDependents } = await import('./commands/dep.js');
      await runDependents(specId, cmd.optsWithGlobals<GlobalOptions>());
    });

  // ── readiness ────────────────────────────────────────────────────────
  program
    .command('ready')
    .description('Specs whose dependencies are all complete')
    .action(async (_opts: unknown, cmd: Command) => {
      const { runReady } = await import('./commands/readiness.js');
      await runReady(cmd.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('blocked')
    .description('Specs waiting on incomplete dependencies')
    .action(async (_opts: unknown, cmd: Command) => {
      const { runBlocked } = await import('./commands/readiness.js');
      await runBlocked(cmd.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('impact <spec>')
    .description('Everything that transitively depends on <spec>')
    .action(async (specId: string, _opts: unknown, cmd: Command) => {
      const { runImpact } = await import('./commands/readiness.js');
      await runImpact(specId, cmd.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('chain <spec>')
    .description('Everything <spec> transitively depends on, in build order')
    .action(async (specId: string, _opts: unknown, cmd: Command) => {
      const { runChain } = await import('./commands/readiness.js');
      await runChain(specId, cmd.optsWithGlobals<GlobalOptions>());
    });

  // ── worktrees ────────────────────────────────────────────────────────
  const wt = program.command('wt').description('Per-spec git worktrees');

  wt
    .command('create <spec>')
    .description('Create a branch and worktree for a ready spec')
    .option('--force', 'Create even when dependencies are incomplete (audited)')
    .action(async (specId: string, _opts: unknown, cmd: Command) => {
      const { runWorktreeCreate } = await import('./commands/worktree.js');
      await runWorktreeCreate(specId, cmd.optsWithGlobals());
    });

  wt
    .command('merge <spec>')
    .description('Merge the spec branch into the base branch')
    .option('--keep-worktree', 'Leave the worktree directory in place')
    .option('--keep-branch', 'Leave the spec branch in place')
    .action(async (specId: string, _opts: unknown, cmd: Command) => {
      const { runWorktreeMerge } = await import('./commands/worktree.js');
      await runWorktreeMerge(specId, cmd.optsWithGlobals());
    });

  wt
    .command('abandon <spec>')
    .description('Give up on a spec worktree without merging')
    .option('--keep-worktree', 'Leave the worktree directory in place')
    .action(async (specId: string, _opts: unknown, cmd: Command) => {
      const { runWorktreeAbandon } = await import('./commands/worktree.js');
      await runWorktreeAbandon(specId, cmd.optsWithGlobals());
    });

  wt
    .command('list')
    .description('Live worktrees with their spec status')
    .action(async (_opts: unknown, cmd: Command) => {
      const { runWorktreeList } = await import('./commands/worktree.js');
      await runWorktreeList(cmd.optsWithGlobals<GlobalOptions>());
    });

  // ── lineage ──────────────────────────────────────────────────────────
  program
    .command('plan')
    .description('Implementation plans')
    .command('set <spec> <title>')
    .description('Set the plan of a spec')
    .option('-s, --summary <text>', 'Plan summary')
    .action(async (specId: string, title: string, _opts: unknown, cmd: Command) => {
      const { runPlanSet } = await import('./commands/lineage.js');
      await runPlanSet(specId, title, cmd.optsWithGlobals());
    });

  const task = program.command('task').description('Tasks of a spec plan');

  task
    .command('add <spec> <taskId> <title>')
    .description('Add a task to a spec')
    .option('-n, --notes <text>', 'Task notes')
    .action(async (specId: string, taskId: string, title: string, _opts: unknown, cmd: Command) => {
      const { runTaskAdd } = await import('./commands/lineage.js');
      await runTaskAdd(specId, taskId, title, cmd.optsWithGlobals());
    });

  task
    .command('start <taskId>')
    .description('Mark a task active')
    .action(async (taskId: string, _opts: unknown, cmd: Command) => {
      const { runTaskStart } = await import('./commands/lineage.js');
      await runTaskStart(taskId, cmd.optsWithGlobals<GlobalOptions>());
    });

  task
    .command('complete <taskId>')
    .description('Mark a task completed; the spec completes with its last task')
    .addOption(new Option('-m, --minutes <n>', 'Minutes spent').argParser(parseCount))
    .action(async (taskId: string, _opts: unknown, cmd: Command) => {
      const { runTaskComplete } = await import('./commands/lineage.js');
      await runTaskComplete(taskId, cmd.optsWithGlobals());
    });

  task
    .command('context <taskId>')
    .description('A task with its spec, plan, sibling tasks and code changes')
    .action(async (taskId: string, _opts: unknown, cmd: Command) => {
      const { runTaskContext } = await import('./commands/lineage.js');
      await runTaskContext(taskId, cmd.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('change')
    .description('Code change lineage')
    .command('record <spec> <files...>')
    .description('Record a code change against a spec or one of its tasks')
    .option('-t, --task <taskId>', 'Task the change belongs to')
    .option('--symbol <name>', 'Symbol touched in each file')
    .addOption(
      new Option('--type <kind>', 'added, modified, deleted or renamed')
        .argParser(parseChangeType),
    )
    .option('--commit <sha>', 'Commit the change landed in')
    .addOption(new Option('--added <n>', 'Lines added').argParser(parseCount))
    .addOption(new Option('--removed <n>', 'Lines removed').argParser(parseCount))
    .action(async (specId: string, files: string[], _opts: unknown, cmd: Command) => {
      const { runChangeRecord } = await import('./commands/lineage.js');
      await runChangeRecord(specId, files, cmd.optsWithGlobals());
    });

  program
    .command('backlog')
    .description('Backlog file import')
    .command('import')
    .description('Register specs and edges from the backlog file')
    .option('-f, --file <path>', 'Backlog file (default: the configured backlog path)')
    .action(async (_opts: unknown, cmd: Command) => {
      const { runBacklogImport } = await import('./commands/lineage.js');
      await runBacklogImport(cmd.optsWithGlobals());
    });

  // ── audit ────────────────────────────────────────────────────────────
  program
    .command('events [spec]')
    .description('Audit trail, optionally for one spec')
    .action(async (specId: string | undefined, _opts: unknown, cmd: Command) => {
      const { runEvents } = await import('./commands/spec.js');
      await runEvents(specId, cmd.optsWithGlobals<GlobalOptions>());
    });

  program
    .command('velocity')
    .description('Completed tasks and minutes per day')
    .addOption(new Option('--days <n>', 'Window in days').argParser(parseCount).default(14))
    .action(async (_opts: unknown, cmd: Command) => {
      const { runVelocity } = await import('./commands/spec.js');
      await runVelocity(cmd.optsWithGlobals());
    });

  program
    .command('migrate')
    .description('Apply pending lineage store migrations')
    .action(async (_opts: unknown, cmd: Command) => {
      const { runMigrate } = await import('./commands/spec.js');
      await runMigrate(cmd.optsWithGlobals<GlobalOptions>());
    });

  return program;
}

const entry = process.argv[1] ?? '';
const isDirectRun = entry.endsWith('cli.js') || entry.endsWith('cli.ts') || entry.endsWith('specloom');
if (isDirectRun) {
  await createProgram().parseAsync(process.argv);
}
