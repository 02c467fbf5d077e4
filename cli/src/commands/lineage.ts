import fs from 'node:fs';
import type { ChangeType } from 'specloom-core';
import { formatBacklogReport, formatTaskContext } from '../format.js';
import { print, printJson, withService, type GlobalOptions } from '../workspace.js';

export interface PlanSetOptions extends GlobalOptions {
  summary?: string;
}

export async function runPlanSet(specId: string, title: string, options: PlanSetOptions): Promise<void> {
  await withService(options, (service) => {
    const plan = service.setPlan(specId, title, options.summary);
    if (options.json) printJson(plan);
    else print(`Plan for ${plan.spec_id}: ${plan.title}`);
  });
}

export interface TaskAddOptions extends GlobalOptions {
  notes?: string;
}

export async function runTaskAdd(specId: string, taskId: string, title: string, options: TaskAddOptions): Promise<void> {
  await withService(options, (service) => {
    const task = service.addTask(specId, taskId, title, options.notes);
    if (options.json) printJson(task);
    else print(`Added ${task.id} to ${task.spec_id}`);
  });
}

export async function runTaskStart(taskId: string, options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const task = service.startTask(taskId);
    if (options.json) printJson(task);
    else print(`Started ${task.id}`);
  });
}

export interface TaskCompleteOptions extends GlobalOptions {
  minutes?: number;
}

export async function runTaskComplete(taskId: string, options: TaskCompleteOptions): Promise<void> {
  await withService(options, (service) => {
    const result = service.completeTask(taskId, { actualMinutes: options.minutes });
    if (options.json) {
      printJson(result);
      return;
    }
    print(`Completed ${result.task.id}`);
    if (result.specCompleted) print(`${result.task.spec_id} is complete`);
  });
}

export async function runTaskContext(taskId: string, options: GlobalOptions): Promise<void> {
  await withService(options, (service) => {
    const context = service.taskContext(taskId);
    if (options.json) printJson(context);
    else print(formatTaskContext(context));
  });
}

export interface ChangeRecordOptions extends GlobalOptions {
  task?: string;
  symbol?: string;
  type?: ChangeType;
  commit?: string;
  added?: number;
  removed?: number;
}

export async function runChangeRecord(specId: string, files: string[], options: ChangeRecordOptions): Promise<void> {
  await withService(options, (service) => {
    const change = service.recordChange({
      spec_id: specId,
      task_id: options.task,
      change_type: options.type ?? 'modified',
      locations: files.map((file) => ({ file_path: file, symbol: options.symbol ?? null })),
      commit_sha: options.commit,
      lines_added: options.added,
      lines_removed: options.removed,
    });
    if (options.json) printJson(change);
    else print(`Recorded ${change.id} (${change.change_type}, ${change.locations.length} file(s))`);
  });
}

export interface BacklogImportOptions extends GlobalOptions {
  file?: string;
}

export async function runBacklogImport(options: BacklogImportOptions): Promise<void> {
  await withService(options, (service) => {
    const text = options.file ? fs.readFileSync(options.file, 'utf-8') : undefined;
    const report = service.importBacklog(text);
    if (options.json) printJson({ ...report, cycles: report.cycles.map((c) => c.path) });
    else print(formatBacklogReport(report));
  });
}
