/** Human-readable renderings of command results. `--json` bypasses all of these. */

import type {
  BacklogImportReport,
  BlockedSpec,
  DependencyEdge,
  GraphCheckReport,
  LifecycleEvent,
  MergeResult,
  SpecProgressReport,
  SpecSummary,
  SyncReport,
  TaskContext,
  VelocityPoint,
  WorktreeStatus,
} from 'specloom-core';

/** Left-align rows into columns separated by two spaces. */
export function columns(rows: string[][]): string {
  if (rows.length === 0) return '';
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows
    .map((row) => row.map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i]))).join('  '))
    .join('\n');
}

export function edgeLine(edge: DependencyEdge): string {
  return `${edge.dependent} --> ${edge.dependency}`;
}

export function formatSpecList(specs: SpecSummary[]): string {
  if (specs.length === 0) return 'No specs registered.';
  return columns(specs.map((s) => [s.id, s.derived_status, s.title]));
}

export function formatBlocked(blocked: BlockedSpec[]): string {
  if (blocked.length === 0) return 'Nothing is blocked.';
  return blocked.map((b) => `${b.specId} blocked by ${b.unmet.join(', ')}`).join('\n');
}

export function formatIdList(ids: string[], empty: string): string {
  return ids.length === 0 ? empty : ids.join('\n');
}

export function formatProgress(report: SpecProgressReport): string {
  const lines = [
    `${report.spec_id}  ${report.title}`,
    `  status:    ${report.derived_status}`,
    `  plan:      ${report.has_plan ? 'yes' : 'no'}`,
    `  tasks:     ${report.completed}/${report.total_tasks} completed, ${report.active} active, ${report.blocked} blocked`,
    `  minutes:   ${report.minutes_spent}`,
  ];
  if (report.unmet.length > 0) lines.push(`  waiting on: ${report.unmet.join(', ')}`);
  if (report.dependents.length > 0) lines.push(`  dependents: ${report.dependents.join(', ')}`);
  return lines.join('\n');
}

export function formatGraphCheck(report: GraphCheckReport): string {
  const lines = [report.ok ? 'Graph OK' : 'Graph has cycles'];
  for (const cycle of report.cycles) lines.push(`  cycle: ${cycle.path.join(' -> ')}`);
  for (const w of report.warnings) lines.push(`  line ${w.line}: ${w.reason}: ${w.text.trim()}`);
  for (const id of report.dangling) lines.push(`  unregistered: ${id}`);
  for (const e of report.fileOnly) lines.push(`  only in file:  ${edgeLine(e)}`);
  for (const e of report.storeOnly) lines.push(`  only in store: ${edgeLine(e)}`);
  return lines.join('\n');
}

export function formatSyncReport(report: SyncReport | null, written: boolean): string {
  const lines: string[] = [];
  if (report) {
    lines.push(`${report.added.length} added, ${report.removed.length} removed, ${report.unchanged} unchanged`);
    if (report.registered.length > 0) lines.push(`  registered stubs: ${report.registered.join(', ')}`);
    for (const e of report.storeOnly) lines.push(`  only in store: ${edgeLine(e)}`);
    for (const e of report.dangling) lines.push(`  dangling: ${edgeLine(e)}`);
    for (const c of report.cycles) lines.push(`  cycle skipped: ${c.path.join(' -> ')}`);
    for (const w of report.warnings) lines.push(`  line ${w.line}: ${w.reason}: ${w.text.trim()}`);
  }
  lines.push(written ? 'Diagram rewritten.' : 'Diagram unchanged.');
  return lines.join('\n');
}

export function formatWorktrees(worktrees: WorktreeStatus[]): string {
  if (worktrees.length === 0) return 'No live worktrees.';
  return columns(worktrees.map((w) => [w.spec_id, w.state, w.spec_status, w.branch, w.path]));
}

export function formatMerge(result: MergeResult): string {
  const lines = [`Merged ${result.handle.branch}`];
  if (result.specCompleted) {
    lines.push(`${result.handle.spec_id} is complete`);
  } else if (result.completionBlockers.length > 0) {
    lines.push(`${result.handle.spec_id} stays open: ${result.completionBlockers.join('; ')}`);
  }
  for (const w of result.warnings) lines.push(`warning: ${w}`);
  return lines.join('\n');
}

export function formatEvents(events: LifecycleEvent[]): string {
  if (events.length === 0) return 'No events.';
  return columns(
    events.map((e) => [e.created_at, e.spec_id, e.forced ? `${e.type} (forced)` : e.type, JSON.stringify(e.detail)]),
  );
}

export function formatVelocity(points: VelocityPoint[]): string {
  if (points.length === 0) return 'No tasks completed in this window.';
  return columns(points.map((p) => [p.day, `${p.completed} tasks`, `${p.total_minutes} min`]));
}

export function formatTaskContext(context: TaskContext): string {
  const { task, spec, plan } = context;
  const lines = [
    `${task.id}  ${task.title}  [${task.status}]`,
    `  spec: ${spec.id}  ${spec.title}  [${spec.status}]`,
    `  plan: ${plan ? plan.title : '(none)'}`,
  ];
  if (context.sibling_tasks.length > 0) {
    lines.push('  other tasks:');
    for (const t of context.sibling_tasks) lines.push(`    ${t.id}  ${t.title}  [${t.status}]`);
  }
  if (context.changes.length > 0) {
    lines.push('  changes:');
    for (const c of context.changes) {
      const where = c.locations.map((l) => (l.symbol ? `${l.file_path}#${l.symbol}` : l.file_path)).join(', ');
      lines.push(`    ${c.change_type}  ${where}`);
    }
  }
  return lines.join('\n');
}

export function formatBacklogReport(report: BacklogImportReport): string {
  const lines = [
    `${report.registered.length} registered, ${report.skipped.length} skipped, ${report.edges.length} edges added`,
  ];
  if (report.archived.length > 0) lines.push(`  archived: ${report.archived.join(', ')}`);
  for (const u of report.unresolved) lines.push(`  unresolved: ${u.specId} depends on ${u.reference}`);
  for (const c of report.cycles) lines.push(`  cycle skipped: ${c.path.join(' -> ')}`);
  for (const w of report.warnings) lines.push(`  line ${w.line}: ${w.reason}: ${w.text.trim()}`);
  return lines.join('\n');
}
