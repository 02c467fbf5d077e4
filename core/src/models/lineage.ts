/** Lineage data model: specs, plans, tasks, code changes, worktrees and audit events. */

export type SpecStatus = 'not_started' | 'in_progress' | 'complete';

/** Status as reported to operators; `blocked` is derived from the graph, never stored. */
export type DerivedSpecStatus = SpecStatus | 'blocked';

export const SPEC_STATUSES: readonly SpecStatus[] = ['not_started', 'in_progress', 'complete'];

export type SpecWeight = 'LIGHTWEIGHT' | 'STANDARD' | 'FORMAL';

export const SPEC_WEIGHTS: readonly SpecWeight[] = ['LIGHTWEIGHT', 'STANDARD', 'FORMAL'];

export interface Spec {
  id: string;
  title: string;
  component: string | null;
  status: SpecStatus;
  weight: SpecWeight;
  spec_path: string | null;
  stub: boolean;
  archived_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface SpecInput {
  id: string;
  title?: string;
  component?: string | null;
  status?: SpecStatus;
  weight?: SpecWeight;
  spec_path?: string | null;
  stub?: boolean;
}

export type DependencyType = 'hard' | 'soft';

export interface StoredEdge {
  dependent: string;
  dependency: string;
  dependency_type: DependencyType;
  created_at: string;
}

export interface Plan {
  spec_id: string;
  title: string;
  summary: string | null;
  created_at: string;
}

export type TaskStatus = 'pending' | 'active' | 'completed' | 'blocked';

export interface Task {
  id: string;
  spec_id: string;
  title: string;
  status: TaskStatus;
  notes: string | null;
  actual_minutes: number | null;
  started_at: string | null;
  completed_at: string | null;
  created_at: string;
}

export interface TaskInput {
  id: string;
  spec_id: string;
  title: string;
  status?: TaskStatus;
  notes?: string | null;
}

export type ChangeType = 'added' | 'modified' | 'deleted' | 'renamed';

export interface CodeLocation {
  file_path: string;
  symbol?: string | null;
}

export interface CodeChangeRecord {
  id: string;
  spec_id: string;
  task_id: string | null;
  change_type: ChangeType;
  commit_sha: string | null;
  lines_added: number;
  lines_removed: number;
  locations: CodeLocation[];
  created_at: string;
}

export interface CodeChangeInput {
  spec_id?: string;
  task_id?: string;
  change_type: ChangeType;
  locations: CodeLocation[];
  commit_sha?: string;
  lines_added?: number;
  lines_removed?: number;
}

export type WorktreeState = 'created' | 'active' | 'merged' | 'abandoned';

export interface WorktreeHandle {
  id: number;
  spec_id: string;
  path: string;
  branch: string;
  state: WorktreeState;
  forced: boolean;
  created_at: string;
  updated_at: string;
}

export type LifecycleEventType =
  | 'spec_registered'
  | 'status_changed'
  | 'dependency_added'
  | 'dependency_removed'
  | 'worktree_created'
  | 'worktree_merged'
  | 'worktree_abandoned';

export interface LifecycleEvent {
  id: number;
  spec_id: string;
  type: LifecycleEventType;
  forced: boolean;
  detail: Record<string, unknown>;
  created_at: string;
}

/** One row of the schema version history. */
export interface MigrationRecord {
  version: number;
  name: string;
  applied_at: string;
}

export interface SpecProgress {
  spec_id: string;
  title: string;
  status: SpecStatus;
  has_plan: boolean;
  total_tasks: number;
  completed: number;
  active: number;
  blocked: number;
  minutes_spent: number;
}

export interface VelocityPoint {
  day: string;
  completed: number;
  total_minutes: number;
}

export interface TaskContext {
  task: Task;
  spec: Spec;
  plan: Plan | null;
  sibling_tasks: Task[];
  changes: CodeChangeRecord[];
}
