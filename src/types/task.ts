export const TASK_STATUSES = ['pending', 'in_progress', 'completed'] as const;

export type TaskStatus = typeof TASK_STATUSES[number];

export type TaskSortField = 'creation_date' | 'due_date';
export type SortOrder = 'asc' | 'desc';

export interface Task {
  id: number;
  title: string;
  description: string | null;
  due_date: string | null; // ISO-8601, UTC
  status: TaskStatus;
  creation_date: string;
  modified_date: string;
}

export type NewTaskPayload = Pick<Task, 'title' | 'status'> & {
  description?: string | null;
  due_date?: string | null;
};

export type UpdateTaskArgs = Partial<Omit<Task, 'id' | 'creation_date' | 'modified_date'>>;

export interface TaskListQuery {
  status?: TaskStatus;
  due_date_from?: string; // YYYY-MM-DD
  due_date_to?: string; // YYYY-MM-DD
  sort_by: TaskSortField;
  sort_order: SortOrder;
}

export interface TaskCountFilter {
  status?: TaskStatus;
  excludeStatus?: TaskStatus;
  dueFrom?: string;
  dueTo?: string;
}

export interface TaskSuggestion {
  suggested_title: string;
}

export interface TaskStatistics {
  total_tasks: number;
  pending_tasks: number;
  in_progress_tasks: number;
  completed_tasks: number;
  tasks_due_soon: number;
  completion_rate: number;
}

/**
 * Read-only view over stored task text. Both listings follow the same
 * collection order so keyword ranking stays deterministic.
 */
export interface TaskTextSource {
  listTitles(): string[];
  listDescriptions(): string[];
}
