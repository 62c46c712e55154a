import { TaskNotFoundError } from '../../errors';
import { log, LogLevel } from '../../logger';
import { Task, TaskStatistics, TaskSuggestion } from '../../types/task';
import { DEFAULT_SUGGESTIONS, SuggestionEngine } from '../suggestions/SuggestionEngine';
import { TaskRepository } from './taskRepository';
import type { CreateTaskInput, TaskListQueryInput, UpdateTaskInput } from './taskSchemas';

const DUE_SOON_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

export interface DeleteTaskResult {
  message: string;
}

/**
 * TaskService - Task CRUD, statistics and smart suggestions on top of the
 * task repository. Input is expected to be validated by the schemas in
 * taskSchemas.ts.
 */
export class TaskService {
  private readonly suggestionEngine: SuggestionEngine;

  constructor(private readonly repository: TaskRepository) {
    this.suggestionEngine = new SuggestionEngine(repository);
  }

  createTask(input: CreateTaskInput): Task {
    return this.repository.createTask(input);
  }

  listTasks(query: TaskListQueryInput): Task[] {
    return this.repository.listTasks(query);
  }

  getTask(id: number): Task {
    const task = this.repository.getTaskById(id);
    if (!task) {
      throw new TaskNotFoundError(id);
    }
    return task;
  }

  updateTask(id: number, input: UpdateTaskInput): Task {
    const updated = this.repository.updateTask(id, input);
    if (!updated) {
      throw new TaskNotFoundError(id);
    }
    return updated;
  }

  deleteTask(id: number): DeleteTaskResult {
    if (!this.repository.deleteTask(id)) {
      throw new TaskNotFoundError(id);
    }
    return { message: `Task with id: ${id} deleted successfully` };
  }

  /**
   * Suggestions mined from existing tasks, or a fixed default set when
   * there is nothing to mine.
   */
  getSmartSuggestions(): TaskSuggestion[] {
    const suggestions = this.suggestionEngine.generateSuggestions();
    if (suggestions.length === 0) {
      log(LogLevel.DEBUG, 'TaskService: No keyword patterns found, returning default suggestions');
      return DEFAULT_SUGGESTIONS.map((suggestion) => ({ ...suggestion }));
    }
    return suggestions;
  }

  getStatistics(now: Date = new Date()): TaskStatistics {
    const totalTasks = this.repository.countTasks();
    const completedTasks = this.repository.countTasks({ status: 'completed' });

    return {
      total_tasks: totalTasks,
      pending_tasks: this.repository.countTasks({ status: 'pending' }),
      in_progress_tasks: this.repository.countTasks({ status: 'in_progress' }),
      completed_tasks: completedTasks,
      tasks_due_soon: this.repository.countTasks({
        excludeStatus: 'completed',
        dueFrom: now.toISOString(),
        dueTo: new Date(now.getTime() + DUE_SOON_WINDOW_MS).toISOString(),
      }),
      completion_rate: totalTasks > 0 ? completedTasks / totalTasks : 0,
    };
  }
}
