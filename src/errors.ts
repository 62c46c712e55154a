import type { ZodIssue } from 'zod';

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Base class for errors that map onto an HTTP response.
 */
export class AppError extends Error {
  constructor(message: string, readonly statusCode: number) {
    super(message);
    this.name = new.target.name;
  }
}

export class TaskNotFoundError extends AppError {
  constructor(readonly taskId: number) {
    super('Task not found', 404);
  }
}

export class RequestValidationError extends AppError {
  readonly details: ValidationIssue[];

  constructor(issues: readonly ZodIssue[]) {
    super('Validation failed', 422);
    this.details = issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
  }
}
