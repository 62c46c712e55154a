import { NextFunction, Request, Response, Router } from 'express';
import type { TaskService } from '../services/tasks/TaskService';
import {
  createTaskSchema,
  taskListQuerySchema,
  taskParamsSchema,
  updateTaskSchema,
} from '../services/tasks/taskSchemas';
import { parseRequest } from './validation';

type Handler = (req: Request, res: Response) => void;

// Forwards anything a handler throws to the Express error middleware.
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      handler(req, res);
    } catch (error) {
      next(error);
    }
  };
}

export function createTaskRouter(taskService: TaskService): Router {
  const router = Router();

  router.post('/', route((req, res) => {
    const input = parseRequest(createTaskSchema, req.body);
    res.status(201).json(taskService.createTask(input));
  }));

  router.get('/', route((req, res) => {
    const query = parseRequest(taskListQuerySchema, req.query);
    res.json(taskService.listTasks(query));
  }));

  // Fixed paths first so they are not captured by /:taskId.
  router.get('/suggestions/smart', route((_req, res) => {
    res.json(taskService.getSmartSuggestions());
  }));

  router.get('/statistics/overview', route((_req, res) => {
    res.json(taskService.getStatistics());
  }));

  router.get('/:taskId', route((req, res) => {
    const { taskId } = parseRequest(taskParamsSchema, req.params);
    res.json(taskService.getTask(taskId));
  }));

  router.put('/:taskId', route((req, res) => {
    const { taskId } = parseRequest(taskParamsSchema, req.params);
    const input = parseRequest(updateTaskSchema, req.body);
    res.json(taskService.updateTask(taskId, input));
  }));

  router.delete('/:taskId', route((req, res) => {
    const { taskId } = parseRequest(taskParamsSchema, req.params);
    res.json(taskService.deleteTask(taskId));
  }));

  return router;
}
