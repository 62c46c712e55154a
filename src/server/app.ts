import express, { Express, NextFunction, Request, Response } from 'express';
import type { AppConfig } from '../configLoader';
import { AppError, RequestValidationError } from '../errors';
import { log, LogLevel } from '../logger';
import type { TaskService } from '../services/tasks/TaskService';
import { createTaskRouter } from './taskRoutes';

export interface AppDependencies {
  config: Pick<AppConfig, 'appName' | 'version' | 'server'>;
  taskService: TaskService;
}

function isMalformedJsonError(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

// body-parser rejects oversized bodies, bad charsets and encodings with a 4xx `status`.
function clientErrorStatus(err: Error): number | undefined {
  const status: unknown = 'status' in err ? err.status : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

export function createApp({ config, taskService }: AppDependencies): Express {
  const app: Express = express();

  // --- Global Middleware ---
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    log(LogLevel.DEBUG, `Server: Received request: ${req.method} ${req.originalUrl}`);
    res.on('finish', () => {
      log(LogLevel.DEBUG, `Server: Responded to ${req.method} ${req.originalUrl} with status ${res.statusCode}`);
    });
    next();
  });

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', config.server.corsAllowedOrigin);
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', req.header('Access-Control-Request-Headers') || 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  // --- Routes ---
  app.get('/', (_req: Request, res: Response) => {
    res.json({
      message: `Welcome to ${config.appName}`,
      version: config.version,
      documentation: '/docs',
    });
  });

  app.use('/tasks', createTaskRouter(taskService));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not Found' });
  });

  // --- Error Handling ---
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (res.headersSent) {
      log(LogLevel.ERROR, `Server: Error after response started for ${req.method} ${req.originalUrl}: ${err.message}`);
      return;
    }

    if (err instanceof RequestValidationError) {
      log(LogLevel.DEBUG, `Server: Validation failed for ${req.method} ${req.originalUrl}`, { details: err.details });
      res.status(err.statusCode).json({ error: err.message, details: err.details });
      return;
    }

    if (err instanceof AppError) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }

    if (isMalformedJsonError(err)) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== undefined) {
      log(LogLevel.DEBUG, `Server: Rejected ${req.method} ${req.originalUrl} with status ${clientStatus}: ${err.message}`);
      res.status(clientStatus).json({ error: err.message });
      return;
    }

    log(LogLevel.ERROR, `Server: Unhandled error in ${req.method} ${req.originalUrl}: ${err.message}`, { error: err });
    res.status(500).json({ error: 'Internal Server Error' });
  });

  return app;
}
