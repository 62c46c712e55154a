import 'dotenv/config'; // Load .env file into process.env

import { applyLoggerConfig, bootstrapLogger, log, LogLevel } from './logger';
import { loadConfig } from './configLoader';
import { TaskRepository } from './services/tasks/taskRepository';
import { TaskService } from './services/tasks/TaskService';
import { createApp } from './server/app';
import { startServer, stopServer } from './server/index';

async function main(): Promise<void> {
  bootstrapLogger();
  const config = loadConfig();
  applyLoggerConfig(config.logging);

  log(LogLevel.INFO, `Starting ${config.appName} v${config.version} (${config.env})`);

  const repository = TaskRepository.create(config.database);
  const taskService = new TaskService(repository);
  const app = createApp({ config, taskService });
  const server = await startServer(app, config.server);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(LogLevel.INFO, `Received ${signal}, shutting down.`);
    try {
      await stopServer(server);
    } finally {
      repository.close();
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log(LogLevel.ERROR, 'Error during shutdown', { error });
          process.exit(1);
        });
    });
  }
}

main().catch((error: unknown) => {
  log(LogLevel.ERROR, 'Fatal error during startup', { error });
  process.exit(1);
});
