import http from 'http';
import type { Express } from 'express';
import type { ServerConfig } from '../configLoader';
import { log, LogLevel } from '../logger';

export function startServer(app: Express, config: ServerConfig): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => {
      log(LogLevel.INFO, `Server: Listening on http://${config.host}:${config.port}`);
      resolve(server);
    });
    server.on('error', (err: Error & { code?: string }) => {
      if (err.code === 'EADDRINUSE') {
        log(LogLevel.ERROR, `Server: Port ${config.port} is already in use.`);
      } else {
        log(LogLevel.ERROR, `Server: Failed to start on port ${config.port}.`, { error: err });
      }
      reject(err);
    });
  });
}

export function stopServer(server: http.Server): Promise<void> {
  log(LogLevel.INFO, 'Server: Shutting down...');
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        log(LogLevel.ERROR, 'Server: Error shutting down', { error: err });
        reject(err);
        return;
      }
      log(LogLevel.INFO, 'Server: Shut down successfully.');
      resolve();
    });
  });
}
