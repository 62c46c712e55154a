import config from 'config';
import { z } from 'zod';
import { log, LogLevel } from './logger';

// Environment variables mapped through config/custom-environment-variables.json
// arrive as strings, so numeric and boolean fields are coerced here.
const envBoolean = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value),
  z.boolean(),
);

const logLevelSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toUpperCase() : value),
  z.nativeEnum(LogLevel),
);

const loggingConfigSchema = z.object({
  consoleLogLevel: logLevelSchema.default(LogLevel.INFO),
  fileLogLevel: logLevelSchema.default(LogLevel.INFO),
  logFile: z.string().default(''),
  consoleQuietMode: envBoolean.default(false),
});

const serverConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
  corsAllowedOrigin: z.string().default('*'),
});

const databaseConfigSchema = z.object({
  path: z.string().min(1),
});

const appConfigSchema = z.object({
  env: z.string().default('development'),
  appName: z.string(),
  version: z.string(),
  logging: loggingConfigSchema,
  server: serverConfigSchema,
  database: databaseConfigSchema,
});

export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type DatabaseConfig = z.infer<typeof databaseConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

let currentConfig: AppConfig | undefined;

/**
 * Parses a raw configuration object into a typed AppConfig.
 * Throws a ZodError describing every invalid field.
 */
export function parseConfig(raw: unknown): AppConfig {
  return appConfigSchema.parse(raw);
}

/**
 * Loads the application configuration using the 'config' package.
 * This reads config/default.json, the file for NODE_ENV (e.g. test.json),
 * and environment variables according to custom-environment-variables.json.
 * @returns The fully resolved application configuration.
 */
export function loadConfig(): AppConfig {
  const raw: unknown = { env: config.util.getEnv('NODE_ENV'), ...config.util.toObject() };
  currentConfig = parseConfig(raw);
  log(LogLevel.DEBUG, 'Application config loaded:', { appConfig: currentConfig });
  return currentConfig;
}

/**
 * Returns the currently loaded application configuration.
 */
export function getConfig(): AppConfig {
  if (!currentConfig) {
    return loadConfig();
  }
  return currentConfig;
}

/**
 * Sets the application configuration in memory.
 * @param newConfig The new configuration object to set.
 */
export function setConfig(newConfig: AppConfig): void {
  currentConfig = newConfig;
}
