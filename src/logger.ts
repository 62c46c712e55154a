import fs from 'fs';
import path from 'path';
import util from 'util'; // For formatting arguments like console.log does
import type { LoggingConfig } from './configLoader';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

let configuredConsoleLogLevel: LogLevel = LogLevel.INFO;
let configuredFileLogLevel: LogLevel = LogLevel.INFO;
let currentLogFile: string | null = null;
let configuredConsoleQuietMode = false;

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const upper = value?.toUpperCase();
  switch (upper) {
    case LogLevel.DEBUG:
    case LogLevel.INFO:
    case LogLevel.WARN:
    case LogLevel.ERROR:
      return upper;
    default:
      return fallback;
  }
}

/**
 * Initial, minimal logger setup from environment variables.
 * This is for messages before the config files are loaded.
 * Console logging only at this stage.
 */
export function bootstrapLogger(): void {
  configuredConsoleLogLevel = parseLogLevel(process.env.LOG_LEVEL, configuredConsoleLogLevel);
  log(LogLevel.DEBUG, `Logger bootstrapped. Initial console log level: ${configuredConsoleLogLevel}. Full config pending.`);
}

/**
 * Applies the full logging configuration from the loaded AppConfig.
 * @param config The logging section of the application configuration.
 */
export function applyLoggerConfig(config: LoggingConfig): void {
  configuredConsoleLogLevel = config.consoleLogLevel || LogLevel.INFO;
  configuredFileLogLevel = config.fileLogLevel || LogLevel.INFO;
  configuredConsoleQuietMode = config.consoleQuietMode || false;

  if (config.logFile) {
    // Relative log paths resolve against the working directory.
    currentLogFile = path.resolve(process.cwd(), config.logFile);

    const logDir = path.dirname(currentLogFile);
    if (!fs.existsSync(logDir)) {
      try {
        fs.mkdirSync(logDir, { recursive: true });
      } catch (err) {
        console.error(`[${new Date().toISOString()}] [ERROR] Failed to create log directory: ${logDir}. File logging will be disabled. Error: ${util.format(err)}`);
        currentLogFile = null;
      }
    }
  } else {
    currentLogFile = null;
  }
  log(LogLevel.INFO, `Logger fully configured. Console log level: ${configuredConsoleLogLevel}, file log level: ${configuredFileLogLevel}, file path: ${currentLogFile || 'DISABLED'}`);
}

/**
 * Logs a message to the console and optionally to a file.
 * @param level The severity level of the message.
 * @param message The main message string (can include format specifiers).
 * @param args Additional arguments to format into the message string (like console.log).
 */
export function log(level: LogLevel, message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const fullLogMessage = `[${timestamp}] [${level}] ${util.format(message, ...args)}`;

  if (levelOrder[level] >= levelOrder[configuredConsoleLogLevel]) {
    // Quiet mode keeps only WARN and ERROR on the console.
    const suppressed = configuredConsoleQuietMode && (level === LogLevel.DEBUG || level === LogLevel.INFO);

    if (!suppressed) {
      switch (level) {
        case LogLevel.DEBUG:
          console.debug(fullLogMessage);
          break;
        case LogLevel.INFO:
          console.info(fullLogMessage);
          break;
        case LogLevel.WARN:
          console.warn(fullLogMessage);
          break;
        case LogLevel.ERROR:
          console.error(fullLogMessage);
          break;
      }
    }
  }

  if (currentLogFile && levelOrder[level] >= levelOrder[configuredFileLogLevel]) {
    try {
      fs.appendFileSync(currentLogFile, fullLogMessage + '\n', { encoding: 'utf8' });
    } catch (err) {
      // Avoid recursive log calls on file write error
      console.error(`[${new Date().toISOString()}] [ERROR] Failed to write to log file ${currentLogFile}: ${util.format(err)}`);
    }
  }
}
