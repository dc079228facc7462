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

function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

/**
 * Initial logger setup from the environment, before the config files are read.
 * Console logging only at this stage.
 */
export function bootstrapLogger(): void {
  const envConsoleLogLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envConsoleLogLevel && isLogLevel(envConsoleLogLevel)) {
    configuredConsoleLogLevel = envConsoleLogLevel;
  }
  log(LogLevel.DEBUG, `Logger bootstrapped. Initial console log level: ${configuredConsoleLogLevel}.`);
}

/**
 * Applies the logging section of the loaded configuration.
 * @param config The logging configuration object.
 */
export function applyLoggerConfig(config: LoggingConfig): void {
  configuredConsoleLogLevel = config.consoleLogLevel;
  configuredFileLogLevel = config.fileLogLevel;

  if (config.logFile) {
    currentLogFile = path.resolve(process.cwd(), config.logFile);

    const logDir = path.dirname(currentLogFile);
    if (!fs.existsSync(logDir)) {
      try {
        fs.mkdirSync(logDir, { recursive: true });
      } catch (err) {
        console.error(`[${new Date().toLocaleString()}] [ERROR] Failed to create log directory: ${logDir}. File logging will be disabled. Error: ${util.format(err)}`);
        currentLogFile = null;
      }
    }
  } else {
    currentLogFile = null;
  }
  log(LogLevel.DEBUG, `Logger configured. Console log level: ${configuredConsoleLogLevel}, file log level: ${configuredFileLogLevel}, file path: ${currentLogFile || 'DISABLED'}`);
}

/**
 * Logs a message to stderr and optionally to a file.
 * stdout is reserved for command output (generated templates, record listings).
 * @param level The severity level of the message.
 * @param message The main message string (can include format specifiers).
 * @param args Additional arguments to format into the message string.
 */
export function log(level: LogLevel, message: string, ...args: unknown[]): void {
  const timestamp = new Date().toLocaleString();
  const fullLogMessage = `[${timestamp}] [${level}] ${util.format(message, ...args)}`;

  if (levelOrder[level] >= levelOrder[configuredConsoleLogLevel]) {
    console.error(fullLogMessage);
  }

  if (currentLogFile && levelOrder[level] >= levelOrder[configuredFileLogLevel]) {
    try {
      fs.appendFileSync(currentLogFile, fullLogMessage + '\n', { encoding: 'utf8' });
    } catch (err) {
      // Avoid recursive log calls on file write error
      console.error(`[${new Date().toLocaleString()}] [ERROR] Failed to write to log file ${currentLogFile}: ${util.format(err)}`);
    }
  }
}
