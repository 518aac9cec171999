/**
 * Logging Module
 * Winston logger shared by the engine and the CLI. Console output goes to stderr
 * so it never mixes with command output.
 */

import winston from 'winston';
import path from 'node:path';
import os from 'node:os';
import fs from 'node:fs';

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level?: LogLevel;
  logToFile?: boolean;
  logToConsole?: boolean;
  /** Defaults to ~/.launchboard/logs */
  logDir?: string;
  maxFiles?: number;
  maxSize?: number;
  silent?: boolean;
}

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';
const LOG_FILE = 'launchboard.log';
const ERROR_LOG_FILE = 'launchboard-error.log';

const defaultLogDir = (): string => path.join(os.homedir(), '.launchboard', 'logs');

const renderValue = (value: unknown): string => {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return value === undefined ? 'undefined' : JSON.stringify(value);
};

/**
 * One console line: `<timestamp> [<level>]: <message> key=value ...`, with any stack on the lines below
 */
export const renderConsoleLine = (info: winston.Logform.TransformableInfo): string => {
  const { timestamp, level, message, stack, ...meta } = info;
  const fields = Object.entries(meta).map(([key, value]) => `${key}=${renderValue(value)}`);
  const head = [`${String(timestamp)} [${level}]: ${String(message)}`, ...fields].join(' ');
  return typeof stack === 'string' ? `${head}\n${stack}` : head;
};

const fileFormat = (): winston.Logform.Format =>
  winston.format.combine(winston.format.timestamp({ format: TIMESTAMP_FORMAT }), winston.format.json());

/**
 * Create a Winston logger instance
 */
const createLogger = (config: LoggerConfig = {}): winston.Logger => {
  const {
    level = LogLevel.INFO,
    logToFile = true,
    logToConsole = true,
    logDir = defaultLogDir(),
    maxFiles = 5,
    maxSize = 5 * 1024 * 1024,
    silent = false,
  } = config;

  const transports: winston.transport[] = [];

  if (logToConsole) {
    transports.push(
      new winston.transports.Console({
        stderrLevels: Object.values(LogLevel),
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
          winston.format.printf(renderConsoleLine)
        ),
      })
    );
  }

  if (logToFile) {
    fs.mkdirSync(logDir, { recursive: true });

    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, LOG_FILE),
        maxsize: maxSize,
        maxFiles,
        format: fileFormat(),
      }),
      new winston.transports.File({
        filename: path.join(logDir, ERROR_LOG_FILE),
        level: LogLevel.ERROR,
        maxsize: maxSize,
        maxFiles,
        format: fileFormat(),
      })
    );
  }

  return winston.createLogger({
    level,
    silent: silent || transports.length === 0,
    transports,
  });
};

let loggerInstance: winston.Logger | undefined;

/**
 * Replace the shared logger. The CLI calls this once the configuration is loaded.
 */
export const initLogger = (config?: LoggerConfig): winston.Logger => {
  loggerInstance = createLogger(config);
  return loggerInstance;
};

export const getLogger = (): winston.Logger => {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
};

/**
 * Facade used across the engine; resolves the current instance on every call
 */
export const logger = {
  error: (message: string, meta?: unknown): void => {
    getLogger().error(message, meta);
  },

  warn: (message: string, meta?: unknown): void => {
    getLogger().warn(message, meta);
  },

  info: (message: string, meta?: unknown): void => {
    getLogger().info(message, meta);
  },

  debug: (message: string, meta?: unknown): void => {
    getLogger().debug(message, meta);
  },
};

export type Logger = typeof logger;
