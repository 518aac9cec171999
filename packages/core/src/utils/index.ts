/**
 * Utils Module - Utility functions and helpers
 */

export { logger, initLogger, getLogger, LogLevel } from './logger.js';
export type { Logger, LoggerConfig } from './logger.js';
export { runCommand, describeFailure, COMMAND_NOT_FOUND } from './exec.js';
export type { CommandRunner, RunOptions } from './exec.js';
