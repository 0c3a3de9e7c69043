/**
 * @ipgeo/utils - Shared utilities package
 *
 * Logger, error classes and configuration loading.
 */

export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger';
export type { LogContext } from './logger';

export * from './config';

export * from './errors';
