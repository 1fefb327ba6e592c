import { OperationKind, OperationResult } from './OperationResult';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for dump and restore runs
  logOperationStart(operation: OperationKind, connectionName: string, meta?: LogMeta): void;
  logOperationComplete(result: OperationResult): void;
  logOperationError(operation: string, error: Error, meta?: LogMeta): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(connectionName: string, cronExpression: string): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
