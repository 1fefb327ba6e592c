import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { OperationKind, OperationResult } from '../interfaces/OperationResult';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'pgpassword'];

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: LogMeta = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = this.sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [
        new winston.transports.Console({
          stderrLevels: ['error', 'warn', 'info', 'debug'],
        }),
      ],
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  sanitizeMeta(meta: LogMeta): LogMeta {
    const sanitized: LogMeta = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
      } else if (Array.isArray(value)) {
        sanitized[key] = value.map(item => (isPlainObject(item) ? this.sanitizeMeta(item) : item));
      } else if (isPlainObject(value)) {
        sanitized[key] = this.sanitizeMeta(value);
      }
    }

    return sanitized;
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...errorDetails(error),
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logOperationStart(operation: OperationKind, connectionName: string, meta?: LogMeta): void {
    this.info(`${capitalize(operation)} operation started`, {
      operation: `${operation}_start`,
      connectionName,
      ...meta,
    });
  }

  logOperationComplete(result: OperationResult): void {
    const meta: LogMeta = {
      operation: `${result.operation}_complete`,
      connectionName: result.connectionName,
      status: result.status,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
    };

    if (result.artifact) {
      meta.artifact = result.artifact.id;
      meta.fileSizeMB = Math.round((result.artifact.sizeBytes / 1024 / 1024) * 100) / 100;
    }

    if (result.error) {
      this.warn(`${capitalize(result.operation)} operation finished with status ${result.status}`, {
        ...meta,
        errorCode: result.error.code,
        errorMessage: result.error.message,
      });
      return;
    }

    this.info(`${capitalize(result.operation)} operation completed successfully`, meta);
  }

  logOperationError(operation: string, error: Error, meta?: LogMeta): void {
    this.error(`Operation failed: ${operation}`, error, {
      operation: 'operation_error',
      failedOperation: operation,
      ...meta,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config: this.sanitizeMeta(config),
    });
  }

  logScheduledExecution(connectionName: string, cronExpression: string): void {
    this.info('Scheduled dump execution triggered', {
      operation: 'scheduled_execution',
      connectionName,
      cronExpression,
    });
  }

  /**
   * Create a logger instance with the specified log level from environment
   */
  static createFromEnvironment(env: NodeJS.ProcessEnv = process.env): Logger {
    const logLevel = env.LOG_LEVEL?.toLowerCase();

    if (!logLevel) {
      return new Logger(LogLevel.INFO);
    }

    if (!isLogLevel(logLevel)) {
      console.warn(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}. Using INFO level.`);
      return new Logger(LogLevel.INFO);
    }

    return new Logger(logLevel);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

function isPlainObject(value: unknown): value is LogMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Pick the extra fields node and pg attach to errors
 */
function errorDetails(error: Error): LogMeta {
  const details: LogMeta = {};
  for (const key of ['code', 'errno', 'syscall', 'path', 'severity', 'detail']) {
    const value: unknown = Reflect.get(error, key);
    if (value !== undefined && value !== null && value !== '') {
      details[key] = value;
    }
  }
  return details;
}
