import { OperationError, OperationErrorCode } from './interfaces/OperationResult';
import { OperationStatus, ProcessResult, SpawnFailure } from './interfaces/ProcessRunner';

/**
 * Base class for every failure the engine reports
 */
export class OrchestrationError extends Error {
  constructor(
    message: string,
    public readonly code: OperationErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'OrchestrationError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class UnknownConnectionError extends OrchestrationError {
  constructor(public readonly connectionName: string) {
    super(`Unknown connection: ${connectionName}`, OperationErrorCode.UNKNOWN_CONNECTION);
    this.name = 'UnknownConnectionError';
  }
}

export class DumpNotFoundError extends OrchestrationError {
  constructor(
    public readonly connectionName: string,
    public readonly artifactId: string,
    cause?: Error
  ) {
    super(
      `Dump "${artifactId}" not found for connection ${connectionName}`,
      OperationErrorCode.DUMP_NOT_FOUND,
      cause
    );
    this.name = 'DumpNotFoundError';
  }
}

export class RestoreDisabledError extends OrchestrationError {
  constructor(public readonly connectionName: string) {
    super(`Restore is disabled for connection ${connectionName}`, OperationErrorCode.RESTORE_DISABLED);
    this.name = 'RestoreDisabledError';
  }
}

export class OperationInProgressError extends OrchestrationError {
  constructor(
    public readonly connectionName: string,
    public readonly activeOperation: string
  ) {
    super(
      `A ${activeOperation} is already running for connection ${connectionName}`,
      OperationErrorCode.OPERATION_IN_PROGRESS
    );
    this.name = 'OperationInProgressError';
  }
}

export class WipeFailedError extends OrchestrationError {
  constructor(
    public readonly connectionName: string,
    cause: Error
  ) {
    super(
      `Failed to drop tables for connection ${connectionName}: ${cause.message}`,
      OperationErrorCode.WIPE_FAILED,
      cause
    );
    this.name = 'WipeFailedError';
  }
}

export class ProcessFailedError extends OrchestrationError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderrTail: string,
    public readonly spawnError?: SpawnFailure
  ) {
    super(message, OperationErrorCode.PROCESS_FAILED);
    this.name = 'ProcessFailedError';
  }
}

export class CancelledError extends OrchestrationError {
  constructor(message = 'Operation cancelled') {
    super(message, OperationErrorCode.CANCELLED);
    this.name = 'CancelledError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Errors thrown by Node's own modules may come from another realm (vm contexts, test sandboxes),
 * so `instanceof Error` is not enough to recognise them
 */
export function isErrorLike(value: unknown): value is Error {
  if (value instanceof Error) {
    return true;
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'message') === 'string'
  );
}

/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (isErrorLike(error)) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return isErrorLike(error) ? error : new Error(String(error));
}

/**
 * The `code` node attaches to system errors (ENOENT, EACCES, ...)
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code: unknown = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function toOperationError(error: OrchestrationError): OperationError {
  return {
    code: error.code,
    message: error.message,
    ...(error.cause && { cause: formatError(error.cause) }),
    ...(error instanceof ProcessFailedError && error.spawnError && { spawnError: error.spawnError }),
  };
}

/**
 * The error describing a process run that did not succeed
 */
export function processResultError(command: string, result: ProcessResult): OrchestrationError {
  if (result.status === OperationStatus.CANCELLED) {
    return new CancelledError(result.message ?? `${command} was cancelled`);
  }
  return new ProcessFailedError(
    result.message ?? `${command} failed with exit code ${result.exitCode}`,
    result.exitCode,
    result.stderrTail,
    result.spawnError
  );
}
