import { ConnectionConfig, ConnectionSummary } from '../interfaces/ConnectionConfig';
import { ConnectionRegistry } from '../interfaces/ConnectionRegistry';
import { DumpArtifact, DumpCatalog } from '../interfaces/DumpCatalog';
import { DumpOperation } from '../interfaces/DumpOperation';
import { Logger } from '../interfaces/Logger';
import { OperationErrorCode, OperationKind, OperationResult } from '../interfaces/OperationResult';
import {
  ActiveOperation,
  EngineRestoreOptions,
  EngineRunOptions,
  OrchestrationEngine as IOrchestrationEngine,
} from '../interfaces/OrchestrationEngine';
import { OperationStatus } from '../interfaces/ProcessRunner';
import { RestoreOperation } from '../interfaces/RestoreOperation';
import { SchemaWiper } from '../interfaces/SchemaWiper';
import {
  OperationInProgressError,
  OrchestrationError,
  RestoreDisabledError,
  formatError,
  toError,
  toOperationError,
} from '../errors';

export interface OrchestrationEngineDependencies {
  registry: ConnectionRegistry;
  catalog: DumpCatalog;
  dumpOperation: DumpOperation;
  restoreOperation: RestoreOperation;
  wiper: SchemaWiper;
  logger: Logger;
}

interface ActiveRun extends ActiveOperation {
  controller: AbortController;
}

export function summarizeConnection(connection: ConnectionConfig): ConnectionSummary {
  return {
    name: connection.name,
    host: connection.host,
    port: connection.port,
    dbname: connection.dbname,
    user: connection.user,
    dumpPath: connection.dumpPath,
    preventRestore: connection.preventRestore,
    ...(connection.schedule && { schedule: connection.schedule }),
  };
}

/**
 * Facade over the catalog and the dump/restore operations. Holds the only
 * mutable shared state: which connections currently have a run in progress.
 */
export class OrchestrationEngine implements IOrchestrationEngine {
  private readonly registry: ConnectionRegistry;
  private readonly catalog: DumpCatalog;
  private readonly dumpOperation: DumpOperation;
  private readonly restoreOperation: RestoreOperation;
  private readonly wiper: SchemaWiper;
  private readonly logger: Logger;
  private readonly active = new Map<string, ActiveRun>();

  constructor(dependencies: OrchestrationEngineDependencies) {
    this.registry = dependencies.registry;
    this.catalog = dependencies.catalog;
    this.dumpOperation = dependencies.dumpOperation;
    this.restoreOperation = dependencies.restoreOperation;
    this.wiper = dependencies.wiper;
    this.logger = dependencies.logger;
  }

  listConnections(): ConnectionSummary[] {
    return this.registry.list().map(summarizeConnection);
  }

  async listDumps(connectionName: string): Promise<DumpArtifact[]> {
    const connection = this.registry.get(connectionName);
    return this.catalog.list(connection);
  }

  async checkConnection(connectionName: string): Promise<boolean> {
    const connection = this.registry.get(connectionName);
    return this.wiper.testConnection(connection);
  }

  dump(connectionName: string, options: EngineRunOptions = {}): Promise<OperationResult> {
    return this.runExclusive('dump', connectionName, options.signal, (connection, signal) =>
      this.dumpOperation.execute(connection, { signal })
    );
  }

  restore(
    connectionName: string,
    artifactId: string,
    cleanFirst: boolean,
    options: EngineRestoreOptions = {}
  ): Promise<OperationResult> {
    return this.runExclusive(
      'restore',
      connectionName,
      options.signal,
      (connection, signal) =>
        this.restoreOperation.execute(
          { connection, artifactId, cleanFirst },
          { signal, onStateChange: options.onStateChange }
        ),
      connection => {
        if (connection.preventRestore) {
          throw new RestoreDisabledError(connection.name);
        }
      }
    );
  }

  cancel(connectionName: string): boolean {
    const run = this.active.get(connectionName);
    if (!run) {
      return false;
    }

    this.logger.info('Cancellation requested', { connectionName, operation: run.operation });
    run.controller.abort();
    return true;
  }

  isBusy(connectionName: string): boolean {
    return this.active.has(connectionName);
  }

  activeOperations(): ActiveOperation[] {
    return Array.from(this.active.values()).map(({ connectionName, operation, startedAt }) => ({
      connectionName,
      operation,
      startedAt,
    }));
  }

  /**
   * Validate, take the per-connection slot, run, and release the slot.
   * The slot is taken before the first await, so two calls issued in the same
   * tick cannot both pass the check.
   */
  private async runExclusive(
    operation: OperationKind,
    connectionName: string,
    callerSignal: AbortSignal | undefined,
    execute: (connection: ConnectionConfig, signal: AbortSignal) => Promise<OperationResult>,
    precheck?: (connection: ConnectionConfig) => void
  ): Promise<OperationResult> {
    const startTime = Date.now();
    let run: ActiveRun | undefined;
    let unlinkSignal = (): void => {};

    try {
      const connection = this.registry.get(connectionName);
      precheck?.(connection);

      const current = this.active.get(connectionName);
      if (current) {
        throw new OperationInProgressError(connectionName, current.operation);
      }

      run = {
        connectionName,
        operation,
        startedAt: new Date(),
        controller: new AbortController(),
      };
      this.active.set(connectionName, run);
      unlinkSignal = linkSignal(callerSignal, run.controller);

      const result = await execute(connection, run.controller.signal);
      this.logger.logOperationComplete(result);
      return result;
    } catch (error) {
      const result = this.failureResult(operation, connectionName, error, Date.now() - startTime);
      this.logger.logOperationComplete(result);
      return result;
    } finally {
      unlinkSignal();
      if (run && this.active.get(connectionName) === run) {
        this.active.delete(connectionName);
      }
    }
  }

  private failureResult(
    operation: OperationKind,
    connectionName: string,
    error: unknown,
    durationMs: number
  ): OperationResult {
    if (error instanceof OrchestrationError) {
      return {
        operation,
        connectionName,
        status: error.code === OperationErrorCode.CANCELLED ? OperationStatus.CANCELLED : OperationStatus.FAILED,
        exitCode: null,
        stderrTail: '',
        durationMs,
        error: toOperationError(error),
      };
    }

    this.logger.logOperationError(operation, toError(error), { connectionName });
    return {
      operation,
      connectionName,
      status: OperationStatus.FAILED,
      exitCode: null,
      stderrTail: '',
      durationMs,
      error: {
        code: OperationErrorCode.INTERNAL_ERROR,
        message: formatError(error),
      },
    };
  }
}

/**
 * Forward an abort from the caller's signal to the run's own controller
 */
function linkSignal(source: AbortSignal | undefined, target: AbortController): () => void {
  if (!source) {
    return () => {};
  }
  if (source.aborted) {
    target.abort();
    return () => {};
  }

  const forward = (): void => target.abort();
  source.addEventListener('abort', forward, { once: true });
  return () => source.removeEventListener('abort', forward);
}
