import { ConnectionConfig } from '../interfaces/ConnectionConfig';
import { DumpArtifact, DumpCatalog } from '../interfaces/DumpCatalog';
import { Logger } from '../interfaces/Logger';
import { OperationResult } from '../interfaces/OperationResult';
import { OperationStatus, ProcessRunner } from '../interfaces/ProcessRunner';
import {
  RestoreOperation as IRestoreOperation,
  RestoreRequest,
  RestoreRunOptions,
  RestoreState,
} from '../interfaces/RestoreOperation';
import { SchemaWiper } from '../interfaces/SchemaWiper';
import {
  CancelledError,
  RestoreDisabledError,
  processResultError,
  toOperationError,
} from '../errors';

const TRANSITIONS: Record<RestoreState, readonly RestoreState[]> = {
  [RestoreState.IDLE]: [RestoreState.VALIDATING],
  [RestoreState.VALIDATING]: [
    RestoreState.WIPING,
    RestoreState.RESTORING,
    RestoreState.FAILED,
    RestoreState.CANCELLED,
  ],
  [RestoreState.WIPING]: [RestoreState.RESTORING, RestoreState.FAILED, RestoreState.CANCELLED],
  [RestoreState.RESTORING]: [RestoreState.SUCCEEDED, RestoreState.FAILED, RestoreState.CANCELLED],
  [RestoreState.SUCCEEDED]: [],
  [RestoreState.FAILED]: [],
  [RestoreState.CANCELLED]: [],
};

export class InvalidRestoreTransitionError extends Error {
  constructor(
    public readonly from: RestoreState,
    public readonly to: RestoreState
  ) {
    super(`Invalid restore state transition: ${from} -> ${to}`);
    this.name = 'InvalidRestoreTransitionError';
  }
}

/**
 * Tracks a single restore run through its states
 */
export class RestoreStateMachine {
  private current: RestoreState = RestoreState.IDLE;
  private readonly visited: RestoreState[] = [RestoreState.IDLE];

  constructor(private readonly onChange?: (state: RestoreState, previous: RestoreState) => void) {}

  get state(): RestoreState {
    return this.current;
  }

  get history(): readonly RestoreState[] {
    return this.visited;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(next: RestoreState): void {
    const previous = this.current;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new InvalidRestoreTransitionError(previous, next);
    }
    this.current = next;
    this.visited.push(next);
    this.onChange?.(next, previous);
  }
}

export interface RestoreOperationOptions {
  /** pg_restore binary, resolved through PATH unless absolute */
  pgRestorePath?: string;

  timeoutMs?: number;
}

export function buildPgRestoreArgs(connection: ConnectionConfig, artifactPath: string): string[] {
  return [
    '--host',
    connection.host,
    '--port',
    String(connection.port),
    '--username',
    connection.user,
    '--dbname',
    connection.dbname,
    '--no-password',
    '--no-owner',
    '--no-privileges',
    artifactPath,
  ];
}

/**
 * Guard, optional wipe, then pg_restore
 */
export class RestoreOperation implements IRestoreOperation {
  private readonly pgRestorePath: string;
  private readonly timeoutMs?: number;

  constructor(
    private readonly catalog: DumpCatalog,
    private readonly wiper: SchemaWiper,
    private readonly runner: ProcessRunner,
    private readonly logger: Logger,
    options: RestoreOperationOptions = {}
  ) {
    this.pgRestorePath = options.pgRestorePath ?? 'pg_restore';
    this.timeoutMs = options.timeoutMs;
  }

  async execute(request: RestoreRequest, options: RestoreRunOptions = {}): Promise<OperationResult> {
    const startTime = Date.now();
    const { connection, artifactId, cleanFirst } = request;
    const machine = new RestoreStateMachine(options.onStateChange);

    machine.transition(RestoreState.VALIDATING);

    let artifact: DumpArtifact;
    try {
      // Checked before anything touches the database or the dump directory
      if (connection.preventRestore) {
        throw new RestoreDisabledError(connection.name);
      }

      artifact = await this.catalog.resolve(connection, artifactId);

      if (options.signal?.aborted) {
        throw new CancelledError('Restore cancelled before it started');
      }
    } catch (error) {
      machine.transition(error instanceof CancelledError ? RestoreState.CANCELLED : RestoreState.FAILED);
      throw error;
    }

    this.logger.logOperationStart('restore', connection.name, {
      artifact: artifact.id,
      cleanFirst,
    });

    let tablesDropped: string[] | undefined;

    if (cleanFirst) {
      machine.transition(RestoreState.WIPING);
      try {
        const wipe = await this.wiper.wipeAllTables(connection, options.signal);
        tablesDropped = wipe.droppedTables;
      } catch (error) {
        machine.transition(error instanceof CancelledError ? RestoreState.CANCELLED : RestoreState.FAILED);
        throw error;
      }
    }

    machine.transition(RestoreState.RESTORING);

    const processResult = await this.runner.run(this.pgRestorePath, buildPgRestoreArgs(connection, artifact.path), {
      env: { PGPASSWORD: connection.password },
      signal: options.signal,
      timeoutMs: this.timeoutMs,
    });

    const result: OperationResult = {
      operation: 'restore',
      connectionName: connection.name,
      status: processResult.status,
      exitCode: processResult.exitCode,
      stderrTail: processResult.stderrTail,
      durationMs: Date.now() - startTime,
      artifact,
      ...(tablesDropped && { tablesDropped }),
    };

    switch (processResult.status) {
      case OperationStatus.SUCCESS:
        machine.transition(RestoreState.SUCCEEDED);
        return result;
      case OperationStatus.CANCELLED:
        machine.transition(RestoreState.CANCELLED);
        break;
      case OperationStatus.FAILED:
        machine.transition(RestoreState.FAILED);
        break;
    }

    const failure = processResultError('pg_restore', processResult);
    this.logger.logOperationError('restore', failure, {
      connectionName: connection.name,
      artifact: artifact.id,
      exitCode: processResult.exitCode,
      wiped: cleanFirst,
    });

    return { ...result, error: toOperationError(failure) };
  }
}
