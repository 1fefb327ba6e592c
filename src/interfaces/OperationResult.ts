import { DumpArtifact } from './DumpCatalog';
import { OperationStatus, SpawnFailure } from './ProcessRunner';

export type OperationKind = 'dump' | 'restore';

export enum OperationErrorCode {
  UNKNOWN_CONNECTION = 'UNKNOWN_CONNECTION',
  DUMP_NOT_FOUND = 'DUMP_NOT_FOUND',
  RESTORE_DISABLED = 'RESTORE_DISABLED',
  OPERATION_IN_PROGRESS = 'OPERATION_IN_PROGRESS',
  WIPE_FAILED = 'WIPE_FAILED',
  PROCESS_FAILED = 'PROCESS_FAILED',
  CANCELLED = 'CANCELLED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface OperationError {
  code: OperationErrorCode;
  message: string;

  /** Underlying error, e.g. the database error behind a failed wipe */
  cause?: string;

  /** Why the external binary could not be started */
  spawnError?: SpawnFailure;
}

/**
 * Result of a dump or restore run
 */
export interface OperationResult {
  operation: OperationKind;
  connectionName: string;
  status: OperationStatus;

  /** Exit code of the external binary, null if none exited */
  exitCode: number | null;

  /** Tail of the binary's stderr for diagnostics */
  stderrTail: string;

  durationMs: number;

  /** Dump: the artifact written. Restore: the artifact restored from */
  artifact?: DumpArtifact;

  /** Tables dropped before a restore with cleanFirst */
  tablesDropped?: string[];

  /** Present whenever status is not success */
  error?: OperationError;
}
