import { ConnectionConfig } from './ConnectionConfig';
import { OperationResult } from './OperationResult';

export enum RestoreState {
  IDLE = 'idle',
  VALIDATING = 'validating',
  WIPING = 'wiping',
  RESTORING = 'restoring',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export interface RestoreRequest {
  connection: ConnectionConfig;

  /** File name of the dump, as listed by the catalog */
  artifactId: string;

  /** Drop all tables before running the restore */
  cleanFirst: boolean;
}

export interface RestoreRunOptions {
  signal?: AbortSignal;
  onStateChange?: (state: RestoreState, previous: RestoreState) => void;
}

/**
 * Restores a connection's database from one of its dump artifacts
 */
export interface RestoreOperation {
  /**
   * @throws RestoreDisabledError before anything else when the connection forbids restores
   * @throws DumpNotFoundError when the artifact no longer exists
   * @throws WipeFailedError when cleanFirst is set and the wipe fails
   */
  execute(request: RestoreRequest, options?: RestoreRunOptions): Promise<OperationResult>;
}
