import { ConnectionSummary } from './ConnectionConfig';
import { DumpArtifact } from './DumpCatalog';
import { OperationKind, OperationResult } from './OperationResult';
import { RestoreState } from './RestoreOperation';

export interface EngineRunOptions {
  /** Aborting cancels the run */
  signal?: AbortSignal;
}

export interface EngineRestoreOptions extends EngineRunOptions {
  onStateChange?: (state: RestoreState, previous: RestoreState) => void;
}

export interface ActiveOperation {
  connectionName: string;
  operation: OperationKind;
  startedAt: Date;
}

/**
 * Entry point for UIs and schedulers. Allows at most one dump or restore per
 * connection at a time.
 */
export interface OrchestrationEngine {
  listConnections(): ConnectionSummary[];

  /** @throws UnknownConnectionError */
  listDumps(connectionName: string): Promise<DumpArtifact[]>;

  dump(connectionName: string, options?: EngineRunOptions): Promise<OperationResult>;

  restore(
    connectionName: string,
    artifactId: string,
    cleanFirst: boolean,
    options?: EngineRestoreOptions
  ): Promise<OperationResult>;

  /** Cancel the active run on a connection. Returns false if nothing was running */
  cancel(connectionName: string): boolean;

  isBusy(connectionName: string): boolean;

  activeOperations(): ActiveOperation[];

  /** @throws UnknownConnectionError */
  checkConnection(connectionName: string): Promise<boolean>;
}
