import { ConnectionConfig } from './ConnectionConfig';
import { OperationResult } from './OperationResult';

export interface DumpRunOptions {
  signal?: AbortSignal;
}

/**
 * Writes a new dump artifact for a connection
 */
export interface DumpOperation {
  execute(connection: ConnectionConfig, options?: DumpRunOptions): Promise<OperationResult>;
}
