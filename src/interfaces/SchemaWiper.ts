import { ConnectionConfig } from './ConnectionConfig';

export interface WipeResult {
  /** Schema-qualified names of the dropped tables */
  droppedTables: string[];
}

/**
 * Drops every user table of a database ahead of a restore
 */
export interface SchemaWiper {
  /**
   * Drop all tables in all non-system schemas inside one transaction
   * @throws WipeFailedError when anything fails; nothing is dropped in that case
   * @throws CancelledError when the signal aborts before the commit
   */
  wipeAllTables(connection: ConnectionConfig, signal?: AbortSignal): Promise<WipeResult>;

  /** Check that the database accepts connections */
  testConnection(connection: ConnectionConfig): Promise<boolean>;
}
