import { ConnectionConfig } from './ConnectionConfig';

/**
 * Read-only lookup of the configured connections
 */
export interface ConnectionRegistry {
  /** Get a connection by name, throwing UnknownConnectionError if absent */
  get(name: string): ConnectionConfig;

  /** All connections in configuration order */
  list(): readonly ConnectionConfig[];

  has(name: string): boolean;
}
