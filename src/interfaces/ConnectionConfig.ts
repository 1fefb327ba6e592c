import { LogLevel } from './Logger';

/**
 * A named PostgreSQL connection together with its dump directory
 */
export interface ConnectionConfig {
  /** Unique key the connection is selected by */
  name: string;

  host: string;
  port: number;
  dbname: string;
  user: string;
  password: string;

  /** Directory holding this connection's dump artifacts */
  dumpPath: string;

  /** When true, restores against this connection are always rejected */
  preventRestore: boolean;

  /** Optional cron expression for scheduled dumps */
  schedule?: string;
}

/**
 * Connection details that are safe to hand to a UI or to logs
 */
export interface ConnectionSummary {
  name: string;
  host: string;
  port: number;
  dbname: string;
  user: string;
  dumpPath: string;
  preventRestore: boolean;
  schedule?: string;
}

export interface OrchestratorConfig {
  connections: ConnectionConfig[];
  connectionsFile: string;
  logLevel?: LogLevel;
  dumpTimeoutMinutes?: number;
  restoreTimeoutMinutes?: number;
  pgDumpPath: string;
  pgRestorePath: string;
}
