import { Client, ClientConfig } from 'pg';
import { ConnectionConfig } from '../interfaces/ConnectionConfig';
import { Logger } from '../interfaces/Logger';
import { SchemaWiper as ISchemaWiper, WipeResult } from '../interfaces/SchemaWiper';
import { CancelledError, WipeFailedError, formatError, toError } from '../errors';

/**
 * Every table outside information_schema and the pg_* schemas
 */
export const LIST_USER_TABLES_SQL = `
  SELECT schemaname, tablename
  FROM pg_catalog.pg_tables
  WHERE schemaname <> 'information_schema'
    AND schemaname NOT LIKE 'pg\\_%'
  ORDER BY schemaname, tablename
`;

type TableRow = {
  schemaname: string;
  tablename: string;
};

export type ClientFactory = (config: ClientConfig) => Client;

/**
 * Drops all user tables over a direct pg connection, all or nothing
 */
export class SchemaWiper implements ISchemaWiper {
  constructor(
    private readonly logger: Logger,
    private readonly createClient: ClientFactory = config => new Client(config)
  ) {}

  async wipeAllTables(connection: ConnectionConfig, signal?: AbortSignal): Promise<WipeResult> {
    throwIfAborted(signal);

    const client = this.createClient(toClientConfig(connection));
    let inTransaction = false;

    try {
      await client.connect();
      await client.query('BEGIN');
      inTransaction = true;

      const { rows } = await client.query<TableRow>(LIST_USER_TABLES_SQL);
      const droppedTables: string[] = [];

      this.logger.info('Dropping tables before restore', {
        connectionName: connection.name,
        tableCount: rows.length,
      });

      for (const row of rows) {
        throwIfAborted(signal);
        const qualifiedName = `${client.escapeIdentifier(row.schemaname)}.${client.escapeIdentifier(row.tablename)}`;
        await client.query(`DROP TABLE IF EXISTS ${qualifiedName} CASCADE`);
        droppedTables.push(`${row.schemaname}.${row.tablename}`);
      }

      throwIfAborted(signal);
      await client.query('COMMIT');
      inTransaction = false;

      this.logger.info(`Dropped ${droppedTables.length} tables`, { connectionName: connection.name });
      return { droppedTables };
    } catch (error) {
      if (inTransaction) {
        await client.query('ROLLBACK').catch(rollbackError => {
          this.logger.warn('Failed to roll back wipe transaction', {
            connectionName: connection.name,
            reason: formatError(rollbackError),
          });
        });
      }

      if (error instanceof CancelledError) {
        throw error;
      }
      throw new WipeFailedError(connection.name, toError(error));
    } finally {
      await client.end().catch(cleanupError => {
        this.logger.warn('Failed to close database connection during cleanup', {
          connectionName: connection.name,
          reason: formatError(cleanupError),
        });
      });
    }
  }

  async testConnection(connection: ConnectionConfig): Promise<boolean> {
    const client = this.createClient(toClientConfig(connection));

    try {
      await client.connect();
      await client.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('PostgreSQL connection test failed', toError(error), {
        connectionName: connection.name,
      });
      return false;
    } finally {
      await client.end().catch(cleanupError => {
        this.logger.warn('Failed to close database connection during cleanup', {
          connectionName: connection.name,
          reason: formatError(cleanupError),
        });
      });
    }
  }
}

export function toClientConfig(connection: ConnectionConfig): ClientConfig {
  return {
    host: connection.host,
    port: connection.port,
    database: connection.dbname,
    user: connection.user,
    password: connection.password,
  };
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError('Table wipe cancelled');
  }
}
