import { ConnectionConfig } from '../interfaces/ConnectionConfig';
import { ConnectionRegistry as IConnectionRegistry } from '../interfaces/ConnectionRegistry';
import { ConfigurationError, UnknownConnectionError } from '../errors';

/**
 * Immutable set of named connections, built once at startup
 */
export class ConnectionRegistry implements IConnectionRegistry {
  private readonly connections: ReadonlyMap<string, ConnectionConfig>;
  private readonly ordered: readonly ConnectionConfig[];

  constructor(connections: ConnectionConfig[]) {
    const byName = new Map<string, ConnectionConfig>();

    for (const connection of connections) {
      if (byName.has(connection.name)) {
        throw new ConfigurationError(`Duplicate connection name: ${connection.name}`, 'connections');
      }
      byName.set(connection.name, Object.freeze({ ...connection }));
    }

    this.connections = byName;
    this.ordered = Object.freeze(Array.from(byName.values()));
  }

  get(name: string): ConnectionConfig {
    const connection = this.connections.get(name);
    if (!connection) {
      throw new UnknownConnectionError(name);
    }
    return connection;
  }

  list(): readonly ConnectionConfig[] {
    return this.ordered;
  }

  has(name: string): boolean {
    return this.connections.has(name);
  }
}
