import { readFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, extname, isAbsolute, join, resolve as resolvePath } from 'path';
import { parse as parseToml } from 'smol-toml';
import { ConnectionConfig, OrchestratorConfig } from '../interfaces/ConnectionConfig';
import { LogLevel } from '../interfaces/Logger';
import { ConfigurationError, errorCode, formatError } from '../errors';

export { ConfigurationError };

export const DEFAULT_CONNECTIONS_FILE = 'config.toml';

/** Longest delay a Node timer accepts, in whole minutes */
export const MAX_TIMEOUT_MINUTES = Math.floor(2_147_483_647 / 60_000);

const CONNECTION_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

type RawEntry = Record<string, unknown>;

function isRecord(value: unknown): value is RawEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigurationManager {
  /**
   * Load the connections file and environment settings
   */
  static loadConfiguration(env: NodeJS.ProcessEnv = process.env): OrchestratorConfig {
    const connectionsFile = resolvePath(env.CONNECTIONS_FILE?.trim() || DEFAULT_CONNECTIONS_FILE);
    const raw = ConfigurationManager.readConnectionsFile(connectionsFile);

    const config: OrchestratorConfig = {
      connections: ConfigurationManager.parseConnections(raw, dirname(connectionsFile)),
      connectionsFile,
      pgDumpPath: env.PG_DUMP_BIN?.trim() || 'pg_dump',
      pgRestorePath: env.PG_RESTORE_BIN?.trim() || 'pg_restore',
    };

    const logLevel = env.LOG_LEVEL?.trim();
    if (logLevel) {
      config.logLevel = ConfigurationManager.parseLogLevel(logLevel);
    }

    const dumpTimeout = ConfigurationManager.parsePositiveInteger(
      env,
      'DUMP_TIMEOUT_MINUTES',
      MAX_TIMEOUT_MINUTES
    );
    if (dumpTimeout !== undefined) {
      config.dumpTimeoutMinutes = dumpTimeout;
    }

    const restoreTimeout = ConfigurationManager.parsePositiveInteger(
      env,
      'RESTORE_TIMEOUT_MINUTES',
      MAX_TIMEOUT_MINUTES
    );
    if (restoreTimeout !== undefined) {
      config.restoreTimeoutMinutes = restoreTimeout;
    }

    return config;
  }

  /**
   * Turn the parsed `{ connections: { name: {...} } }` document into connection configs,
   * keeping the order the names appear in
   */
  static parseConnections(raw: unknown, baseDir: string): ConnectionConfig[] {
    if (!isRecord(raw) || !isRecord(raw.connections)) {
      throw new ConfigurationError('Connections file must contain a "connections" object', 'connections');
    }

    const entries = Object.entries(raw.connections);
    if (entries.length === 0) {
      throw new ConfigurationError('No database connections defined', 'connections');
    }

    return entries.map(([name, entry]) => ConfigurationManager.parseConnection(name, entry, baseDir));
  }

  /**
   * Remove secrets before the configuration is logged
   */
  static sanitizeForLogging(config: OrchestratorConfig): Record<string, unknown> {
    return {
      ...config,
      connections: config.connections.map(connection => ({
        ...connection,
        password: '[REDACTED]',
      })),
    };
  }

  private static readConnectionsFile(path: string): unknown {
    let content: string;
    try {
      content = readFileSync(path, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new ConfigurationError(`Connections file not found: ${path}`, 'CONNECTIONS_FILE');
      }
      throw new ConfigurationError(
        `Failed to read connections file ${path}: ${formatError(error)}`,
        'CONNECTIONS_FILE'
      );
    }

    const format = extname(path).toLowerCase() === '.toml' ? 'TOML' : 'JSON';
    try {
      return format === 'TOML' ? parseToml(content) : JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid ${format} in connections file ${path}: ${formatError(error)}`,
        'CONNECTIONS_FILE'
      );
    }
  }

  private static parseConnection(name: string, entry: unknown, baseDir: string): ConnectionConfig {
    const field = `connections.${name}`;

    if (!CONNECTION_NAME_PATTERN.test(name)) {
      throw new ConfigurationError(
        `Invalid connection name: "${name}". Use letters, digits, "_", "-" and "."`,
        field
      );
    }

    if (!isRecord(entry)) {
      throw new ConfigurationError(`Connection ${name} must be an object`, field);
    }

    const dbname = ConfigurationManager.readString(entry, 'dbname', field);
    if (!dbname) {
      throw new ConfigurationError(`Missing required field dbname for connection ${name}`, `${field}.dbname`);
    }

    const connection: ConnectionConfig = {
      name,
      host: ConfigurationManager.readString(entry, 'host', field) || 'localhost',
      port: ConfigurationManager.readPort(entry, field),
      dbname,
      user: ConfigurationManager.readString(entry, 'user', field) || 'postgres',
      password: ConfigurationManager.readString(entry, 'password', field) ?? '',
      dumpPath: ConfigurationManager.resolveDumpPath(
        ConfigurationManager.readString(entry, 'dump_path', field) || '.',
        baseDir
      ),
      preventRestore: ConfigurationManager.readBoolean(entry, 'prevent_restore', field),
    };

    const schedule = ConfigurationManager.readString(entry, 'schedule', field)?.trim();
    if (schedule) {
      connection.schedule = schedule;
    }

    return connection;
  }

  private static readString(entry: RawEntry, key: string, field: string): string | undefined {
    const value = entry[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new ConfigurationError(`${field}.${key} must be a string`, `${field}.${key}`);
    }
    return value;
  }

  private static readPort(entry: RawEntry, field: string): number {
    const value = entry.port;
    if (value === undefined || value === null) {
      return 5432;
    }

    const port = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value) : value;
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigurationError(
        `Invalid port for ${field}: ${String(value)}. Must be an integer between 1 and 65535`,
        `${field}.port`
      );
    }
    return port;
  }

  private static readBoolean(entry: RawEntry, key: string, field: string): boolean {
    const value = entry[key];
    if (value === undefined || value === null) {
      return false;
    }
    if (typeof value !== 'boolean') {
      throw new ConfigurationError(`${field}.${key} must be true or false`, `${field}.${key}`);
    }
    return value;
  }

  private static resolveDumpPath(path: string, baseDir: string): string {
    if (path === '~') {
      return homedir();
    }
    if (path.startsWith('~/')) {
      return join(homedir(), path.slice(2));
    }
    return isAbsolute(path) ? path : resolvePath(baseDir, path);
  }

  private static parseLogLevel(value: string): LogLevel {
    const level = value.toLowerCase();
    const levels = Object.values(LogLevel);
    const match = levels.find(candidate => candidate === level);

    if (!match) {
      throw new ConfigurationError(
        `Invalid LOG_LEVEL: ${value}. Must be one of ${levels.join(', ')}`,
        'LOG_LEVEL'
      );
    }
    return match;
  }

  private static parsePositiveInteger(
    env: NodeJS.ProcessEnv,
    name: string,
    max: number
  ): number | undefined {
    const value = env[name]?.trim();
    if (!value) {
      return undefined;
    }

    const parsed = Number(value);
    if (!/^\d+$/.test(value) || parsed <= 0) {
      throw new ConfigurationError(`Invalid ${name}: ${value}. Must be a positive integer`, name);
    }
    if (parsed > max) {
      throw new ConfigurationError(`Invalid ${name}: ${value}. Must not exceed ${max}`, name);
    }
    return parsed;
  }
}
