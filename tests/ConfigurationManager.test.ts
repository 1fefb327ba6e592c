import { promises as fs } from 'fs';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import {
  ConfigurationManager,
  ConfigurationError,
  DEFAULT_CONNECTIONS_FILE,
  MAX_TIMEOUT_MINUTES,
} from '../src/config/ConfigurationManager';
import { LogLevel } from '../src/interfaces/Logger';
import { makeConnection } from './support/mocks';

describe('ConfigurationManager', () => {
  let configDir: string;
  let connectionsFile: string;

  async function writeConnections(content: unknown): Promise<NodeJS.ProcessEnv> {
    await fs.writeFile(connectionsFile, typeof content === 'string' ? content : JSON.stringify(content));
    return { CONNECTIONS_FILE: connectionsFile };
  }

  function loadError(env: NodeJS.ProcessEnv): ConfigurationError {
    try {
      ConfigurationManager.loadConfiguration(env);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return error;
      }
      throw error;
    }
    throw new Error('Expected loadConfiguration to throw');
  }

  beforeEach(async () => {
    configDir = await fs.mkdtemp(join(tmpdir(), 'config-test-'));
    connectionsFile = join(configDir, 'connections.json');
  });

  afterEach(async () => {
    await fs.rm(configDir, { recursive: true, force: true });
  });

  describe('loadConfiguration', () => {
    it('should load connections with defaults applied', async () => {
      const env = await writeConnections({
        connections: {
          main: { dbname: 'app', dump_path: 'dumps' },
          production: {
            host: 'db.internal',
            port: '6543',
            dbname: 'prod',
            user: 'backup',
            password: 'test-password',
            dump_path: '/var/backups/prod',
            prevent_restore: true,
            schedule: '0 3 * * *',
          },
        },
      });

      const config = ConfigurationManager.loadConfiguration(env);

      expect(config).toEqual({
        connectionsFile,
        pgDumpPath: 'pg_dump',
        pgRestorePath: 'pg_restore',
        connections: [
          {
            name: 'main',
            host: 'localhost',
            port: 5432,
            dbname: 'app',
            user: 'postgres',
            password: '',
            dumpPath: join(configDir, 'dumps'),
            preventRestore: false,
          },
          {
            name: 'production',
            host: 'db.internal',
            port: 6543,
            dbname: 'prod',
            user: 'backup',
            password: 'test-password',
            dumpPath: '/var/backups/prod',
            preventRestore: true,
            schedule: '0 3 * * *',
          },
        ],
      });
      expect(config.logLevel).toBeUndefined();
    });

    it('should load a TOML file with one table per connection', () => {
      const fixturesDir = join(__dirname, 'fixtures');
      const configFile = join(fixturesDir, 'config.toml');

      const config = ConfigurationManager.loadConfiguration({ CONNECTIONS_FILE: configFile });

      expect(config.connectionsFile).toBe(configFile);
      expect(config.connections).toEqual([
        {
          name: 'main',
          host: 'localhost',
          port: 5432,
          dbname: 'app',
          user: 'postgres',
          password: 'test-password',
          dumpPath: join(fixturesDir, 'dumps'),
          preventRestore: false,
        },
        {
          name: 'production',
          host: 'db.internal',
          port: 6543,
          dbname: 'prod',
          user: 'backup',
          password: 'test-password',
          dumpPath: '/var/backups/prod',
          preventRestore: true,
          schedule: '0 3 * * *',
        },
      ]);
    });

    it('should report invalid TOML', async () => {
      const configFile = join(configDir, 'config.toml');
      await fs.writeFile(configFile, '[connections.main\ndbname = "app"\n');

      const error = loadError({ CONNECTIONS_FILE: configFile });

      expect(error.message).toMatch(/^Invalid TOML in connections file /);
      expect(error.field).toBe('CONNECTIONS_FILE');
    });

    it('should validate TOML values like JSON ones', async () => {
      const configFile = join(configDir, 'config.toml');
      await fs.writeFile(configFile, '[connections.main]\ndbname = "app"\nprevent_restore = "yes"\n');

      expect(loadError({ CONNECTIONS_FILE: configFile }).message).toBe(
        'connections.main.prevent_restore must be true or false'
      );
    });

    it('should default to config.toml', () => {
      expect(DEFAULT_CONNECTIONS_FILE).toBe('config.toml');
    });

    it('should read optional settings from the environment', async () => {
      const env = await writeConnections({ connections: { main: { dbname: 'app' } } });

      const config = ConfigurationManager.loadConfiguration({
        ...env,
        LOG_LEVEL: 'DEBUG',
        DUMP_TIMEOUT_MINUTES: '30',
        RESTORE_TIMEOUT_MINUTES: '90',
        PG_DUMP_BIN: '/opt/pg/bin/pg_dump',
        PG_RESTORE_BIN: '/opt/pg/bin/pg_restore',
      });

      expect(config.logLevel).toBe(LogLevel.DEBUG);
      expect(config.dumpTimeoutMinutes).toBe(30);
      expect(config.restoreTimeoutMinutes).toBe(90);
      expect(config.pgDumpPath).toBe('/opt/pg/bin/pg_dump');
      expect(config.pgRestorePath).toBe('/opt/pg/bin/pg_restore');
    });

    it('should expand a dump path in the home directory', async () => {
      const env = await writeConnections({ connections: { main: { dbname: 'app', dump_path: '~/dumps' } } });

      const config = ConfigurationManager.loadConfiguration(env);

      expect(config.connections[0].dumpPath).toBe(join(homedir(), 'dumps'));
    });

    it('should report a missing connections file', () => {
      const missing = join(configDir, 'missing.json');

      const error = loadError({ CONNECTIONS_FILE: missing });

      expect(error.message).toBe(`Connections file not found: ${missing}`);
      expect(error.field).toBe('CONNECTIONS_FILE');
    });

    it('should report invalid JSON', async () => {
      const env = await writeConnections('{ "connections": ');

      expect(loadError(env).message).toMatch(/^Invalid JSON in connections file /);
    });

    it('should require a connections object', async () => {
      const env = await writeConnections({ databases: {} });

      expect(() => ConfigurationManager.loadConfiguration(env)).toThrow(
        'Connections file must contain a "connections" object'
      );
    });

    it('should require at least one connection', async () => {
      const env = await writeConnections({ connections: {} });

      expect(() => ConfigurationManager.loadConfiguration(env)).toThrow('No database connections defined');
    });

    it('should require a dbname', async () => {
      const env = await writeConnections({ connections: { main: { host: 'localhost' } } });

      const error = loadError(env);

      expect(error.message).toBe('Missing required field dbname for connection main');
      expect(error.field).toBe('connections.main.dbname');
    });

    it.each([[70000], [0], ['abc'], [5432.5]])('should reject port %p', async port => {
      const env = await writeConnections({ connections: { main: { dbname: 'app', port } } });

      expect(loadError(env).message).toBe(
        `Invalid port for connections.main: ${String(port)}. Must be an integer between 1 and 65535`
      );
    });

    it('should reject connection names that cannot be used in file names', async () => {
      const env = await writeConnections({ connections: { 'bad/name': { dbname: 'app' } } });

      expect(loadError(env).message).toBe(
        'Invalid connection name: "bad/name". Use letters, digits, "_", "-" and "."'
      );
    });

    it('should reject a non-boolean prevent_restore', async () => {
      const env = await writeConnections({ connections: { main: { dbname: 'app', prevent_restore: 'yes' } } });

      expect(loadError(env).message).toBe('connections.main.prevent_restore must be true or false');
    });

    it('should reject an unknown log level', async () => {
      const env = await writeConnections({ connections: { main: { dbname: 'app' } } });

      const error = loadError({ ...env, LOG_LEVEL: 'verbose' });

      expect(error.message).toBe('Invalid LOG_LEVEL: verbose. Must be one of error, warn, info, debug');
      expect(error.field).toBe('LOG_LEVEL');
    });

    it.each(['0', '-5', '1.5', 'soon'])('should reject timeout %p', async value => {
      const env = await writeConnections({ connections: { main: { dbname: 'app' } } });

      expect(loadError({ ...env, DUMP_TIMEOUT_MINUTES: value }).message).toBe(
        `Invalid DUMP_TIMEOUT_MINUTES: ${value}. Must be a positive integer`
      );
    });

    it('should accept the longest timeout a timer can hold', async () => {
      const env = await writeConnections({ connections: { main: { dbname: 'app' } } });

      const config = ConfigurationManager.loadConfiguration({ ...env, RESTORE_TIMEOUT_MINUTES: '35791' });

      expect(MAX_TIMEOUT_MINUTES).toBe(35791);
      expect(config.restoreTimeoutMinutes).toBe(35791);
    });

    it.each(['DUMP_TIMEOUT_MINUTES', 'RESTORE_TIMEOUT_MINUTES'])('should reject a %s a timer cannot hold', async name => {
      const env = await writeConnections({ connections: { main: { dbname: 'app' } } });

      const error = loadError({ ...env, [name]: '35792' });

      expect(error.message).toBe(`Invalid ${name}: 35792. Must not exceed 35791`);
      expect(error.field).toBe(name);
    });
  });

  describe('sanitizeForLogging', () => {
    it('should redact every password', () => {
      const sanitized = ConfigurationManager.sanitizeForLogging({
        connections: [makeConnection(), makeConnection({ name: 'other' })],
        connectionsFile: '/etc/pg/connections.json',
        pgDumpPath: 'pg_dump',
        pgRestorePath: 'pg_restore',
      });

      expect(JSON.stringify(sanitized)).not.toContain('test-password');
      expect(sanitized.connections).toEqual([
        makeConnection({ password: '[REDACTED]' }),
        makeConnection({ name: 'other', password: '[REDACTED]' }),
      ]);
    });
  });
});
