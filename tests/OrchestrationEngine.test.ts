import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConnectionRegistry } from '../src/clients/ConnectionRegistry';
import { DumpCatalog } from '../src/clients/DumpCatalog';
import { DumpOperation } from '../src/clients/DumpOperation';
import { OrchestrationEngine } from '../src/clients/OrchestrationEngine';
import { RestoreOperation, buildPgRestoreArgs } from '../src/clients/RestoreOperation';
import { ConnectionConfig } from '../src/interfaces/ConnectionConfig';
import { OperationErrorCode } from '../src/interfaces/OperationResult';
import { OperationStatus, ProcessResult, ProcessRunOptions } from '../src/interfaces/ProcessRunner';
import { UnknownConnectionError, WipeFailedError } from '../src/errors';
import {
  FakeProcessRunner,
  createMockLogger,
  createMockWiper,
  makeConnection,
  outputPathOf,
  processResult,
} from './support/mocks';

const FIXED_DATE = new Date('2024-01-01T00:00:00.000Z');

/**
 * Resolves as cancelled once the run's signal is aborted
 */
function waitForAbort(options: ProcessRunOptions): Promise<ProcessResult> {
  const cancelled = processResult({ status: OperationStatus.CANCELLED, exitCode: null, message: 'pg_dump was cancelled' });
  return new Promise(resolve => {
    if (options.signal?.aborted) {
      resolve(cancelled);
      return;
    }
    options.signal?.addEventListener('abort', () => resolve(cancelled), { once: true });
  });
}

describe('OrchestrationEngine', () => {
  let dumpDir: string;
  let otherDir: string;
  let connections: ConnectionConfig[];
  let runner: FakeProcessRunner;
  let wiper: ReturnType<typeof createMockWiper>;
  let logger: ReturnType<typeof createMockLogger>;
  let engine: OrchestrationEngine;

  function createEngine(): OrchestrationEngine {
    const registry = new ConnectionRegistry(connections);
    const catalog = new DumpCatalog(logger);
    return new OrchestrationEngine({
      registry,
      catalog,
      wiper,
      logger,
      dumpOperation: new DumpOperation(runner, logger, { clock: () => FIXED_DATE }),
      restoreOperation: new RestoreOperation(catalog, wiper, runner, logger),
    });
  }

  beforeEach(async () => {
    dumpDir = await fs.mkdtemp(join(tmpdir(), 'engine-test-'));
    otherDir = await fs.mkdtemp(join(tmpdir(), 'engine-test-other-'));
    connections = [
      makeConnection({ name: 'main', dumpPath: dumpDir, schedule: '0 3 * * *' }),
      makeConnection({ name: 'production', dbname: 'prod', dumpPath: dumpDir, preventRestore: true }),
      makeConnection({ name: 'other', dbname: 'other', dumpPath: otherDir }),
    ];
    runner = new FakeProcessRunner(async (command, args) => {
      if (command === 'pg_dump') {
        await fs.writeFile(outputPathOf(args), 'PGDMP');
      }
      return processResult();
    });
    wiper = createMockWiper();
    logger = createMockLogger();
    engine = createEngine();
  });

  afterEach(async () => {
    await fs.rm(dumpDir, { recursive: true, force: true });
    await fs.rm(otherDir, { recursive: true, force: true });
  });

  describe('listConnections', () => {
    it('should list every connection without passwords', () => {
      const summaries = engine.listConnections();

      expect(summaries.map(summary => summary.name)).toEqual(['main', 'production', 'other']);
      expect(summaries[0]).toEqual({
        name: 'main',
        host: 'localhost',
        port: 5432,
        dbname: 'app',
        user: 'postgres',
        dumpPath: dumpDir,
        preventRestore: false,
        schedule: '0 3 * * *',
      });
      expect(JSON.stringify(summaries)).not.toContain('test-password');
    });
  });

  describe('listDumps', () => {
    it('should reject an unknown connection', async () => {
      await expect(engine.listDumps('missing')).rejects.toBeInstanceOf(UnknownConnectionError);
    });

    it('should list an empty directory as empty', async () => {
      await expect(engine.listDumps('main')).resolves.toEqual([]);
    });
  });

  describe('dump', () => {
    it('should report an unknown connection without running anything', async () => {
      const result = await engine.dump('missing');

      expect(result).toMatchObject({
        operation: 'dump',
        connectionName: 'missing',
        status: OperationStatus.FAILED,
        exitCode: null,
        stderrTail: '',
        error: { code: OperationErrorCode.UNKNOWN_CONNECTION, message: 'Unknown connection: missing' },
      });
      expect(runner.runs).toHaveLength(0);
    });

    it('should make a finished dump visible to listDumps', async () => {
      const result = await engine.dump('main');
      const dumps = await engine.listDumps('main');

      expect(result.status).toBe(OperationStatus.SUCCESS);
      expect(dumps.map(dump => dump.id)).toEqual(['main_2024-01-01T00-00-00.dump']);
      expect(logger.logOperationComplete).toHaveBeenCalledWith(result);
    });

    it('should let only one of two concurrent dumps on a connection proceed', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      runner.respondWith(async (_command, args) => {
        await fs.writeFile(outputPathOf(args), 'PGDMP');
        await gate;
        return processResult();
      });

      const first = engine.dump('main');
      const second = await engine.dump('main');

      expect(second.status).toBe(OperationStatus.FAILED);
      expect(second.error).toEqual({
        code: OperationErrorCode.OPERATION_IN_PROGRESS,
        message: 'A dump is already running for connection main',
      });
      expect(engine.isBusy('main')).toBe(true);

      release();
      const firstResult = await first;

      expect(firstResult.status).toBe(OperationStatus.SUCCESS);
      expect(engine.isBusy('main')).toBe(false);
      expect(runner.runs).toHaveLength(1);
    });

    it('should reject a restore while a dump runs on the same connection', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      runner.respondWith(async (_command, args) => {
        await fs.writeFile(outputPathOf(args), 'PGDMP');
        await gate;
        return processResult();
      });

      const dump = engine.dump('main');
      const restore = await engine.restore('main', 'main_2024-01-01T00-00-00.dump', true);

      expect(restore.error?.code).toBe(OperationErrorCode.OPERATION_IN_PROGRESS);
      expect(wiper.wipeAllTables).not.toHaveBeenCalled();

      release();
      await dump;
    });

    it('should run dumps on different connections concurrently', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      runner.respondWith(async (_command, args) => {
        await fs.writeFile(outputPathOf(args), 'PGDMP');
        await gate;
        return processResult();
      });

      const main = engine.dump('main');
      const other = engine.dump('other');

      expect(engine.activeOperations().map(active => active.connectionName)).toEqual(['main', 'other']);

      release();
      const results = await Promise.all([main, other]);

      expect(results.map(result => result.status)).toEqual([OperationStatus.SUCCESS, OperationStatus.SUCCESS]);
      expect(engine.activeOperations()).toEqual([]);
    });

    it('should cancel a running dump and leave no file behind', async () => {
      runner.respondWith(async (_command, args, options) => {
        await fs.writeFile(outputPathOf(args), 'PGDMP');
        return waitForAbort(options);
      });

      const pending = engine.dump('main');
      expect(engine.cancel('main')).toBe(true);
      const result = await pending;

      expect(result.status).toBe(OperationStatus.CANCELLED);
      expect(result.error?.code).toBe(OperationErrorCode.CANCELLED);
      expect(await fs.readdir(dumpDir)).toEqual([]);
      expect(engine.isBusy('main')).toBe(false);
    });

    it('should cancel when the caller aborts its own signal', async () => {
      const controller = new AbortController();
      runner.respondWith(async (_command, _args, options) => waitForAbort(options));

      const pending = engine.dump('main', { signal: controller.signal });
      controller.abort();
      const result = await pending;

      expect(result.status).toBe(OperationStatus.CANCELLED);
    });

    it('should release the slot after an unexpected error', async () => {
      engine = new OrchestrationEngine({
        registry: new ConnectionRegistry(connections),
        catalog: new DumpCatalog(logger),
        wiper,
        logger,
        dumpOperation: { execute: jest.fn().mockRejectedValue(new Error('disk exploded')) },
        restoreOperation: new RestoreOperation(new DumpCatalog(logger), wiper, runner, logger),
      });

      const result = await engine.dump('main');

      expect(result.error).toEqual({ code: OperationErrorCode.INTERNAL_ERROR, message: 'Error: disk exploded' });
      expect(engine.isBusy('main')).toBe(false);
      expect(logger.logOperationError).toHaveBeenCalledWith('dump', expect.any(Error), { connectionName: 'main' });
    });
  });

  describe('cancel', () => {
    it('should return false when nothing runs', () => {
      expect(engine.cancel('main')).toBe(false);
    });
  });

  describe('restore', () => {
    it('should restore from a dump it just created', async () => {
      const dump = await engine.dump('main');
      const artifactId = dump.artifact?.id ?? '';

      const restore = await engine.restore('main', artifactId, false);

      expect(restore.status).toBe(OperationStatus.SUCCESS);
      expect(restore.artifact?.id).toBe('main_2024-01-01T00-00-00.dump');
      expect(runner.runs.map(run => run.command)).toEqual(['pg_dump', 'pg_restore']);
      expect(runner.runs[1].args).toEqual(
        buildPgRestoreArgs(connections[0], join(dumpDir, 'main_2024-01-01T00-00-00.dump'))
      );
    });

    it('should wipe then restore an existing dump when cleanFirst is set', async () => {
      await fs.writeFile(join(dumpDir, 'main_2024-01-01T00-00-00.dump'), 'PGDMP');
      const order: string[] = [];
      wiper.wipeAllTables.mockImplementation(async () => {
        order.push('wipe');
        return { droppedTables: ['public.users'] };
      });
      runner.respondWith(async command => {
        order.push(command);
        return processResult();
      });
      const states: string[] = [];

      const result = await engine.restore('main', 'main_2024-01-01T00-00-00.dump', true, {
        onStateChange: state => states.push(state),
      });

      expect(result).toMatchObject({
        operation: 'restore',
        status: OperationStatus.SUCCESS,
        tablesDropped: ['public.users'],
      });
      expect(order).toEqual(['wipe', 'pg_restore']);
      expect(states).toEqual(['validating', 'wiping', 'restoring', 'succeeded']);
    });

    it('should refuse a protected connection without wiping or restoring', async () => {
      await fs.writeFile(join(dumpDir, 'main_2024-01-01T00-00-00.dump'), 'PGDMP');

      const result = await engine.restore('production', 'main_2024-01-01T00-00-00.dump', true);

      expect(result).toMatchObject({
        operation: 'restore',
        connectionName: 'production',
        status: OperationStatus.FAILED,
        error: {
          code: OperationErrorCode.RESTORE_DISABLED,
          message: 'Restore is disabled for connection production',
        },
      });
      expect(wiper.wipeAllTables).not.toHaveBeenCalled();
      expect(runner.runs).toHaveLength(0);
    });

    it('should report restore disabled even while the connection is busy', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      runner.respondWith(async (_command, args) => {
        await fs.writeFile(outputPathOf(args), 'PGDMP');
        await gate;
        return processResult();
      });

      const dump = engine.dump('production');
      const restore = await engine.restore('production', 'anything.dump', false);

      expect(restore.error?.code).toBe(OperationErrorCode.RESTORE_DISABLED);

      release();
      await dump;
    });

    it('should report a missing dump without wiping', async () => {
      const result = await engine.restore('main', 'missing.dump', true);

      expect(result.error?.code).toBe(OperationErrorCode.DUMP_NOT_FOUND);
      expect(result.error?.message).toBe('Dump "missing.dump" not found for connection main');
      expect(wiper.wipeAllTables).not.toHaveBeenCalled();
      expect(runner.runs).toHaveLength(0);
    });

    it('should not run pg_restore when the wipe fails', async () => {
      await fs.writeFile(join(dumpDir, 'main_2024-01-01T00-00-00.dump'), 'PGDMP');
      wiper.wipeAllTables.mockRejectedValue(new WipeFailedError('main', new Error('permission denied')));

      const result = await engine.restore('main', 'main_2024-01-01T00-00-00.dump', true);

      expect(result.status).toBe(OperationStatus.FAILED);
      expect(result.error).toEqual({
        code: OperationErrorCode.WIPE_FAILED,
        message: 'Failed to drop tables for connection main: permission denied',
        cause: 'Error: permission denied',
      });
      expect(runner.runs).toHaveLength(0);
      expect(engine.isBusy('main')).toBe(false);
    });

    it('should report an unknown connection', async () => {
      const result = await engine.restore('missing', 'main_2024-01-01T00-00-00.dump', false);

      expect(result.error?.code).toBe(OperationErrorCode.UNKNOWN_CONNECTION);
    });
  });

  describe('checkConnection', () => {
    it('should test the connection through the wiper', async () => {
      wiper.testConnection.mockResolvedValue(false);

      await expect(engine.checkConnection('other')).resolves.toBe(false);
      expect(wiper.testConnection).toHaveBeenCalledWith(connections[2]);
    });
  });
});
