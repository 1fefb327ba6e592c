import { promises as fs } from 'fs';
import { join, resolve as resolvePath } from 'path';
import { ConnectionConfig } from '../interfaces/ConnectionConfig';
import { DumpOperation as IDumpOperation, DumpRunOptions } from '../interfaces/DumpOperation';
import { Logger } from '../interfaces/Logger';
import { OperationResult } from '../interfaces/OperationResult';
import { OperationStatus, ProcessRunner } from '../interfaces/ProcessRunner';
import { DUMP_EXTENSION, IN_PROGRESS_SUFFIX, toArtifact } from './DumpCatalog';
import {
  ProcessFailedError,
  errorCode,
  formatError,
  processResultError,
  toOperationError,
} from '../errors';

export interface DumpOperationOptions {
  /** pg_dump binary, resolved through PATH unless absolute */
  pgDumpPath?: string;

  timeoutMs?: number;

  /** Source of the timestamp embedded in file names */
  clock?: () => Date;
}

/**
 * Format date as a file-name safe UTC timestamp (YYYY-MM-DDTHH-MM-SS)
 */
export function formatDumpTimestamp(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, '')
    .replace(/:/g, '-');
}

export function buildDumpFileName(connectionName: string, date: Date, sequence = 0): string {
  const suffix = sequence > 0 ? `-${sequence}` : '';
  return `${connectionName}_${formatDumpTimestamp(date)}${suffix}${DUMP_EXTENSION}`;
}

export function buildPgDumpArgs(connection: ConnectionConfig, outputPath: string): string[] {
  return [
    '--host',
    connection.host,
    '--port',
    String(connection.port),
    '--username',
    connection.user,
    '--dbname',
    connection.dbname,
    '--no-password',
    '--format=custom',
    '--file',
    outputPath,
  ];
}

/**
 * Runs pg_dump into a temporary file and renames it into place once complete,
 * so the catalog never sees a partial dump
 */
export class DumpOperation implements IDumpOperation {
  private readonly pgDumpPath: string;
  private readonly timeoutMs?: number;
  private readonly clock: () => Date;

  constructor(
    private readonly runner: ProcessRunner,
    private readonly logger: Logger,
    options: DumpOperationOptions = {}
  ) {
    this.pgDumpPath = options.pgDumpPath ?? 'pg_dump';
    this.timeoutMs = options.timeoutMs;
    this.clock = options.clock ?? (() => new Date());
  }

  async execute(connection: ConnectionConfig, options: DumpRunOptions = {}): Promise<OperationResult> {
    const startTime = Date.now();
    const directory = resolvePath(connection.dumpPath);

    await fs.mkdir(directory, { recursive: true });

    const fileName = await this.reserveFileName(directory, connection.name);
    const finalPath = join(directory, fileName);
    const tempPath = `${finalPath}${IN_PROGRESS_SUFFIX}`;

    this.logger.logOperationStart('dump', connection.name, { fileName, dumpPath: directory });

    const processResult = await this.runner.run(this.pgDumpPath, buildPgDumpArgs(connection, tempPath), {
      env: { PGPASSWORD: connection.password },
      signal: options.signal,
      timeoutMs: this.timeoutMs,
    });

    const base = {
      operation: 'dump' as const,
      connectionName: connection.name,
      exitCode: processResult.exitCode,
      stderrTail: processResult.stderrTail,
    };

    if (processResult.status !== OperationStatus.SUCCESS) {
      await this.removeTempFile(tempPath);
      const failure = processResultError('pg_dump', processResult);
      this.logger.logOperationError('dump', failure, { connectionName: connection.name, exitCode: processResult.exitCode });

      return {
        ...base,
        status: processResult.status,
        durationMs: Date.now() - startTime,
        error: toOperationError(failure),
      };
    }

    try {
      const tempStats = await fs.stat(tempPath);
      if (tempStats.size === 0) {
        throw new ProcessFailedError(`Dump file is empty: ${tempPath}`, processResult.exitCode, processResult.stderrTail);
      }

      await fs.rename(tempPath, finalPath);
    } catch (error) {
      await this.removeTempFile(tempPath);
      const failure =
        error instanceof ProcessFailedError
          ? error
          : new ProcessFailedError(
              `Dump file was not created at ${tempPath}: ${formatError(error)}`,
              processResult.exitCode,
              processResult.stderrTail
            );
      this.logger.logOperationError('dump', failure, { connectionName: connection.name });

      return {
        ...base,
        status: OperationStatus.FAILED,
        durationMs: Date.now() - startTime,
        error: toOperationError(failure),
      };
    }

    const artifact = toArtifact(finalPath, fileName, await fs.stat(finalPath));

    return {
      ...base,
      status: OperationStatus.SUCCESS,
      durationMs: Date.now() - startTime,
      artifact,
    };
  }

  /**
   * Pick a file name that neither a finished nor an in-progress dump uses yet
   */
  private async reserveFileName(directory: string, connectionName: string): Promise<string> {
    const now = this.clock();

    for (let sequence = 0; ; sequence++) {
      const fileName = buildDumpFileName(connectionName, now, sequence);
      const finalPath = join(directory, fileName);

      if (!(await pathExists(finalPath)) && !(await pathExists(`${finalPath}${IN_PROGRESS_SUFFIX}`))) {
        return fileName;
      }
    }
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.unlink(tempPath);
      this.logger.debug('Removed partial dump file', { tempPath });
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.warn('Failed to remove partial dump file', { tempPath, reason: formatError(error) });
      }
    }
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}
