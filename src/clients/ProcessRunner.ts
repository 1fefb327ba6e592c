import { spawn, ChildProcess } from 'child_process';
import { basename } from 'path';
import {
  OperationStatus,
  ProcessResult,
  ProcessRunner as IProcessRunner,
  ProcessRunOptions,
  SpawnFailure,
} from '../interfaces/ProcessRunner';
import { Logger } from '../interfaces/Logger';
import { errorCode, formatError, toError } from '../errors';

export const DEFAULT_STDERR_TAIL_BYTES = 16 * 1024;
export const DEFAULT_KILL_GRACE_PERIOD_MS = 10_000;

/** Node clamps longer timer delays to 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface ProcessRunnerOptions {
  /** How many trailing stderr bytes to keep */
  stderrTailBytes?: number;

  /** Delay between SIGTERM and SIGKILL when cancelling */
  killGracePeriodMs?: number;
}

/**
 * Keeps only the last `limit` bytes written to it
 */
export class OutputTail {
  private buffer: Buffer = Buffer.alloc(0);
  private dropped = false;

  constructor(private readonly limit: number) {}

  append(chunk: Buffer | string): void {
    const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    this.buffer = Buffer.concat([this.buffer, data]);

    if (this.buffer.length > this.limit) {
      let start = this.buffer.length - this.limit;
      // never start in the middle of a UTF-8 sequence
      while (start < this.buffer.length && (this.buffer[start] & 0xc0) === 0x80) {
        start++;
      }
      this.buffer = this.buffer.subarray(start);
      this.dropped = true;
    }
  }

  get truncated(): boolean {
    return this.dropped;
  }

  toString(): string {
    return this.buffer.toString('utf8');
  }
}

type CancelReason = 'signal' | 'timeout';

/**
 * ProcessRunner backed by child_process.spawn
 */
export class ProcessRunner implements IProcessRunner {
  private readonly stderrTailBytes: number;
  private readonly killGracePeriodMs: number;
  private readonly reportedMissingBinaries = new Set<string>();

  constructor(
    private readonly logger: Logger,
    options: ProcessRunnerOptions = {}
  ) {
    this.stderrTailBytes = options.stderrTailBytes ?? DEFAULT_STDERR_TAIL_BYTES;
    this.killGracePeriodMs = options.killGracePeriodMs ?? DEFAULT_KILL_GRACE_PERIOD_MS;
  }

  run(command: string, args: string[], options: ProcessRunOptions = {}): Promise<ProcessResult> {
    const startTime = Date.now();
    const binary = basename(command);

    if (options.signal?.aborted) {
      return Promise.resolve({
        status: OperationStatus.CANCELLED,
        exitCode: null,
        stderrTail: '',
        durationMs: 0,
        message: `${binary} was cancelled before it started`,
      });
    }

    return new Promise<ProcessResult>(resolve => {
      const stderr = new OutputTail(this.stderrTailBytes);
      let settled = false;
      let exited = false;
      let cancelReason: CancelReason | null = null;
      let timeoutTimer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;
      let child: ChildProcess;

      const finish = (result: Omit<ProcessResult, 'durationMs' | 'stderrTail'>): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeoutTimer);
        clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
        resolve({ ...result, stderrTail: stderr.toString(), durationMs: Date.now() - startTime });
      };

      const terminate = (reason: CancelReason): void => {
        if (cancelReason || exited) {
          return;
        }
        cancelReason = reason;
        this.logger.warn(`Terminating ${binary}`, { reason, pid: child.pid });
        child.kill('SIGTERM');

        killTimer = setTimeout(() => {
          if (!exited) {
            this.logger.warn(`Force killing ${binary}`, { pid: child.pid });
            child.kill('SIGKILL');
          }
        }, this.killGracePeriodMs);
      };

      const onAbort = (): void => terminate('signal');

      try {
        child = spawn(command, args, {
          stdio: ['ignore', 'pipe', 'pipe'],
          env: { ...process.env, ...options.env },
        });
      } catch (error) {
        finish(this.spawnFailure(binary, toError(error)));
        return;
      }

      this.logger.debug(`Started ${binary}`, { pid: child.pid, args });

      options.signal?.addEventListener('abort', onAbort, { once: true });
      if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
        const delay = Math.min(options.timeoutMs, MAX_TIMER_DELAY_MS);
        timeoutTimer = setTimeout(() => terminate('timeout'), delay);
      }

      child.stdout?.on('data', (chunk: Buffer | string) => {
        options.onStdout?.(chunk.toString());
      });

      child.stderr?.on('data', (chunk: Buffer | string) => {
        stderr.append(chunk);
        this.reportWarnings(binary, chunk.toString());
      });

      child.on('error', error => {
        if (cancelReason) {
          this.logger.warn(`Error while terminating ${binary}`, { reason: formatError(error) });
          return;
        }
        finish(this.spawnFailure(binary, error));
      });

      child.on('exit', () => {
        exited = true;
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        exited = true;

        // a clean exit wins over a cancellation that arrived after the process finished
        if (code === 0) {
          this.logger.debug(`${binary} completed successfully`);
          finish({ status: OperationStatus.SUCCESS, exitCode: 0 });
          return;
        }

        if (cancelReason) {
          const timedOut = cancelReason === 'timeout';
          finish({
            status: OperationStatus.CANCELLED,
            exitCode: code,
            message: timedOut
              ? `${binary} timed out after ${options.timeoutMs}ms`
              : `${binary} was cancelled`,
            ...(timedOut && { timedOut: true }),
          });
          return;
        }

        const message =
          code === null
            ? `${binary} was terminated by signal ${signal ?? 'unknown'}`
            : analyzeExitFailure(binary, code, stderr.toString());
        finish({ status: OperationStatus.FAILED, exitCode: code, message });
      });
    });
  }

  /**
   * Log pg_dump / pg_restore warnings without failing the run
   */
  private reportWarnings(binary: string, chunk: string): void {
    for (const line of chunk.split('\n')) {
      if (line.includes('WARNING') || line.includes('NOTICE')) {
        this.logger.warn(`${binary} warning`, { line: line.trim() });
      }
    }
  }

  private spawnFailure(binary: string, error: Error): Omit<ProcessResult, 'durationMs' | 'stderrTail'> {
    const spawnError = classifySpawnError(error);
    const message = describeSpawnFailure(binary, spawnError, error);

    if (spawnError === 'binary_not_found') {
      if (this.reportedMissingBinaries.has(binary)) {
        this.logger.debug(message);
      } else {
        this.reportedMissingBinaries.add(binary);
        this.logger.error(message, error);
      }
    } else {
      this.logger.error(message, error);
    }

    return { status: OperationStatus.FAILED, exitCode: null, message, spawnError };
  }
}

function classifySpawnError(error: Error): SpawnFailure {
  const code = errorCode(error);
  const lowerMessage = error.message.toLowerCase();

  if (code === 'ENOENT' || lowerMessage.includes('enoent')) {
    return 'binary_not_found';
  }
  if (code === 'EACCES' || lowerMessage.includes('eacces')) {
    return 'permission_denied';
  }
  return 'spawn_failed';
}

function describeSpawnFailure(binary: string, failure: SpawnFailure, error: Error): string {
  switch (failure) {
    case 'binary_not_found':
      return `${binary} command not found. Please ensure PostgreSQL client tools are installed.`;
    case 'permission_denied':
      return `Permission denied executing ${binary}. Please check file permissions.`;
    case 'spawn_failed':
      return `Failed to execute ${binary}: ${error.message}`;
  }
}

/**
 * Turn a non-zero exit code and stderr into a helpful message
 */
export function analyzeExitFailure(binary: string, exitCode: number, stderr: string): string {
  const lowerStderr = stderr.toLowerCase();

  if (lowerStderr.includes('password authentication failed') || lowerStderr.includes('authentication failed')) {
    return `${binary} authentication failed (exit code ${exitCode}). Please check database credentials.`;
  }

  if (lowerStderr.includes('database') && lowerStderr.includes('does not exist')) {
    return `${binary} failed: database does not exist (exit code ${exitCode}).`;
  }

  if (lowerStderr.includes('permission denied') || lowerStderr.includes('access denied')) {
    return `${binary} failed: insufficient permissions (exit code ${exitCode}).`;
  }

  if (lowerStderr.includes('connection') && (lowerStderr.includes('refused') || lowerStderr.includes('timeout'))) {
    return `${binary} failed: unable to connect to database server (exit code ${exitCode}). Please check connection settings.`;
  }

  if (lowerStderr.includes('no space left on device') || lowerStderr.includes('disk full')) {
    return `${binary} failed: insufficient disk space (exit code ${exitCode}).`;
  }

  if (lowerStderr.includes('out of memory')) {
    return `${binary} failed: insufficient memory (exit code ${exitCode}).`;
  }

  const lastLine = stderr.trim().split('\n').pop();
  return `${binary} failed with exit code ${exitCode}. Error details: ${lastLine || 'No additional error information available'}`;
}
