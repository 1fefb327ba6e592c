export enum OperationStatus {
  SUCCESS = 'success',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export type SpawnFailure = 'binary_not_found' | 'permission_denied' | 'spawn_failed';

/**
 * Outcome of a single external process run
 */
export interface ProcessResult {
  status: OperationStatus;

  /** Exit code, or null when the process did not exit on its own */
  exitCode: number | null;

  /** Last bytes written to stderr */
  stderrTail: string;

  durationMs: number;

  /** Human readable explanation for a failed or cancelled run */
  message?: string;

  /** Set when the process could not be started */
  spawnError?: SpawnFailure;

  /** Set when the run was cancelled because the timeout elapsed */
  timedOut?: boolean;
}

export interface ProcessRunOptions {
  /** Extra environment variables, merged over the current environment */
  env?: Record<string, string>;

  /** Aborting the signal terminates the child process */
  signal?: AbortSignal;

  timeoutMs?: number;

  /** Receives stdout chunks; stdout is discarded when omitted */
  onStdout?: (chunk: string) => void;
}

/**
 * Spawns and supervises external binaries
 */
export interface ProcessRunner {
  /** Run a command to completion. Never rejects: failures are reported in the result */
  run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult>;
}
