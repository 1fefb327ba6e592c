/**
 * Interface for cron-based dump scheduling
 */
export interface DumpScheduler {
  /** Schedule a dump task for every connection that has a schedule */
  start(): void;

  /** Stop all scheduled tasks */
  stop(): void;

  /** Check if the scheduler is currently running */
  isRunning(): boolean;

  /** Validate a cron expression */
  validateCronExpression(expression: string): boolean;

  /** Names of the connections that currently have a scheduled task */
  scheduledConnections(): string[];
}

/**
 * Configuration for the dump scheduler
 */
export interface DumpSchedulerConfig {
  /** Timezone for cron execution (defaults to UTC) */
  timezone?: string;

  /** Whether to run every scheduled dump immediately on start */
  runOnInit?: boolean;
}
