import * as cron from 'node-cron';
import { DumpScheduler as IDumpScheduler, DumpSchedulerConfig } from '../interfaces/DumpScheduler';
import { ConnectionRegistry } from '../interfaces/ConnectionRegistry';
import { Logger } from '../interfaces/Logger';
import { OperationErrorCode } from '../interfaces/OperationResult';
import { OrchestrationEngine } from '../interfaces/OrchestrationEngine';
import { OperationStatus } from '../interfaces/ProcessRunner';
import { formatError, toError } from '../errors';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string,
    public readonly connectionName: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

/**
 * Runs engine dumps on each connection's cron schedule. Overlap with a
 * running dump or restore is handled by the engine's per-connection lock.
 */
export class DumpScheduler implements IDumpScheduler {
  private tasks = new Map<string, cron.ScheduledTask>();

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly engine: OrchestrationEngine,
    private readonly logger: Logger,
    private readonly config: DumpSchedulerConfig = {}
  ) {}

  start(): void {
    if (this.tasks.size > 0) {
      this.logger.warn('DumpScheduler is already running');
      return;
    }

    const scheduled = this.registry.list().filter(connection => connection.schedule);

    // Validate every expression before scheduling anything
    for (const connection of scheduled) {
      const expression = connection.schedule ?? '';
      if (!this.validateCronExpression(expression)) {
        throw new CronValidationError(
          `Invalid cron expression for connection ${connection.name}: ${expression}`,
          expression,
          connection.name
        );
      }
    }

    const timezone = this.config.timezone || 'UTC';

    try {
      for (const connection of scheduled) {
        const expression = connection.schedule ?? '';
        const task = cron.schedule(
          expression,
          () => {
            void this.executeScheduledDump(connection.name, expression);
          },
          { scheduled: false, timezone }
        );
        task.start();
        this.tasks.set(connection.name, task);

        this.logger.info('Scheduled dumps enabled', {
          connectionName: connection.name,
          cronExpression: expression,
          timezone,
        });
      }
    } catch (error) {
      this.stopTasks();
      throw new CronSchedulerError(
        `Failed to start dump scheduler: ${formatError(error)}`,
        'start',
        toError(error)
      );
    }

    if (scheduled.length === 0) {
      this.logger.warn('No connection has a schedule; nothing to run');
    }

    if (this.config.runOnInit) {
      for (const connection of scheduled) {
        setImmediate(() => {
          void this.executeScheduledDump(connection.name, connection.schedule ?? '');
        });
      }
    }
  }

  stop(): void {
    if (this.tasks.size === 0) {
      this.logger.warn('DumpScheduler is not running');
      return;
    }

    this.stopTasks();
    this.logger.info('DumpScheduler stopped');
  }

  isRunning(): boolean {
    return this.tasks.size > 0;
  }

  scheduledConnections(): string[] {
    return Array.from(this.tasks.keys());
  }

  /**
   * Validate a cron expression using node-cron's built-in validation
   */
  validateCronExpression(expression: string): boolean {
    try {
      return cron.validate(expression);
    } catch (error) {
      this.logger.error('Cron expression validation error', toError(error), { expression });
      return false;
    }
  }

  private stopTasks(): void {
    for (const task of this.tasks.values()) {
      task.stop();
    }
    this.tasks.clear();
  }

  /**
   * Never rejects: results and errors are logged
   */
  async executeScheduledDump(connectionName: string, cronExpression: string): Promise<void> {
    this.logger.logScheduledExecution(connectionName, cronExpression);

    try {
      const result = await this.engine.dump(connectionName);

      if (result.status === OperationStatus.SUCCESS) {
        return;
      }

      if (result.error?.code === OperationErrorCode.OPERATION_IN_PROGRESS) {
        this.logger.warn('Skipping scheduled dump, another operation is running', { connectionName });
      }
    } catch (error) {
      this.logger.error('Scheduled dump execution failed', toError(error), { connectionName, cronExpression });
    }
  }
}
