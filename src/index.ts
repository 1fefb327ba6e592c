#!/usr/bin/env node
import { ConfigurationManager } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { ConnectionRegistry } from './clients/ConnectionRegistry';
import { DumpCatalog } from './clients/DumpCatalog';
import { ProcessRunner } from './clients/ProcessRunner';
import { SchemaWiper } from './clients/SchemaWiper';
import { DumpOperation } from './clients/DumpOperation';
import { RestoreOperation } from './clients/RestoreOperation';
import { OrchestrationEngine } from './clients/OrchestrationEngine';
import { DumpScheduler } from './clients/DumpScheduler';
import { createProgram, CliApplication } from './cli';
import { OrchestratorConfig } from './interfaces/ConnectionConfig';
import { LogLevel } from './interfaces/Logger';
import { isErrorLike, toError } from './errors';

const MINUTE_MS = 60 * 1000;

/**
 * Wires configuration, logging and the engine together
 */
class PgDumpOrchestratorApplication implements CliApplication {
  private logger: Logger;
  private config: OrchestratorConfig | null = null;
  private registry: ConnectionRegistry | null = null;
  private engine: OrchestrationEngine | null = null;
  private scheduler: DumpScheduler | null = null;
  private isShuttingDown = false;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    // Reconfigured once the configuration is loaded
    this.logger = Logger.createFromEnvironment(env);
  }

  /**
   * Load configuration and build every component. Safe to call more than once.
   * @throws ConfigurationError
   */
  initialize(): OrchestrationEngine {
    if (this.engine) {
      return this.engine;
    }

    const config = ConfigurationManager.loadConfiguration(this.env);
    this.logger = new Logger(config.logLevel ?? LogLevel.INFO);
    this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

    const registry = new ConnectionRegistry(config.connections);
    const runner = new ProcessRunner(this.logger);
    const catalog = new DumpCatalog(this.logger);
    const wiper = new SchemaWiper(this.logger);

    this.engine = new OrchestrationEngine({
      registry,
      catalog,
      wiper,
      logger: this.logger,
      dumpOperation: new DumpOperation(runner, this.logger, {
        pgDumpPath: config.pgDumpPath,
        timeoutMs: toMilliseconds(config.dumpTimeoutMinutes),
      }),
      restoreOperation: new RestoreOperation(catalog, wiper, runner, this.logger, {
        pgRestorePath: config.pgRestorePath,
        timeoutMs: toMilliseconds(config.restoreTimeoutMinutes),
      }),
    });
    this.config = config;
    this.registry = registry;

    this.logger.info(`Loaded ${config.connections.length} database connections`, {
      connections: config.connections.map(connection => connection.name),
    });
    return this.engine;
  }

  getEngine(): OrchestrationEngine {
    return this.initialize();
  }

  startScheduler(): string[] {
    const engine = this.initialize();
    if (!this.registry) {
      throw new Error('Application not initialized');
    }

    this.scheduler = new DumpScheduler(this.registry, engine, this.logger, { timezone: 'UTC' });
    this.scheduler.start();
    return this.scheduler.scheduledConnections();
  }

  /**
   * Stop scheduling and cancel whatever is still running
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.scheduler?.isRunning()) {
      this.scheduler.stop();
    }

    if (this.engine) {
      for (const operation of this.engine.activeOperations()) {
        this.engine.cancel(operation.connectionName);
      }
      await this.waitForIdle(this.engine, 15_000);
    }

    this.logger.info('Shutdown completed', { connections: this.config?.connections.length ?? 0 });
  }

  /**
   * The first signal cancels running operations; an idle process (or a second signal) exits
   */
  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.on(signal, () => {
        const busy = this.engine !== null && this.engine.activeOperations().length > 0;

        if (this.isShuttingDown) {
          process.exit(130);
        }

        this.logger.info(`Received ${signal}`, { busy });
        this.shutdown()
          .then(() => {
            if (!busy) {
              process.exit(0);
            }
          })
          .catch(error => {
            this.logger.error('Error during shutdown', toError(error));
            process.exit(4);
          });
      });
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', toError(reason));
      process.exitCode = 6;
    });
  }

  private async waitForIdle(engine: OrchestrationEngine, timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (engine.activeOperations().length > 0 && Date.now() < deadline) {
      await sleep(100);
    }
  }
}

function toMilliseconds(minutes: number | undefined): number | undefined {
  return minutes === undefined ? undefined : minutes * MINUTE_MS;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Main application entry point
 */
async function main(argv: string[] = process.argv): Promise<void> {
  const app = new PgDumpOrchestratorApplication();
  app.setupSignalHandlers();

  const program = createProgram(app);
  await program.parseAsync(argv);
}

// Export for testing
export { PgDumpOrchestratorApplication, main };

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error:', isErrorLike(error) ? error.message : String(error));
    process.exit(7);
  });
}
