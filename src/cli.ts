import { Command } from 'commander';
import { ConnectionSummary } from './interfaces/ConnectionConfig';
import { DumpArtifact } from './interfaces/DumpCatalog';
import { OperationResult } from './interfaces/OperationResult';
import { OrchestrationEngine } from './interfaces/OrchestrationEngine';
import { OperationStatus } from './interfaces/ProcessRunner';
import { formatError, isErrorLike } from './errors';

const VERSION = '1.0.0';

/**
 * What the CLI needs from the application
 */
export interface CliApplication {
  /** Loads configuration on first use */
  getEngine(): OrchestrationEngine;

  /** Start scheduled dumps; the process keeps running until a signal arrives */
  startScheduler(): string[];
}

export interface GlobalOptions {
  json?: boolean;
}

interface RestoreCommandOptions {
  clean?: boolean;
}

export function createProgram(app: CliApplication): Command {
  const program = new Command();

  program
    .name('pg-dump-orchestrator')
    .description('Dump and restore named PostgreSQL databases')
    .version(VERSION)
    .option('--json', 'Print machine readable JSON', false);

  program
    .command('connections')
    .description('List configured connections')
    .action(async (_options: unknown, command: Command) => {
      await runCommand(() => {
        const connections = app.getEngine().listConnections();
        print(command, connections, () => formatConnections(connections));
      });
    });

  program
    .command('list')
    .description('List the dumps of a connection, newest first')
    .argument('<connection>', 'Connection name')
    .action(async (connectionName: string, _options: unknown, command: Command) => {
      await runCommand(async () => {
        const dumps = await app.getEngine().listDumps(connectionName);
        print(command, dumps, () => formatDumps(connectionName, dumps));
      });
    });

  program
    .command('dump')
    .description('Create a new dump of a connection')
    .argument('<connection>', 'Connection name')
    .action(async (connectionName: string, _options: unknown, command: Command) => {
      await runCommand(async () => {
        const result = await app.getEngine().dump(connectionName);
        reportResult(command, result);
      });
    });

  program
    .command('restore')
    .description('Restore a connection from one of its dumps')
    .argument('<connection>', 'Connection name')
    .argument('<dump>', 'Dump file name as shown by "list"')
    .option('--clean', 'Drop all tables before restoring', false)
    .action(async (connectionName: string, dumpId: string, options: RestoreCommandOptions, command: Command) => {
      await runCommand(async () => {
        const json = isJson(command);
        const result = await app.getEngine().restore(connectionName, dumpId, options.clean === true, {
          onStateChange: state => {
            if (!json) {
              console.log(`Restore ${connectionName}: ${state}`);
            }
          },
        });
        reportResult(command, result);
      });
    });

  program
    .command('check')
    .description('Check that a connection accepts connections')
    .argument('<connection>', 'Connection name')
    .action(async (connectionName: string, _options: unknown, command: Command) => {
      await runCommand(async () => {
        const ok = await app.getEngine().checkConnection(connectionName);
        print(command, { connection: connectionName, ok }, () =>
          ok ? `Connection ${connectionName} OK` : `Connection ${connectionName} failed`
        );
        if (!ok) {
          process.exitCode = 1;
        }
      });
    });

  program
    .command('schedule')
    .description('Run scheduled dumps until interrupted')
    .action(async (_options: unknown, command: Command) => {
      await runCommand(() => {
        const scheduled = app.startScheduler();
        print(command, { scheduled }, () =>
          scheduled.length > 0
            ? `Scheduled dumps running for: ${scheduled.join(', ')}`
            : 'No connection has a schedule'
        );
      });
    });

  return program;
}

async function runCommand(body: () => void | Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    handleCliError(error);
  }
}

export function handleCliError(error: unknown): void {
  const message = isErrorLike(error) ? error.message : formatError(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
}

function isJson(command: Command): boolean {
  return command.optsWithGlobals<GlobalOptions>().json === true;
}

function print(command: Command, value: unknown, text: () => string): void {
  console.log(isJson(command) ? JSON.stringify(value, null, 2) : text());
}

function reportResult(command: Command, result: OperationResult): void {
  print(command, result, () => formatResult(result));
  if (result.status !== OperationStatus.SUCCESS) {
    process.exitCode = 1;
  }
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  const units = ['KB', 'MB', 'GB', 'TB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}

export function formatConnections(connections: ConnectionSummary[]): string {
  if (connections.length === 0) {
    return 'No connections configured';
  }
  return connections
    .map(connection => {
      const flags = [
        connection.preventRestore ? 'restore disabled' : '',
        connection.schedule ? `schedule: ${connection.schedule}` : '',
      ].filter(Boolean);
      const suffix = flags.length > 0 ? ` [${flags.join(', ')}]` : '';
      return `${connection.name}\t${connection.user}@${connection.host}:${connection.port}/${connection.dbname}\t${connection.dumpPath}${suffix}`;
    })
    .join('\n');
}

export function formatDumps(connectionName: string, dumps: DumpArtifact[]): string {
  if (dumps.length === 0) {
    return `No dumps found for ${connectionName}`;
  }
  return dumps
    .map(dump => `${dump.id}\t${formatBytes(dump.sizeBytes)}\t${dump.createdAt.toISOString()}`)
    .join('\n');
}

export function formatResult(result: OperationResult): string {
  const label = result.operation === 'dump' ? 'Dump' : 'Restore';

  if (result.status === OperationStatus.SUCCESS) {
    if (result.operation === 'dump' && result.artifact) {
      return `${label} created: ${result.artifact.path} (${formatBytes(result.artifact.sizeBytes)}) in ${result.durationMs}ms`;
    }
    const dropped = result.tablesDropped ? ` after dropping ${result.tablesDropped.length} tables` : '';
    return `${label} of ${result.connectionName} from ${result.artifact?.id ?? 'dump'} completed${dropped} in ${result.durationMs}ms`;
  }

  const lines = [
    `${label} ${result.status} [${result.error?.code ?? 'UNKNOWN'}]: ${result.error?.message ?? 'no details'}`,
  ];
  if (result.error?.cause) {
    lines.push(`Cause: ${result.error.cause}`);
  }
  if (result.stderrTail.trim()) {
    lines.push('--- stderr ---', result.stderrTail.trimEnd());
  }
  return lines.join('\n');
}
