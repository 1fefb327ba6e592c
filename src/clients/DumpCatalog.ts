import { promises as fs, constants as fsConstants, Stats } from 'fs';
import { basename, join, resolve as resolvePath } from 'path';
import { ConnectionConfig } from '../interfaces/ConnectionConfig';
import { DumpArtifact, DumpCatalog as IDumpCatalog } from '../interfaces/DumpCatalog';
import { Logger } from '../interfaces/Logger';
import { DumpNotFoundError, errorCode, formatError, toError } from '../errors';

/** Extension every completed dump carries */
export const DUMP_EXTENSION = '.dump';

/** Appended to a dump's final name while pg_dump is still writing it */
export const IN_PROGRESS_SUFFIX = '.inprogress';

/**
 * Whether a file name denotes a completed dump
 */
export function isDumpFileName(fileName: string): boolean {
  return (
    fileName.endsWith(DUMP_EXTENSION) &&
    fileName.length > DUMP_EXTENSION.length &&
    !fileName.endsWith(IN_PROGRESS_SUFFIX) &&
    basename(fileName) === fileName &&
    !fileName.includes('\\')
  );
}

/**
 * Filesystem-backed catalog. Nothing is cached: every call reads the directory again.
 */
export class DumpCatalog implements IDumpCatalog {
  constructor(private readonly logger: Logger) {}

  async list(connection: ConnectionConfig): Promise<DumpArtifact[]> {
    const directory = resolvePath(connection.dumpPath);
    let entries: string[];

    try {
      entries = await fs.readdir(directory);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.logger.debug('Dump directory does not exist yet', {
          connectionName: connection.name,
          dumpPath: directory,
        });
        return [];
      }
      throw error;
    }

    const artifacts: DumpArtifact[] = [];

    for (const fileName of entries) {
      if (!isDumpFileName(fileName)) {
        continue;
      }

      const filePath = join(directory, fileName);
      let stats: Stats;
      try {
        stats = await fs.stat(filePath);
      } catch (error) {
        // Removed between readdir and stat
        this.logger.debug('Skipping dump that disappeared during listing', {
          filePath,
          reason: formatError(error),
        });
        continue;
      }

      if (stats.isFile()) {
        artifacts.push(toArtifact(filePath, fileName, stats));
      }
    }

    return artifacts.sort(compareNewestFirst);
  }

  async resolve(connection: ConnectionConfig, artifactId: string): Promise<DumpArtifact> {
    if (!isDumpFileName(artifactId)) {
      throw new DumpNotFoundError(connection.name, artifactId);
    }

    const filePath = join(resolvePath(connection.dumpPath), artifactId);

    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        throw new Error(`${filePath} is not a regular file`);
      }
      await fs.access(filePath, fsConstants.R_OK);
      return toArtifact(filePath, artifactId, stats);
    } catch (error) {
      throw new DumpNotFoundError(connection.name, artifactId, toError(error));
    }
  }
}

export function toArtifact(filePath: string, fileName: string, stats: Stats): DumpArtifact {
  return {
    id: fileName,
    path: filePath,
    displayName: fileName.slice(0, -DUMP_EXTENSION.length),
    createdAt: stats.mtime,
    sizeBytes: stats.size,
  };
}

function compareNewestFirst(a: DumpArtifact, b: DumpArtifact): number {
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? 1 : -1;
}
