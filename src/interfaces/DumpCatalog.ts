import { ConnectionConfig } from './ConnectionConfig';

/**
 * A completed dump file in a connection's dump directory
 */
export interface DumpArtifact {
  /** File name, used by callers to select the artifact */
  id: string;

  /** Absolute path of the file */
  path: string;

  /** File name without the dump extension */
  displayName: string;

  /** Modification time of the file */
  createdAt: Date;

  sizeBytes: number;
}

/**
 * View over the dump artifacts on disk, recomputed on every call
 */
export interface DumpCatalog {
  /** List completed dumps, newest first */
  list(connection: ConnectionConfig): Promise<DumpArtifact[]>;

  /**
   * Look up a single artifact, checking that it still exists and is readable
   * @throws DumpNotFoundError
   */
  resolve(connection: ConnectionConfig, artifactId: string): Promise<DumpArtifact>;
}
