/**
 * Storage interface definitions
 */

export interface LocalArchiveEntry {
  fileName: string;
  path: string;
  sizeBytes: number;
  /** Timestamp embedded in the archive name */
  createdAt: Date;
}

export interface RemoteEntry {
  name: string;
}

/**
 * Remote archive store addressed by a named, pre-authorized profile
 */
export interface RemoteStore {
  readonly location: string;

  /** List archive names under the remote folder */
  list(): Promise<RemoteEntry[]>;

  /** Copy one object down into destDir, returns the local path */
  download(name: string, destDir: string): Promise<string>;

  /** Upload a local file into the remote folder */
  upload(localPath: string): Promise<void>;

  /** Delete objects matching include that are older than maxAgeDays */
  deleteOlderThan(maxAgeDays: number, include: string): Promise<void>;
}
