/**
 * @file artifact-storage.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Port for the on-disk spool of raw capture artifacts.
 */
export interface ArtifactStorage {
  /**
   * Creates (if needed) and returns the spool directory for a session.
   */
  createSpoolDir(name: string): Promise<string>;

  /**
   * Removes a spool directory and everything below it. Missing directories are ignored.
   */
  removeSpoolDir(dir: string): Promise<void>;

  /**
   * Path for a new artifact captured at the given time.
   */
  artifactPath(spoolDir: string, capturedAt: Date): string;

  read(path: string): Promise<Buffer>;

  /**
   * Deletes one artifact. Resolves false when it was already gone or could not be deleted.
   */
  discard(path: string): Promise<boolean>;
}
