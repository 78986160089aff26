/**
 * @file file-artifact-storage.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { mkdir, readFile, rm, unlink } from 'fs/promises';
import { join } from 'path';
import type { Logger } from 'pino';
import type { ArtifactStorage } from '../../domain/ports/artifact-storage.js';
import { compactTimestamp } from '../../domain/value-objects/compact-timestamp.js';
import { CAPTURE_CONFIG } from '../../config/constants.js';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores raw capture artifacts under one spool directory per session.
 */
export class FileArtifactStorage implements ArtifactStorage {
  private readonly baseDir: string;
  private readonly logger: Logger;

  constructor(spoolRoot: string, logger: Logger) {
    this.baseDir = spoolRoot;
    this.logger = logger.child({ component: 'artifact-storage' });
  }

  async createSpoolDir(name: string): Promise<string> {
    const dir = join(this.baseDir, name);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  async removeSpoolDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
    this.logger.debug({ dir }, 'Spool directory removed');
  }

  artifactPath(spoolDir: string, capturedAt: Date): string {
    const stamp = compactTimestamp(capturedAt, '_');
    return join(spoolDir, `${CAPTURE_CONFIG.ARTIFACT_PREFIX}${stamp}${CAPTURE_CONFIG.ARTIFACT_EXTENSION}`);
  }

  async read(path: string): Promise<Buffer> {
    return readFile(path);
  }

  async discard(path: string): Promise<boolean> {
    try {
      await unlink(path);
      return true;
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.logger.warn({ error, path }, 'Failed to delete artifact');
      }
      return false;
    }
  }
}
