/**
 * @file commit-watcher.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { existsSync, watch, type FSWatcher } from 'fs';
import { readFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { Logger } from 'pino';
import { CommitLogNotFoundError } from '../../domain/errors/domain-errors.js';
import type { ContextReporter } from '../../application/services/context-reporter.js';
import { waitWithTimeout } from '../../application/services/bounded-wait.js';
import { REPORT_CONFIG } from '../../config/constants.js';

export interface CommitWatcherConfig {
  repoPath: string;
  sessionId: string;
  reporter: Pick<ContextReporter, 'writeReport'>;
  logger: Logger;
  onReport?: (reportPath: string) => void;
}

/**
 * Commit id from the last reflog line ("<old> <new> <author> ... <message>").
 */
export function parseLatestCommitId(reflog: string): string | null {
  const lines = reflog.split('\n').filter((line) => line.trim().length > 0);
  const last = lines[lines.length - 1];
  if (!last) {
    return null;
  }
  return last.trim().split(/\s+/)[1] ?? null;
}

/**
 * Watches a repository's HEAD reflog and writes a context report for each new commit.
 * Changes are handled one at a time, in arrival order.
 */
export class CommitWatcher {
  readonly headLogPath: string;
  private readonly sessionId: string;
  private readonly reporter: Pick<ContextReporter, 'writeReport'>;
  private readonly logger: Logger;
  private readonly onReport?: (reportPath: string) => void;
  private watcher: FSWatcher | null = null;
  private queue: Promise<void> = Promise.resolve();
  private lastCommitId: string | null = null;

  constructor(config: CommitWatcherConfig) {
    this.headLogPath = join(config.repoPath, '.git', 'logs', 'HEAD');
    this.sessionId = config.sessionId;
    this.reporter = config.reporter;
    this.onReport = config.onReport;
    this.logger = config.logger.child({ component: 'commit-watcher', sessionId: config.sessionId });
  }

  isWatching(): boolean {
    return this.watcher !== null;
  }

  /**
   * @throws CommitLogNotFoundError when the repository has no HEAD reflog
   */
  start(): void {
    if (this.watcher) {
      return;
    }
    if (!existsSync(this.headLogPath)) {
      throw new CommitLogNotFoundError(this.headLogPath);
    }

    const fileName = basename(this.headLogPath);
    // Git replaces the file on some writes, so watch its directory
    this.watcher = watch(dirname(this.headLogPath), (_eventType, changed) => {
      if (changed === null || changed === fileName) {
        this.enqueue();
      }
    });
    this.watcher.on('error', (error) => {
      this.logger.warn({ error }, 'Commit log watcher error');
    });

    this.logger.info({ headLog: this.headLogPath }, 'Watching for commits');
  }

  /**
   * Stops watching and waits for an in-flight report at most a few seconds.
   */
  async stop(): Promise<void> {
    if (!this.watcher) {
      return;
    }
    this.watcher.close();
    this.watcher = null;

    const finished = await waitWithTimeout(this.queue, REPORT_CONFIG.STOP_TIMEOUT_MS);
    if (!finished) {
      this.logger.warn('Commit report still running after stop timeout');
    }
    this.logger.info('Commit watcher stopped');
  }

  /**
   * Reads the newest commit and reports it unless it was already handled.
   * Resolves the report path, or null when nothing was written.
   */
  async processLatestCommit(): Promise<string | null> {
    try {
      const commitId = parseLatestCommitId(await readFile(this.headLogPath, 'utf-8'));
      if (!commitId || commitId === this.lastCommitId) {
        return null;
      }
      this.lastCommitId = commitId;

      this.logger.info({ commitId }, 'Commit detected');
      const reportPath = await this.reporter.writeReport(this.sessionId, commitId);
      if (reportPath) {
        this.onReport?.(reportPath);
      }
      return reportPath;
    } catch (error) {
      this.logger.error({ error }, 'Failed to handle commit');
      return null;
    }
  }

  private enqueue(): void {
    this.queue = this.queue.then(async () => {
      await this.processLatestCommit();
    });
  }
}
