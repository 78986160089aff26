/**
 * @file commit-watcher-pool.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { WorkSessionInfo } from '../../domain/entities/work-session.js';
import { CommitLogNotFoundError } from '../../domain/errors/domain-errors.js';
import type { ContextReporter } from '../../application/services/context-reporter.js';
import type { SessionRegistry } from '../../application/services/session-registry.js';
import { CommitWatcher } from './commit-watcher.js';

export interface CommitWatcherPoolConfig {
  registry: SessionRegistry;
  reporter: Pick<ContextReporter, 'writeReport'>;
  logger: Logger;
}

/**
 * Keeps one commit watcher per session whose repository has a reflog.
 */
export class CommitWatcherPool {
  private readonly watchers = new Map<string, CommitWatcher>();
  private readonly registry: SessionRegistry;
  private readonly reporter: Pick<ContextReporter, 'writeReport'>;
  private readonly logger: Logger;
  private readonly onCreated = (info: WorkSessionInfo): void => {
    this.watch(info);
  };
  private readonly onDeleted = (info: WorkSessionInfo): void => {
    void this.unwatch(info.sessionId);
  };

  constructor(config: CommitWatcherPoolConfig) {
    this.registry = config.registry;
    this.reporter = config.reporter;
    this.logger = config.logger.child({ component: 'commit-watchers' });
  }

  /**
   * Watches existing sessions and follows registry changes.
   */
  attach(): void {
    for (const info of this.registry.list()) {
      this.watch(info);
    }
    this.registry.on('sessionCreated', this.onCreated);
    this.registry.on('sessionDeleted', this.onDeleted);
  }

  has(sessionId: string): boolean {
    return this.watchers.has(sessionId);
  }

  async stopAll(): Promise<void> {
    this.registry.off('sessionCreated', this.onCreated);
    this.registry.off('sessionDeleted', this.onDeleted);
    const ids = Array.from(this.watchers.keys());
    await Promise.all(ids.map((id) => this.unwatch(id)));
  }

  private watch(info: WorkSessionInfo): void {
    if (this.watchers.has(info.sessionId)) {
      return;
    }

    const watcher = new CommitWatcher({
      repoPath: info.repoPath,
      sessionId: info.sessionId,
      reporter: this.reporter,
      logger: this.logger,
      onReport: (reportPath) => {
        this.logger.info({ sessionId: info.sessionId, reportPath }, 'Context report saved');
      },
    });

    try {
      watcher.start();
      this.watchers.set(info.sessionId, watcher);
    } catch (error) {
      if (error instanceof CommitLogNotFoundError) {
        this.logger.info({ sessionId: info.sessionId, repoPath: info.repoPath }, 'No git history, commit reports disabled');
        return;
      }
      this.logger.warn({ error, sessionId: info.sessionId }, 'Failed to start commit watcher');
    }
  }

  private async unwatch(sessionId: string): Promise<void> {
    const watcher = this.watchers.get(sessionId);
    if (!watcher) {
      return;
    }
    this.watchers.delete(sessionId);
    await watcher.stop();
  }
}
