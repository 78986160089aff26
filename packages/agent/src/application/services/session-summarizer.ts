/**
 * @file session-summarizer.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { setTimeout as delay } from 'timers/promises';
import type { Logger } from 'pino';
import type { HiveStore, SessionSummaryDocument } from '../../domain/ports/hive-store.js';
import type { TextGenerator } from '../../domain/ports/text-generator.js';
import type { IdentityState } from '../../domain/value-objects/identity.js';
import { SUMMARY_CONFIG } from '../../config/constants.js';
import { formatTimelineLine } from './context-reporter.js';
import type { SessionRegistry } from './session-registry.js';
import { waitWithTimeout } from './bounded-wait.js';

const SESSION_SUMMARY_PROMPT = `You summarize a developer's recent work for their team.
You receive a timeline of activity records from one work session.

Write 2-4 sentences in a standup tone: what was worked on, notable problems or errors, and progress toward the goal.
Plain text, no Markdown.`;

export interface SessionSummarizerConfig {
  registry: SessionRegistry;
  store: HiveStore;
  generator: TextGenerator;
  identity: IdentityState;
  intervalMs?: number;
  logger: Logger;
  clock?: () => Date;
}

export interface SessionSummaryResult {
  document: SessionSummaryDocument;
  stored: boolean;
}

/**
 * Periodically condenses the active session's recent allowed records into a
 * high-level summary in the shared store.
 */
export class SessionSummarizer {
  private readonly registry: SessionRegistry;
  private readonly store: HiveStore;
  private readonly generator: TextGenerator;
  private readonly identity: IdentityState;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  /** Newest summarized record time per session */
  private readonly watermarks = new Map<string, number>();

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(config: SessionSummarizerConfig) {
    this.registry = config.registry;
    this.store = config.store;
    this.generator = config.generator;
    this.identity = config.identity;
    this.intervalMs = Math.max(
      config.intervalMs ?? SUMMARY_CONFIG.DEFAULT_INTERVAL_MS,
      SUMMARY_CONFIG.MIN_INTERVAL_MS
    );
    this.logger = config.logger.child({ component: 'session-summarizer' });
    this.clock = config.clock ?? (() => new Date());
  }

  get interval(): number {
    return this.intervalMs;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) {
      this.logger.warn(
        this.controller ? 'Session summarizer already running' : 'Session summarizer still stopping, not restarted'
      );
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(controller.signal).finally(() => {
      this.loop = null;
    });
    this.logger.info({ intervalMs: this.intervalMs }, 'Session summarizer started');
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    const controller = this.controller;
    if (!loop || !controller) {
      return;
    }
    controller.abort();
    this.controller = null;

    if (!(await waitWithTimeout(loop, SUMMARY_CONFIG.STOP_TIMEOUT_MS))) {
      this.logger.warn('Session summary still running after stop timeout');
    }
  }

  async summarizeActiveSession(): Promise<SessionSummaryResult | null> {
    const sessionId = this.registry.getActiveSessionId();
    return sessionId === null ? null : this.summarizeSession(sessionId);
  }

  /**
   * Summarizes allowed records newer than the previous summary of the session.
   * Resolves null when there was nothing to summarize or no user identity.
   */
  async summarizeSession(sessionId: string): Promise<SessionSummaryResult | null> {
    const session = this.registry.get(sessionId);
    if (!session) {
      return null;
    }

    const identity = this.identity.snapshot();
    if (!identity.userId) {
      this.logger.warn({ sessionId }, 'No user identity, skipping session summary');
      return null;
    }

    const watermark = this.watermarks.get(sessionId);
    const since = new Date(watermark === undefined ? 0 : watermark + 1);
    const records = this.registry.window(sessionId, since, (record) => record.isAllowed);
    const first = records[0];
    const last = records[records.length - 1];
    if (!first || !last) {
      this.logger.debug({ sessionId }, 'No new allowed activity to summarize');
      return null;
    }

    let summaryText: string;
    try {
      summaryText = (
        await this.generator.generate(
          SESSION_SUMMARY_PROMPT,
          `Project: ${session.projectName}\nSession goal: ${session.goal || 'Unknown'}\n\n` +
            `Timeline:\n${records.map(formatTimelineLine).join('\n')}\n\nWrite the summary now.`
        )
      ).trim();
    } catch (error) {
      this.logger.warn({ error, sessionId }, 'Session summary generation failed');
      return null;
    }
    if (!summaryText) {
      return null;
    }

    const document: SessionSummaryDocument = {
      org_id: identity.orgId,
      user_id: identity.userId,
      user_display: identity.displayName ?? identity.userId,
      session_id: sessionId,
      project_name: session.projectName,
      timestamp: this.clock().toISOString(),
      summary_text: summaryText,
      time_range_minutes: Math.max(
        1,
        Math.round((last.timestamp.getTime() - first.timestamp.getTime()) / 60_000)
      ),
    };

    this.watermarks.set(sessionId, last.timestamp.getTime());
    const stored = await this.store.insertSummary(document);
    this.logger.info({ sessionId, records: records.length, stored }, 'Session summarized');
    return { document, stored };
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await delay(this.intervalMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) {
          this.logger.error({ error }, 'Summary loop sleep interrupted');
        }
        continue;
      }
      try {
        await this.summarizeActiveSession();
      } catch (error) {
        this.logger.error({ error }, 'Session summary failed unexpectedly');
      }
    }
  }
}
