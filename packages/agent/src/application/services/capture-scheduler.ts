/**
 * @file capture-scheduler.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import type { Logger } from 'pino';
import { ActivityRecord } from '../../domain/entities/activity-record.js';
import type { WorkSession } from '../../domain/entities/work-session.js';
import type { ActivityClassifier } from '../../domain/ports/activity-classifier.js';
import type { ArtifactStorage } from '../../domain/ports/artifact-storage.js';
import type { PrivacyFilter } from '../../domain/ports/privacy-filter.js';
import type { ScreenSensor } from '../../domain/ports/screen-sensor.js';
import type { WindowInspector } from '../../domain/ports/window-sensor.js';
import type { IdentityState } from '../../domain/value-objects/identity.js';
import { failed, succeeded, type StepResult } from '../../domain/value-objects/step-result.js';
import { formatFocusBounds, type WindowSnapshot } from '../../domain/value-objects/window-snapshot.js';
import { CAPTURE_CONFIG } from '../../config/constants.js';
import { normalizeClassification } from './record-normalizer.js';
import type { RemoteSync } from './remote-sync.js';
import type { SessionRegistry } from './session-registry.js';
import { waitWithTimeout } from './bounded-wait.js';

export interface CaptureSchedulerConfig {
  registry: SessionRegistry;
  windows: WindowInspector;
  screen: ScreenSensor;
  classifier: ActivityClassifier;
  artifacts: ArtifactStorage;
  sync: RemoteSync;
  identity: IdentityState;
  privacyFilter: PrivacyFilter;
  intervalMs: number;
  idleDelayMs?: number;
  stopGraceMs?: number;
  logger: Logger;
  clock?: () => Date;
}

/**
 * Result of one capture cycle.
 */
export type CycleOutcome =
  | { kind: 'idle' }
  | { kind: 'vetoed'; sessionId: string }
  | { kind: 'capture_failed'; sessionId: string; reason: string }
  | { kind: 'classify_failed'; sessionId: string; reason: string }
  | { kind: 'cancelled'; sessionId: string }
  | { kind: 'discarded'; sessionId: string }
  | { kind: 'recorded'; sessionId: string; record: ActivityRecord; synced: boolean };

/**
 * Events emitted by CaptureScheduler.
 */
export interface CaptureSchedulerEvents {
  /** Emitted after a record is stored, outside the capture cycle */
  record: (record: ActivityRecord) => void;
}

/**
 * Textual context handed to the classifier alongside the frame.
 */
export function describeCaptureContext(goal: string, window: WindowSnapshot): string {
  return [
    `Session goal: ${goal}`,
    `Active application: ${window.app}`,
    `Window title: ${window.title}`,
    `Focus bounds: ${formatFocusBounds(window.bounds)}`,
  ].join('\n');
}

/**
 * Periodically captures the screen for the active session, classifies the
 * frame and stores the resulting record.
 *
 * One loop per instance. Failures of any single cycle are logged and the loop
 * continues on the next interval.
 */
export class CaptureScheduler extends EventEmitter {
  private readonly registry: SessionRegistry;
  private readonly windows: WindowInspector;
  private readonly screen: ScreenSensor;
  private readonly classifier: ActivityClassifier;
  private readonly artifacts: ArtifactStorage;
  private readonly sync: RemoteSync;
  private readonly identity: IdentityState;
  private readonly privacyFilter: PrivacyFilter;
  private readonly intervalMs: number;
  private readonly idleDelayMs: number;
  private readonly stopGraceMs: number;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(config: CaptureSchedulerConfig) {
    super();
    this.registry = config.registry;
    this.windows = config.windows;
    this.screen = config.screen;
    this.classifier = config.classifier;
    this.artifacts = config.artifacts;
    this.sync = config.sync;
    this.identity = config.identity;
    this.privacyFilter = config.privacyFilter;
    this.intervalMs = config.intervalMs;
    this.idleDelayMs = config.idleDelayMs ?? CAPTURE_CONFIG.IDLE_DELAY_MS;
    this.stopGraceMs = config.stopGraceMs ?? CAPTURE_CONFIG.STOP_GRACE_MS;
    this.logger = config.logger.child({ component: 'capture-scheduler' });
    this.clock = config.clock ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Starts the loop. Refused while a previous loop is still winding down.
   */
  start(): void {
    if (this.loop) {
      this.logger.warn(
        this.controller ? 'Capture scheduler already running' : 'Capture scheduler still stopping, not restarted'
      );
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(controller.signal).finally(() => {
      this.loop = null;
    });
    this.logger.info({ intervalMs: this.intervalMs }, 'Capture scheduler started');
  }

  /**
   * Signals the loop to stop and waits for it at most one interval plus grace.
   * A loop that outlives the wait keeps the scheduler running until it settles.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    const controller = this.controller;
    if (!loop || !controller) {
      return;
    }

    controller.abort();
    this.controller = null;

    const finished = await waitWithTimeout(loop, this.intervalMs + this.stopGraceMs);
    if (finished) {
      this.logger.info('Capture scheduler stopped');
    } else {
      this.logger.warn('Capture cycle still running after stop timeout');
    }
  }

  /**
   * Runs one capture cycle. The signal is checked between steps.
   */
  async runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
    const session = this.registry.getActive();
    if (!session) {
      return { kind: 'idle' };
    }
    const sessionId = session.id.value;

    if (!(await this.isCaptureAllowed())) {
      this.logger.debug({ sessionId }, 'Capture vetoed by privacy filter');
      return { kind: 'vetoed', sessionId };
    }

    const window = await this.windows.snapshot({ cacheMaxAgeMs: 0 });
    const capturedAt = this.clock();

    const capture = await this.captureArtifact(session, capturedAt);
    if (!capture.ok) {
      this.logger.warn({ sessionId, reason: capture.reason }, 'Screen capture failed');
      return { kind: 'capture_failed', sessionId, reason: capture.reason };
    }
    const artifactPath = capture.value;

    if (signal?.aborted) {
      await this.artifacts.discard(artifactPath);
      return { kind: 'cancelled', sessionId };
    }

    const classification = await this.classify(session, window, artifactPath);
    if (!classification.ok) {
      // Not yet owned by a record
      await this.artifacts.discard(artifactPath);
      this.logger.warn({ sessionId, reason: classification.reason }, 'Classification failed');
      return { kind: 'classify_failed', sessionId, reason: classification.reason };
    }

    if (signal?.aborted) {
      await this.artifacts.discard(artifactPath);
      return { kind: 'cancelled', sessionId };
    }

    const { activity, parsed } = normalizeClassification(classification.value);
    if (!parsed) {
      this.logger.debug(
        { sessionId, preview: classification.value.slice(0, 200) },
        'Classifier output had no JSON object, using defaults'
      );
    }

    const identity = this.identity.snapshot();
    let record = new ActivityRecord({
      timestamp: capturedAt,
      sessionId,
      projectName: session.projectName,
      projectSlug: session.projectSlug,
      goal: session.goal,
      repoPath: session.repoPath,
      task: activity.task,
      activityType: activity.activityType,
      technicalContext: activity.technicalContext,
      appName: activity.appName ?? window.app,
      activeApp: window.app,
      windowTitle: window.title,
      focusBounds: window.bounds,
      alignmentScore: activity.alignmentScore,
      isDeepWork: activity.isDeepWork,
      deepWorkState: activity.deepWorkState,
      privacyState: activity.privacyState,
      errorCode: activity.errorCode,
      functionTarget: activity.functionTarget,
      documentationTitle: activity.documentationTitle,
      docUrl: activity.docUrl,
      artifactPath,
      userId: identity.userId,
      userDisplay: identity.displayName,
      orgId: identity.orgId,
    });

    if (!record.isAllowed) {
      await this.artifacts.discard(artifactPath);
      record = record.withoutArtifact();
    }

    if (!(await this.registry.append(sessionId, record))) {
      // Session deleted while the cycle ran
      if (record.artifactPath) {
        await this.artifacts.discard(record.artifactPath);
      }
      return { kind: 'discarded', sessionId };
    }

    const synced = await this.sync.publish(record);
    this.notify(record);

    this.logger.debug(
      { sessionId, activityType: record.activityType, privacyState: record.privacyState, synced },
      'Activity recorded'
    );
    return { kind: 'recorded', sessionId, record, synced };
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let sleepMs = this.intervalMs;
      try {
        const outcome = await this.runCycle(signal);
        if (outcome.kind === 'idle') {
          sleepMs = this.idleDelayMs;
        }
      } catch (error) {
        this.logger.error({ error }, 'Capture cycle failed unexpectedly');
      }
      await this.sleep(sleepMs, signal);
    }
  }

  private async sleep(ms: number, signal: AbortSignal): Promise<void> {
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) {
        this.logger.error({ error }, 'Capture loop sleep interrupted');
      }
    }
  }

  private async isCaptureAllowed(): Promise<boolean> {
    try {
      return await this.privacyFilter();
    } catch (error) {
      this.logger.warn({ error }, 'Privacy filter failed, skipping capture');
      return false;
    }
  }

  private async captureArtifact(session: WorkSession, capturedAt: Date): Promise<StepResult<string>> {
    const path = this.artifacts.artifactPath(session.spoolDir, capturedAt);
    try {
      await this.screen.capture(path);
      return succeeded(path);
    } catch (error) {
      // Remove a partially written file, if any
      await this.artifacts.discard(path);
      return failed(error);
    }
  }

  private async classify(
    session: WorkSession,
    window: WindowSnapshot,
    artifactPath: string
  ): Promise<StepResult<string>> {
    try {
      const image = await this.artifacts.read(artifactPath);
      const output = await this.classifier.classify({
        image,
        mimeType: CAPTURE_CONFIG.ARTIFACT_MIME_TYPE,
        context: describeCaptureContext(session.goal, window),
      });
      return succeeded(output);
    } catch (error) {
      return failed(error);
    }
  }

  private notify(record: ActivityRecord): void {
    if (this.listenerCount('record') === 0) {
      return;
    }
    setImmediate(() => {
      try {
        this.emit('record', record);
      } catch (error) {
        this.logger.warn({ error }, 'Record listener failed');
      }
    });
  }
}
