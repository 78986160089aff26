/**
 * @file session-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { WorkSession, type WorkSessionInfo } from '../../domain/entities/work-session.js';
import type { ActivityRecord } from '../../domain/entities/activity-record.js';
import type { ArtifactStorage } from '../../domain/ports/artifact-storage.js';
import { SessionId } from '../../domain/value-objects/session-id.js';
import { slugifyProjectName } from '../../domain/value-objects/project-slug.js';
import { SessionNotFoundError } from '../../domain/errors/domain-errors.js';

export interface CreateWorkSessionParams {
  projectName: string;
  repoPath: string;
  goal: string;
}

export interface SessionRegistryConfig {
  artifacts: ArtifactStorage;
  historyCapacity: number;
  logger: Logger;
}

/**
 * Events emitted by SessionRegistry.
 */
export interface SessionRegistryEvents {
  sessionCreated: (info: WorkSessionInfo) => void;
  sessionDeleted: (info: WorkSessionInfo) => void;
  activeSessionChanged: (sessionId: string | null) => void;
}

/**
 * Owns the session map and the single active-session pointer.
 *
 * Every mutation of the map, the pointer or a session's history runs in one
 * synchronous section; filesystem work is awaited outside it.
 */
export class SessionRegistry extends EventEmitter {
  private readonly sessions = new Map<string, WorkSession>();
  private readonly artifacts: ArtifactStorage;
  private readonly historyCapacity: number;
  private readonly logger: Logger;
  private activeSessionId: string | null = null;

  constructor(config: SessionRegistryConfig) {
    super();
    this.artifacts = config.artifacts;
    this.historyCapacity = config.historyCapacity;
    this.logger = config.logger.child({ component: 'session-registry' });
  }

  /**
   * Creates a session with its own spool directory. The first session becomes active.
   */
  async create(params: CreateWorkSessionParams): Promise<WorkSession> {
    const id = SessionId.generate();
    const spoolDir = await this.artifacts.createSpoolDir(
      `${slugifyProjectName(params.projectName)}-${id.value}`
    );

    const session = new WorkSession({
      id,
      projectName: params.projectName,
      goal: params.goal,
      repoPath: params.repoPath,
      spoolDir,
      historyCapacity: this.historyCapacity,
    });

    this.sessions.set(id.value, session);
    const becameActive = this.activeSessionId === null;
    if (becameActive) {
      this.activeSessionId = id.value;
    }

    this.logger.info(
      { sessionId: id.value, projectName: params.projectName, active: becameActive },
      'Session created'
    );
    this.emit('sessionCreated', session.toInfo());
    if (becameActive) {
      this.emit('activeSessionChanged', id.value);
    }
    return session;
  }

  /**
   * Removes a session and its spool directory. Unknown ids are a no-op.
   */
  async delete(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return;
    }

    this.sessions.delete(sessionId);
    const wasActive = this.activeSessionId === sessionId;
    if (wasActive) {
      this.activeSessionId = Array.from(this.sessions.keys())[0] ?? null;
    }

    this.logger.info({ sessionId, nextActive: this.activeSessionId }, 'Session deleted');
    this.emit('sessionDeleted', session.toInfo());
    if (wasActive) {
      this.emit('activeSessionChanged', this.activeSessionId);
    }

    try {
      await this.artifacts.removeSpoolDir(session.spoolDir);
    } catch (error) {
      this.logger.warn({ error, sessionId, spoolDir: session.spoolDir }, 'Failed to remove spool directory');
    }
  }

  /**
   * Makes the given session active.
   */
  switch(sessionId: string): void {
    if (!this.sessions.has(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
    if (this.activeSessionId === sessionId) {
      return;
    }
    this.activeSessionId = sessionId;
    this.logger.info({ sessionId }, 'Active session switched');
    this.emit('activeSessionChanged', sessionId);
  }

  list(): WorkSessionInfo[] {
    return Array.from(this.sessions.values()).map((session) => session.toInfo());
  }

  get(sessionId: string): WorkSession | undefined {
    return this.sessions.get(sessionId);
  }

  count(): number {
    return this.sessions.size;
  }

  getActiveSessionId(): string | null {
    return this.activeSessionId;
  }

  getActive(): WorkSession | undefined {
    return this.activeSessionId === null ? undefined : this.sessions.get(this.activeSessionId);
  }

  /**
   * Appends a record to a session's history. When the history is full the
   * oldest record is evicted and its artifact deleted.
   * Resolves false when the session no longer exists.
   */
  async append(sessionId: string, record: ActivityRecord): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }

    const evicted = session.history.push(record);
    if (evicted?.artifactPath) {
      await this.artifacts.discard(evicted.artifactPath);
    }
    return true;
  }

  /**
   * Copy of a session's history, oldest first. Defaults to the active session.
   */
  snapshot(sessionId?: string): ActivityRecord[] {
    const session = sessionId === undefined ? this.getActive() : this.sessions.get(sessionId);
    return session ? session.history.snapshot() : [];
  }

  /**
   * Records at or after `since` that satisfy the predicate, oldest first.
   */
  window(
    sessionId: string,
    since: Date,
    predicate: (record: ActivityRecord) => boolean = () => true
  ): ActivityRecord[] {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return [];
    }
    const cutoff = since.getTime();
    return session.history.filter(
      (record) => record.timestamp.getTime() >= cutoff && predicate(record)
    );
  }
}
