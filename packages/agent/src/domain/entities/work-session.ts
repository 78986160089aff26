/**
 * @file work-session.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { SessionId } from '../value-objects/session-id.js';
import { slugifyProjectName } from '../value-objects/project-slug.js';
import { RingBuffer } from './ring-buffer.js';
import type { ActivityRecord } from './activity-record.js';

export interface WorkSessionProps {
  id: SessionId;
  projectName: string;
  goal: string;
  repoPath: string;
  spoolDir: string;
  historyCapacity: number;
}

/**
 * Session metadata exposed to callers that must not touch the history.
 */
export interface WorkSessionInfo {
  sessionId: string;
  projectName: string;
  projectSlug: string;
  goal: string;
  repoPath: string;
  spoolDir: string;
  recordCount: number;
  historyCapacity: number;
  createdAt: number;
}

/**
 * A monitored work session with its bounded record history.
 */
export class WorkSession {
  private readonly _id: SessionId;
  private readonly _projectName: string;
  private readonly _projectSlug: string;
  private readonly _goal: string;
  private readonly _repoPath: string;
  private readonly _spoolDir: string;
  private readonly _history: RingBuffer<ActivityRecord>;
  private readonly _createdAt: Date;

  constructor(props: WorkSessionProps) {
    this._id = props.id;
    this._projectName = props.projectName;
    this._projectSlug = slugifyProjectName(props.projectName);
    this._goal = props.goal;
    this._repoPath = props.repoPath;
    this._spoolDir = props.spoolDir;
    this._history = new RingBuffer<ActivityRecord>(props.historyCapacity);
    this._createdAt = new Date();
  }

  get id(): SessionId {
    return this._id;
  }

  get projectName(): string {
    return this._projectName;
  }

  get projectSlug(): string {
    return this._projectSlug;
  }

  get goal(): string {
    return this._goal;
  }

  get repoPath(): string {
    return this._repoPath;
  }

  get spoolDir(): string {
    return this._spoolDir;
  }

  get history(): RingBuffer<ActivityRecord> {
    return this._history;
  }

  get createdAt(): Date {
    return this._createdAt;
  }

  toInfo(): WorkSessionInfo {
    return {
      sessionId: this._id.value,
      projectName: this._projectName,
      projectSlug: this._projectSlug,
      goal: this._goal,
      repoPath: this._repoPath,
      spoolDir: this._spoolDir,
      recordCount: this._history.length,
      historyCapacity: this._history.capacity,
      createdAt: this._createdAt.getTime(),
    };
  }
}
