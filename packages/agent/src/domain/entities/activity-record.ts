/**
 * @file activity-record.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { InvalidRecordError } from '../errors/domain-errors.js';
import type { DeepWorkState, PrivacyState } from '../value-objects/activity-state.js';
import type { FocusBounds } from '../value-objects/window-snapshot.js';
import { RECORD_DEFAULTS } from '../../config/constants.js';

/**
 * Properties of one classified observation.
 */
export interface ActivityRecordProps {
  timestamp: Date;
  sessionId: string;
  projectName: string;
  projectSlug: string;
  goal: string;
  repoPath: string;
  task: string;
  activityType: string;
  technicalContext: string;
  appName?: string | null;
  activeApp: string;
  windowTitle: string;
  focusBounds: FocusBounds | null;
  alignmentScore?: number | null;
  isDeepWork: boolean;
  deepWorkState: DeepWorkState;
  privacyState: PrivacyState;
  errorCode?: string | null;
  functionTarget?: string | null;
  documentationTitle?: string | null;
  docUrl?: string | null;
  artifactPath?: string | null;
  userId?: string | null;
  userDisplay?: string | null;
  orgId?: string | null;
  source?: string;
}

/**
 * Store document rendered from a record. Never carries the local artifact path.
 */
export interface ActivityPayload {
  timestamp: string;
  session_id: string;
  project_name: string;
  project_slug: string;
  goal: string;
  repo_path: string;
  task: string;
  activity_type: string;
  technical_context: string;
  app_name?: string;
  active_app: string;
  window_title: string;
  focus_bounds?: FocusBounds;
  alignment_score?: number;
  is_deep_work: boolean;
  deep_work_state: DeepWorkState;
  privacy_state: PrivacyState;
  error_code?: string;
  function_target?: string;
  documentation_title?: string;
  doc_url?: string;
  user_id?: string;
  user_display?: string;
  org_id?: string;
  source: string;
}

/**
 * Local view of a record, including its artifact path.
 */
export type ActivityView = ActivityPayload & { artifact_path: string | null };

/**
 * Immutable activity record.
 */
export class ActivityRecord {
  readonly timestamp: Date;
  readonly sessionId: string;
  readonly projectName: string;
  readonly projectSlug: string;
  readonly goal: string;
  readonly repoPath: string;
  readonly task: string;
  readonly activityType: string;
  readonly technicalContext: string;
  readonly appName: string | null;
  readonly activeApp: string;
  readonly windowTitle: string;
  readonly focusBounds: Readonly<FocusBounds> | null;
  readonly alignmentScore: number | null;
  readonly isDeepWork: boolean;
  readonly deepWorkState: DeepWorkState;
  readonly privacyState: PrivacyState;
  readonly errorCode: string | null;
  readonly functionTarget: string | null;
  readonly documentationTitle: string | null;
  readonly docUrl: string | null;
  readonly artifactPath: string | null;
  readonly userId: string | null;
  readonly userDisplay: string | null;
  readonly orgId: string | null;
  readonly source: string;

  constructor(props: ActivityRecordProps) {
    if (props.deepWorkState === 'deep_work' && !props.isDeepWork) {
      throw new InvalidRecordError('deep_work state requires is_deep_work to be true');
    }

    this.timestamp = new Date(props.timestamp.getTime());
    this.sessionId = props.sessionId;
    this.projectName = props.projectName;
    this.projectSlug = props.projectSlug;
    this.goal = props.goal;
    this.repoPath = props.repoPath;
    this.task = props.task;
    this.activityType = props.activityType;
    this.technicalContext = props.technicalContext;
    this.appName = props.appName ?? null;
    this.activeApp = props.activeApp;
    this.windowTitle = props.windowTitle;
    this.focusBounds = props.focusBounds ? Object.freeze({ ...props.focusBounds }) : null;
    this.alignmentScore = props.alignmentScore ?? null;
    this.isDeepWork = props.isDeepWork;
    this.deepWorkState = props.deepWorkState;
    this.privacyState = props.privacyState;
    this.errorCode = props.errorCode ?? null;
    this.functionTarget = props.functionTarget ?? null;
    this.documentationTitle = props.documentationTitle ?? null;
    this.docUrl = props.docUrl ?? null;
    this.artifactPath = props.artifactPath ?? null;
    this.userId = props.userId ?? null;
    this.userDisplay = props.userDisplay ?? null;
    this.orgId = props.orgId ?? null;
    this.source = props.source ?? RECORD_DEFAULTS.SOURCE;
    Object.freeze(this);
  }

  get isAllowed(): boolean {
    return this.privacyState === 'allowed';
  }

  /**
   * Copy of this record with the artifact reference cleared.
   */
  withoutArtifact(): ActivityRecord {
    return new ActivityRecord({ ...this.toProps(), artifactPath: null });
  }

  /**
   * Store document: snake_case keys, nulls dropped, no artifact path.
   */
  toPayload(): ActivityPayload {
    const payload: ActivityPayload = {
      timestamp: this.timestamp.toISOString(),
      session_id: this.sessionId,
      project_name: this.projectName,
      project_slug: this.projectSlug,
      goal: this.goal,
      repo_path: this.repoPath,
      task: this.task,
      activity_type: this.activityType,
      technical_context: this.technicalContext,
      active_app: this.activeApp,
      window_title: this.windowTitle,
      is_deep_work: this.isDeepWork,
      deep_work_state: this.deepWorkState,
      privacy_state: this.privacyState,
      source: this.source,
    };

    if (this.appName !== null) payload.app_name = this.appName;
    if (this.focusBounds !== null) payload.focus_bounds = { ...this.focusBounds };
    if (this.alignmentScore !== null) payload.alignment_score = this.alignmentScore;
    if (this.errorCode !== null) payload.error_code = this.errorCode;
    if (this.functionTarget !== null) payload.function_target = this.functionTarget;
    if (this.documentationTitle !== null) payload.documentation_title = this.documentationTitle;
    if (this.docUrl !== null) payload.doc_url = this.docUrl;
    if (this.userId !== null) payload.user_id = this.userId;
    const display = this.userDisplay ?? this.userId;
    if (display !== null) payload.user_display = display;
    if (this.orgId !== null) payload.org_id = this.orgId;

    return payload;
  }

  /**
   * Local view for the control API.
   */
  toView(): ActivityView {
    return { ...this.toPayload(), artifact_path: this.artifactPath };
  }

  private toProps(): ActivityRecordProps {
    return {
      timestamp: this.timestamp,
      sessionId: this.sessionId,
      projectName: this.projectName,
      projectSlug: this.projectSlug,
      goal: this.goal,
      repoPath: this.repoPath,
      task: this.task,
      activityType: this.activityType,
      technicalContext: this.technicalContext,
      appName: this.appName,
      activeApp: this.activeApp,
      windowTitle: this.windowTitle,
      focusBounds: this.focusBounds,
      alignmentScore: this.alignmentScore,
      isDeepWork: this.isDeepWork,
      deepWorkState: this.deepWorkState,
      privacyState: this.privacyState,
      errorCode: this.errorCode,
      functionTarget: this.functionTarget,
      documentationTitle: this.documentationTitle,
      docUrl: this.docUrl,
      artifactPath: this.artifactPath,
      userId: this.userId,
      userDisplay: this.userDisplay,
      orgId: this.orgId,
      source: this.source,
    };
  }
}
