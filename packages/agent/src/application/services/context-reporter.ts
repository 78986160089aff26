/**
 * @file context-reporter.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { mkdir, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import type { Logger } from 'pino';
import type { ActivityRecord } from '../../domain/entities/activity-record.js';
import type { TextGenerator } from '../../domain/ports/text-generator.js';
import { compactTimestamp } from '../../domain/value-objects/compact-timestamp.js';
import { REPORT_CONFIG } from '../../config/constants.js';
import type { SessionRegistry } from './session-registry.js';

const COMMIT_REPORT_PROMPT = `You are a senior engineer writing a pull request description.
You receive a timeline of what the author worked on before committing.

Write Markdown with these sections:
### What changed
### Why
### How it was verified
### Risks

Be concrete: mention files, functions and errors from the timeline. Keep it under 250 words.`;

export interface ContextReporterConfig {
  registry: SessionRegistry;
  /** Null disables the pull request draft */
  generator: TextGenerator | null;
  windowMinutes?: number;
  logger: Logger;
  clock?: () => Date;
}

/**
 * One timeline line per record.
 */
export function formatTimelineLine(record: ActivityRecord): string {
  let line =
    `${record.timestamp.toISOString()} | type=${record.activityType} | task=${record.task} | ` +
    `context=${record.technicalContext} | error=${record.errorCode ?? 'n/a'} | ` +
    `function=${record.functionTarget ?? 'n/a'} | doc=${record.documentationTitle ?? 'n/a'} | ` +
    `app=${record.appName ?? 'n/a'} | focus_app=${record.activeApp} | window="${record.windowTitle}" | ` +
    `deep_state=${record.deepWorkState}`;
  if (record.docUrl) {
    line += ` | doc_url=${record.docUrl}`;
  }
  return line;
}

function tableCell(value: string | null): string {
  return (value ?? 'n/a').replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function formatEventTable(records: ActivityRecord[]): string[] {
  const lines = [
    '| Time | Type | Task | Context | Error | Function | Docs | App | Privacy |',
    '| --- | --- | --- | --- | --- | --- | --- | --- | --- |',
  ];
  for (const record of records) {
    const cells = [
      record.timestamp.toISOString(),
      record.activityType,
      record.task,
      record.technicalContext,
      record.errorCode,
      record.functionTarget,
      record.docUrl ? `${record.documentationTitle ?? record.docUrl} (${record.docUrl})` : record.documentationTitle,
      `${record.appName ?? 'n/a'} / ${record.activeApp}`,
      `${record.privacyState} / ${record.deepWorkState}`,
    ].map(tableCell);
    lines.push(`| ${cells.join(' | ')} |`);
  }
  return lines;
}

function formatRawRecords(records: ActivityRecord[]): string[] {
  const lines: string[] = [];
  records.forEach((record, index) => {
    lines.push(
      '',
      `### ${index + 1}. ${record.timestamp.toISOString()}`,
      '',
      '```json',
      JSON.stringify(record.toPayload(), null, 2),
      '```'
    );
  });
  return lines;
}

/**
 * Writes a Markdown report of a session's recent allowed activity into the
 * session's repository.
 */
export class ContextReporter {
  private readonly registry: SessionRegistry;
  private readonly generator: TextGenerator | null;
  private readonly windowMinutes: number;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(config: ContextReporterConfig) {
    this.registry = config.registry;
    this.generator = config.generator;
    this.windowMinutes = config.windowMinutes ?? REPORT_CONFIG.DEFAULT_WINDOW_MINUTES;
    this.logger = config.logger.child({ component: 'context-reporter' });
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Resolves the report path, or null when there was nothing to report.
   */
  async writeReport(sessionId: string, commitId: string): Promise<string | null> {
    const session = this.registry.get(sessionId);
    if (!session) {
      this.logger.warn({ sessionId, commitId }, 'Session gone, skipping commit report');
      return null;
    }

    const now = this.clock();
    const since = new Date(now.getTime() - this.windowMinutes * 60_000);
    const records = this.registry.window(sessionId, since, (record) => record.isAllowed);
    if (records.length === 0) {
      this.logger.info({ sessionId, commitId }, 'No allowed activity in lookback window, skipping report');
      return null;
    }

    const timeline = records.map(formatTimelineLine);
    const draft = await this.draftPullRequest(timeline.join('\n'), session.goal);

    const lines = [
      `# Commit Context: ${commitId.slice(0, 12)}`,
      '',
      `- Session goal: ${session.goal || 'Unknown'}`,
      `- Commit: \`${commitId}\``,
      `- Repository: \`${basename(session.repoPath)}\``,
      `- Generated: ${now.toISOString()}`,
      `- Lookback window: last ${this.windowMinutes} minutes (${records.length} records)`,
      '',
      '## Visual Timeline',
      '',
      ...timeline.map((line) => `- ${line}`),
      '',
      '## AI Pull Request Draft',
      '',
      draft,
      '',
      '## Structured Event Table',
      '',
      ...formatEventTable(records),
      '',
      '## Raw Activity Records',
      ...formatRawRecords(records),
      '',
    ];

    const outputDir = join(session.repoPath, REPORT_CONFIG.OUTPUT_DIR);
    await mkdir(outputDir, { recursive: true });
    const reportPath = join(
      outputDir,
      `${REPORT_CONFIG.FILE_PREFIX}${compactTimestamp(now, '-')}.md`
    );
    await writeFile(reportPath, lines.join('\n'), 'utf-8');

    this.logger.info({ sessionId, commitId, reportPath, records: records.length }, 'Commit report written');
    return reportPath;
  }

  private async draftPullRequest(timeline: string, goal: string): Promise<string> {
    if (!this.generator) {
      return REPORT_CONFIG.SUMMARY_UNAVAILABLE;
    }

    try {
      const draft = await this.generator.generate(
        COMMIT_REPORT_PROMPT,
        `Visual Timeline:\n${timeline}\n\nSession goal: ${goal || 'Unknown'}\n\nWrite the pull request description now.`
      );
      return draft.trim() || REPORT_CONFIG.SUMMARY_UNAVAILABLE;
    } catch (error) {
      this.logger.warn({ error }, 'Pull request draft failed');
      return REPORT_CONFIG.SUMMARY_UNAVAILABLE;
    }
  }
}
