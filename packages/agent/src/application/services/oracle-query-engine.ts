/**
 * @file oracle-query-engine.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 *
 * Answers natural-language questions over the team's shared activity history.
 */

import type { Logger } from 'pino';
import type {
  HiveStore,
  QueryScope,
  StoredActivity,
  StoredSummary,
} from '../../domain/ports/hive-store.js';
import type { TextGenerator } from '../../domain/ports/text-generator.js';
import type { IdentityState } from '../../domain/value-objects/identity.js';
import { ORACLE_CONFIG } from '../../config/constants.js';

export const ORACLE_MESSAGES = {
  EMPTY_QUESTION: 'Please enter a question for the Oracle.',
  STORE_UNAVAILABLE:
    'The shared activity store is not configured or unreachable. Set HIVE_DB_PATH to enable team questions.',
  MODEL_UNAVAILABLE: 'No model is configured. Set AGENT_API_KEY to enable team questions.',
  PROJECT_REQUIRED: 'Choose a project to ask a project-scoped question.',
  NO_HISTORY: 'No shared history found for that scope.',
  EMPTY_REPLY: 'Oracle could not generate a response.',
} as const;

const SUMMARIES_HEADER = '--- RECENT SESSION SUMMARIES (High Level) ---';
const LOGS_HEADER = '--- RAW ACTIVITY LOGS (Low Level Details) ---';

export interface OracleQuestion {
  question: string;
  scope?: QueryScope;
  /** Defaults to the current identity's organization */
  orgId?: string;
  projectName?: string;
  /** Non-positive or absent means all available history */
  timeWindowHours?: number;
}

export interface OracleAnswer {
  question: string;
  answer: string;
  scope: QueryScope;
  projectName: string | null;
  timeWindowHours: number | null;
  logCount: number;
  summaryCount: number;
  generatedAt: string;
  contextPreview: string[];
}

export interface OracleContext {
  context: string;
  preview: string[];
  /** Summaries with text, as rendered */
  summaryCount: number;
}

export interface OracleQueryEngineConfig {
  store: HiveStore;
  generator: TextGenerator | null;
  identity: IdentityState;
  maxContext?: number;
  logger: Logger;
  clock?: () => Date;
}

function dedupKey(doc: StoredActivity): string | undefined {
  return doc.summary || doc.task || doc.technical_context || undefined;
}

/**
 * Newest first, one document per distinct summary/task/context, at most `maxContext`.
 * Documents with no key are all kept.
 */
export function rankActivity(documents: readonly StoredActivity[], maxContext: number): StoredActivity[] {
  const sorted = [...documents].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  const seen = new Set<string>();
  const ranked: StoredActivity[] = [];

  for (const doc of sorted) {
    if (ranked.length >= maxContext) {
      break;
    }
    const key = dedupKey(doc);
    if (key !== undefined) {
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
    }
    ranked.push(doc);
  }
  return ranked;
}

function owner(doc: { user_display?: string; user_id?: string }): string {
  return doc.user_display || doc.user_id || 'unknown';
}

/**
 * Two-tier context: session summaries first, then raw activity. Blank summaries
 * and empty tiers are omitted.
 */
export function buildOracleContext(
  summaries: readonly StoredSummary[],
  logs: readonly StoredActivity[]
): OracleContext {
  const blocks: string[] = [];

  const summaryLines = summaries.flatMap((doc) => {
    const text = doc.summary_text.trim();
    return text ? [`[${owner(doc)} - ${doc.timestamp.toISOString()}] ${text}`] : [];
  });
  if (summaryLines.length > 0) {
    blocks.push([SUMMARIES_HEADER, ...summaryLines].join('\n'));
  }

  const logLines = logs.map(
    (doc) =>
      `[${owner(doc)} - ${doc.timestamp.toISOString()}] (${doc.project_name || 'unknown project'}) ${dedupKey(doc) ?? ''}`.trimEnd()
  );
  if (logLines.length > 0) {
    blocks.push([LOGS_HEADER, ...logLines].join('\n'));
  }

  return {
    context: blocks.join('\n\n'),
    preview: logLines.slice(0, ORACLE_CONFIG.PREVIEW_LINES),
    summaryCount: summaryLines.length,
  };
}

function describeScope(scope: QueryScope, projectName: string | null): string {
  return scope === 'project' && projectName ? `project: ${projectName}` : 'organization-wide';
}

function describeWindow(hours: number | null): string {
  return hours ? `last ${hours} hours` : 'available history';
}

/**
 * Answers team questions from the shared store. Never rejects: every failure
 * becomes an explanatory answer.
 */
export class OracleQueryEngine {
  private readonly store: HiveStore;
  private readonly generator: TextGenerator | null;
  private readonly identity: IdentityState;
  private readonly maxContext: number;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(config: OracleQueryEngineConfig) {
    this.store = config.store;
    this.generator = config.generator;
    this.identity = config.identity;
    this.maxContext = config.maxContext ?? ORACLE_CONFIG.DEFAULT_MAX_CONTEXT;
    this.logger = config.logger.child({ component: 'oracle' });
    this.clock = config.clock ?? (() => new Date());
  }

  async ask(input: OracleQuestion): Promise<OracleAnswer> {
    const question = input.question.trim();
    const scope: QueryScope = input.scope ?? 'org';
    const projectName = input.projectName?.trim() || null;
    const hours = input.timeWindowHours && input.timeWindowHours > 0 ? input.timeWindowHours : null;
    const now = this.clock();

    const reply = (answer: string, logCount = 0, summaryCount = 0, contextPreview: string[] = []): OracleAnswer => ({
      question,
      answer,
      scope,
      projectName,
      timeWindowHours: hours,
      logCount,
      summaryCount,
      generatedAt: now.toISOString(),
      contextPreview,
    });

    if (!question) {
      return reply(ORACLE_MESSAGES.EMPTY_QUESTION);
    }
    if (scope === 'project' && !projectName) {
      return reply(ORACLE_MESSAGES.PROJECT_REQUIRED);
    }
    if (!this.store.isAvailable()) {
      return reply(ORACLE_MESSAGES.STORE_UNAVAILABLE);
    }

    try {
      const orgId = input.orgId ?? this.identity.snapshot().orgId;
      const since = hours ? new Date(now.getTime() - hours * 3_600_000) : undefined;

      const [rawLogs, summaries] = await Promise.all([
        this.store.queryActivity({
          orgId,
          scope,
          projectName: projectName ?? undefined,
          since,
          limit: this.maxContext,
        }),
        this.store.querySummaries({ orgId, limit: ORACLE_CONFIG.SUMMARY_LIMIT }),
      ]);

      const logs = rankActivity(rawLogs, this.maxContext);
      const { context, preview, summaryCount } = buildOracleContext(summaries, logs);
      if (!context) {
        return reply(ORACLE_MESSAGES.NO_HISTORY);
      }
      if (!this.generator) {
        return reply(ORACLE_MESSAGES.MODEL_UNAVAILABLE, logs.length, summaryCount, preview);
      }

      const scopeText = describeScope(scope, projectName);
      const windowText = describeWindow(hours);
      const answer = await this.generator.generate(
        this.buildSystemPrompt(scopeText, windowText),
        `Team Question:\n${question}\n\nContext (${scopeText}, ${windowText}):\n${context}\n\nCompose the response now.`
      );

      this.logger.info(
        { scope, projectName, logCount: logs.length, summaryCount },
        'Oracle answered'
      );
      return reply(answer.trim() || ORACLE_MESSAGES.EMPTY_REPLY, logs.length, summaryCount, preview);
    } catch (error) {
      this.logger.error({ error, scope, projectName }, 'Oracle query failed');
      const message = error instanceof Error ? error.message : String(error);
      return reply(`Oracle failed to answer: ${message}`);
    }
  }

  private buildSystemPrompt(scopeText: string, windowText: string): string {
    return `You are the Oracle, an engineering lead who answers questions about a team's recent work.
Scope: ${scopeText}. Time window: ${windowText}.

Answer only from the provided context. Prefer the session summaries for the big picture and the raw activity logs for details.
If the context does not answer the question, say so plainly.

Structure the response with these sections:
Summary
People
Risks
Follow-Ups`;
  }
}
