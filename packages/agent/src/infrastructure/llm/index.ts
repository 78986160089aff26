/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { ModelConfig } from '../../config/agent-config.js';
import type { ActivityClassifier } from '../../domain/ports/activity-classifier.js';
import type { TextGenerator } from '../../domain/ports/text-generator.js';
import { LangChainActivityClassifier } from './langchain-activity-classifier.js';
import { LangChainTextGenerator } from './langchain-text-generator.js';

export interface ModelAdapters {
  classifier: ActivityClassifier;
  generator: TextGenerator;
}

/**
 * Creates the model adapters, or null when no model key is configured.
 */
export function createModelAdapters(config: ModelConfig | null, logger: Logger): ModelAdapters | null {
  if (!config) {
    logger.warn('AGENT_API_KEY not configured, capture classification, summaries and Oracle answers disabled');
    return null;
  }

  return {
    classifier: new LangChainActivityClassifier(config, logger),
    generator: new LangChainTextGenerator(config, logger),
  };
}
