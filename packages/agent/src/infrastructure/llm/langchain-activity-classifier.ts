/**
 * @file langchain-activity-classifier.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { Logger } from 'pino';
import type { ActivityClassifier, ClassifierInput } from '../../domain/ports/activity-classifier.js';
import type { ModelConfig } from '../../config/agent-config.js';
import { ACTIVITY_EXTRACTION_PROMPT } from './prompts.js';

/**
 * Screen classifier over an OpenAI-compatible vision model.
 */
export class LangChainActivityClassifier implements ActivityClassifier {
  private readonly llm: ChatOpenAI;
  private readonly logger: Logger;

  constructor(config: ModelConfig, logger: Logger) {
    this.logger = logger.child({ component: 'activity-classifier' });

    this.llm = new ChatOpenAI({
      openAIApiKey: config.apiKey,
      modelName: config.visionModelName,
      temperature: config.temperature,
      configuration: config.baseUrl
        ? { baseURL: config.baseUrl }
        : undefined,
    });

    this.logger.info({ model: config.visionModelName }, 'Activity classifier initialized');
  }

  async classify(input: ClassifierInput): Promise<string> {
    const dataUrl = `data:${input.mimeType};base64,${input.image.toString('base64')}`;
    const startTime = Date.now();

    const response = await this.llm.invoke([
      new SystemMessage(ACTIVITY_EXTRACTION_PROMPT),
      new HumanMessage({
        content: [
          { type: 'text', text: input.context },
          { type: 'image_url', image_url: { url: dataUrl } },
        ],
      }),
    ]);

    const text = typeof response.content === 'string'
      ? response.content
      : JSON.stringify(response.content);

    this.logger.debug(
      { imageBytes: input.image.length, responseLength: text.length, elapsedMs: Date.now() - startTime },
      'Frame classified'
    );
    return text;
  }
}
