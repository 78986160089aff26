/**
 * @file langchain-text-generator.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { Logger } from 'pino';
import type { TextGenerator } from '../../domain/ports/text-generator.js';
import type { ModelConfig } from '../../config/agent-config.js';

/**
 * Text generation over an OpenAI-compatible chat model.
 */
export class LangChainTextGenerator implements TextGenerator {
  private readonly llm: ChatOpenAI;
  private readonly logger: Logger;
  private readonly modelName: string;

  constructor(config: ModelConfig, logger: Logger) {
    this.logger = logger.child({ component: 'text-generator' });
    this.modelName = config.modelName;

    this.llm = new ChatOpenAI({
      openAIApiKey: config.apiKey,
      modelName: config.modelName,
      temperature: config.temperature,
      configuration: config.baseUrl
        ? { baseURL: config.baseUrl }
        : undefined,
    });

    this.logger.info({ model: config.modelName }, 'Text generator initialized');
  }

  async generate(systemPrompt: string, userPrompt: string): Promise<string> {
    this.logger.debug({ model: this.modelName, promptLength: userPrompt.length }, 'Generating text');
    const startTime = Date.now();

    const response = await this.llm.invoke([
      new SystemMessage(systemPrompt),
      new HumanMessage(userPrompt),
    ]);

    const text = typeof response.content === 'string'
      ? response.content
      : JSON.stringify(response.content);

    this.logger.debug(
      { model: this.modelName, responseLength: text.length, elapsedMs: Date.now() - startTime },
      'Text generated'
    );
    return text.trim();
  }
}
