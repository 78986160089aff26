/**
 * @file text-generator.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Port for the external text model used by reports, summaries and the Oracle.
 */
export interface TextGenerator {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}
