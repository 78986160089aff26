/**
 * @file activity-classifier.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * One classification request: the raw frame plus the textual capture context.
 */
export interface ClassifierInput {
  image: Buffer;
  mimeType: string;
  context: string;
}

/**
 * Port for the external image classifier.
 * Returns free text that is expected (not guaranteed) to contain a JSON object.
 */
export interface ActivityClassifier {
  classify(input: ClassifierInput): Promise<string>;
}
