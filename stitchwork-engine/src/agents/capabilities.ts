/**
 * Capability Interfaces
 *
 * The language model behind agents is reached only through these two calls.
 * Implementations are free to answer relevance with a boolean or with the
 * model's raw text; anything other than a clear yes or no is an error.
 */

import { CapabilityError } from '../errors.js';
import type { NodeContext } from '../types/index.js';

export interface Capabilities {
  relevance(intent: string, context: NodeContext, signal?: AbortSignal): Promise<boolean | string>;
  generate(intent: string, context: NodeContext, signal?: AbortSignal): Promise<string>;
}

const YES = new Set(['yes', 'y', 'true', 'relevant']);
const NO = new Set(['no', 'n', 'false', 'irrelevant', 'not relevant']);

/**
 * Interpret a relevance answer.
 *
 * @throws CapabilityError when the answer is neither yes nor no
 */
export function parseRelevance(answer: boolean | string): boolean {
  if (typeof answer === 'boolean') return answer;

  const normalized = answer.trim().toLowerCase().replace(/[.!]+$/, '');
  if (YES.has(normalized)) return true;
  if (NO.has(normalized)) return false;

  throw new CapabilityError('relevance', `Unparseable relevance answer: ${JSON.stringify(answer.slice(0, 80))}`);
}

const FENCE_PATTERN = /^```[^\n]*\n([\s\S]*?)\n?```\s*$/;

/**
 * Unwrap generated text that arrives as a single fenced code block.
 *
 * @throws CapabilityError for empty output
 */
export function cleanGeneratedText(text: string): string {
  const trimmed = text.trim();
  const fenced = FENCE_PATTERN.exec(trimmed);
  const content = fenced ? fenced[1] : text;

  if (content.trim().length === 0) {
    throw new CapabilityError('generate', 'Generation returned no content');
  }
  return content;
}
