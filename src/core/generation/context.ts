/**
 * Context formatting shared by generation and evaluation prompts
 */

import type { Passage } from '../../types/index.js';

export const CONTEXT_SEPARATOR = '\n\n---\n\n';
export const TRUNCATION_MARKER = '\n\n[Context truncated...]';

/**
 * Join passages into one prompt block, cut at maxLength characters
 */
export function formatContext(passages: readonly Passage[], maxLength: number): string {
  const context = passages
    .map((passage, i) => `[Document ${i + 1}: ${passage.metadata.source}]\n${passage.content}`)
    .join(CONTEXT_SEPARATOR);

  if (context.length > maxLength) {
    return context.substring(0, maxLength) + TRUNCATION_MARKER;
  }

  return context;
}
