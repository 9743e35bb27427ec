/**
 * MCP ask tool - self-correcting question answering
 */

import { z } from 'zod';
import { getPipeline } from '../../core/pipeline/index.js';
import { errorMessage } from '../../utils/errors.js';
import type { PipelineResult, ToolResult } from '../../types/index.js';

// Tool schema
export const askSchema = z.object({
  question: z.string().min(1).describe('The question to answer from the indexed documents'),
  maxAttempts: z.number().int().min(1).max(10).optional().describe('Generation attempts before giving up (default: 3)'),
  minAcceptableScore: z.number().int().min(1).max(5).optional().describe('Faithfulness score (1-5) an answer needs to be accepted (default: 3)'),
  filterEnabled: z.boolean().optional().describe('Judge retrieved passages for relevance before answering (default: true)'),
  topK: z.number().int().min(1).max(50).optional().describe('Passages to retrieve (default: 5)'),
  timeoutMs: z.number().int().min(1000).max(600000).optional().describe('Abort the run after this many milliseconds'),
});

export type AskParams = z.infer<typeof askSchema>;

// Tool implementation
export async function ask(params: AskParams): Promise<ToolResult<PipelineResult>> {
  try {
    const { question, ...options } = params;
    const result = await getPipeline().run(question, options);

    return {
      success: true,
      data: result,
    };
  } catch (error) {
    return {
      success: false,
      error: errorMessage(error),
    };
  }
}
