/**
 * Ask route - self-correcting question answering
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';

import { getPipeline } from '../../../src/core/pipeline/index.js';
import { toErrorResponse } from '../middleware/error-handler.js';

const ask = new Hono();

// Validation schemas
export const askRequestSchema = z.object({
  question: z.string().min(1).max(2000),
  maxAttempts: z.number().int().min(1).max(10).optional(),
  minAcceptableScore: z.number().int().min(1).max(5).optional(),
  filterEnabled: z.boolean().optional(),
  topK: z.number().int().min(1).max(50).optional(),
  timeoutMs: z.number().int().min(1000).max(600000).optional(),
  includeHistory: z.boolean().optional().default(false),
});

/**
 * Ask a question
 * POST /api/ask
 */
ask.post('/', zValidator('json', askRequestSchema), async (c) => {
  const { question, includeHistory, ...options } = c.req.valid('json');

  try {
    const result = await getPipeline().run(question, {
      ...options,
      signal: c.req.raw.signal,
    });

    const { history, ...rest } = result;
    return c.json({
      success: true,
      data: includeHistory ? { ...rest, history } : rest,
    });
  } catch (error) {
    const { status, body } = toErrorResponse(error);
    return c.json({ success: false, error: body.message }, status);
  }
});

export default ask;
