/**
 * LLM service - OpenAI-compatible chat completions through LiteLLM
 *
 * Backs both the generation capability (`complete`) and the judging
 * capability (`judge`, which expects a JSON object in the reply).
 */

import { config } from '../../config/index.js';
import { ParseError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type {
  GenerationCapability,
  JudgingCapability,
  ModelConfig,
  PromptPayload,
} from '../../types/index.js';

const log = createLogger('llm');

export interface LLMRequest {
  prompt: string;
  systemPrompt?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

interface OpenAIResponse {
  choices: Array<{
    message: {
      content: string | null;
      role: string;
    };
    finish_reason: string;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
  model: string;
}

const DEFAULT_MODEL: ModelConfig = {
  model: 'gpt-oss-120b',
  temperature: 0.3,
  maxTokens: 1000,
};

export class LLMService implements GenerationCapability, JudgingCapability {
  private apiKey: string;
  private baseUrl: string;
  private timeout: number;
  private model: ModelConfig;

  constructor(model: ModelConfig = DEFAULT_MODEL) {
    this.apiKey = config.litellm.apiKey;
    this.baseUrl = config.litellm.baseUrl;
    this.timeout = config.litellm.timeout;
    this.model = model;
  }

  /**
   * Generation capability: plain text completion
   */
  async complete(payload: PromptPayload): Promise<string> {
    const response = await this.chat({
      prompt: payload.prompt,
      systemPrompt: payload.systemPrompt,
      signal: payload.signal,
    });
    return response.content;
  }

  /**
   * Judging capability: completion parsed as a JSON object
   */
  async judge(payload: PromptPayload): Promise<unknown> {
    const response = await this.chat({
      prompt: payload.prompt,
      systemPrompt: payload.systemPrompt,
      signal: payload.signal,
    });
    return extractJson(response.content);
  }

  /**
   * Call the chat completions endpoint
   */
  async chat(request: LLMRequest): Promise<LLMResponse> {
    const {
      prompt,
      systemPrompt,
      model = this.model.model,
      temperature = this.model.temperature,
      maxTokens = this.model.maxTokens,
      signal,
    } = request;

    const messages: Array<{ role: string; content: string }> = [];

    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    // Abort on timeout or when the caller cancels
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      if (signal?.aborted) {
        controller.abort(signal.reason);
      }

      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages,
          temperature,
          max_tokens: maxTokens,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        // Full error stays server-side
        log.error({ status: response.status, body: errorText }, 'LLM API error');
        throw new Error(`LLM API error (${response.status}): Request failed`);
      }

      const data = await response.json() as OpenAIResponse;

      if (!data.choices || !Array.isArray(data.choices) || data.choices.length === 0) {
        throw new Error('LLM API returned invalid response: missing or empty choices array');
      }

      const content = data.choices[0]?.message?.content ?? '';

      return {
        content,
        model: data.model,
        usage: data.usage ? {
          promptTokens: data.usage.prompt_tokens,
          completionTokens: data.usage.completion_tokens,
          totalTokens: data.usage.total_tokens,
        } : undefined,
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError' && !signal?.aborted) {
        throw new Error(`LLM API timeout: Request exceeded ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Pull the first JSON object out of a model reply, tolerating code fences
 * and surrounding prose
 */
export function extractJson(content: string): unknown {
  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new ParseError('No JSON object found in judge response');
  }

  try {
    const parsed: unknown = JSON.parse(jsonMatch[0]);
    return parsed;
  } catch (error) {
    throw new ParseError('Judge response contained malformed JSON', { cause: error });
  }
}

// Singleton instances, one per role
let generationLLM: LLMService | null = null;
let judgeLLM: LLMService | null = null;

export function getGenerationLLM(): LLMService {
  if (!generationLLM) {
    generationLLM = new LLMService(config.models.generation);
  }
  return generationLLM;
}

export function getJudgeLLM(): LLMService {
  if (!judgeLLM) {
    judgeLLM = new LLMService(config.models.judge);
  }
  return judgeLLM;
}
