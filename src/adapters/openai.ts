/**
 * OpenAI Adapter
 * ==============
 *
 * Live adapter for OpenAI's Chat Completions API.
 *
 * Security:
 * - API key from options or environment only (never hardcoded)
 * - Keys never logged or included in errors
 */

import OpenAI from 'openai';
import { createHash } from 'node:crypto';
import {
  type ModelAdapter,
  type ModelCapabilities,
  type TransformContext,
  type TransformResult,
  AdapterError,
  resolveMaxOutputTokens,
} from './model.js';

// =============================================================================
// Types
// =============================================================================

export type OpenAIModel =
  | 'gpt-4o'
  | 'gpt-4o-mini'
  | 'gpt-4-turbo'
  | 'gpt-4.1'
  | 'gpt-4.1-mini';

const MODEL_CAPABILITIES: Record<OpenAIModel, ModelCapabilities> = {
  'gpt-4o': { max_context_tokens: 128000, max_output_tokens: 16384 },
  'gpt-4o-mini': { max_context_tokens: 128000, max_output_tokens: 16384 },
  'gpt-4-turbo': { max_context_tokens: 128000, max_output_tokens: 4096 },
  'gpt-4.1': { max_context_tokens: 1047576, max_output_tokens: 32768 },
  'gpt-4.1-mini': { max_context_tokens: 1047576, max_output_tokens: 32768 },
};

export function isOpenAIModel(model: string): model is OpenAIModel {
  return Object.prototype.hasOwnProperty.call(MODEL_CAPABILITIES, model);
}

export interface OpenAIAdapterOptions {
  /**
   * If not provided, reads from OPENAI_API_KEY.
   */
  api_key?: string;

  /**
   * If not provided, reads from OPENAI_ORG_ID.
   */
  organization_id?: string;

  /**
   * @default 'gpt-4o-mini'
   */
  model?: OpenAIModel;

  /**
   * SDK-level retries for transient errors.
   * @default 2
   */
  max_retries?: number;

  /**
   * @default 120000
   */
  timeout_ms?: number;

  base_url?: string;

  /**
   * @default 0.1
   */
  temperature?: number;
}

// =============================================================================
// Implementation
// =============================================================================

export class OpenAIAdapter implements ModelAdapter {
  readonly adapter_id: string;
  readonly model_id: string;
  readonly capabilities: ModelCapabilities;

  private readonly client: OpenAI;
  private readonly model: OpenAIModel;
  private readonly temperature: number;
  private ready = false;

  constructor(options: OpenAIAdapterOptions = {}) {
    const api_key = options.api_key ?? process.env['OPENAI_API_KEY'];

    if (!api_key) {
      throw new AdapterError(
        'ADAPTER_ERROR',
        'OPENAI_API_KEY not provided and not found in environment',
        false
      );
    }

    this.model = options.model ?? 'gpt-4o-mini';
    this.temperature = options.temperature ?? 0.1;

    const hash = createHash('sha256')
      .update(`openai:${this.model}:${Date.now()}`)
      .digest('hex')
      .slice(0, 8);
    this.adapter_id = `openai_${hash}`;
    this.model_id = this.model;
    this.capabilities = MODEL_CAPABILITIES[this.model];

    this.client = new OpenAI({
      apiKey: api_key,
      organization: options.organization_id ?? process.env['OPENAI_ORG_ID'] ?? null,
      baseURL: options.base_url ?? null,
      timeout: options.timeout_ms ?? 120000,
      maxRetries: options.max_retries ?? 2,
    });

    this.ready = true;
  }

  async transform(prompt: string, context: TransformContext): Promise<TransformResult> {
    if (!this.ready) {
      throw new AdapterError('ADAPTER_ERROR', 'Adapter not ready - was it shut down?', false);
    }

    const start_time = performance.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: resolveMaxOutputTokens(this.capabilities, context),
        temperature: this.temperature,
        messages: [{ role: 'user', content: prompt }],
        user: context.intent_id,
      });

      return {
        content: response.choices[0]?.message?.content ?? '',
        tokens_input: response.usage?.prompt_tokens ?? 0,
        tokens_output: response.usage?.completion_tokens ?? 0,
        latency_ms: Math.round(performance.now() - start_time),
        model_version: response.model,
        from_cache: false,
      };
    } catch (error) {
      throw this.mapError(error);
    }
  }

  async isReady(): Promise<boolean> {
    return this.ready;
  }

  async shutdown(): Promise<void> {
    this.ready = false;
  }

  private mapError(error: unknown): AdapterError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new AdapterError('TIMEOUT', error.message, true);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new AdapterError('NETWORK_ERROR', error.message, true);
    }

    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      const message = error.message;

      if (status === 429) {
        return new AdapterError('RATE_LIMITED', message, true, { status });
      }
      if (status === 408) {
        return new AdapterError('TIMEOUT', message, true, { status });
      }
      if (status === 400) {
        if (message.includes('context') || message.includes('maximum')) {
          return new AdapterError('CONTEXT_TOO_LONG', message, false, { status });
        }
        return new AdapterError('INVALID_REQUEST', message, false, { status });
      }
      if (status !== undefined && status >= 500) {
        return new AdapterError('MODEL_ERROR', message, true, { status });
      }
      return new AdapterError('ADAPTER_ERROR', message, false, { status });
    }

    if (error instanceof Error) {
      return new AdapterError('ADAPTER_ERROR', error.message, false);
    }
    return new AdapterError('ADAPTER_ERROR', String(error), false);
  }
}

export function getOpenAICapabilities(model: OpenAIModel): ModelCapabilities {
  return MODEL_CAPABILITIES[model];
}
