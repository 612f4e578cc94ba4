/**
 * Claude Adapter
 * ==============
 *
 * Live adapter for Anthropic's Messages API.
 *
 * Security:
 * - API key from options or environment only (never hardcoded)
 * - Keys never logged or included in errors
 */

import Anthropic from '@anthropic-ai/sdk';
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

export type ClaudeModel =
  | 'claude-sonnet-4-20250514'
  | 'claude-3-7-sonnet-20250219'
  | 'claude-3-5-sonnet-20241022'
  | 'claude-3-5-haiku-20241022';

const MODEL_CAPABILITIES: Record<ClaudeModel, ModelCapabilities> = {
  'claude-sonnet-4-20250514': { max_context_tokens: 200000, max_output_tokens: 8192 },
  'claude-3-7-sonnet-20250219': { max_context_tokens: 200000, max_output_tokens: 8192 },
  'claude-3-5-sonnet-20241022': { max_context_tokens: 200000, max_output_tokens: 8192 },
  'claude-3-5-haiku-20241022': { max_context_tokens: 200000, max_output_tokens: 8192 },
};

export function isClaudeModel(model: string): model is ClaudeModel {
  return Object.prototype.hasOwnProperty.call(MODEL_CAPABILITIES, model);
}

export interface ClaudeAdapterOptions {
  /**
   * If not provided, reads from ANTHROPIC_API_KEY.
   */
  api_key?: string;

  /**
   * @default 'claude-3-5-sonnet-20241022'
   */
  model?: ClaudeModel;

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

export class ClaudeAdapter implements ModelAdapter {
  readonly adapter_id: string;
  readonly model_id: string;
  readonly capabilities: ModelCapabilities;

  private readonly client: Anthropic;
  private readonly model: ClaudeModel;
  private readonly temperature: number;
  private ready = false;

  constructor(options: ClaudeAdapterOptions = {}) {
    const api_key = options.api_key ?? process.env['ANTHROPIC_API_KEY'];

    if (!api_key) {
      throw new AdapterError(
        'ADAPTER_ERROR',
        'ANTHROPIC_API_KEY not provided and not found in environment',
        false
      );
    }

    this.model = options.model ?? 'claude-3-5-sonnet-20241022';
    this.temperature = options.temperature ?? 0.1;

    const hash = createHash('sha256')
      .update(`claude:${this.model}:${Date.now()}`)
      .digest('hex')
      .slice(0, 8);
    this.adapter_id = `claude_${hash}`;
    this.model_id = this.model;
    this.capabilities = MODEL_CAPABILITIES[this.model];

    this.client = new Anthropic({
      apiKey: api_key,
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
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: resolveMaxOutputTokens(this.capabilities, context),
        temperature: this.temperature,
        messages: [{ role: 'user', content: prompt }],
        metadata: { user_id: context.intent_id },
      });

      const content = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('\n');

      return {
        content,
        tokens_input: response.usage.input_tokens,
        tokens_output: response.usage.output_tokens,
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
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new AdapterError('TIMEOUT', error.message, true);
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new AdapterError('NETWORK_ERROR', error.message, true);
    }

    if (error instanceof Anthropic.APIError) {
      const status = error.status;
      const message = error.message;

      if (status === 429) {
        return new AdapterError('RATE_LIMITED', message, true, { status });
      }
      if (status === 529 || (status !== undefined && status >= 500)) {
        return new AdapterError('MODEL_ERROR', message, true, { status });
      }
      if (status === 400) {
        if (message.includes('prompt is too long') || message.includes('context')) {
          return new AdapterError('CONTEXT_TOO_LONG', message, false, { status });
        }
        return new AdapterError('INVALID_REQUEST', message, false, { status });
      }
      return new AdapterError('ADAPTER_ERROR', message, false, { status });
    }

    if (error instanceof Error) {
      return new AdapterError('ADAPTER_ERROR', error.message, false);
    }
    return new AdapterError('ADAPTER_ERROR', String(error), false);
  }
}

export function getClaudeCapabilities(model: ClaudeModel): ModelCapabilities {
  return MODEL_CAPABILITIES[model];
}
