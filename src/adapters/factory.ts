/**
 * Adapter Factory
 * ================
 *
 * Provider selection for model adapters, with optional resilience wrapping.
 */

import {
  type ModelAdapter,
  type ModelCapabilities,
  type TransformContext,
  type TransformResult,
  AdapterError,
} from './model.js';
import { createEchoAdapter } from './mock.js';
import { ClaudeAdapter, isClaudeModel, type ClaudeAdapterOptions } from './claude.js';
import { OpenAIAdapter, isOpenAIModel, type OpenAIAdapterOptions } from './openai.js';
import {
  ResilientExecutor,
  CircuitOpenError,
  RetryExhaustedError,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  type RetryConfig,
  type RetryStats,
} from './resilience.js';

// =============================================================================
// Types
// =============================================================================

export type AdapterProvider = 'anthropic' | 'openai' | 'mock';

export const ADAPTER_PROVIDERS: readonly AdapterProvider[] = ['anthropic', 'openai', 'mock'];

export function isAdapterProvider(value: string): value is AdapterProvider {
  return ADAPTER_PROVIDERS.some((entry) => entry === value);
}

export interface AdapterFactoryOptions {
  provider: AdapterProvider;

  /**
   * Provider-specific model name. Uses the provider default when omitted.
   */
  model?: string;

  temperature?: number;

  timeout_ms?: number;

  /**
   * SDK-level retries for transient errors.
   */
  max_retries?: number;

  /**
   * Wrap the adapter in a circuit breaker + retry executor.
   * @default false
   */
  enable_resilience?: boolean;

  circuit_config?: Partial<CircuitBreakerConfig>;

  retry_config?: Partial<RetryConfig>;
}

// =============================================================================
// Factory Implementation
// =============================================================================

/**
 * Create a model adapter based on options.
 *
 * @throws AdapterError if the model is unknown for the provider or the
 *   provider's API key is missing
 */
export function createAdapter(options: AdapterFactoryOptions): ModelAdapter {
  const adapter = createBaseAdapter(options);
  if (!options.enable_resilience) {
    return adapter;
  }
  return new ResilientAdapter(adapter, options.circuit_config, options.retry_config);
}

function createBaseAdapter(options: AdapterFactoryOptions): ModelAdapter {
  const { provider, model, temperature, timeout_ms, max_retries } = options;

  switch (provider) {
    case 'anthropic': {
      const claudeOpts: ClaudeAdapterOptions = {};
      if (model !== undefined) {
        if (!isClaudeModel(model)) {
          throw new AdapterError('INVALID_REQUEST', `Unknown Anthropic model: ${model}`, false);
        }
        claudeOpts.model = model;
      }
      if (temperature !== undefined) claudeOpts.temperature = temperature;
      if (timeout_ms !== undefined) claudeOpts.timeout_ms = timeout_ms;
      if (max_retries !== undefined) claudeOpts.max_retries = max_retries;
      return new ClaudeAdapter(claudeOpts);
    }

    case 'openai': {
      const openaiOpts: OpenAIAdapterOptions = {};
      if (model !== undefined) {
        if (!isOpenAIModel(model)) {
          throw new AdapterError('INVALID_REQUEST', `Unknown OpenAI model: ${model}`, false);
        }
        openaiOpts.model = model;
      }
      if (temperature !== undefined) openaiOpts.temperature = temperature;
      if (timeout_ms !== undefined) openaiOpts.timeout_ms = timeout_ms;
      if (max_retries !== undefined) openaiOpts.max_retries = max_retries;
      return new OpenAIAdapter(openaiOpts);
    }

    case 'mock':
      return createEchoAdapter(model !== undefined ? { model_id: model } : {});

    default:
      throw new AdapterError('INVALID_REQUEST', `Unknown provider: ${String(provider)}`, false);
  }
}

/**
 * Get provider from environment.
 * Returns null if no provider key is configured.
 */
export function getConfiguredProvider(): AdapterProvider | null {
  if (process.env['ANTHROPIC_API_KEY']) return 'anthropic';
  if (process.env['OPENAI_API_KEY']) return 'openai';
  return null;
}

export function getDefaultModel(provider: AdapterProvider): string {
  switch (provider) {
    case 'anthropic':
      return 'claude-3-5-sonnet-20241022';
    case 'openai':
      return 'gpt-4o-mini';
    case 'mock':
      return 'mock';
  }
}

// =============================================================================
// Resilient Adapter
// =============================================================================

/**
 * Adapter wrapper with circuit breaker and retry/backoff.
 * Whatever still fails after the retries surfaces as a single AdapterError.
 */
export class ResilientAdapter implements ModelAdapter {
  readonly adapter_id: string;
  readonly model_id: string;
  readonly capabilities: ModelCapabilities;

  private readonly executor: ResilientExecutor;

  constructor(
    private readonly inner: ModelAdapter,
    circuitConfig?: Partial<CircuitBreakerConfig>,
    retryConfig?: Partial<RetryConfig>
  ) {
    this.adapter_id = `resilient_${inner.adapter_id}`;
    this.model_id = inner.model_id;
    this.capabilities = inner.capabilities;
    this.executor = new ResilientExecutor(circuitConfig, retryConfig);
  }

  async transform(prompt: string, context: TransformContext): Promise<TransformResult> {
    try {
      return await this.executor.execute(() => this.inner.transform(prompt, context));
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        const details: Record<string, unknown> = {};
        if (error.recoveryAt !== undefined) details['recovery_at'] = error.recoveryAt;
        throw new AdapterError('RATE_LIMITED', `Circuit breaker open: ${error.message}`, true, details);
      }
      if (error instanceof RetryExhaustedError) {
        const last = error.lastError;
        if (last instanceof AdapterError) {
          throw new AdapterError(last.code, `Retry exhausted: ${last.message}`, false, last.details);
        }
        throw new AdapterError('NETWORK_ERROR', `Retry exhausted: ${error.message}`, false);
      }
      throw error;
    }
  }

  async isReady(): Promise<boolean> {
    if (this.executor.getStats().circuit.state === 'open') {
      return false;
    }
    return this.inner.isReady();
  }

  async shutdown(): Promise<void> {
    return this.inner.shutdown();
  }

  getResilienceStats(): { circuit: CircuitBreakerStats; retry: RetryStats } {
    return this.executor.getStats();
  }

  resetResilience(): void {
    this.executor.reset();
  }
}
