/**
 * Mock Model Adapter
 * ==================
 *
 * Returns pre-configured responses for deterministic testing and dry runs.
 * Does not make any network calls.
 *
 * Usage:
 * ```typescript
 * const adapter = new MockModelAdapter();
 * adapter.enqueue({ content: 'resource "aws_s3_bucket" "logs" {}' });
 * adapter.enqueue({ error: new AdapterError('TIMEOUT', 'upstream timeout', true) });
 * ```
 */

import { createHash } from 'node:crypto';
import type {
  ModelAdapter,
  ModelCapabilities,
  TransformContext,
  TransformResult,
  RecordedInteraction,
  RecordingSession,
} from './model.js';
import { AdapterError } from './model.js';

// =============================================================================
// Mock Response Configuration
// =============================================================================

/**
 * Configuration for a mock response. Either `content` or `error` is used;
 * `error` wins when both are set.
 */
export interface MockResponse {
  content?: string;

  /**
   * Thrown instead of returning a result.
   */
  error?: AdapterError;

  /**
   * Simulated input tokens (default: estimate from prompt).
   */
  tokens_input?: number;

  /**
   * Simulated output tokens (default: estimate from content).
   */
  tokens_output?: number;

  /**
   * Simulated latency in ms; the call really waits this long (default: 0).
   */
  latency_ms?: number;
}

/**
 * What to do when no scripted response matches.
 */
export interface MockDefaultBehavior {
  type: 'error' | 'echo' | 'fixed';

  /**
   * Fixed response content (for type: 'fixed').
   */
  content?: string;
}

export interface MockModelAdapterOptions {
  /**
   * Model ID to report (default: 'mock').
   */
  model_id?: string;

  capabilities?: Partial<ModelCapabilities>;

  /**
   * How to handle unmatched prompts (default: 'error').
   */
  default_behavior?: MockDefaultBehavior;

  /**
   * Whether to record interactions (default: false).
   */
  record?: boolean;
}

// =============================================================================
// Mock Model Adapter Implementation
// =============================================================================

/**
 * Mock model adapter.
 *
 * Lookup order for each call:
 * 1. Exact prompt hash match
 * 2. Prompt substring match (in insertion order)
 * 3. Next queued response
 * 4. Default behavior (error, echo, or fixed response)
 */
export class MockModelAdapter implements ModelAdapter {
  readonly adapter_id: string;
  readonly model_id: string;
  readonly capabilities: ModelCapabilities;

  private readonly responses: Map<string, MockResponse>;
  private readonly substringMatches = new Map<string, MockResponse>();
  private readonly queue: MockResponse[] = [];
  private readonly defaultBehavior: MockDefaultBehavior;
  private readonly shouldRecord: boolean;
  private readonly recordedInteractions: RecordedInteraction[] = [];
  private readonly prompts: string[] = [];
  private readonly contexts: TransformContext[] = [];
  private sequence = 0;
  private ready = true;

  constructor(
    responses: Map<string, MockResponse> = new Map(),
    options: MockModelAdapterOptions = {}
  ) {
    this.responses = responses;
    this.model_id = options.model_id ?? 'mock';
    this.adapter_id = `mock_${hashString(this.model_id).slice(0, 8)}`;
    this.defaultBehavior = options.default_behavior ?? { type: 'error' };
    this.shouldRecord = options.record ?? false;

    this.capabilities = {
      max_context_tokens: options.capabilities?.max_context_tokens ?? 100000,
      max_output_tokens: options.capabilities?.max_output_tokens ?? 4096,
    };
  }

  /**
   * Add a response for a prompt (or its 64-char hex SHA-256).
   */
  addResponse(promptOrHash: string, response: MockResponse): void {
    const key = promptOrHash.length === 64 && /^[a-f0-9]+$/.test(promptOrHash)
      ? promptOrHash
      : hashString(promptOrHash);
    this.responses.set(key, response);
  }

  /**
   * Add a response that matches any prompt containing the substring.
   */
  addSubstringMatch(substring: string, response: MockResponse): void {
    this.substringMatches.set(substring, response);
  }

  /**
   * Queue responses consumed one per call, in order.
   */
  enqueue(...responses: MockResponse[]): void {
    this.queue.push(...responses);
  }

  clearResponses(): void {
    this.responses.clear();
    this.substringMatches.clear();
    this.queue.length = 0;
  }

  /**
   * Every prompt received, in call order.
   */
  getPrompts(): readonly string[] {
    return this.prompts;
  }

  /**
   * Every context received, in call order.
   */
  getContexts(): readonly TransformContext[] {
    return this.contexts;
  }

  getCallCount(): number {
    return this.prompts.length;
  }

  getRecordedInteractions(): readonly RecordedInteraction[] {
    return this.recordedInteractions;
  }

  exportRecording(): RecordingSession {
    const now = new Date().toISOString();
    const stats = this.recordedInteractions.reduce(
      (acc, i) => ({
        total_interactions: acc.total_interactions + 1,
        total_tokens_input: acc.total_tokens_input + i.result.tokens_input,
        total_tokens_output: acc.total_tokens_output + i.result.tokens_output,
        total_latency_ms: acc.total_latency_ms + i.result.latency_ms,
      }),
      { total_interactions: 0, total_tokens_input: 0, total_tokens_output: 0, total_latency_ms: 0 }
    );

    return {
      format_version: '1.0',
      started_at: this.recordedInteractions[0]?.recorded_at ?? now,
      ended_at: now,
      model_id: this.model_id,
      interactions: [...this.recordedInteractions],
      stats,
    };
  }

  async transform(prompt: string, context: TransformContext): Promise<TransformResult> {
    if (!this.ready) {
      throw new AdapterError('ADAPTER_ERROR', 'Adapter is not ready', false);
    }

    this.prompts.push(prompt);
    this.contexts.push(context);

    const promptHash = hashString(prompt);
    const response = this.resolve(prompt, promptHash);

    if (response.latency_ms !== undefined && response.latency_ms > 0) {
      await sleep(response.latency_ms);
    }

    if (response.error) {
      throw response.error;
    }

    const content = response.content ?? '';
    const result: TransformResult = {
      content,
      tokens_input: response.tokens_input ?? Math.ceil(prompt.length / 4),
      tokens_output: response.tokens_output ?? Math.ceil(content.length / 4),
      latency_ms: response.latency_ms ?? 0,
      model_version: `${this.model_id}-mock`,
      from_cache: true,
    };

    if (this.shouldRecord) {
      this.recordedInteractions.push({
        sequence: this.sequence++,
        prompt_hash: promptHash,
        prompt,
        context,
        result,
        recorded_at: new Date().toISOString(),
      });
    }

    return result;
  }

  async isReady(): Promise<boolean> {
    return this.ready;
  }

  async shutdown(): Promise<void> {
    this.ready = false;
  }

  /**
   * Reset the adapter to ready state (for testing).
   */
  reset(): void {
    this.ready = true;
    this.sequence = 0;
    this.recordedInteractions.length = 0;
    this.prompts.length = 0;
    this.contexts.length = 0;
  }

  private resolve(prompt: string, promptHash: string): MockResponse {
    const exact = this.responses.get(promptHash);
    if (exact) return exact;

    for (const [substring, resp] of this.substringMatches) {
      if (prompt.includes(substring)) return resp;
    }

    const queued = this.queue.shift();
    if (queued) return queued;

    switch (this.defaultBehavior.type) {
      case 'echo':
        return { content: prompt };
      case 'fixed':
        return { content: this.defaultBehavior.content ?? '' };
      case 'error':
      default:
        return {
          error: new AdapterError(
            'REPLAY_MISS',
            `No mock response for prompt hash: ${promptHash}`,
            false,
            { prompt_preview: prompt.slice(0, 100) }
          ),
        };
    }
  }
}

function hashString(s: string): string {
  return createHash('sha256').update(s, 'utf-8').digest('hex');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a mock adapter that echoes prompts back.
 */
export function createEchoAdapter(options?: Omit<MockModelAdapterOptions, 'default_behavior'>): MockModelAdapter {
  return new MockModelAdapter(new Map(), {
    ...options,
    default_behavior: { type: 'echo' },
  });
}

/**
 * Create a mock adapter that always returns the same content.
 */
export function createFixedAdapter(
  content: string,
  options?: Omit<MockModelAdapterOptions, 'default_behavior'>
): MockModelAdapter {
  return new MockModelAdapter(new Map(), {
    ...options,
    default_behavior: { type: 'fixed', content },
  });
}

/**
 * Create a mock adapter that answers from a previous recording.
 */
export function createAdapterFromRecording(
  session: RecordingSession,
  options?: MockModelAdapterOptions
): MockModelAdapter {
  const responses = new Map<string, MockResponse>();

  for (const interaction of session.interactions) {
    responses.set(interaction.prompt_hash, {
      content: interaction.result.content,
      tokens_input: interaction.result.tokens_input,
      tokens_output: interaction.result.tokens_output,
    });
  }

  return new MockModelAdapter(responses, {
    model_id: session.model_id,
    ...options,
  });
}
