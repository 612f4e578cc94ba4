/**
 * Model Adapter Interface
 * =======================
 *
 * The boundary between the generation loop and language-model backends.
 * A session only ever talks to a model through `ModelAdapter.transform`:
 * one prompt in, one complete text response out.
 *
 * - All methods return Promises (async boundary)
 * - Context carries the identifiers needed for audit trails
 * - No provider-specific types leak through the interface
 */

// =============================================================================
// Context Types
// =============================================================================

/**
 * Why the model is being called.
 * `draft` is a first attempt, `repair` a retry carrying diagnostics.
 */
export type TransformMode = 'draft' | 'repair';

/**
 * Context provided to the model for a transform operation.
 */
export interface TransformContext {
  /**
   * Identifier of the generation request.
   */
  intent_id: string;

  /**
   * Identifier of this call, `<session id>_a<attempt>`.
   */
  run_id: string;

  mode: TransformMode;

  /**
   * User constraints forwarded with the request.
   * ORDERING: Sorted lexicographically.
   */
  constraints: readonly string[];

  metadata: Readonly<Record<string, unknown>>;

  /**
   * Upper bound on completion length. Adapters clamp it to the
   * model's own `max_output_tokens`.
   */
  max_output_tokens?: number;
}

// =============================================================================
// Result Types
// =============================================================================

export interface TransformResult {
  /**
   * Raw completion text.
   */
  content: string;

  tokens_input: number;

  tokens_output: number;

  latency_ms: number;

  /**
   * Model version reported by the provider.
   */
  model_version: string;

  /**
   * Whether the response was scripted or replayed rather than live.
   */
  from_cache: boolean;
}

// =============================================================================
// Capability Types
// =============================================================================

export interface ModelCapabilities {
  max_context_tokens: number;
  max_output_tokens: number;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error codes for adapter failures.
 */
export type AdapterErrorCode =
  | 'RATE_LIMITED'       // Provider rate limit or quota exceeded
  | 'CONTEXT_TOO_LONG'   // Input exceeds context window
  | 'INVALID_REQUEST'    // Malformed request
  | 'MODEL_ERROR'        // Provider returned a server error
  | 'NETWORK_ERROR'      // Network failure
  | 'TIMEOUT'            // Request timed out
  | 'REPLAY_MISS'        // No scripted response available
  | 'ADAPTER_ERROR';     // Anything else

/**
 * Structured error from adapter operations.
 */
export class AdapterError extends Error {
  constructor(
    public readonly code: AdapterErrorCode,
    message: string,
    public readonly retryable: boolean = false,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AdapterError';
  }
}

/**
 * Normalize anything thrown by an adapter into an `AdapterError`.
 */
export function toAdapterError(error: unknown): AdapterError {
  if (error instanceof AdapterError) return error;
  if (error instanceof Error) return new AdapterError('ADAPTER_ERROR', error.message, false);
  return new AdapterError('ADAPTER_ERROR', String(error), false);
}

// =============================================================================
// Model Adapter Interface
// =============================================================================

/**
 * Interface for model adapters.
 *
 * Implementations:
 * - MockModelAdapter: scripted responses for tests and dry runs
 * - ResilientAdapter: circuit breaker + retry around another adapter
 * - ClaudeAdapter: Anthropic Messages API
 * - OpenAIAdapter: OpenAI Chat Completions API
 */
export interface ModelAdapter {
  /**
   * Format: `{type}_{hash8}` (e.g., `mock_a1b2c3d4`)
   */
  readonly adapter_id: string;

  /**
   * Examples: "mock", "claude-3-5-sonnet-20241022", "gpt-4o-mini"
   */
  readonly model_id: string;

  readonly capabilities: ModelCapabilities;

  /**
   * Send one prompt and wait for the complete response.
   *
   * @throws AdapterError on failure
   */
  transform(prompt: string, context: TransformContext): Promise<TransformResult>;

  isReady(): Promise<boolean>;

  shutdown(): Promise<void>;
}

/**
 * Resolve the completion budget for a call.
 */
export function resolveMaxOutputTokens(
  capabilities: ModelCapabilities,
  context: TransformContext
): number {
  const requested = context.max_output_tokens;
  if (requested === undefined || requested <= 0) {
    return capabilities.max_output_tokens;
  }
  return Math.min(requested, capabilities.max_output_tokens);
}

// =============================================================================
// Recording Types
// =============================================================================

/**
 * A recorded interaction between a session and a model.
 */
export interface RecordedInteraction {
  sequence: number;

  /**
   * SHA-256 of the prompt, used for replay lookup.
   */
  prompt_hash: string;

  prompt: string;

  context: TransformContext;

  result: TransformResult;

  /**
   * ISO 8601 timestamp.
   */
  recorded_at: string;
}

/**
 * A complete recording.
 */
export interface RecordingSession {
  format_version: '1.0';
  started_at: string;
  ended_at: string;
  model_id: string;

  /**
   * ORDERING: By sequence number ascending.
   */
  interactions: RecordedInteraction[];

  stats: {
    total_interactions: number;
    total_tokens_input: number;
    total_tokens_output: number;
    total_latency_ms: number;
  };
}
