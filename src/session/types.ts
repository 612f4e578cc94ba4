/**
 * Session Types
 * =============
 *
 * Types for the generate / validate / retry loop that turns one request
 * into Terraform configuration.
 */

import type { AdapterErrorCode } from '../adapters/model.js';
import type { RetrievalResult } from '../kb/types.js';
import type { RetrievalStrategyName } from '../rag/strategies.js';
import type { Diagnostic, ValidationOutcome } from '../validation/types.js';

// =============================================================================
// Configuration
// =============================================================================

export interface SessionConfig {
  /**
   * Re-generation attempts after the first. A session makes at most
   * `maxRetries + 1` model calls.
   */
  maxRetries: number;

  /**
   * Retrieval breadth.
   */
  topK: number;

  retrievalStrategy: RetrievalStrategyName;

  /**
   * Accept a `toolUnavailable` outcome as success when the structural
   * checks passed. Off unless explicitly enabled.
   */
  bestEffortAcceptance: boolean;

  /**
   * Characters of snippet content a prompt may carry.
   */
  contextCharBudget: number;

  /**
   * Bound on a single model call.
   */
  modelTimeoutMs: number;

  /**
   * Cap on completion length passed to the model.
   */
  maxOutputTokens?: number;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  maxRetries: 2,
  topK: 3,
  retrievalStrategy: 'keyword',
  bestEffortAcceptance: false,
  contextCharBudget: 6000,
  modelTimeoutMs: 120000,
};

// =============================================================================
// Request
// =============================================================================

export interface GenerationRequest {
  /**
   * Natural-language description of the infrastructure.
   */
  text: string;

  /**
   * Caller-supplied id. Derived from the text when omitted.
   */
  id?: string;

  /**
   * Extra requirements listed in the prompt, e.g. "use us-east-1".
   */
  constraints?: readonly string[];

  /**
   * Per-request overrides of the session configuration.
   */
  options?: Partial<SessionConfig>;
}

// =============================================================================
// Prompt Context
// =============================================================================

/**
 * Everything a prompt is rendered from. Rendering is a pure function of
 * this value and the character budget.
 */
export interface PromptContext {
  request: string;

  /**
   * ORDERING: Sorted lexicographically.
   */
  constraints: readonly string[];

  /**
   * ORDERING: Score descending (as retrieved).
   */
  snippets: RetrievalResult;

  /**
   * Findings from the previous attempt; empty on the first.
   */
  diagnostics: readonly Diagnostic[];

  /**
   * Candidate code from the previous attempt; absent on the first.
   */
  previousCode?: string;

  attemptNumber: number;

  maxAttempts: number;
}

// =============================================================================
// Attempts
// =============================================================================

export interface ModelUsage {
  model_version: string;
  tokens_input: number;
  tokens_output: number;
  latency_ms: number;
}

/**
 * One generate-then-validate cycle. Immutable once recorded.
 */
export interface GenerationAttempt {
  /**
   * 1-based.
   */
  readonly attemptNumber: number;

  readonly promptContext: PromptContext;

  /**
   * SHA-256 of the rendered prompt.
   */
  readonly promptHash: string;

  readonly candidateCode: string;

  readonly outcome: ValidationOutcome;

  readonly usage: ModelUsage;

  /**
   * ISO-8601 timestamp of the start of the Drafting step.
   */
  readonly startedAt: string;

  readonly durationMs: number;
}

// =============================================================================
// States and Results
// =============================================================================

export type SessionState = 'created' | 'drafting' | 'validating' | 'retrying' | 'succeeded' | 'exhausted' | 'aborted';

export type AbortReason = 'modelFailure' | 'cancelled';

export interface ModelFailureInfo {
  code: AdapterErrorCode;
  message: string;
  retryable: boolean;
}

export type SessionResult =
  | {
      kind: 'succeeded';
      code: string;
      attempt: GenerationAttempt;

      /**
       * Accepted without tool validation (`bestEffortAcceptance`).
       */
      bestEffort: boolean;
    }
  | {
      kind: 'exhausted';

      /**
       * The final attempt, with its candidate code and diagnostics.
       */
      lastAttempt: GenerationAttempt;
    }
  | {
      kind: 'aborted';
      reason: AbortReason;

      /**
       * Set when `reason` is `modelFailure`.
       */
      error?: ModelFailureInfo;

      /**
       * Most recent recorded attempt, if any.
       */
      lastAttempt?: GenerationAttempt;
    };

export type SessionResultKind = SessionResult['kind'];

/**
 * Snapshot of one state change, in the order they happened.
 */
export interface SessionTransition {
  from: SessionState;
  to: SessionState;
  attemptNumber: number;
}
