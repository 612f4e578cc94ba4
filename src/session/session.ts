/**
 * Generation Session
 * ==================
 *
 * The retry controller for one request.
 *
 * States: created → drafting → validating → {succeeded | retrying |
 * exhausted | aborted}, with retrying → drafting looping.
 *
 * - Retrieval runs once, before the first draft; retries reuse it
 * - A model failure aborts immediately and consumes no retry budget
 * - Validation failures never throw; they drive the next attempt
 * - Cancellation is checked at every drafting/validating boundary
 * - Attempt history is append-only and deeply frozen
 * - Invalid configuration throws ConfigError from the constructor
 */

import { randomBytes } from 'node:crypto';
import type { ModelAdapter, TransformContext, TransformResult } from '../adapters/model.js';
import { toAdapterError, type AdapterError } from '../adapters/model.js';
import { withTimeout } from '../adapters/resilience.js';
import { ConfigError, collectSessionIssues } from '../config/config.js';
import type { RetrievalResult } from '../kb/types.js';
import type { RetrievalStrategyName } from '../rag/strategies.js';
import { sha256Hex } from '../utils/canonical.js';
import { extractCodeBlock } from '../utils/fences.js';
import { silentLogger, type Logger } from '../utils/log.js';
import type { Diagnostic, ValidationOutcome, Validator } from '../validation/types.js';
import { errorCount } from '../validation/types.js';
import { renderPrompt } from './prompt.js';
import {
  type GenerationAttempt,
  type GenerationRequest,
  type PromptContext,
  type SessionConfig,
  type SessionResult,
  type SessionState,
  type SessionTransition,
  DEFAULT_SESSION_CONFIG,
} from './types.js';

// =============================================================================
// Dependencies
// =============================================================================

/**
 * Anything that ranks snippets for a request, such as a Retriever.
 */
export interface ContextSource {
  query(text: string, topK: number, strategy: RetrievalStrategyName): RetrievalResult;
}

export interface SessionDeps {
  retriever: ContextSource;
  validator: Validator;
  adapter: ModelAdapter;
  logger?: Logger;

  /**
   * Milliseconds since the epoch. Defaults to `Date.now`.
   */
  clock?: () => number;
}

export function generateSessionId(): string {
  return `session_${randomBytes(4).toString('hex')}`;
}

type AbortedResult = Extract<SessionResult, { kind: 'aborted' }>;

/**
 * Frozen copy of an outcome, detached from the validator's objects.
 */
function freezeOutcome(outcome: ValidationOutcome): ValidationOutcome {
  return Object.freeze({
    ...outcome,
    diagnostics: freezeDiagnostics(outcome.diagnostics),
  });
}

function freezeDiagnostics(diagnostics: readonly Diagnostic[]): readonly Diagnostic[] {
  return Object.freeze(diagnostics.map((diagnostic) => Object.freeze({ ...diagnostic })));
}

function describeOutcome(outcome: ValidationOutcome): string {
  const errors = errorCount(outcome.diagnostics);
  const warnings = outcome.diagnostics.length - errors;
  const parts: string[] = [];
  if (errors > 0) parts.push(`${errors} error${errors === 1 ? '' : 's'}`);
  if (warnings > 0) parts.push(`${warnings} warning${warnings === 1 ? '' : 's'}`);
  return parts.length > 0 ? `${outcome.status} (${parts.join(', ')})` : outcome.status;
}

// =============================================================================
// Session
// =============================================================================

export class GenerationSession {
  readonly id: string;
  readonly requestId: string;
  readonly request: GenerationRequest;
  readonly config: SessionConfig;

  private readonly deps: SessionDeps;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly history: GenerationAttempt[] = [];
  private readonly transitions: SessionTransition[] = [];
  private currentState: SessionState = 'created';
  private retrieved: RetrievalResult | undefined;
  private finalResult: SessionResult | undefined;
  private running: Promise<SessionResult> | undefined;

  constructor(request: GenerationRequest, deps: SessionDeps, config: Partial<SessionConfig> = {}) {
    this.id = generateSessionId();
    this.requestId = request.id ?? `request_${sha256Hex(request.text).slice(0, 16)}`;
    this.request = request;
    this.config = { ...DEFAULT_SESSION_CONFIG, ...config, ...request.options };
    const issues = collectSessionIssues(this.config);
    if (issues.length > 0) {
      throw new ConfigError(issues);
    }
    this.deps = deps;
    this.logger = (deps.logger ?? silentLogger).child(`Session ${this.id}`);
    this.clock = deps.clock ?? Date.now;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Recorded attempts in order. Never rewritten, only appended.
   */
  get attempts(): readonly GenerationAttempt[] {
    return this.history;
  }

  get stateHistory(): readonly SessionTransition[] {
    return this.transitions;
  }

  /**
   * Context retrieved at session start; undefined before `run`.
   */
  get context(): RetrievalResult | undefined {
    return this.retrieved;
  }

  get result(): SessionResult | undefined {
    return this.finalResult;
  }

  get maxAttempts(): number {
    return Math.max(0, Math.floor(this.config.maxRetries)) + 1;
  }

  /**
   * Drive the loop to a terminal state. Calling again returns the same
   * result without re-running.
   */
  run(signal?: AbortSignal): Promise<SessionResult> {
    if (this.running === undefined) {
      this.running = this.execute(signal);
    }
    return this.running;
  }

  // ===========================================================================
  // Control Loop
  // ===========================================================================

  private async execute(signal: AbortSignal | undefined): Promise<SessionResult> {
    this.logger.info(`started (max ${this.maxAttempts} attempts, ${this.config.retrievalStrategy} retrieval)`);

    if (signal?.aborted) {
      return this.finish({ kind: 'aborted', reason: 'cancelled' }, 'aborted');
    }

    const snippets: RetrievalResult = Object.freeze(
      this.deps.retriever
        .query(this.request.text, this.config.topK, this.config.retrievalStrategy)
        .map((hit) => Object.freeze({ ...hit }))
    );
    this.retrieved = snippets;
    this.logger.debug(`retrieved ${snippets.length} snippet(s)`);

    const constraints = Object.freeze([...(this.request.constraints ?? [])].sort());
    let diagnostics: readonly Diagnostic[] = [];
    let previousCode: string | undefined;

    for (let attemptNumber = 1; attemptNumber <= this.maxAttempts; attemptNumber++) {
      if (signal?.aborted) {
        return this.cancelled();
      }
      this.transition('drafting', attemptNumber);

      const promptContext: PromptContext = {
        request: this.request.text,
        constraints,
        snippets,
        diagnostics,
        attemptNumber,
        maxAttempts: this.maxAttempts,
      };
      if (previousCode !== undefined) promptContext.previousCode = previousCode;

      const prompt = renderPrompt(promptContext, this.config.contextCharBudget);
      const startedAt = this.clock();

      let completion: TransformResult;
      try {
        completion = await withTimeout(
          this.deps.adapter.transform(prompt, this.transformContext(attemptNumber, constraints)),
          this.config.modelTimeoutMs
        );
      } catch (error) {
        return this.modelFailure(toAdapterError(error), attemptNumber);
      }

      const candidateCode = extractCodeBlock(completion.content);

      if (signal?.aborted) {
        return this.cancelled();
      }
      this.transition('validating', attemptNumber);

      const outcome = freezeOutcome(await this.validate(candidateCode));
      const attempt: GenerationAttempt = Object.freeze({
        attemptNumber,
        promptContext: Object.freeze(promptContext),
        promptHash: sha256Hex(prompt),
        candidateCode,
        outcome,
        usage: Object.freeze({
          model_version: completion.model_version,
          tokens_input: completion.tokens_input,
          tokens_output: completion.tokens_output,
          latency_ms: completion.latency_ms,
        }),
        startedAt: new Date(startedAt).toISOString(),
        durationMs: Math.max(0, this.clock() - startedAt),
      });
      this.history.push(attempt);
      this.logger.info(`attempt ${attemptNumber}: ${describeOutcome(outcome)}`);

      if (outcome.status === 'valid') {
        return this.finish({ kind: 'succeeded', code: candidateCode, attempt, bestEffort: false }, 'succeeded');
      }

      if (outcome.status === 'toolUnavailable' && outcome.structuralPassed && this.config.bestEffortAcceptance) {
        this.logger.warn('validation tool unavailable; accepting structurally valid candidate');
        return this.finish({ kind: 'succeeded', code: candidateCode, attempt, bestEffort: true }, 'succeeded');
      }

      if (attemptNumber === this.maxAttempts) {
        return this.finish({ kind: 'exhausted', lastAttempt: attempt }, 'exhausted');
      }

      this.transition('retrying', attemptNumber);
      diagnostics = outcome.diagnostics;
      previousCode = candidateCode;
    }

    // maxAttempts is at least 1, so the loop always returns.
    const last = this.history[this.history.length - 1];
    return last !== undefined
      ? this.finish({ kind: 'exhausted', lastAttempt: last }, 'exhausted')
      : this.cancelled();
  }

  private transformContext(attemptNumber: number, constraints: readonly string[]): TransformContext {
    const context: TransformContext = {
      intent_id: this.requestId,
      run_id: `${this.id}_a${attemptNumber}`,
      mode: attemptNumber === 1 ? 'draft' : 'repair',
      constraints,
      metadata: { attempt: attemptNumber, max_attempts: this.maxAttempts },
    };
    if (this.config.maxOutputTokens !== undefined) {
      context.max_output_tokens = this.config.maxOutputTokens;
    }
    return context;
  }

  /**
   * Validators report failures as outcomes; anything thrown anyway is
   * recorded as the tool being unavailable.
   */
  private async validate(candidateCode: string): Promise<ValidationOutcome> {
    try {
      return await this.deps.validator.validate(candidateCode);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`validator failed: ${message}`);
      return {
        status: 'toolUnavailable',
        diagnostics: [{ severity: 'error', message: `Validator failed: ${message}`, source: 'system' }],
        structuralPassed: false,
      };
    }
  }

  // ===========================================================================
  // Terminal States
  // ===========================================================================

  private modelFailure(error: AdapterError, attemptNumber: number): SessionResult {
    this.logger.error(`model call failed on attempt ${attemptNumber}: ${error.code} ${error.message}`);
    const result: AbortedResult = {
      kind: 'aborted',
      reason: 'modelFailure',
      error: { code: error.code, message: error.message, retryable: error.retryable },
    };
    const last = this.history[this.history.length - 1];
    if (last !== undefined) result.lastAttempt = last;
    return this.finish(result, 'aborted');
  }

  private cancelled(): SessionResult {
    this.logger.warn('cancelled');
    const result: AbortedResult = { kind: 'aborted', reason: 'cancelled' };
    const last = this.history[this.history.length - 1];
    if (last !== undefined) result.lastAttempt = last;
    return this.finish(result, 'aborted');
  }

  private finish(result: SessionResult, state: SessionState): SessionResult {
    this.transition(state, this.history.length);
    this.finalResult = result;
    this.logger.info(`finished: ${result.kind} after ${this.history.length} attempt(s)`);
    return result;
  }

  private transition(to: SessionState, attemptNumber: number): void {
    this.transitions.push({ from: this.currentState, to, attemptNumber });
    this.logger.debug(`${this.currentState} -> ${to}`);
    this.currentState = to;
  }
}

/**
 * Create a session and run it to completion.
 */
export async function runSession(
  request: GenerationRequest,
  deps: SessionDeps,
  config: Partial<SessionConfig> = {},
  signal?: AbortSignal
): Promise<GenerationSession> {
  const session = new GenerationSession(request, deps, config);
  await session.run(signal);
  return session;
}
