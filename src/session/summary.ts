/**
 * Session Metrics
 * ===============
 */

import { errorCount } from '../validation/types.js';
import type { GenerationSession } from './session.js';
import type { SessionResultKind } from './types.js';

export interface SessionSummary {
  session_id: string;
  request_id: string;

  /**
   * Terminal state, or `running` before the session finished.
   */
  status: SessionResultKind | 'running';

  success: boolean;
  total_attempts: number;

  /**
   * Attempt number that succeeded; null when none did.
   */
  attempts_until_success: number | null;

  /**
   * Whether retrieval supplied at least one snippet.
   */
  used_retrieval: boolean;

  snippet_ids: string[];

  /**
   * Error diagnostics on the last attempt.
   */
  final_error_count: number;

  best_effort: boolean;
  total_tokens_input: number;
  total_tokens_output: number;
  total_duration_ms: number;
}

export function summarizeSession(session: GenerationSession): SessionSummary {
  const result = session.result;
  const attempts = session.attempts;
  const last = attempts[attempts.length - 1];
  const context = session.context ?? [];

  return {
    session_id: session.id,
    request_id: session.requestId,
    status: result?.kind ?? 'running',
    success: result?.kind === 'succeeded',
    total_attempts: attempts.length,
    attempts_until_success: result?.kind === 'succeeded' ? result.attempt.attemptNumber : null,
    used_retrieval: context.length > 0,
    snippet_ids: context.map((hit) => hit.record.id),
    final_error_count: last !== undefined ? errorCount(last.outcome.diagnostics) : 0,
    best_effort: result?.kind === 'succeeded' && result.bestEffort,
    total_tokens_input: attempts.reduce((sum, a) => sum + a.usage.tokens_input, 0),
    total_tokens_output: attempts.reduce((sum, a) => sum + a.usage.tokens_output, 0),
    total_duration_ms: attempts.reduce((sum, a) => sum + a.durationMs, 0),
  };
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  exhausted: number;
  aborted: number;
  success_rate: number;

  /**
   * Mean attempts over all finished sessions.
   */
  average_attempts: number;
}

export function summarizeBatch(summaries: readonly SessionSummary[]): BatchSummary {
  const count = (status: SessionSummary['status']): number =>
    summaries.filter((s) => s.status === status).length;
  const total = summaries.length;
  const succeeded = count('succeeded');

  return {
    total,
    succeeded,
    exhausted: count('exhausted'),
    aborted: count('aborted'),
    success_rate: total > 0 ? succeeded / total : 0,
    average_attempts: total > 0 ? summaries.reduce((sum, s) => sum + s.total_attempts, 0) / total : 0,
  };
}
