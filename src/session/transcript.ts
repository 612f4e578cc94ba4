/**
 * Session Transcripts
 * ===================
 *
 * JSON-serialisable record of a finished session: request, configuration,
 * retrieved context, every attempt and the result. Enough to audit a
 * session and to replay its model responses.
 */

import { MockModelAdapter } from '../adapters/mock.js';
import { canonicalHash } from '../utils/canonical.js';
import type { Diagnostic, ValidationOutcome } from '../validation/types.js';
import type { GenerationSession } from './session.js';
import type {
  AbortReason,
  ModelFailureInfo,
  ModelUsage,
  SessionConfig,
  SessionResultKind,
  SessionTransition,
} from './types.js';

export const TRANSCRIPT_VERSION = '1.0';

export interface TranscriptAttempt {
  attemptNumber: number;
  promptHash: string;

  /**
   * Diagnostics the prompt carried from the previous attempt.
   */
  diagnosticsIn: Diagnostic[];
  candidateCode: string;
  outcome: ValidationOutcome;
  usage: ModelUsage;
  startedAt: string;
  durationMs: number;
}

export interface TranscriptResult {
  kind: SessionResultKind | 'running';
  reason?: AbortReason;
  error?: ModelFailureInfo;

  /**
   * Attempt the result refers to, if any.
   */
  attemptNumber?: number;
  bestEffort?: boolean;
}

export interface SessionTranscript {
  transcript_version: string;
  session_id: string;
  request_id: string;
  request: { text: string; constraints: string[] };
  config: SessionConfig;
  retrieval: Array<{ id: string; score: number; rank: number }>;
  attempts: TranscriptAttempt[];
  transitions: SessionTransition[];
  result: TranscriptResult;
}

function describeResult(session: GenerationSession): TranscriptResult {
  const result = session.result;
  if (result === undefined) return { kind: 'running' };

  switch (result.kind) {
    case 'succeeded':
      return { kind: 'succeeded', attemptNumber: result.attempt.attemptNumber, bestEffort: result.bestEffort };
    case 'exhausted':
      return { kind: 'exhausted', attemptNumber: result.lastAttempt.attemptNumber };
    case 'aborted': {
      const out: TranscriptResult = { kind: 'aborted', reason: result.reason };
      if (result.error !== undefined) out.error = { ...result.error };
      if (result.lastAttempt !== undefined) out.attemptNumber = result.lastAttempt.attemptNumber;
      return out;
    }
  }
}

function copyDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return diagnostics.map((diagnostic) => ({ ...diagnostic }));
}

/**
 * Detached copy of a session's record; editing it leaves the session as is.
 */
export function toTranscript(session: GenerationSession): SessionTranscript {
  return {
    transcript_version: TRANSCRIPT_VERSION,
    session_id: session.id,
    request_id: session.requestId,
    request: {
      text: session.request.text,
      constraints: [...(session.request.constraints ?? [])].sort(),
    },
    config: { ...session.config },
    retrieval: (session.context ?? []).map((hit) => ({ id: hit.record.id, score: hit.score, rank: hit.rank })),
    attempts: session.attempts.map((attempt) => ({
      attemptNumber: attempt.attemptNumber,
      promptHash: attempt.promptHash,
      diagnosticsIn: copyDiagnostics(attempt.promptContext.diagnostics),
      candidateCode: attempt.candidateCode,
      outcome: { ...attempt.outcome, diagnostics: copyDiagnostics(attempt.outcome.diagnostics) },
      usage: { ...attempt.usage },
      startedAt: attempt.startedAt,
      durationMs: attempt.durationMs,
    })),
    transitions: session.stateHistory.map((transition) => ({ ...transition })),
    result: describeResult(session),
  };
}

/**
 * Canonical SHA-256 of a transcript.
 */
export function transcriptHash(transcript: SessionTranscript): string {
  return canonicalHash(transcript);
}

/**
 * Mock adapter answering each recorded prompt with the candidate code the
 * session received for it. Running a new session over the same knowledge
 * base and validator reproduces the recorded attempts.
 */
export function createReplayAdapter(transcript: SessionTranscript): MockModelAdapter {
  const adapter = new MockModelAdapter(new Map(), { model_id: 'replay' });
  for (const attempt of transcript.attempts) {
    adapter.addResponse(attempt.promptHash, {
      content: attempt.candidateCode,
      tokens_input: attempt.usage.tokens_input,
      tokens_output: attempt.usage.tokens_output,
    });
  }
  return adapter;
}
