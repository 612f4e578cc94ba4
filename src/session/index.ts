/**
 * Session Exports
 * ===============
 */

export type {
  SessionConfig,
  GenerationRequest,
  PromptContext,
  ModelUsage,
  GenerationAttempt,
  SessionState,
  AbortReason,
  ModelFailureInfo,
  SessionResult,
  SessionResultKind,
  SessionTransition,
} from './types.js';
export { DEFAULT_SESSION_CONFIG } from './types.js';

export type { SnippetExcerpt } from './prompt.js';
export { TRUNCATION_MARKER, formatDiagnostic, renderPrompt, selectSnippetContent } from './prompt.js';

export type { ContextSource, SessionDeps } from './session.js';
export { GenerationSession, generateSessionId, runSession } from './session.js';

export type { BatchOptions } from './batch.js';
export { DEFAULT_BATCH_CONCURRENCY, runSessions } from './batch.js';

export { ModelFailureError, generate } from './generate.js';

export type { SessionSummary, BatchSummary } from './summary.js';
export { summarizeBatch, summarizeSession } from './summary.js';

export type { SessionTranscript, TranscriptAttempt, TranscriptResult } from './transcript.js';
export { TRANSCRIPT_VERSION, createReplayAdapter, toTranscript, transcriptHash } from './transcript.js';
