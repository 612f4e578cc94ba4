/**
 * Batch Execution
 * ===============
 *
 * Runs independent sessions concurrently. Sessions share the read-only
 * knowledge base behind the retriever and nothing else.
 */

import { GenerationSession, type SessionDeps } from './session.js';
import type { GenerationRequest, SessionConfig } from './types.js';

export interface BatchOptions {
  /**
   * Sessions in flight at once.
   * @default 4
   */
  concurrency?: number;

  config?: Partial<SessionConfig>;

  /**
   * Cancels every session that has not finished.
   */
  signal?: AbortSignal;
}

export const DEFAULT_BATCH_CONCURRENCY = 4;

/**
 * Run one session per request. Results are in input order regardless of
 * completion order.
 */
export async function runSessions(
  requests: readonly GenerationRequest[],
  deps: SessionDeps,
  options: BatchOptions = {}
): Promise<GenerationSession[]> {
  const sessions = requests.map((request) => new GenerationSession(request, deps, options.config));
  const limit = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_BATCH_CONCURRENCY));

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < sessions.length) {
      const session = sessions[next++];
      if (session === undefined) return;
      await session.run(options.signal);
    }
  };

  const workers = Array.from({ length: Math.min(limit, sessions.length) }, () => worker());
  await Promise.all(workers);
  return sessions;
}
