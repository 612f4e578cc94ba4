/**
 * One-Shot Generation
 * ===================
 */

import type { AdapterErrorCode } from '../adapters/model.js';
import { GenerationSession, type SessionDeps } from './session.js';
import type { GenerationRequest, SessionConfig, SessionResult } from './types.js';

/**
 * The model could not produce a completion (transport, quota, timeout).
 */
export class ModelFailureError extends Error {
  readonly code: AdapterErrorCode;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: AdapterErrorCode,
    retryable: boolean,
    public readonly sessionId: string
  ) {
    super(message);
    this.name = 'ModelFailureError';
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * Run one session and return its result.
 *
 * @throws ModelFailureError when the session aborted because the model
 *   call failed; validation failures are returned, not thrown
 */
export async function generate(
  request: GenerationRequest | string,
  deps: SessionDeps,
  config: Partial<SessionConfig> = {},
  signal?: AbortSignal
): Promise<SessionResult> {
  const session = new GenerationSession(typeof request === 'string' ? { text: request } : request, deps, config);
  const result = await session.run(signal);

  if (result.kind === 'aborted' && result.reason === 'modelFailure') {
    const error = result.error;
    throw new ModelFailureError(
      error?.message ?? 'Model call failed',
      error?.code ?? 'ADAPTER_ERROR',
      error?.retryable ?? false,
      session.id
    );
  }
  return result;
}
