/**
 * iacgen
 * ======
 *
 * Retrieval-augmented Terraform generation with a bounded
 * validate-and-repair loop.
 *
 * A request is matched against a knowledge base of example snippets, a
 * model drafts a configuration from the request plus the retrieved
 * context, and a validator (the Terraform CLI, or structural and
 * heuristic checks) decides whether to accept it or to ask the model for
 * a corrected draft carrying the diagnostics.
 *
 * @packageDocumentation
 */

export * from './adapters/index.js';
export * from './config/index.js';
export * from './kb/index.js';
export * from './rag/index.js';
export * from './session/index.js';
export * from './validation/index.js';

export { canonicalHash, canonicalize, deriveId, sha256Hex } from './utils/canonical.js';
export { extractCodeBlock } from './utils/fences.js';
export type { LogLevel, LogSink, Logger } from './utils/log.js';
export { LOG_LEVELS, createLogger, isLogLevel, silentLogger } from './utils/log.js';
