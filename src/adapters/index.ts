/**
 * Adapter Exports
 * ===============
 */

export type {
  ModelAdapter,
  ModelCapabilities,
  TransformContext,
  TransformMode,
  TransformResult,
  AdapterErrorCode,
  RecordedInteraction,
  RecordingSession,
} from './model.js';

export { AdapterError, toAdapterError, resolveMaxOutputTokens } from './model.js';

export type {
  MockResponse,
  MockDefaultBehavior,
  MockModelAdapterOptions,
} from './mock.js';

export {
  MockModelAdapter,
  createEchoAdapter,
  createFixedAdapter,
  createAdapterFromRecording,
} from './mock.js';

export type { ClaudeModel, ClaudeAdapterOptions } from './claude.js';
export { ClaudeAdapter, getClaudeCapabilities, isClaudeModel } from './claude.js';

export type { OpenAIModel, OpenAIAdapterOptions } from './openai.js';
export { OpenAIAdapter, getOpenAICapabilities, isOpenAIModel } from './openai.js';

export type {
  CircuitState,
  CircuitBreakerConfig,
  CircuitBreakerStats,
  RetryConfig,
  RetryStats,
} from './resilience.js';

export {
  CircuitBreaker,
  CircuitOpenError,
  RetryExecutor,
  RetryExhaustedError,
  ResilientExecutor,
  isRetryableError,
  withTimeout,
} from './resilience.js';

export type { AdapterProvider, AdapterFactoryOptions } from './factory.js';
export {
  ADAPTER_PROVIDERS,
  ResilientAdapter,
  createAdapter,
  getConfiguredProvider,
  getDefaultModel,
  isAdapterProvider,
} from './factory.js';
