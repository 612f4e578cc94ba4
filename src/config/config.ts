/**
 * Configuration
 * =============
 *
 * Resolution order, later wins:
 *   1. DEFAULT_CONFIG
 *   2. JSON file (explicit path, or iacgen.config.json in the working dir)
 *   3. IAC_* environment variables
 *   4. Explicit overrides (command-line flags)
 *
 * Every problem found on the way is collected; loading fails once with a
 * ConfigError listing all of them.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { ADAPTER_PROVIDERS, isAdapterProvider, type AdapterProvider } from '../adapters/factory.js';
import { RETRIEVAL_STRATEGIES, isRetrievalStrategyName } from '../rag/strategies.js';
import { DEFAULT_SESSION_CONFIG, type SessionConfig } from '../session/types.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../utils/log.js';
import { VALIDATION_MODES, isValidationMode } from '../validation/types.js';
import { DEFAULT_VALIDATOR_CONFIG, type ValidatorConfig } from '../validation/validator.js';

// =============================================================================
// Types
// =============================================================================

export interface ModelConfig {
  provider: AdapterProvider;

  /**
   * Provider default when omitted.
   */
  model?: string;

  temperature?: number;

  /**
   * Cap on completion length.
   */
  max_output_tokens?: number;

  /**
   * SDK request timeout.
   */
  timeout_ms: number;

  /**
   * SDK-level transport retries. Never consume the session's retry budget.
   */
  max_retries: number;

  enable_resilience: boolean;
}

export interface KnowledgeBaseConfig {
  path: string;
}

export interface IacGenConfig {
  model: ModelConfig;
  session: SessionConfig;
  validation: ValidatorConfig;
  knowledge_base: KnowledgeBaseConfig;
  log_level: LogLevel;
}

export interface ConfigOverrides {
  model?: Partial<ModelConfig>;
  session?: Partial<SessionConfig>;
  validation?: Partial<ValidatorConfig>;
  knowledge_base?: Partial<KnowledgeBaseConfig>;
  log_level?: LogLevel;
}

export const DEFAULT_CONFIG_FILE = 'iacgen.config.json';

export const DEFAULT_CONFIG: IacGenConfig = {
  model: {
    provider: 'anthropic',
    timeout_ms: 120000,
    max_retries: 2,
    enable_resilience: false,
  },
  session: { ...DEFAULT_SESSION_CONFIG },
  validation: { ...DEFAULT_VALIDATOR_CONFIG },
  knowledge_base: { path: 'rag_kb.jsonl' },
  log_level: 'info',
};

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// =============================================================================
// Merging
// =============================================================================

export function mergeConfig(base: IacGenConfig, overrides: ConfigOverrides): IacGenConfig {
  return {
    model: { ...base.model, ...overrides.model },
    session: { ...base.session, ...overrides.session },
    validation: { ...base.validation, ...overrides.validation },
    knowledge_base: { ...base.knowledge_base, ...overrides.knowledge_base },
    log_level: overrides.log_level ?? base.log_level,
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed view over one JSON object. Reads record an issue on a type
 * mismatch and return undefined.
 */
class SectionReader {
  private readonly seen = new Set<string>();

  constructor(
    private readonly raw: Record<string, unknown>,
    private readonly prefix: string,
    private readonly issues: string[]
  ) {}

  string(key: string): string | undefined {
    const value = this.take(key);
    if (value === undefined) return undefined;
    if (typeof value === 'string') return value;
    this.issues.push(`${this.prefix}${key} must be a string`);
    return undefined;
  }

  number(key: string): number | undefined {
    const value = this.take(key);
    if (value === undefined) return undefined;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    this.issues.push(`${this.prefix}${key} must be a number`);
    return undefined;
  }

  boolean(key: string): boolean | undefined {
    const value = this.take(key);
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    this.issues.push(`${this.prefix}${key} must be a boolean`);
    return undefined;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[], guard: (value: string) => value is T): T | undefined {
    const value = this.string(key);
    if (value === undefined) return undefined;
    if (guard(value)) return value;
    this.issues.push(`${this.prefix}${key} must be one of ${allowed.join(', ')} (got "${value}")`);
    return undefined;
  }

  section(key: string): SectionReader | undefined {
    const value = this.take(key);
    if (value === undefined) return undefined;
    if (isObject(value)) return new SectionReader(value, `${this.prefix}${key}.`, this.issues);
    this.issues.push(`${this.prefix}${key} must be an object`);
    return undefined;
  }

  /**
   * Report keys nothing asked for.
   */
  finish(): void {
    for (const key of Object.keys(this.raw).sort()) {
      if (!this.seen.has(key)) this.issues.push(`Unknown key: ${this.prefix}${key}`);
    }
  }

  private take(key: string): unknown {
    this.seen.add(key);
    return this.raw[key];
  }
}

/**
 * Overrides described by a parsed config file.
 */
export function overridesFromJson(raw: unknown, issues: string[]): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (!isObject(raw)) {
    issues.push('Config file must contain a JSON object');
    return overrides;
  }
  const root = new SectionReader(raw, '', issues);

  const modelSection = root.section('model');
  if (modelSection) {
    const model: Partial<ModelConfig> = {};
    const provider = modelSection.oneOf('provider', ADAPTER_PROVIDERS, isAdapterProvider);
    if (provider !== undefined) model.provider = provider;
    const name = modelSection.string('model');
    if (name !== undefined) model.model = name;
    const temperature = modelSection.number('temperature');
    if (temperature !== undefined) model.temperature = temperature;
    const maxOutput = modelSection.number('max_output_tokens');
    if (maxOutput !== undefined) model.max_output_tokens = maxOutput;
    const timeout = modelSection.number('timeout_ms');
    if (timeout !== undefined) model.timeout_ms = timeout;
    const retries = modelSection.number('max_retries');
    if (retries !== undefined) model.max_retries = retries;
    const resilience = modelSection.boolean('enable_resilience');
    if (resilience !== undefined) model.enable_resilience = resilience;
    modelSection.finish();
    overrides.model = model;
  }

  const sessionSection = root.section('session');
  if (sessionSection) {
    const session: Partial<SessionConfig> = {};
    const maxRetries = sessionSection.number('maxRetries');
    if (maxRetries !== undefined) session.maxRetries = maxRetries;
    const topK = sessionSection.number('topK');
    if (topK !== undefined) session.topK = topK;
    const strategy = sessionSection.oneOf('retrievalStrategy', RETRIEVAL_STRATEGIES, isRetrievalStrategyName);
    if (strategy !== undefined) session.retrievalStrategy = strategy;
    const bestEffort = sessionSection.boolean('bestEffortAcceptance');
    if (bestEffort !== undefined) session.bestEffortAcceptance = bestEffort;
    const budget = sessionSection.number('contextCharBudget');
    if (budget !== undefined) session.contextCharBudget = budget;
    const modelTimeout = sessionSection.number('modelTimeoutMs');
    if (modelTimeout !== undefined) session.modelTimeoutMs = modelTimeout;
    sessionSection.finish();
    overrides.session = session;
  }

  const validationSection = root.section('validation');
  if (validationSection) {
    const validation: Partial<ValidatorConfig> = {};
    const mode = validationSection.oneOf('mode', VALIDATION_MODES, isValidationMode);
    if (mode !== undefined) validation.mode = mode;
    const terraformPath = validationSection.string('terraformPath');
    if (terraformPath !== undefined) validation.terraformPath = terraformPath;
    const timeoutMs = validationSection.number('timeoutMs');
    if (timeoutMs !== undefined) validation.timeoutMs = timeoutMs;
    validationSection.finish();
    overrides.validation = validation;
  }

  const kbSection = root.section('knowledge_base');
  if (kbSection) {
    const path = kbSection.string('path');
    if (path !== undefined) overrides.knowledge_base = { path };
    kbSection.finish();
  }

  const logLevel = root.oneOf('log_level', LOG_LEVELS, isLogLevel);
  if (logLevel !== undefined) overrides.log_level = logLevel;

  root.finish();
  return overrides;
}

// =============================================================================
// Environment
// =============================================================================

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envInteger(env: NodeJS.ProcessEnv, name: string, issues: string[]): number | undefined {
  const value = envValue(env, name);
  if (value === undefined) return undefined;
  if (/^-?\d+$/.test(value)) return Number(value);
  issues.push(`${name} must be an integer (got "${value}")`);
  return undefined;
}

function envBoolean(env: NodeJS.ProcessEnv, name: string, issues: string[]): boolean | undefined {
  const value = envValue(env, name)?.toLowerCase();
  if (value === undefined) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  issues.push(`${name} must be a boolean (got "${value}")`);
  return undefined;
}

function envOneOf<T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  allowed: readonly T[],
  guard: (value: string) => value is T,
  issues: string[]
): T | undefined {
  const value = envValue(env, name)?.toLowerCase();
  if (value === undefined) return undefined;
  if (guard(value)) return value;
  issues.push(`${name} must be one of ${allowed.join(', ')} (got "${value}")`);
  return undefined;
}

/**
 * Overrides described by IAC_* environment variables. Empty values are
 * ignored.
 */
export function overridesFromEnv(env: NodeJS.ProcessEnv, issues: string[]): ConfigOverrides {
  const model: Partial<ModelConfig> = {};
  const session: Partial<SessionConfig> = {};
  const validation: Partial<ValidatorConfig> = {};
  const overrides: ConfigOverrides = { model, session, validation };

  const modelName = envValue(env, 'IAC_MODEL');
  if (modelName !== undefined) model.model = modelName;
  const provider = envOneOf(env, 'IAC_PROVIDER', ADAPTER_PROVIDERS, isAdapterProvider, issues);
  if (provider !== undefined) model.provider = provider;
  const maxTokens = envInteger(env, 'IAC_MAX_TOKENS', issues);
  if (maxTokens !== undefined) model.max_output_tokens = maxTokens;

  const maxRetries = envInteger(env, 'IAC_MAX_RETRIES', issues);
  if (maxRetries !== undefined) session.maxRetries = maxRetries;
  const topK = envInteger(env, 'IAC_TOP_K', issues);
  if (topK !== undefined) session.topK = topK;
  const strategy = envOneOf(env, 'IAC_RETRIEVAL_STRATEGY', RETRIEVAL_STRATEGIES, isRetrievalStrategyName, issues);
  if (strategy !== undefined) session.retrievalStrategy = strategy;
  const bestEffort = envBoolean(env, 'IAC_BEST_EFFORT', issues);
  if (bestEffort !== undefined) session.bestEffortAcceptance = bestEffort;

  const mode = envOneOf(env, 'IAC_VALIDATION_MODE', VALIDATION_MODES, isValidationMode, issues);
  if (mode !== undefined) validation.mode = mode;

  const kbFile = envValue(env, 'IAC_KB_FILE');
  if (kbFile !== undefined) overrides.knowledge_base = { path: kbFile };
  const logLevel = envOneOf(env, 'IAC_LOG_LEVEL', LOG_LEVELS, isLogLevel, issues);
  if (logLevel !== undefined) overrides.log_level = logLevel;

  return overrides;
}

// =============================================================================
// Validation
// =============================================================================

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Issues with the session part of a configuration. Sessions run this on
 * their merged configuration, so it also guards library callers.
 */
export function collectSessionIssues(session: SessionConfig): string[] {
  const issues: string[] = [];
  if (!isNonNegativeInteger(session.maxRetries)) issues.push('session.maxRetries must be a non-negative integer');
  if (!(Number.isInteger(session.topK) && session.topK >= 1)) issues.push('session.topK must be an integer >= 1');
  if (!isRetrievalStrategyName(session.retrievalStrategy)) {
    issues.push(`session.retrievalStrategy must be one of ${RETRIEVAL_STRATEGIES.join(', ')}`);
  }
  if (!isPositiveInteger(session.contextCharBudget)) {
    issues.push('session.contextCharBudget must be a positive integer');
  }
  if (!(session.modelTimeoutMs > 0)) issues.push('session.modelTimeoutMs must be positive');
  if (session.maxOutputTokens !== undefined && !isPositiveInteger(session.maxOutputTokens)) {
    issues.push('session.maxOutputTokens must be a positive integer');
  }
  return issues;
}

/**
 * Every problem with a fully merged configuration; empty when valid.
 */
export function collectConfigIssues(config: IacGenConfig): string[] {
  const issues: string[] = [];
  const { model, session, validation } = config;

  if (!isAdapterProvider(model.provider)) {
    issues.push(`model.provider must be one of ${ADAPTER_PROVIDERS.join(', ')}`);
  }
  if (model.model !== undefined && model.model.trim() === '') {
    issues.push('model.model must not be empty');
  }
  if (model.temperature !== undefined && !(model.temperature >= 0 && model.temperature <= 2)) {
    issues.push('model.temperature must be between 0 and 2');
  }
  if (model.max_output_tokens !== undefined && !isPositiveInteger(model.max_output_tokens)) {
    issues.push('model.max_output_tokens must be a positive integer');
  }
  if (!(model.timeout_ms > 0)) issues.push('model.timeout_ms must be positive');
  if (!isNonNegativeInteger(model.max_retries)) issues.push('model.max_retries must be a non-negative integer');

  issues.push(...collectSessionIssues(session));

  if (!isValidationMode(validation.mode)) {
    issues.push(`validation.mode must be one of ${VALIDATION_MODES.join(', ')}`);
  }
  if (validation.terraformPath.trim() === '') issues.push('validation.terraformPath must not be empty');
  if (!(validation.timeoutMs > 0)) issues.push('validation.timeoutMs must be positive');

  if (config.knowledge_base.path.trim() === '') issues.push('knowledge_base.path must not be empty');
  if (!isLogLevel(config.log_level)) issues.push(`log_level must be one of ${LOG_LEVELS.join(', ')}`);

  return issues;
}

/**
 * @throws ConfigError listing every problem
 */
export function validateConfig(config: IacGenConfig): IacGenConfig {
  const issues = collectConfigIssues(config);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return config;
}

// =============================================================================
// Loading
// =============================================================================

export interface LoadConfigOptions {
  /**
   * Explicit config file; must exist.
   */
  path?: string;

  /**
   * Directory searched for iacgen.config.json. Defaults to process.cwd().
   */
  cwd?: string;

  /**
   * Defaults to process.env.
   */
  env?: NodeJS.ProcessEnv;

  overrides?: ConfigOverrides;
}

function readConfigFile(path: string, issues: string[]): ConfigOverrides {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    issues.push(`Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    issues.push(`Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
  return overridesFromJson(raw, issues);
}

/**
 * Resolve the effective configuration.
 *
 * @throws ConfigError
 */
export function loadConfig(options: LoadConfigOptions = {}): IacGenConfig {
  const issues: string[] = [];
  let config = DEFAULT_CONFIG;

  const cwd = options.cwd ?? process.cwd();
  if (options.path !== undefined) {
    config = mergeConfig(config, readConfigFile(resolve(cwd, options.path), issues));
  } else {
    const candidate = join(cwd, DEFAULT_CONFIG_FILE);
    if (existsSync(candidate)) {
      config = mergeConfig(config, readConfigFile(candidate, issues));
    }
  }

  config = mergeConfig(config, overridesFromEnv(options.env ?? process.env, issues));
  if (options.overrides !== undefined) {
    config = mergeConfig(config, options.overrides);
  }

  issues.push(...collectConfigIssues(config));
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return config;
}

/**
 * Session settings with the model's output cap folded in.
 */
export function sessionConfigOf(config: IacGenConfig): SessionConfig {
  const session: SessionConfig = { ...config.session };
  if (session.maxOutputTokens === undefined && config.model.max_output_tokens !== undefined) {
    session.maxOutputTokens = config.model.max_output_tokens;
  }
  return session;
}
