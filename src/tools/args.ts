/**
 * CLI Argument Parsing
 * ====================
 *
 * Pure parsers for the command-line tools. No I/O and no process exits;
 * the entry points decide what to print and which code to exit with.
 */

import { ADAPTER_PROVIDERS, isAdapterProvider } from '../adapters/factory.js';
import type { ConfigOverrides } from '../config/config.js';
import { DEFAULT_TOP_K } from '../kb/knowledge_base.js';
import { RETRIEVAL_STRATEGIES, isRetrievalStrategyName, type RetrievalStrategyName } from '../rag/strategies.js';
import type { SessionResultKind } from '../session/types.js';
import { VALIDATION_MODES, isValidationMode } from '../validation/types.js';

// =============================================================================
// Exit Codes
// =============================================================================

export const EXIT_OK = 0;
export const EXIT_IO_ERROR = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_EXHAUSTED = 3;
export const EXIT_ABORTED = 4;

export function exitCodeFor(kind: SessionResultKind): number {
  switch (kind) {
    case 'succeeded':
      return EXIT_OK;
    case 'exhausted':
      return EXIT_EXHAUSTED;
    case 'aborted':
      return EXIT_ABORTED;
  }
}

export type ParseResult<T> = { kind: 'args'; value: T } | { kind: 'error'; error: string } | { kind: 'help' };

// =============================================================================
// Token Reader
// =============================================================================

/**
 * Walks argv, splitting `--flag=value` and taking separate values.
 */
class ArgReader {
  private index = 0;
  private pendingValue: string | undefined;

  constructor(private readonly args: readonly string[]) {}

  next(): string | undefined {
    const arg = this.args[this.index++];
    this.pendingValue = undefined;
    if (arg !== undefined && arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq > 0) {
        this.pendingValue = arg.slice(eq + 1);
        return arg.slice(0, eq);
      }
    }
    return arg;
  }

  value(flag: string): string {
    if (this.pendingValue !== undefined) {
      const value = this.pendingValue;
      this.pendingValue = undefined;
      return value;
    }
    const value = this.args[this.index];
    if (value === undefined || (value.startsWith('-') && value !== '-')) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    this.index++;
    return value;
  }
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function integerValue(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new UsageError(`${flag} must be an integer (got "${value}")`);
  }
  return Number(value);
}

function choiceValue<T extends string>(
  flag: string,
  value: string,
  allowed: readonly T[],
  guard: (value: string) => value is T
): T {
  if (!guard(value)) {
    throw new UsageError(`${flag} must be one of ${allowed.join(', ')} (got "${value}")`);
  }
  return value;
}

function run<T>(parse: () => T | 'help'): ParseResult<T> {
  try {
    const value = parse();
    return value === 'help' ? { kind: 'help' } : { kind: 'args', value };
  } catch (error) {
    if (error instanceof UsageError) {
      return { kind: 'error', error: error.message };
    }
    throw error;
  }
}

// =============================================================================
// iacgen-generate
// =============================================================================

export interface GenerateArgs {
  /**
   * Request text; undefined when it is read from stdin.
   */
  prompt?: string;
  fromStdin: boolean;
  kbPath?: string;
  configPath?: string;
  json: boolean;
  overrides: ConfigOverrides;
}

export function parseGenerateArgs(argv: readonly string[]): ParseResult<GenerateArgs> {
  return run((): GenerateArgs | 'help' => {
    const reader = new ArgReader(argv);
    const model: NonNullable<ConfigOverrides['model']> = {};
    const session: NonNullable<ConfigOverrides['session']> = {};
    const validation: NonNullable<ConfigOverrides['validation']> = {};
    const words: string[] = [];
    let fromStdin = false;
    let json = false;
    let kbPath: string | undefined;
    let configPath: string | undefined;

    for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
      switch (arg) {
        case '--help':
        case '-h':
          return 'help';
        case '--kb':
          kbPath = reader.value(arg);
          break;
        case '--config':
          configPath = reader.value(arg);
          break;
        case '--provider':
          model.provider = choiceValue(arg, reader.value(arg), ADAPTER_PROVIDERS, isAdapterProvider);
          break;
        case '--model':
          model.model = reader.value(arg);
          break;
        case '--max-retries':
          session.maxRetries = integerValue(arg, reader.value(arg));
          break;
        case '--top-k':
          session.topK = integerValue(arg, reader.value(arg));
          break;
        case '--strategy':
          session.retrievalStrategy = choiceValue(arg, reader.value(arg), RETRIEVAL_STRATEGIES, isRetrievalStrategyName);
          break;
        case '--best-effort':
          session.bestEffortAcceptance = true;
          break;
        case '--validation':
          validation.mode = choiceValue(arg, reader.value(arg), VALIDATION_MODES, isValidationMode);
          break;
        case '--json':
          json = true;
          break;
        case '-':
          fromStdin = true;
          break;
        default:
          if (arg.startsWith('-')) {
            throw new UsageError(`Unknown option: ${arg}`);
          }
          words.push(arg);
      }
    }

    if (fromStdin && words.length > 0) {
      throw new UsageError('Give the prompt as text or as -, not both');
    }
    const prompt = words.join(' ').trim();
    if (!fromStdin && prompt === '') {
      throw new UsageError('Missing prompt');
    }

    const overrides: ConfigOverrides = {};
    if (Object.keys(model).length > 0) overrides.model = model;
    if (Object.keys(session).length > 0) overrides.session = session;
    if (Object.keys(validation).length > 0) overrides.validation = validation;

    const args: GenerateArgs = { fromStdin, json, overrides };
    if (!fromStdin) args.prompt = prompt;
    if (kbPath !== undefined) args.kbPath = kbPath;
    if (configPath !== undefined) args.configPath = configPath;
    return args;
  });
}

// =============================================================================
// iacgen-kb
// =============================================================================

export type KbCommand =
  | { command: 'build'; datasetPath: string; outputPath: string }
  | { command: 'stats'; kbPath: string }
  | {
      command: 'query';
      kbPath: string;
      text: string;
      strategy: RetrievalStrategyName;
      topK: number;
      compare: boolean;
    };

export function parseKbArgs(argv: readonly string[]): ParseResult<KbCommand> {
  return run((): KbCommand | 'help' => {
    const reader = new ArgReader(argv);
    const positionals: string[] = [];
    let strategy: RetrievalStrategyName = 'keyword';
    let topK = DEFAULT_TOP_K;
    let compare = false;

    for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
      switch (arg) {
        case '--help':
        case '-h':
          return 'help';
        case '--strategy':
          strategy = choiceValue(arg, reader.value(arg), RETRIEVAL_STRATEGIES, isRetrievalStrategyName);
          break;
        case '--top-k':
          topK = integerValue(arg, reader.value(arg));
          break;
        case '--compare':
          compare = true;
          break;
        default:
          if (arg.startsWith('-')) {
            throw new UsageError(`Unknown option: ${arg}`);
          }
          positionals.push(arg);
      }
    }

    const [command, ...rest] = positionals;
    switch (command) {
      case undefined:
        throw new UsageError('Missing command (build, stats or query)');
      case 'build': {
        const [datasetPath, outputPath] = rest;
        if (datasetPath === undefined || outputPath === undefined || rest.length > 2) {
          throw new UsageError('Usage: build <dataset.jsonl> <out.jsonl>');
        }
        return { command, datasetPath, outputPath };
      }
      case 'stats': {
        const [kbPath] = rest;
        if (kbPath === undefined || rest.length > 1) {
          throw new UsageError('Usage: stats <kb.jsonl>');
        }
        return { command, kbPath };
      }
      case 'query': {
        const [kbPath, ...words] = rest;
        const text = words.join(' ').trim();
        if (kbPath === undefined || text === '') {
          throw new UsageError('Usage: query <kb.jsonl> <text> [--strategy s] [--top-k n] [--compare]');
        }
        return { command, kbPath, text, strategy, topK, compare };
      }
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  });
}
