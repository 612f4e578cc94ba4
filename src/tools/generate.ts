#!/usr/bin/env node
/**
 * Generate CLI
 * ============
 *
 * Turns a natural-language request into Terraform configuration, retrying
 * against validator diagnostics.
 *
 * Usage:
 *   iacgen-generate "Create an S3 bucket with versioning" [options]
 *   echo "Create an S3 bucket" | iacgen-generate - [options]
 *
 * Exit codes:
 *   0 - Succeeded
 *   1 - IO or usage error
 *   2 - Configuration error
 *   3 - Retry budget exhausted (last candidate still printed)
 *   4 - Aborted (model failure or cancellation)
 *
 * Generated code goes to stdout; logs and diagnostics go to stderr.
 */

import { createAdapter, type AdapterFactoryOptions } from '../adapters/factory.js';
import { AdapterError, type ModelAdapter } from '../adapters/model.js';
import { ConfigError, loadConfig, sessionConfigOf, type IacGenConfig, type LoadConfigOptions } from '../config/config.js';
import { KnowledgeBase } from '../kb/knowledge_base.js';
import { loadKnowledgeBase } from '../kb/persistence.js';
import { EmptyDatasetError } from '../kb/types.js';
import { createRetriever } from '../rag/retriever.js';
import { formatDiagnostic } from '../session/prompt.js';
import { GenerationSession } from '../session/session.js';
import { summarizeSession } from '../session/summary.js';
import { toTranscript } from '../session/transcript.js';
import type { SessionResult } from '../session/types.js';
import { canonicalize } from '../utils/canonical.js';
import { createLogger, type LogSink, type Logger } from '../utils/log.js';
import { createValidator } from '../validation/validator.js';
import {
  EXIT_CONFIG_ERROR,
  EXIT_IO_ERROR,
  EXIT_OK,
  exitCodeFor,
  parseGenerateArgs,
  type GenerateArgs,
} from './args.js';

const USAGE = `Usage: iacgen-generate <prompt | -> [options]

Generates Terraform configuration for a natural-language request.

Arguments:
  prompt                Request text, or - to read it from stdin

Options:
  --kb <file>           Knowledge base (JSON Lines); default from config
  --provider <name>     anthropic | openai | mock
  --model <name>        Provider model name
  --max-retries <n>     Re-generation attempts after the first
  --top-k <n>           Snippets retrieved as context
  --strategy <name>     keyword | graph
  --best-effort         Accept structurally valid code when Terraform cannot run
  --validation <mode>   terraform | heuristic
  --config <file>       JSON config file (default: ./iacgen.config.json if present)
  --json                Print the session transcript and summary as JSON
  --help, -h            Show this help message

Exit codes:
  0 - Succeeded
  1 - IO or usage error
  2 - Configuration error
  3 - Retry budget exhausted
  4 - Aborted`;

const stderrSink: LogSink = {
  error: (line) => console.error(line),
  warn: (line) => console.error(line),
  log: (line) => console.error(line),
};

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function adapterOptions(config: IacGenConfig): AdapterFactoryOptions {
  const { model } = config;
  const options: AdapterFactoryOptions = {
    provider: model.provider,
    timeout_ms: model.timeout_ms,
    max_retries: model.max_retries,
    enable_resilience: model.enable_resilience,
  };
  if (model.model !== undefined) options.model = model.model;
  if (model.temperature !== undefined) options.temperature = model.temperature;
  return options;
}

/**
 * An explicit --kb must load. The configured default may be absent, in
 * which case the session runs without reference snippets.
 */
async function openKnowledgeBase(args: GenerateArgs, config: IacGenConfig, logger: Logger): Promise<KnowledgeBase> {
  const path = args.kbPath ?? config.knowledge_base.path;
  try {
    return (await loadKnowledgeBase(path, logger)).kb;
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (args.kbPath === undefined && (missing || error instanceof EmptyDatasetError)) {
      logger.warn(`knowledge base ${path} unavailable; generating without reference snippets`);
      return KnowledgeBase.empty();
    }
    throw error;
  }
}

function report(result: SessionResult): void {
  switch (result.kind) {
    case 'succeeded':
      if (result.bestEffort) {
        console.error('WARNING: Terraform validation could not run; code passed structural checks only');
      }
      console.log(result.code);
      return;
    case 'exhausted':
      console.error(`Retry budget exhausted after ${result.lastAttempt.attemptNumber} attempt(s). Last diagnostics:`);
      for (const diagnostic of result.lastAttempt.outcome.diagnostics) {
        console.error(formatDiagnostic(diagnostic));
      }
      console.log(result.lastAttempt.candidateCode);
      return;
    case 'aborted':
      if (result.reason === 'modelFailure') {
        console.error(`ERROR: Model call failed: ${result.error?.code ?? 'ADAPTER_ERROR'} ${result.error?.message ?? ''}`);
      } else {
        console.error('Cancelled');
      }
      if (result.lastAttempt !== undefined) {
        console.log(result.lastAttempt.candidateCode);
      }
      return;
  }
}

async function main(): Promise<number> {
  const parsed = parseGenerateArgs(process.argv.slice(2));
  if (parsed.kind === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (parsed.kind === 'error') {
    console.error(`ERROR: ${parsed.error}\n\n${USAGE}`);
    return EXIT_IO_ERROR;
  }
  const args = parsed.value;

  let config: IacGenConfig;
  const loadOptions: LoadConfigOptions = { overrides: args.overrides };
  if (args.configPath !== undefined) loadOptions.path = args.configPath;
  try {
    config = loadConfig(loadOptions);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`CONFIG_ERROR: ${error.message}`);
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }
  const logger = createLogger('iacgen', config.log_level, stderrSink);

  const text = args.fromStdin ? (await readStdin()).trim() : (args.prompt ?? '');
  if (text === '') {
    console.error('ERROR: Empty prompt');
    return EXIT_IO_ERROR;
  }

  let adapter: ModelAdapter;
  try {
    adapter = createAdapter(adapterOptions(config));
  } catch (error) {
    if (error instanceof AdapterError) {
      console.error(`CONFIG_ERROR: ${error.message}`);
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  const kb = await openKnowledgeBase(args, config, logger);
  const session = new GenerationSession(
    { text },
    {
      retriever: createRetriever(kb, { strategy: config.session.retrievalStrategy, topK: config.session.topK, logger }),
      validator: createValidator(config.validation, { logger }),
      adapter,
      logger,
    },
    sessionConfigOf(config)
  );

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const result = await session.run(controller.signal);
    if (args.json) {
      console.log(canonicalize({ summary: summarizeSession(session), transcript: toTranscript(session) }));
    } else {
      report(result);
    }
    return exitCodeFor(result.kind);
  } finally {
    await adapter.shutdown();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`IO_ERROR: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(EXIT_IO_ERROR);
  }
);
