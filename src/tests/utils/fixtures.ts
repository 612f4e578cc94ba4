/**
 * Shared Test Fixtures
 * ====================
 *
 * A small knowledge base, a scripted command runner standing in for the
 * Terraform CLI, and a capturing log sink.
 */

import type { KnowledgeBase } from '../../kb/knowledge_base.js';
import type { PersistedSnippet, RetrievalResult } from '../../kb/types.js';
import { createRetriever } from '../../rag/retriever.js';
import type { RetrievalStrategyName } from '../../rag/strategies.js';
import type { ContextSource } from '../../session/session.js';
import type { LogSink } from '../../utils/log.js';
import type {
  CommandOptions,
  CommandResult,
  CommandRunner,
  ValidationOutcome,
  Validator,
} from '../../validation/types.js';

// =============================================================================
// Knowledge Base
// =============================================================================

export const S3_BASIC = 'resource "aws_s3_bucket" "logs" {\n  bucket = "app-logs"\n}';

export const S3_VERSIONING = [
  'resource "aws_s3_bucket" "data" {',
  '  bucket = "app-data"',
  '}',
  '',
  'resource "aws_s3_bucket_versioning" "data" {',
  '  bucket = aws_s3_bucket.data.id',
  '}',
].join('\n');

export const EC2_WEB = [
  'resource "aws_instance" "web" {',
  '  ami           = "ami-0abcdef1234567890"',
  '  instance_type = "t3.micro"',
  '}',
].join('\n');

export const VPC_MAIN = 'resource "aws_vpc" "main" {\n  cidr_block = "10.0.0.0/16"\n}';

/**
 * Resource types are derived from content:
 * s3_basic [aws_s3_bucket], s3_versioning [aws_s3_bucket,
 * aws_s3_bucket_versioning], ec2_web [aws_instance], vpc_main [aws_vpc].
 */
export const SNIPPETS: PersistedSnippet[] = [
  { id: 's3_basic', title: 'Basic S3 bucket', content: S3_BASIC, keywords: ['bucket', 'logs'] },
  { id: 's3_versioning', title: 'Versioned S3 bucket', content: S3_VERSIONING, keywords: ['bucket', 'versioning'] },
  { id: 'ec2_web', title: 'Web server', content: EC2_WEB, keywords: ['instance', 'web'] },
  { id: 'vpc_main', title: 'Main VPC', content: VPC_MAIN, keywords: ['network', 'vpc'] },
];

// =============================================================================
// Command Runner
// =============================================================================

export interface RecordedCommand {
  command: readonly string[];
  options: CommandOptions;
}

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exit_code: 0, stdout: '', stderr: '', timed_out: false, ...overrides };
}

/**
 * Runner answering by subcommand (`init`, `validate`). Unscripted
 * subcommands succeed with empty output.
 */
export function scriptedRunner(script: Record<string, CommandResult | ((options: CommandOptions) => CommandResult)>): {
  runner: CommandRunner;
  calls: RecordedCommand[];
} {
  const calls: RecordedCommand[] = [];
  const runner: CommandRunner = async (command, options) => {
    calls.push({ command, options });
    const entry = script[command[1] ?? ''];
    if (entry === undefined) return commandResult();
    return typeof entry === 'function' ? entry(options) : entry;
  };
  return { runner, calls };
}

export function validateJson(valid: boolean, diagnostics: unknown[] = []): string {
  return JSON.stringify({ format_version: '1.0', valid, error_count: diagnostics.length, warning_count: 0, diagnostics });
}

// =============================================================================
// Session Dependencies
// =============================================================================

export interface RecordedQuery {
  text: string;
  topK: number;
  strategy: RetrievalStrategyName;
}

/**
 * Retriever over `kb` that records every query it answers.
 */
export function recordingSource(kb: KnowledgeBase): { source: ContextSource; queries: RecordedQuery[] } {
  const retriever = createRetriever(kb);
  const queries: RecordedQuery[] = [];
  return {
    queries,
    source: {
      query(text: string, topK: number, strategy: RetrievalStrategyName): RetrievalResult {
        queries.push({ text, topK, strategy });
        return retriever.query(text, topK, strategy);
      },
    },
  };
}

/**
 * Validator answering with `outcomes` in order, repeating the last one.
 * Every candidate it sees is kept in `seen`.
 */
export function scriptedValidator(...outcomes: ValidationOutcome[]): { validator: Validator; seen: string[] } {
  const seen: string[] = [];
  return {
    seen,
    validator: {
      mode: 'terraform',
      async validate(candidateCode: string): Promise<ValidationOutcome> {
        seen.push(candidateCode);
        const outcome = outcomes[Math.min(seen.length, outcomes.length) - 1];
        if (outcome === undefined) throw new Error('scriptedValidator needs at least one outcome');
        return outcome;
      },
    },
  };
}

export const VALID: ValidationOutcome = { status: 'valid', diagnostics: [], structuralPassed: true };

export const TOOL_UNAVAILABLE: ValidationOutcome = {
  status: 'toolUnavailable',
  diagnostics: [{ severity: 'error', message: 'Terraform CLI not found', source: 'system' }],
  structuralPassed: true,
};

export function invalid(message: string, location?: string): ValidationOutcome {
  const diagnostic: ValidationOutcome['diagnostics'][number] = { severity: 'error', message, source: 'terraform' };
  if (location !== undefined) diagnostic.location = location;
  return { status: 'invalid', diagnostics: [diagnostic], structuralPassed: true };
}

export function fenced(code: string): string {
  return `Here is the configuration:\n\n\`\`\`hcl\n${code}\n\`\`\`\n`;
}

// =============================================================================
// Logging
// =============================================================================

export function captureSink(): { sink: LogSink; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    sink: {
      error: (line) => lines.push(line),
      warn: (line) => lines.push(line),
      log: (line) => lines.push(line),
    },
  };
}
