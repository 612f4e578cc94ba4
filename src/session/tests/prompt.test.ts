/**
 * Prompt Rendering Tests
 * ======================
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { KnowledgeBase } from '../../kb/index.js';
import type { RetrievedSnippet } from '../../kb/index.js';
import { TRUNCATION_MARKER, formatDiagnostic, renderPrompt, selectSnippetContent } from '../index.js';
import type { PromptContext } from '../index.js';
import { S3_BASIC, SNIPPETS, VPC_MAIN } from '../../tests/utils/fixtures.js';

const kb = KnowledgeBase.fromSnippets(SNIPPETS);

function hit(id: string, score: number, rank: number): RetrievedSnippet {
  const record = kb.get(id);
  assert.ok(record, `fixture snippet ${id}`);
  return { record, score, rank };
}

function context(overrides: Partial<PromptContext> = {}): PromptContext {
  return {
    request: 'Create a VPC',
    constraints: [],
    snippets: [],
    diagnostics: [],
    attemptNumber: 1,
    maxAttempts: 3,
    ...overrides,
  };
}

const OUTPUT_SECTION = '\n## Output\nRespond with ONLY the Terraform code, wrapped in ```hcl code blocks. No explanations.';

// =============================================================================
// selectSnippetContent
// =============================================================================

describe('selectSnippetContent', () => {
  it('should keep whole snippets within the budget', () => {
    const excerpts = selectSnippetContent([hit('s3_basic', 1, 1), hit('vpc_main', 0.5, 2)], 10000);

    assert.deepEqual(
      excerpts.map((e) => [e.snippet.record.id, e.content, e.truncated]),
      [
        ['s3_basic', S3_BASIC, false],
        ['vpc_main', VPC_MAIN, false],
      ]
    );
  });

  it('should cut the snippet crossing the budget and drop the rest', () => {
    const excerpts = selectSnippetContent(
      [hit('s3_basic', 1, 1), hit('vpc_main', 0.5, 2), hit('ec2_web', 0.25, 3)],
      S3_BASIC.length + 10
    );

    assert.equal(excerpts.length, 2);
    assert.equal(excerpts[0]?.truncated, false);
    assert.equal(excerpts[1]?.content, `${VPC_MAIN.slice(0, 10)}\n${TRUNCATION_MARKER}`);
    assert.equal(excerpts[1]?.truncated, true);
  });

  it('should select nothing without a budget', () => {
    assert.deepEqual(selectSnippetContent([hit('s3_basic', 1, 1)], 0), []);
  });
});

// =============================================================================
// formatDiagnostic
// =============================================================================

describe('formatDiagnostic', () => {
  it('should render severity, message and location', () => {
    assert.equal(
      formatDiagnostic({ severity: 'error', message: 'Unsupported argument', location: 'main.tf:3', source: 'terraform' }),
      '- ERROR: Unsupported argument [main.tf:3]'
    );
    assert.equal(
      formatDiagnostic({ severity: 'warning', message: 'Deprecated attribute', source: 'terraform' }),
      '- WARNING: Deprecated attribute'
    );
  });
});

// =============================================================================
// renderPrompt
// =============================================================================

describe('renderPrompt', () => {
  it('should render a first attempt without snippets', () => {
    const prompt = renderPrompt(context({ constraints: ['use us-east-1'] }), 6000);

    assert.equal(
      prompt,
      [
        'You are an expert Terraform engineer. Generate complete, valid Terraform HCL for AWS that fulfils the request below.',
        'Include the required provider block.',
        '\n## Request\nCreate a VPC',
        '\n## Constraints',
        '- use us-east-1',
        '\n## Reference Snippets',
        'No reference snippets available.',
        OUTPUT_SECTION,
      ].join('\n')
    );
  });

  it('should render snippets with title, id and relevance', () => {
    const prompt = renderPrompt(context({ snippets: [hit('vpc_main', 0.75, 1)] }), 6000);

    assert.ok(prompt.includes(`### Main VPC (vpc_main, relevance 0.75)\n\`\`\`hcl\n${VPC_MAIN}\n\`\`\``));
    assert.equal(prompt.includes('No reference snippets available.'), false);
  });

  it('should carry the previous attempt and its diagnostics on a retry', () => {
    const prompt = renderPrompt(
      context({
        attemptNumber: 2,
        previousCode: 'resource "aws_vpc" "main" {}',
        diagnostics: [
          { severity: 'error', message: 'Missing required argument: cidr_block', location: 'main.tf:1', source: 'terraform' },
        ],
      }),
      6000
    );

    const tail = prompt.slice(prompt.indexOf('\n## Previous Attempt'));
    assert.equal(
      tail,
      [
        '\n## Previous Attempt\n```hcl\nresource "aws_vpc" "main" {}\n```',
        '\n## Validation Errors To Fix',
        '- ERROR: Missing required argument: cidr_block [main.tf:1]',
        '\n(Attempt 2/3 - correct every error listed above and return the complete configuration)',
        OUTPUT_SECTION,
      ].join('\n')
    );
  });

  it('should be a pure function of its context', () => {
    const input = context({ snippets: [hit('s3_basic', 1, 1)], constraints: ['a', 'b'] });
    assert.equal(renderPrompt(input, 100), renderPrompt({ ...input }, 100));
  });
});
