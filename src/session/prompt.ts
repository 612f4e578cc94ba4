/**
 * Prompt Rendering
 * ================
 *
 * Pure rendering of a PromptContext to the text sent to the model.
 *
 * Sections, in order:
 * 1. Role and target
 * 2. Request and constraints
 * 3. Reference snippets (score order, within the character budget)
 * 4. Previous attempt and its diagnostics (retries only)
 * 5. Output format
 */

import type { RetrievedSnippet } from '../kb/types.js';
import type { Diagnostic } from '../validation/types.js';
import type { PromptContext } from './types.js';

export const TRUNCATION_MARKER = '# ... (truncated)';

export interface SnippetExcerpt {
  snippet: RetrievedSnippet;
  content: string;
  truncated: boolean;
}

/**
 * Snippet content in score order until `budget` characters are used. The
 * snippet crossing the budget is cut and marked; later ones are dropped.
 */
export function selectSnippetContent(
  snippets: readonly RetrievedSnippet[],
  budget: number
): SnippetExcerpt[] {
  const excerpts: SnippetExcerpt[] = [];
  let remaining = Math.max(0, Math.floor(budget));

  for (const snippet of snippets) {
    if (remaining <= 0) break;
    const content = snippet.record.content;
    if (content.length <= remaining) {
      excerpts.push({ snippet, content, truncated: false });
      remaining -= content.length;
    } else {
      excerpts.push({ snippet, content: `${content.slice(0, remaining)}\n${TRUNCATION_MARKER}`, truncated: true });
      remaining = 0;
    }
  }

  return excerpts;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location = diagnostic.location !== undefined ? ` [${diagnostic.location}]` : '';
  return `- ${diagnostic.severity.toUpperCase()}: ${diagnostic.message}${location}`;
}

export function renderPrompt(context: PromptContext, budget: number): string {
  const sections: string[] = [];

  sections.push(
    'You are an expert Terraform engineer. Generate complete, valid Terraform HCL for AWS that fulfils the request below.',
    'Include the required provider block.'
  );

  sections.push(`\n## Request\n${context.request}`);

  if (context.constraints.length > 0) {
    sections.push('\n## Constraints');
    for (const constraint of context.constraints) {
      sections.push(`- ${constraint}`);
    }
  }

  const excerpts = selectSnippetContent(context.snippets, budget);
  sections.push('\n## Reference Snippets');
  if (excerpts.length === 0) {
    sections.push('No reference snippets available.');
  }
  for (const excerpt of excerpts) {
    const { record, score } = excerpt.snippet;
    sections.push(`### ${record.title} (${record.id}, relevance ${score.toFixed(2)})\n\`\`\`hcl\n${excerpt.content}\n\`\`\``);
  }

  if (context.previousCode !== undefined) {
    sections.push(`\n## Previous Attempt\n\`\`\`hcl\n${context.previousCode}\n\`\`\``);
  }

  if (context.diagnostics.length > 0) {
    sections.push('\n## Validation Errors To Fix');
    for (const diagnostic of context.diagnostics) {
      sections.push(formatDiagnostic(diagnostic));
    }
  }

  if (context.attemptNumber > 1) {
    sections.push(
      `\n(Attempt ${context.attemptNumber}/${context.maxAttempts} - correct every error listed above and return the complete configuration)`
    );
  }

  sections.push(
    '\n## Output\nRespond with ONLY the Terraform code, wrapped in ```hcl code blocks. No explanations.'
  );

  return sections.join('\n');
}
