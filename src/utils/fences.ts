/**
 * Code Fences
 * ===========
 */

const TERRAFORM_FENCE = /```(?:hcl|terraform|tf)[ \t]*\r?\n([\s\S]*?)```/i;
const GENERIC_FENCE = /```[ \t]*\r?\n([\s\S]*?)```/;

/**
 * Unwrap the first ```hcl / ```terraform / ``` block, otherwise return the
 * trimmed text.
 */
export function extractCodeBlock(text: string): string {
  const match = text.match(TERRAFORM_FENCE);
  if (match && match[1] !== undefined) {
    return match[1].trim();
  }

  const genericMatch = text.match(GENERIC_FENCE);
  if (genericMatch && genericMatch[1] !== undefined) {
    return genericMatch[1].trim();
  }

  return text.trim();
}
