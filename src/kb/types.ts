/**
 * Knowledge Base Types
 * ====================
 *
 * Records of prior Terraform examples that retrieval ranks against a
 * request.
 */

// =============================================================================
// Records
// =============================================================================

/**
 * One retrievable example. Immutable once the knowledge base is built.
 */
export interface SnippetRecord {
  /**
   * Unique within a knowledge base.
   */
  readonly id: string;

  /**
   * Terraform source. Never empty.
   */
  readonly content: string;

  readonly title: string;

  /**
   * Lower-cased descriptors, expanded with the components of
   * underscore-joined terms.
   * ORDERING: Sorted lexicographically, no duplicates.
   */
  readonly keywords: readonly string[];

  /**
   * Resource type names declared in `content`, e.g. `aws_s3_bucket`.
   * ORDERING: Sorted lexicographically, no duplicates.
   */
  readonly resourceTypes: readonly string[];

  /**
   * Natural-language request the example was written for, when known.
   */
  readonly sourcePrompt?: string;
}

/**
 * A raw dataset entry: the request an example answers and its code.
 * Missing title/keywords are derived from the prompt.
 */
export interface SourceRecord {
  id?: string;

  prompt?: string;

  /**
   * Terraform source; entries with blank code are unusable.
   */
  iac_code: string;

  title?: string;

  keywords?: readonly string[];
}

/**
 * Pre-computed metadata for a source record, keyed by its id.
 */
export interface SnippetMetadata {
  title?: string;
  keywords?: readonly string[];
}

/**
 * One line of the persisted knowledge-base format.
 * Absent `resourceTypes` are re-derived from `content`.
 */
export interface PersistedSnippet {
  id: string;
  content: string;
  title?: string;
  keywords?: readonly string[];
  resourceTypes?: readonly string[];
  sourcePrompt?: string;
}

// =============================================================================
// Build Reporting
// =============================================================================

export interface BuildReport {
  /**
   * Records accepted into the knowledge base.
   */
  accepted: number;

  /**
   * Entries dropped because their content was blank.
   */
  skipped_empty: number;

  /**
   * Entries dropped because an earlier entry had the same id.
   */
  skipped_duplicate: number;
}

/**
 * Summary statistics of a knowledge base.
 */
export interface KnowledgeBaseStats {
  total_snippets: number;
  unique_keywords: number;
  unique_resource_types: number;
  avg_keywords_per_snippet: number;

  /**
   * Most frequent keywords with their snippet counts.
   * ORDERING: Count descending, keyword ascending. At most ten.
   */
  top_keywords: Array<{ keyword: string; count: number }>;
}

// =============================================================================
// Retrieval Results
// =============================================================================

export interface RetrievedSnippet {
  readonly record: SnippetRecord;

  /**
   * Relevance in [0, 1].
   */
  readonly score: number;

  /**
   * 1-indexed position in the result.
   */
  readonly rank: number;
}

/**
 * ORDERING: Score descending, then record id ascending.
 */
export type RetrievalResult = readonly RetrievedSnippet[];

// =============================================================================
// Errors
// =============================================================================

/**
 * A knowledge base cannot be built from zero usable records.
 */
export class EmptyDatasetError extends Error {
  readonly code = 'EMPTY_DATASET';

  constructor(
    message: string,
    public readonly report?: BuildReport
  ) {
    super(message);
    this.name = 'EmptyDatasetError';
  }
}
