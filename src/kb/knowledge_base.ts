/**
 * Knowledge Base
 * ==============
 *
 * In-memory store of Terraform example snippets. Built once from a dataset
 * or a persisted file, read-only afterwards, and therefore safe to share
 * between concurrently running sessions.
 */

import { deriveId } from '../utils/canonical.js';
import { analyzeRequest } from '../rag/request.js';
import { rankSnippets } from '../rag/rank.js';
import { createKeywordStrategy, type RetrievalStrategy } from '../rag/strategies.js';
import {
  deriveKeywords,
  deriveTitle,
  extractResourceTypes,
  normalizeKeywords,
  normalizeResourceTypes,
} from './extract.js';
import {
  type BuildReport,
  type KnowledgeBaseStats,
  type PersistedSnippet,
  type RetrievalResult,
  type SnippetMetadata,
  type SnippetRecord,
  type SourceRecord,
  EmptyDatasetError,
} from './types.js';

export const DEFAULT_TOP_K = 3;

const TOP_KEYWORD_COUNT = 10;

// =============================================================================
// Record Assembly
// =============================================================================

interface SnippetDraft {
  id: string;
  content: string;
  title: string;
  keywords: string[];
  resourceTypes: string[];
  sourcePrompt: string | undefined;
}

function freezeRecord(draft: SnippetDraft): SnippetRecord {
  const record: {
    id: string;
    content: string;
    title: string;
    keywords: readonly string[];
    resourceTypes: readonly string[];
    sourcePrompt?: string;
  } = {
    id: draft.id,
    content: draft.content,
    title: draft.title,
    keywords: Object.freeze([...draft.keywords]),
    resourceTypes: Object.freeze([...draft.resourceTypes]),
  };
  if (draft.sourcePrompt !== undefined) record.sourcePrompt = draft.sourcePrompt;
  return Object.freeze(record);
}

function firstNonEmpty(...lists: Array<readonly string[] | undefined>): readonly string[] {
  for (const list of lists) {
    if (list !== undefined && list.length > 0) return list;
  }
  return [];
}

function draftFromSource(source: SourceRecord, metadata?: ReadonlyMap<string, SnippetMetadata>): SnippetDraft {
  const prompt = source.prompt ?? '';
  const id = source.id ?? deriveId('snippet', { prompt, iac_code: source.iac_code });
  const meta = metadata?.get(id);
  const title = source.title?.trim() || meta?.title?.trim() || deriveTitle(prompt) || id;
  const keywords = firstNonEmpty(source.keywords, meta?.keywords, deriveKeywords(prompt));

  return {
    id,
    content: source.iac_code,
    title,
    keywords: normalizeKeywords(keywords),
    resourceTypes: extractResourceTypes(source.iac_code),
    sourcePrompt: source.prompt,
  };
}

function draftFromPersisted(snippet: PersistedSnippet): SnippetDraft {
  const prompt = snippet.sourcePrompt ?? '';
  return {
    id: snippet.id,
    content: snippet.content,
    title: snippet.title?.trim() || deriveTitle(prompt) || snippet.id,
    keywords: normalizeKeywords(firstNonEmpty(snippet.keywords, deriveKeywords(prompt))),
    resourceTypes:
      snippet.resourceTypes !== undefined
        ? normalizeResourceTypes(snippet.resourceTypes)
        : extractResourceTypes(snippet.content),
    sourcePrompt: snippet.sourcePrompt,
  };
}

// =============================================================================
// Knowledge Base
// =============================================================================

export class KnowledgeBase {
  private readonly records: readonly SnippetRecord[];
  private readonly byId: ReadonlyMap<string, SnippetRecord>;
  private readonly keywordStrategy = createKeywordStrategy();

  private constructor(
    records: readonly SnippetRecord[],
    readonly report: BuildReport
  ) {
    this.records = Object.freeze([...records]);
    this.byId = new Map(records.map((record) => [record.id, record]));
  }

  /**
   * Build from dataset entries plus optional pre-computed metadata keyed by
   * source id. Entries with blank code and repeated ids are skipped.
   *
   * @throws EmptyDatasetError when no entry is usable
   */
  static build(
    sources: readonly SourceRecord[],
    metadata?: ReadonlyMap<string, SnippetMetadata>
  ): KnowledgeBase {
    return KnowledgeBase.assemble(sources.map((source) => draftFromSource(source, metadata)));
  }

  /**
   * Build from records in the persisted format.
   *
   * @throws EmptyDatasetError when no record is usable
   */
  static fromSnippets(snippets: readonly PersistedSnippet[]): KnowledgeBase {
    return KnowledgeBase.assemble(snippets.map(draftFromPersisted));
  }

  /**
   * A store with no records. Every query against it returns an empty result.
   */
  static empty(): KnowledgeBase {
    return new KnowledgeBase([], { accepted: 0, skipped_empty: 0, skipped_duplicate: 0 });
  }

  private static assemble(drafts: readonly SnippetDraft[]): KnowledgeBase {
    const report: BuildReport = { accepted: 0, skipped_empty: 0, skipped_duplicate: 0 };
    const seen = new Set<string>();
    const records: SnippetRecord[] = [];

    for (const draft of drafts) {
      if (draft.content.trim().length === 0) {
        report.skipped_empty++;
        continue;
      }
      if (seen.has(draft.id)) {
        report.skipped_duplicate++;
        continue;
      }
      seen.add(draft.id);
      records.push(freezeRecord(draft));
      report.accepted++;
    }

    if (records.length === 0) {
      throw new EmptyDatasetError(
        `No usable records (${report.skipped_empty} empty, ${report.skipped_duplicate} duplicate)`,
        report
      );
    }

    return new KnowledgeBase(records, report);
  }

  // ===========================================================================
  // Read Access
  // ===========================================================================

  get size(): number {
    return this.records.length;
  }

  /**
   * All records in build order.
   */
  all(): readonly SnippetRecord[] {
    return this.records;
  }

  get(id: string): SnippetRecord | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /**
   * Rank records against free text. Uses keyword scoring unless a strategy
   * built over this knowledge base is given.
   */
  query(text: string, topK: number = DEFAULT_TOP_K, strategy?: RetrievalStrategy): RetrievalResult {
    return rankSnippets(this.records, analyzeRequest(text), strategy ?? this.keywordStrategy, topK);
  }

  stats(): KnowledgeBaseStats {
    const keywordCounts = new Map<string, number>();
    const resourceTypes = new Set<string>();
    let keywordTotal = 0;

    for (const record of this.records) {
      keywordTotal += record.keywords.length;
      for (const keyword of record.keywords) {
        keywordCounts.set(keyword, (keywordCounts.get(keyword) ?? 0) + 1);
      }
      for (const type of record.resourceTypes) {
        resourceTypes.add(type);
      }
    }

    const top_keywords = [...keywordCounts.entries()]
      .sort(([ka, ca], [kb, cb]) => cb - ca || (ka < kb ? -1 : ka > kb ? 1 : 0))
      .slice(0, TOP_KEYWORD_COUNT)
      .map(([keyword, count]) => ({ keyword, count }));

    return {
      total_snippets: this.records.length,
      unique_keywords: keywordCounts.size,
      unique_resource_types: resourceTypes.size,
      avg_keywords_per_snippet: this.records.length === 0 ? 0 : keywordTotal / this.records.length,
      top_keywords,
    };
  }
}

/**
 * @throws EmptyDatasetError when no entry is usable
 */
export function buildKnowledgeBase(
  sources: readonly SourceRecord[],
  metadata?: ReadonlyMap<string, SnippetMetadata>
): KnowledgeBase {
  return KnowledgeBase.build(sources, metadata);
}
