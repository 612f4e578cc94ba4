/**
 * Retriever
 * =========
 *
 * Ranks knowledge-base snippets against a request with the configured
 * strategy and returns a bounded, ordered context set.
 */

import { randomBytes } from 'node:crypto';
import type { KnowledgeBase } from '../kb/knowledge_base.js';
import type { RetrievalResult } from '../kb/types.js';
import { silentLogger, type Logger } from '../utils/log.js';
import type { GraphStats } from './graph.js';
import { rankSnippets } from './rank.js';
import { analyzeRequest } from './request.js';
import { createStrategy, type RetrievalStrategy, type RetrievalStrategyName } from './strategies.js';

// =============================================================================
// Types
// =============================================================================

export interface RetrieverOptions {
  /**
   * @default 'keyword'
   */
  strategy?: RetrievalStrategyName;

  /**
   * Default result size for `query`.
   * @default 3
   */
  topK?: number;

  logger?: Logger;
}

export interface RetrieverStats {
  total_queries: number;

  /**
   * Queries that returned no snippet.
   */
  empty_results: number;

  average_results: number;

  average_latency_ms: number;
}

export const DEFAULT_RETRIEVER_OPTIONS = {
  strategy: 'keyword',
  topK: 3,
} as const satisfies Required<Omit<RetrieverOptions, 'logger'>>;

// =============================================================================
// Retriever
// =============================================================================

export class Retriever {
  readonly id: string;
  readonly strategyName: RetrievalStrategyName;
  readonly topK: number;

  private readonly strategies = new Map<RetrievalStrategyName, RetrievalStrategy>();
  private readonly logger: Logger;
  private stats = {
    total_queries: 0,
    empty_results: 0,
    total_results: 0,
    total_latency_ms: 0,
  };

  constructor(
    private readonly kb: KnowledgeBase,
    options: RetrieverOptions = {}
  ) {
    this.id = `retriever_${randomBytes(4).toString('hex')}`;
    this.strategyName = options.strategy ?? DEFAULT_RETRIEVER_OPTIONS.strategy;
    this.topK = options.topK ?? DEFAULT_RETRIEVER_OPTIONS.topK;
    this.logger = (options.logger ?? silentLogger).child(`Retriever ${this.id}`);
  }

  /**
   * Rank the knowledge base against `text`. Blank text yields an empty result.
   * `strategy` overrides the configured one for this call.
   */
  query(text: string, topK: number = this.topK, strategy: RetrievalStrategyName = this.strategyName): RetrievalResult {
    const startTime = performance.now();
    const result = rankSnippets(this.kb.all(), analyzeRequest(text), this.strategyFor(strategy), topK);
    const latencyMs = performance.now() - startTime;

    this.stats.total_queries++;
    this.stats.total_results += result.length;
    this.stats.total_latency_ms += latencyMs;
    if (result.length === 0) this.stats.empty_results++;

    this.logger.debug(
      `${strategy} query returned ${result.length}/${topK}` +
        (result.length > 0 ? ` (best ${result[0]?.record.id} ${result[0]?.score.toFixed(3)})` : '')
    );
    return result;
  }

  /**
   * Graph shape when the graph strategy is active.
   */
  graphStats(): GraphStats | null {
    const strategy = this.strategyFor(this.strategyName);
    return strategy.kind === 'graph' ? strategy.graphStats() : null;
  }

  private strategyFor(name: RetrievalStrategyName): RetrievalStrategy {
    let strategy = this.strategies.get(name);
    if (strategy === undefined) {
      strategy = createStrategy(name, this.kb.all());
      this.strategies.set(name, strategy);
    }
    return strategy;
  }

  getStats(): RetrieverStats {
    const queries = this.stats.total_queries;
    return {
      total_queries: queries,
      empty_results: this.stats.empty_results,
      average_results: queries > 0 ? this.stats.total_results / queries : 0,
      average_latency_ms: queries > 0 ? Math.round(this.stats.total_latency_ms / queries) : 0,
    };
  }
}

export function createRetriever(kb: KnowledgeBase, options: RetrieverOptions = {}): Retriever {
  return new Retriever(kb, options);
}

// =============================================================================
// Strategy Comparison
// =============================================================================

export interface StrategyComparison {
  request: string;
  keyword: RetrievalResult;
  graph: RetrievalResult;

  /**
   * Ids returned by both strategies.
   * ORDERING: Sorted.
   */
  shared: string[];
  keyword_only: string[];
  graph_only: string[];
}

/**
 * Run both strategies over the same request for side-by-side inspection.
 */
export function compareStrategies(kb: KnowledgeBase, request: string, topK: number = 3): StrategyComparison {
  const retriever = new Retriever(kb, { topK });
  const keyword = retriever.query(request, topK, 'keyword');
  const graph = retriever.query(request, topK, 'graph');

  const keywordIds = new Set(keyword.map((hit) => hit.record.id));
  const graphIds = new Set(graph.map((hit) => hit.record.id));

  return {
    request,
    keyword,
    graph,
    shared: [...keywordIds].filter((id) => graphIds.has(id)).sort(),
    keyword_only: [...keywordIds].filter((id) => !graphIds.has(id)).sort(),
    graph_only: [...graphIds].filter((id) => !keywordIds.has(id)).sort(),
  };
}
