/**
 * Retrieval Exports
 * =================
 */

export type { RequestProfile } from './request.js';
export { analyzeRequest, isEmptyRequest } from './request.js';

export type { GraphStats, NodeKind } from './graph.js';
export { SnippetGraph, snippetNode, keywordNode, resourceNode, nodeKind } from './graph.js';

export type {
  KeywordStrategy,
  GraphStrategy,
  RetrievalStrategy,
  RetrievalStrategyName,
} from './strategies.js';
export {
  RETRIEVAL_STRATEGIES,
  SECOND_ORDER_WEIGHT,
  createGraphStrategy,
  createKeywordStrategy,
  createStrategy,
  isRetrievalStrategyName,
} from './strategies.js';

export { rankSnippets } from './rank.js';

export type { RetrieverOptions, RetrieverStats, StrategyComparison } from './retriever.js';
export { DEFAULT_RETRIEVER_OPTIONS, Retriever, compareStrategies, createRetriever } from './retriever.js';
