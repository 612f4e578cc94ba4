/**
 * Knowledge Base Exports
 * ======================
 */

export type {
  SnippetRecord,
  SourceRecord,
  SnippetMetadata,
  PersistedSnippet,
  BuildReport,
  KnowledgeBaseStats,
  RetrievedSnippet,
  RetrievalResult,
} from './types.js';
export { EmptyDatasetError } from './types.js';

export type { ServiceTerm, Vocabulary } from './extract.js';
export {
  STOPWORDS,
  VOCABULARY_PATH,
  deriveKeywords,
  deriveTitle,
  detectRequestResources,
  extractResourceTypes,
  normalizeKeywords,
  normalizeResourceTypes,
  parseVocabulary,
  sortedUnique,
  termComponents,
  tokenize,
} from './extract.js';

export { DEFAULT_TOP_K, KnowledgeBase, buildKnowledgeBase } from './knowledge_base.js';

export type { LineIssue, ParsedLines, LoadedKnowledgeBase } from './persistence.js';
export {
  loadKnowledgeBase,
  parseKnowledgeBaseLines,
  parseSourceRecordLines,
  saveKnowledgeBase,
  serializeKnowledgeBase,
} from './persistence.js';
