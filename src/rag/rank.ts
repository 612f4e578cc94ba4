/**
 * Ranking
 * =======
 */

import type { RetrievalResult, RetrievedSnippet, SnippetRecord } from '../kb/types.js';
import { isEmptyRequest, type RequestProfile } from './request.js';
import type { RetrievalStrategy } from './strategies.js';

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Score every record, drop zero scores, order by score descending then id
 * ascending, and keep the first `topK`.
 */
export function rankSnippets(
  records: readonly SnippetRecord[],
  request: RequestProfile,
  strategy: RetrievalStrategy,
  topK: number
): RetrievalResult {
  const limit = Math.floor(topK);
  if (!(limit > 0) || records.length === 0 || isEmptyRequest(request)) {
    return [];
  }

  const scored: Array<{ record: SnippetRecord; score: number }> = [];
  for (const record of records) {
    const score = strategy.score(request, record);
    if (score > 0) scored.push({ record, score });
  }

  scored.sort((a, b) => b.score - a.score || compareIds(a.record.id, b.record.id));

  return scored.slice(0, limit).map(
    ({ record, score }, index): RetrievedSnippet => ({ record, score, rank: index + 1 })
  );
}
