#!/usr/bin/env node
/**
 * Knowledge Base CLI
 * ==================
 *
 * Usage:
 *   iacgen-kb build <dataset.jsonl> <out.jsonl>
 *   iacgen-kb stats <kb.jsonl>
 *   iacgen-kb query <kb.jsonl> <text> [--strategy keyword|graph] [--top-k n] [--compare]
 *
 * Exit codes:
 *   0 - OK
 *   1 - IO or usage error, or no usable records
 *
 * Output is canonical JSON on stdout; skipped-line warnings go to stderr.
 */

import { readFile } from 'node:fs/promises';
import { KnowledgeBase } from '../kb/knowledge_base.js';
import { loadKnowledgeBase, parseSourceRecordLines, saveKnowledgeBase } from '../kb/persistence.js';
import type { RetrievalResult } from '../kb/types.js';
import { compareStrategies, createRetriever } from '../rag/retriever.js';
import { canonicalize } from '../utils/canonical.js';
import { createLogger, type LogSink, type Logger } from '../utils/log.js';
import { EXIT_IO_ERROR, EXIT_OK, parseKbArgs, type KbCommand } from './args.js';

const USAGE = `Usage: iacgen-kb <command> [options]

Commands:
  build <dataset.jsonl> <out.jsonl>   Build a knowledge base from { prompt, iac_code } records
  stats <kb.jsonl>                    Print knowledge base and graph statistics
  query <kb.jsonl> <text>             Rank snippets against a request

Query options:
  --strategy <name>   keyword | graph (default: keyword)
  --top-k <n>         Results to return (default: 3)
  --compare           Run both strategies side by side

Exit codes:
  0 - OK
  1 - IO or usage error`;

const stderrSink: LogSink = {
  error: (line) => console.error(line),
  warn: (line) => console.error(line),
  log: (line) => console.error(line),
};

function describeHits(result: RetrievalResult): Array<{ rank: number; id: string; score: number; title: string }> {
  return result.map((hit) => ({ rank: hit.rank, id: hit.record.id, score: hit.score, title: hit.record.title }));
}

async function build(datasetPath: string, outputPath: string, logger: Logger): Promise<void> {
  const parsed = parseSourceRecordLines(await readFile(datasetPath, 'utf-8'));
  for (const issue of parsed.issues) {
    logger.warn(`${datasetPath}:${issue.line}: skipped (${issue.message})`);
  }

  const kb = KnowledgeBase.build(parsed.records);
  await saveKnowledgeBase(kb, outputPath);
  logger.info(`wrote ${kb.size} snippets to ${outputPath}`);
  console.log(canonicalize({ output: outputPath, skipped_malformed: parsed.skipped, ...kb.report }));
}

async function run(command: KbCommand, logger: Logger): Promise<void> {
  switch (command.command) {
    case 'build':
      return build(command.datasetPath, command.outputPath, logger);

    case 'stats': {
      const { kb, skipped } = await loadKnowledgeBase(command.kbPath, logger);
      const graph = createRetriever(kb, { strategy: 'graph' }).graphStats();
      console.log(canonicalize({ ...kb.stats(), skipped_malformed: skipped, graph }));
      return;
    }

    case 'query': {
      const { kb } = await loadKnowledgeBase(command.kbPath, logger);
      if (command.compare) {
        const comparison = compareStrategies(kb, command.text, command.topK);
        console.log(
          canonicalize({
            ...comparison,
            keyword: describeHits(comparison.keyword),
            graph: describeHits(comparison.graph),
          })
        );
        return;
      }
      const retriever = createRetriever(kb, { strategy: command.strategy, topK: command.topK, logger });
      console.log(canonicalize({ request: command.text, strategy: command.strategy, results: describeHits(retriever.query(command.text)) }));
      return;
    }
  }
}

async function main(): Promise<number> {
  const parsed = parseKbArgs(process.argv.slice(2));
  if (parsed.kind === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (parsed.kind === 'error') {
    console.error(`ERROR: ${parsed.error}\n\n${USAGE}`);
    return EXIT_IO_ERROR;
  }

  await run(parsed.value, createLogger('iacgen-kb', 'info', stderrSink));
  return EXIT_OK;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`IO_ERROR: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(EXIT_IO_ERROR);
  }
);
