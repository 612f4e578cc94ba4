/**
 * Knowledge Base Tests
 * ====================
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { deriveId } from '../../utils/canonical.js';
import { EmptyDatasetError, KnowledgeBase, buildKnowledgeBase } from '../index.js';
import type { SourceRecord } from '../index.js';
import { SNIPPETS } from '../../tests/utils/fixtures.js';

const S3_PROMPT = 'Create an S3 bucket with versioning';
const S3_CODE = 'resource "aws_s3_bucket" "b" {}';

describe('KnowledgeBase.build', () => {
  const sources: SourceRecord[] = [
    { prompt: S3_PROMPT, iac_code: S3_CODE },
    { prompt: 'Nothing here', iac_code: '   ' },
    {
      id: 'vpc',
      prompt: 'A VPC',
      iac_code: 'resource "aws_vpc" "main" {}',
      title: '  Main VPC  ',
      keywords: ['Network', 'VPC'],
    },
    { id: 'vpc', prompt: 'Another VPC', iac_code: 'resource "aws_vpc" "other" {}' },
  ];

  it('should skip empty code and repeated ids and report both', () => {
    const kb = buildKnowledgeBase(sources);

    assert.equal(kb.size, 2);
    assert.deepEqual(kb.report, { accepted: 2, skipped_empty: 1, skipped_duplicate: 1 });
  });

  it('should derive id, title and keywords from the prompt when absent', () => {
    const kb = buildKnowledgeBase(sources);
    const id = deriveId('snippet', { prompt: S3_PROMPT, iac_code: S3_CODE });
    const record = kb.get(id);

    assert.ok(record);
    assert.equal(record.title, S3_PROMPT);
    assert.deepEqual(record.keywords, ['bucket', 'create', 'versioning', 'with']);
    assert.deepEqual(record.resourceTypes, ['aws_s3_bucket']);
    assert.equal(record.sourcePrompt, S3_PROMPT);
  });

  it('should keep the first record for a repeated id', () => {
    const record = buildKnowledgeBase(sources).get('vpc');

    assert.ok(record);
    assert.equal(record.title, 'Main VPC');
    assert.deepEqual(record.keywords, ['network', 'vpc']);
    assert.equal(record.content, 'resource "aws_vpc" "main" {}');
  });

  it('should use supplied metadata before prompt-derived values', () => {
    const kb = KnowledgeBase.build(
      [{ id: 'fn', prompt: 'Deploy lambda', iac_code: 'resource "aws_lambda_function" "f" {}' }],
      new Map([['fn', { title: 'Lambda function', keywords: ['serverless'] }]])
    );
    const record = kb.get('fn');

    assert.ok(record);
    assert.equal(record.title, 'Lambda function');
    assert.deepEqual(record.keywords, ['serverless']);
  });

  it('should fall back to the id as title without a prompt', () => {
    const record = buildKnowledgeBase([{ id: 'bare', iac_code: 'resource "aws_vpc" "v" {}' }]).get('bare');

    assert.ok(record);
    assert.equal(record.title, 'bare');
    assert.deepEqual(record.keywords, []);
  });

  it('should throw EmptyDatasetError when nothing is usable', () => {
    assert.throws(
      () => buildKnowledgeBase([{ iac_code: '' }, { iac_code: '\n' }]),
      (err: unknown) => {
        assert.ok(err instanceof EmptyDatasetError);
        assert.equal(err.code, 'EMPTY_DATASET');
        assert.equal(err.message, 'No usable records (2 empty, 0 duplicate)');
        assert.deepEqual(err.report, { accepted: 0, skipped_empty: 2, skipped_duplicate: 0 });
        return true;
      }
    );
    assert.throws(() => buildKnowledgeBase([]), EmptyDatasetError);
  });
});

describe('KnowledgeBase read access', () => {
  const kb = KnowledgeBase.fromSnippets(SNIPPETS);

  it('should expose records in build order', () => {
    assert.deepEqual(
      kb.all().map((r) => r.id),
      ['s3_basic', 's3_versioning', 'ec2_web', 'vpc_main']
    );
    assert.equal(kb.has('ec2_web'), true);
    assert.equal(kb.has('missing'), false);
    assert.equal(kb.get('missing'), undefined);
  });

  it('should derive resource types from content when not persisted', () => {
    assert.deepEqual(kb.get('s3_versioning')?.resourceTypes, ['aws_s3_bucket', 'aws_s3_bucket_versioning']);
  });

  it('should freeze records', () => {
    const record = kb.get('vpc_main');
    assert.ok(record);
    assert.equal(Object.isFrozen(record), true);
    assert.equal(Object.isFrozen(record.keywords), true);
  });

  it('should report statistics', () => {
    assert.deepEqual(kb.stats(), {
      total_snippets: 4,
      unique_keywords: 7,
      unique_resource_types: 4,
      avg_keywords_per_snippet: 2,
      top_keywords: [
        { keyword: 'bucket', count: 2 },
        { keyword: 'instance', count: 1 },
        { keyword: 'logs', count: 1 },
        { keyword: 'network', count: 1 },
        { keyword: 'versioning', count: 1 },
        { keyword: 'vpc', count: 1 },
        { keyword: 'web', count: 1 },
      ],
    });
  });

  it('should rank with keyword scoring by default', () => {
    const result = kb.query('Create an S3 bucket with versioning');

    assert.deepEqual(
      result.map((hit) => [hit.record.id, hit.score, hit.rank]),
      [
        ['s3_versioning', 1, 1],
        ['s3_basic', 0.75, 2],
      ]
    );
  });

  it('should return nothing for an empty request', () => {
    assert.deepEqual(kb.query(''), []);
  });
});

describe('KnowledgeBase.empty', () => {
  it('should answer every query with an empty result', () => {
    const kb = KnowledgeBase.empty();

    assert.equal(kb.size, 0);
    assert.deepEqual(kb.query('Create an S3 bucket'), []);
    assert.equal(kb.stats().avg_keywords_per_snippet, 0);
  });
});
