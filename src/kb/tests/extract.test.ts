/**
 * Term Extraction Tests
 * =====================
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  STOPWORDS,
  deriveKeywords,
  deriveTitle,
  detectRequestResources,
  extractResourceTypes,
  normalizeKeywords,
  normalizeResourceTypes,
  parseVocabulary,
  termComponents,
  tokenize,
} from '../extract.js';

describe('tokenize', () => {
  it('should drop stop words and short words', () => {
    assert.deepEqual(tokenize('Create an S3 bucket'), ['bucket']);
  });

  it('should keep underscore terms and add their components', () => {
    assert.deepEqual(tokenize('Deploy aws_s3_bucket with versioning'), [
      'aws',
      'aws_s3_bucket',
      'bucket',
      'deploy',
      'versioning',
    ]);
  });

  it('should return nothing for blank or stop-word-only text', () => {
    assert.deepEqual(tokenize(''), []);
    assert.deepEqual(tokenize('   '), []);
    assert.deepEqual(tokenize('the and of'), []);
  });

  it('should load the stop word list', () => {
    assert.equal(STOPWORDS.has('create'), true);
    assert.equal(STOPWORDS.has('bucket'), false);
  });
});

describe('termComponents', () => {
  it('should split underscore terms into meaningful parts', () => {
    assert.deepEqual(termComponents('aws_s3_bucket'), ['aws', 'bucket']);
    assert.deepEqual(termComponents('aws_lambda_function'), ['aws', 'lambda', 'function']);
  });

  it('should return nothing for plain words', () => {
    assert.deepEqual(termComponents('bucket'), []);
  });
});

describe('detectRequestResources', () => {
  it('should map service names to resource types', () => {
    assert.deepEqual(detectRequestResources('Create an S3 bucket'), ['aws_s3_bucket']);
  });

  it('should match multi-word service names', () => {
    assert.deepEqual(detectRequestResources('EC2 instance behind a load balancer with a security group'), [
      'aws_instance',
      'aws_lb',
      'aws_security_group',
    ]);
  });

  it('should pick up explicit resource types without matching inside them', () => {
    assert.deepEqual(detectRequestResources('Attach aws_iam_role to the lambda'), [
      'aws_iam_role',
      'aws_lambda_function',
    ]);
  });

  it('should return nothing when no service is named', () => {
    assert.deepEqual(detectRequestResources('enable versioning'), []);
  });
});

describe('extractResourceTypes', () => {
  it('should collect declared types lower-cased and distinct', () => {
    const code = [
      'resource "AWS_S3_Bucket" "b" {}',
      'resource "aws_s3_bucket_versioning" "v" {}',
      'resource  "aws_s3_bucket" "c" {}',
      'data "aws_ami" "ubuntu" {}',
    ].join('\n');

    assert.deepEqual(extractResourceTypes(code), ['aws_s3_bucket', 'aws_s3_bucket_versioning']);
  });

  it('should return nothing for code without resources', () => {
    assert.deepEqual(extractResourceTypes('variable "region" {}'), []);
  });
});

describe('normalization', () => {
  it('should normalize keywords and add components', () => {
    assert.deepEqual(normalizeKeywords([' S3_Bucket ', '', 'logs', 'logs']), ['bucket', 'logs', 's3_bucket']);
  });

  it('should be idempotent', () => {
    const once = normalizeKeywords(['aws_vpc', 'Network']);
    assert.deepEqual(normalizeKeywords(once), once);
  });

  it('should normalize resource types', () => {
    assert.deepEqual(normalizeResourceTypes([' AWS_VPC', 'aws_vpc', '']), ['aws_vpc']);
  });
});

describe('metadata fallback', () => {
  it('should take the first 70 characters of the prompt as title', () => {
    assert.equal(deriveTitle('x'.repeat(100)), 'x'.repeat(70));
    assert.equal(deriveTitle('  Create a VPC  '), 'Create a VPC');
  });

  it('should take distinct alphanumeric words longer than three characters', () => {
    assert.deepEqual(deriveKeywords('Create an S3 bucket with versioning enabled, and tags.'), [
      'create',
      'bucket',
      'with',
      'versioning',
    ]);
    assert.deepEqual(deriveKeywords('Bucket bucket BUCKET logs'), ['bucket', 'logs']);
  });

  it('should stop at seven keywords', () => {
    assert.deepEqual(deriveKeywords('alpha bravo charlie delta echoo foxtrot golf hotel india'), [
      'alpha',
      'bravo',
      'charlie',
      'delta',
      'echoo',
      'foxtrot',
      'golf',
    ]);
  });

  it('should return nothing for an empty prompt', () => {
    assert.deepEqual(deriveKeywords(''), []);
  });
});

describe('parseVocabulary', () => {
  it('should read stop words and service terms', () => {
    const text = '{"stopwords":["the"],"services":[{"term":"bucket","resource":"aws_s3_bucket"}]}';

    assert.deepEqual(parseVocabulary(text, 'vocab.json'), {
      stopwords: ['the'],
      services: [{ term: 'bucket', resource: 'aws_s3_bucket' }],
    });
  });

  it('should reject a service without a resource', () => {
    assert.throws(
      () => parseVocabulary('{"stopwords":[],"services":[{"term":"bucket"}]}', 'vocab.json'),
      /^Error: vocab\.json: each service needs a "term" and a "resource"$/
    );
  });

  it('should reject a document without word lists', () => {
    assert.throws(() => parseVocabulary('[]', 'vocab.json'), /vocab\.json: expected an object/);
  });
});
