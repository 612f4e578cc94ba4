/**
 * Configuration Tests
 * ===================
 */

import { after, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  ConfigError,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  collectConfigIssues,
  loadConfig,
  mergeConfig,
  overridesFromEnv,
  overridesFromJson,
  sessionConfigOf,
  validateConfig,
} from '../index.js';

const root = mkdtempSync(join(tmpdir(), 'iacgen-config-test-'));
let dirCount = 0;

after(() => {
  rmSync(root, { recursive: true, force: true });
});

/**
 * Fresh directory, optionally holding iacgen.config.json.
 */
function workdir(config?: unknown): string {
  const dir = join(root, `case_${dirCount++}`);
  mkdirSync(dir);
  if (config !== undefined) {
    writeFileSync(join(dir, DEFAULT_CONFIG_FILE), JSON.stringify(config));
  }
  return dir;
}

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  assert.fail('expected a ConfigError');
}

// =============================================================================
// loadConfig
// =============================================================================

describe('loadConfig', () => {
  it('should return the defaults when nothing is configured', () => {
    assert.deepEqual(loadConfig({ cwd: workdir(), env: {} }), DEFAULT_CONFIG);
  });

  it('should read iacgen.config.json from the working directory', () => {
    const cwd = workdir({
      model: { provider: 'openai', model: 'gpt-4o', enable_resilience: true },
      session: { maxRetries: 4, retrievalStrategy: 'graph' },
      validation: { mode: 'heuristic' },
      knowledge_base: { path: 'data/kb.jsonl' },
      log_level: 'debug',
    });

    const config = loadConfig({ cwd, env: {} });

    assert.equal(config.model.provider, 'openai');
    assert.equal(config.model.model, 'gpt-4o');
    assert.equal(config.model.enable_resilience, true);
    assert.equal(config.model.timeout_ms, DEFAULT_CONFIG.model.timeout_ms);
    assert.equal(config.session.maxRetries, 4);
    assert.equal(config.session.retrievalStrategy, 'graph');
    assert.equal(config.session.topK, DEFAULT_CONFIG.session.topK);
    assert.equal(config.validation.mode, 'heuristic');
    assert.equal(config.knowledge_base.path, 'data/kb.jsonl');
    assert.equal(config.log_level, 'debug');
  });

  it('should apply file, then environment, then overrides', () => {
    const cwd = workdir({ session: { maxRetries: 4, topK: 2 } });
    const env = { IAC_MAX_RETRIES: '1' };

    const fromEnv = loadConfig({ cwd, env });
    assert.equal(fromEnv.session.maxRetries, 1);
    assert.equal(fromEnv.session.topK, 2);

    const fromFlags = loadConfig({ cwd, env, overrides: { session: { maxRetries: 0 } } });
    assert.equal(fromFlags.session.maxRetries, 0);
    assert.equal(fromFlags.session.topK, 2);
  });

  it('should resolve an explicit path against the working directory', () => {
    const cwd = workdir();
    writeFileSync(join(cwd, 'custom.json'), JSON.stringify({ validation: { timeoutMs: 5000 } }));

    assert.equal(loadConfig({ cwd, env: {}, path: 'custom.json' }).validation.timeoutMs, 5000);
  });

  it('should fail when an explicit file is missing', () => {
    const cwd = workdir();
    const issues = issuesOf(() => loadConfig({ cwd, env: {}, path: 'missing.json' }));

    assert.equal(issues.length, 1);
    assert.ok(issues[0]?.startsWith(`Cannot read config file ${join(cwd, 'missing.json')}: `));
  });

  it('should fail on malformed JSON', () => {
    const cwd = workdir();
    writeFileSync(join(cwd, DEFAULT_CONFIG_FILE), '{ "session": ');

    const issues = issuesOf(() => loadConfig({ cwd, env: {} }));
    assert.equal(issues.length, 1);
    assert.ok(issues[0]?.startsWith(`Config file ${join(cwd, DEFAULT_CONFIG_FILE)} is not valid JSON: `));
  });

  it('should report every problem at once', () => {
    const cwd = workdir({ model: { provider: 'gemini', temperature: 'hot' }, session: { topK: 0 }, extra: 1 });

    const issues = issuesOf(() => loadConfig({ cwd, env: { IAC_BEST_EFFORT: 'maybe' } }));

    assert.deepEqual(issues, [
      'model.provider must be one of anthropic, openai, mock (got "gemini")',
      'model.temperature must be a number',
      'Unknown key: extra',
      'IAC_BEST_EFFORT must be a boolean (got "maybe")',
      'session.topK must be an integer >= 1',
    ]);
  });

  it('should list the issues in the error message', () => {
    const cwd = workdir({ session: { topK: 0, maxRetries: -1 } });

    assert.throws(
      () => loadConfig({ cwd, env: {} }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.equal(err.name, 'ConfigError');
        assert.equal(
          err.message,
          'Invalid configuration:\n  - session.maxRetries must be a non-negative integer\n  - session.topK must be an integer >= 1'
        );
        return true;
      }
    );
  });
});

// =============================================================================
// Sources
// =============================================================================

describe('overridesFromJson', () => {
  it('should reject a non-object document', () => {
    const issues: string[] = [];
    assert.deepEqual(overridesFromJson([1, 2], issues), {});
    assert.deepEqual(issues, ['Config file must contain a JSON object']);
  });

  it('should type-check each section', () => {
    const issues: string[] = [];
    overridesFromJson(
      { session: 'fast', validation: { mode: 'tflint', terraformPath: 7, verbose: true }, knowledge_base: { path: 'kb.jsonl' } },
      issues
    );

    assert.deepEqual(issues, [
      'session must be an object',
      'validation.mode must be one of terraform, heuristic (got "tflint")',
      'validation.terraformPath must be a string',
      'Unknown key: validation.verbose',
    ]);
  });
});

describe('overridesFromEnv', () => {
  it('should map IAC_* variables onto sections', () => {
    const issues: string[] = [];
    const overrides = overridesFromEnv(
      {
        IAC_PROVIDER: 'OpenAI',
        IAC_MODEL: '  ',
        IAC_MAX_TOKENS: '2048',
        IAC_TOP_K: '5',
        IAC_BEST_EFFORT: 'yes',
        IAC_VALIDATION_MODE: 'heuristic',
        IAC_KB_FILE: 'kb.jsonl',
        IAC_LOG_LEVEL: 'debug',
      },
      issues
    );

    assert.deepEqual(issues, []);
    assert.deepEqual(overrides, {
      model: { provider: 'openai', max_output_tokens: 2048 },
      session: { topK: 5, bestEffortAcceptance: true },
      validation: { mode: 'heuristic' },
      knowledge_base: { path: 'kb.jsonl' },
      log_level: 'debug',
    });
  });

  it('should report malformed values', () => {
    const issues: string[] = [];
    overridesFromEnv({ IAC_TOP_K: 'three', IAC_RETRIEVAL_STRATEGY: 'Vector', IAC_BEST_EFFORT: 'off' }, issues);

    assert.deepEqual(issues, [
      'IAC_TOP_K must be an integer (got "three")',
      'IAC_RETRIEVAL_STRATEGY must be one of keyword, graph (got "vector")',
    ]);
  });
});

// =============================================================================
// Validation
// =============================================================================

describe('collectConfigIssues', () => {
  it('should accept the defaults', () => {
    assert.deepEqual(collectConfigIssues(DEFAULT_CONFIG), []);
    assert.equal(validateConfig(DEFAULT_CONFIG), DEFAULT_CONFIG);
  });

  it('should check ranges across sections', () => {
    const config = mergeConfig(DEFAULT_CONFIG, {
      model: { model: ' ', temperature: 3, max_output_tokens: 1.5, timeout_ms: 0 },
      session: { contextCharBudget: 0, modelTimeoutMs: -1 },
      validation: { terraformPath: '', timeoutMs: 0 },
      knowledge_base: { path: '' },
    });

    assert.deepEqual(collectConfigIssues(config), [
      'model.model must not be empty',
      'model.temperature must be between 0 and 2',
      'model.max_output_tokens must be a positive integer',
      'model.timeout_ms must be positive',
      'session.contextCharBudget must be a positive integer',
      'session.modelTimeoutMs must be positive',
      'validation.terraformPath must not be empty',
      'validation.timeoutMs must be positive',
      'knowledge_base.path must not be empty',
    ]);
  });
});

describe('sessionConfigOf', () => {
  it('should fold the model output cap into the session', () => {
    const config = mergeConfig(DEFAULT_CONFIG, { model: { max_output_tokens: 2048 } });
    assert.equal(sessionConfigOf(config).maxOutputTokens, 2048);
    assert.equal(sessionConfigOf(DEFAULT_CONFIG).maxOutputTokens, undefined);
  });

  it('should keep an explicit session cap', () => {
    const config = mergeConfig(DEFAULT_CONFIG, { model: { max_output_tokens: 2048 }, session: { maxOutputTokens: 512 } });
    assert.equal(sessionConfigOf(config).maxOutputTokens, 512);
  });
});
