/**
 * Adapter Factory Tests
 * =====================
 *
 * Construction only; no request leaves the process.
 */

import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  AdapterError,
  ClaudeAdapter,
  MockModelAdapter,
  OpenAIAdapter,
  ResilientAdapter,
  createAdapter,
  getConfiguredProvider,
  getDefaultModel,
  isAdapterProvider,
} from '../index.js';

const KEYS = ['ANTHROPIC_API_KEY', 'OPENAI_API_KEY'] as const;

describe('createAdapter', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('should create an echoing mock adapter', async () => {
    const adapter = createAdapter({ provider: 'mock', model: 'dry-run' });

    assert.ok(adapter instanceof MockModelAdapter);
    assert.equal(adapter.model_id, 'dry-run');
    const result = await adapter.transform('hello', {
      intent_id: 'request_test',
      run_id: 'session_test_a1',
      mode: 'draft',
      constraints: [],
      metadata: {},
    });
    assert.equal(result.content, 'hello');
  });

  it('should create live adapters from environment keys', () => {
    process.env['ANTHROPIC_API_KEY'] = 'test-secret';
    process.env['OPENAI_API_KEY'] = 'test-secret';

    const claude = createAdapter({ provider: 'anthropic' });
    assert.ok(claude instanceof ClaudeAdapter);
    assert.equal(claude.model_id, getDefaultModel('anthropic'));

    const openai = createAdapter({ provider: 'openai', model: 'gpt-4o' });
    assert.ok(openai instanceof OpenAIAdapter);
    assert.equal(openai.model_id, 'gpt-4o');
  });

  it('should fail without an API key', () => {
    assert.throws(
      () => createAdapter({ provider: 'anthropic' }),
      (err: unknown) => err instanceof AdapterError && err.message.includes('ANTHROPIC_API_KEY')
    );
  });

  it('should reject unknown models for a provider', () => {
    process.env['OPENAI_API_KEY'] = 'test-secret';

    assert.throws(
      () => createAdapter({ provider: 'openai', model: 'not-a-model' }),
      (err: unknown) =>
        err instanceof AdapterError && err.code === 'INVALID_REQUEST' && err.message === 'Unknown OpenAI model: not-a-model'
    );
  });

  it('should wrap in ResilientAdapter when resilience is enabled', () => {
    const adapter = createAdapter({ provider: 'mock', enable_resilience: true });

    assert.ok(adapter instanceof ResilientAdapter);
    assert.equal(adapter.model_id, 'mock');
  });

  it('should pick the provider from configured keys', () => {
    assert.equal(getConfiguredProvider(), null);
    process.env['OPENAI_API_KEY'] = 'test-secret';
    assert.equal(getConfiguredProvider(), 'openai');
    process.env['ANTHROPIC_API_KEY'] = 'test-secret';
    assert.equal(getConfiguredProvider(), 'anthropic');
  });
});

describe('isAdapterProvider', () => {
  it('should accept known providers only', () => {
    assert.equal(isAdapterProvider('anthropic'), true);
    assert.equal(isAdapterProvider('openai'), true);
    assert.equal(isAdapterProvider('mock'), true);
    assert.equal(isAdapterProvider('gemini'), false);
  });
});
