/**
 * Terraform Output Parsing Tests
 * ==============================
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { classifyLines, parseTerraformOutput, parseValidateJson } from '../index.js';
import { commandResult, validateJson } from '../../tests/utils/fixtures.js';

const UNSUPPORTED_ARGUMENT = {
  severity: 'error',
  summary: 'Unsupported argument',
  detail: 'An argument named "acl" is not expected here.',
  range: { filename: 'main.tf', start: { line: 3, column: 3 } },
};

describe('parseValidateJson', () => {
  it('should return null for non-document output', () => {
    assert.equal(parseValidateJson(''), null);
    assert.equal(parseValidateJson('Success! The configuration is valid.'), null);
    assert.equal(parseValidateJson('{ not json'), null);
    assert.equal(parseValidateJson('{"format_version":"1.0"}'), null);
  });

  it('should return no diagnostics for a valid document', () => {
    assert.deepEqual(parseValidateJson(validateJson(true)), []);
  });

  it('should join summary and detail and locate by file and line', () => {
    assert.deepEqual(parseValidateJson(validateJson(false, [UNSUPPORTED_ARGUMENT])), [
      {
        severity: 'error',
        message: 'Unsupported argument: An argument named "acl" is not expected here.',
        location: 'main.tf:3',
        source: 'terraform',
      },
    ]);
  });

  it('should keep warnings and fall back to the filename', () => {
    const warning = { severity: 'warning', summary: 'Deprecated attribute', range: { filename: 'main.tf' } };

    assert.deepEqual(parseValidateJson(validateJson(true, [warning])), [
      { severity: 'warning', message: 'Deprecated attribute', location: 'main.tf', source: 'terraform' },
    ]);
  });

  it('should add an error when invalid is reported without one', () => {
    assert.deepEqual(parseValidateJson(validateJson(false)), [
      { severity: 'error', message: 'Terraform reported the configuration as invalid', source: 'terraform' },
    ]);
  });
});

describe('classifyLines', () => {
  it('should read boxed human-readable errors with their source line', () => {
    const text = [
      '',
      '╷',
      '│ Error: Missing required argument',
      '│ ',
      '│   on main.tf line 4, in resource "aws_instance" "web":',
      '│    4: resource "aws_instance" "web" {',
      '╵',
      'Warning: Argument is deprecated',
    ].join('\n');

    assert.deepEqual(classifyLines(text), [
      { severity: 'error', message: 'Missing required argument', location: 'main.tf:4', source: 'terraform' },
      { severity: 'warning', message: 'Argument is deprecated', source: 'terraform' },
    ]);
  });

  it('should ignore unclassified lines', () => {
    assert.deepEqual(classifyLines('Initializing the backend...\nTerraform has been successfully initialized!'), []);
  });
});

describe('parseTerraformOutput', () => {
  it('should trust a JSON document from a successful command over stderr', () => {
    const result = commandResult({ stdout: validateJson(true), stderr: 'plugin noise' });
    assert.deepEqual(parseTerraformOutput(result, 'validate', true), []);
  });

  it('should use stderr when nothing was classified', () => {
    const result = commandResult({ exit_code: 1, stderr: '  something broke\n' });
    assert.deepEqual(parseTerraformOutput(result, 'init', false), [
      { severity: 'error', message: 'something broke', source: 'terraform' },
    ]);
  });

  it('should keep stderr from a failed command beside its JSON diagnostics', () => {
    const result = commandResult({
      exit_code: 1,
      stdout: validateJson(false, [UNSUPPORTED_ARGUMENT]),
      stderr: 'Failed to load plugin schemas\n',
    });

    assert.deepEqual(parseTerraformOutput(result, 'validate', true), [
      {
        severity: 'error',
        message: 'Unsupported argument: An argument named "acl" is not expected here.',
        location: 'main.tf:3',
        source: 'terraform',
      },
      { severity: 'error', message: 'Failed to load plugin schemas', source: 'terraform' },
    ]);
  });

  it('should not repeat stderr that a JSON diagnostic already reports', () => {
    const result = commandResult({
      exit_code: 1,
      stdout: validateJson(false, [UNSUPPORTED_ARGUMENT]),
      stderr: 'Error: Unsupported argument: An argument named "acl" is not expected here.',
    });

    assert.equal(parseTerraformOutput(result, 'validate', true).length, 1);
  });

  it('should name the exit code when there is no output', () => {
    const result = commandResult({ exit_code: 3 });
    assert.deepEqual(parseTerraformOutput(result, 'validate', true), [
      { severity: 'error', message: 'terraform validate exited with code 3', source: 'terraform' },
    ]);
  });

  it('should classify human-readable output when JSON is not expected', () => {
    const result = commandResult({ exit_code: 1, stdout: validateJson(false), stderr: 'Error: Invalid block' });
    assert.deepEqual(
      parseTerraformOutput(result, 'init', false).map((d) => d.message),
      ['Invalid block']
    );
  });
});
