import { describe, it, before, after } from 'node:test';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadSettings } from '../src/config/settings.js';

let dir = '';

function writeConfig(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

describe('loadSettings', () => {
  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'json-facade-settings-'));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('defaults to no log and no guardrails', () => {
    assert.deepEqual(loadSettings({}), { logPath: null, guardrails: null });
  });

  it('enables guardrails from the environment with default caps', () => {
    assert.deepEqual(loadSettings({ JSON_FACADE_GUARDRAILS: 'true' }), {
      logPath: null,
      guardrails: { maxDecodedSize: 10485760, maxDepth: 32 }
    });
  });

  it('reads caps and log path from the environment', () => {
    assert.deepEqual(
      loadSettings({
        JSON_FACADE_LOG: 'reports/json.log.jsonl',
        JSON_FACADE_GUARDRAILS: 'TRUE',
        JSON_FACADE_MAX_DECODED_SIZE: '256',
        JSON_FACADE_MAX_DEPTH: '4'
      }),
      { logPath: 'reports/json.log.jsonl', guardrails: { maxDecodedSize: 256, maxDepth: 4 } }
    );
  });

  it('rejects a malformed cap', () => {
    assert.throws(
      () => loadSettings({ JSON_FACADE_GUARDRAILS: 'true', JSON_FACADE_MAX_DEPTH: 'deep' }),
      { message: 'JSON_FACADE_MAX_DEPTH must be a non-negative integer, got "deep"' }
    );
  });

  it('rejects caps with trailing text or a fraction, as the file does', () => {
    for (const raw of ['12abc', '1.5', '-1']) {
      assert.throws(() => loadSettings({ JSON_FACADE_MAX_DECODED_SIZE: raw }), {
        message: `JSON_FACADE_MAX_DECODED_SIZE must be a non-negative integer, got "${raw}"`
      });
    }
    assert.equal(loadSettings({ JSON_FACADE_GUARDRAILS: 'true', JSON_FACADE_MAX_DEPTH: ' 7 ' }).guardrails?.maxDepth, 7);
  });

  it('accepts only true or false for the guardrails switch', () => {
    assert.equal(loadSettings({ JSON_FACADE_GUARDRAILS: ' False ' }).guardrails, null);
    for (const raw of ['1', 'yes', 'on']) {
      assert.throws(() => loadSettings({ JSON_FACADE_GUARDRAILS: raw }), {
        message: `JSON_FACADE_GUARDRAILS must be "true" or "false", got "${raw}"`
      });
    }
  });

  it('loads a YAML settings file', () => {
    const file = writeConfig(
      'settings.yaml',
      ['log: /var/log/json-facade.jsonl', 'guardrails:', '  maxDecodedSize: 1024', '  maxDepth: 8', ''].join('\n')
    );
    assert.deepEqual(loadSettings({ JSON_FACADE_CONFIG: file }), {
      logPath: '/var/log/json-facade.jsonl',
      guardrails: { maxDecodedSize: 1024, maxDepth: 8 }
    });
  });

  it('lets the environment override the file', () => {
    const file = writeConfig('override.yaml', ['guardrails:', '  enabled: true', '  maxDepth: 8', ''].join('\n'));
    assert.deepEqual(loadSettings({ JSON_FACADE_CONFIG: file, JSON_FACADE_MAX_DEPTH: '2' }).guardrails, {
      maxDecodedSize: 10485760,
      maxDepth: 2
    });
    assert.equal(loadSettings({ JSON_FACADE_CONFIG: file, JSON_FACADE_GUARDRAILS: 'false' }).guardrails, null);
  });

  it('keeps guardrails off when the file disables them', () => {
    const file = writeConfig('disabled.yaml', ['guardrails:', '  enabled: false', ''].join('\n'));
    assert.equal(loadSettings({ JSON_FACADE_CONFIG: file }).guardrails, null);
  });

  it('accepts an empty file', () => {
    const file = writeConfig('empty.yaml', '');
    assert.deepEqual(loadSettings({ JSON_FACADE_CONFIG: file }), { logPath: null, guardrails: null });
  });

  it('names the offending field in a malformed file', () => {
    const file = writeConfig('bad.yaml', ['guardrails:', '  maxDepth: lots', ''].join('\n'));
    assert.throws(() => loadSettings({ JSON_FACADE_CONFIG: file }), {
      message: `${file}: guardrails.maxDepth must be a non-negative integer`
    });
    const list = writeConfig('list.yaml', '- a\n- b\n');
    assert.throws(() => loadSettings({ JSON_FACADE_CONFIG: list }), {
      message: `${list}: settings must be a mapping`
    });
  });
});
