import { describe, it, before, after, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';

import { configDir, defaultConfigPath, loadConfig, parseBool, parseNum } from '../src/config.js';

describe('config resolution: overrides > env > file > defaults', () => {
  let tmpDir: string;
  const savedEnv: Record<string, string | undefined> = {};

  // Env vars we might set during tests, saved and restored
  const ENV_KEYS = [
    'CHATSCOPE_ENDPOINT',
    'CHATSCOPE_API_KEY',
    'CHATSCOPE_MODEL',
    'CHATSCOPE_MAX_TOKENS',
    'CHATSCOPE_TEMPERATURE',
    'CHATSCOPE_TOP_P',
    'CHATSCOPE_TELEMETRY',
    'CHATSCOPE_RECORD_EVENTS',
    'CHATSCOPE_RECORD_CONTENT',
    'CHATSCOPE_VERBOSE',
    'CHATSCOPE_CONFIG_DIR',
    'XDG_CONFIG_HOME',
  ];

  before(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chatscope-cfg-test-'));
    for (const k of ENV_KEYS) savedEnv[k] = process.env[k];
  });

  beforeEach(() => {
    for (const k of ENV_KEYS) delete process.env[k];
  });

  after(async () => {
    for (const k of ENV_KEYS) {
      if (savedEnv[k] !== undefined) process.env[k] = savedEnv[k];
      else delete process.env[k];
    }
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeConfig(name: string, content: unknown): Promise<string> {
    const p = path.join(tmpDir, name);
    await fs.writeFile(p, typeof content === 'string' ? content : JSON.stringify(content), 'utf8');
    return p;
  }

  it('uses defaults when no config file, env, or overrides exist', async () => {
    const configPath = path.join(tmpDir, 'nonexistent.json');
    const res = await loadConfig({ configPath });

    assert.equal(res.configPath, configPath);
    assert.deepEqual(res.config, {
      endpoint: 'http://localhost:8080/v1',
      model: 'gpt-4o-mini',
      stream: true,
      telemetry: true,
      record_events: false,
      record_content: false,
      verbose: false,
    });
  });

  it('treats an empty file as no file', async () => {
    const configPath = await writeConfig('empty.json', '  \n');
    const { config } = await loadConfig({ configPath });
    assert.equal(config.model, 'gpt-4o-mini');
  });

  it('config file overrides defaults', async () => {
    const configPath = await writeConfig('file.json', {
      endpoint: 'https://file.example.test/v1/',
      model: 'file-model',
      max_tokens: 256,
      record_events: true,
    });
    const { config } = await loadConfig({ configPath });

    assert.equal(config.endpoint, 'https://file.example.test/v1');
    assert.equal(config.model, 'file-model');
    assert.equal(config.max_tokens, 256);
    assert.equal(config.record_events, true);
    assert.equal(config.telemetry, true);
  });

  it('env vars override the config file', async () => {
    const configPath = await writeConfig('env.json', { model: 'file-model', record_events: true });
    process.env.CHATSCOPE_MODEL = 'env-model';
    process.env.CHATSCOPE_TEMPERATURE = '0.7';
    process.env.CHATSCOPE_RECORD_EVENTS = 'off';
    process.env.CHATSCOPE_API_KEY = 'test-secret';

    const { config } = await loadConfig({ configPath });

    assert.equal(config.model, 'env-model');
    assert.equal(config.temperature, 0.7);
    assert.equal(config.record_events, false);
    assert.equal(config.api_key, 'test-secret');
  });

  it('overrides beat env vars and undefined overrides are ignored', async () => {
    process.env.CHATSCOPE_MODEL = 'env-model';
    process.env.CHATSCOPE_TEMPERATURE = '0.7';

    const { config } = await loadConfig({
      configPath: path.join(tmpDir, 'nonexistent.json'),
      overrides: { model: 'cli-model', stream: false, temperature: undefined },
    });

    assert.equal(config.model, 'cli-model');
    assert.equal(config.stream, false);
    assert.equal(config.temperature, 0.7);
  });

  it('ignores env values that do not parse', async () => {
    process.env.CHATSCOPE_MAX_TOKENS = 'lots';
    process.env.CHATSCOPE_TELEMETRY = 'maybe';

    const { config } = await loadConfig({ configPath: path.join(tmpDir, 'nonexistent.json') });

    assert.equal(config.max_tokens, undefined);
    assert.equal(config.telemetry, true);
  });

  it('rejects a config file with invalid values', async () => {
    const configPath = await writeConfig('invalid.json', { max_tokens: -1 });
    await assert.rejects(loadConfig({ configPath }), {
      message: `Invalid config file ${configPath}: max_tokens: Number must be greater than 0`,
    });
  });

  it('rejects a config file that is not JSON', async () => {
    const configPath = await writeConfig('broken.json', '{');
    await assert.rejects(loadConfig({ configPath }), SyntaxError);
  });

  it('locates the config directory', () => {
    process.env.XDG_CONFIG_HOME = path.join(tmpDir, 'xdg');
    assert.equal(configDir(), path.join(tmpDir, 'xdg', 'chatscope'));

    process.env.CHATSCOPE_CONFIG_DIR = path.join(tmpDir, 'custom');
    assert.equal(configDir(), path.join(tmpDir, 'custom'));
    assert.equal(defaultConfigPath(), path.join(tmpDir, 'custom', 'config.json'));
  });
});

describe('env value parsing', () => {
  it('parses booleans', () => {
    assert.equal(parseBool('1'), true);
    assert.equal(parseBool('YES'), true);
    assert.equal(parseBool('off'), false);
    assert.equal(parseBool('maybe'), undefined);
    assert.equal(parseBool(undefined), undefined);
  });

  it('parses numbers', () => {
    assert.equal(parseNum('42'), 42);
    assert.equal(parseNum('0.25'), 0.25);
    assert.equal(parseNum('  '), undefined);
    assert.equal(parseNum('abc'), undefined);
  });
});
