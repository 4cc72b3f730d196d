import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ConfigurationBuilder, parseConfig } from '../../../src/config/configuration.js';
import { ConfigurationError } from '../../../src/errors.js';

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error('expected a ConfigurationError');
}

// ---------------------------------------------------------------------------
// parseConfig
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  test('fills every default', () => {
    expect(parseConfig({})).toEqual({
      llm: {
        provider: 'ollama',
        temperature: 0,
        maxOutputTokens: 512,
        timeoutMs: 30_000,
        maxRetries: 3,
        retryBaseDelayMs: 1_000,
        retryMaxDelayMs: 60_000,
        retryExponentialBase: 2,
      },
      logging: { level: 'info' },
      cache: { ttlMs: 3_600_000, maxSize: 1_000 },
      fuzzyMatchThreshold: 80,
      elementTimeoutMs: 5_000,
      maxResumeChars: 12_000,
    });
  });

  test('reports the failing key', () => {
    const err = configError(() => parseConfig({ fuzzyMatchThreshold: 150 }));
    expect(err.code).toBe('configuration_error');
    expect(err.context.config_key).toBe('fuzzyMatchThreshold');
  });

  test('reports nested keys with dots', () => {
    expect(configError(() => parseConfig({ llm: { temperature: 2 } })).context.config_key).toBe('llm.temperature');
    expect(configError(() => parseConfig({ llm: { maxRetries: 11 } })).context.config_key).toBe('llm.maxRetries');
  });

  test('the maximum retry delay cannot be below the base delay', () => {
    const err = configError(() => parseConfig({ llm: { retryBaseDelayMs: 5_000, retryMaxDelayMs: 1_000 } }));
    expect(err.context.config_key).toBe('llm.retryMaxDelayMs');
  });

  test('resume path and resume content are mutually exclusive', () => {
    const err = configError(() => parseConfig({ resumePath: 'cv.pdf', resumeContent: 'Ada' }));
    expect(err.context.config_key).toBe('resume');
    expect(err.message).toBe('Invalid configuration at "resume": Cannot specify both resumePath and resumeContent');
  });
});

// ---------------------------------------------------------------------------
// ConfigurationBuilder
// ---------------------------------------------------------------------------

describe('ConfigurationBuilder', () => {
  test('setters override defaults', () => {
    const config = new ConfigurationBuilder()
      .withLlmProvider('openai')
      .withLlmModel('gpt-4o-mini')
      .withLlmTemperature(0.3)
      .withLlmTimeout(10_000)
      .withLlmMaxRetries(1)
      .withLlmRetryDelays(500, 2_000, 3)
      .withLlmApiKey('test-secret')
      .withLlmBaseUrl('http://localhost:8080/v1')
      .withLogLevel('debug')
      .withCacheTtl(1_000)
      .withCacheMaxSize(5)
      .withResumeContent('Ada Lovelace')
      .withFuzzyMatchThreshold(90)
      .withElementTimeout(2_000)
      .withMaxResumeChars(4_000)
      .build();

    expect(config).toEqual({
      llm: {
        provider: 'openai',
        model: 'gpt-4o-mini',
        temperature: 0.3,
        maxOutputTokens: 512,
        timeoutMs: 10_000,
        maxRetries: 1,
        retryBaseDelayMs: 500,
        retryMaxDelayMs: 2_000,
        retryExponentialBase: 3,
        apiKey: 'test-secret',
        baseUrl: 'http://localhost:8080/v1',
      },
      logging: { level: 'debug' },
      cache: { ttlMs: 1_000, maxSize: 5 },
      resumeContent: 'Ada Lovelace',
      fuzzyMatchThreshold: 90,
      elementTimeoutMs: 2_000,
      maxResumeChars: 4_000,
    });
  });

  test('build() validates setter values', () => {
    expect(() => new ConfigurationBuilder().withElementTimeout(-1).build()).toThrow(ConfigurationError);
  });

  test('fromObject merges sections key by key', () => {
    const config = new ConfigurationBuilder()
      .withLlmModel('llama3')
      .fromObject({ llm: { provider: 'groq' }, fuzzyMatchThreshold: 70 })
      .build();

    expect(config.llm.provider).toBe('groq');
    expect(config.llm.model).toBe('llama3');
    expect(config.fuzzyMatchThreshold).toBe(70);
  });

  describe('fromFile', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'formfill-config-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    test('loads a JSON file', () => {
      const file = path.join(tmpDir, 'config.json');
      fs.writeFileSync(file, JSON.stringify({ llm: { provider: 'anthropic' }, logging: { level: 'warn' } }));

      const config = new ConfigurationBuilder().fromFile(file).build();
      expect(config.llm.provider).toBe('anthropic');
      expect(config.logging.level).toBe('warn');
    });

    test('rejects missing files, bad JSON and non-objects', () => {
      const missing = path.join(tmpDir, 'nope.json');
      expect(configError(() => new ConfigurationBuilder().fromFile(missing)).message).toBe(
        `Configuration file not found: ${missing}`,
      );

      const broken = path.join(tmpDir, 'broken.json');
      fs.writeFileSync(broken, '{ not json');
      expect(configError(() => new ConfigurationBuilder().fromFile(broken)).message).toBe(
        `Invalid JSON in configuration file: ${broken}`,
      );

      const list = path.join(tmpDir, 'list.json');
      fs.writeFileSync(list, '[1, 2]');
      expect(configError(() => new ConfigurationBuilder().fromFile(list)).message).toBe(
        `Configuration file must contain a JSON object: ${list}`,
      );
    });
  });

  describe('fromEnv', () => {
    test('reads prefixed variables', () => {
      const config = new ConfigurationBuilder()
        .fromEnv('FORM_FILLING_', {
          FORM_FILLING_LLM_PROVIDER: 'openai',
          FORM_FILLING_LLM_MODEL: 'gpt-4o-mini',
          FORM_FILLING_LLM_TEMPERATURE: '0.5',
          FORM_FILLING_LOG_LEVEL: 'DEBUG',
          FORM_FILLING_CACHE_MAX_SIZE: '10',
          FORM_FILLING_FUZZY_MATCH_THRESHOLD: '85',
          FORM_FILLING_RESUME_PATH: 'cv.pdf',
          UNRELATED: 'ignored',
        })
        .build();

      expect(config.llm).toMatchObject({ provider: 'openai', model: 'gpt-4o-mini', temperature: 0.5 });
      expect(config.logging.level).toBe('debug');
      expect(config.cache.maxSize).toBe(10);
      expect(config.fuzzyMatchThreshold).toBe(85);
      expect(config.resumePath).toBe('cv.pdf');
    });

    test('supports a custom prefix and ignores blank values', () => {
      const config = new ConfigurationBuilder()
        .withLlmProvider('gemini')
        .fromEnv('APP_', { APP_LLM_PROVIDER: '   ', APP_ELEMENT_TIMEOUT_MS: '7000' })
        .build();

      expect(config.llm.provider).toBe('gemini');
      expect(config.elementTimeoutMs).toBe(7_000);
    });

    test('rejects non-numeric numbers and unknown log levels', () => {
      const numeric = configError(() => new ConfigurationBuilder().fromEnv('FORM_FILLING_', { FORM_FILLING_LLM_TEMPERATURE: 'hot' }));
      expect(numeric.context).toEqual({ config_key: 'FORM_FILLING_LLM_TEMPERATURE', config_value: 'hot' });

      const level = configError(() => new ConfigurationBuilder().fromEnv('FORM_FILLING_', { FORM_FILLING_LOG_LEVEL: 'loud' }));
      expect(level.context.allowed_values).toEqual(['debug', 'info', 'warn', 'error']);
    });
  });
});
