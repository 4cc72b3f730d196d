/**
 * Form-filling configuration.
 *
 * Everything the engine needs (model provider, thresholds, timeouts, resume
 * source) is collected into one validated object and passed in at
 * construction time. Nothing downstream reads `process.env` on its own.
 *
 * Usage:
 *   const config = new ConfigurationBuilder()
 *     .fromEnv()
 *     .withLlmProvider('openai')
 *     .withLlmModel('gpt-4o-mini')
 *     .withResumePath('resume.pdf')
 *     .build();
 */

import fs from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import {
  DEFAULT_CACHE_MAX_SIZE,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_ELEMENT_TIMEOUT_MS,
  DEFAULT_ENV_PREFIX,
  DEFAULT_FUZZY_MATCH_THRESHOLD,
  DEFAULT_LLM_MAX_OUTPUT_TOKENS,
  DEFAULT_LLM_MAX_RETRIES,
  DEFAULT_LLM_PROVIDER,
  DEFAULT_LLM_RETRY_BASE_DELAY_MS,
  DEFAULT_LLM_RETRY_EXPONENTIAL_BASE,
  DEFAULT_LLM_RETRY_MAX_DELAY_MS,
  DEFAULT_LLM_TEMPERATURE,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_MAX_RESUME_CHARS,
  MAX_FUZZY_MATCH_THRESHOLD,
  MAX_LLM_RETRIES,
  MIN_FUZZY_MATCH_THRESHOLD,
} from './constants.js';

// -- Schema --

export const llmConfigSchema = z
  .object({
    provider: z.string().trim().min(1).default(DEFAULT_LLM_PROVIDER),
    /** Defaults to the provider's catalog `defaultModel`. */
    model: z.string().trim().min(1).optional(),
    temperature: z.number().min(0).max(1).default(DEFAULT_LLM_TEMPERATURE),
    maxOutputTokens: z.number().int().positive().default(DEFAULT_LLM_MAX_OUTPUT_TOKENS),
    timeoutMs: z.number().int().positive().default(DEFAULT_LLM_TIMEOUT_MS),
    maxRetries: z.number().int().min(0).max(MAX_LLM_RETRIES).default(DEFAULT_LLM_MAX_RETRIES),
    retryBaseDelayMs: z.number().positive().default(DEFAULT_LLM_RETRY_BASE_DELAY_MS),
    retryMaxDelayMs: z.number().positive().default(DEFAULT_LLM_RETRY_MAX_DELAY_MS),
    retryExponentialBase: z.number().gt(1).default(DEFAULT_LLM_RETRY_EXPONENTIAL_BASE),
    /** Overrides the provider's API-key env var. */
    apiKey: z.string().min(1).optional(),
    /** Overrides the provider's base URL (OpenAI-compatible providers). */
    baseUrl: z.string().url().optional(),
  })
  .refine((llm) => llm.retryMaxDelayMs >= llm.retryBaseDelayMs, {
    message: 'retryMaxDelayMs must be >= retryBaseDelayMs',
    path: ['retryMaxDelayMs'],
  });

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const cacheConfigSchema = z.object({
  ttlMs: z.number().int().positive().default(DEFAULT_CACHE_TTL_MS),
  maxSize: z.number().int().positive().default(DEFAULT_CACHE_MAX_SIZE),
});

export const formFillingConfigSchema = z
  .object({
    llm: llmConfigSchema.default({}),
    logging: loggingConfigSchema.default({}),
    cache: cacheConfigSchema.default({}),
    fuzzyMatchThreshold: z
      .number()
      .int()
      .min(MIN_FUZZY_MATCH_THRESHOLD)
      .max(MAX_FUZZY_MATCH_THRESHOLD)
      .default(DEFAULT_FUZZY_MATCH_THRESHOLD),
    elementTimeoutMs: z.number().int().positive().default(DEFAULT_ELEMENT_TIMEOUT_MS),
    maxResumeChars: z.number().int().positive().default(DEFAULT_MAX_RESUME_CHARS),
    resumePath: z.string().min(1).optional(),
    resumeContent: z.string().optional(),
  })
  .refine((cfg) => cfg.resumePath === undefined || cfg.resumeContent === undefined, {
    message: 'Cannot specify both resumePath and resumeContent',
    path: ['resume'],
  });

export type LlmConfig = z.infer<typeof llmConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type CacheConfig = z.infer<typeof cacheConfigSchema>;
export type FormFillingConfig = z.infer<typeof formFillingConfigSchema>;
export type FormFillingConfigInput = z.input<typeof formFillingConfigSchema>;

/**
 * Validate raw input into a `FormFillingConfig`. The first failing key is
 * reported in the error context.
 */
export function parseConfig(input: unknown): FormFillingConfig {
  const result = formFillingConfigSchema.safeParse(input);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const key = issue ? issue.path.join('.') : 'unknown';
  throw new ConfigurationError(`Invalid configuration at "${key}": ${issue?.message ?? 'unknown error'}`, {
    config_key: key,
    issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
  });
}

// -- Env helpers --

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Environment variable ${name} must be a number`, {
      config_key: name,
      config_value: raw,
    });
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// -- Builder --

export class ConfigurationBuilder {
  // Raw sections; typed setters write here and `build()` validates.
  private llm: Record<string, unknown> = {};
  private logging: Record<string, unknown> = {};
  private cache: Record<string, unknown> = {};
  private root: Record<string, unknown> = {};

  // LLM
  withLlmProvider(provider: string): this {
    this.llm.provider = provider;
    return this;
  }

  withLlmModel(model: string): this {
    this.llm.model = model;
    return this;
  }

  withLlmTemperature(temperature: number): this {
    this.llm.temperature = temperature;
    return this;
  }

  withLlmTimeout(timeoutMs: number): this {
    this.llm.timeoutMs = timeoutMs;
    return this;
  }

  withLlmMaxRetries(maxRetries: number): this {
    this.llm.maxRetries = maxRetries;
    return this;
  }

  withLlmRetryDelays(baseDelayMs: number, maxDelayMs: number, exponentialBase?: number): this {
    this.llm.retryBaseDelayMs = baseDelayMs;
    this.llm.retryMaxDelayMs = maxDelayMs;
    if (exponentialBase !== undefined) this.llm.retryExponentialBase = exponentialBase;
    return this;
  }

  withLlmApiKey(apiKey: string): this {
    this.llm.apiKey = apiKey;
    return this;
  }

  withLlmBaseUrl(baseUrl: string): this {
    this.llm.baseUrl = baseUrl;
    return this;
  }

  // Logging
  withLogLevel(level: LoggingConfig['level']): this {
    this.logging.level = level;
    return this;
  }

  // Cache
  withCacheTtl(ttlMs: number): this {
    this.cache.ttlMs = ttlMs;
    return this;
  }

  withCacheMaxSize(maxSize: number): this {
    this.cache.maxSize = maxSize;
    return this;
  }

  // Resume
  withResumePath(resumePath: string): this {
    this.root.resumePath = resumePath;
    return this;
  }

  withResumeContent(resumeContent: string): this {
    this.root.resumeContent = resumeContent;
    return this;
  }

  // Engine
  withFuzzyMatchThreshold(threshold: number): this {
    this.root.fuzzyMatchThreshold = threshold;
    return this;
  }

  withElementTimeout(timeoutMs: number): this {
    this.root.elementTimeoutMs = timeoutMs;
    return this;
  }

  withMaxResumeChars(maxChars: number): this {
    this.root.maxResumeChars = maxChars;
    return this;
  }

  // -- Sources --

  /**
   * Merge a plain object (e.g. parsed JSON). Known sections are merged
   * key-by-key; validation happens in `build()`.
   */
  fromObject(source: Record<string, unknown>): this {
    const { llm, logging, cache, ...rest } = source;
    if (isRecord(llm)) this.llm = { ...this.llm, ...llm };
    if (isRecord(logging)) this.logging = { ...this.logging, ...logging };
    if (isRecord(cache)) this.cache = { ...this.cache, ...cache };
    this.root = { ...this.root, ...rest };
    return this;
  }

  /** Load a JSON configuration file. */
  fromFile(filePath: string): this {
    if (!fs.existsSync(filePath)) {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`, { file_path: filePath });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Invalid JSON in configuration file: ${filePath}`, {
        file_path: filePath,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Configuration file must contain a JSON object: ${filePath}`, {
        file_path: filePath,
      });
    }
    return this.fromObject(parsed);
  }

  /**
   * Read `<prefix>LLM_PROVIDER`, `<prefix>LOG_LEVEL`, `<prefix>FUZZY_MATCH_THRESHOLD`
   * and friends. Unset variables leave the current value alone.
   */
  fromEnv(prefix = DEFAULT_ENV_PREFIX, env: NodeJS.ProcessEnv = process.env): this {
    const str = (name: string) => readString(env, `${prefix}${name}`);
    const num = (name: string) => readNumber(env, `${prefix}${name}`);

    const provider = str('LLM_PROVIDER');
    if (provider !== undefined) this.llm.provider = provider;
    const model = str('LLM_MODEL');
    if (model !== undefined) this.llm.model = model;
    const temperature = num('LLM_TEMPERATURE');
    if (temperature !== undefined) this.llm.temperature = temperature;
    const timeout = num('LLM_TIMEOUT_MS');
    if (timeout !== undefined) this.llm.timeoutMs = timeout;
    const maxRetries = num('LLM_MAX_RETRIES');
    if (maxRetries !== undefined) this.llm.maxRetries = maxRetries;
    const baseUrl = str('LLM_BASE_URL');
    if (baseUrl !== undefined) this.llm.baseUrl = baseUrl;

    const level = str('LOG_LEVEL');
    if (level !== undefined) {
      const parsedLevel = loggingConfigSchema.shape.level.safeParse(level.toLowerCase());
      if (!parsedLevel.success) {
        throw new ConfigurationError(`Invalid log level: ${level}`, {
          config_key: `${prefix}LOG_LEVEL`,
          config_value: level,
          allowed_values: loggingConfigSchema.shape.level.removeDefault().options,
        });
      }
      this.logging.level = parsedLevel.data;
    }

    const cacheTtl = num('CACHE_TTL_MS');
    if (cacheTtl !== undefined) this.cache.ttlMs = cacheTtl;
    const cacheMaxSize = num('CACHE_MAX_SIZE');
    if (cacheMaxSize !== undefined) this.cache.maxSize = cacheMaxSize;

    const resumePath = str('RESUME_PATH');
    if (resumePath !== undefined) this.root.resumePath = resumePath;
    const threshold = num('FUZZY_MATCH_THRESHOLD');
    if (threshold !== undefined) this.root.fuzzyMatchThreshold = threshold;
    const elementTimeout = num('ELEMENT_TIMEOUT_MS');
    if (elementTimeout !== undefined) this.root.elementTimeoutMs = elementTimeout;

    return this;
  }

  /** Validate and return the configuration. */
  build(): FormFillingConfig {
    return parseConfig({
      ...this.root,
      llm: { ...this.llm },
      logging: { ...this.logging },
      cache: { ...this.cache },
    });
  }
}
