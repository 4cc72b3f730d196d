/**
 * Provider registry: maps a catalog entry's `kind` to a client factory and
 * builds a retry-wrapped `TextGenerator` from `LlmConfig`.
 *
 *   const generator = defaultProviderRegistry.create(config.llm);
 *   const answer = await generator.generate(prompt);
 */

import { getEnv } from '../config/env.js';
import type { LlmConfig } from '../config/configuration.js';
import {
  getProviderEntry,
  loadProviderCatalog,
  type ProviderCatalog,
  type ProviderKind,
} from '../config/providers.js';
import { ConfigurationError } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { createAnthropicGenerator } from './providers/anthropic.js';
import { createGeminiGenerator } from './providers/gemini.js';
import { createOpenAIGenerator } from './providers/openai.js';
import { RetryingGenerator, type Sleep } from './retry.js';
import type { ProviderFactory, TextGenerator } from './types.js';

export interface CreateGeneratorOptions {
  /** Source of API keys; defaults to the validated process env. */
  env?: Record<string, string | undefined>;
  catalog?: ProviderCatalog;
  logger?: Logger;
  sleep?: Sleep;
}

export class ProviderRegistry {
  private readonly factories = new Map<ProviderKind, ProviderFactory>();

  register(kind: ProviderKind, factory: ProviderFactory): this {
    this.factories.set(kind, factory);
    return this;
  }

  has(kind: ProviderKind): boolean {
    return this.factories.has(kind);
  }

  list(): ProviderKind[] {
    return [...this.factories.keys()];
  }

  create(llm: LlmConfig, opts: CreateGeneratorOptions = {}): TextGenerator {
    const catalog = opts.catalog ?? loadProviderCatalog();
    const providerId = llm.provider.toLowerCase();
    const entry = getProviderEntry(providerId, catalog);

    const factory = this.factories.get(entry.kind);
    if (!factory) {
      throw new ConfigurationError(`No client registered for provider kind "${entry.kind}"`, {
        config_key: 'llm.provider',
        config_value: llm.provider,
        allowed_values: this.list(),
      });
    }

    const env: Record<string, string | undefined> = opts.env ?? getEnv();
    const apiKey = llm.apiKey ?? env[entry.envKey];
    if (entry.requiresApiKey && !apiKey) {
      throw new ConfigurationError(`Missing API key for ${entry.name}: set ${entry.envKey} or llm.apiKey`, {
        config_key: entry.envKey,
        provider: providerId,
        docs: entry.docs,
      });
    }

    const model = llm.model ?? entry.defaultModel;
    const generator = factory({
      providerId,
      model,
      apiKey: apiKey || undefined,
      baseUrl: llm.baseUrl ?? entry.baseUrl,
      temperature: llm.temperature,
      maxOutputTokens: llm.maxOutputTokens,
      timeoutMs: llm.timeoutMs,
    });

    const logger = opts.logger ?? getLogger().child({ component: 'ProviderRegistry' });
    logger.info('Model client ready', { provider: providerId, model, kind: entry.kind });

    return new RetryingGenerator(
      generator,
      {
        maxRetries: llm.maxRetries,
        baseDelayMs: llm.retryBaseDelayMs,
        maxDelayMs: llm.retryMaxDelayMs,
        exponentialBase: llm.retryExponentialBase,
      },
      { logger, sleep: opts.sleep },
    );
  }
}

export function createDefaultProviderRegistry(): ProviderRegistry {
  return new ProviderRegistry()
    .register('anthropic', createAnthropicGenerator)
    .register('openai', createOpenAIGenerator)
    .register('openai-compatible', createOpenAIGenerator)
    .register('gemini', createGeminiGenerator);
}

export const defaultProviderRegistry = createDefaultProviderRegistry();
