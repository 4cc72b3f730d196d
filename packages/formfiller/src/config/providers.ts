/**
 * Provider catalog loader.
 *
 * Reads `providers.config.json`, which describes every model backend the
 * registry knows how to build: its display name, client kind, base URL,
 * API-key env var and a default model.
 *
 *   import { getProviderEntry } from './providers.js';
 *   const entry = getProviderEntry('groq');
 *   // entry.kind === 'openai-compatible', entry.baseUrl === 'https://api.groq.com/openai/v1'
 */

import fs from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import bundledCatalog from './providers.config.json' with { type: 'json' };

// -- Types --

export const providerKindSchema = z.enum(['anthropic', 'openai', 'openai-compatible', 'gemini']);

export type ProviderKind = z.infer<typeof providerKindSchema>;

const providerEntrySchema = z.object({
  name: z.string().min(1),
  kind: providerKindSchema,
  baseUrl: z.string().url().optional(),
  envKey: z.string().min(1),
  requiresApiKey: z.boolean().default(true),
  defaultModel: z.string().min(1),
  docs: z.string().url(),
});

const providerCatalogSchema = z
  .object({
    version: z.literal(1),
    providers: z.record(providerEntrySchema),
  })
  .superRefine((catalog, ctx) => {
    for (const [id, entry] of Object.entries(catalog.providers)) {
      if (entry.kind === 'openai-compatible' && !entry.baseUrl) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `openai-compatible provider "${id}" needs a baseUrl`,
          path: ['providers', id, 'baseUrl'],
        });
      }
    }
  });

export type ProviderEntry = z.infer<typeof providerEntrySchema>;
export type ProviderCatalog = z.infer<typeof providerCatalogSchema>;

// -- Catalog Loading --

let _cachedCatalog: ProviderCatalog | null = null;

function parseCatalog(raw: unknown, source: string): ProviderCatalog {
  const result = providerCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid provider catalog: ${source}`, {
      file_path: source,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

/**
 * Load the provider catalog. Without a path, the bundled
 * `providers.config.json` is used and cached.
 */
export function loadProviderCatalog(configPath?: string): ProviderCatalog {
  if (configPath === undefined) {
    _cachedCatalog ??= parseCatalog(bundledCatalog, 'providers.config.json');
    return _cachedCatalog;
  }

  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Provider catalog not found: ${configPath}`, { file_path: configPath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in provider catalog: ${configPath}`, {
      file_path: configPath,
      error: err instanceof Error ? err.message : String(err),
    });
  }
  return parseCatalog(raw, configPath);
}

/** Look up one provider; unknown ids list the available ones. */
export function getProviderEntry(providerId: string, catalog: ProviderCatalog = loadProviderCatalog()): ProviderEntry {
  const entry = catalog.providers[providerId.toLowerCase()];
  if (!entry) {
    const available = Object.keys(catalog.providers);
    throw new ConfigurationError(`Unknown LLM provider "${providerId}". Available: ${available.join(', ')}`, {
      config_key: 'llm.provider',
      config_value: providerId,
      allowed_values: available,
    });
  }
  return entry;
}
