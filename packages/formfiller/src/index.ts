/**
 * formfiller: fill web forms from known applicant data, falling back to
 * answers grounded in the applicant's resume.
 *
 *   import { ConfigurationBuilder, createFormFiller } from 'formfiller';
 *
 *   const config = new ConfigurationBuilder().fromEnv().withResumePath('resume.pdf').build();
 *   const filler = await createFormFiller(config);
 *   const report = await filler.fillPage(page, { first_name: 'Ada', email: 'ada@example.com' });
 */

import type { FormFillingConfig } from './config/configuration.js';
import { ContentGenerator } from './engine/ContentGenerator.js';
import { ElementFiller } from './engine/ElementFiller.js';
import { FileHandler } from './engine/FileHandler.js';
import { FormFiller } from './engine/FormFiller.js';
import { GenerationCache } from './engine/GenerationCache.js';
import { ValueResolver } from './engine/ValueResolver.js';
import { defaultProviderRegistry, type ProviderRegistry } from './llm/registry.js';
import type { TextGenerator } from './llm/types.js';
import { getLogger, type Logger } from './monitoring/logger.js';
import { loadResumeContext, loadResumeFile } from './resume/loadResume.js';
import type { TextExtractor } from './resume/types.js';

export interface FormFillerDeps {
  /** Use this model client instead of building one from `config.llm`. */
  generator?: TextGenerator;
  registry?: ProviderRegistry;
  extractor?: TextExtractor;
  logger?: Logger;
  /** Base directory for relative resume and upload paths. */
  cwd?: string;
}

/** Build a FormFiller: model client, resume context and engine parts from one config. */
export async function createFormFiller(config: FormFillingConfig, deps: FormFillerDeps = {}): Promise<FormFiller> {
  const logger = deps.logger ?? getLogger({ level: config.logging.level });
  const generator = deps.generator ?? (deps.registry ?? defaultProviderRegistry).create(config.llm, { logger });
  const resume = await loadResumeContext(config, { extractor: deps.extractor, cwd: deps.cwd, logger });

  const contentGenerator = new ContentGenerator(generator, {
    maxResumeChars: config.maxResumeChars,
    fuzzyMatchThreshold: config.fuzzyMatchThreshold,
    cache: new GenerationCache({ ttlMs: config.cache.ttlMs, maxSize: config.cache.maxSize }),
    logger: logger.child({ component: 'ContentGenerator' }),
  });

  const elementFiller = new ElementFiller({
    fileHandler: new FileHandler({ cwd: deps.cwd, logger: logger.child({ component: 'FileHandler' }) }),
    fuzzyMatchThreshold: config.fuzzyMatchThreshold,
    logger: logger.child({ component: 'ElementFiller' }),
  });

  return new FormFiller({
    contentGenerator,
    resume,
    valueResolver: new ValueResolver(config.fuzzyMatchThreshold),
    elementFiller,
    loadResume: (filePath) => loadResumeFile(filePath, { extractor: deps.extractor, cwd: deps.cwd, logger }),
    resumePath: config.resumePath,
    cwd: deps.cwd,
    elementTimeoutMs: config.elementTimeoutMs,
    logger: logger.child({ component: 'FormFiller' }),
  });
}

export * from './config/index.js';
export * from './engine/index.js';
export * from './browser/index.js';
export * from './llm/index.js';
export * from './resume/index.js';
export * from './errors.js';
export { Logger, getLogger, redactObject, type LogLevel, type LoggerOptions } from './monitoring/logger.js';
