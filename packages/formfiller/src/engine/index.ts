/**
 * Engine module: classification, matching, generation and filling.
 */

export * from './types.js';
export { classifyElement, isTextLike } from './ElementClassifier.js';
export { cleanFieldName, resolveFieldName } from './FieldNameResolver.js';
export { normalizeForMatch, ratio, partialRatio, matchScore, findBestMatch, type BestMatch } from './similarity.js';
export { ValueResolver, RESUME_PATH_KEY, isResumeField, type MatchResult } from './ValueResolver.js';
export { GenerationCache, type GenerationCacheOptions } from './GenerationCache.js';
export {
  NOT_AVAILABLE,
  buildTextPrompt,
  buildSelectPrompt,
  buildRadioPrompt,
  cleanAnswer,
  truncateResume,
} from './prompts.js';
export { ContentGenerator, type ContentGeneratorOptions } from './ContentGenerator.js';
export { FileHandler, type FileHandlerOptions } from './FileHandler.js';
export {
  ElementFiller,
  CHECKED_VALUES,
  RADIO_NONE,
  isCheckedValue,
  isRadioSelection,
  type ElementFillerOptions,
  type FillOutcome,
  type FillRoutine,
  type FillTarget,
} from './ElementFiller.js';
export {
  FormFiller,
  summarize,
  type FormFillerOptions,
  type FillElementOptions,
  type FillPageOptions,
} from './FormFiller.js';
