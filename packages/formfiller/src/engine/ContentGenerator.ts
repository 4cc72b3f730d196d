/**
 * ContentGenerator: resume-grounded answers for fields KnownData can't fill.
 *
 * Picks a prompt by field kind, calls the model once per cache miss and
 * normalizes the answer. Choice answers are mapped back onto the offered
 * options so the filler only ever receives a label that exists.
 */

import { DEFAULT_FUZZY_MATCH_THRESHOLD, DEFAULT_MAX_RESUME_CHARS } from '../config/constants.js';
import { GenerationError } from '../errors.js';
import type { TextGenerator } from '../llm/types.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { ResumeContext } from '../resume/types.js';
import { GenerationCache } from './GenerationCache.js';
import {
  NOT_AVAILABLE,
  buildRadioPrompt,
  buildSelectPrompt,
  buildTextPrompt,
  cleanAnswer,
  truncateResume,
} from './prompts.js';
import { findBestMatch } from './similarity.js';
import type { FieldDescriptor } from './types.js';

export interface ContentGeneratorOptions {
  maxResumeChars?: number;
  /** Minimum score for mapping an answer onto an option. */
  fuzzyMatchThreshold?: number;
  cache?: GenerationCache;
  logger?: Logger;
}

type PromptShape = 'text' | 'select' | 'radio';

function promptShape(field: FieldDescriptor): PromptShape {
  if (!field.options || field.options.length === 0) return 'text';
  return field.kind === 'select' ? 'select' : 'radio';
}

export class ContentGenerator {
  private readonly maxResumeChars: number;
  private readonly threshold: number;
  private readonly cache: GenerationCache;
  private readonly logger: Logger;

  constructor(
    private readonly generator: TextGenerator,
    opts: ContentGeneratorOptions = {},
  ) {
    this.maxResumeChars = opts.maxResumeChars ?? DEFAULT_MAX_RESUME_CHARS;
    this.threshold = opts.fuzzyMatchThreshold ?? DEFAULT_FUZZY_MATCH_THRESHOLD;
    this.cache = opts.cache ?? new GenerationCache();
    this.logger = opts.logger ?? getLogger().child({ component: 'ContentGenerator' });
  }

  buildPrompt(field: FieldDescriptor, resume: ResumeContext): string {
    const excerpt = truncateResume(resume.text, this.maxResumeChars);
    const options = field.options ?? [];
    switch (promptShape(field)) {
      case 'select':
        return buildSelectPrompt(field.name, options, excerpt);
      case 'radio':
        return buildRadioPrompt(field.name, options, excerpt);
      default:
        return buildTextPrompt(field.name, excerpt);
    }
  }

  async generate(field: FieldDescriptor, resume: ResumeContext): Promise<string> {
    const cached = this.cache.get(field);
    if (cached !== undefined) {
      this.logger.debug('Generated answer served from cache', { fieldName: field.name, kind: field.kind });
      return cached;
    }

    const context = {
      fieldName: field.name,
      kind: field.kind,
      provider: this.generator.provider,
      model: this.generator.model,
    };

    let raw: string;
    try {
      raw = await this.generator.generate(this.buildPrompt(field, resume));
    } catch (err) {
      throw new GenerationError(`Model call failed for field "${field.name}"`, context, err);
    }

    const answer = cleanAnswer(raw);
    if (!answer) {
      throw new GenerationError(`Model returned an empty answer for field "${field.name}"`, context);
    }

    const value =
      promptShape(field) === 'text'
        ? this.acceptText(field, answer, context)
        : this.mapToOption(field, answer, context);

    this.cache.set(field, value);
    this.logger.debug('Generated answer', { ...context, chars: value.length });
    return value;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private acceptText(field: FieldDescriptor, answer: string, context: Record<string, unknown>): string {
    if (answer.toLowerCase() === NOT_AVAILABLE.toLowerCase()) {
      throw new GenerationError(`Resume has no answer for field "${field.name}"`, context);
    }
    return answer;
  }

  private mapToOption(field: FieldDescriptor, answer: string, context: Record<string, unknown>): string {
    const options = field.options ?? [];
    const exact = options.find((option) => option.trim().toLowerCase() === answer.toLowerCase());
    if (exact !== undefined) return exact;

    const best = findBestMatch(answer, options, (option) => option);
    if (!best || best.score < this.threshold) {
      throw new GenerationError(`Model answer "${answer}" matches none of the options for "${field.name}"`, {
        ...context,
        answer,
        options,
      });
    }
    return best.item;
  }
}
