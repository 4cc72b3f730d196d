import path from 'node:path';
import type { FormFillingConfig } from '../config/configuration.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { PdfTextExtractor } from './PdfTextExtractor.js';
import { EMPTY_RESUME, type ResumeContext, type TextExtractor } from './types.js';

export interface LoadResumeOptions {
  extractor?: TextExtractor;
  /** Base for relative paths; defaults to the process cwd. */
  cwd?: string;
  logger?: Logger;
}

/** Extract a resume file into a `ResumeContext`. Relative paths resolve against `opts.cwd`. */
export async function loadResumeFile(filePath: string, opts: LoadResumeOptions = {}): Promise<ResumeContext> {
  const extractor = opts.extractor ?? new PdfTextExtractor();
  const logger = opts.logger ?? getLogger().child({ component: 'resume' });

  const absolute = path.resolve(opts.cwd ?? process.cwd(), filePath);
  const text = await extractor.extractText(absolute);
  logger.info('Resume loaded', { path: absolute, chars: text.length });
  return { text, source: 'file', path: absolute };
}

/**
 * Build the session's resume context from configuration: inline content
 * wins over a file path; with neither, generation runs without a resume.
 */
export async function loadResumeContext(
  config: Pick<FormFillingConfig, 'resumePath' | 'resumeContent'>,
  opts: LoadResumeOptions = {},
): Promise<ResumeContext> {
  if (config.resumeContent !== undefined) {
    return { text: config.resumeContent.trim(), source: 'inline' };
  }
  if (config.resumePath !== undefined) {
    return loadResumeFile(config.resumePath, opts);
  }
  return EMPTY_RESUME;
}
