export type ResumeSource = 'file' | 'inline' | 'none';

/** Resume text shared read-only by every generation in a session. */
export interface ResumeContext {
  text: string;
  source: ResumeSource;
  /** Absolute path of the file the text came from, when `source === 'file'`. */
  path?: string;
}

export interface TextExtractor {
  extractText(filePath: string): Promise<string>;
}

export const EMPTY_RESUME: ResumeContext = { text: '', source: 'none' };
