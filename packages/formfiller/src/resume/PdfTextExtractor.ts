import fs from 'node:fs/promises';
import { createRequire } from 'node:module';
import type pdfParse from 'pdf-parse';
import { MAX_RESUME_FILE_BYTES } from '../config/constants.js';
import { FileNotFoundError, ResourceError, errorMessage } from '../errors.js';
import type { TextExtractor } from './types.js';

type PdfParse = typeof pdfParse;

/** The slice of pdf-parse the extractor relies on. */
export type ParsePdf = (data: Buffer) => Promise<{ text: string }>;

const require = createRequire(import.meta.url);

// pdf-parse runs a self-test when loaded without a parent module, which is
// what an ESM `import` looks like to it. Loading through require avoids that.
function loadPdfParse(): PdfParse {
  return require('pdf-parse');
}

export interface PdfTextExtractorOptions {
  maxBytes?: number;
  parse?: ParsePdf;
}

export class PdfTextExtractor implements TextExtractor {
  private readonly maxBytes: number;
  private parse: ParsePdf | undefined;

  constructor(opts: PdfTextExtractorOptions = {}) {
    this.maxBytes = opts.maxBytes ?? MAX_RESUME_FILE_BYTES;
    this.parse = opts.parse;
  }

  async extractText(filePath: string): Promise<string> {
    let size: number;
    try {
      size = (await fs.stat(filePath)).size;
    } catch {
      throw new FileNotFoundError(filePath);
    }

    if (size > this.maxBytes) {
      throw new ResourceError(`Resume file is too large: ${size} bytes`, {
        file_path: filePath,
        size_bytes: size,
        max_bytes: this.maxBytes,
      });
    }

    const buffer = await fs.readFile(filePath);
    const parse = (this.parse ??= loadPdfParse());
    try {
      const result = await parse(buffer);
      return result.text.trim();
    } catch (err) {
      throw new ResourceError(`Failed to extract text from PDF: ${errorMessage(err)}`, { file_path: filePath }, err);
    }
  }
}
