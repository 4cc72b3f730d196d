export * from './types.js';
export { PdfTextExtractor, type ParsePdf, type PdfTextExtractorOptions } from './PdfTextExtractor.js';
export { loadResumeContext, loadResumeFile, type LoadResumeOptions } from './loadResume.js';
