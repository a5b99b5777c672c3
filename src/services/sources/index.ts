/**
 * Text Sources
 */

import { TextSourceRegistry } from './registry.js';
import { UrlTextSource, type UrlTextSourceOptions } from './url.source.js';
import { PdfTextSource } from './pdf.source.js';
import { DocxTextSource } from './docx.source.js';
import { TextFileSource } from './text-file.source.js';

export type { TextSource } from './types.js';
export { TextSourceRegistry } from './registry.js';
export { UrlTextSource, isHttpUrl, htmlToPlainText } from './url.source.js';
export type { UrlTextSourceOptions } from './url.source.js';
export { PdfTextSource } from './pdf.source.js';
export { DocxTextSource } from './docx.source.js';
export { TextFileSource } from './text-file.source.js';

/**
 * Registry with the built-in sources: URL, PDF, Word, then plain text as fallback
 */
export function createDefaultTextSources(urlOptions?: UrlTextSourceOptions): TextSourceRegistry {
  return new TextSourceRegistry()
    .register(new UrlTextSource(urlOptions))
    .register(new PdfTextSource())
    .register(new DocxTextSource())
    .register(new TextFileSource());
}
