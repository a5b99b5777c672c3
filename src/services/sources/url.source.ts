/**
 * URL text source
 *
 * Downloads a page over HTTP(S). HTML bodies are converted to plain text;
 * any other body is used as-is.
 */

import { convert } from 'html-to-text';
import { ExtractionError } from '../../core/errors.js';
import type { TextSource } from './types.js';

export interface UrlTextSourceOptions {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 30000;

export function isHttpUrl(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

export function htmlToPlainText(html: string): string {
  return convert(html, {
    wordwrap: false,
    selectors: [
      { selector: 'a', options: { ignoreHref: true } },
      { selector: 'img', format: 'skip' },
    ],
  });
}

export class UrlTextSource implements TextSource {
  readonly name = 'url';
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: UrlTextSourceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  canHandle(location: string): boolean {
    return isHttpUrl(location);
  }

  async extract(location: string): Promise<string> {
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(location, { signal: abortController.signal });
      if (!response.ok) {
        throw new ExtractionError(location, `HTTP ${response.status} ${response.statusText}`, {
          status: response.status,
        });
      }

      const body = await response.text();
      const contentType = response.headers.get('content-type') ?? '';
      return contentType.includes('html') ? htmlToPlainText(body) : body;
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      throw new ExtractionError(location, error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
