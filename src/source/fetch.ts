import { JSDOM } from 'jsdom';
import { FetchError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config } from '../shared/config.js';

/**
 * Single-attempt page fetch. Retries belong to the orchestrator.
 */
export interface PageSource {
  fetch(url: string): Promise<string>;
}

// Page chrome that never lists faculty
const DROPPED_ELEMENTS = ['script', 'style', 'noscript', 'template', 'nav', 'header', 'footer'];

/**
 * Reduce an HTML document to newline-separated text, one line per text node.
 */
export function cleanHtml(html: string): string {
  const dom = new JSDOM(html);
  const doc = dom.window.document;

  for (const el of Array.from(doc.querySelectorAll(DROPPED_ELEMENTS.join(',')))) {
    el.remove();
  }

  const lines: string[] = [];
  const walker = doc.createTreeWalker(doc.body, dom.window.NodeFilter.SHOW_TEXT);
  for (let node = walker.nextNode(); node; node = walker.nextNode()) {
    const line = (node.textContent ?? '').replace(/\s+/g, ' ').trim();
    if (line) lines.push(line);
  }
  return lines.join('\n');
}

export function truncateText(text: string, maxChars: number): string {
  if (maxChars <= 0 || text.length <= maxChars) return text;
  return text.slice(0, maxChars);
}

export function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

export class PageFetcher implements PageSource {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly maxTextChars: number;

  constructor(config: Config['fetch']) {
    this.timeoutMs = config.timeout_ms;
    this.userAgent = config.user_agent;
    this.maxTextChars = config.max_text_chars;
  }

  async fetch(url: string): Promise<string> {
    if (!isHttpUrl(url)) {
      throw new FetchError(`Not an absolute http(s) URL: ${url}`, { url });
    }

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === 'TimeoutError';
      throw new FetchError(
        timedOut ? `Request timed out after ${this.timeoutMs}ms` : `Request failed: ${errorMessage(err)}`,
        { url, cause: errorMessage(err) },
      );
    }

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} ${response.statusText}`.trim(), {
        url,
        status: response.status,
      });
    }

    let html: string;
    try {
      html = await response.text();
    } catch (err) {
      throw new FetchError(`Failed to read response body: ${errorMessage(err)}`, { url });
    }

    const text = truncateText(cleanHtml(html), this.maxTextChars);
    logger.debug({ url, chars: text.length }, 'Fetched page text');
    return text;
  }
}
