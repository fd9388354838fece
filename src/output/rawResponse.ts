import fs from 'node:fs';
import path from 'node:path';
import { OutputError, errorMessage } from '../shared/errors.js';
import { timestampSlug } from '../shared/utils.js';

/**
 * Keeps the last model response of a URL whose output never parsed.
 */
export interface RawResponseStore {
  save(url: string, rawResponse: string, at?: Date): string;
}

export function urlSlug(url: string): string {
  const slug = url
    .replace(/^[a-z]+:\/\//i, '')
    .replace(/[^a-z0-9]+/gi, '_')
    .replace(/^_+|_+$/g, '');
  return slug.slice(0, 80) || 'url';
}

export function formatRawResponse(url: string, rawResponse: string, stamp: string): string {
  return [`Source URL: ${url}`, `Timestamp: ${stamp}`, '='.repeat(80), '', rawResponse].join('\n');
}

export class FileRawResponseStore implements RawResponseStore {
  constructor(private readonly dir: string) {}

  save(url: string, rawResponse: string, at: Date = new Date()): string {
    const stamp = timestampSlug(at);
    const filePath = path.join(this.dir, `raw_response_${stamp}_${urlSlug(url)}.txt`);
    try {
      fs.mkdirSync(this.dir, { recursive: true });
      fs.writeFileSync(filePath, formatRawResponse(url, rawResponse, stamp), 'utf-8');
    } catch (err) {
      throw new OutputError(`Failed to save raw response: ${errorMessage(err)}`, { url, path: filePath });
    }
    return filePath;
  }
}
