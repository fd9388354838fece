import fs from 'node:fs';
import { z } from 'zod';
import { InputError, errorMessage } from '../shared/errors.js';

const SourceUrlSchema = z
  .string()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), { message: 'must be an http(s) URL' });

/**
 * Parse newline-separated URLs. Blank lines and lines starting with # are skipped.
 */
export function parseUrlList(content: string): string[] {
  const urls: string[] = [];
  const invalid: Array<{ line: number; value: string }> = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) return;
    if (SourceUrlSchema.safeParse(line).success) {
      urls.push(line);
    } else {
      invalid.push({ line: index + 1, value: line });
    }
  });

  if (invalid.length > 0) {
    throw new InputError(`Input contains ${invalid.length} invalid URL line(s)`, { invalid });
  }
  return urls;
}

export function readUrlList(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new InputError(`URL list not found: ${filePath}`, { path: filePath });
  }
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InputError(`Failed to read URL list: ${filePath}`, {
      path: filePath,
      cause: errorMessage(err),
    });
  }
  return parseUrlList(content);
}
