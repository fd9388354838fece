import fs from 'node:fs';
import { InputError } from '../shared/errors.js';
import { OUTCOME_MARKERS } from './aggregate.js';

export interface LogSummary {
  ok: number;
  empty: number;
  failed: number;
  failedUrls: string[];
}

function messageOf(line: string): { msg: string; url: string | null } | null {
  try {
    const entry: unknown = JSON.parse(line);
    if (entry === null || typeof entry !== 'object') return null;
    const msg = 'msg' in entry && typeof entry.msg === 'string' ? entry.msg : null;
    if (msg === null) return null;
    const url = 'url' in entry && typeof entry.url === 'string' ? entry.url : null;
    return { msg, url };
  } catch {
    // not a pino line; treat it as plain text
    return { msg: line, url: null };
  }
}

/**
 * Count outcome markers in a run log (pino JSON lines or plain text).
 */
export function summarizeLog(content: string): LogSummary {
  const summary: LogSummary = { ok: 0, empty: 0, failed: 0, failedUrls: [] };
  for (const line of content.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const entry = messageOf(line);
    if (!entry) continue;
    if (entry.msg.startsWith(OUTCOME_MARKERS.ok)) summary.ok++;
    else if (entry.msg.startsWith(OUTCOME_MARKERS.empty)) summary.empty++;
    else if (entry.msg.startsWith(OUTCOME_MARKERS.failed)) {
      summary.failed++;
      if (entry.url) summary.failedUrls.push(entry.url);
    }
  }
  return summary;
}

export function summarizeLogFile(filePath: string): LogSummary {
  if (!fs.existsSync(filePath)) {
    throw new InputError(`Log file not found: ${filePath}`, { path: filePath });
  }
  return summarizeLog(fs.readFileSync(filePath, 'utf-8'));
}
