import { isIP } from 'node:net';

// Two-label public suffixes seen on university hosts
const SECOND_LEVEL_SUFFIXES = new Set(['ac', 'edu', 'co', 'gov', 'org', 'net', 'com', 'uni']);

/**
 * Short, human-readable grouping label for a faculty page URL.
 *
 *   https://econ.example.edu/people -> example
 *   https://www.cbs.dk/en/staff     -> cbs
 *   https://www.ox.ac.uk/faculty    -> ox
 *   http://10.0.0.5/staff           -> 10.0.0.5
 */
export function institutionKey(url: string): string {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    host = url.toLowerCase().replace(/^[a-z]+:\/\//, '').split(/[/?#:]/)[0] ?? '';
  }

  // IP literals have no registrable name; URL keeps IPv6 in brackets
  const bare = host.replace(/^\[|\]$/g, '');
  if (isIP(bare) !== 0) return bare;

  const labels = host
    .replace(/\.$/, '')
    .split('.')
    .filter((label) => label.length > 0);
  while (labels.length > 1 && /^www\d*$/.test(labels[0] ?? '')) labels.shift();

  if (labels.length <= 1) return labels[0] ?? host;

  // Drop the TLD, then a second-level suffix such as ac.uk or edu.au
  labels.pop();
  if (labels.length > 1 && SECOND_LEVEL_SUFFIXES.has(labels[labels.length - 1] ?? '')) {
    labels.pop();
  }
  return labels[labels.length - 1] ?? host;
}
