import { Readable } from 'node:stream';
import csv from 'csv-parser';
import { z } from 'zod';
import { ParseError, errorMessage } from '../shared/errors.js';
import { NO_PROFESSORS_SENTINEL } from './prompts.js';

export const ProfessorRecordSchema = z.object({
  name: z.string(),
  title: z.string(),
  notes: z.string(),
});

export type ProfessorRecord = z.infer<typeof ProfessorRecordSchema>;

const REQUIRED_COLUMNS = ['Name', 'Title', 'Notes'] as const;

const CsvRowSchema = z.object({
  Name: z.string(),
  Title: z.string(),
  Notes: z.string(),
});

/**
 * Strip markdown code fences from LLM output.
 */
export function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```[a-z]*[^\S\n]*\n?/i, '')
    .replace(/\n?```\s*$/, '')
    .trim();
}

function canonicalHeader(header: string): string {
  const trimmed = header.trim();
  const match = REQUIRED_COLUMNS.find((col) => col.toLowerCase() === trimmed.toLowerCase());
  return match ?? trimmed;
}

/**
 * Remove empty lines between rows. A blank line inside a quoted field is content and stays.
 */
export function dropBlankLines(text: string): string {
  const kept: string[] = [];
  let inQuotes = false;
  for (const line of text.split(/\r?\n/)) {
    if (inQuotes || line.trim().length > 0) kept.push(line);
    // "" is an escaped quote and leaves the state unchanged
    if ((line.split('"').length - 1) % 2 === 1) inQuotes = !inQuotes;
  }
  return kept.join('\n');
}

interface CsvTable {
  headers: string[];
  rows: unknown[];
}

function readCsv(text: string): Promise<CsvTable> {
  return new Promise((resolve, reject) => {
    const rows: unknown[] = [];
    let headers: string[] = [];
    Readable.from([text])
      .pipe(
        csv({
          strict: true,
          mapHeaders: ({ header }) => canonicalHeader(header),
          mapValues: ({ value }) => String(value).trim(),
        }),
      )
      .on('headers', (h: string[]) => {
        headers = h;
      })
      .on('data', (row: unknown) => rows.push(row))
      .on('error', reject)
      .on('end', () => resolve({ headers, rows }));
  });
}

/**
 * Parse the model's CSV answer into professor records.
 *
 * Anything that is not a complete Name,Title,Notes table is a ParseError;
 * there is no partial result. Rows with an empty name are dropped.
 */
export async function parseProfessorCsv(raw: string): Promise<ProfessorRecord[]> {
  const cleaned = stripCodeFences(raw);
  if (!cleaned) {
    throw new ParseError('Response is empty', raw);
  }

  const text = dropBlankLines(cleaned);

  if (text.trim().toUpperCase() === NO_PROFESSORS_SENTINEL) return [];

  let table: CsvTable;
  try {
    table = await readCsv(text);
  } catch (err) {
    throw new ParseError(`Malformed CSV: ${errorMessage(err)}`, raw);
  }

  const missing = REQUIRED_COLUMNS.filter((col) => !table.headers.includes(col));
  if (missing.length > 0) {
    throw new ParseError(`CSV header is missing column(s): ${missing.join(', ')}`, raw, {
      headers: table.headers,
    });
  }

  const records: ProfessorRecord[] = [];
  for (const [index, row] of table.rows.entries()) {
    const parsed = CsvRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new ParseError(`Row ${index + 1} does not match Name,Title,Notes`, raw, {
        error: parsed.error.message,
      });
    }
    if (!parsed.data.Name) continue;
    records.push({ name: parsed.data.Name, title: parsed.data.Title, notes: parsed.data.Notes });
  }
  return records;
}
