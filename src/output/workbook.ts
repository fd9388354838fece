import fs from 'node:fs';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { OutputError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ProfessorRecord } from '../llm/parse.js';

const MAX_SHEET_NAME = 31;

/**
 * Excel sheet names: at most 31 chars, none of \ / * ? : [ ]
 */
export function sanitizeSheetName(name: string): string {
  const cleaned = name
    .replace(/[\\/*?:[\]]+/g, '')
    .replace(/^'+|'+$/g, '')
    .trim()
    .slice(0, MAX_SHEET_NAME);
  return cleaned || 'Sheet';
}

/**
 * Sanitize each key and make it unique (case-insensitively) with a _2, _3... suffix.
 */
export function assignSheetNames(keys: Iterable<string>): Map<string, string> {
  const names = new Map<string, string>();
  const used = new Set<string>();
  for (const key of keys) {
    const base = sanitizeSheetName(key);
    let name = base;
    for (let counter = 2; used.has(name.toLowerCase()); counter++) {
      const suffix = `_${counter}`;
      name = base.slice(0, MAX_SHEET_NAME - suffix.length) + suffix;
    }
    used.add(name.toLowerCase());
    names.set(key, name);
  }
  return names;
}

/**
 * Write one worksheet per institution with Name, Title and Notes columns.
 * Returns the sheet names in write order.
 */
export async function writeWorkbook(
  sheets: ReadonlyMap<string, readonly ProfessorRecord[]>,
  filePath: string,
): Promise<string[]> {
  const workbook = new ExcelJS.Workbook();
  const names = assignSheetNames(sheets.keys());

  for (const [key, records] of sheets) {
    const name = names.get(key) ?? sanitizeSheetName(key);
    const worksheet = workbook.addWorksheet(name);
    worksheet.columns = [
      { header: 'Name', key: 'name', width: 32 },
      { header: 'Title', key: 'title', width: 28 },
      { header: 'Notes', key: 'notes', width: 40 },
    ];
    worksheet.getRow(1).font = { bold: true };
    worksheet.addRows(records.map((r) => ({ name: r.name, title: r.title, notes: r.notes })));
    logger.debug({ sheet: name, rows: records.length }, 'Added worksheet');
  }

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    await workbook.xlsx.writeFile(filePath);
  } catch (err) {
    throw new OutputError(`Failed to write workbook: ${errorMessage(err)}`, { path: filePath });
  }

  return Array.from(names.values());
}
