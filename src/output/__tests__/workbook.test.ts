import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { assignSheetNames, sanitizeSheetName, writeWorkbook } from '../workbook.js';

describe('sanitizeSheetName', () => {
  it('removes characters Excel forbids', () => {
    expect(sanitizeSheetName('a/b\\c*d?e:f[g]h')).toBe('abcdefgh');
  });

  it('limits names to 31 characters', () => {
    expect(sanitizeSheetName('x'.repeat(40))).toHaveLength(31);
  });

  it('falls back when nothing is left', () => {
    expect(sanitizeSheetName('[]')).toBe('Sheet');
  });
});

describe('assignSheetNames', () => {
  it('de-duplicates names that collide after sanitizing', () => {
    const names = assignSheetNames(['uni:a', 'unia', 'UNIA']);
    expect([...names.values()]).toEqual(['unia', 'unia_2', 'UNIA_3']);
  });
});

describe('writeWorkbook', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'workbook-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes one worksheet per institution with Name, Title, Notes columns', async () => {
    const file = path.join(dir, 'out', 'professors.xlsx');
    const sheets = new Map([
      [
        'example',
        [
          { name: 'Ada Byron', title: 'Professor', notes: 'chair' },
          { name: 'Grace Hopper', title: 'Associate Professor', notes: 'on leave' },
        ],
      ],
      ['ox', [{ name: 'Alan Turing', title: 'Assistant Professor', notes: 'on leave' }]],
    ]);

    const names = await writeWorkbook(sheets, file);
    expect(names).toEqual(['example', 'ox']);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(file);
    expect(workbook.worksheets.map((ws) => ws.name)).toEqual(['example', 'ox']);

    const example = workbook.getWorksheet('example');
    expect(example?.rowCount).toBe(3);
    expect(example?.getRow(1).values).toEqual([undefined, 'Name', 'Title', 'Notes']);
    expect(example?.getRow(2).values).toEqual([undefined, 'Ada Byron', 'Professor', 'chair']);
    expect(example?.getRow(3).values).toEqual([undefined, 'Grace Hopper', 'Associate Professor', 'on leave']);
    expect(workbook.getWorksheet('ox')?.getCell('A2').value).toBe('Alan Turing');
  });
});
