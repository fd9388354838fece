import { describe, it, expect } from 'vitest';
import { dropBlankLines, parseProfessorCsv, stripCodeFences } from '../parse.js';
import { ParseError } from '../../shared/errors.js';

const THREE_ROWS = [
  'Name,Title,Notes',
  'Ada Byron,Professor,',
  'Grace Hopper,Associate Professor,head of department',
  'Alan Turing,Assistant Professor,on leave',
].join('\n');

async function parseError(raw: string): Promise<ParseError> {
  try {
    await parseProfessorCsv(raw);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected a ParseError');
}

describe('stripCodeFences', () => {
  it('removes csv fences', () => {
    expect(stripCodeFences('```csv\nName,Title,Notes\n```')).toBe('Name,Title,Notes');
  });

  it('removes bare fences', () => {
    expect(stripCodeFences('```\nA,B,C\n```\n')).toBe('A,B,C');
  });

  it('leaves unfenced text alone', () => {
    expect(stripCodeFences('  Name,Title,Notes  ')).toBe('Name,Title,Notes');
  });
});

describe('parseProfessorCsv', () => {
  it('returns every record in response order', async () => {
    const records = await parseProfessorCsv(THREE_ROWS);
    expect(records).toEqual([
      { name: 'Ada Byron', title: 'Professor', notes: '' },
      { name: 'Grace Hopper', title: 'Associate Professor', notes: 'head of department' },
      { name: 'Alan Turing', title: 'Assistant Professor', notes: 'on leave' },
    ]);
  });

  it('accepts fenced output and CRLF line endings', async () => {
    const raw = '```csv\r\nName,Title,Notes\r\nAda Byron,Professor,\r\n```';
    expect(await parseProfessorCsv(raw)).toEqual([{ name: 'Ada Byron', title: 'Professor', notes: '' }]);
  });

  it('handles quoted fields containing commas', async () => {
    const raw = 'Name,Title,Notes\n"Byron, Ada",Professor,"chair, on leave"';
    expect(await parseProfessorCsv(raw)).toEqual([
      { name: 'Byron, Ada', title: 'Professor', notes: 'chair, on leave' },
    ]);
  });

  it('trims values and matches header names case-insensitively', async () => {
    const raw = ' name , TITLE ,notes\n  Ada Byron ,  Professor , ';
    expect(await parseProfessorCsv(raw)).toEqual([{ name: 'Ada Byron', title: 'Professor', notes: '' }]);
  });

  it('drops rows with an empty name and keeps the rest', async () => {
    const raw = ['Name,Title,Notes', 'Ada Byron,Professor,', ',Professor,ghost row', 'Alan Turing,Professor,'].join('\n');
    const records = await parseProfessorCsv(raw);
    expect(records.map((r) => r.name)).toEqual(['Ada Byron', 'Alan Turing']);
  });

  it('gives the same result when parsing already-filtered output', async () => {
    const raw = ['Name,Title,Notes', ',Professor,', 'Ada Byron,Professor,'].join('\n');
    const first = await parseProfessorCsv(raw);
    const again = await parseProfessorCsv(
      ['Name,Title,Notes', ...first.map((r) => `${r.name},${r.title},${r.notes}`)].join('\n'),
    );
    expect(again).toEqual(first);
  });

  it('ignores blank lines between rows', async () => {
    const raw = 'Name,Title,Notes\n\nAda Byron,Professor,\n\n';
    expect(await parseProfessorCsv(raw)).toHaveLength(1);
  });

  it('keeps blank lines inside a quoted Notes field', async () => {
    const raw = 'Name,Title,Notes\n\nAda Byron,Professor,"chair\n\nhead of department"\n\nAlan Turing,Professor,\n';
    expect(await parseProfessorCsv(raw)).toEqual([
      { name: 'Ada Byron', title: 'Professor', notes: 'chair\n\nhead of department' },
      { name: 'Alan Turing', title: 'Professor', notes: '' },
    ]);
  });

  it('parses a header-only table to zero records', async () => {
    expect(await parseProfessorCsv('Name,Title,Notes\n')).toEqual([]);
  });

  it('parses the no-professors sentinel to zero records', async () => {
    expect(await parseProfessorCsv('NO_PROFESSORS_FOUND')).toEqual([]);
  });

  it('rejects an empty response', async () => {
    const err = await parseError('   ');
    expect(err.message).toBe('Response is empty');
    expect(err.rawResponse).toBe('   ');
  });

  it('rejects a header without the Notes column', async () => {
    const err = await parseError('Name,Title\nAda Byron,Professor');
    expect(err.message).toBe('CSV header is missing column(s): Notes');
  });

  it('rejects prose instead of CSV', async () => {
    const raw = 'Here are the professors I found on the page.';
    const err = await parseError(raw);
    expect(err.message).toBe('CSV header is missing column(s): Name, Title, Notes');
  });

  it('rejects truncated output instead of returning a partial list', async () => {
    const raw = 'Name,Title,Notes\nAda Byron,Professor,\nAlan Tur';
    const err = await parseError(raw);
    expect(err.message).toMatch(/^Malformed CSV/);
    expect(err.rawResponse).toBe(raw);
  });

  it('rejects rows with extra cells', async () => {
    const err = await parseError('Name,Title,Notes\nAda Byron,Professor,,extra');
    expect(err.message).toMatch(/^Malformed CSV/);
  });
});

describe('dropBlankLines', () => {
  it('removes empty lines outside quotes only', () => {
    expect(dropBlankLines('a,b\n\n"x\n\ny",z\n   \nc,d')).toBe('a,b\n"x\n\ny",z\nc,d');
  });

  it('treats doubled quotes as text', () => {
    expect(dropBlankLines('a,"say ""hi"""\n\nb,c')).toBe('a,"say ""hi"""\nb,c');
  });
});
