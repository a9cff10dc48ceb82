import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { DatasetError, ParseError } from '../../core/errors.js';
import { parseCsv, readCsvTable } from '../csv.js';

describe('parseCsv', () => {
  it('keys rows by the trimmed header', () => {
    const table = parseCsv(' account , amount \nRevenue,100\nCOGS,60\n', 'tb.csv');

    expect(table.sourceId).toBe('tb.csv');
    expect(table.header).toEqual(['account', 'amount']);
    expect(table.rows).toEqual([
      { account: 'Revenue', amount: '100' },
      { account: 'COGS', amount: '60' },
    ]);
  });

  it('handles quoted commas, doubled quotes and embedded newlines', () => {
    const table = parseCsv('account,note\n"Revenue, net","said ""hi""\nagain"\n', 'tb.csv');

    expect(table.rows).toEqual([{ account: 'Revenue, net', note: 'said "hi"\nagain' }]);
  });

  it('strips a byte order mark and accepts CRLF line endings', () => {
    const table = parseCsv('\uFEFFaccount,amount\r\nRevenue,100\r\n', 'tb.csv');

    expect(table.header).toEqual(['account', 'amount']);
    expect(table.rows).toEqual([{ account: 'Revenue', amount: '100' }]);
  });

  it('skips blank lines and reads a last line without a newline', () => {
    const table = parseCsv('account,amount\n\nRevenue,100\n\nCOGS,60', 'tb.csv');

    expect(table.rows.map((row) => row.account)).toEqual(['Revenue', 'COGS']);
  });

  it('pads short rows with empty cells', () => {
    const table = parseCsv('a,b,c\n1\n', 'short.csv');

    expect(table.rows).toEqual([{ a: '1', b: '', c: '' }]);
  });

  it('rejects a row wider than the header with its line number', () => {
    try {
      parseCsv('a,b\n1,2\n3,4,5\n', 'wide.csv');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error instanceof ParseError && error.line).toBe(3);
      expect(error instanceof ParseError && error.message).toBe(
        'Failed to parse csv (wide.csv): row has 3 fields, header has 2'
      );
    }
  });

  it('rejects an unterminated quote at the line it opened', () => {
    try {
      parseCsv('a,b\n"open,1\n', 'open.csv');
      expect.unreachable();
    } catch (error) {
      expect(error instanceof ParseError && error.line).toBe(2);
    }
  });

  it('requires a header row', () => {
    expect(() => parseCsv('', 'empty.csv')).toThrow('missing header row');
  });
});

describe('readCsvTable', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('names the table after the file', async () => {
    dir = await mkdtemp(join(tmpdir(), 'praxis-csv-'));
    const path = join(dir, 'trial_balance.csv');
    await writeFile(path, 'account,amount\nRevenue,100\n');

    const table = await readCsvTable(path);

    expect(table.sourceId).toBe('trial_balance.csv');
    expect(table.rows).toHaveLength(1);
  });

  it('reports an unreadable file as a dataset error', async () => {
    dir = await mkdtemp(join(tmpdir(), 'praxis-csv-'));

    await expect(readCsvTable(join(dir, 'missing.csv'))).rejects.toBeInstanceOf(DatasetError);
  });
});
