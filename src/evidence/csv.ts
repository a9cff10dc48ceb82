/**
 * @fileoverview CSV tables for evidence sources
 *
 * Header row required. Quoted fields may contain commas, doubled quotes and
 * line breaks. Rows come back as header-keyed records in file order.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { Errors } from '../core/errors.js';
import { getErrorMessage, toError } from '../utils/errors.js';

export interface CsvTable {
  /** Logical name, normally the file name. */
  readonly sourceId: string;
  readonly header: readonly string[];
  readonly rows: ReadonlyArray<Readonly<Record<string, string>>>;
}

interface RawRecord {
  fields: string[];
  line: number;
}

function splitRecords(text: string, sourceId: string): RawRecord[] {
  const records: RawRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let quoteLine = 1;

  const endRecord = () => {
    fields.push(field);
    records.push({ fields, line: recordLine });
    fields = [];
    field = '';
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field.length === 0) {
      inQuotes = true;
      quoteLine = line;
    } else if (ch === ',') {
      fields.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw Errors.parse('csv', 'unterminated quoted field', sourceId, quoteLine);
  }
  if (field.length > 0 || fields.length > 0) {
    endRecord();
  }

  return records.filter((record) => !(record.fields.length === 1 && record.fields[0].trim() === ''));
}

export function parseCsv(text: string, sourceId: string): CsvTable {
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records = splitRecords(body, sourceId);
  const headerRecord = records[0];
  if (!headerRecord) {
    throw Errors.parse('csv', 'missing header row', sourceId, 1);
  }

  const header = headerRecord.fields.map((name) => name.trim());
  const rows: Array<Readonly<Record<string, string>>> = [];

  for (const record of records.slice(1)) {
    if (record.fields.length > header.length) {
      throw Errors.parse(
        'csv',
        `row has ${record.fields.length} fields, header has ${header.length}`,
        sourceId,
        record.line
      );
    }
    const row: Record<string, string> = {};
    header.forEach((name, index) => {
      row[name] = record.fields[index] ?? '';
    });
    rows.push(Object.freeze(row));
  }

  return Object.freeze({
    sourceId,
    header: Object.freeze(header),
    rows: Object.freeze(rows),
  });
}

/**
 * Read a CSV file; an unreadable file is a dataset problem, not a lookup miss.
 */
export async function readCsvTable(path: string, sourceId: string = basename(path)): Promise<CsvTable> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw Errors.dataset(path, `Unreadable table ${sourceId}: ${getErrorMessage(error)}`, toError(error));
  }
  return parseCsv(text, sourceId);
}
