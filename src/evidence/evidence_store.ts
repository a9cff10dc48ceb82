/**
 * @fileoverview Deterministic evidence resolver over CSV tables
 *
 * Resolves an account name to a numeric value and an EvidenceRef that pins
 * the exact row used. The store does not interpret what a number means;
 * tolerances and agreement live in verification/numeric_agreement.ts.
 *
 * Matching: the `account` column (header matched case-insensitively) is
 * compared to the query after trimming and lower-casing both sides. The
 * first matching row wins.
 *
 * Value extraction: `amount`, `balance`, `value` in that order, then the
 * first other column whose cell parses as a number.
 */

import { Errors, type EvidenceMiss } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { createEvidenceRef, hashRow, type DataRow, type EvidenceRef } from '../claims/types.js';
import type { CsvTable } from './csv.js';
import { parseNumericCell } from './numeric.js';

export const KEY_COLUMN = 'account';
export const PREFERRED_NUMERIC_COLUMNS = ['amount', 'balance', 'value'] as const;

export interface NumericField {
  /** Column name as written in the header. */
  field: string;
  value: number;
}

export interface NumericEvidence extends NumericField {
  evidence: EvidenceRef;
}

function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

function findColumn(columns: readonly string[], name: string): string | undefined {
  const wanted = normalizeKey(name);
  return columns.find((column) => normalizeKey(column) === wanted);
}

/**
 * Apply the value extraction policy to a row. Returns null when no column
 * yields a number.
 */
export function numericValueFromRow(row: DataRow, keyColumn: string = KEY_COLUMN): NumericField | null {
  const columns = Object.keys(row);
  const keyName = findColumn(columns, keyColumn);
  const tried = new Set<string>();

  for (const preferred of PREFERRED_NUMERIC_COLUMNS) {
    const column = findColumn(columns, preferred);
    if (column === undefined || column === keyName) continue;
    tried.add(column);
    const value = parseNumericCell(row[column]);
    if (value !== null) return { field: column, value };
  }

  for (const column of columns) {
    if (column === keyName || tried.has(column)) continue;
    const value = parseNumericCell(row[column]);
    if (value !== null) return { field: column, value };
  }

  return null;
}

export class TableEvidenceStore {
  private readonly tables = new Map<string, CsvTable>();

  constructor(tables: Iterable<CsvTable> = []) {
    for (const table of tables) {
      this.tables.set(table.sourceId, table);
    }
  }

  sources(): string[] {
    return [...this.tables.keys()];
  }

  hasSource(sourceId: string): boolean {
    return this.tables.has(sourceId);
  }

  /**
   * Look up a loaded table. Asking for a table nobody loaded is a wiring
   * mistake, so this throws rather than reporting a miss.
   */
  table(sourceId: string): CsvTable {
    const table = this.tables.get(sourceId);
    if (!table) {
      throw Errors.config('evidence.source', `unknown evidence source ${sourceId} (loaded: ${this.sources().join(', ') || 'none'})`);
    }
    return table;
  }

  resolveNumeric(sourceId: string, fieldName: string): Result<NumericEvidence, EvidenceMiss> {
    const table = this.table(sourceId);
    const keyColumn = findColumn(table.header, KEY_COLUMN);
    if (keyColumn === undefined) {
      throw Errors.dataset(sourceId, `Evidence source ${sourceId} has no ${KEY_COLUMN} column`);
    }

    const wanted = normalizeKey(fieldName);
    const row = table.rows.find((candidate) => normalizeKey(candidate[keyColumn] ?? '') === wanted);
    if (!row) {
      return Err(Errors.notFound(sourceId, fieldName.trim()));
    }

    const name = (row[keyColumn] ?? '').trim();
    const numeric = numericValueFromRow(row, keyColumn);
    if (!numeric) {
      return Err(Errors.noNumericField(sourceId, name, table.header.filter((column) => column !== keyColumn)));
    }

    const evidence = createEvidenceRef({
      sourceId: table.sourceId,
      locator: `${KEY_COLUMN}=${name}`,
      contentHash: hashRow(row),
      snippet: `${name} ${numeric.field}=${numeric.value}`,
      dataRow: row,
    });
    return Ok({ evidence, field: numeric.field, value: numeric.value });
  }

  /**
   * Evidence or nothing, for claim producers that treat a miss as "unattributed".
   */
  findNumeric(sourceId: string, fieldName: string): EvidenceRef | null {
    const result = this.resolveNumeric(sourceId, fieldName);
    return result.ok ? result.value.evidence : null;
  }
}
