/**
 * @fileoverview Synthetic dataset loader
 *
 * A dataset run directory holds:
 * - transactions.csv, journal_entries.csv, trial_balance.csv (required)
 * - anomalies.csv, claims_truth.jsonl (optional)
 *
 * Missing required files fail the load immediately.
 */

import { access, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { Errors, type EvidenceMiss } from '../core/errors.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { readCsvTable, type CsvTable } from './csv.js';
import { TableEvidenceStore, type NumericEvidence } from './evidence_store.js';
import type { Result } from '../core/result.js';

export const REQUIRED_DATASET_FILES = ['transactions.csv', 'journal_entries.csv', 'trial_balance.csv'] as const;
export const TRIAL_BALANCE_SOURCE = 'trial_balance.csv';

export interface Dataset {
  readonly root: string;
  /** File name -> absolute path, for every file that was loaded. */
  readonly files: Readonly<Record<string, string>>;
  readonly transactions: CsvTable;
  readonly journalEntries: CsvTable;
  readonly trialBalance: CsvTable;
  readonly anomalies: CsvTable | null;
  readonly claimsTruth: ReadonlyArray<Readonly<Record<string, unknown>>> | null;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function requireFile(path: string): Promise<string> {
  if (!(await exists(path))) {
    throw Errors.dataset(path, `Missing required dataset file: ${path}`);
  }
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonLines(text: string, sourceId: string): Array<Record<string, unknown>> {
  const records: Array<Record<string, unknown>> = [];
  const lines = text.split(/\r?\n/);
  lines.forEach((line, index) => {
    if (line.trim().length === 0) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw Errors.parse('jsonl', getErrorMessage(error), sourceId, index + 1);
    }
    if (!isRecord(parsed)) {
      throw Errors.parse('jsonl', 'line is not a JSON object', sourceId, index + 1);
    }
    records.push(parsed);
  });
  return records;
}

export async function loadDataset(root: string): Promise<Dataset> {
  const base = resolve(root);
  const [transactionsPath, journalPath, trialBalancePath] = await Promise.all(
    REQUIRED_DATASET_FILES.map((name) => requireFile(join(base, name)))
  );

  const files: Record<string, string> = {
    'transactions.csv': transactionsPath,
    'journal_entries.csv': journalPath,
    'trial_balance.csv': trialBalancePath,
  };

  const anomaliesPath = join(base, 'anomalies.csv');
  const hasAnomalies = await exists(anomaliesPath);
  if (hasAnomalies) files['anomalies.csv'] = anomaliesPath;

  const claimsPath = join(base, 'claims_truth.jsonl');
  const hasClaims = await exists(claimsPath);
  if (hasClaims) files['claims_truth.jsonl'] = claimsPath;

  const [transactions, journalEntries, trialBalance, anomalies] = await Promise.all([
    readCsvTable(transactionsPath),
    readCsvTable(journalPath),
    readCsvTable(trialBalancePath),
    hasAnomalies ? readCsvTable(anomaliesPath) : Promise.resolve(null),
  ]);

  let claimsTruth: Array<Record<string, unknown>> | null = null;
  if (hasClaims) {
    let text: string;
    try {
      text = await readFile(claimsPath, 'utf8');
    } catch (error) {
      throw Errors.dataset(claimsPath, `Unreadable claims_truth.jsonl: ${getErrorMessage(error)}`, toError(error));
    }
    claimsTruth = parseJsonLines(text, 'claims_truth.jsonl');
  }

  return Object.freeze({
    root: base,
    files: Object.freeze(files),
    transactions,
    journalEntries,
    trialBalance,
    anomalies,
    claimsTruth,
  });
}

export function createDatasetEvidenceStore(dataset: Dataset): TableEvidenceStore {
  const tables = [dataset.transactions, dataset.journalEntries, dataset.trialBalance];
  if (dataset.anomalies) tables.push(dataset.anomalies);
  return new TableEvidenceStore(tables);
}

export function trialBalanceAccount(
  store: TableEvidenceStore,
  account: string
): Result<NumericEvidence, EvidenceMiss> {
  return store.resolveNumeric(TRIAL_BALANCE_SOURCE, account);
}
