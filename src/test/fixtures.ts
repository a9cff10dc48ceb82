/**
 * Shared helpers for tests that need a dataset or run directory on disk.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export const TRIAL_BALANCE_CSV = 'account,amount\nRevenue,100\nCOGS,60\n';
export const TRANSACTIONS_CSV = 'id,date,account,amount\nt1,2024-01-31,Revenue,100\nt2,2024-01-31,COGS,60\n';
export const JOURNAL_ENTRIES_CSV = 'entry_id,account,debit,credit\nj1,Cash,100,0\nj1,Revenue,0,100\n';

export type DatasetFiles = Record<string, string>;

export const DEFAULT_DATASET_FILES: DatasetFiles = {
  'transactions.csv': TRANSACTIONS_CSV,
  'journal_entries.csv': JOURNAL_ENTRIES_CSV,
  'trial_balance.csv': TRIAL_BALANCE_CSV,
};

export async function makeTempDir(prefix = 'praxis-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string | undefined): Promise<void> {
  if (dir) await rm(dir, { recursive: true, force: true });
}

/**
 * Write a dataset directory. Pass `null` for a file to leave it out.
 */
export async function writeDataset(
  dir: string,
  overrides: Record<string, string | null> = {}
): Promise<string> {
  const files: Record<string, string | null> = { ...DEFAULT_DATASET_FILES, ...overrides };
  for (const [name, content] of Object.entries(files)) {
    if (content !== null) {
      await writeFile(join(dir, name), content, 'utf8');
    }
  }
  return dir;
}
