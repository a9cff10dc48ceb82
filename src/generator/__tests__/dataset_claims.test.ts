import { resolve } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { DatasetError } from '../../core/errors.js';
import { makeTempDir, removeDir, writeDataset } from '../../test/fixtures.js';
import { generateSampleClaims } from '../dataset_claims.js';

describe('generateSampleClaims', () => {
  let dir: string | undefined;

  afterEach(async () => {
    await removeDir(dir);
    dir = undefined;
  });

  it('grounds revenue in the trial balance and leaves profit unattributed', async () => {
    dir = await writeDataset(await makeTempDir());

    const [revenue, profit] = await generateSampleClaims(dir);

    expect(revenue?.id).toBe('rev_total');
    expect(revenue?.type).toBe('numeric');
    expect(revenue?.value).toBeNull();
    expect(revenue?.evidence[0]?.dataRow).toEqual({ account: 'Revenue', amount: '100' });
    expect(revenue?.unit).toBe('USD');
    expect(revenue?.evidence.map((ref) => ref.locator)).toEqual(['account=Revenue']);
    expect(revenue?.sourceMeta).toEqual({ producer: 'dataset_claims', dataset_root: resolve(dir) });
    expect(profit?.id).toBe('profit_positive');
    expect(profit?.type).toBe('textual');
    expect(profit?.evidence).toEqual([]);
  });

  it('leaves revenue unattributed when the account is missing', async () => {
    dir = await writeDataset(await makeTempDir(), { 'trial_balance.csv': 'account,amount\nCOGS,60\n' });

    const [revenue] = await generateSampleClaims(dir);

    expect(revenue?.value).toBeNull();
    expect(revenue?.evidence).toEqual([]);
  });

  it('falls back to one unattributed placeholder without a dataset', async () => {
    const claims = await generateSampleClaims(null);

    expect(claims.map((claim) => claim.id)).toEqual(['sample_textual_no_evidence']);
    expect(claims[0]?.evidence).toEqual([]);
  });

  it('fails when the configured dataset is incomplete', async () => {
    dir = await writeDataset(await makeTempDir(), { 'trial_balance.csv': null });

    await expect(generateSampleClaims(dir)).rejects.toBeInstanceOf(DatasetError);
  });
});
