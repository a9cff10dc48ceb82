/**
 * @fileoverview Deterministic, dataset-grounded claim producer
 *
 * Stands in for the LLM generator in demos and the evaluation harness. The
 * batch always contains one unattributed claim so that the presence gate
 * has something to catch. Numeric claims carry evidence but no value: the
 * value is what an agent asserts, and copying it from the evidence row
 * would make numeric agreement trivially true.
 */

import { createClaim, type Claim } from '../claims/types.js';
import { createDatasetEvidenceStore, loadDataset, trialBalanceAccount, type Dataset } from '../evidence/dataset.js';
import { logDebug } from '../telemetry/logger.js';

export const CLAIM_PRODUCER = 'dataset_claims';

export function generateClaimsFromDataset(dataset: Dataset): Claim[] {
  const store = createDatasetEvidenceStore(dataset);
  const revenue = trialBalanceAccount(store, 'Revenue');
  if (!revenue.ok) {
    // Unattributed rev_total is the expected outcome here, not a failure.
    logDebug('Revenue evidence unavailable', { code: revenue.error.code, message: revenue.error.message });
  }

  const sourceMeta = { producer: CLAIM_PRODUCER, dataset_root: dataset.root };

  return [
    createClaim({
      id: 'rev_total',
      type: 'numeric',
      text: 'Total revenue reported in the trial balance.',
      value: null,
      unit: 'USD',
      evidence: revenue.ok ? [revenue.value.evidence] : [],
      sourceMeta,
    }),
    createClaim({
      id: 'profit_positive',
      type: 'textual',
      text: 'The company is profitable.',
      evidence: [],
      sourceMeta,
    }),
  ];
}

/**
 * Claims for a dataset directory, or a single unattributed placeholder
 * claim when no dataset is configured. A configured dataset that cannot be
 * loaded is a hard failure.
 */
export async function generateSampleClaims(datasetRoot: string | null): Promise<Claim[]> {
  if (datasetRoot !== null) {
    return generateClaimsFromDataset(await loadDataset(datasetRoot));
  }
  return [
    createClaim({
      id: 'sample_textual_no_evidence',
      type: 'textual',
      text: 'Sample claim with missing evidence (expected to fail evidence presence).',
      sourceMeta: { producer: CLAIM_PRODUCER },
    }),
  ];
}
