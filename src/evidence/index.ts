export { parseCsv, readCsvTable, type CsvTable } from './csv.js';
export { parseNumericCell } from './numeric.js';
export {
  KEY_COLUMN,
  PREFERRED_NUMERIC_COLUMNS,
  TableEvidenceStore,
  numericValueFromRow,
  type NumericEvidence,
  type NumericField,
} from './evidence_store.js';
export {
  REQUIRED_DATASET_FILES,
  TRIAL_BALANCE_SOURCE,
  createDatasetEvidenceStore,
  loadDataset,
  parseJsonLines,
  trialBalanceAccount,
  type Dataset,
} from './dataset.js';
