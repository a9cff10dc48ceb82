export { CLAIM_PRODUCER, generateClaimsFromDataset, generateSampleClaims } from './dataset_claims.js';
