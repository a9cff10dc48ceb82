/**
 * @fileoverview Claim and evidence model
 *
 * A claim is the atomic unit under test; an evidence ref points at the
 * source data that supports it. Both are frozen once built.
 */

import { sha256Hex, stableStringify } from '../utils/checksums.js';

export const CLAIM_TYPES = ['numeric', 'textual', 'policy', 'derived'] as const;

/**
 * - `numeric`: carries a value (and usually a unit)
 * - `textual`: free statement
 * - `policy`: standards/presentation assertion (GAAP, IFRS)
 * - `derived`: computed from other claims or facts
 */
export type ClaimType = (typeof CLAIM_TYPES)[number];

export type DataRow = Readonly<Record<string, string>>;

export interface EvidenceRef {
  /** Stable identifier of the evidence source, e.g. `trial_balance.csv`. */
  readonly sourceId: string;
  /** Position inside the source, e.g. `account=Revenue` or `page=2:para=1`. */
  readonly locator: string;
  readonly contentHash: string | null;
  readonly snippet: string | null;
  /** Structured row backing deterministic numeric checks. */
  readonly dataRow: DataRow | null;
}

export interface Claim {
  /** Unique within a batch. */
  readonly id: string;
  readonly type: ClaimType;
  readonly text: string;
  readonly value: number | null;
  readonly unit: string | null;
  /** Empty means unattributed. */
  readonly evidence: readonly EvidenceRef[];
  readonly sourceMeta: Readonly<Record<string, unknown>>;
}

export interface EvidenceRefInit {
  sourceId: string;
  locator: string;
  contentHash?: string | null;
  snippet?: string | null;
  dataRow?: Record<string, string> | null;
}

export interface ClaimInit {
  id: string;
  type: ClaimType;
  text: string;
  value?: number | null;
  unit?: string | null;
  evidence?: readonly EvidenceRef[];
  sourceMeta?: Record<string, unknown>;
}

export function isClaimType(value: unknown): value is ClaimType {
  return typeof value === 'string' && (CLAIM_TYPES as readonly string[]).includes(value);
}

export function hashContent(content: string): string {
  return sha256Hex(content);
}

/**
 * Hash of a row's canonical JSON; column order does not affect it.
 */
export function hashRow(row: Readonly<Record<string, string>>): string {
  return hashContent(stableStringify(row));
}

export function createEvidenceRef(init: EvidenceRefInit): EvidenceRef {
  return Object.freeze({
    sourceId: init.sourceId,
    locator: init.locator,
    contentHash: init.contentHash ?? null,
    snippet: init.snippet ?? null,
    dataRow: init.dataRow ? Object.freeze({ ...init.dataRow }) : null,
  });
}

export function createClaim(init: ClaimInit): Claim {
  return Object.freeze({
    id: init.id,
    type: init.type,
    text: init.text,
    value: init.value ?? null,
    unit: init.unit ?? null,
    evidence: Object.freeze([...(init.evidence ?? [])]),
    sourceMeta: Object.freeze({ ...(init.sourceMeta ?? {}) }),
  });
}

export function hasEvidence(claim: Claim): boolean {
  return claim.evidence.length > 0;
}
