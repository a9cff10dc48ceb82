/**
 * @fileoverview Canonical JSON encoding for claims and evidence refs
 *
 * One explicit function per entity. The wire shape uses snake_case keys and
 * `null` for absent optional fields; decoding validates with zod.
 */

import { z } from 'zod';
import { Errors } from '../core/errors.js';
import {
  CLAIM_TYPES,
  createClaim,
  createEvidenceRef,
  type Claim,
  type ClaimType,
  type EvidenceRef,
} from './types.js';

export const CLAIM_SCHEMA_VERSION = 'praxis.claim.v1';

export interface EvidenceRefJSON {
  source_id: string;
  locator: string;
  content_hash: string | null;
  snippet: string | null;
  data_row: Record<string, string> | null;
}

export interface ClaimJSON {
  id: string;
  type: ClaimType;
  text: string;
  value: number | null;
  unit: string | null;
  evidence: EvidenceRefJSON[];
  source_meta: Record<string, unknown>;
}

// ============================================================================
// ENCODING
// ============================================================================

export function evidenceRefToJSON(ref: EvidenceRef): EvidenceRefJSON {
  return {
    source_id: ref.sourceId,
    locator: ref.locator,
    content_hash: ref.contentHash,
    snippet: ref.snippet,
    data_row: ref.dataRow ? { ...ref.dataRow } : null,
  };
}

export function claimToJSON(claim: Claim): ClaimJSON {
  return {
    id: claim.id,
    type: claim.type,
    text: claim.text,
    value: claim.value,
    unit: claim.unit,
    evidence: claim.evidence.map(evidenceRefToJSON),
    source_meta: { ...claim.sourceMeta },
  };
}

// ============================================================================
// DECODING
// ============================================================================

const DataRowSchema = z.record(
  z.union([z.string(), z.number()]).transform((cell) => String(cell))
);

export const EvidenceRefJSONSchema = z.object({
  source_id: z.string().min(1),
  locator: z.string(),
  content_hash: z.string().nullable().optional(),
  snippet: z.string().nullable().optional(),
  data_row: DataRowSchema.nullable().optional(),
});

export const ClaimJSONSchema = z.object({
  id: z.string().min(1),
  type: z.enum(CLAIM_TYPES),
  text: z.string(),
  value: z.number().finite().nullable().optional(),
  unit: z.string().nullable().optional(),
  evidence: z.array(EvidenceRefJSONSchema).optional().default([]),
  source_meta: z.record(z.unknown()).nullable().optional(),
});

export const ClaimBatchJSONSchema = z.array(ClaimJSONSchema);

type ParsedClaim = z.infer<typeof ClaimJSONSchema>;

function formatPath(root: string, path: ReadonlyArray<string | number>): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    root
  );
}

function toValidationError(root: string, error: z.ZodError): Error {
  const issue = error.issues[0];
  if (!issue) {
    return Errors.validation(root, 'valid claim JSON', 'invalid value');
  }
  const received = 'received' in issue ? String(issue.received) : 'invalid value';
  return Errors.validation(formatPath(root, issue.path), issue.message, received);
}

function fromParsed(parsed: ParsedClaim): Claim {
  return createClaim({
    id: parsed.id,
    type: parsed.type,
    text: parsed.text,
    value: parsed.value ?? null,
    unit: parsed.unit ?? null,
    evidence: parsed.evidence.map((ref) =>
      createEvidenceRef({
        sourceId: ref.source_id,
        locator: ref.locator,
        contentHash: ref.content_hash ?? null,
        snippet: ref.snippet ?? null,
        dataRow: ref.data_row ?? null,
      })
    ),
    sourceMeta: parsed.source_meta ?? {},
  });
}

/**
 * Decode one claim; throws ValidationError naming the first offending path.
 */
export function claimFromJSON(input: unknown): Claim {
  const parsed = ClaimJSONSchema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError('claim', parsed.error);
  }
  return fromParsed(parsed.data);
}

/**
 * Decode a claim batch. Ids must be unique within the batch.
 */
export function claimBatchFromJSON(input: unknown): Claim[] {
  const parsed = ClaimBatchJSONSchema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError('claims', parsed.error);
  }
  const seen = new Set<string>();
  for (const [index, claim] of parsed.data.entries()) {
    if (seen.has(claim.id)) {
      throw Errors.validation(`claims[${index}].id`, 'unique claim id', claim.id);
    }
    seen.add(claim.id);
  }
  return parsed.data.map(fromParsed);
}
