/**
 * @fileoverview CLI error handling and exit codes
 */

import { isPraxisError } from '../core/errors.js';
import type { ReleaseDecision } from '../release/decision.js';
import { getErrorMessage } from '../utils/errors.js';

export const EXIT_CODES = {
  ok: 0,
  error: 1,
  hold: 2,
  block: 3,
  evaluationFailed: 2,
  usage: 64,
} as const;

export type CliErrorCode = 'INVALID_ARGUMENT' | 'UNKNOWN_COMMAND';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `praxis-gate help <command>` for usage information.',
  UNKNOWN_COMMAND: 'Run `praxis-gate help` to list commands.',
};

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion: string = ERROR_SUGGESTIONS[code],
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export interface ErrorEnvelope {
  code: string;
  message: string;
  retryable: boolean;
  suggestion?: string;
}

export function createErrorEnvelope(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return { code: error.code, message: error.message, retryable: false, suggestion: error.suggestion };
  }
  if (isPraxisError(error)) {
    return { code: error.code, message: error.message, retryable: error.retryable };
  }
  return { code: 'UNEXPECTED', message: getErrorMessage(error), retryable: false };
}

export function formatError(envelope: ErrorEnvelope): string {
  const line = `Error [${envelope.code}]: ${envelope.message}`;
  return envelope.suggestion ? `${line}\n\nSuggestion: ${envelope.suggestion}` : line;
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}

export function getExitCode(error: unknown): number {
  return error instanceof CliError ? EXIT_CODES.usage : EXIT_CODES.error;
}

export function exitCodeForDecision(decision: ReleaseDecision): number {
  switch (decision) {
    case 'proceed':
      return EXIT_CODES.ok;
    case 'hold':
      return EXIT_CODES.hold;
    case 'block':
      return EXIT_CODES.block;
  }
}
