import { getErrorMessage } from '../utils/errors.js';
import { CliError } from './errors.js';

/**
 * Runs a strict `parseArgs` call, turning its unknown-flag and
 * missing-value errors into usage errors.
 */
export function withUsageErrors<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new CliError(getErrorMessage(error), 'INVALID_ARGUMENT');
  }
}

export function parseCoverageOption(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new CliError(`--min-coverage expects a number, got "${raw}"`, 'INVALID_ARGUMENT');
  }
  return value;
}

export type WriteLine = (line: string) => void;

export interface CommandContext {
  args: readonly string[];
  env?: Readonly<Record<string, string | undefined>>;
  /** stdout; logs go to stderr through the logger */
  write?: WriteLine;
}
