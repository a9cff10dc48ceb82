/**
 * @fileoverview External evaluation runs
 *
 * Some metrics come from a separate evaluation process that prints a JSON
 * object of numbers on stdout. Timeouts, non-zero exits and unreadable
 * output all mean "metrics unavailable"; none of them is a verification
 * failure.
 */

import { Errors, type ExecutionError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { runCommand, type CommandOutcome, type CommandRunner } from '../utils/command.js';
import { getErrorMessage } from '../utils/errors.js';

export const DEFAULT_EXTERNAL_TIMEOUT_MS = 120_000;

export type ExternalMetrics =
  | { readonly available: true; readonly metrics: Readonly<Record<string, number>> }
  | { readonly available: false; readonly error: ExecutionError };

export interface ExternalMetricsOptions {
  timeoutMs?: number;
  cwd?: string;
  runner?: CommandRunner;
}

function parseMetrics(stdout: string): Record<string, number> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;

  const metrics: Record<string, number> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) return null;
    metrics[key] = value;
  }
  return metrics;
}

function unavailable(error: ExecutionError): ExternalMetrics {
  logWarning('External metrics unavailable', { reason: error.reason, message: error.message });
  return { available: false, error };
}

export async function runExternalMetrics(
  command: string,
  args: readonly string[],
  options: ExternalMetricsOptions = {}
): Promise<ExternalMetrics> {
  const { timeoutMs = DEFAULT_EXTERNAL_TIMEOUT_MS, cwd, runner = runCommand } = options;
  const label = [command, ...args].join(' ');

  let outcome: CommandOutcome;
  try {
    outcome = await runner(command, args, { cwd, timeoutMs });
  } catch (error) {
    return unavailable(Errors.execution('spawn_failed', `${label}: ${getErrorMessage(error)}`));
  }

  if (outcome.timedOut) {
    return unavailable(Errors.execution('timeout', `${label} exceeded ${timeoutMs}ms`, true));
  }
  if (outcome.exitCode === null) {
    return unavailable(Errors.execution('spawn_failed', `${label} did not start`));
  }
  if (outcome.exitCode !== 0) {
    return unavailable(Errors.execution('non_zero_exit', `${label} exited with ${outcome.exitCode}`));
  }

  const metrics = parseMetrics(outcome.stdout);
  if (!metrics) {
    return unavailable(Errors.execution('invalid_output', `${label} did not print a JSON object of numbers`));
  }
  return { available: true, metrics };
}
