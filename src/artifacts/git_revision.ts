import { logDebug } from '../telemetry/logger.js';
import { runCommand, type CommandRunner } from '../utils/command.js';
import { getErrorMessage } from '../utils/errors.js';

export const UNKNOWN_REVISION = 'unknown';
const DEFAULT_GIT_TIMEOUT_MS = 5_000;
const SAFE_REVISION = /^[A-Za-z0-9._-]+$/;

/**
 * Revisions end up in artifact file names; anything outside [A-Za-z0-9._-]
 * collapses to `unknown`.
 */
export function sanitizeRevision(revision: string | null | undefined): string {
  const trimmed = (revision ?? '').trim();
  return SAFE_REVISION.test(trimmed) ? trimmed : UNKNOWN_REVISION;
}

export interface GitRevisionOptions {
  cwd?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

/**
 * Short HEAD revision, or `unknown` when git is missing, the directory is
 * not a repository, or the call times out.
 */
export async function resolveGitRevision(options: GitRevisionOptions = {}): Promise<string> {
  const { cwd = process.cwd(), timeoutMs = DEFAULT_GIT_TIMEOUT_MS, runner = runCommand } = options;
  try {
    const result = await runner('git', ['rev-parse', '--short', 'HEAD'], { cwd, timeoutMs });
    if (result.timedOut || result.exitCode !== 0) {
      logDebug('git rev-parse gave no revision', { exitCode: result.exitCode, timedOut: result.timedOut, cwd });
      return UNKNOWN_REVISION;
    }
    return sanitizeRevision(result.stdout);
  } catch (error) {
    logDebug('git rev-parse unavailable', { error: getErrorMessage(error), cwd });
    return UNKNOWN_REVISION;
  }
}
