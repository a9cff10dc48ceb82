import { execa } from 'execa';

export interface CommandOptions {
  cwd?: string;
  timeoutMs: number;
}

export interface CommandOutcome {
  /** null when the process never produced an exit code (spawn failure, kill) */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  failed: boolean;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: CommandOptions
) => Promise<CommandOutcome>;

/**
 * execa without rejection: every outcome, including a timeout, comes back
 * as a value for the caller to classify.
 */
export const runCommand: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, {
    cwd: options.cwd,
    timeout: options.timeoutMs,
    reject: false,
  });
  return {
    exitCode: typeof result.exitCode === 'number' ? result.exitCode : null,
    stdout: String(result.stdout ?? ''),
    stderr: String(result.stderr ?? ''),
    timedOut: result.timedOut,
    failed: result.failed,
  };
};
