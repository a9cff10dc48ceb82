/**
 * @fileoverview praxis-gate CLI
 *
 * Commands:
 *   praxis-gate run    - Verify claims and gate the release
 *   praxis-gate eval   - Evaluate the gate against a case file
 *   praxis-gate help   - Show help information
 *
 * @packageDocumentation
 */

import { PRAXIS_VERSION } from '../version.js';
import { setDebugLogging } from '../telemetry/logger.js';
import type { WriteLine } from './args.js';
import { evalCommand } from './commands/eval.js';
import { runGateCommand } from './commands/run.js';
import {
  CliError,
  EXIT_CODES,
  createErrorEnvelope,
  formatError,
  formatErrorJson,
  getExitCode,
} from './errors.js';
import { getCommandHelp, isCommand } from './help.js';

export interface CliIO {
  env?: Readonly<Record<string, string | undefined>>;
  write?: WriteLine;
  writeError?: WriteLine;
}

/**
 * Dispatch one invocation and return the exit code. Global flags
 * (`--verbose`, `--help`, `--version`) may appear anywhere.
 */
export async function runCli(argv: readonly string[], io: CliIO = {}): Promise<number> {
  const { env = process.env, write = console.log, writeError = console.error } = io;

  const verbose = argv.includes('--verbose');
  setDebugLogging(verbose);
  const args = argv.filter((arg) => arg !== '--verbose');
  const jsonMode = args.includes('--json');

  if (args.includes('--version') || args.includes('-v')) {
    write(`praxis-gate ${PRAXIS_VERSION}`);
    return EXIT_CODES.ok;
  }

  const [command, ...rest] = args;
  if (command === undefined || command === 'help' || args.includes('--help') || args.includes('-h')) {
    const topic = command === 'help' ? rest[0] : isCommand(command) ? command : undefined;
    write(getCommandHelp(topic));
    return EXIT_CODES.ok;
  }

  try {
    if (!isCommand(command)) {
      throw new CliError(`Unknown command: ${command}`, 'UNKNOWN_COMMAND');
    }
    switch (command) {
      case 'run':
        return await runGateCommand({ args: rest, env, write });
      case 'eval':
        return await evalCommand({ args: rest, env, write });
      case 'help':
        write(getCommandHelp(rest[0]));
        return EXIT_CODES.ok;
    }
  } catch (error) {
    const envelope = createErrorEnvelope(error);
    writeError(jsonMode ? formatErrorJson(envelope) : formatError(envelope));
    return getExitCode(error);
  }
}
