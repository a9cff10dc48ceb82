export const COMMANDS = {
  run: {
    description: 'Verify a claim batch and decide whether it may be released',
    usage: 'praxis-gate run [--dataset <dir>] [--claims <file>] [--runs-dir <dir>] [--min-coverage <x>] [--no-artifact] [--json]',
  },
  eval: {
    description: 'Run an evaluation case against the gate and record the result',
    usage: 'praxis-gate eval [--case <file>] [--out <dir>] [--dataset <dir>] [--min-coverage <x>] [--json]',
  },
  help: {
    description: 'Show help information',
    usage: 'praxis-gate help [command]',
  },
} as const;

export type Command = keyof typeof COMMANDS;

export function isCommand(value: string | undefined): value is Command {
  return value !== undefined && Object.hasOwn(COMMANDS, value);
}

const HELP_TEXT: Record<Command | 'main', string> = {
  main: `
praxis-gate - claims verification and release gating

USAGE:
    praxis-gate <command> [options]

COMMANDS:
${Object.entries(COMMANDS)
  .map(([name, { description }]) => `    ${name.padEnd(8)}${description}`)
  .join('\n')}

GLOBAL OPTIONS:
    -h, --help       Show help
    -v, --version    Print the version
    --verbose        Enable debug logging (stderr)

ENVIRONMENT:
    PRAXIS_DATASET_ROOT, PRAXIS_RUNS_DIR, PRAXIS_MIN_ATTRIBUTION_COVERAGE,
    PRAXIS_NUMERIC_ABS_TOL, PRAXIS_NUMERIC_REL_TOL, PRAXIS_WRITE_ARTIFACTS
`,

  run: `
praxis-gate run - Verify claims and gate the release

USAGE:
    ${COMMANDS.run.usage}

OPTIONS:
    --dataset <dir>       Dataset directory (transactions.csv, journal_entries.csv,
                          trial_balance.csv); claims are generated from it
    --claims <file>       JSON array of claims to verify instead of generating them
    --runs-dir <dir>      Where run artifacts are written (default: praxis_runs)
    --min-coverage <x>    Required attribution coverage in (0, 1] (default: 1.0)
    --no-artifact         Do not write a run artifact
    --json                Print the result as JSON on stdout

EXIT CODES:
    0  proceed
    2  hold
    3  block
    1  error
`,

  eval: `
praxis-gate eval - Evaluate the gate against a case file

USAGE:
    ${COMMANDS.eval.usage}

OPTIONS:
    --case <file>         YAML or JSON case with expectations
    --out <dir>           Result directory (default: praxis_eval)
    --dataset <dir>       Dataset used to generate claims
    --min-coverage <x>    Required attribution coverage in (0, 1]
    --json                Print the result document on stdout

EXIT CODES:
    0  case passed or stated no expectations
    2  case failed
    1  error
`,

  help: `
praxis-gate help - Show help information

USAGE:
    ${COMMANDS.help.usage}
`,
};

export function getCommandHelp(command?: string): string {
  if (command === undefined) return HELP_TEXT.main;
  return isCommand(command) ? HELP_TEXT[command] : `Unknown command: ${command}\n${HELP_TEXT.main}`;
}
