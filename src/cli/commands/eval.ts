/**
 * @fileoverview Eval Command
 *
 * Runs one evaluation case against the gate and records the result document.
 *
 * Usage: praxis-gate eval [--case <file>] [--out <dir>] [--dataset <dir>]
 *                         [--min-coverage <x>] [--json]
 */

import { parseArgs } from 'node:util';
import { resolveGitRevision } from '../../artifacts/git_revision.js';
import { resolvePipelineConfig } from '../../config/pipeline_config.js';
import { parseEvalCase, runEvaluation, writeEvaluationResult } from '../../evaluation/harness.js';
import { generateSampleClaims } from '../../generator/dataset_claims.js';
import { logWarning } from '../../telemetry/logger.js';
import { parseCoverageOption, withUsageErrors, type CommandContext } from '../args.js';
import { EXIT_CODES } from '../errors.js';

export const DEFAULT_EVAL_OUT_DIR = 'praxis_eval';

export interface EvalCommandContext extends CommandContext {
  /** Skip the git lookup. */
  revision?: string;
}

export async function evalCommand(context: EvalCommandContext): Promise<number> {
  const { args, env = process.env, write = console.log } = context;
  const { values } = withUsageErrors(() =>
    parseArgs({
      args: [...args],
      options: {
        case: { type: 'string' },
        out: { type: 'string' },
        dataset: { type: 'string' },
        'min-coverage': { type: 'string' },
        json: { type: 'boolean', default: false },
      },
      strict: true,
      allowPositionals: false,
    })
  );

  const config = resolvePipelineConfig(env, {
    datasetRoot: values.dataset,
    minAttributionCoverage: parseCoverageOption(values['min-coverage']),
  });

  const evalCase = await parseEvalCase(values.case);
  if (evalCase.parse_error !== undefined) {
    logWarning('Evaluation case could not be read', { case: evalCase.name, error: evalCase.parse_error });
  }

  const claims = await generateSampleClaims(config.datasetRoot);
  const revision = context.revision ?? (await resolveGitRevision());
  const result = runEvaluation(evalCase, {
    claims,
    minAttributionCoverage: config.minAttributionCoverage,
    revision,
  });
  const { latestPath } = await writeEvaluationResult(result, values.out ?? DEFAULT_EVAL_OUT_DIR);

  if (values.json) {
    write(JSON.stringify(result, null, 2));
  } else {
    write(`Case: ${evalCase.name}`);
    write(`Verification: ${result.outputs.verification_status} (${result.outputs.summary})`);
    write(`Release: ${result.outputs.release_decision}`);
    for (const [verdict, ok] of Object.entries(result.verdicts)) {
      write(`  ${ok ? 'ok  ' : 'FAIL'} ${verdict}`);
    }
    write(`Pass: ${result.pass === null ? 'n/a (no expectations)' : String(result.pass)}`);
    write(`Result: ${latestPath}`);
  }

  return result.pass === false ? EXIT_CODES.evaluationFailed : EXIT_CODES.ok;
}
