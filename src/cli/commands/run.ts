/**
 * @fileoverview Run Command
 *
 * Verifies a claim batch, prints the report and release decision, and maps
 * the decision onto the process exit code.
 *
 * Usage: praxis-gate run [--dataset <dir>] [--claims <file>] [--runs-dir <dir>]
 *                        [--min-coverage <x>] [--no-artifact] [--json]
 */

import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { claimBatchFromJSON } from '../../claims/serialization.js';
import type { Claim } from '../../claims/types.js';
import { resolvePipelineConfig } from '../../config/pipeline_config.js';
import { Errors } from '../../core/errors.js';
import { runPipeline, type PipelineResult } from '../../pipeline/run_pipeline.js';
import { releaseOutcomeToJSON } from '../../release/decision.js';
import { getErrorMessage } from '../../utils/errors.js';
import { verificationReportToJSON } from '../../verification/types.js';
import { parseCoverageOption, withUsageErrors, type CommandContext, type WriteLine } from '../args.js';
import { exitCodeForDecision } from '../errors.js';

export const RUN_SOURCE = 'cli';

async function readClaimsFile(path: string): Promise<Claim[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw Errors.dataset(path, `cannot read claims file: ${getErrorMessage(error)}`);
  }
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw Errors.parse('json', getErrorMessage(error), path);
  }
  return claimBatchFromJSON(document);
}

export function pipelineResultToJSON(result: PipelineResult) {
  return {
    verification: verificationReportToJSON(result.verification),
    numeric_agreement: verificationReportToJSON(result.numeric.report),
    release: releaseOutcomeToJSON(result.release),
    artifact: result.artifact,
  };
}

function printText(result: PipelineResult, write: WriteLine): void {
  write(`Verification: ${result.verification.status}`);
  write(`  ${result.verification.summary}`);
  for (const check of result.verification.checks) {
    write(`  - ${check.claimId}: ${check.status} (${check.reason})`);
  }
  write(`Numeric agreement: ${result.numeric.report.summary}`);
  write(`Release: ${result.release.decision} - ${result.release.reason}`);
  if (result.artifact.written) {
    write(`Artifact: ${result.artifact.path}`);
  } else if (result.artifact.skipped) {
    write('Artifact: skipped');
  } else {
    write(`Artifact: not written (${result.artifact.error})`);
  }
}

export async function runGateCommand(context: CommandContext): Promise<number> {
  const { args, env = process.env, write = console.log } = context;
  const { values } = withUsageErrors(() =>
    parseArgs({
      args: [...args],
      options: {
        dataset: { type: 'string' },
        claims: { type: 'string' },
        'runs-dir': { type: 'string' },
        'min-coverage': { type: 'string' },
        'no-artifact': { type: 'boolean', default: false },
        json: { type: 'boolean', default: false },
      },
      strict: true,
      allowPositionals: false,
    })
  );

  const config = resolvePipelineConfig(env, {
    datasetRoot: values.dataset,
    runsDir: values['runs-dir'],
    minAttributionCoverage: parseCoverageOption(values['min-coverage']),
    writeArtifacts: values['no-artifact'] ? false : undefined,
  });

  const claims = values.claims === undefined ? undefined : await readClaimsFile(values.claims);
  const result = await runPipeline(config, { runSource: RUN_SOURCE, claims });

  if (values.json) {
    write(JSON.stringify(pipelineResultToJSON(result), null, 2));
  } else {
    printText(result, write);
  }
  return exitCodeForDecision(result.release.decision);
}
