import { ANALYSIS_DEPTHS, recommendationsFor } from '@ydel/core';
import type { Command } from 'commander';
import type { z } from 'zod';

import { exitCodeForError } from '../shared/cli-error.js';
import { ExitCodes, exitWithCode } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ClassifyCommandOptionsSchema } from '../shared/schemas.js';

import { ClassifyHandler, type ClassifyHandlerResult } from './classify-handler.js';
import { formatClassificationLines, formatClassificationReport, formatValidationLines } from './classify-view-utils.js';

/**
 * Command options (validated at CLI boundary).
 */
export type CommandOptions = z.infer<typeof ClassifyCommandOptionsSchema>;

export interface ClassifyCommandDefaults {
  guideline: string;
}

/**
 * Register the classify command. It is the default command, so
 * `ydel sample.tsv` and `ydel classify sample.tsv` are equivalent.
 */
export function registerClassifyCommand(program: Command, defaults: ClassifyCommandDefaults): void {
  program
    .command('classify', { isDefault: true })
    .description('Classify the AZF microdeletion pattern of one sample')
    .argument('<file>', 'TSV file of marker<TAB>status rows')
    .option('-v, --verbose', 'Print the full report with marker summary and clinical recommendations')
    .option('--validate-only', 'Only list markers missing for the analysis depth, without classifying')
    .option('--depth <depth>', `Analysis depth for --validate-only (${ANALYSIS_DEPTHS.join(', ')})`, 'extension')
    .option('--guideline <id>', 'Guideline profile used for the decision tree', defaults.guideline)
    .option('--json', 'Output results in JSON format')
    .action(async (file: string, rawOptions: unknown) => {
      await executeClassifyCommand(file, rawOptions);
    });
}

async function executeClassifyCommand(file: string, rawOptions: unknown): Promise<void> {
  const parseResult = ClassifyCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager('text');
    output.error(
      'classify',
      new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const options = parseResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const handler = new ClassifyHandler();
  const result = await handler.execute({
    file,
    depth: options.depth,
    guideline: options.guideline,
    validateOnly: options.validateOnly ?? false,
  });

  if (result.isErr()) {
    output.error('classify', result.error, exitCodeForError(result.error));
    return;
  }

  if (output.isJsonMode()) {
    output.json('classify', buildJsonData(file, result.value));
  } else {
    output.lines(buildTextLines(result.value, options.verbose ?? false));
  }

  exitWithCode(ExitCodes.SUCCESS);
}

function buildJsonData(file: string, outcome: ClassifyHandlerResult): Record<string, unknown> {
  if (outcome.mode === 'validate') {
    return { file, ...outcome.validation };
  }

  const { panel, result } = outcome;
  return {
    file,
    ...result,
    markers: panel.toRecord(),
    recommendations: recommendationsFor(result.label),
  };
}

function buildTextLines(outcome: ClassifyHandlerResult, verbose: boolean): string[] {
  if (outcome.mode === 'validate') {
    return formatValidationLines(outcome.validation);
  }
  if (verbose) {
    return [formatClassificationReport(outcome.panel, outcome.result, outcome.profile)];
  }
  return formatClassificationLines(outcome.result);
}
