import { listGuidelineProfiles } from '@ydel/core';
import type { Command } from 'commander';
import type { z } from 'zod';

import { ExitCodes, exitWithCode } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ListMarkersCommandOptionsSchema } from '../shared/schemas.js';

import { buildMarkerList, buildSummary, formatMarkerList } from './list-markers-utils.js';

/**
 * Command options (validated at CLI boundary).
 */
export type CommandOptions = z.infer<typeof ListMarkersCommandOptionsSchema>;

/**
 * Register the list-markers command.
 */
export function registerListMarkersCommand(program: Command): void {
  program
    .command('list-markers')
    .description('List the recognized STS markers with their group, region and synonyms')
    .option('--group <group>', 'Filter by group (control, basic, extension)')
    .option('--json', 'Output results in JSON format')
    .action((rawOptions: unknown) => {
      executeListMarkersCommand(rawOptions);
    });
}

function executeListMarkersCommand(rawOptions: unknown): void {
  const parseResult = ListMarkersCommandOptionsSchema.safeParse(rawOptions);
  if (!parseResult.success) {
    const output = new OutputManager('text');
    output.error(
      'list-markers',
      new Error(parseResult.error.issues[0]?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS
    );
    return;
  }

  const options = parseResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const markers = buildMarkerList(options.group);
  const summary = buildSummary(markers);
  const guidelines = listGuidelineProfiles().map((profile) => ({ id: profile.id, title: profile.title }));

  if (output.isJsonMode()) {
    output.json('list-markers', { markers, summary, guidelines });
  } else {
    output.lines([
      ...formatMarkerList(markers, summary),
      '',
      'Guideline profiles:',
      ...guidelines.map((guideline) => `  ${guideline.id}  ${guideline.title}`),
    ]);
  }

  exitWithCode(ExitCodes.SUCCESS);
}
