import type { EnvConfig } from '@ydel/env';
import { Command } from 'commander';

import { registerClassifyCommand } from './features/classify/classify.js';
import { registerListMarkersCommand } from './features/list-markers/list-markers.js';

export const CLI_VERSION = '0.1.0';

/**
 * Build the commander program with every command registered.
 */
export function createProgram(config: Pick<EnvConfig, 'YDEL_GUIDELINE'>): Command {
  const program = new Command();

  program
    .name('ydel')
    .description('Classify Y-chromosome AZF microdeletions according to the EAA/EMQN 2023 guidelines')
    .version(CLI_VERSION);

  // Default command: `ydel <file>` runs classify
  registerClassifyCommand(program, { guideline: config.YDEL_GUIDELINE });

  registerListMarkersCommand(program);

  return program;
}
