#!/usr/bin/env node
import { getErrorMessage } from '@ydel/core';
import { loadEnv, type EnvConfig } from '@ydel/env';
import { ConsoleSink, FileSink, getLogger, initLogger, type Sink } from '@ydel/logger';

import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';
import { OutputManager } from './features/shared/output.js';
import { createProgram } from './program.js';

const logger = getLogger('CLI');

function setupLogging(config: EnvConfig): void {
  const sinks: Sink[] = [new ConsoleSink({ color: config.YDEL_LOG_COLOR })];
  if (config.YDEL_LOG_FILE) {
    sinks.push(new FileSink({ path: config.YDEL_LOG_FILE }));
  }
  initLogger({ level: config.YDEL_LOG_LEVEL, sinks });
}

async function main(): Promise<void> {
  const envResult = loadEnv();
  if (envResult.isErr()) {
    new OutputManager('text').error('ydel', envResult.error, ExitCodes.CONFIG_ERROR);
    return;
  }

  const config = envResult.value;
  setupLogging(config);
  logger.debug({ guideline: config.YDEL_GUIDELINE, env: config.NODE_ENV }, 'Configuration loaded');

  await createProgram(config).parseAsync();
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${getErrorMessage(reason)}`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});

process.on('uncaughtException', (error) => {
  logger.error({ error }, `Uncaught Exception: ${error.message}`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${getErrorMessage(error)}`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});
