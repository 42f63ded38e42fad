// Imperative shell for the classify command: reads the file, then hands off to the core.

import {
  classify,
  getGuidelineProfile,
  MarkerPanel,
  type AnalysisDepth,
  type ClassificationResult,
  type DuplicateMarkerError,
  type GuidelineProfile,
  type MissingRequiredMarkerError,
  type ParseError,
} from '@ydel/core';
import { getLogger } from '@ydel/logger';
import { err, ok, type Result } from 'neverthrow';

import { InvalidOptionError } from '../shared/cli-error.js';
import { readTextFile, type ReadFileError } from '../shared/file-utils.js';

import { buildValidationSummary, parseMarkerTsv, type ValidationSummary } from './classify-utils.js';

const logger = getLogger('ClassifyHandler');

export interface ClassifyHandlerParams {
  file: string;
  depth: AnalysisDepth;
  guideline: string;
  validateOnly: boolean;
}

export type ClassifyHandlerResult =
  | { mode: 'validate'; panel: MarkerPanel; validation: ValidationSummary }
  | { mode: 'classify'; panel: MarkerPanel; profile: GuidelineProfile; result: ClassificationResult };

export type ClassifyHandlerError =
  | ReadFileError
  | InvalidOptionError
  | ParseError
  | DuplicateMarkerError
  | MissingRequiredMarkerError;

/**
 * Handler for the classify command.
 */
export class ClassifyHandler {
  async execute(params: ClassifyHandlerParams): Promise<Result<ClassifyHandlerResult, ClassifyHandlerError>> {
    const profileResult = getGuidelineProfile(params.guideline);
    if (profileResult.isErr()) {
      return err(new InvalidOptionError(profileResult.error.message));
    }
    const profile = profileResult.value;

    const contentResult = await readTextFile(params.file);
    if (contentResult.isErr()) {
      return err(contentResult.error);
    }

    const panelResult = parseMarkerTsv(contentResult.value).andThen((rows) => MarkerPanel.build(rows));
    if (panelResult.isErr()) {
      return err(panelResult.error);
    }
    const panel = panelResult.value;
    logger.debug({ file: params.file, markers: panel.size }, 'Marker file loaded');

    if (params.validateOnly) {
      return ok({ mode: 'validate', panel, validation: buildValidationSummary(panel, params.depth) });
    }

    const classified = classify(panel, { guideline: profile });
    if (classified.isErr()) {
      return err(classified.error);
    }

    const result = classified.value;
    logger.info({ label: result.label, guideline: profile.id }, 'Sample classified');
    return ok({ mode: 'classify', panel, profile, result });
  }
}
