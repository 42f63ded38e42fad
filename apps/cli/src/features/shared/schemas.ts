import { ANALYSIS_DEPTHS, MARKER_GROUPS } from '@ydel/core';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

/**
 * Classify command options
 */
export const ClassifyCommandOptionsSchema = z
  .object({
    validateOnly: z.boolean().optional(),
    depth: z.enum(ANALYSIS_DEPTHS, {
      errorMap: () => ({ message: `--depth must be one of: ${ANALYSIS_DEPTHS.join(', ')}` }),
    }),
    guideline: z.string().trim().min(1, { message: '--guideline must not be empty' }),
  })
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape)
  .refine((data) => !(data.validateOnly && data.verbose), {
    message: 'Cannot combine --validate-only with --verbose',
  });

/**
 * List markers command options
 */
export const ListMarkersCommandOptionsSchema = z
  .object({
    group: z
      .enum(MARKER_GROUPS, {
        errorMap: () => ({ message: `--group must be one of: ${MARKER_GROUPS.join(', ')}` }),
      })
      .optional(),
  })
  .extend(JsonFlagSchema.shape);
