import { z } from 'zod';

export const MarkerStatusSchema = z.enum(['present', 'absent']);
export type MarkerStatus = z.infer<typeof MarkerStatusSchema>;

/** Tri-state call: a marker missing from the panel is `not_tested`, never `absent`. */
export type MarkerCall = MarkerStatus | 'not_tested';

/**
 * One raw input row. `line` is the 1-based source line when the reader knows
 * it; otherwise the row's position is reported.
 */
export interface RawMarkerRow {
  name: string;
  status: string;
  line?: number | undefined;
}

/**
 * Parse a raw status string, accepting any case and surrounding whitespace.
 */
export function parseMarkerStatus(raw: string): MarkerStatus | undefined {
  const result = MarkerStatusSchema.safeParse(raw.trim().toLowerCase());
  return result.success ? result.data : undefined;
}
