import { err, ok, type Result } from 'neverthrow';

import type { MarkerPanel } from '../markers/marker-panel.js';
import type { MarkerName } from '../markers/marker-vocabulary.js';

/**
 * Proximal breakpoint of a combined AZFbc deletion. Both recognised patterns
 * share the distal P1 breakpoint.
 */
export type AzfbcBoundary = 'P5_DISTAL_P1' | 'P4_DISTAL_P1' | 'undetermined';

/**
 * Guideline-versioned parts of the decision tree. The published text names
 * the AZFbc boundary markers without fixing the rule, so the rule lives here
 * rather than in the classifier.
 */
export interface GuidelineProfile {
  readonly id: string;
  readonly title: string;
  /** Markers `azfbcBoundary` reads; untested ones are reported when the subtype stays undetermined. */
  readonly azfbcBoundaryMarkers: readonly MarkerName[];
  azfbcBoundary(panel: MarkerPanel): AzfbcBoundary;
}

export const EAA_EMQN_2023: GuidelineProfile = {
  id: 'eaa-emqn-2023',
  title: 'EAA/EMQN best practice guidelines for Y-chromosomal microdeletions (2023)',
  azfbcBoundaryMarkers: ['sY105', 'sY121'],
  azfbcBoundary(panel) {
    const sY105 = panel.statusOf('sY105');
    const sY121 = panel.statusOf('sY121');

    if (sY105 === 'not_tested' || sY121 === 'not_tested') return 'undetermined';
    // sY105 lost while sY121 is retained fits neither breakpoint
    if (sY105 === 'absent') return 'undetermined';
    return sY121 === 'present' ? 'P4_DISTAL_P1' : 'P5_DISTAL_P1';
  },
};

const PROFILES: ReadonlyMap<string, GuidelineProfile> = new Map([[EAA_EMQN_2023.id, EAA_EMQN_2023]]);

export function listGuidelineProfiles(): GuidelineProfile[] {
  return [...PROFILES.values()];
}

export function getGuidelineProfile(id: string): Result<GuidelineProfile, Error> {
  const profile = PROFILES.get(id);
  if (!profile) {
    return err(new Error(`Unknown guideline '${id}'. Available: ${[...PROFILES.keys()].join(', ')}`));
  }
  return ok(profile);
}
