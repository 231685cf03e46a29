/**
 * Optional named-entity recognition used as a low-weight company-name signal.
 * Implementations return organisation names found in the given text.
 */
export interface EntityRecognizer {
  organizations(text: string): readonly string[];
}

/** Default recogniser: contributes no candidates, leaving the heuristic chain in charge. */
export const noEntityRecognizer: EntityRecognizer = {
  organizations: () => [],
};
