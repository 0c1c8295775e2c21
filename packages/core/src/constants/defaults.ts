/**
 * Default configuration constants for SixDegrees
 */

export const DEFAULT_CONFIG = {
  /** Actor every query is measured against */
  REFERENCE_ACTOR: 'Kevin Bacon',

  /** Dataset parsing settings */
  DATASET: {
    /** Separator between a movie heading's label and its title */
    HEADING_MARKER: ':',
    /** Whether repeated movie titles share one movie record */
    MERGE_DUPLICATE_MOVIES: false,
  },
} as const;
