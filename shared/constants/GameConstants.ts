// ============================================================================
// GameConstants.ts
// Core game structure and pacing constants.
// All values are readonly and grouped by domain for easy reference.
// ============================================================================

// ----------------------------------------------------------------------------
// CATALOGUE CONSTANTS
// ----------------------------------------------------------------------------

/**
 * Catalogue limits.
 * Records past `capacity` in a data file are never read.
 */
export const CATALOGUE = {
  /** Maximum number of weapon records loaded from a source */
  capacity: 34,

  /** Number of whitespace-delimited fields on every record line */
  fieldsPerRecord: 8,

  /** Data file used when --data is not given, relative to the project root */
  defaultDataFile: 'data/case.txt',
} as const;

// ----------------------------------------------------------------------------
// MATCH CONSTANTS
// ----------------------------------------------------------------------------

/** Match structure. A game is always exactly this many rounds. */
export const MATCH = {
  /** Rounds in one game */
  rounds: 5,
} as const;

// ----------------------------------------------------------------------------
// TIMING CONSTANTS
// All time values are in milliseconds.
// ----------------------------------------------------------------------------

/**
 * Pacing constants.
 * The reveal delay only affects presentation; the outcome is decided before it.
 */
export const TIMING = {
  /** Pause between showing both weapons and showing who won */
  revealDelayMs: 1000,
} as const;
