// ============================================================================
// EconomyConstants.ts
// Budget flow and the round tier table.
// ============================================================================

import type { RoundTier } from '../types/GameTypes';

// ----------------------------------------------------------------------------
// BUDGET
// ----------------------------------------------------------------------------

/**
 * Budget assigned at the start of round 1.
 * This is an assignment, not an increment: whatever came before is discarded.
 */
export const STARTING_BUDGET: number = 900;

// ----------------------------------------------------------------------------
// ROUND TIERS
// Each round offers one contiguous slice of the catalogue and credits a fixed
// amount on top of what the player saved. The slices never overlap and
// together cover the whole catalogue.
// ----------------------------------------------------------------------------

/**
 * Declarative round table, indexed by round - 1.
 *
 *   Round 1: pistols          [0, 10)   budget = 900
 *   Round 2: SMGs             [10, 17)  +1700
 *   Round 3: shotguns / LMGs  [17, 23)  +2000
 *   Round 4: rifles           [23, 30)  +2600
 *   Round 5: snipers          [30, 34)  +3500
 *
 * Round 1 has no affordability gate: the pick is charged as-is.
 */
export const ROUND_TIERS: readonly RoundTier[] = [
  { round: 1, start: 0, end: 10, budgetIncrement: 0, affordabilityGate: false },
  { round: 2, start: 10, end: 17, budgetIncrement: 1700, affordabilityGate: true },
  { round: 3, start: 17, end: 23, budgetIncrement: 2000, affordabilityGate: true },
  { round: 4, start: 23, end: 30, budgetIncrement: 2600, affordabilityGate: true },
  { round: 5, start: 30, end: 34, budgetIncrement: 3500, affordabilityGate: true },
];

/**
 * Look up the tier for a round.
 *
 * @param round - 1-based round number
 * @returns The tier row for that round
 * @throws RangeError if the round is outside the table
 */
export function getRoundTier(round: number): RoundTier {
  const tier = ROUND_TIERS[round - 1];
  if (tier === undefined) {
    throw new RangeError(`No tier defined for round ${round}`);
  }
  return tier;
}

/**
 * Find the tier a catalogue index belongs to.
 * Returns null for indices past the last tier.
 */
export function getTierOfIndex(index: number): RoundTier | null {
  return ROUND_TIERS.find((tier) => index >= tier.start && index < tier.end) ?? null;
}
