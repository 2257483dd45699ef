/**
 * @file StatFormulas.ts
 * @description Formulas deriving comparison figures from raw weapon stats.
 * Pure functions, deterministic. Randomness lives in the callers.
 */

import type { ScoredWeapon, WeaponRecord } from '../types/WeaponTypes';

// ============================================================================
// --- Balance Formulas ---
// ============================================================================

/**
 * Balance score of a weapon.
 *
 *   score = (damage * fireRate + magazineSize * accurateRange) / (falloff + recoil)
 *
 * Higher is better. Falloff and recoil both penalise the weapon.
 *
 * @param record - Raw weapon stats
 * @returns The balance score
 * @throws RangeError when falloff + recoil is zero
 */
export function calculateBalanceScore(record: WeaponRecord): number {
  const penalty = record.falloff + record.recoil;
  if (penalty === 0) {
    throw new RangeError(`Balance score of ${record.name} is undefined: falloff + recoil is 0`);
  }
  return (record.damage * record.fireRate + record.magazineSize * record.accurateRange) / penalty;
}

/**
 * Damage per second. Fire rate is in rounds per minute.
 * @param record - Raw weapon stats
 * @returns Damage dealt per second of sustained fire
 */
export function calculateDps(record: WeaponRecord): number {
  return (record.damage * record.fireRate) / 60;
}

/**
 * Build the frozen, scored form of a record.
 * @param record - Raw weapon stats
 * @param index - Catalogue position
 */
export function scoreWeapon(record: WeaponRecord, index: number): ScoredWeapon {
  return Object.freeze({
    name: record.name,
    price: record.price,
    damage: record.damage,
    fireRate: record.fireRate,
    magazineSize: record.magazineSize,
    falloff: record.falloff,
    accurateRange: record.accurateRange,
    recoil: record.recoil,
    index,
    balanceScore: calculateBalanceScore(record),
    dps: calculateDps(record),
  });
}

// ============================================================================
// --- Matchup Formulas ---
// ============================================================================

/**
 * Whether `player` beats `opponent`. Strictly greater score wins; a tie loses.
 */
export function outscores(player: ScoredWeapon, opponent: ScoredWeapon): boolean {
  return player.balanceScore > opponent.balanceScore;
}
