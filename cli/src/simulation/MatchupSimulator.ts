/**
 * @file MatchupSimulator.ts
 * @description Batch balance check (--sim). Every weapon faces `iterations`
 * opponents drawn from its own tier, exactly as in a round, and its win rate
 * is reported. Useful to spot weapons that can never win or never lose.
 */

import { getTierOfIndex } from '@shared/constants/EconomyConstants';
import { outscores } from '@shared/formulas/StatFormulas';
import type { Catalogue, ScoredWeapon } from '@shared/types/WeaponTypes';
import type { RandomSource } from '@shared/util/RandomUtils';

/** Simulated record of a single weapon */
export interface MatchupStats {
  weapon: ScoredWeapon;
  /** Round number whose tier the weapon belongs to */
  tier: number;
  wins: number;
  battles: number;
  /** Wins as a percentage of battles, rounded to one decimal */
  winRate: number;
}

/**
 * Simulate tier matchups for every weapon that belongs to a tier.
 *
 * @param catalogue - Loaded catalogue (weapons past the last tier are skipped)
 * @param iterations - Opponent draws per weapon; must be a positive integer
 * @param rng - Source of opponent draws
 * @returns Stats sorted by win rate (highest first), then by catalogue index
 */
export function simulateMatchups(
  catalogue: Catalogue,
  iterations: number,
  rng: RandomSource
): MatchupStats[] {
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new RangeError(`iterations must be a positive integer, got ${iterations}`);
  }

  const stats: MatchupStats[] = [];
  for (const weapon of catalogue.weapons) {
    const tier = getTierOfIndex(weapon.index);
    if (tier === null) continue;

    const last = Math.min(tier.end, catalogue.count) - 1;
    let wins = 0;
    for (let i = 0; i < iterations; i++) {
      const opponent = catalogue.weapons[rng.nextInt(tier.start, last)];
      if (outscores(weapon, opponent)) wins++;
    }

    stats.push({
      weapon,
      tier: tier.round,
      wins,
      battles: iterations,
      winRate: Math.round((wins / iterations) * 1000) / 10,
    });
  }

  console.error(`[Sim] ${stats.length} weapons x ${iterations} draws simulated`);
  return stats.sort((a, b) => b.winRate - a.winRate || a.weapon.index - b.weapon.index);
}
