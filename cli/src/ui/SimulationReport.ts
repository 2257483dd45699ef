import type { MatchupStats } from '../simulation/MatchupSimulator';

/**
 * Win-rate report for --sim, one weapon per line in the order given.
 *
 * @example
 * Simulation Results (1000 draws per weapon)
 * AWP          tier 5  win rate  75.1%
 */
export function renderSimulationReport(stats: readonly MatchupStats[], iterations: number): string {
  const lines = [`Simulation Results (${iterations} draws per weapon)`];
  for (const s of stats) {
    lines.push(`${s.weapon.name.padEnd(12)} tier ${s.tier}  win rate ${s.winRate.toFixed(1).padStart(5)}%`);
  }
  return lines.join('\n');
}
