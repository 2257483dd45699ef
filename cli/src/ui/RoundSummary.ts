/**
 * @file RoundSummary.ts
 * @description Text shown while a game is played: the tier offer at the start
 * of each round, the weapon reveal, the outcome with the running score, and
 * the final summary.
 *
 * Every function here is a pure string producer. GameSession decides when
 * each piece is written.
 */

import type { GameSummary, RoundResult, TierOffer } from '@shared/types/GameTypes';

/** Format a dollar amount, keeping the sign in front of the symbol */
export function formatMoney(amount: number): string {
  return amount < 0 ? `-$${Math.abs(amount)}` : `$${amount}`;
}

/** Banner printed once when a game starts */
export const WELCOME_MESSAGE = 'Welcome to FireSync';

/**
 * Budget line followed by the numbered weapons of the tier.
 *
 * @example
 * Your Balance (Round 2): $1950
 * 1) MAC-10 $1050 (DPS: 386.67)
 * 7) P90 $2350 (DPS: 371.37) (not enough money)
 */
export function renderTierOffer(offer: TierOffer): string {
  const lines = [`Your Balance (Round ${offer.round}): ${formatMoney(offer.budget)}`];
  for (const option of offer.options) {
    const suffix = option.affordable ? '' : ' (not enough money)';
    const { name, price, dps } = option.weapon;
    lines.push(`${option.selection}) ${name} ${formatMoney(price)} (DPS: ${dps.toFixed(2)})${suffix}`);
  }
  return lines.join('\n');
}

/** Both weapons, shown before the reveal delay */
export function renderMatchup(result: RoundResult): string {
  return `Your Weapon is ${result.playerWeapon.name}\nEnemy Weapon is ${result.opponentWeapon.name}`;
}

/** Outcome and running tally, shown after the reveal delay */
export function renderOutcome(result: RoundResult): string {
  return `${result.won ? 'You win' : 'You lose'}\nScore Table : ${result.wins} ${result.losses}`;
}

export function renderGameSummary(summary: GameSummary): string {
  return [
    'Game Over',
    `Final Score : ${summary.wins} ${summary.losses}`,
    `Final Balance: ${formatMoney(summary.finalBudget)}`,
  ].join('\n');
}
