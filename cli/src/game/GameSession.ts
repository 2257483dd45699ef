/**
 * @file GameSession.ts
 * @description Plays one game by wiring a RoundEngine to a prompter and the
 * round text.
 *
 * Per round:
 *   1. startRound() and print the offer
 *   2. ask for a weapon until the engine accepts one; a ValidationError or
 *      the round's single AffordabilityError prints a message and asks again
 *   3. resolveRound(), print both weapons, wait the reveal delay, print the
 *      outcome and running score
 *
 * After the last round the final summary is printed and returned.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { TIMING } from '@shared/constants/GameConstants';
import { AffordabilityError, ValidationError } from '@shared/errors/GameErrors';
import type { GameSummary, Purchase, TierOffer } from '@shared/types/GameTypes';
import { parseWholeNumber } from '../input/InputParsing';
import type { WeaponPrompter } from '../input/Prompter';
import type { Writer } from '../ui/Output';
import { renderGameSummary, renderMatchup, renderOutcome, renderTierOffer } from '../ui/RoundSummary';
import type { RoundEngine } from './RoundEngine';

// ============================================================================
// --- Types ---
// ============================================================================

export interface GameSessionOptions {
  /** Fresh engine for this game */
  engine: RoundEngine;
  /** Source of weapon selections */
  prompter: WeaponPrompter;
  /** Sink for round text */
  write: Writer;
  /** Pause before each outcome is shown (defaults to TIMING.revealDelayMs; 0 disables) */
  revealDelayMs?: number;
}

// ============================================================================
// --- GameSession Class ---
// ============================================================================

export class GameSession {
  private readonly engine: RoundEngine;
  private readonly prompter: WeaponPrompter;
  private readonly write: Writer;
  private readonly revealDelayMs: number;

  constructor(options: GameSessionOptions) {
    this.engine = options.engine;
    this.prompter = options.prompter;
    this.write = options.write;
    this.revealDelayMs = options.revealDelayMs ?? TIMING.revealDelayMs;
  }

  /** Play every remaining round and return the final summary */
  async play(): Promise<GameSummary> {
    while (!this.engine.isGameOver()) {
      const offer = this.engine.startRound();
      this.write(renderTierOffer(offer));

      await this.buy(offer);

      const result = this.engine.resolveRound();
      this.write(renderMatchup(result));
      if (this.revealDelayMs > 0) {
        await sleep(this.revealDelayMs);
      }
      this.write(renderOutcome(result));
    }

    const summary = this.engine.getSummary();
    this.write(renderGameSummary(summary));
    return summary;
  }

  /** Ask until the engine accepts a purchase */
  private async buy(offer: TierOffer): Promise<Purchase> {
    for (let attempt = 1; ; attempt++) {
      const answer = await this.prompter.selectWeapon(offer, attempt);
      try {
        return this.engine.chooseWeapon(parseWholeNumber(answer));
      } catch (error) {
        if (error instanceof ValidationError || error instanceof AffordabilityError) {
          this.write(error.message);
          continue;
        }
        throw error;
      }
    }
  }
}
