/**
 * @file RoundEngine.ts
 * @description The round-based economy loop.
 *
 * A game is exactly MATCH.rounds rounds. Each round walks the state machine:
 *
 *   ROUND_START ──startRound()──▶ TIER_OFFERED ──chooseWeapon()──▶ WEAPON_CHOSEN
 *        ▲                                                              │
 *        └────────── (rounds left) ◀── RESOLVED ◀──resolveRound()──────┘
 *                                         │
 *                                         └── (last round) ──▶ GAME_OVER
 *
 * The engine is synchronous and owns the RoundState. It never prints or
 * waits; GameSession does the talking and the pacing.
 */

import { MATCH } from '@shared/constants/GameConstants';
import { ROUND_TIERS, STARTING_BUDGET, getRoundTier } from '@shared/constants/EconomyConstants';
import { AffordabilityError, LoadError, PhaseError, ValidationError } from '@shared/errors/GameErrors';
import { outscores } from '@shared/formulas/StatFormulas';
import {
  RoundPhase,
  type GameSummary,
  type Purchase,
  type RoundResult,
  type RoundState,
  type RoundTier,
  type TierOffer,
} from '@shared/types/GameTypes';
import type { Catalogue, ScoredWeapon } from '@shared/types/WeaponTypes';
import type { RandomSource } from '@shared/util/RandomUtils';
import { getTierWeapons } from '../catalogue/CatalogueLoader';

// ============================================================================
// --- RoundEngine Class ---
// ============================================================================

/**
 * Drives one game over a full catalogue.
 *
 * @example
 * ```ts
 * const engine = new RoundEngine(catalogue, new SeededRandom(7));
 * while (!engine.isGameOver()) {
 *   const offer = engine.startRound();
 *   engine.chooseWeapon(1);
 *   const result = engine.resolveRound();
 * }
 * ```
 */
export class RoundEngine {
  /** Weapons on offer, shared read-only with presentation */
  private readonly catalogue: Catalogue;

  /** Source of opponent draws */
  private readonly rng: RandomSource;

  /** Current phase of the state machine */
  private phase: RoundPhase = RoundPhase.ROUND_START;

  /** Budget and tally */
  private readonly state: RoundState = { roundNumber: 1, budget: 0, wins: 0, losses: 0 };

  /** Whether this round's single affordability retry has been used */
  private retryUsed: boolean = false;

  /** Weapon bought this round (null until WEAPON_CHOSEN) */
  private purchase: Purchase | null = null;

  /** Results of finished rounds, in order */
  private readonly results: RoundResult[] = [];

  /**
   * @param catalogue - Loaded catalogue; must cover every tier
   * @param rng - Source of opponent draws
   * @throws LoadError if the catalogue is too short for the last tier
   */
  constructor(catalogue: Catalogue, rng: RandomSource) {
    const required = ROUND_TIERS[ROUND_TIERS.length - 1].end;
    if (catalogue.count < required) {
      throw new LoadError(
        `catalogue holds ${catalogue.count} weapons, a full game needs ${required}`,
        { source: catalogue.source }
      );
    }
    this.catalogue = catalogue;
    this.rng = rng;
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  /** Snapshot of the current budget and tally */
  getState(): Readonly<RoundState> {
    return { ...this.state };
  }

  getPhase(): RoundPhase {
    return this.phase;
  }

  isGameOver(): boolean {
    return this.phase === RoundPhase.GAME_OVER;
  }

  /** Tier of the current round */
  getCurrentTier(): RoundTier {
    return getRoundTier(this.state.roundNumber);
  }

  /**
   * Final tally and per-round results.
   * @throws PhaseError before the last round is resolved
   */
  getSummary(): GameSummary {
    this.assertPhase(RoundPhase.GAME_OVER, 'summarise the game');
    return {
      wins: this.state.wins,
      losses: this.state.losses,
      finalBudget: this.state.budget,
      rounds: [...this.results],
    };
  }

  // --------------------------------------------------------------------------
  // Transitions
  // --------------------------------------------------------------------------

  /**
   * Begin the current round: credit the budget and offer the tier.
   * Round 1 assigns the starting budget; later rounds add their increment.
   */
  startRound(): TierOffer {
    this.assertPhase(RoundPhase.ROUND_START, 'start a round');

    const tier = this.getCurrentTier();
    this.state.budget = tier.round === 1 ? STARTING_BUDGET : this.state.budget + tier.budgetIncrement;
    this.retryUsed = false;
    this.purchase = null;
    this.phase = RoundPhase.TIER_OFFERED;

    return this.buildOffer(tier);
  }

  /**
   * Buy the weapon at a 1-based position within the current tier.
   *
   * In gated rounds an unaffordable first pick is refused once. The retry
   * is charged whatever it costs, so the budget can go negative.
   *
   * @param selection - 1-based position in the tier
   * @throws ValidationError if the selection is not a position in the tier
   * @throws AffordabilityError on an unaffordable first pick in a gated round
   */
  chooseWeapon(selection: number): Purchase {
    this.assertPhase(RoundPhase.TIER_OFFERED, 'choose a weapon');

    const tier = this.getCurrentTier();
    const size = tier.end - tier.start;
    if (!Number.isInteger(selection) || selection < 1 || selection > size) {
      throw new ValidationError(`Please choose a weapon between 1 and ${size}`);
    }

    const weapon = this.weaponAt(tier.start + selection - 1);
    const overBudget = this.state.budget < weapon.price;

    if (overBudget && tier.affordabilityGate && !this.retryUsed) {
      this.retryUsed = true;
      throw new AffordabilityError(weapon, this.state.budget);
    }

    this.state.budget -= weapon.price;
    this.purchase = {
      round: tier.round,
      selection,
      weapon,
      budgetAfter: this.state.budget,
      overBudget,
    };
    this.phase = RoundPhase.WEAPON_CHOSEN;
    return this.purchase;
  }

  /**
   * Draw the opponent from the same tier and decide the round.
   * The opponent may be the same weapon the player bought; a tie is a loss.
   */
  resolveRound(): RoundResult {
    this.assertPhase(RoundPhase.WEAPON_CHOSEN, 'resolve a round');
    if (this.purchase === null) {
      throw new PhaseError('resolve a round', this.phase);
    }

    const tier = this.getCurrentTier();
    const opponent = this.weaponAt(this.rng.nextInt(tier.start, tier.end - 1));
    const won = outscores(this.purchase.weapon, opponent);

    if (won) {
      this.state.wins++;
    } else {
      this.state.losses++;
    }

    const result: RoundResult = {
      round: tier.round,
      playerWeapon: this.purchase.weapon,
      opponentWeapon: opponent,
      won,
      wins: this.state.wins,
      losses: this.state.losses,
      budget: this.state.budget,
    };
    this.results.push(result);

    this.phase = RoundPhase.RESOLVED;
    this.advance();
    return result;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /** Move from RESOLVED to the next round, or end the game */
  private advance(): void {
    if (this.state.roundNumber >= MATCH.rounds) {
      this.phase = RoundPhase.GAME_OVER;
      return;
    }
    this.state.roundNumber++;
    this.phase = RoundPhase.ROUND_START;
  }

  private buildOffer(tier: RoundTier): TierOffer {
    const budget = this.state.budget;
    return {
      round: tier.round,
      budget,
      tier,
      options: getTierWeapons(this.catalogue, tier).map((weapon, i) => ({
        selection: i + 1,
        weapon,
        affordable: weapon.price <= budget,
      })),
    };
  }

  private weaponAt(index: number): ScoredWeapon {
    const weapon = this.catalogue.weapons[index];
    if (weapon === undefined) {
      throw new RangeError(`No weapon at catalogue index ${index}`);
    }
    return weapon;
  }

  private assertPhase(expected: RoundPhase, operation: string): void {
    if (this.phase !== expected) {
      throw new PhaseError(operation, this.phase);
    }
  }
}
