/**
 * GameTypes.ts - Round engine state and the values it hands to presentation
 *
 * The round engine is the single owner of a RoundState. Everything else in
 * this file is a read-only snapshot produced by one engine operation.
 */

import type { ScoredWeapon } from './WeaponTypes';

// ============================================================
// Enums - Round phases
// ============================================================

/** Phase of the round state machine */
export enum RoundPhase {
  /** Waiting for the next round to begin (budget not yet credited) */
  ROUND_START = 'ROUND_START',
  /** Budget credited, tier weapons offered, waiting for a selection */
  TIER_OFFERED = 'TIER_OFFERED',
  /** A weapon was bought, waiting for the opponent draw */
  WEAPON_CHOSEN = 'WEAPON_CHOSEN',
  /** Round outcome decided; transient before the next ROUND_START */
  RESOLVED = 'RESOLVED',
  /** All rounds played */
  GAME_OVER = 'GAME_OVER',
}

// ============================================================
// Interfaces - Tiers and state
// ============================================================

/**
 * One row of the round table: which slice of the catalogue a round offers,
 * and how the budget changes when that round starts.
 */
export interface RoundTier {
  /** Round number (1-based) */
  readonly round: number;
  /** First catalogue index in the tier (inclusive) */
  readonly start: number;
  /** Last catalogue index in the tier (exclusive) */
  readonly end: number;
  /** Money added to the running budget when the round starts */
  readonly budgetIncrement: number;
  /** Whether an unaffordable first pick is rejected and re-prompted once */
  readonly affordabilityGate: boolean;
}

/** Mutable state of one game, owned by the RoundEngine */
export interface RoundState {
  /** Current round (1..ROUND_COUNT) */
  roundNumber: number;
  /** Money available; may drop below zero through the retry quirk */
  budget: number;
  /** Rounds won so far */
  wins: number;
  /** Rounds lost so far (ties included) */
  losses: number;
}

/** A single numbered entry in a tier offer */
export interface TierOption {
  /** 1-based number the player types to pick this weapon */
  readonly selection: number;
  /** The weapon on offer */
  readonly weapon: ScoredWeapon;
  /** Whether the current budget covers the price */
  readonly affordable: boolean;
}

/** What startRound() presents to the player */
export interface TierOffer {
  readonly round: number;
  readonly budget: number;
  readonly tier: RoundTier;
  readonly options: readonly TierOption[];
}

/** A completed purchase */
export interface Purchase {
  readonly round: number;
  readonly selection: number;
  readonly weapon: ScoredWeapon;
  /** Budget after the price was deducted */
  readonly budgetAfter: number;
  /** True when the purchase went through on the retry without enough money */
  readonly overBudget: boolean;
}

/** Outcome of one round */
export interface RoundResult {
  readonly round: number;
  readonly playerWeapon: ScoredWeapon;
  readonly opponentWeapon: ScoredWeapon;
  readonly won: boolean;
  /** Running tally after this round */
  readonly wins: number;
  readonly losses: number;
  readonly budget: number;
}

/** Final tally once the engine reaches GAME_OVER */
export interface GameSummary {
  readonly wins: number;
  readonly losses: number;
  readonly finalBudget: number;
  readonly rounds: readonly RoundResult[];
}
