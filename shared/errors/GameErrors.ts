/**
 * @file GameErrors.ts
 * @description Error taxonomy for the game.
 *
 *   GameError
 *     ├── LoadError           catalogue source missing, unreadable or malformed
 *     ├── ValidationError     user input outside the accepted range
 *     ├── AffordabilityError  price above the current budget (re-prompted once)
 *     ├── PhaseError          round engine driven out of order
 *     └── InputClosedError    input stream ended while waiting for the player
 *
 * Every GameError carries a message meant for the player. Anything that is not
 * a GameError is a bug and propagates up to main().
 */

import type { ScoredWeapon } from '../types/WeaponTypes';

/** Base class for every expected failure */
export class GameError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Where in a catalogue source a LoadError happened */
export interface LoadErrorLocation {
  /** File path or source label */
  source: string;
  /** 1-based line number, when the error is tied to one line */
  line?: number;
}

/** The catalogue could not be loaded */
export class LoadError extends GameError {
  readonly source: string;
  readonly line: number | undefined;

  constructor(message: string, location: LoadErrorLocation, options?: { cause?: unknown }) {
    const where = location.line === undefined ? location.source : `${location.source}:${location.line}`;
    super(`${where}: ${message}`, options);
    this.source = location.source;
    this.line = location.line;
  }
}

/** A menu choice, weapon selection or flag value is out of range */
export class ValidationError extends GameError {}

/** The selected weapon costs more than the current budget */
export class AffordabilityError extends GameError {
  readonly weapon: ScoredWeapon;
  readonly budget: number;

  constructor(weapon: ScoredWeapon, budget: number) {
    super("Your money isn't enough");
    this.weapon = weapon;
    this.budget = budget;
  }
}

/** A RoundEngine operation was called in the wrong phase */
export class PhaseError extends GameError {
  constructor(operation: string, phase: string) {
    super(`Cannot ${operation} during ${phase}`);
  }
}

/** The input stream closed before the player answered */
export class InputClosedError extends GameError {
  constructor() {
    super('Input closed');
  }
}
