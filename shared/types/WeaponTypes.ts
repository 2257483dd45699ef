// ============================================================================
// WeaponTypes.ts
// Types for catalogue weapons: the raw stat record read from the data file,
// the scored weapon derived from it at load time, and the catalogue itself.
// ============================================================================

/**
 * WeaponRecord holds the stats of one weapon exactly as read from a
 * catalogue line. Field order on disk matches the declaration order here.
 */
export interface WeaponRecord {
  /** Display name, a single whitespace-free token (e.g. "Desert_Eagle") */
  readonly name: string;

  /** Purchase price in dollars */
  readonly price: number;

  /** Damage per bullet */
  readonly damage: number;

  /** Fire rate in rounds per minute */
  readonly fireRate: number;

  /** Bullets in a full magazine */
  readonly magazineSize: number;

  /**
   * Damage falloff over distance.
   * Together with recoil it forms the denominator of the balance score,
   * so a weapon with both at zero cannot be scored.
   */
  readonly falloff: number;

  /** Distance (in meters) the weapon stays accurate */
  readonly accurateRange: number;

  /** Recoil strength; higher means harder to control */
  readonly recoil: number;
}

/**
 * ScoredWeapon is a WeaponRecord plus the figures derived from it once,
 * right after loading. Instances are frozen and never recomputed.
 */
export interface ScoredWeapon extends WeaponRecord {
  /** Stable position in the catalogue (0-based). This is the weapon identity. */
  readonly index: number;

  /**
   * Balance score used to decide round outcomes.
   * @see calculateBalanceScore
   */
  readonly balanceScore: number;

  /** Damage per second, derived from damage and fire rate */
  readonly dps: number;
}

/**
 * An ordered, immutable weapon catalogue.
 *
 * The catalogue has a fixed capacity; `count` tracks how many slots the data
 * file actually filled. Tiers are index ranges into `weapons`.
 */
export interface Catalogue {
  /** Loaded weapons in file order */
  readonly weapons: readonly ScoredWeapon[];

  /** Number of loaded weapons (always equals weapons.length) */
  readonly count: number;

  /** Maximum number of records ever read from a source */
  readonly capacity: number;

  /** Where the catalogue came from (a file path, or a label for in-memory text) */
  readonly source: string;
}
