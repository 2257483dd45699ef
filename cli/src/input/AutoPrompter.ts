/**
 * @file AutoPrompter.ts
 * @description Computer-controlled weapon picks for --auto games.
 *
 * Strategy: buy the most expensive weapon the budget covers, breaking price
 * ties at random. With nothing affordable, fall back to the cheapest weapon.
 */

import type { TierOffer, TierOption } from '@shared/types/GameTypes';
import { pick, type RandomSource } from '@shared/util/RandomUtils';
import type { WeaponPrompter } from './Prompter';

export class AutoPrompter implements WeaponPrompter {
  private readonly rng: RandomSource;

  constructor(rng: RandomSource) {
    this.rng = rng;
  }

  async selectWeapon(offer: TierOffer, _attempt: number): Promise<string> {
    return String(this.choose(offer).selection);
  }

  /** The option this strategy buys from an offer */
  choose(offer: TierOffer): TierOption {
    const affordable = offer.options.filter((o) => o.affordable);
    const pool = affordable.length > 0 ? affordable : offer.options;
    const target = affordable.length > 0
      ? Math.max(...pool.map((o) => o.weapon.price))
      : Math.min(...pool.map((o) => o.weapon.price));
    return pick(this.rng, pool.filter((o) => o.weapon.price === target));
  }
}
