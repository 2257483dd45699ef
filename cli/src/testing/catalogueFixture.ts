/**
 * Deterministic 34-weapon catalogue for tests.
 *
 * Every fixture line has fireRate 1, magazineSize 0, falloff 1 and recoil 0,
 * so a weapon's balance score equals its damage. Within a tier, price and
 * damage both rise with the position:
 *
 *   tier  indices   price               damage (= score)
 *   1     0..9      200 + 50 * j        10 + j
 *   2     10..16    1000 + 200 * j      20 + j
 *   3     17..22    1500 + 300 * j      30 + j
 *   4     23..29    2700 + 300 * j      40 + j
 *   5     30..33    4000 + 750 * j      50 + j
 *
 * where j is the 0-based position inside the tier.
 */

import type { Catalogue } from '@shared/types/WeaponTypes';
import { parseCatalogue } from '../catalogue/CatalogueLoader';

const FIXTURE_TIERS = [
  { size: 10, basePrice: 200, priceStep: 50, baseDamage: 10 },
  { size: 7, basePrice: 1000, priceStep: 200, baseDamage: 20 },
  { size: 6, basePrice: 1500, priceStep: 300, baseDamage: 30 },
  { size: 7, basePrice: 2700, priceStep: 300, baseDamage: 40 },
  { size: 4, basePrice: 4000, priceStep: 750, baseDamage: 50 },
] as const;

/** Catalogue text with one line per fixture weapon, named W0..W33 */
export function buildFixtureText(): string {
  const lines: string[] = [];
  for (const tier of FIXTURE_TIERS) {
    for (let j = 0; j < tier.size; j++) {
      const price = tier.basePrice + tier.priceStep * j;
      const damage = tier.baseDamage + j;
      lines.push(`W${lines.length} ${price} ${damage} 1 0 1 1 0`);
    }
  }
  return lines.join('\n');
}

/** The fixture text parsed into a catalogue */
export function buildFixtureCatalogue(): Catalogue {
  return parseCatalogue(buildFixtureText(), 'fixture');
}
