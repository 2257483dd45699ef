import { describe, expect, it } from 'vitest';
import { parseCatalogue } from '../catalogue/CatalogueLoader';
import { buildFixtureCatalogue } from '../testing/catalogueFixture';
import { renderCatalogueTable, renderTableRule, renderWeaponRow } from './CatalogueTable';

describe('CatalogueTable', () => {
  it('pads each cell to its column width', () => {
    const [w0] = buildFixtureCatalogue().weapons;

    expect(renderWeaponRow(w0)).toBe(
      '|W0          |     200|    10|           1.00|            0|             1|          1.00|   0.0|   0.17|  0.100|'
    );
  });

  it('shows the balance score divided by 100 with three decimals', () => {
    const catalogue = parseCatalogue('AK-47 2700 36 600 30 2 21.74 2.5', 'inline');

    // (36 * 600 + 30 * 21.74) / 4.5 = 4944.93 -> 49.449
    expect(renderWeaponRow(catalogue.weapons[0]).endsWith('| 49.449|')).toBe(true);
  });

  it('shows damage per second with two decimals', () => {
    const catalogue = parseCatalogue('AK-47 2700 36 600 30 2 21.74 2.5', 'inline');

    // 36 * 600 / 60 = 360
    expect(renderWeaponRow(catalogue.weapons[0]).endsWith('|   2.5| 360.00| 49.449|')).toBe(true);
  });

  it('frames the header and rows with rules', () => {
    const catalogue = buildFixtureCatalogue();
    const lines = renderCatalogueTable(catalogue).split('\n');
    const rule = renderTableRule();

    expect(rule).toBe('|------------|--------|------|---------------|-------------|--------------|--------------|------|-------|-------|');
    expect(lines[0]).toBe(rule);
    expect(lines[1]).toBe(
      '|Weapon Name |Price($)|Damage|Fire Rate (RPM)|Magazine Size|Damage Falloff|Accurate Range|Recoil|DPS    |Balance|'
    );
    expect(lines[2]).toBe(rule);
    expect(lines).toHaveLength(3 + catalogue.count + 1);
    expect(lines.at(-1)).toBe(rule);
  });
});
