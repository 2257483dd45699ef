import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ROUND_TIERS } from '@shared/constants/EconomyConstants';
import { LoadError } from '@shared/errors/GameErrors';
import { buildFixtureText } from '../testing/catalogueFixture';
import { getTierWeapons, loadCatalogue, parseCatalogue } from './CatalogueLoader';

describe('parseCatalogue', () => {
  it('parses whitespace-delimited records in file order', () => {
    const catalogue = parseCatalogue('AK-47 2700 36 600 30 2 21.74 2.5\nAWP\t4750  115 41 5 1 69.7 3.1\n', 'inline');

    expect(catalogue.count).toBe(2);
    expect(catalogue.capacity).toBe(34);
    expect(catalogue.source).toBe('inline');
    expect(catalogue.weapons[0]).toMatchObject({
      index: 0,
      name: 'AK-47',
      price: 2700,
      damage: 36,
      fireRate: 600,
      magazineSize: 30,
      falloff: 2,
      accurateRange: 21.74,
      recoil: 2.5,
    });
    expect(catalogue.weapons[1]).toMatchObject({ index: 1, name: 'AWP', price: 4750 });
  });

  it('scores every record once at load time', () => {
    const catalogue = parseCatalogue('AK-47 2700 36 600 30 2 21.74 2.5', 'inline');
    const ak = catalogue.weapons[0];

    expect(ak.balanceScore).toBeCloseTo((36 * 600 + 30 * 21.74) / (2 + 2.5), 9);
    expect(ak.dps).toBe(360);
    expect(Object.isFrozen(ak)).toBe(true);
    expect(Object.isFrozen(catalogue.weapons)).toBe(true);
  });

  it('stops reading after 34 records', () => {
    const extra = '\nExtra1 100 1 1 1 1 1 1\nExtra2 100 1 1 1 1 1 1';
    const catalogue = parseCatalogue(buildFixtureText() + extra, 'fixture');

    expect(catalogue.count).toBe(34);
    expect(catalogue.weapons[33].name).toBe('W33');
  });

  it('ignores malformed lines past the capacity', () => {
    const catalogue = parseCatalogue(`${buildFixtureText()}\nthis line is broken`, 'fixture');

    expect(catalogue.count).toBe(34);
  });

  it('accepts fewer than 34 records and tracks the count', () => {
    const catalogue = parseCatalogue('\nGlock-18 200 30 400 20 5 4.6 1.2\n\n', 'inline');

    expect(catalogue.count).toBe(1);
    expect(catalogue.weapons).toHaveLength(1);
  });

  it('rejects a line with the wrong field count', () => {
    const text = 'Glock-18 200 30 400 20 5 4.6 1.2\nUSP-S 200 35 352';

    expect(() => parseCatalogue(text, 'case.txt')).toThrow(LoadError);
    expect(() => parseCatalogue(text, 'case.txt')).toThrow('case.txt:2: expected 8 fields, found 4');
  });

  it('rejects a non-numeric field', () => {
    expect(() => parseCatalogue('Glock-18 cheap 30 400 20 5 4.6 1.2', 'case.txt')).toThrow(
      'case.txt:1: invalid price'
    );
  });

  it('rejects a fractional value in an integer field', () => {
    expect(() => parseCatalogue('Glock-18 200 30.5 400 20 5 4.6 1.2', 'case.txt')).toThrow(
      'case.txt:1: invalid damage: Damage must be a whole number'
    );
  });

  it('rejects a record whose falloff and recoil are both zero', () => {
    expect(() => parseCatalogue('Laser 100 10 600 30 0 10 0', 'case.txt')).toThrow(
      'case.txt:1: invalid recoil: Falloff and recoil cannot both be zero'
    );
  });

  it('reports the error location on the LoadError', () => {
    try {
      parseCatalogue('\n\nbroken', 'case.txt');
      expect.unreachable('parseCatalogue should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(LoadError);
      if (error instanceof LoadError) {
        expect(error.source).toBe('case.txt');
        expect(error.line).toBe(3);
      }
    }
  });
});

describe('getTierWeapons', () => {
  it('returns the index range of each tier', () => {
    const catalogue = parseCatalogue(buildFixtureText(), 'fixture');

    expect(getTierWeapons(catalogue, ROUND_TIERS[0]).map((w) => w.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(getTierWeapons(catalogue, ROUND_TIERS[4]).map((w) => w.name)).toEqual(['W30', 'W31', 'W32', 'W33']);
  });

  it('clips a tier to the loaded count', () => {
    const catalogue = parseCatalogue(buildFixtureText().split('\n').slice(0, 12).join('\n'), 'fixture');

    expect(getTierWeapons(catalogue, ROUND_TIERS[1]).map((w) => w.name)).toEqual(['W10', 'W11']);
    expect(getTierWeapons(catalogue, ROUND_TIERS[2])).toEqual([]);
  });
});

describe('loadCatalogue', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'firesync-'));
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a catalogue file', async () => {
    const path = join(dir, 'case.txt');
    await writeFile(path, buildFixtureText(), 'utf8');

    const catalogue = await loadCatalogue(path);

    expect(catalogue.count).toBe(34);
    expect(catalogue.source).toBe(path);
    expect(console.error).toHaveBeenCalledWith(`[Catalogue] Loaded 34/34 weapons from ${path}`);
  });

  it('fails with a LoadError when the file is missing', async () => {
    const path = join(dir, 'missing.txt');

    await expect(loadCatalogue(path)).rejects.toBeInstanceOf(LoadError);
    await expect(loadCatalogue(path)).rejects.toThrow(`${path}: cannot read catalogue`);
  });
});
