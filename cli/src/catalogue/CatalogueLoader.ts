/**
 * @file CatalogueLoader.ts
 * @description Reads the weapon catalogue from a whitespace-delimited text file.
 *
 * Line format (one weapon per line, blank lines ignored):
 *
 *   name price damage fireRate magazineSize falloff accurateRange recoil
 *
 * Reading stops once the catalogue is full. Every record is scored right
 * after parsing and the resulting catalogue is frozen.
 */

import { readFile } from 'node:fs/promises';
import { CATALOGUE } from '@shared/constants/GameConstants';
import { LoadError } from '@shared/errors/GameErrors';
import { scoreWeapon } from '@shared/formulas/StatFormulas';
import { WEAPON_RECORD_FIELDS, WeaponRecordSchema } from '@shared/schemas/WeaponSchema';
import type { RoundTier } from '@shared/types/GameTypes';
import type { Catalogue, ScoredWeapon, WeaponRecord } from '@shared/types/WeaponTypes';

// ============================================================================
// --- Parsing ---
// ============================================================================

/**
 * Parse one non-blank catalogue line.
 *
 * @param line - Raw line text
 * @param location - Source and line number, for error messages
 * @throws LoadError on a wrong field count or an invalid field
 */
function parseRecordLine(line: string, location: { source: string; line: number }): WeaponRecord {
  const fields = line.trim().split(/\s+/);
  if (fields.length !== CATALOGUE.fieldsPerRecord) {
    throw new LoadError(
      `expected ${CATALOGUE.fieldsPerRecord} fields, found ${fields.length}`,
      location
    );
  }

  const raw = Object.fromEntries(WEAPON_RECORD_FIELDS.map((field, i) => [field, fields[i]]));
  const result = WeaponRecordSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new LoadError(`invalid ${field}: ${issue.message}`, location, { cause: result.error });
  }
  return result.data;
}

/**
 * Parse catalogue text into a frozen Catalogue.
 *
 * @param text - Full contents of a catalogue source
 * @param source - Label used in error messages and stored on the catalogue
 * @param capacity - Maximum records to read (defaults to the catalogue capacity)
 * @throws LoadError if any line before the capacity is reached is malformed
 */
export function parseCatalogue(
  text: string,
  source: string,
  capacity: number = CATALOGUE.capacity
): Catalogue {
  const weapons: ScoredWeapon[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length && weapons.length < capacity; i++) {
    const line = lines[i];
    if (line.trim() === '') continue;

    const record = parseRecordLine(line, { source, line: i + 1 });
    weapons.push(scoreWeapon(record, weapons.length));
  }

  return Object.freeze({
    weapons: Object.freeze(weapons),
    count: weapons.length,
    capacity,
    source,
  });
}

/**
 * Load and parse a catalogue file.
 *
 * @param path - Path of the catalogue file (UTF-8 text)
 * @throws LoadError if the file is missing, unreadable or malformed
 */
export async function loadCatalogue(path: string): Promise<Catalogue> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LoadError(`cannot read catalogue (${reason})`, { source: path }, { cause: error });
  }

  const catalogue = parseCatalogue(text, path);
  console.error(`[Catalogue] Loaded ${catalogue.count}/${catalogue.capacity} weapons from ${path}`);
  return catalogue;
}

// ============================================================================
// --- Queries ---
// ============================================================================

/**
 * Weapons belonging to a tier, clipped to what the catalogue actually holds.
 */
export function getTierWeapons(catalogue: Catalogue, tier: RoundTier): readonly ScoredWeapon[] {
  return catalogue.weapons.slice(tier.start, Math.min(tier.end, catalogue.count));
}
