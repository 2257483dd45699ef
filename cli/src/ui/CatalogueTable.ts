/**
 * @file CatalogueTable.ts
 * @description Renders the catalogue as a fixed-width, pipe-delimited table
 * (the "About" screen). Balance scores are shown divided by 100, next to
 * each weapon's damage per second.
 */

import type { Catalogue, ScoredWeapon } from '@shared/types/WeaponTypes';

/** One table column: header label, width and how to print a weapon's cell */
interface Column {
  label: string;
  width: number;
  align: 'left' | 'right';
  cell: (weapon: ScoredWeapon) => string;
}

/** Divisor applied to balance scores so they read as small numbers */
const SCORE_DISPLAY_DIVISOR = 100;

const COLUMNS: readonly Column[] = [
  { label: 'Weapon Name', width: 12, align: 'left', cell: (w) => w.name },
  { label: 'Price($)', width: 8, align: 'right', cell: (w) => String(w.price) },
  { label: 'Damage', width: 6, align: 'right', cell: (w) => String(w.damage) },
  { label: 'Fire Rate (RPM)', width: 15, align: 'right', cell: (w) => w.fireRate.toFixed(2) },
  { label: 'Magazine Size', width: 13, align: 'right', cell: (w) => String(w.magazineSize) },
  { label: 'Damage Falloff', width: 14, align: 'right', cell: (w) => String(w.falloff) },
  { label: 'Accurate Range', width: 14, align: 'right', cell: (w) => w.accurateRange.toFixed(2) },
  { label: 'Recoil', width: 6, align: 'right', cell: (w) => w.recoil.toFixed(1) },
  { label: 'DPS', width: 7, align: 'right', cell: (w) => w.dps.toFixed(2) },
  {
    label: 'Balance',
    width: 7,
    align: 'right',
    cell: (w) => (w.balanceScore / SCORE_DISPLAY_DIVISOR).toFixed(3),
  },
];

function pad(text: string, column: Column): string {
  return column.align === 'left' ? text.padEnd(column.width) : text.padStart(column.width);
}

function row(cells: string[]): string {
  return `|${cells.join('|')}|`;
}

/** Horizontal rule matching the column widths */
export function renderTableRule(): string {
  return row(COLUMNS.map((c) => '-'.repeat(c.width)));
}

/** A single weapon row */
export function renderWeaponRow(weapon: ScoredWeapon): string {
  return row(COLUMNS.map((c) => pad(c.cell(weapon), c)));
}

/**
 * Full catalogue table, one line per weapon, framed by rules.
 * Cells wider than their column are printed whole and push the row out.
 */
export function renderCatalogueTable(catalogue: Catalogue): string {
  const rule = renderTableRule();
  const header = row(COLUMNS.map((c) => c.label.padEnd(c.width)));
  return [rule, header, rule, ...catalogue.weapons.map(renderWeaponRow), rule].join('\n');
}
