/**
 * @file MainMenu.ts
 * @description Main menu text and choice parsing.
 */

import { ValidationError } from '@shared/errors/GameErrors';
import { parseWholeNumber } from '../input/InputParsing';

/** Menu entries, numbered as the player types them */
export enum MenuOption {
  PLAY = 1,
  OPTIONS = 2,
  HELP = 3,
  ABOUT = 4,
  EXIT = 5,
}

const MENU_LABELS: Record<MenuOption, string> = {
  [MenuOption.PLAY]: 'Play',
  [MenuOption.OPTIONS]: 'Options',
  [MenuOption.HELP]: 'Help',
  [MenuOption.ABOUT]: 'About',
  [MenuOption.EXIT]: 'Exit',
};

const MENU_OPTIONS: readonly MenuOption[] = [
  MenuOption.PLAY,
  MenuOption.OPTIONS,
  MenuOption.HELP,
  MenuOption.ABOUT,
  MenuOption.EXIT,
];

/** Stub text for menu entries that have no screen yet */
export const NOT_IMPLEMENTED_MESSAGE = 'Options and Help not implemented yet.';

export function renderMainMenu(): string {
  const lines = ['', 'Menu', '--------'];
  for (const option of MENU_OPTIONS) {
    lines.push(` ${option}. ${MENU_LABELS[option]}`);
  }
  return lines.join('\n');
}

/**
 * Parse a menu answer.
 * @throws ValidationError unless the input is a whole number from 1 to 5
 */
export function parseMenuChoice(input: string): MenuOption {
  const value = parseWholeNumber(input);
  const option = MENU_OPTIONS.find((o) => o === value);
  if (option === undefined) {
    throw new ValidationError(`Please enter a number between 1 and ${MENU_OPTIONS.length}`);
  }
  return option;
}
