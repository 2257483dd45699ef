import { ValidationError } from '@shared/errors/GameErrors';

/**
 * Parse a line typed by the player as a non-negative whole number.
 * Surrounding whitespace is ignored; anything else is rejected.
 *
 * @throws ValidationError if the input is not made of digits only
 */
export function parseWholeNumber(input: string): number {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError('Please enter a whole number');
  }
  return Number.parseInt(trimmed, 10);
}
