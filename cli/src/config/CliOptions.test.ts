import { describe, expect, it } from 'vitest';
import { ValidationError } from '@shared/errors/GameErrors';
import { DEFAULT_DATA_FILE, parseCliOptions } from './CliOptions';

const defaults = { seed: 42, dataFile: 'data/case.txt' };

describe('parseCliOptions', () => {
  it('falls back to the defaults', () => {
    expect(parseCliOptions([], defaults)).toEqual({
      dataFile: 'data/case.txt',
      seed: 42,
      auto: false,
      fast: false,
      help: false,
    });
  });

  it('reads every flag', () => {
    const options = parseCliOptions(
      ['--data', 'weapons.txt', '--seed', '7', '--auto', '--fast', '--sim', '500'],
      defaults
    );

    expect(options).toEqual({
      dataFile: 'weapons.txt',
      seed: 7,
      auto: true,
      fast: true,
      simulate: 500,
      help: false,
    });
  });

  it('accepts --flag=value', () => {
    expect(parseCliOptions(['--seed=-3', '--data=other.txt'], defaults)).toMatchObject({
      seed: -3,
      dataFile: 'other.txt',
    });
  });

  it('accepts seeds at both ends of the 32-bit range', () => {
    expect(parseCliOptions(['--seed', '2147483647'], defaults).seed).toBe(2147483647);
    expect(parseCliOptions(['--seed=-2147483648'], defaults).seed).toBe(-2147483648);
  });

  it('recognises -h and --help', () => {
    expect(parseCliOptions(['-h'], defaults).help).toBe(true);
    expect(parseCliOptions(['--help'], defaults).help).toBe(true);
  });

  const invalid: Array<[string[], string]> = [
    [['--color'], 'Unknown option: --color'],
    [['--seed'], '--seed needs a value'],
    [['--data='], '--data needs a value'],
    [['--seed', 'abc'], '--seed must be a number'],
    [['--seed', '1.5'], '--seed must be a whole number'],
    [['--seed', '4294967296'], '--seed must be between -2147483648 and 2147483647'],
    [['--seed=-2147483649'], '--seed must be between -2147483648 and 2147483647'],
    [['--sim', '0'], '--sim must be at least 1'],
    [['--auto=yes'], 'Unknown option: --auto=yes'],
  ];

  it.each(invalid)('rejects %j', (argv, message) => {
    expect(() => parseCliOptions(argv, defaults)).toThrow(ValidationError);
    expect(() => parseCliOptions(argv, defaults)).toThrow(message);
  });

  it('points the default data file at the bundled catalogue', () => {
    expect(DEFAULT_DATA_FILE.replace(/\\/g, '/').endsWith('/data/case.txt')).toBe(true);
  });
});
