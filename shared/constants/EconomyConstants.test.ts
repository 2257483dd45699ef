import { describe, expect, it } from 'vitest';
import { CATALOGUE, MATCH } from './GameConstants';
import { ROUND_TIERS, STARTING_BUDGET, getRoundTier, getTierOfIndex } from './EconomyConstants';

describe('ROUND_TIERS', () => {
  it('has one contiguous tier per round covering the whole catalogue', () => {
    expect(ROUND_TIERS).toHaveLength(MATCH.rounds);
    expect(ROUND_TIERS[0].start).toBe(0);
    expect(ROUND_TIERS.at(-1)?.end).toBe(CATALOGUE.capacity);
    for (let i = 1; i < ROUND_TIERS.length; i++) {
      expect(ROUND_TIERS[i].start).toBe(ROUND_TIERS[i - 1].end);
    }
  });

  it('credits 900 then the per-round increments', () => {
    expect(STARTING_BUDGET).toBe(900);
    expect(ROUND_TIERS.map((t) => t.budgetIncrement)).toEqual([0, 1700, 2000, 2600, 3500]);
  });

  it('gates affordability from round 2 on', () => {
    expect(ROUND_TIERS.map((t) => t.affordabilityGate)).toEqual([false, true, true, true, true]);
  });
});

describe('getRoundTier', () => {
  it('looks up a round', () => {
    expect(getRoundTier(3)).toMatchObject({ start: 17, end: 23 });
  });

  it('throws outside the table', () => {
    expect(() => getRoundTier(0)).toThrow(RangeError);
    expect(() => getRoundTier(6)).toThrow(RangeError);
  });
});

describe('getTierOfIndex', () => {
  it('maps tier boundaries to their rounds', () => {
    expect(getTierOfIndex(9)?.round).toBe(1);
    expect(getTierOfIndex(10)?.round).toBe(2);
    expect(getTierOfIndex(33)?.round).toBe(5);
    expect(getTierOfIndex(34)).toBeNull();
  });
});
