import { describe, expect, it } from 'vitest';
import { createRandom, pickOne } from '../src';

const take = (seed: string | number, count: number): number[] => {
  const random = createRandom(seed);
  return Array.from({ length: count }, () => random());
};

describe('createRandom', () => {
  it('replays the same stream for the same seed', () => {
    expect(take('test-seed', 8)).toEqual(take('test-seed', 8));
    expect(take(42, 8)).toEqual(take(42, 8));
  });

  it('starts different streams for neighbouring seeds', () => {
    expect(take('test-seed:0', 4)).not.toEqual(take('test-seed:1', 4));
  });

  it('stays within [0, 1)', () => {
    for (const value of take('range', 500)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('pickOne', () => {
  it('picks by the scaled number and gives nothing for no options', () => {
    expect(pickOne(() => 0, ['a', 'b', 'c'])).toBe('a');
    expect(pickOne(() => 0.99, ['a', 'b', 'c'])).toBe('c');
    expect(pickOne(() => 0.5, [])).toBeUndefined();
  });
});
