/** Source of uniform numbers in [0, 1). */
export type Random = () => number;

// String seeds: FNV-style mixing per code point, then a murmur3 finalizer.
const seedState = (seed: string | number): number => {
  if (typeof seed === 'number') {
    return seed >>> 0;
  }

  let state = 0x811c9dc5 ^ seed.length;
  for (const char of seed) {
    state = Math.imul(state ^ (char.codePointAt(0) ?? 0), 0x01000193);
    state = (state << 11) | (state >>> 21);
  }
  state = Math.imul(state ^ (state >>> 16), 0x85ebca6b);
  state = Math.imul(state ^ (state >>> 13), 0xc2b2ae35);
  return (state ^ (state >>> 16)) >>> 0;
};

/** Mulberry32 stream for a seed; the same seed always replays the same numbers. */
export const createRandom = (seed: string | number): Random => {
  let state = seedState(seed);
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let mixed = Math.imul(state ^ (state >>> 15), 1 | state);
    mixed = (mixed + Math.imul(mixed ^ (mixed >>> 7), 61 | mixed)) ^ mixed;
    return ((mixed ^ (mixed >>> 14)) >>> 0) / 4294967296;
  };
};

export const pickOne = <T>(random: Random, options: readonly T[]): T | undefined =>
  options[Math.floor(random() * options.length)];
