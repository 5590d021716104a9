/**
 * Random sources shared by the selector, the error injector and the payload builders.
 * A seeded source makes a whole run reproducible.
 */

export interface RandomSource {
  /**
   * Uniform number in [0, 1)
   */
  next(): number;
}

/**
 * Seeded random number generator (mulberry32)
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Generate random integer [min, max]
   */
  nextInt(min: number, max: number): number {
    return randomInt(this, min, max);
  }

  /**
   * Choose random element from array
   */
  choose<T>(items: readonly T[]): T {
    return pick(this, items);
  }
}

export class MathRandom implements RandomSource {
  next(): number {
    return Math.random();
  }
}

export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(random.next() * (max - min + 1)) + min;
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.min(items.length - 1, Math.floor(random.next() * items.length))];
}

export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? new MathRandom() : new SeededRandom(seed);
}
