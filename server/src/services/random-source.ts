import seedrandom from 'seedrandom';

// ─── Types ───────────────────────────────────────────────────────────────────

/**
 * Source of uniform draws for every randomized decision in the simulator:
 * stage durations, fault rolls, synthesized pixels and metadata.
 * Seed it to replay a run exactly.
 */
export interface RandomSource {
  /** Uniform draw in [0, 1). */
  next(): number;
}

// ─── Factories ───────────────────────────────────────────────────────────────

export function createRandomSource(seed?: string): RandomSource {
  if (seed === undefined) {
    return { next: () => Math.random() };
  }
  const prng = seedrandom(seed);
  return { next: () => prng() };
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/** Integer in [min, max], both ends inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

export function choice<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new Error('cannot choose from an empty list');
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
