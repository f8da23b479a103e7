/**
 * Unit tests for the random source and its draw helpers.
 */
import { describe, expect, it } from 'vitest';
import { choice, createRandomSource, randomInt, roundTo, uniform } from '../../services/random-source.js';
import { scriptedRandom } from '../helpers/test-helpers.js';

describe('createRandomSource', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRandomSource('orbit-7');
    const b = createRandomSource('orbit-7');
    const drawsA = Array.from({ length: 5 }, () => a.next());
    const drawsB = Array.from({ length: 5 }, () => b.next());
    expect(drawsA).toEqual(drawsB);
  });

  it('produces different sequences for different seeds', () => {
    const a = createRandomSource('orbit-7');
    const b = createRandomSource('orbit-8');
    expect(a.next()).not.toBe(b.next());
  });

  it('draws in [0, 1) when unseeded', () => {
    const random = createRandomSource();
    for (let i = 0; i < 100; i++) {
      const u = random.next();
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
    }
  });
});

describe('draw helpers', () => {
  it('uniform maps a draw linearly onto the range', () => {
    expect(uniform(scriptedRandom([0.5]), 2, 4)).toBe(3);
    expect(uniform(scriptedRandom([0]), 2, 4)).toBe(2);
  });

  it('randomInt covers both ends inclusively', () => {
    expect(randomInt(scriptedRandom([0]), 0, 255)).toBe(0);
    expect(randomInt(scriptedRandom([0.999]), 0, 255)).toBe(255);
    expect(randomInt(scriptedRandom([0.5]), -45, 45)).toBe(0);
  });

  it('choice indexes by the draw', () => {
    expect(choice(scriptedRandom([0.2]), ['LEFT', 'RIGHT'])).toBe('LEFT');
    expect(choice(scriptedRandom([0.99]), ['LEFT', 'RIGHT'])).toBe('RIGHT');
  });

  it('choice rejects an empty list', () => {
    expect(() => choice(scriptedRandom([0.5]), [])).toThrow('cannot choose from an empty list');
  });

  it('roundTo rounds to the requested decimals', () => {
    expect(roundTo(12.3456, 2)).toBe(12.35);
    expect(roundTo(7, 2)).toBe(7);
  });
});
