import seedrandom from 'seedrandom';
import { config } from '../config';

/** A function returning floats in [0, 1). */
export type RandomFn = () => number;

/**
 * Build a seeded [0, 1) generator. Identical seeds yield identical sequences.
 *
 * @example
 * const a = createRandom('run-1');
 * const b = createRandom('run-1');
 * a() === b(); // true
 */
export function createRandom(seed: string | number = config.defaultSeed): RandomFn {
  const prng = seedrandom(String(seed));
  return () => prng();
}

/**
 * Map a [0, 1) generator onto [min, max).
 */
export function uniform(
  rng: RandomFn,
  min: number = config.weightInitRange[0],
  max: number = config.weightInitRange[1]
): number {
  return rng() * (max - min) + min;
}
