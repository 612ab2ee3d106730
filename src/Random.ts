/** Uniform random stream in [0, 1) consumed by null models */
export interface RandomSource {
  random(): number;
}

/** Unseeded source backed by Math.random */
export const mathRandom: RandomSource = { random: () => Math.random() };

/**
 * Seeded generator for reproducible simulations.
 * xoshiro128** on 32-bit state, initialized through splitmix32.
 */
export class SeededRandom implements RandomSource {
  private s0: number;
  private s1: number;
  private s2: number;
  private s3: number;

  constructor(seed: number) {
    const s = seed >>> 0;
    this.s0 = splitmix32(s);
    this.s1 = splitmix32(this.s0);
    this.s2 = splitmix32(this.s1);
    this.s3 = splitmix32(this.s2);
    if ((this.s0 | this.s1 | this.s2 | this.s3) === 0) this.s0 = 1;
  }

  /** @return float in [0, 1) */
  random(): number {
    return this.next() / 4294967296; // 2^32
  }

  /** @return next 32-bit unsigned integer */
  private next(): number {
    const result = Math.imul(rotl(Math.imul(this.s1, 5), 7), 9) >>> 0;
    const t = (this.s1 << 9) >>> 0;

    this.s2 = (this.s2 ^ this.s0) >>> 0;
    this.s3 = (this.s3 ^ this.s1) >>> 0;
    this.s1 = (this.s1 ^ this.s2) >>> 0;
    this.s0 = (this.s0 ^ this.s3) >>> 0;

    this.s2 = (this.s2 ^ t) >>> 0;
    this.s3 = rotl(this.s3, 11);

    return result;
  }
}

/** @return integer in [0, max) */
export function randomInt(random: RandomSource, max: number): number {
  return Math.floor(random.random() * max);
}

/** @return shuffled copy of values (Fisher-Yates), input left untouched */
export function shuffled<T>(values: readonly T[], random: RandomSource): T[] {
  const result = [...values];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}

/** @return size values drawn from pool with replacement */
export function resample<T>(
  pool: readonly T[],
  size: number,
  random: RandomSource,
): T[] {
  const n = pool.length;
  return Array.from({ length: size }, () => pool[randomInt(random, n)]);
}

/**
 * @return independent seeds for per-worker generators.
 * Stable for a given (seed, count), so split runs stay reproducible.
 */
export function deriveSeeds(seed: number, count: number): number[] {
  const seeds: number[] = [];
  let s = seed >>> 0;
  for (let i = 0; i < count; i++) {
    s = splitmix32(s);
    seeds.push(s);
  }
  return seeds;
}

/** 32-bit left rotate */
function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

function splitmix32(seed: number): number {
  let s = (seed + 0x9e3779b9) >>> 0;
  s = Math.imul(s ^ (s >>> 16), 0x85ebca6b) >>> 0;
  s = Math.imul(s ^ (s >>> 13), 0xc2b2ae35) >>> 0;
  return (s ^ (s >>> 16)) >>> 0;
}
