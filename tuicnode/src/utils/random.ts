import { randomBytes, randomInt } from 'crypto';

export interface RandomSource {
  /** Float in [0, 1) */
  next(): number;
  pick<T>(items: readonly T[]): T;
  /** `bytes` random bytes, hex encoded */
  hex(bytes: number): string;
}

/** mulberry32 */
function mulberry32(seed: number): () => number {
  return function (): number {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function hashSeed(s: string): number {
  let h = 0;
  for (let i = 0; i < s.length; i++) {
    h = (Math.imul(31, h) + s.charCodeAt(i)) | 0;
  }
  return h;
}

function pickWith<T>(items: readonly T[], index: number): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return items[index % items.length];
}

export function createSeededRandom(seed: string): RandomSource {
  const rng = mulberry32(hashSeed(seed));
  return {
    next: rng,
    pick: (items) => pickWith(items, Math.floor(rng() * items.length)),
    hex: (bytes) => {
      let out = '';
      for (let i = 0; i < bytes; i++) {
        out += ((rng() * 256) | 0).toString(16).padStart(2, '0');
      }
      return out;
    },
  };
}

export const cryptoRandom: RandomSource = {
  next: () => randomInt(0, 2 ** 32) / 2 ** 32,
  pick: (items) => pickWith(items, items.length > 0 ? randomInt(0, items.length) : 0),
  hex: (bytes) => randomBytes(bytes).toString('hex'),
};
