export type SeededRng = {
  next: () => number; // [0, 1)
  nextRange: (minInclusive: number, maxExclusive: number) => number;
  nextNormal: (mean?: number, stdDev?: number) => number;
  nextHex: (digits: number) => string;
  fork: (salt: number) => SeededRng;
};

const UINT32_MAX_PLUS_1 = 0x1_0000_0000;

export const createLCGRng = (seed: number): SeededRng => {
  let state = (seed >>> 0) || 1;

  const nextUint32 = () => {
    state = (Math.imul(1664525, state) + 1013904223) >>> 0;
    return state;
  };

  const next = () => nextUint32() / UINT32_MAX_PLUS_1;

  const nextRange = (minInclusive: number, maxExclusive: number) => {
    if (maxExclusive <= minInclusive) return minInclusive;
    return minInclusive + next() * (maxExclusive - minInclusive);
  };

  // Box-Muller; u1 kept away from 0 so log() stays finite.
  const nextNormal = (mean = 0, stdDev = 1) => {
    const u1 = Math.max(1e-12, next());
    const u2 = next();
    const mag = Math.sqrt(-2 * Math.log(u1));
    return mean + mag * Math.cos(2 * Math.PI * u2) * stdDev;
  };

  const nextHex = (digits: number) => {
    let out = '';
    while (out.length < digits) out += nextUint32().toString(16).padStart(8, '0');
    return out.slice(0, digits);
  };

  const fork = (salt: number) => createLCGRng((nextUint32() ^ (salt >>> 0)) >>> 0);

  return { next, nextRange, nextNormal, nextHex, fork };
};

// FNV-1a 32-bit hash
export const hashStringToUint32 = (input: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

export const seedFrom = (seed: number | string): number =>
  typeof seed === 'string' ? hashStringToUint32(seed) : seed >>> 0;

// Unseeded stream for callers that do not care about reproducibility.
export const createDefaultRng = (): SeededRng =>
  createLCGRng(hashStringToUint32(`${Date.now()}|${Math.random()}`));
