import { Bounds, Vector } from '../types';
import { ConfigurationError, DimensionMismatchError } from '../errors';
import { SeededRng } from './rng';

export const zeroVector = (dimension: number): Vector => new Array<number>(dimension).fill(0);

export const cloneVector = (v: Vector): Vector => v.slice();

const assertSameDimension = (a: Vector, b: Vector, context: string) => {
  if (a.length !== b.length) throw new DimensionMismatchError(a.length, b.length, context);
};

export const assertBounds = (dimension: number, bounds: Bounds) => {
  if (bounds.length !== dimension * 2) {
    throw new ConfigurationError(
      `bounds length must be dimension * 2, got ${bounds.length}, expected ${dimension * 2}`
    );
  }
};

/**
 * Uniform draw inside the box described by `bounds`
 * ([min0, max0, min1, max1, ...]). A degenerate axis (min === max) yields min.
 */
export const randomVector = (dimension: number, bounds: Bounds, rng: SeededRng): Vector => {
  assertBounds(dimension, bounds);
  const v = zeroVector(dimension);
  for (let i = 0; i < dimension; i++) {
    v[i] = rng.nextRange(bounds[i * 2], bounds[i * 2 + 1]);
  }
  return v;
};

export const distance = (a: Vector, b: Vector) => {
  assertSameDimension(a, b, 'distance');
  let sumSq = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sumSq += d * d;
  }
  return Math.sqrt(sumSq);
};

export const add = (a: Vector, b: Vector): Vector => {
  assertSameDimension(a, b, 'add');
  return a.map((v, i) => v + b[i]);
};

export const subtract = (a: Vector, b: Vector): Vector => {
  assertSameDimension(a, b, 'subtract');
  return a.map((v, i) => v - b[i]);
};

export const scale = (v: Vector, scalar: number): Vector => v.map(x => x * scalar);

export const normSq = (v: Vector) => v.reduce((sum, x) => sum + x * x, 0);

export const norm = (v: Vector) => Math.sqrt(normSq(v));

export const formatVector = (v: Vector | null) =>
  v === null ? 'none' : `[${v.map(x => x.toFixed(3)).join(', ')}]`;
