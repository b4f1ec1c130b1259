import { TARGET_MAX_SPEED } from '../constants';
import { DimensionMismatchError } from '../errors';
import { Target } from '../services/Target';
import { createLCGRng } from '../utils/rng';
import { norm } from '../utils/vector';
import { createConstantRng, createSilentLogger } from './stubs';

describe('Target', () => {
  // A constant 0.5 draw leaves the velocity jitter at exactly zero.
  const steadyTarget = (position: number[], velocity: number[]) =>
    new Target({ position, velocity, id: 't', rng: createConstantRng(0.5), logger: createSilentLogger() });

  test('should start at rest by default', () => {
    const target = new Target({ position: [1, 2, 3], rng: createLCGRng(1) });
    expect(target.getVelocity()).toEqual([0, 0, 0]);
    expect(target.id).toMatch(/^target-[0-9a-f]{8}$/);
  });

  test('should integrate position from velocity', () => {
    const target = steadyTarget([1, 1], [2, -4]);
    target.update(0.5, [-10, 10, -10, 10]);
    expect(target.getPosition()[0]).toBeCloseTo(2, 10);
    expect(target.getPosition()[1]).toBeCloseTo(-1, 10);
  });

  test('should reflect off the upper bound and reverse a damped velocity', () => {
    const target = steadyTarget([9.5, 0], [8, 0]);
    target.update(0.25, [0, 10, -10, 10]);
    // 9.5 + 8 * 0.25 = 11.5, mirrored across 10
    expect(target.getPosition()[0]).toBeCloseTo(8.5, 10);
    expect(target.getPosition()[1]).toBe(0);
    expect(target.getVelocity()[0]).toBeCloseTo(-6.4, 10);
    expect(target.getVelocity()[1]).toBe(0);
  });

  test('should reflect off the lower bound independently per axis', () => {
    const target = steadyTarget([0.5, 5], [-4, 1]);
    target.update(0.25, [0, 10, 0, 10]);
    expect(target.getPosition()[0]).toBeCloseTo(0.5, 10);
    expect(target.getPosition()[1]).toBeCloseTo(5.25, 10);
    expect(target.getVelocity()[0]).toBeCloseTo(3.2, 10);
    expect(target.getVelocity()[1]).toBeCloseTo(1, 10);
  });

  test('should stay inside the bounds when a step overshoots the whole axis', () => {
    const target = steadyTarget([9], [10]);
    target.update(3, [0, 10]);
    // 9 + 30 = 39, mirrored to -19, then held at the lower wall
    expect(target.getPosition()[0]).toBe(0);
    expect(target.getVelocity()[0]).toBeCloseTo(-8, 10);
  });

  test('should cap speed while keeping direction', () => {
    const target = steadyTarget([0, 0], [30, 40]);
    target.update(0.1, [-100, 100, -100, 100]);
    expect(target.getVelocity()[0]).toBeCloseTo(6, 10);
    expect(target.getVelocity()[1]).toBeCloseTo(8, 10);
    expect(target.getPosition()[0]).toBeCloseTo(0.6, 10);
    expect(target.getPosition()[1]).toBeCloseTo(0.8, 10);
  });

  test('should stay within bounds and under max speed on a long random walk', () => {
    const target = new Target({ position: [5, 5], rng: createLCGRng(3), logger: createSilentLogger() });
    for (let i = 0; i < 2000; i++) {
      target.update(0.1, [0, 10, 0, 10]);
      const [x, y] = target.getPosition();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThanOrEqual(10);
      expect(y).toBeGreaterThanOrEqual(0);
      expect(y).toBeLessThanOrEqual(10);
      expect(norm(target.getVelocity())).toBeLessThanOrEqual(TARGET_MAX_SPEED + 1e-9);
    }
  });

  test('should warn and skip the update on bounds of the wrong length', () => {
    const logger = createSilentLogger();
    const target = new Target({ position: [1, 1], velocity: [1, 1], id: 't', rng: createLCGRng(1), logger });
    target.update(0.1, [0, 10]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(target.getPosition()).toEqual([1, 1]);
    expect(target.getVelocity()).toEqual([1, 1]);
  });

  test('should reject vectors of another dimension', () => {
    expect(() => new Target({ position: [0, 0], velocity: [1] })).toThrow(DimensionMismatchError);
    const target = steadyTarget([0, 0], [0, 0]);
    expect(() => target.setPosition([1, 2, 3])).toThrow(DimensionMismatchError);
  });
});
