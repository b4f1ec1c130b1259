import { DimensionMismatchError } from '../errors';
import { Sensor } from '../services/Sensor';
import { uniformNoise } from '../services/noise';
import { createLCGRng } from '../utils/rng';
import { createConstantRng } from './stubs';

describe('Sensor', () => {
  test('should report the true distance when in range and noiseless', () => {
    const sensor = new Sensor({ position: [0, 0], detectionRadius: 5, rng: createLCGRng(1) });
    expect(sensor.measureDistance([3, 4])).toEqual({ inRange: true, distance: 5 });
  });

  test('should report out of range beyond a positive detection radius', () => {
    const sensor = new Sensor({ position: [0, 0], detectionRadius: 5, rng: createLCGRng(1) });
    expect(sensor.measureDistance([6, 0])).toEqual({ inRange: false });
  });

  test('should treat a non-positive radius as unlimited', () => {
    for (const detectionRadius of [0, -1]) {
      const sensor = new Sensor({ position: [0, 0], detectionRadius, rng: createLCGRng(1) });
      expect(sensor.hasUnlimitedRange()).toBe(true);
      expect(sensor.measureDistance([1000, 0])).toEqual({ inRange: true, distance: 1000 });
    }
  });

  test('should apply its noise model to the true distance', () => {
    const sensor = new Sensor({ position: [0, 0], noise: uniformNoise(3), rng: createConstantRng(0) });
    // 5 + lowest uniform draw (-3)
    expect(sensor.measureDistance([3, 4])).toEqual({ inRange: true, distance: 2 });
  });

  test('should keep its own frozen copy of the noise model', () => {
    const model = { kind: 'uniform' as const, maxDelta: 0 };
    const sensor = new Sensor({ position: [0, 0], noise: model, rng: createLCGRng(4) });
    model.maxDelta = 4;
    expect(sensor.measureDistance([3, 4])).toEqual({ inRange: true, distance: 5 });
    expect(sensor.noise).toEqual({ kind: 'uniform', maxDelta: 0 });
    expect(Object.isFrozen(sensor.noise)).toBe(true);
  });

  test('should throw on a target of another dimension', () => {
    const sensor = new Sensor({ position: [0, 0], rng: createLCGRng(1) });
    expect(() => sensor.measureDistance([1, 2, 3])).toThrow(DimensionMismatchError);
  });

  test('should hand out copies of its position', () => {
    const sensor = new Sensor({ position: [1, 2], rng: createLCGRng(1) });
    const pos = sensor.getPosition();
    pos[0] = 50;
    sensor.update(1, [0, 10, 0, 10]);
    expect(sensor.getPosition()).toEqual([1, 2]);
  });

  test('should generate an identifier unless one is given', () => {
    expect(new Sensor({ position: [0], rng: createLCGRng(9) }).id).toMatch(/^sensor-[0-9a-f]{8}$/);
    expect(new Sensor({ position: [0], id: 'north' }).id).toBe('north');
  });

  test('should describe itself', () => {
    const sensor = new Sensor({ position: [1, 2], detectionRadius: 7.5, id: 's1' });
    expect(sensor.toString()).toBe('Sensor[s1] pos=[1.000, 2.000] radius=7.50 noise=none');
  });
});
