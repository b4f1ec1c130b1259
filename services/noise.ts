import { SeededRng } from '../utils/rng';

export type NoiseModel =
  | { kind: 'none' }
  | { kind: 'gaussian'; stdDev: number }
  | { kind: 'uniform'; maxDelta: number }
  | { kind: 'percentage'; fraction: number };

const nonNegative = (v: number) => (v > 0 ? v : 0);

export const noNoise = (): NoiseModel => ({ kind: 'none' });

export const gaussianNoise = (stdDev: number): NoiseModel => ({ kind: 'gaussian', stdDev: nonNegative(stdDev) });

// Uniform on [-maxDelta, +maxDelta]
export const uniformNoise = (maxDelta: number): NoiseModel => ({ kind: 'uniform', maxDelta: nonNegative(maxDelta) });

// Uniform on [-fraction * d, +fraction * d]; 0.05 is +-5%
export const percentageNoise = (fraction: number): NoiseModel => ({
  kind: 'percentage',
  fraction: nonNegative(fraction),
});

const perturb = (model: NoiseModel, trueDistance: number, rng: SeededRng) => {
  switch (model.kind) {
    case 'none':
      return trueDistance;
    case 'gaussian':
      return trueDistance + rng.nextNormal(0, nonNegative(model.stdDev));
    case 'uniform': {
      const delta = nonNegative(model.maxDelta);
      return trueDistance + rng.nextRange(-delta, delta);
    }
    case 'percentage': {
      const delta = trueDistance * nonNegative(model.fraction);
      return trueDistance + rng.nextRange(-delta, delta);
    }
  }
};

/** Measured distance for `trueDistance`, never negative. A missing model means no noise. */
export const applyNoise = (model: NoiseModel | undefined, trueDistance: number, rng: SeededRng) => {
  const noisy = model ? perturb(model, trueDistance, rng) : trueDistance;
  return noisy < 0 ? 0 : noisy;
};

export const describeNoise = (model: NoiseModel | undefined) => {
  if (!model) return 'none';
  switch (model.kind) {
    case 'none':
      return 'none';
    case 'gaussian':
      return `gaussian(sigma=${model.stdDev})`;
    case 'uniform':
      return `uniform(+-${model.maxDelta})`;
    case 'percentage':
      return `percentage(+-${(model.fraction * 100).toFixed(1)}%)`;
  }
};
