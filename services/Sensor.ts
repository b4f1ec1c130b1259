import { Bounds, SensorReading, SimulationObject, Vector } from '../types';
import { ID_HEX_DIGITS } from '../constants';
import { createDefaultRng, SeededRng } from '../utils/rng';
import { cloneVector, distance, formatVector } from '../utils/vector';
import { applyNoise, describeNoise, NoiseModel } from './noise';

export type SensorOptions = {
  position: Vector;
  detectionRadius?: number; // <= 0 means unlimited
  noise?: NoiseModel;
  id?: string;
  rng?: SeededRng;
};

export class Sensor implements SimulationObject {
  readonly kind = 'sensor' as const;
  readonly id: string;
  readonly detectionRadius: number;
  readonly noise: Readonly<NoiseModel> | undefined;
  private readonly position: Vector;
  private readonly rng: SeededRng;

  constructor(opts: SensorOptions) {
    this.rng = opts.rng ?? createDefaultRng();
    this.id = opts.id ?? `sensor-${this.rng.nextHex(ID_HEX_DIGITS)}`;
    this.position = cloneVector(opts.position);
    this.detectionRadius = opts.detectionRadius ?? 0;
    this.noise = opts.noise ? Object.freeze({ ...opts.noise }) : undefined;
  }

  getPosition(): Vector {
    return cloneVector(this.position);
  }

  hasUnlimitedRange() {
    return !(this.detectionRadius > 0);
  }

  // Sensors are fixed.
  update(_deltaTime: number, _bounds: Bounds) {}

  /**
   * Noisy range to `targetPosition`. Out of range when the detection radius is
   * positive and the true distance exceeds it; no noise is drawn in that case.
   */
  measureDistance(targetPosition: Vector): SensorReading {
    const trueDistance = distance(this.position, targetPosition);
    if (this.detectionRadius > 0 && trueDistance > this.detectionRadius) {
      return { inRange: false };
    }
    return { inRange: true, distance: applyNoise(this.noise, trueDistance, this.rng) };
  }

  toString() {
    const radius = this.hasUnlimitedRange() ? 'unlimited' : this.detectionRadius.toFixed(2);
    return `Sensor[${this.id}] pos=${formatVector(this.position)} radius=${radius} noise=${describeNoise(this.noise)}`;
  }
}
