import { Bounds, EngineLogger, SimulationObject, Vector } from '../types';
import { BOUNDARY_DAMPING, ID_HEX_DIGITS, TARGET_ACCELERATION_SCALE, TARGET_MAX_SPEED } from '../constants';
import { DimensionMismatchError } from '../errors';
import { createDefaultRng, SeededRng } from '../utils/rng';
import { cloneVector, formatVector, norm, zeroVector } from '../utils/vector';

const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, v));

export type TargetOptions = {
  position: Vector;
  velocity?: Vector; // defaults to rest
  id?: string;
  rng?: SeededRng;
  logger?: EngineLogger;
};

export class Target implements SimulationObject {
  readonly kind = 'target' as const;
  readonly id: string;
  private position: Vector;
  private velocity: Vector;
  private readonly rng: SeededRng;
  private readonly logger: EngineLogger;

  constructor(opts: TargetOptions) {
    const dim = opts.position.length;
    if (opts.velocity && opts.velocity.length !== dim) {
      throw new DimensionMismatchError(dim, opts.velocity.length, `target velocity`);
    }
    this.rng = opts.rng ?? createDefaultRng();
    this.logger = opts.logger ?? console;
    this.id = opts.id ?? `target-${this.rng.nextHex(ID_HEX_DIGITS)}`;
    this.position = cloneVector(opts.position);
    this.velocity = opts.velocity ? cloneVector(opts.velocity) : zeroVector(dim);
  }

  getPosition(): Vector {
    return cloneVector(this.position);
  }

  getVelocity(): Vector {
    return cloneVector(this.velocity);
  }

  setPosition(position: Vector) {
    if (position.length !== this.position.length) {
      throw new DimensionMismatchError(this.position.length, position.length, `target ${this.id} position`);
    }
    this.position = cloneVector(position);
  }

  /**
   * Bounded random walk: jitter velocity, cap speed, integrate, then reflect
   * off any violated axis bound with a reversed, damped velocity component.
   */
  update(deltaTime: number, bounds: Bounds) {
    const dim = this.position.length;
    if (bounds.length !== dim * 2) {
      this.logger.warn(
        `Target ${this.id}: bounds length ${bounds.length} does not match dimension ${dim}, skipping update`
      );
      return;
    }

    const vel = this.velocity.map(v => v + this.rng.nextRange(-1, 1) * TARGET_ACCELERATION_SCALE * deltaTime);

    const speed = norm(vel);
    if (speed > TARGET_MAX_SPEED) {
      const k = TARGET_MAX_SPEED / speed;
      for (let i = 0; i < dim; i++) vel[i] *= k;
    }

    const pos = this.position.map((p, i) => p + vel[i] * deltaTime);

    for (let i = 0; i < dim; i++) {
      const min = bounds[i * 2];
      const max = bounds[i * 2 + 1];
      if (pos[i] < min) {
        pos[i] = min + (min - pos[i]);
        vel[i] *= -BOUNDARY_DAMPING;
      } else if (pos[i] > max) {
        pos[i] = max - (pos[i] - max);
        vel[i] *= -BOUNDARY_DAMPING;
      }
      // A step longer than the axis span can overshoot the opposite wall after mirroring.
      pos[i] = clamp(pos[i], min, max);
    }

    this.velocity = vel;
    this.position = pos;
  }

  toString() {
    return `Target[${this.id}] pos=${formatVector(this.position)} vel=${formatVector(this.velocity)}`;
  }
}
