import {
  Bounds,
  EngineLogger,
  Measurement,
  ObjectSnapshot,
  SimulationSnapshot,
  Solution,
  TargetEstimateSnapshot,
} from '../types';
import { DEFAULT_SEED, DEFAULT_TICK_DURATION, NO_LOCALIZATION_ERROR } from '../constants';
import {
  ConfigurationError,
  DimensionMismatchError,
  DuplicateIdentifierError,
  InsufficientMeasurementsError,
  SolveFailureError,
} from '../errors';
import { createLCGRng, SeededRng, seedFrom } from '../utils/rng';
import { assertBounds, formatVector, randomVector } from '../utils/vector';
import { calculateLocalizationError, noSolution, requiredMeasurements, solveLeastSquares } from './multilateration';
import { NoiseModel } from './noise';
import { Sensor } from './Sensor';
import { Target } from './Target';

export type SimulationEntity = Sensor | Target;

export type SimulationEngineOptions = {
  dimension: number;
  bounds: Bounds; // [min0, max0, min1, max1, ...]
  tickDuration?: number; // seconds
  seed?: number | string;
  rng?: SeededRng; // takes precedence over seed
  logger?: EngineLogger;
};

// Estimate and error always travel together so they cannot drift apart.
type TargetResult = {
  estimate: Solution;
  error: number;
};

const sentinelResult = (): TargetResult => ({ estimate: noSolution(), error: NO_LOCALIZATION_ERROR });

const cloneSolution = (s: Solution): Solution => ({
  ...s,
  position: s.position ? s.position.slice() : null,
});

const validateOptions = (opts: SimulationEngineOptions) => {
  const { dimension, bounds } = opts;
  if (!Number.isInteger(dimension) || dimension < 1) {
    throw new ConfigurationError(`dimension must be a positive integer, got ${dimension}`);
  }
  assertBounds(dimension, bounds);
  for (let i = 0; i < dimension; i++) {
    const min = bounds[i * 2];
    const max = bounds[i * 2 + 1];
    if (!Number.isFinite(min) || !Number.isFinite(max)) {
      throw new ConfigurationError(`bounds for axis ${i} must be finite, got [${min}, ${max}]`);
    }
    if (min > max) {
      throw new ConfigurationError(`bounds for axis ${i} have min > max: [${min}, ${max}]`);
    }
  }
  const tick = opts.tickDuration ?? DEFAULT_TICK_DURATION;
  if (!Number.isFinite(tick) || tick <= 0) {
    throw new ConfigurationError(`tickDuration must be a positive number of seconds, got ${tick}`);
  }
};

/**
 * Owns every sensor and target, advances them in fixed or explicit time steps
 * and keeps the latest position estimate and localization error per target.
 *
 * Each step is synchronous. Results for a tick are assembled off to the side
 * and swapped in together with a fresh snapshot at the end of `step()`, so a
 * reader holding a snapshot never sees positions and estimates from different
 * ticks.
 */
export class SimulationEngine {
  private readonly dim: number;
  private readonly bounds: Bounds;
  private readonly tickDuration: number;
  private readonly rng: SeededRng;
  private readonly logger: EngineLogger;

  private objects = new Map<string, SimulationEntity>();
  private sensors = new Map<string, Sensor>();
  private targets = new Map<string, Target>();
  private resultsByTarget = new Map<string, TargetResult>();

  private time = 0;
  private tick = 0;
  private spawnCounter = 0;
  private published: SimulationSnapshot;

  constructor(opts: SimulationEngineOptions) {
    validateOptions(opts);
    this.dim = opts.dimension;
    this.bounds = opts.bounds.slice();
    this.tickDuration = opts.tickDuration ?? DEFAULT_TICK_DURATION;
    this.rng = opts.rng ?? createLCGRng(seedFrom(opts.seed ?? DEFAULT_SEED));
    this.logger = opts.logger ?? console;
    this.published = this.buildSnapshot();
  }

  addObject(obj: SimulationEntity) {
    const pos = obj.getPosition();
    if (pos.length !== this.dim) {
      throw new DimensionMismatchError(this.dim, pos.length, `adding ${obj.kind} ${obj.id}`);
    }
    if (this.objects.has(obj.id)) throw new DuplicateIdentifierError(obj.id);

    this.objects.set(obj.id, obj);
    switch (obj.kind) {
      case 'sensor':
        this.sensors.set(obj.id, obj);
        break;
      case 'target':
        this.targets.set(obj.id, obj);
        this.resultsByTarget.set(obj.id, sentinelResult());
        break;
    }
    this.published = this.buildSnapshot();
  }

  addRandomSensor(detectionRadius: number, noise?: NoiseModel): Sensor {
    const rng = this.rng.fork(++this.spawnCounter);
    const sensor = new Sensor({
      position: randomVector(this.dim, this.bounds, rng),
      detectionRadius,
      noise,
      rng,
    });
    this.addObject(sensor);
    return sensor;
  }

  addRandomTarget(): Target {
    const rng = this.rng.fork(++this.spawnCounter);
    const target = new Target({
      position: randomVector(this.dim, this.bounds, rng),
      rng,
      logger: this.logger,
    });
    this.addObject(target);
    return target;
  }

  /**
   * Advances time, moves every object, then localizes each target from its
   * new position. Missing or failed estimates are recorded as sentinels and
   * replace any earlier estimate.
   */
  step(deltaTime: number = this.tickDuration) {
    if (!Number.isFinite(deltaTime) || deltaTime < 0) {
      throw new ConfigurationError(`deltaTime must be a non-negative number, got ${deltaTime}`);
    }
    this.time += deltaTime;
    this.tick++;

    for (const obj of this.objects.values()) {
      obj.update(deltaTime, this.bounds.slice());
    }

    const next = new Map<string, TargetResult>();
    for (const target of this.targets.values()) {
      next.set(target.id, this.localize(target));
    }

    this.resultsByTarget = next;
    this.published = this.buildSnapshot();
  }

  run(numSteps: number): SimulationSnapshot {
    for (let i = 0; i < numSteps; i++) this.step();
    return this.published;
  }

  private localize(target: Target): TargetResult {
    const truePosition = target.getPosition();
    const measurements: Measurement[] = [];
    for (const sensor of this.sensors.values()) {
      const reading = sensor.measureDistance(truePosition);
      if (reading.inRange) {
        measurements.push({ sensorPosition: sensor.getPosition(), distance: reading.distance });
      }
    }

    const required = requiredMeasurements(this.dim);
    if (measurements.length < required) {
      this.logger.debug(
        `Target ${target.id}: insufficient measurements (${measurements.length}/${required}) at t=${this.time.toFixed(2)}s`
      );
      return sentinelResult();
    }

    try {
      const estimate = solveLeastSquares(measurements, this.dim);
      if (estimate.lowConfidence) {
        this.logger.warn(
          `Target ${target.id}: rank-deficient system (rank ${estimate.rank} < ${this.dim}), estimate ${formatVector(estimate.position)} is not unique`
        );
      }
      return { estimate, error: calculateLocalizationError(truePosition, estimate.position) };
    } catch (err) {
      if (err instanceof SolveFailureError || err instanceof InsufficientMeasurementsError) {
        this.logger.warn(`Target ${target.id}: localization failed: ${err.message}`);
        return sentinelResult();
      }
      throw err;
    }
  }

  private buildSnapshot(): SimulationSnapshot {
    const objects: ObjectSnapshot[] = [];
    for (const obj of this.objects.values()) {
      objects.push(Object.freeze({ id: obj.id, kind: obj.kind, position: Object.freeze(obj.getPosition()) }));
    }

    const estimates: TargetEstimateSnapshot[] = [];
    for (const target of this.targets.values()) {
      const result = this.resultsByTarget.get(target.id) ?? sentinelResult();
      const estimate = cloneSolution(result.estimate);
      estimates.push(
        Object.freeze({
          targetId: target.id,
          truePosition: Object.freeze(target.getPosition()),
          estimate: Object.freeze(estimate),
          localizationError: result.error,
        })
      );
    }

    return Object.freeze({
      tick: this.tick,
      time: this.time,
      dimension: this.dim,
      objects: Object.freeze(objects),
      estimates: Object.freeze(estimates),
    });
  }

  // --- Read-only accessors ---

  snapshot(): SimulationSnapshot {
    return this.published;
  }

  listSensors(): Sensor[] {
    return [...this.sensors.values()];
  }

  listTargets(): Target[] {
    return [...this.targets.values()];
  }

  getObject(id: string): SimulationEntity | undefined {
    return this.objects.get(id);
  }

  getAllObjects(): SimulationEntity[] {
    return [...this.objects.values()];
  }

  getLastEstimate(targetId: string): Solution | undefined {
    const result = this.resultsByTarget.get(targetId);
    return result ? cloneSolution(result.estimate) : undefined;
  }

  getLastLocalizationError(targetId: string): number | undefined {
    return this.resultsByTarget.get(targetId)?.error;
  }

  currentTime() {
    return this.time;
  }

  currentTick() {
    return this.tick;
  }

  dimension() {
    return this.dim;
  }

  getBounds(): Bounds {
    return this.bounds.slice();
  }

  getTickDuration() {
    return this.tickDuration;
  }
}
