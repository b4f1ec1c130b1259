// Point or displacement in D-dimensional space.
export type Vector = number[];

// Flat axis limits: [min0, max0, min1, max1, ...], length 2D.
export type Bounds = number[];

export type ObjectKind = 'sensor' | 'target';

export interface Measurement {
  sensorPosition: Vector;
  distance: number; // >= 0
}

export interface Solution {
  position: Vector | null;
  residualError: number; // ||b - Ax|| / sqrt(m - 1), -1 when there is no solution
  rank: number; // numerical rank of the linearized system
  lowConfidence: boolean; // rank < dimension, estimate is not unique
}

export type SensorReading =
  | { inRange: true; distance: number }
  | { inRange: false };

export interface SimulationObject {
  readonly id: string;
  readonly kind: ObjectKind;
  getPosition(): Vector;
  update(deltaTime: number, bounds: Bounds): void;
}

export type EngineLogger = Pick<Console, 'debug' | 'warn'>;

export interface ObjectSnapshot {
  readonly id: string;
  readonly kind: ObjectKind;
  readonly position: readonly number[];
}

export interface TargetEstimateSnapshot {
  readonly targetId: string;
  readonly truePosition: readonly number[];
  readonly estimate: Readonly<Solution>;
  readonly localizationError: number; // -1 when unavailable
}

export interface SimulationSnapshot {
  readonly tick: number;
  readonly time: number;
  readonly dimension: number;
  readonly objects: readonly ObjectSnapshot[];
  readonly estimates: readonly TargetEstimateSnapshot[];
}
