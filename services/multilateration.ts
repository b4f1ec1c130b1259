import { Measurement, Solution, Vector } from '../types';
import { NO_RESIDUAL } from '../constants';
import { DimensionMismatchError, InsufficientMeasurementsError, SimulationError, SolveFailureError } from '../errors';
import { createMatrix, euclideanNorm, Matrix, solveLeastSquaresQR } from '../utils/linalg';
import { distance, normSq, subtract } from '../utils/vector';

export const requiredMeasurements = (dimension: number) => dimension + 1;

export const noSolution = (): Solution => ({
  position: null,
  residualError: NO_RESIDUAL,
  rank: 0,
  lowConfidence: true,
});

/**
 * Linearized sphere system. The last measurement is the reference k; every
 * other measurement i contributes the row
 *
 *   2 (S_k - S_i) . x = d_i^2 - d_k^2 - ||S_i||^2 + ||S_k||^2
 */
export const buildLinearSystem = (measurements: Measurement[], dimension: number) => {
  const ref = measurements[measurements.length - 1];
  const refDist = Math.max(0, ref.distance);
  const refDistSq = refDist * refDist;
  const refNormSq = normSq(ref.sensorPosition);

  const rows = measurements.length - 1;
  const a: Matrix = createMatrix(rows, dimension);
  const b = new Array<number>(rows).fill(0);

  for (let i = 0; i < rows; i++) {
    const { sensorPosition, distance: d } = measurements[i];
    if (sensorPosition.length !== dimension) {
      throw new DimensionMismatchError(dimension, sensorPosition.length, `measurement ${i}`);
    }
    const dist = Math.max(0, d);
    const diff = subtract(ref.sensorPosition, sensorPosition);
    for (let j = 0; j < dimension; j++) a.data[i * dimension + j] = 2 * diff[j];
    b[i] = dist * dist - refDistSq - normSq(sensorPosition) + refNormSq;
  }

  return { a, b };
};

/**
 * Position estimate from range measurements via the linearized system and a
 * pivoted-QR least-squares solve. Needs at least dimension + 1 measurements.
 *
 * residualError is ||b - A x|| / sqrt(m - 1). A rank-deficient system (e.g.
 * collinear sensors in 2D) still yields an estimate, flagged lowConfidence.
 */
export const solveLeastSquares = (measurements: Measurement[], dimension: number): Solution => {
  const required = requiredMeasurements(dimension);
  if (measurements.length < required) {
    throw new InsufficientMeasurementsError(measurements.length, required, dimension);
  }
  const ref = measurements[measurements.length - 1];
  if (ref.sensorPosition.length !== dimension) {
    throw new DimensionMismatchError(dimension, ref.sensorPosition.length, 'reference measurement');
  }

  const { a, b } = buildLinearSystem(measurements, dimension);
  if (a.rows === 0) throw new SolveFailureError('no equations left after removing the reference measurement');
  if (!a.data.every(Number.isFinite) || !b.every(Number.isFinite)) {
    throw new SolveFailureError('linearized system contains non-finite values');
  }

  const { x, rank, residual } = solveLeastSquaresQR(a, b);
  if (rank === 0) {
    throw new SolveFailureError('all sensor positions coincide, system has rank 0');
  }
  if (!x.every(Number.isFinite)) {
    throw new SolveFailureError('least squares solve produced non-finite coordinates');
  }

  return {
    position: x,
    residualError: euclideanNorm(residual) / Math.sqrt(a.rows),
    rank,
    lowConfidence: rank < dimension,
  };
};

export const calculateLocalizationError = (truePosition: Vector | null, estimatedPosition: Vector | null) => {
  if (!truePosition || !estimatedPosition || truePosition.length === 0 || estimatedPosition.length === 0) {
    throw new SimulationError('cannot calculate localization error without both positions');
  }
  return distance(truePosition, estimatedPosition);
};
