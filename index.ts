export * from './types';
export * from './constants';
export * from './errors';
export { createLCGRng, createDefaultRng, hashStringToUint32, seedFrom } from './utils/rng';
export type { SeededRng } from './utils/rng';
export * as vector from './utils/vector';
export { solveLeastSquaresQR } from './utils/linalg';
export type { Matrix, LeastSquaresResult } from './utils/linalg';
export * from './services/noise';
export { Sensor } from './services/Sensor';
export type { SensorOptions } from './services/Sensor';
export { Target } from './services/Target';
export type { TargetOptions } from './services/Target';
export {
  buildLinearSystem,
  calculateLocalizationError,
  noSolution,
  requiredMeasurements,
  solveLeastSquares,
} from './services/multilateration';
export { SimulationEngine } from './services/SimulationEngine';
export type { SimulationEngineOptions, SimulationEntity } from './services/SimulationEngine';
export { SimulationLoop } from './services/SimulationLoop';
export type { SimulationLoopOptions, TickListener, LoopErrorListener } from './services/SimulationLoop';
