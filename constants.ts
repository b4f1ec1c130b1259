// Target random walk
export const TARGET_ACCELERATION_SCALE = 5; // units/s of velocity change per second
export const TARGET_MAX_SPEED = 10; // units/s
export const BOUNDARY_DAMPING = 0.8; // velocity kept (and reversed) after a wall bounce

// Least squares
// Pivots below this fraction of the largest pivot count as zero when estimating rank.
export const RANK_TOLERANCE = 1e-10;

// "No estimate" markers stored per target
export const NO_RESIDUAL = -1;
export const NO_LOCALIZATION_ERROR = -1;

// Engine defaults
export const DEFAULT_SEED = 1337;
export const DEFAULT_TICK_DURATION = 1 / 30; // seconds

export const ID_HEX_DIGITS = 8;
