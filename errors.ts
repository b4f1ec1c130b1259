export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Invalid dimension, bounds or timing parameters.
export class ConfigurationError extends SimulationError {}

export class DimensionMismatchError extends SimulationError {
  constructor(readonly expected: number, readonly received: number, context = 'vector operation') {
    super(`${context}: dimension mismatch, expected ${expected}, got ${received}`);
  }
}

export class DuplicateIdentifierError extends SimulationError {
  constructor(readonly id: string) {
    super(`object with id ${id} already exists`);
  }
}

export class InsufficientMeasurementsError extends SimulationError {
  constructor(readonly received: number, readonly required: number, readonly dimension: number) {
    super(`insufficient measurements: got ${received}, need at least ${required} for dimension ${dimension}`);
  }
}

export class SolveFailureError extends SimulationError {}
