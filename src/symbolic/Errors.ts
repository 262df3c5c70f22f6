/**
 * Base class for failures raised while building or differentiating
 * expressions
 */
export class ExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

export class DivisionByZeroError extends ExpressionError {
  constructor(public dividend: string) {
    super(`Math error: attempted to divide '${dividend}' by zero`);
    this.name = 'DivisionByZeroError';
  }
}

export class LogOfZeroError extends ExpressionError {
  constructor() {
    super('Math error: argument of ln is zero');
    this.name = 'LogOfZeroError';
  }
}

export class UnsupportedDifferentiationError extends ExpressionError {
  constructor(
    public expression: string,
    public reason: string
  ) {
    super(`Cannot differentiate '${expression}': ${reason}`);
    this.name = 'UnsupportedDifferentiationError';
  }
}
