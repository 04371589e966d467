export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum STRUCTURAL_ERROR {
  ALREADY_PARENTED = "ALREADY_PARENTED",
  NOT_A_CHILD = "NOT_A_CHILD",
  CYCLE = "CYCLE",
}

/** Thrown when a tree mutation would break single-parent ownership. */
export class StructuralViolation extends AppError {
  constructor(
    public readonly category: STRUCTURAL_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_structural_violation(
  error: unknown,
): error is StructuralViolation {
  return error instanceof StructuralViolation;
}
