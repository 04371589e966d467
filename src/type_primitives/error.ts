/***
 * Type errors: Validation failure errors.
 *
 * Separate from StructuralViolation so type-primitive assertions don't
 * depend on the scene-graph error hierarchy. These are programmer errors
 * (is_operational = false) raised only while __DEV__ is on.
 *
 ***/

import { AppError } from "utils/error";

export enum TYPE_ERROR {
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
}

export class TypeError extends AppError {
  constructor(
    public readonly category: TYPE_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
