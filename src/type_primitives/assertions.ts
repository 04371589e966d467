/***
 * Assertions: Dev-only runtime validation and branded casting.
 *
 * All checks are guarded by __DEV__ and tree-shaken in production builds.
 * validate_and_cast is the primary tool for creating branded IDs and for
 * checking numeric options (fps, lifetime, repeat counts) at the point
 * they enter the engine.
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export const is_positive_number = (v: number): boolean =>
  Number.isFinite(v) && v > 0;

export const is_non_negative_number = (v: number): boolean =>
  Number.isFinite(v) && v >= 0;

export const is_colour_component = (v: number): boolean =>
  Number.isInteger(v) && v >= 0 && v <= 255;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
    );
  }
  return value as Result;
}
