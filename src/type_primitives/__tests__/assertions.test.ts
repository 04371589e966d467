import { describe, expect, it } from "vitest";
import {
  is_colour_component,
  is_non_negative_integer,
  is_non_negative_number,
  is_positive_number,
  validate_and_cast,
} from "../assertions";
import { TypeError, TYPE_ERROR } from "../error";

describe("assertions", () => {
  //=========================================================
  // Predicates
  //=========================================================

  it("is_non_negative_integer accepts zero and positive integers only", () => {
    expect(is_non_negative_integer(0)).toBe(true);
    expect(is_non_negative_integer(42)).toBe(true);
    expect(is_non_negative_integer(-1)).toBe(false);
    expect(is_non_negative_integer(1.5)).toBe(false);
    expect(is_non_negative_integer(NaN)).toBe(false);
  });

  it("is_positive_number rejects zero, negatives and non-finite values", () => {
    expect(is_positive_number(0.5)).toBe(true);
    expect(is_positive_number(0)).toBe(false);
    expect(is_positive_number(-2)).toBe(false);
    expect(is_positive_number(Infinity)).toBe(false);
    expect(is_positive_number(NaN)).toBe(false);
  });

  it("is_non_negative_number accepts zero", () => {
    expect(is_non_negative_number(0)).toBe(true);
    expect(is_non_negative_number(3.25)).toBe(true);
    expect(is_non_negative_number(-0.1)).toBe(false);
    expect(is_non_negative_number(Infinity)).toBe(false);
  });

  it("is_colour_component accepts integers in 0..255", () => {
    expect(is_colour_component(0)).toBe(true);
    expect(is_colour_component(255)).toBe(true);
    expect(is_colour_component(256)).toBe(false);
    expect(is_colour_component(-1)).toBe(false);
    expect(is_colour_component(12.5)).toBe(false);
  });

  //=========================================================
  // validate_and_cast
  //=========================================================

  it("validate_and_cast returns the value when validation passes", () => {
    expect(validate_and_cast(2, is_positive_number, "positive")).toBe(2);
  });

  it("validate_and_cast throws a VALIDATION_FAIL_CONDITION TypeError", () => {
    expect(() => validate_and_cast(-1, is_positive_number, "fps must be positive")).toThrow(
      "Expected value to meet validation: fps must be positive",
    );
    try {
      validate_and_cast(-1, is_positive_number, "fps must be positive");
    } catch (e) {
      expect(e instanceof TypeError && e.category).toBe(
        TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      );
      expect(e instanceof TypeError && e.is_operational).toBe(false);
    }
  });
});
