import { describe, expect, it } from "vitest";
import {
  AppError,
  STRUCTURAL_ERROR,
  StructuralViolation,
  is_structural_violation,
} from "../error";

describe("StructuralViolation", () => {
  //=========================================================
  // Construction & properties
  //=========================================================

  it("stores the category", () => {
    const err = new StructuralViolation(STRUCTURAL_ERROR.NOT_A_CHILD);
    expect(err.category).toBe(STRUCTURAL_ERROR.NOT_A_CHILD);
  });

  it("uses category as default message when message is omitted", () => {
    const err = new StructuralViolation(STRUCTURAL_ERROR.ALREADY_PARENTED);
    expect(err.message).toBe(STRUCTURAL_ERROR.ALREADY_PARENTED);
  });

  it("uses provided message and context when given", () => {
    const err = new StructuralViolation(
      STRUCTURAL_ERROR.CYCLE,
      "node 3 cannot be added beneath itself",
      { parent: 4, child: 3 },
    );
    expect(err.message).toBe("node 3 cannot be added beneath itself");
    expect(err.context).toEqual({ parent: 4, child: 3 });
  });

  it("is operational", () => {
    expect(new StructuralViolation(STRUCTURAL_ERROR.CYCLE).is_operational).toBe(true);
  });

  it("sets name to StructuralViolation", () => {
    expect(new StructuralViolation(STRUCTURAL_ERROR.CYCLE).name).toBe(
      "StructuralViolation",
    );
  });

  it("is an AppError and an Error", () => {
    const err = new StructuralViolation(STRUCTURAL_ERROR.CYCLE);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toBeInstanceOf(Error);
  });

  //=========================================================
  // is_structural_violation guard
  //=========================================================

  it("is_structural_violation recognises only StructuralViolation", () => {
    expect(is_structural_violation(new StructuralViolation(STRUCTURAL_ERROR.CYCLE))).toBe(true);
    expect(is_structural_violation(new Error("plain"))).toBe(false);
    expect(is_structural_violation(null)).toBe(false);
    expect(is_structural_violation("NOT_A_CHILD")).toBe(false);
  });
});
