/**
 * Domain-specific error types for site calibration.
 *
 * Every failure aborts the run; callers can branch on the subclass to
 * tell bad input apart from bad geometry or a numerical breakdown.
 */

import type { ProjectionMethod } from "./types.js";

/**
 * Base error class for all calibration errors.
 */
export class SiteCalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SiteCalError";
  }
}

/**
 * Error thrown when point collections or their files are unusable.
 * Contains an array of all problems found.
 */
export class InputError extends SiteCalError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid input: ${errors.join("; ")}`);
    this.name = "InputError";
    this.errors = errors;
  }
}

/**
 * Error thrown when a projection cannot be resolved or applied.
 */
export class ProjectionError extends SiteCalError {
  readonly method: string;

  constructor(message: string, method: ProjectionMethod | string) {
    super(message);
    this.name = "ProjectionError";
    this.method = method;
  }
}

/**
 * Error thrown when the control points are too close to a straight line.
 */
export class GeometryError extends SiteCalError {
  readonly eigenvalue_ratio: number;
  readonly threshold: number;

  constructor(eigenvalueRatio: number, threshold: number) {
    super(
      `Control points are collinear: eigenvalue ratio ${eigenvalueRatio.toExponential(3)} ` +
        `is below ${threshold.toExponential(1)}`
    );
    this.name = "GeometryError";
    this.eigenvalue_ratio = eigenvalueRatio;
    this.threshold = threshold;
  }
}

export class NumericError extends SiteCalError {
  readonly reason: "singular_system" | "degenerate_scale";

  constructor(message: string, reason: NumericError["reason"]) {
    super(message);
    this.name = "NumericError";
    this.reason = reason;
  }
}
