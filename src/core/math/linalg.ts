/**
 * Small dense linear algebra for the calibration fits.
 */

import { EPS_PIVOT } from "../constants.js";
import { NumericError } from "../errors.js";

/**
 * Build the normal equations AᵀA x = Aᵀl for a design matrix given as rows.
 */
function buildNormalEquations(
  design: number[][],
  observations: number[]
): { normal: number[][]; rhs: number[] } {
  const unknowns = design[0].length;
  const normal = Array.from({ length: unknowns }, () => new Array<number>(unknowns).fill(0));
  const rhs = new Array<number>(unknowns).fill(0);

  for (let r = 0; r < design.length; r++) {
    const row = design[r];
    for (let i = 0; i < unknowns; i++) {
      rhs[i] += row[i] * observations[r];
      for (let j = 0; j < unknowns; j++) {
        normal[i][j] += row[i] * row[j];
      }
    }
  }

  return { normal, rhs };
}

/**
 * Solve a square system by Gaussian elimination with partial pivoting.
 *
 * @throws NumericError when a pivot vanishes relative to the largest entry
 */
export function solveLinearSystem(matrix: number[][], rhs: number[]): number[] {
  const n = matrix.length;
  const M = matrix.map((row) => [...row]);
  const b = [...rhs];

  let scale = 0;
  for (const row of M) {
    for (const value of row) {
      scale = Math.max(scale, Math.abs(value));
    }
  }
  if (!(scale > 0) || !Number.isFinite(scale)) {
    throw new NumericError("Normal equations are empty or not finite", "singular_system");
  }

  for (let col = 0; col < n; col++) {
    let pivotRow = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(M[r][col]) > Math.abs(M[pivotRow][col])) pivotRow = r;
    }
    if (Math.abs(M[pivotRow][col]) <= EPS_PIVOT * scale) {
      throw new NumericError(
        `Least-squares system is singular (column ${col} has no usable pivot)`,
        "singular_system"
      );
    }
    if (pivotRow !== col) {
      [M[col], M[pivotRow]] = [M[pivotRow], M[col]];
      [b[col], b[pivotRow]] = [b[pivotRow], b[col]];
    }

    for (let r = col + 1; r < n; r++) {
      const factor = M[r][col] / M[col][col];
      if (factor === 0) continue;
      for (let c = col; c < n; c++) {
        M[r][c] -= factor * M[col][c];
      }
      b[r] -= factor * b[col];
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row--) {
    let acc = b[row];
    for (let c = row + 1; c < n; c++) {
      acc -= M[row][c] * x[c];
    }
    x[row] = acc / M[row][row];
  }
  return x;
}

/**
 * Ordinary least squares: minimize |A x − l|² over x.
 *
 * @param design Rows of the design matrix A (all the same length)
 * @param observations Observation vector l, one entry per row
 */
export function solveLeastSquares(design: number[][], observations: number[]): number[] {
  if (design.length === 0) {
    throw new NumericError("Least-squares system has no observations", "singular_system");
  }
  if (design.length !== observations.length) {
    throw new Error("Design matrix and observation vector must have the same length.");
  }
  const { normal, rhs } = buildNormalEquations(design, observations);
  return solveLinearSystem(normal, rhs);
}

/**
 * Eigenvalues of the symmetric matrix [[xx, xy], [xy, yy]], largest first.
 */
export function symmetricEigenvalues2x2(xx: number, xy: number, yy: number): [number, number] {
  const halfTrace = (xx + yy) / 2;
  const halfDiff = (xx - yy) / 2;
  const radius = Math.sqrt(halfDiff * halfDiff + xy * xy);
  return [halfTrace + radius, halfTrace - radius];
}
