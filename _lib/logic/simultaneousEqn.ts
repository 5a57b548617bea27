import { inv, isMatrix, lusolve } from "mathjs";
import type { MathArray, Matrix } from "mathjs";

type EquationProps = { [key: string]: number };
type SolveOptions = {
  allowLeastSquares?: boolean;
  /** Tikhonov weight for the least-squares branch. */
  lambda?: number;
};

const toNumber = (value: unknown, label: string): number => {
  if (typeof value === "number") return value;
  // [[x],[y]] column vectors come back one element per row
  if (Array.isArray(value) && value.length === 1 && typeof value[0] === "number") {
    return value[0];
  }
  throw new Error(`Expected a numeric ${label}, got ${String(value)}`);
};

/** Plain number vector from a mathjs solve result. */
export function toNumberVector(value: Matrix | MathArray): number[] {
  const items: readonly unknown[] = isMatrix(value) ? value.toArray() : value;
  return items.map((item) => toNumber(item, "vector entry"));
}

/** Plain number matrix from a mathjs result. */
export function toNumberMatrix(value: Matrix | MathArray): number[][] {
  const rows: readonly unknown[] = isMatrix(value) ? value.toArray() : value;
  return rows.map((row) => {
    if (!Array.isArray(row)) {
      throw new Error(`Expected a matrix row, got ${String(row)}`);
    }
    return row.map((entry: unknown) => toNumber(entry, "matrix entry"));
  });
}

/** Maximum absolute column sum. */
export function norm1(A: readonly (readonly number[])[]) {
  if (A.length === 0) return 0;
  let best = 0;
  for (let j = 0; j < A[0].length; j++) {
    let sum = 0;
    for (const row of A) sum += Math.abs(row[j]);
    best = Math.max(best, sum);
  }
  return best;
}

export class Equation {
  /**
   * 1-norm condition number κ(A) = ‖A‖₁·‖A⁻¹‖₁. Infinity when A cannot be
   * inverted.
   */
  conditionNumber(A: number[][]): number {
    if (A.length === 0) return 1;
    let inverse: number[][];
    try {
      inverse = toNumberMatrix(inv(A));
    } catch {
      return Infinity;
    }
    const kappa = norm1(A) * norm1(inverse);
    return Number.isFinite(kappa) ? kappa : Infinity;
  }

  /** Square system A·x = b. */
  solveLinearSystem(A: number[][], b: number[]): number[] {
    if (A.length === 0) return [];
    if (A.some((row) => row.length !== A.length) || b.length !== A.length) {
      throw new Error(
        `System is not square: ${A.length} equations, ${A[0].length} unknowns, ${b.length} right-hand terms`,
      );
    }
    return toNumberVector(lusolve(A, b));
  }

  /**
   * Regularized normal equations (KᵀK + λ·s·I)·x = Kᵀ·F, for under- or
   * over-determined systems. s is the mean diagonal of KᵀK, so λ is
   * independent of the units of K.
   */
  solveLeastSquares(K: number[][], F: number[], lambda: number = 1e-9): number[] {
    const n = K[0]?.length ?? 0;
    if (n === 0) return [];

    const A: number[][] = [];
    const b: number[] = [];
    for (let i = 0; i < n; i++) {
      const row = new Array<number>(n).fill(0);
      for (let j = 0; j < n; j++) {
        for (const k of K) row[j] += k[i] * k[j];
      }
      A.push(row);
      b.push(K.reduce((acc, k, r) => acc + k[i] * F[r], 0));
    }

    const meanDiagonal = A.reduce((acc, row, i) => acc + row[i], 0) / n;
    const scale = meanDiagonal > 0 ? meanDiagonal : 1;
    A.forEach((row, i) => (row[i] += lambda * scale));
    return this.solveLinearSystem(A, b);
  }

  /**
   * Solves equations written as coefficient maps, each meaning
   * Σ coef·name + c = 0.
   */
  solveEquations(equations: EquationProps[], options: SolveOptions = {}) {
    // Step 1: collect all unknowns (exclude 'c')
    const variableNames = Array.from(
      new Set(
        equations.flatMap((eq) => Object.keys(eq).filter((k) => k !== "c")),
      ),
    );

    // Step 2: build K matrix and F vector
    const K = equations.map((eq) => variableNames.map((v) => eq[v] || 0));
    const F = equations.map((eq) => -(eq.c || 0));

    const numEquations = K.length;
    const numUnknowns = variableNames.length;

    if (numUnknowns === 0) return {};
    if (numEquations !== numUnknowns && !options.allowLeastSquares) {
      throw new Error(
        `Equation system is not square: equations=${numEquations}, unknowns=${numUnknowns}`,
      );
    }

    // Step 3: solve
    const values =
      numEquations === numUnknowns
        ? this.solveLinearSystem(K, F)
        : this.solveLeastSquares(K, F, options.lambda);

    // Step 4: map variables to values
    const result: { [key: string]: number } = {};
    variableNames.forEach((name, i) => {
      result[name] = values[i];
    });
    return result;
  }
}
