import { BeamValidationError, SolveError } from "../errors";
import type { DiagramResult, NodeValues } from "../beamSolver/types";

/** Code of the library error thrown by `fn`, or undefined when it returns. */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof BeamValidationError || error instanceof SolveError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

export function nodeAt(result: DiagramResult, x: number): NodeValues {
  const node = result.nodes.find((n) => Math.abs(n.x - x) < 1e-9);
  if (!node) throw new Error(`No node at x=${x}`);
  return node;
}

export const sum = (values: number[]) => values.reduce((a, b) => a + b, 0);
