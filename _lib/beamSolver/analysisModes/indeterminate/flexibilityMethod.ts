import type { BeamSnapshot } from "../../../elements/beam";
import { PointLoad } from "../../../elements/load";
import type { Load } from "../../../elements/load";
import { SolveError } from "../../../errors";
import type { FlexibilitySystem } from "../../../errors";
import { Equation } from "../../../logic/simultaneousEqn";
import { deflectionAtSupport, runDiagramPass } from "../../diagramPass";
import type { PassOptions } from "../../diagramPass";
import type { Reactions } from "../../types";
import { solveDeterminateReactions } from "../determinate/reactions";

export type FlexibilityOptions = PassOptions & { maxConditionNumber: number };

export type FlexibilitySolution = {
  reactions: Reactions;
  system: FlexibilitySystem;
  conditionNumber: number;
};

/**
 * Flexibility (force) method. The outermost supports form the primary
 * structure and every interior support is a redundant. With y upward and
 * redundants positive upward, compatibility reads
 *
 *   Σ_j f_ij · R_j = -δ_i
 *
 * where δ_i is the deflection of the primary structure under the applied
 * loads and f_ij the deflection at i from an upward unit load at j.
 */
export function solveByFlexibility(
  beam: BeamSnapshot,
  options: FlexibilityOptions,
  log: (message: string) => void = () => {},
): FlexibilitySolution {
  const supports = [...beam.supports].sort((a, b) => a.x - b.x);
  const left = supports[0];
  const right = supports[supports.length - 1];
  const redundants = supports.slice(1, -1);
  const primary = [left, right];

  const primaryReactions = (loads: readonly Load[]): Reactions => {
    const reactions = solveDeterminateReactions(left, right, loads);
    redundants.forEach((r) => (reactions[r.name] = 0));
    return reactions;
  };

  const deflectionsUnder = (loads: readonly Load[]) => {
    const loaded: BeamSnapshot = { ...beam, loads };
    const { diagram } = runDiagramPass(
      loaded,
      primaryReactions(loads),
      primary,
      options,
    );
    return redundants.map((r) => deflectionAtSupport(diagram, r.name));
  };

  const loadDeflections = deflectionsUnder(beam.loads);
  const columns = redundants.map((r) =>
    deflectionsUnder([new PointLoad(r.x, -1)]),
  );
  const flexibility = redundants.map((_, i) => columns.map((col) => col[i]));

  const system: FlexibilitySystem = {
    redundantNames: redundants.map((r) => r.name),
    flexibility,
    loadDeflections,
  };

  const equation = new Equation();
  const conditionNumber = equation.conditionNumber(flexibility);
  log(`Flexibility matrix ${redundants.length}x${redundants.length}, condition number ${conditionNumber.toExponential(3)}`);
  if (!(conditionNumber <= options.maxConditionNumber)) {
    throw new SolveError(
      "SingularFlexibilityMatrix",
      `Flexibility matrix is ill-conditioned (condition number ${conditionNumber.toExponential(3)} > ${options.maxConditionNumber.toExponential(3)})`,
      { system, conditionNumber },
    );
  }

  let redundantValues: number[];
  try {
    redundantValues = equation.solveLinearSystem(
      flexibility,
      loadDeflections.map((d) => -d),
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SolveError(
      "SingularFlexibilityMatrix",
      `Flexibility system could not be solved: ${reason}`,
      { system, conditionNumber },
    );
  }
  if (!redundantValues.every((v) => Number.isFinite(v))) {
    throw new SolveError(
      "SingularFlexibilityMatrix",
      "Flexibility system produced non-finite redundant reactions",
      { system, conditionNumber },
    );
  }

  return {
    reactions: reactionsFromRedundants(beam, redundantValues),
    system,
    conditionNumber,
  };
}

/**
 * Completes the reaction set from redundant values ordered like the
 * interior supports. Redundants act on the primary structure as upward
 * point forces.
 */
export function reactionsFromRedundants(
  beam: BeamSnapshot,
  redundantValues: readonly number[],
): Reactions {
  const supports = [...beam.supports].sort((a, b) => a.x - b.x);
  const redundants = supports.slice(1, -1);
  const equivalentLoads = redundants.map(
    (r, j) => new PointLoad(r.x, -redundantValues[j]),
  );
  const reactions = solveDeterminateReactions(
    supports[0],
    supports[supports.length - 1],
    [...beam.loads, ...equivalentLoads],
  );
  redundants.forEach((r, j) => (reactions[r.name] = redundantValues[j]));
  return reactions;
}

/**
 * Regularized least-squares solution of an assembled compatibility system;
 * null when it has no finite solution.
 */
export function solveRedundantsByLeastSquares(
  beam: BeamSnapshot,
  system: FlexibilitySystem,
): Reactions | null {
  const values = new Equation().solveLeastSquares(
    system.flexibility,
    system.loadDeflections.map((d) => -d),
  );
  if (!values.every((v) => Number.isFinite(v))) return null;
  return reactionsFromRedundants(beam, values);
}
