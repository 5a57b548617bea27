import type { BeamSnapshot } from "../elements/beam";
import { SolveError } from "../errors";
import { Equation } from "../logic/simultaneousEqn";
import { allFinite, cumulativeTrapezoid, interpolate } from "../logic/quadrature";
import type { DiagramArrays, Reactions } from "./types";

export type FallbackDiagram = DiagramArrays & { reactions: Reactions };

/**
 * Reactions from the two equilibrium equations alone. With more than two
 * supports the system is underdetermined and the regularized least-squares
 * branch picks the minimum-norm split.
 */
export function solveEquilibriumReactions(beam: BeamSnapshot): Reactions {
  const totalForce = beam.loads.reduce((acc, l) => acc + l.totalLoad(), 0);
  const totalMoment = beam.loads.reduce((acc, l) => acc + l.momentAbout(0), 0);

  const vertical: { [key: string]: number } = { c: -totalForce };
  const rotational: { [key: string]: number } = { c: -totalMoment };
  for (const support of beam.supports) {
    vertical[support.name] = 1;
    rotational[support.name] = support.x;
  }
  return new Equation().solveEquations([vertical, rotational], {
    allowLeastSquares: true,
  });
}

/**
 * Whole-domain trapezoidal integration on a uniform grid, with no per-node
 * jump handling. Only y at the last support is forced to zero, by a
 * rotation about x=0.
 */
export function integrateFallback(
  beam: BeamSnapshot,
  reactions: Reactions,
  resolution: number,
): FallbackDiagram {
  const L = beam.length;
  const count = Math.max(2, resolution);
  const xs = Array.from({ length: count }, (_, i) => (L * i) / (count - 1));

  const distributed = beam.loads.flatMap((l) =>
    l.name === "DistributedLoad" ? [l] : [],
  );
  const intensity = xs.map((x) =>
    distributed.reduce((acc, load) => {
      const inside =
        x >= load.start && (x < load.end || (load.end === L && x <= L));
      return inside ? acc + load.intensityAt(x) : acc;
    }, 0),
  );
  const distributedShear = cumulativeTrapezoid(xs, intensity);

  const shear = xs.map((x, i) => {
    const fromSupports = beam.supports.reduce(
      (acc, s) => (s.x <= x ? acc + (reactions[s.name] ?? 0) : acc),
      0,
    );
    const fromPoints = beam.loads.reduce(
      (acc, l) => (l.name === "PointLoad" ? acc + l.shearContribution(x) : acc),
      0,
    );
    return fromSupports + fromPoints - distributedShear[i];
  });

  const moment = cumulativeTrapezoid(xs, shear).map((m, i) =>
    beam.loads.reduce(
      (acc, l) =>
        l.name === "PointMoment" ? acc + l.momentContribution(xs[i]) : acc,
      m,
    ),
  );

  const rotation = cumulativeTrapezoid(
    xs,
    moment.map((m) => m / beam.flexuralRigidity),
  );
  const deflection = cumulativeTrapezoid(xs, rotation);

  const lastSupport = beam.supports.reduce((a, b) => (b.x > a.x ? b : a));
  const yLast = interpolate(xs, deflection, lastSupport.x);
  for (let i = 0; i < xs.length; i++) {
    deflection[i] -= (yLast * xs[i]) / lastSupport.x;
    rotation[i] -= yLast / lastSupport.x;
  }

  if (![shear, moment, rotation, deflection].every((values) => allFinite(values))) {
    throw new SolveError(
      "NonFiniteResult",
      "Fallback integration produced non-finite values",
    );
  }

  return { x: xs, shear, moment, rotation, deflection, reactions };
}
