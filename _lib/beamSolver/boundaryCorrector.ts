import type { BeamSnapshot } from "../elements/beam";
import type { Support } from "../elements/support";
import type { NumericalWarning } from "../errors";
import { Moment } from "../logic/moment";
import { cumulativeTrapezoid, interpolate } from "../logic/quadrature";
import type { NodeSample, RawDiagram, Reactions } from "./types";

export type CorrectionOptions = {
  nodeTolerance: number;
  momentResidualTolerance: number;
  deflectionResidualTolerance: number;
  shearClosureTolerance: number;
};

export type CorrectedDiagram = {
  diagram: RawDiagram;
  warnings: NumericalWarning[];
};

const maxAbs = (values: readonly number[]) =>
  values.reduce((acc, v) => Math.max(acc, Math.abs(v)), 0);

function largestResidual(points: readonly number[], residuals: readonly number[]) {
  let index = 0;
  residuals.forEach((r, i) => {
    if (Math.abs(r) > Math.abs(residuals[index])) index = i;
  });
  return { magnitude: Math.abs(residuals[index] ?? 0), position: points[index] };
}

function sampleOfSupport(nodes: readonly NodeSample[], support: Support) {
  const node = nodes.find((n) => n.supportNames.includes(support.name));
  if (!node) {
    throw new Error(`Support '${support.name}' has no node in the diagram`);
  }
  return node.afterIndex;
}

/**
 * Removes accumulated integration error from a raw diagram.
 *
 * Moment: at x=0, every support and x=L the integrated moment is compared
 * with the closed-form section moment, and the residuals are subtracted as
 * a piecewise-linear function of x. Rotation and deflection are then
 * re-integrated.
 *
 * Deflection: the rigid-body line through the outermost constrained
 * supports is removed, then any interior residual is removed piecewise
 * linearly, so y is zero at every support in `deflectionSupports`.
 */
export function correctBoundaries(
  beam: BeamSnapshot,
  raw: RawDiagram,
  reactions: Reactions,
  deflectionSupports: readonly Support[],
  options: CorrectionOptions,
): CorrectedDiagram {
  const warnings: NumericalWarning[] = [];
  const moment = new Moment();
  const xs = raw.x;

  // Moment constraints
  const first = raw.nodes[0];
  const last = raw.nodes[raw.nodes.length - 1];
  const constrained = raw.nodes.filter(
    (n) => n === first || n === last || n.supportNames.length > 0,
  );
  const points = constrained.map((n) => n.x);
  const residuals = constrained.map(
    (n) =>
      raw.moment[n.afterIndex] -
      moment.getMoment(beam, reactions, n.x, options.nodeTolerance),
  );
  const M = raw.moment.map((m, i) => m - interpolate(points, residuals, xs[i]));

  const worstMoment = largestResidual(points, residuals);
  if (
    worstMoment.magnitude >
    options.momentResidualTolerance * Math.max(1, maxAbs(M))
  ) {
    warnings.push({
      code: "BoundaryCorrectionExceeded",
      message: `Moment correction of ${worstMoment.magnitude.toExponential(3)} N*m at x=${worstMoment.position} exceeds tolerance`,
      ...worstMoment,
    });
  }

  const theta = cumulativeTrapezoid(
    xs,
    M.map((m) => m / beam.flexuralRigidity),
  );
  const y = cumulativeTrapezoid(xs, theta);

  // Deflection constraints
  const ordered = [...deflectionSupports].sort((a, b) => a.x - b.x);
  if (ordered.length >= 2) {
    const indices = ordered.map((s) => sampleOfSupport(raw.nodes, s));
    const x0 = ordered[0].x;
    const xN = ordered[ordered.length - 1].x;
    const y0 = y[indices[0]];
    const slope = (y[indices[indices.length - 1]] - y0) / (xN - x0);
    for (let i = 0; i < xs.length; i++) {
      y[i] -= y0 + slope * (xs[i] - x0);
      theta[i] -= slope;
    }

    const interiorPoints = ordered.slice(1, -1).map((s) => s.x);
    const interiorResiduals = indices.slice(1, -1).map((i) => y[i]);
    if (interiorPoints.length > 0) {
      const cx = [x0, ...interiorPoints, xN];
      const cr = [0, ...interiorResiduals, 0];
      for (let i = 0; i < xs.length; i++) {
        const x = xs[i];
        if (x < x0 || x > xN) continue;
        let k = 0;
        while (k < cx.length - 2 && x >= cx[k + 1]) k++;
        const segmentSlope = (cr[k + 1] - cr[k]) / (cx[k + 1] - cx[k]);
        y[i] -= cr[k] + segmentSlope * (x - cx[k]);
        theta[i] -= segmentSlope;
      }

      const worstDeflection = largestResidual(interiorPoints, interiorResiduals);
      if (
        worstDeflection.magnitude >
        options.deflectionResidualTolerance * maxAbs(y)
      ) {
        warnings.push({
          code: "BoundaryCorrectionExceeded",
          message: `Deflection correction of ${worstDeflection.magnitude.toExponential(3)} m at x=${worstDeflection.position} exceeds tolerance`,
          ...worstDeflection,
        });
      }
    }
  }

  const closure = raw.shear[last.afterIndex];
  if (Math.abs(closure) > options.shearClosureTolerance * maxAbs(raw.shear)) {
    warnings.push({
      code: "ShearClosure",
      message: `Shear does not close at the beam end: V(L+)=${closure.toExponential(3)} N`,
      magnitude: Math.abs(closure),
      position: last.x,
    });
  }

  return {
    diagram: { ...raw, moment: M, rotation: theta, deflection: y },
    warnings,
  };
}
