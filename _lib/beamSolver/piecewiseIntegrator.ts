import type { BeamSnapshot } from "../elements/beam";
import type { Node } from "../elements/node";
import { SolveError } from "../errors";
import { allFinite, cumulativeTrapezoid } from "../logic/quadrature";
import type { NodeSample, RawDiagram, Reactions } from "./types";

export type IntegrationOptions = {
  /** Sub-intervals spread over the full beam length. */
  resolution: number;
};

/**
 * Integrates shear and moment node to node, applying every concentrated
 * jump exactly at its node and recording the value on both sides. Between
 * nodes only the distributed loads active over that span contribute.
 * Rotation and deflection are the running integrals of M/EI, both zero at
 * x=0; the boundary corrector fixes them afterwards.
 */
export function integratePiecewise(
  beam: BeamSnapshot,
  nodes: readonly Node[],
  reactions: Reactions,
  options: IntegrationOptions,
): RawDiagram {
  const xs: number[] = [];
  const shear: number[] = [];
  const moment: number[] = [];
  const samples: NodeSample[] = [];

  let V = 0;
  let M = 0;
  const push = (x: number) => {
    xs.push(x);
    shear.push(V);
    moment.push(M);
    return xs.length - 1;
  };

  nodes.forEach((node, k) => {
    const beforeIndex = push(node.x);

    let afterIndex = beforeIndex;
    if (node.hasJump) {
      for (const event of node.events) {
        if (event.kind === "support") {
          V += reactions[event.support.name] ?? 0;
        } else if (event.kind === "pointLoad" || event.kind === "pointMoment") {
          const jump = event.load.jumpAt(event.load.position);
          V += jump.shear;
          M += jump.moment;
        }
      }
      afterIndex = push(node.x);
    }

    samples.push({
      id: node.id,
      x: node.x,
      events: node.eventKinds,
      supportNames: node.supports.map((s) => s.name),
      beforeIndex,
      afterIndex,
    });

    const next = nodes[k + 1];
    if (!next) return;

    const a = node.x;
    const b = next.x;
    const steps = Math.max(
      1,
      Math.ceil((options.resolution * (b - a)) / beam.length),
    );
    const active = beam.loads.filter((load) => load.activeOver(a, b));
    const intensity = (x: number) =>
      active.reduce((acc, load) => acc + load.intensityAt(x), 0);

    let x0 = a;
    let w0 = intensity(a);
    for (let s = 1; s <= steps; s++) {
      const x1 = a + ((b - a) * s) / steps;
      const w1 = intensity(x1);
      const h = x1 - x0;
      const nextV = V - (h * (w0 + w1)) / 2;
      M += (h * (V + nextV)) / 2;
      V = nextV;
      x0 = x1;
      w0 = w1;
      // The closing point belongs to the next node.
      if (s < steps) push(x1);
    }
  });

  const curvature = moment.map((m) => m / beam.flexuralRigidity);
  const rotation = cumulativeTrapezoid(xs, curvature);
  const deflection = cumulativeTrapezoid(xs, rotation);

  for (const [field, values] of [
    ["shear", shear],
    ["moment", moment],
    ["rotation", rotation],
    ["deflection", deflection],
  ] as const) {
    if (!allFinite(values)) {
      throw new SolveError(
        "NonFiniteIntegration",
        `Piecewise integration produced a non-finite ${field}`,
      );
    }
  }

  return { x: xs, shear, moment, rotation, deflection, nodes: samples };
}
