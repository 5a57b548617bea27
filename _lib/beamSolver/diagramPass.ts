import type { BeamSnapshot } from "../elements/beam";
import type { Support } from "../elements/support";
import { correctBoundaries } from "./boundaryCorrector";
import type { CorrectedDiagram, CorrectionOptions } from "./boundaryCorrector";
import { buildNodeSet } from "./nodeSet";
import { integratePiecewise } from "./piecewiseIntegrator";
import type { RawDiagram, Reactions } from "./types";

export type PassOptions = CorrectionOptions & { resolution: number };

/** Node set, piecewise integration and boundary correction for known reactions. */
export function runDiagramPass(
  beam: BeamSnapshot,
  reactions: Reactions,
  deflectionSupports: readonly Support[],
  options: PassOptions,
): CorrectedDiagram {
  const nodes = buildNodeSet(beam, { nodeTolerance: options.nodeTolerance });
  const raw = integratePiecewise(beam, nodes, reactions, options);
  return correctBoundaries(beam, raw, reactions, deflectionSupports, options);
}

export function deflectionAtSupport(diagram: RawDiagram, supportName: string) {
  const node = diagram.nodes.find((n) => n.supportNames.includes(supportName));
  if (!node) {
    throw new Error(`Support '${supportName}' has no node in the diagram`);
  }
  return diagram.deflection[node.afterIndex];
}
