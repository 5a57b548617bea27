import type { NodeEventKind } from "../elements/node";
import type { NumericalWarning } from "../errors";

/** Vertical reaction per support name, positive upward. */
export type Reactions = Record<string, number>;

export type DiagramField = "shear" | "moment" | "rotation" | "deflection";

export type DiagramArrays = {
  x: number[];
  shear: number[];
  moment: number[];
  rotation: number[];
  deflection: number[];
};

/** Values recorded exactly at a breakpoint, on both sides of its jumps. */
export type NodeSample = {
  id: string;
  x: number;
  events: NodeEventKind[];
  supportNames: string[];
  /** Sample index of the value just left of the node. */
  beforeIndex: number;
  /** Sample index of the value just right of the node (equal to beforeIndex without a jump). */
  afterIndex: number;
};

export type RawDiagram = DiagramArrays & {
  nodes: NodeSample[];
};

export type NodeValues = {
  id: string;
  x: number;
  events: NodeEventKind[];
  shearBefore: number;
  shearAfter: number;
  momentBefore: number;
  momentAfter: number;
  rotation: number;
  deflection: number;
};

export type AnalysisMethod = "piecewise" | "fallback";

export type DiagramResult = DiagramArrays & {
  reactions: Reactions;
  classification: "determinate" | "indeterminate";
  degreeOfIndeterminacy: number;
  supports: { name: string; x: number }[];
  nodes: NodeValues[];
  method: AnalysisMethod;
  warnings: NumericalWarning[];
};
