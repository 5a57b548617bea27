import type { Load } from "../elements/load";
import { interpolate } from "../logic/quadrature";
import type { DiagramField, DiagramResult, Reactions } from "./types";

export type Extreme = { value: number; position: number };

export type SpanMoments = {
  span: string;
  start: number;
  end: number;
  maxSagging: number; // Positive
  maxHogging: number; // Negative
};

const NODE_MATCH_TOLERANCE = 1e-9;

function extremeOf(xs: readonly number[], values: readonly number[]): Extreme {
  let index = 0;
  values.forEach((v, i) => {
    if (Math.abs(v) > Math.abs(values[index])) index = i;
  });
  return { value: values[index] ?? 0, position: xs[index] ?? 0 };
}

/** Largest absolute value of each diagram, with its sign and position. */
export function getExtremes(result: DiagramResult): Record<DiagramField, Extreme> {
  return {
    shear: extremeOf(result.x, result.shear),
    moment: extremeOf(result.x, result.moment),
    rotation: extremeOf(result.x, result.rotation),
    deflection: extremeOf(result.x, result.deflection),
  };
}

/**
 * Diagram value at x. At a node, `side` picks the value just left or just
 * right of a shear or moment jump.
 */
export function valueAt(
  result: DiagramResult,
  field: DiagramField,
  x: number,
  side: "before" | "after" = "after",
): number {
  const node = result.nodes.find(
    (n) => Math.abs(n.x - x) <= NODE_MATCH_TOLERANCE,
  );
  if (node) {
    switch (field) {
      case "shear":
        return side === "before" ? node.shearBefore : node.shearAfter;
      case "moment":
        return side === "before" ? node.momentBefore : node.momentAfter;
      case "rotation":
        return node.rotation;
      case "deflection":
        return node.deflection;
    }
  }
  return interpolate(result.x, result[field], x);
}

/**
 * Maximum sagging and hogging moment in every region between consecutive
 * supports, overhangs included.
 */
export function getMaxMomentPerSpan(result: DiagramResult): SpanMoments[] {
  const length = result.x[result.x.length - 1] ?? 0;
  const marks = [
    { name: "start", x: 0 },
    ...[...result.supports].sort((a, b) => a.x - b.x),
    { name: "end", x: length },
  ];

  const spans: SpanMoments[] = [];
  for (let i = 0; i < marks.length - 1; i++) {
    const a = marks[i];
    const b = marks[i + 1];
    if (b.x - a.x <= NODE_MATCH_TOLERANCE) continue;

    let maxSagging = 0;
    let maxHogging = 0;
    result.x.forEach((x, k) => {
      if (x < a.x || x > b.x) return;
      const m = result.moment[k];
      if (m > maxSagging) maxSagging = m;
      if (m < maxHogging) maxHogging = m;
    });

    spans.push({
      span: `${a.name}-${b.name}`,
      start: a.x,
      end: b.x,
      maxSagging,
      maxHogging,
    });
  }
  return spans;
}

/** ΣR − ΣF; zero for a beam in vertical equilibrium. */
export function equilibriumResidual(
  beam: { loads: readonly Load[] },
  reactions: Reactions,
) {
  const totalReaction = Object.values(reactions).reduce((a, r) => a + r, 0);
  const totalLoad = beam.loads.reduce((a, l) => a + l.totalLoad(), 0);
  return totalReaction - totalLoad;
}
