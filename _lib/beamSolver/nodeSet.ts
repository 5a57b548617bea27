import type { BeamSnapshot } from "../elements/beam";
import { Node } from "../elements/node";
import type { NodeEvent } from "../elements/node";

export type NodeSetOptions = {
  nodeTolerance: number;
  /** Extra coordinates that must land exactly on a sample (e.g. redundant positions). */
  probes?: readonly number[];
};

type Candidate = { x: number; event: NodeEvent };

/**
 * Ordered breakpoints of a beam: {0, L}, supports, distributed-load ends and
 * concentrated-load positions. Coordinates within `nodeTolerance` collapse
 * into one node carrying all their events, so every discontinuity falls on
 * a sample instead of being smeared by a fixed grid.
 */
export function buildNodeSet(
  beam: BeamSnapshot,
  options: NodeSetOptions,
): Node[] {
  const candidates: Candidate[] = [
    { x: 0, event: { kind: "boundary", side: "start" } },
    { x: beam.length, event: { kind: "boundary", side: "end" } },
  ];

  for (const support of beam.supports) {
    candidates.push({ x: support.x, event: { kind: "support", support } });
  }

  for (const load of beam.loads) {
    switch (load.name) {
      case "PointLoad":
        candidates.push({ x: load.position, event: { kind: "pointLoad", load } });
        break;
      case "PointMoment":
        candidates.push({
          x: load.position,
          event: { kind: "pointMoment", load },
        });
        break;
      case "DistributedLoad":
        candidates.push({ x: load.start, event: { kind: "loadStart", load } });
        candidates.push({ x: load.end, event: { kind: "loadEnd", load } });
        break;
      default: {
        const unreachable: never = load;
        throw new Error(`Unknown load kind: ${String(unreachable)}`);
      }
    }
  }

  for (const x of options.probes ?? []) {
    if (x >= 0 && x <= beam.length) {
      candidates.push({ x, event: { kind: "probe" } });
    }
  }

  // Stable sort keeps the boundary and support events first at shared coordinates.
  candidates.sort((a, b) => a.x - b.x);

  const nodes: Node[] = [];
  for (const candidate of candidates) {
    const last = nodes[nodes.length - 1];
    if (last && candidate.x - last.x <= options.nodeTolerance) {
      last.addEvent(candidate.event);
      continue;
    }
    const node = new Node(`N${nodes.length}`, candidate.x);
    node.addEvent(candidate.event);
    nodes.push(node);
  }

  // Beam ends are pinned to their exact coordinates.
  nodes[0].x = 0;
  nodes[nodes.length - 1].x = beam.length;

  return nodes;
}
