import { describe, expect, it } from "vitest";
import { Beam } from "../elements/beam";
import { PointLoad, PointMoment, UDL } from "../elements/load";
import { buildNodeSet } from "../beamSolver/nodeSet";

function sampleBeam() {
  const beam = Beam.simplySupported(10, { flexuralRigidity: 1e4 });
  beam.addLoads(new PointLoad(4, 5), new UDL(2, 4, 1), new PointMoment(6, 3));
  return beam;
}

describe("buildNodeSet", () => {
  it("places a node at every breakpoint", () => {
    const nodes = buildNodeSet(sampleBeam().snapshot(), { nodeTolerance: 1e-9 });
    expect(nodes.map((n) => n.x)).toEqual([0, 2, 4, 6, 10]);
    expect(nodes.map((n) => n.id)).toEqual(["N0", "N1", "N2", "N3", "N4"]);
  });

  it("merges coincident events into one node", () => {
    const nodes = buildNodeSet(sampleBeam().snapshot(), { nodeTolerance: 1e-9 });
    expect(nodes[0].eventKinds).toEqual(["boundary", "support"]);
    expect(nodes[3].eventKinds).toEqual(["loadEnd", "pointMoment"]);
    expect(nodes[4].supports.map((s) => s.name)).toEqual(["B"]);
  });

  it("flags only concentrated actions as jumps", () => {
    const nodes = buildNodeSet(sampleBeam().snapshot(), { nodeTolerance: 1e-9 });
    expect(nodes.map((n) => n.hasJump)).toEqual([true, false, true, true, true]);
    expect(nodes[2].concentratedLoads).toHaveLength(1);
  });

  it("collapses coordinates within tolerance", () => {
    const beam = sampleBeam();
    beam.addLoad(new PointLoad(4 + 5e-10, 1));
    const nodes = buildNodeSet(beam.snapshot(), { nodeTolerance: 1e-9 });
    expect(nodes).toHaveLength(5);
    expect(nodes[2].concentratedLoads).toHaveLength(2);
  });

  it("adds probe coordinates inside the beam", () => {
    const nodes = buildNodeSet(sampleBeam().snapshot(), {
      nodeTolerance: 1e-9,
      probes: [5, 12],
    });
    expect(nodes.map((n) => n.x)).toEqual([0, 2, 4, 5, 6, 10]);
    expect(nodes[3].eventKinds).toEqual(["probe"]);
    expect(nodes[3].hasJump).toBe(false);
  });
});
