import { describe, expect, it, vi } from "vitest";
import { Beam } from "../elements/beam";
import { PointLoad, PointMoment, UDL } from "../elements/load";
import { BeamSolver, analyzeBeam } from "../beamSolver/beamSolver";
import { valueAt } from "../beamSolver/diagramSummary";
import { nodeAt, sum } from "./helpers";

describe("Simply supported beam under a central point load", () => {
  const beam = Beam.simplySupported(6, { flexuralRigidity: 1000 });
  beam.addLoad(new PointLoad(3, 10));
  const result = analyzeBeam(beam);

  it("splits the load equally", () => {
    expect(result.reactions.A).toBeCloseTo(5, 10);
    expect(result.reactions.B).toBeCloseTo(5, 10);
    expect(result.classification).toBe("determinate");
    expect(result.degreeOfIndeterminacy).toBe(0);
    expect(result.method).toBe("piecewise");
    expect(result.warnings).toEqual([]);
  });

  it("peaks at PL/4 under the load with zero end moments", () => {
    expect(valueAt(result, "moment", 3)).toBeCloseTo(15, 9);
    expect(valueAt(result, "moment", 0)).toBeCloseTo(0, 9);
    expect(valueAt(result, "moment", 6)).toBeCloseTo(0, 9);
  });

  it("jumps shear by the reaction and by -P", () => {
    const start = nodeAt(result, 0);
    expect(start.shearBefore).toBe(0);
    expect(start.shearAfter).toBeCloseTo(5, 10);

    const middle = nodeAt(result, 3);
    expect(middle.shearBefore).toBeCloseTo(5, 10);
    expect(middle.shearAfter).toBeCloseTo(-5, 10);
    expect(middle.momentAfter - middle.momentBefore).toBeCloseTo(0, 12);
  });

  it("deflects PL^3/48EI at midspan and not at the supports", () => {
    expect(valueAt(result, "deflection", 3)).toBeCloseTo(-0.045, 6);
    expect(valueAt(result, "deflection", 0)).toBeCloseTo(0, 10);
    expect(valueAt(result, "deflection", 6)).toBeCloseTo(0, 10);
    expect(valueAt(result, "rotation", 3)).toBeCloseTo(0, 6);
  });

  it("returns parallel arrays over the full length", () => {
    const n = result.x.length;
    expect(result.shear).toHaveLength(n);
    expect(result.moment).toHaveLength(n);
    expect(result.rotation).toHaveLength(n);
    expect(result.deflection).toHaveLength(n);
    expect(result.x[0]).toBe(0);
    expect(result.x[n - 1]).toBe(6);
  });
});

describe("Simply supported beam under a full uniform load", () => {
  const beam = Beam.simplySupported(10, { flexuralRigidity: 1e4 });
  beam.addLoad(new UDL(0, 10, 2));
  const result = analyzeBeam(beam);

  it("carries wL/2 at each end and wL^2/8 at midspan", () => {
    expect(result.reactions.A).toBeCloseTo(10, 10);
    expect(result.reactions.B).toBeCloseTo(10, 10);
    expect(valueAt(result, "moment", 5)).toBeCloseTo(25, 8);
    expect(valueAt(result, "shear", 5)).toBeCloseTo(0, 8);
  });

  it("deflects 5wL^4/384EI at midspan", () => {
    expect(valueAt(result, "deflection", 5)).toBeCloseTo(
      -(5 * 2 * 1e4) / (384 * 1e4),
      6,
    );
  });

  it("balances the applied load", () => {
    expect(sum(Object.values(result.reactions))).toBeCloseTo(20, 10);
  });
});

describe("Point moment at midspan", () => {
  const beam = Beam.simplySupported(6, { flexuralRigidity: 1000 });
  beam.addLoad(new PointMoment(3, 1000));
  const result = analyzeBeam(beam);

  it("is resisted by an equal and opposite reaction couple", () => {
    expect(result.reactions.A).toBeCloseTo(-1000 / 6, 9);
    expect(result.reactions.B).toBeCloseTo(1000 / 6, 9);
    expect(sum(Object.values(result.reactions))).toBeCloseTo(0, 9);
  });

  it("keeps shear continuous and jumps moment by M0", () => {
    const node = nodeAt(result, 3);
    expect(node.shearAfter - node.shearBefore).toBeCloseTo(0, 12);
    expect(node.momentBefore).toBeCloseTo(-500, 8);
    expect(node.momentAfter).toBeCloseTo(500, 8);
    expect(node.momentAfter - node.momentBefore).toBeCloseTo(1000, 8);
    expect(valueAt(result, "moment", 3, "before")).toBeCloseTo(-500, 8);
  });

  it("returns to zero moment at the far support", () => {
    expect(valueAt(result, "moment", 6)).toBeCloseTo(0, 8);
  });
});

describe("Several point loads", () => {
  const beam = Beam.simplySupported(8, { flexuralRigidity: 5000 });
  beam.addLoads(new PointLoad(2, 7), new PointLoad(5, 4));
  const result = analyzeBeam(beam);

  it("jumps shear by each reaction and each load", () => {
    expect(result.reactions.B).toBeCloseTo(4.25, 10);
    expect(result.reactions.A).toBeCloseTo(6.75, 10);

    const a = nodeAt(result, 0);
    expect(a.shearAfter - a.shearBefore).toBeCloseTo(6.75, 10);
    const first = nodeAt(result, 2);
    expect(first.shearAfter - first.shearBefore).toBeCloseTo(-7, 10);
    const second = nodeAt(result, 5);
    expect(second.shearAfter - second.shearBefore).toBeCloseTo(-4, 10);
    const b = nodeAt(result, 8);
    expect(b.shearAfter).toBeCloseTo(0, 10);
  });
});

describe("Overhanging beam", () => {
  const beam = new Beam(6, { flexuralRigidity: 1e4 });
  beam.addSupport(0, "A");
  beam.addSupport(4, "B");
  beam.addLoad(new PointLoad(6, 10));
  const result = analyzeBeam(beam);

  it("pulls down on the back span support", () => {
    expect(result.reactions.A).toBeCloseTo(-5, 10);
    expect(result.reactions.B).toBeCloseTo(15, 10);
  });

  it("hogs over the inner support and lifts nothing at the supports", () => {
    expect(valueAt(result, "moment", 4)).toBeCloseTo(-20, 8);
    expect(valueAt(result, "moment", 6)).toBeCloseTo(0, 8);
    expect(valueAt(result, "deflection", 0)).toBeCloseTo(0, 10);
    expect(valueAt(result, "deflection", 4)).toBeCloseTo(0, 10);
    expect(valueAt(result, "deflection", 6)).toBeLessThan(0);
  });
});

describe("Logging", () => {
  it("stays silent unless verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const beam = Beam.simplySupported(6, { flexuralRigidity: 1000 });
    beam.addLoad(new PointLoad(3, 10));

    new BeamSolver(beam).solve();
    expect(log).not.toHaveBeenCalled();

    new BeamSolver(beam, { verbose: true }).solve();
    expect(log).toHaveBeenCalledWith(
      "Beam analysis mode: determinate (2 supports, 1 loads)",
    );
    expect(log).toHaveBeenCalledWith("Reaction A: 5.0000 N");
    log.mockRestore();
  });
});
