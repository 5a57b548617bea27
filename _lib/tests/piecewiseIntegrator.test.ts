import { describe, expect, it } from "vitest";
import { Beam } from "../elements/beam";
import { PointLoad, UDL } from "../elements/load";
import { buildNodeSet } from "../beamSolver/nodeSet";
import { integratePiecewise } from "../beamSolver/piecewiseIntegrator";
import { correctBoundaries } from "../beamSolver/boundaryCorrector";
import { DEFAULT_ANALYSIS_OPTIONS } from "../config";
import { errorCode } from "./helpers";

function centralPointLoad(flexuralRigidity = 1000) {
  const beam = Beam.simplySupported(6, { flexuralRigidity });
  beam.addLoad(new PointLoad(3, 10));
  const snapshot = beam.snapshot();
  const nodes = buildNodeSet(snapshot, { nodeTolerance: 1e-9 });
  return { snapshot, nodes };
}

describe("integratePiecewise", () => {
  it("samples both sides of every jump", () => {
    const { snapshot, nodes } = centralPointLoad();
    const raw = integratePiecewise(snapshot, nodes, { A: 5, B: 5 }, { resolution: 6 });

    expect(raw.x).toEqual([0, 0, 1, 2, 3, 3, 4, 5, 6, 6]);
    expect(raw.shear).toEqual([0, 5, 5, 5, 5, -5, -5, -5, -5, 0]);
    expect(raw.moment).toEqual([0, 0, 5, 10, 15, 15, 10, 5, 0, 0]);
    expect(raw.nodes.map((n) => [n.beforeIndex, n.afterIndex])).toEqual([
      [0, 1],
      [4, 5],
      [8, 9],
    ]);
    expect(raw.nodes[2].supportNames).toEqual(["B"]);
  });

  it("applies a distributed load only over the spans it covers", () => {
    const beam = Beam.simplySupported(8, { flexuralRigidity: 1000 });
    beam.addLoad(new UDL(0, 4, 2));
    const snapshot = beam.snapshot();
    const nodes = buildNodeSet(snapshot, { nodeTolerance: 1e-9 });
    const raw = integratePiecewise(snapshot, nodes, { A: 6, B: 2 }, { resolution: 8 });

    // Nodes at 0, 4 and 8, one sample per metre between them.
    expect(raw.x).toEqual([0, 0, 1, 2, 3, 4, 5, 6, 7, 8, 8]);
    expect(raw.shear).toEqual([0, 6, 4, 2, 0, -2, -2, -2, -2, -2, 0]);
  });

  it("starts rotation and deflection at zero", () => {
    const { snapshot, nodes } = centralPointLoad();
    const raw = integratePiecewise(snapshot, nodes, { A: 5, B: 5 }, { resolution: 60 });
    expect(raw.rotation[0]).toBe(0);
    expect(raw.deflection[0]).toBe(0);
  });

  it("fails on non-finite values", () => {
    const { snapshot, nodes } = centralPointLoad(1e-320);
    expect(
      errorCode(() =>
        integratePiecewise(snapshot, nodes, { A: 5, B: 5 }, { resolution: 60 }),
      ),
    ).toBe("NonFiniteIntegration");
  });
});

describe("correctBoundaries", () => {
  it("removes a moment offset and reports its size", () => {
    const { snapshot, nodes } = centralPointLoad();
    const reactions = { A: 5, B: 5 };
    const raw = integratePiecewise(snapshot, nodes, reactions, { resolution: 600 });
    const shifted = { ...raw, moment: raw.moment.map((m) => m + 1) };

    const { diagram, warnings } = correctBoundaries(
      snapshot,
      shifted,
      reactions,
      snapshot.supports,
      DEFAULT_ANALYSIS_OPTIONS,
    );
    expect(warnings.map((w) => w.code)).toEqual(["BoundaryCorrectionExceeded"]);
    expect(warnings[0].magnitude).toBeCloseTo(1, 9);
    expect(diagram.moment[raw.nodes[1].afterIndex]).toBeCloseTo(15, 9);
    expect(diagram.moment[raw.nodes[0].afterIndex]).toBeCloseTo(0, 9);
  });

  it("reports shear that does not close", () => {
    const { snapshot, nodes } = centralPointLoad();
    const reactions = { A: 5, B: 6 };
    const raw = integratePiecewise(snapshot, nodes, reactions, { resolution: 600 });
    const { warnings } = correctBoundaries(
      snapshot,
      raw,
      reactions,
      snapshot.supports,
      DEFAULT_ANALYSIS_OPTIONS,
    );
    expect(warnings.map((w) => w.code)).toEqual(["ShearClosure"]);
    expect(warnings[0].magnitude).toBeCloseTo(1, 12);
    expect(warnings[0].position).toBe(6);
  });

  it("pins interior supports and flags a large deflection correction", () => {
    const beam = new Beam(10, { flexuralRigidity: 1e4 });
    beam.addSupport(0, "A");
    beam.addSupport(5, "B");
    beam.addSupport(10, "C");
    beam.addLoad(new UDL(0, 10, 3));
    const snapshot = beam.snapshot();
    const nodes = buildNodeSet(snapshot, { nodeTolerance: 1e-9 });
    const reactions = { A: 15, B: 0, C: 15 };
    const raw = integratePiecewise(snapshot, nodes, reactions, { resolution: 1000 });

    const { diagram, warnings } = correctBoundaries(
      snapshot,
      raw,
      reactions,
      snapshot.supports,
      DEFAULT_ANALYSIS_OPTIONS,
    );
    expect(warnings.map((w) => w.code)).toEqual(["BoundaryCorrectionExceeded"]);
    expect(warnings[0].message).toMatch(/^Deflection correction/);
    expect(warnings[0].position).toBe(5);
    expect(diagram.deflection[raw.nodes[1].afterIndex]).toBeCloseTo(0, 12);
  });
});
