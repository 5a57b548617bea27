import type { Beam, BeamSnapshot } from "../elements/beam";
import { sanitizeAnalysisOptions } from "../config";
import type { AnalysisOptions } from "../config";
import { isNumericalFailure } from "../errors";
import type { NumericalWarning, SolveError } from "../errors";
import { interpolate } from "../logic/quadrature";
import { solveDeterminateReactions } from "./analysisModes/determinate/reactions";
import {
  solveByFlexibility,
  solveRedundantsByLeastSquares,
} from "./analysisModes/indeterminate/flexibilityMethod";
import { resolveBeamAnalysisMode } from "./analysisModes/resolveAnalysisMode";
import type { BeamAnalysisMode } from "./analysisModes/resolveAnalysisMode";
import { runDiagramPass } from "./diagramPass";
import {
  integrateFallback,
  solveEquilibriumReactions,
} from "./fallbackIntegrator";
import { buildNodeSet } from "./nodeSet";
import type { DiagramResult, NodeValues, Reactions } from "./types";

export class BeamSolver {
  beam: Beam;
  options: AnalysisOptions;

  constructor(beam: Beam, options: Partial<AnalysisOptions> = {}) {
    this.beam = beam;
    this.options = sanitizeAnalysisOptions(options);
  }

  private log(message: string) {
    if (this.options.verbose) console.log(message);
  }

  /**
   * Validates the beam, resolves reactions and produces the V, M, θ, y
   * diagrams. Numerical failures of the node-aware pipeline degrade to the
   * fallback integrator; validation errors are never caught.
   */
  solve(): DiagramResult {
    this.beam.validate({
      maxLoads: this.options.maxLoads,
      maxSupports: this.options.maxSupports,
    });
    const snapshot = this.beam.snapshot();
    const mode = resolveBeamAnalysisMode(snapshot.supports.length);
    this.log(
      `Beam analysis mode: ${mode} (${snapshot.supports.length} supports, ${snapshot.loads.length} loads)`,
    );

    try {
      return this.solvePiecewise(snapshot, mode);
    } catch (error) {
      if (!isNumericalFailure(error)) throw error;
      this.log(`Piecewise pipeline failed (${error.code}): ${error.message}`);
      return this.solveFallback(snapshot, mode, error);
    }
  }

  private solveReactions(snapshot: BeamSnapshot, mode: BeamAnalysisMode) {
    if (mode === "determinate") {
      const [left, right] = snapshot.supports;
      return solveDeterminateReactions(left, right, snapshot.loads);
    }
    const solution = solveByFlexibility(snapshot, this.options, (m) =>
      this.log(m),
    );
    return solution.reactions;
  }

  private solvePiecewise(
    snapshot: BeamSnapshot,
    mode: BeamAnalysisMode,
  ): DiagramResult {
    const reactions = this.solveReactions(snapshot, mode);
    this.logReactions(reactions);

    const { diagram, warnings } = runDiagramPass(
      snapshot,
      reactions,
      snapshot.supports,
      this.options,
    );
    warnings.forEach((w) => this.log(`Warning ${w.code}: ${w.message}`));

    const nodes: NodeValues[] = diagram.nodes.map((n) => ({
      id: n.id,
      x: n.x,
      events: n.events,
      shearBefore: diagram.shear[n.beforeIndex],
      shearAfter: diagram.shear[n.afterIndex],
      momentBefore: diagram.moment[n.beforeIndex],
      momentAfter: diagram.moment[n.afterIndex],
      rotation: diagram.rotation[n.afterIndex],
      deflection: diagram.deflection[n.afterIndex],
    }));

    return {
      x: diagram.x,
      shear: diagram.shear,
      moment: diagram.moment,
      rotation: diagram.rotation,
      deflection: diagram.deflection,
      reactions,
      ...this.describeSystem(snapshot, mode),
      nodes,
      method: "piecewise",
      warnings,
    };
  }

  private fallbackReactions(
    snapshot: BeamSnapshot,
    mode: BeamAnalysisMode,
    cause: SolveError,
  ): Reactions {
    if (mode === "determinate") {
      const [left, right] = snapshot.supports;
      return solveDeterminateReactions(left, right, snapshot.loads);
    }
    if (cause.system) {
      try {
        const reactions = solveRedundantsByLeastSquares(snapshot, cause.system);
        if (reactions) return reactions;
        this.log("Least-squares redundants are not finite; using equilibrium only");
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.log(`Least-squares redundants failed (${reason}); using equilibrium only`);
      }
    }
    return solveEquilibriumReactions(snapshot);
  }

  private solveFallback(
    snapshot: BeamSnapshot,
    mode: BeamAnalysisMode,
    cause: SolveError,
  ): DiagramResult {
    const reactions = this.fallbackReactions(snapshot, mode, cause);
    this.logReactions(reactions);
    const diagram = integrateFallback(
      snapshot,
      reactions,
      this.options.fallbackResolution,
    );

    const warnings: NumericalWarning[] = [
      {
        code: "FallbackEngaged",
        message: `Fallback integrator used after ${cause.code}: ${cause.message}`,
      },
    ];

    // Node values are read off the uniform grid, so both sides coincide.
    const at = (values: number[], x: number) => interpolate(diagram.x, values, x);
    const nodes: NodeValues[] = buildNodeSet(snapshot, {
      nodeTolerance: this.options.nodeTolerance,
    }).map((n) => ({
      id: n.id,
      x: n.x,
      events: n.eventKinds,
      shearBefore: at(diagram.shear, n.x),
      shearAfter: at(diagram.shear, n.x),
      momentBefore: at(diagram.moment, n.x),
      momentAfter: at(diagram.moment, n.x),
      rotation: at(diagram.rotation, n.x),
      deflection: at(diagram.deflection, n.x),
    }));

    return {
      x: diagram.x,
      shear: diagram.shear,
      moment: diagram.moment,
      rotation: diagram.rotation,
      deflection: diagram.deflection,
      reactions,
      ...this.describeSystem(snapshot, mode),
      nodes,
      method: "fallback",
      warnings,
    };
  }

  private describeSystem(snapshot: BeamSnapshot, mode: BeamAnalysisMode) {
    return {
      classification: mode,
      degreeOfIndeterminacy: snapshot.supports.length - 2,
      supports: snapshot.supports.map((s) => ({ name: s.name, x: s.x })),
    };
  }

  private logReactions(reactions: Reactions) {
    for (const [name, value] of Object.entries(reactions)) {
      this.log(`Reaction ${name}: ${value.toFixed(4)} N`);
    }
  }
}

export function analyzeBeam(
  beam: Beam,
  options: Partial<AnalysisOptions> = {},
): DiagramResult {
  return new BeamSolver(beam, options).solve();
}
