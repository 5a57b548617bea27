export type AnalysisOptions = {
  /** Sub-intervals spread over the full beam length by the piecewise integrator. */
  resolution: number;
  /** Coordinates closer than this collapse into one node (m). */
  nodeTolerance: number;
  /** Moment residual at a constraint point, relative to max |M|, above which a warning is attached. */
  momentResidualTolerance: number;
  /** Deflection residual at an interior support, relative to max |y|, above which a warning is attached. */
  deflectionResidualTolerance: number;
  /** |V(L+)| relative to max |V| above which equilibrium closure is reported. */
  shearClosureTolerance: number;
  maxConditionNumber: number;
  /** Uniform sample count used by the fallback integrator. */
  fallbackResolution: number;
  maxLoads: number;
  maxSupports: number;
  verbose: boolean;
};

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  resolution: 2000,
  nodeTolerance: 1e-9,
  momentResidualTolerance: 1e-3,
  deflectionResidualTolerance: 1e-3,
  shearClosureTolerance: 1e-6,
  maxConditionNumber: 1e10,
  fallbackResolution: 400,
  maxLoads: 500,
  maxSupports: 50,
  verbose: false,
};

export const sanitizeAnalysisOptions = (
  value?: Partial<AnalysisOptions>,
): AnalysisOptions => {
  const positive = (maybe: unknown, fallback: number): number => {
    if (typeof maybe !== "number" || !Number.isFinite(maybe)) return fallback;
    return maybe > 0 ? maybe : fallback;
  };
  const count = (maybe: unknown, fallback: number): number => {
    const n = positive(maybe, fallback);
    return Math.max(1, Math.floor(n));
  };

  const d = DEFAULT_ANALYSIS_OPTIONS;
  return {
    resolution: count(value?.resolution, d.resolution),
    nodeTolerance: positive(value?.nodeTolerance, d.nodeTolerance),
    momentResidualTolerance: positive(
      value?.momentResidualTolerance,
      d.momentResidualTolerance,
    ),
    deflectionResidualTolerance: positive(
      value?.deflectionResidualTolerance,
      d.deflectionResidualTolerance,
    ),
    shearClosureTolerance: positive(
      value?.shearClosureTolerance,
      d.shearClosureTolerance,
    ),
    maxConditionNumber: positive(
      value?.maxConditionNumber,
      d.maxConditionNumber,
    ),
    fallbackResolution: Math.max(
      2,
      count(value?.fallbackResolution, d.fallbackResolution),
    ),
    maxLoads: count(value?.maxLoads, d.maxLoads),
    maxSupports: count(value?.maxSupports, d.maxSupports),
    verbose: typeof value?.verbose === "boolean" ? value.verbose : d.verbose,
  };
};
