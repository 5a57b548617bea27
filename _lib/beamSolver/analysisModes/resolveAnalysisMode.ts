export type BeamAnalysisMode = "determinate" | "indeterminate";

/**
 * Entry-point mode selector for reaction solving.
 * Two supports are solved by statics alone; more need compatibility.
 */
export function resolveBeamAnalysisMode(supportCount: number): BeamAnalysisMode {
  return supportCount > 2 ? "indeterminate" : "determinate";
}
