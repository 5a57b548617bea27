export { Beam, SUPPORT_TOLERANCE, classifySupportCount } from "./elements/beam";
export type {
  BeamDiagnosis,
  BeamSnapshot,
  CapacityLimits,
  SectionProperties,
  SystemClassification,
} from "./elements/beam";
export {
  DistributedLoad,
  PointLoad,
  PointMoment,
  UDL,
  VDL,
} from "./elements/load";
export type { Load, LoadJump } from "./elements/load";
export { Support } from "./elements/support";
export { SectionUtils } from "./elements/section_utils";
export {
  BeamValidationError,
  SolveError,
  isNumericalFailure,
} from "./errors";
export type {
  FlexibilitySystem,
  NumericalWarning,
  NumericalWarningCode,
  SolveErrorCode,
  ValidationErrorCode,
} from "./errors";
export {
  DEFAULT_ANALYSIS_OPTIONS,
  sanitizeAnalysisOptions,
} from "./config";
export type { AnalysisOptions } from "./config";
export { BeamSolver, analyzeBeam } from "./beamSolver/beamSolver";
export {
  equilibriumResidual,
  getExtremes,
  getMaxMomentPerSpan,
  valueAt,
} from "./beamSolver/diagramSummary";
export type { Extreme, SpanMoments } from "./beamSolver/diagramSummary";
export type {
  AnalysisMethod,
  DiagramField,
  DiagramResult,
  NodeValues,
  Reactions,
} from "./beamSolver/types";
