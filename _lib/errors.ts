export type ValidationErrorCode =
  | "DuplicateSupport"
  | "OutOfDomainLoad"
  | "OutOfDomainSupport"
  | "InvalidRange"
  | "NonPositiveProperty"
  | "UnderconstrainedSystem"
  | "NonFiniteValue"
  | "CapacityExceeded";

export type SolveErrorCode =
  | "SingularFlexibilityMatrix"
  | "NonFiniteIntegration"
  | "NonFiniteResult";

/**
 * Raised before any computation when the beam configuration is structurally
 * invalid. A beam that raised one of these is never solved.
 */
export class BeamValidationError extends Error {
  readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = "BeamValidationError";
    this.code = code;
  }
}

/** Assembled compatibility system f·R = rhs, attached to flexibility failures. */
export type FlexibilitySystem = {
  redundantNames: string[];
  flexibility: number[][];
  loadDeflections: number[];
};

export class SolveError extends Error {
  readonly code: SolveErrorCode;
  readonly system?: FlexibilitySystem;
  readonly conditionNumber?: number;

  constructor(
    code: SolveErrorCode,
    message: string,
    details: { system?: FlexibilitySystem; conditionNumber?: number } = {},
  ) {
    super(message);
    this.name = "SolveError";
    this.code = code;
    this.system = details.system;
    this.conditionNumber = details.conditionNumber;
  }
}

export type NumericalWarningCode =
  | "BoundaryCorrectionExceeded"
  | "ShearClosure"
  | "FallbackEngaged";

/** Non-fatal condition attached to a result; never thrown. */
export type NumericalWarning = {
  code: NumericalWarningCode;
  message: string;
  magnitude?: number;
  position?: number;
};

export const isNumericalFailure = (error: unknown): error is SolveError =>
  error instanceof SolveError &&
  (error.code === "SingularFlexibilityMatrix" ||
    error.code === "NonFiniteIntegration");
