// beam.ts

import { BeamValidationError } from "../errors";
import type { Load } from "./load";
import { SectionUtils } from "./section_utils";
import { Support } from "./support";

/** Minimum distance between two supports (1 mm). */
export const SUPPORT_TOLERANCE = 1e-3;

export type SectionProperties =
  | { E: number; I: number }
  | { flexuralRigidity: number }
  | { E: number; b: number; h: number };

export type SystemClassification =
  | "underconstrained"
  | "determinate"
  | "indeterminate";

/** Frozen view of a beam, handed to the engine for one calculation. */
export type BeamSnapshot = Readonly<{
  length: number;
  flexuralRigidity: number;
  supports: readonly Support[];
  loads: readonly Load[];
}>;

export type CapacityLimits = {
  maxLoads?: number;
  maxSupports?: number;
};

export type BeamDiagnosis = {
  valid: boolean;
  classification: SystemClassification;
  degree: number;
  messages: string[];
  warnings: string[];
};

function requirePositive(label: string, value: number) {
  if (!Number.isFinite(value)) {
    throw new BeamValidationError(
      "NonFiniteValue",
      `${label} must be a finite number, got ${value}`,
    );
  }
  if (value <= 0) {
    throw new BeamValidationError(
      "NonPositiveProperty",
      `${label} must be positive, got ${value}`,
    );
  }
}

export function classifySupportCount(count: number): SystemClassification {
  if (count < 2) return "underconstrained";
  return count === 2 ? "determinate" : "indeterminate";
}

export class Beam {
  readonly length: number;
  readonly E: number | null;
  readonly I: number | null;
  readonly flexuralRigidity: number;
  private supportList: Support[] = [];
  private loadList: Load[] = [];
  private supportCounter = 0;

  constructor(length: number, section: SectionProperties) {
    requirePositive("Beam length", length);
    this.length = length;

    if ("flexuralRigidity" in section) {
      requirePositive("Flexural rigidity EI", section.flexuralRigidity);
      this.E = null;
      this.I = null;
      this.flexuralRigidity = section.flexuralRigidity;
      return;
    }

    requirePositive("Elastic modulus E", section.E);
    let I: number;
    if ("I" in section) {
      I = section.I;
    } else {
      // Derive inertia from the rectangular section when it is not supplied.
      requirePositive("Section width b", section.b);
      requirePositive("Section depth h", section.h);
      I = SectionUtils.momentOfInertia(section.b, section.h);
    }
    requirePositive("Moment of inertia I", I);
    this.E = section.E;
    this.I = I;
    this.flexuralRigidity = SectionUtils.flexuralRigidity(section.E, I);
    requirePositive("Flexural rigidity EI", this.flexuralRigidity);
  }

  /** Beam with supports `A` at x=0 and `B` at x=L. */
  static simplySupported(length: number, section: SectionProperties): Beam {
    const beam = new Beam(length, section);
    beam.addSupport(0, "A");
    beam.addSupport(length, "B");
    return beam;
  }

  /** Supports ordered by position. */
  get supports(): readonly Support[] {
    return this.supportList;
  }

  get loads(): readonly Load[] {
    return this.loadList;
  }

  addSupport(x: number, name?: string): Support {
    this.supportCounter += 1;
    const supportName = name ?? `SUPPORT${this.supportCounter}`;
    const support = new Support(x, supportName);

    if (x < 0 || x > this.length) {
      throw new BeamValidationError(
        "OutOfDomainSupport",
        `Support '${supportName}' at x=${x} is outside the beam (L=${this.length})`,
      );
    }
    this.assertNoDuplicate(support);

    this.supportList = [...this.supportList, support].sort((a, b) => a.x - b.x);
    return support;
  }

  private assertNoDuplicate(support: Support) {
    for (const existing of this.supportList) {
      if (existing.name === support.name) {
        throw new BeamValidationError(
          "DuplicateSupport",
          `A support named '${support.name}' already exists at x=${existing.x}`,
        );
      }
      if (existing.isCloseTo(support.x, SUPPORT_TOLERANCE)) {
        const distanceMm = Math.abs(existing.x - support.x) * 1000;
        throw new BeamValidationError(
          "DuplicateSupport",
          `Support '${support.name}' at x=${support.x} is too close to '${existing.name}' ` +
            `(distance=${distanceMm.toFixed(3)} mm, minimum=1.0 mm)`,
        );
      }
    }
  }

  removeSupport(name: string): boolean {
    const before = this.supportList.length;
    this.supportList = this.supportList.filter((s) => s.name !== name);
    return this.supportList.length !== before;
  }

  clearSupports() {
    this.supportList = [];
  }

  addLoad<T extends Load>(load: T): T {
    this.assertInDomain(load);
    this.loadList = [...this.loadList, load];
    return load;
  }

  addLoads(...loads: Load[]) {
    loads.forEach((load) => this.addLoad(load));
  }

  private assertInDomain(load: Load) {
    for (const x of load.coordinates) {
      if (x < 0 || x > this.length) {
        throw new BeamValidationError(
          "OutOfDomainLoad",
          `${load.describe()} lies outside the beam (L=${this.length})`,
        );
      }
    }
  }

  clearLoads() {
    this.loadList = [];
  }

  classify(): SystemClassification {
    return classifySupportCount(this.supportList.length);
  }

  /** Redundant reactions beyond the two equilibrium equations; negative when unstable. */
  degreeOfIndeterminacy() {
    return this.supportList.length - 2;
  }

  totalLoad() {
    return this.loadList.reduce((acc, load) => acc + load.totalLoad(), 0);
  }

  describeLoads(): string[] {
    return this.loadList.map((load) => load.describe());
  }

  /**
   * Re-runs every structural check. Called by the engine before each solve
   * even though mutations are already checked eagerly.
   */
  validate(limits: CapacityLimits = {}) {
    requirePositive("Beam length", this.length);
    requirePositive("Flexural rigidity EI", this.flexuralRigidity);

    if (limits.maxSupports !== undefined && this.supportList.length > limits.maxSupports) {
      throw new BeamValidationError(
        "CapacityExceeded",
        `Too many supports: ${this.supportList.length} (maximum ${limits.maxSupports})`,
      );
    }
    if (limits.maxLoads !== undefined && this.loadList.length > limits.maxLoads) {
      throw new BeamValidationError(
        "CapacityExceeded",
        `Too many loads: ${this.loadList.length} (maximum ${limits.maxLoads})`,
      );
    }

    const seen: Support[] = [];
    for (const support of this.supportList) {
      if (support.x < 0 || support.x > this.length) {
        throw new BeamValidationError(
          "OutOfDomainSupport",
          `Support '${support.name}' at x=${support.x} is outside the beam (L=${this.length})`,
        );
      }
      for (const other of seen) {
        if (other.name === support.name || other.isCloseTo(support.x, SUPPORT_TOLERANCE)) {
          throw new BeamValidationError(
            "DuplicateSupport",
            `Supports '${other.name}' and '${support.name}' conflict`,
          );
        }
      }
      seen.push(support);
    }
    this.loadList.forEach((load) => this.assertInDomain(load));

    if (this.classify() === "underconstrained") {
      throw new BeamValidationError(
        "UnderconstrainedSystem",
        `At least 2 supports are required, found ${this.supportList.length}`,
      );
    }
  }

  /** Non-throwing report of the structural system, for display layers. */
  diagnose(): BeamDiagnosis {
    const classification = this.classify();
    const degree = this.degreeOfIndeterminacy();
    const count = this.supportList.length;
    const result: BeamDiagnosis = {
      valid: true,
      classification,
      degree,
      messages: [],
      warnings: [],
    };

    if (count === 0) {
      result.valid = false;
      result.messages.push("No supports defined");
    } else if (classification === "underconstrained") {
      result.valid = false;
      result.messages.push(
        `Underconstrained system: insufficient supports (${count} < 2)`,
      );
    } else if (classification === "determinate") {
      result.messages.push(`Statically determinate: ${count} supports`);
    } else {
      result.messages.push(
        `Statically indeterminate of degree ${degree}: ${count} supports`,
      );
      result.warnings.push(
        "Reactions will be solved by compatibility of deflections",
      );
    }

    if (this.loadList.length === 0) {
      result.warnings.push("No loads applied");
    }

    return result;
  }

  snapshot(): BeamSnapshot {
    return Object.freeze({
      length: this.length,
      flexuralRigidity: this.flexuralRigidity,
      supports: Object.freeze([...this.supportList]),
      loads: Object.freeze([...this.loadList]),
    });
  }
}
