import { BeamValidationError } from "../errors";

/**
 * Sign conventions shared by every load kind:
 * - forces are positive DOWNWARD,
 * - couples are positive COUNTER-CLOCKWISE (raise the right-hand side),
 * - V(x) and M(x) are the internal shear and moment just right of x.
 */

export type LoadJump = { shear: number; moment: number };

const NO_JUMP: LoadJump = { shear: 0, moment: 0 };

const fmt = (value: number) => Number(value.toPrecision(3)).toString();

function requireFinite(label: string, value: number) {
  if (!Number.isFinite(value)) {
    throw new BeamValidationError(
      "NonFiniteValue",
      `${label} must be a finite number, got ${value}`,
    );
  }
}

// --- PointLoad Class ---
export class PointLoad {
  readonly position: number;
  readonly magnitude: number;
  readonly name: "PointLoad" = "PointLoad";

  constructor(position: number, magnitude: number) {
    requireFinite("Point load position", position);
    requireFinite("Point load magnitude", magnitude);
    this.position = position;
    this.magnitude = magnitude;
  }

  get coordinates(): number[] {
    return [this.position];
  }

  totalLoad() {
    return this.magnitude;
  }

  momentAbout(origin: number = 0) {
    return this.magnitude * (this.position - origin);
  }

  shearContribution(x: number, tolerance: number = 0) {
    return this.position <= x + tolerance ? -this.magnitude : 0;
  }

  momentContribution(x: number, tolerance: number = 0) {
    return this.position <= x + tolerance
      ? -this.magnitude * (x - this.position)
      : 0;
  }

  jumpAt(x: number, tolerance: number = 0): LoadJump {
    return Math.abs(x - this.position) <= tolerance
      ? { shear: -this.magnitude, moment: 0 }
      : NO_JUMP;
  }

  activeOver(_start: number, _end: number) {
    return false;
  }

  intensityAt(_x: number) {
    return 0;
  }

  describe() {
    return `Point load P=${fmt(this.magnitude)} N at x=${fmt(this.position)} m`;
  }
}

// --- PointMoment Class ---
export class PointMoment {
  readonly position: number;
  readonly magnitude: number;
  readonly name: "PointMoment" = "PointMoment";

  constructor(position: number, magnitude: number) {
    requireFinite("Point moment position", position);
    requireFinite("Point moment magnitude", magnitude);
    this.position = position;
    this.magnitude = magnitude;
  }

  get coordinates(): number[] {
    return [this.position];
  }

  totalLoad() {
    return 0;
  }

  /** A couple is a free vector: same contribution about any origin. */
  momentAbout(_origin: number = 0) {
    return this.magnitude;
  }

  shearContribution(_x: number, _tolerance: number = 0) {
    return 0;
  }

  momentContribution(x: number, tolerance: number = 0) {
    return this.position <= x + tolerance ? this.magnitude : 0;
  }

  jumpAt(x: number, tolerance: number = 0): LoadJump {
    return Math.abs(x - this.position) <= tolerance
      ? { shear: 0, moment: this.magnitude }
      : NO_JUMP;
  }

  activeOver(_start: number, _end: number) {
    return false;
  }

  intensityAt(_x: number) {
    return 0;
  }

  describe() {
    const sense = this.magnitude >= 0 ? "counter-clockwise" : "clockwise";
    return `Point moment M=${fmt(this.magnitude)} N*m (${sense}) at x=${fmt(this.position)} m`;
  }
}

// --- DistributedLoad Class ---
/**
 * Linearly varying line load between `start` and `end`. Uniform, triangular
 * and trapezoidal loads are all instances of this class.
 */
export class DistributedLoad {
  readonly start: number;
  readonly end: number;
  readonly startIntensity: number;
  readonly endIntensity: number;
  readonly name: "DistributedLoad" = "DistributedLoad";

  constructor(
    start: number,
    end: number,
    startIntensity: number,
    endIntensity: number = startIntensity,
  ) {
    requireFinite("Distributed load start", start);
    requireFinite("Distributed load end", end);
    requireFinite("Distributed load start intensity", startIntensity);
    requireFinite("Distributed load end intensity", endIntensity);
    if (!(end > start)) {
      throw new BeamValidationError(
        "InvalidRange",
        `Distributed load must start before it ends: start=${start}, end=${end}`,
      );
    }
    this.start = start;
    this.end = end;
    this.startIntensity = startIntensity;
    this.endIntensity = endIntensity;
  }

  get span() {
    return this.end - this.start;
  }

  get slope() {
    return (this.endIntensity - this.startIntensity) / this.span;
  }

  get shape(): "uniform" | "triangular" | "trapezoidal" {
    if (this.startIntensity === this.endIntensity) return "uniform";
    if (this.startIntensity === 0 || this.endIntensity === 0) {
      return "triangular";
    }
    return "trapezoidal";
  }

  get coordinates(): number[] {
    return [this.start, this.end];
  }

  totalLoad() {
    return ((this.startIntensity + this.endIntensity) * this.span) / 2;
  }

  // ∫ w(s)·(s - origin) ds over the loaded length
  momentAbout(origin: number = 0) {
    const T = this.span;
    const d = this.start - origin;
    return (
      this.startIntensity * (T * d + (T * T) / 2) +
      this.slope * ((d * T * T) / 2 + (T * T * T) / 3)
    );
  }

  private loadedLength(x: number) {
    return Math.min(Math.max(x - this.start, 0), this.span);
  }

  shearContribution(x: number, _tolerance: number = 0) {
    const T = this.loadedLength(x);
    return -(this.startIntensity * T + (this.slope * T * T) / 2);
  }

  momentContribution(x: number, _tolerance: number = 0) {
    const T = this.loadedLength(x);
    const X = x - this.start;
    return -(
      this.startIntensity * (X * T - (T * T) / 2) +
      this.slope * ((X * T * T) / 2 - (T * T * T) / 3)
    );
  }

  jumpAt(_x: number, _tolerance: number = 0): LoadJump {
    return NO_JUMP;
  }

  /** True when the open interval (start, end) of a span lies under this load. */
  activeOver(spanStart: number, spanEnd: number) {
    const mid = (spanStart + spanEnd) / 2;
    return this.start < mid && mid < this.end;
  }

  intensityAt(x: number) {
    if (x < this.start || x > this.end) return 0;
    return this.startIntensity + this.slope * (x - this.start);
  }

  describe() {
    const range = `between ${fmt(this.start)} and ${fmt(this.end)} m`;
    if (this.shape === "uniform") {
      return `Uniform load w=${fmt(this.startIntensity)} N/m ${range}`;
    }
    return `${this.shape === "triangular" ? "Triangular" : "Trapezoidal"} load from ${fmt(this.startIntensity)} to ${fmt(this.endIntensity)} N/m ${range}`;
  }
}

// --- UDL Class ---
export class UDL extends DistributedLoad {
  constructor(startPosition: number, span: number, magnitudePerMeter: number) {
    super(startPosition, startPosition + span, magnitudePerMeter);
  }

  get startPosition() {
    return this.start;
  }

  get magnitudePerMeter() {
    return this.startIntensity;
  }
}

// --- VDL Class ---
/** Linearly varying load given by its high and low ends, in either order. */
export class VDL extends DistributedLoad {
  constructor(
    highMagnitude: number,
    highPosition: number,
    lowMagnitude: number,
    lowPosition: number,
  ) {
    if (highPosition === lowPosition) {
      throw new BeamValidationError(
        "InvalidRange",
        `High and low positions cannot be the same (x=${highPosition}).`,
      );
    }
    const increasing = highPosition > lowPosition;
    super(
      Math.min(highPosition, lowPosition),
      Math.max(highPosition, lowPosition),
      increasing ? lowMagnitude : highMagnitude,
      increasing ? highMagnitude : lowMagnitude,
    );
  }
}

export type Load = PointLoad | PointMoment | DistributedLoad;
