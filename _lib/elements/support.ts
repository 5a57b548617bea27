import { BeamValidationError } from "../errors";

// --- Support Class ---
/**
 * Simple (roller-type) support: restrains vertical translation only, so it
 * carries exactly one unknown vertical reaction and no moment.
 */
export class Support {
  readonly x: number;
  readonly name: string;

  constructor(x: number, name: string) {
    if (!Number.isFinite(x)) {
      throw new BeamValidationError(
        "NonFiniteValue",
        `Support position must be a finite number, got ${x}`,
      );
    }
    this.x = x;
    this.name = name;
  }

  isCloseTo(x: number, tolerance: number) {
    return Math.abs(this.x - x) < tolerance;
  }
}
