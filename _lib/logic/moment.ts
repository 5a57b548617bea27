import type { BeamSnapshot } from "../elements/beam";
import type { Reactions } from "../beamSolver/types";

/**
 * Closed-form section moment just right of x, from the reactions to the left
 * and every load's contribution.
 */
export class Moment {
  getMoment(
    beam: BeamSnapshot,
    reactions: Reactions,
    x: number,
    tolerance: number = 0,
  ) {
    const fromSupports = beam.supports.reduce((res, support) => {
      if (support.x > x + tolerance) return res;
      return res + (reactions[support.name] ?? 0) * (x - support.x);
    }, 0);

    return beam.loads.reduce(
      (res, load) => res + load.momentContribution(x, tolerance),
      fromSupports,
    );
  }
}
