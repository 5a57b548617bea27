import type { Load } from "../../../elements/load";
import type { Support } from "../../../elements/support";
import type { Reactions } from "../../types";

/**
 * Reactions of a two-support beam from vertical and rotational equilibrium.
 * Moments are taken about the left support, so couples enter through
 * `momentAbout` with their own sign.
 */
export function solveDeterminateReactions(
  left: Support,
  right: Support,
  loads: readonly Load[],
): Reactions {
  const arm = right.x - left.x;
  const totalForce = loads.reduce((acc, load) => acc + load.totalLoad(), 0);
  const totalMoment = loads.reduce(
    (acc, load) => acc + load.momentAbout(left.x),
    0,
  );

  const rightReaction = totalMoment / arm;
  return {
    [left.name]: totalForce - rightReaction,
    [right.name]: rightReaction,
  };
}
