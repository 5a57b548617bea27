import type { DistributedLoad, PointLoad, PointMoment } from "./load";
import type { Support } from "./support";

export type NodeEvent =
  | { kind: "boundary"; side: "start" | "end" }
  | { kind: "support"; support: Support }
  | { kind: "pointLoad"; load: PointLoad }
  | { kind: "pointMoment"; load: PointMoment }
  | { kind: "loadStart"; load: DistributedLoad }
  | { kind: "loadEnd"; load: DistributedLoad }
  | { kind: "probe" };

export type NodeEventKind = NodeEvent["kind"];

/**
 * Breakpoint along the beam: a coordinate where shear or moment may jump,
 * or where a distributed load starts or stops.
 */
export class Node {
  id: string;
  x: number;
  events: NodeEvent[] = [];

  constructor(id: string, x: number) {
    this.id = id;
    this.x = x;
  }

  addEvent(event: NodeEvent) {
    this.events.push(event);
  }

  get supports(): Support[] {
    return this.events.flatMap((e) => (e.kind === "support" ? [e.support] : []));
  }

  get concentratedLoads(): (PointLoad | PointMoment)[] {
    return this.events.flatMap((e) =>
      e.kind === "pointLoad" || e.kind === "pointMoment" ? [e.load] : [],
    );
  }

  /** True when V or M is discontinuous here. */
  get hasJump(): boolean {
    return this.events.some(
      (e) =>
        e.kind === "support" ||
        e.kind === "pointLoad" ||
        e.kind === "pointMoment",
    );
  }

  get eventKinds(): NodeEventKind[] {
    return [...new Set(this.events.map((e) => e.kind))];
  }
}
