import type { FrameLayout } from "@/types";

/** Receives one output line at a time */
export type LineSink = (line: string) => void;

/** Caller-assigned presentation of one layout */
export interface RenderStyle {
  readonly color: string | null;
}

/**
 * A consumer of computed layouts. Renderers get the output surface passed in
 * explicitly and never hold on to it.
 */
export interface LayoutRenderer<TSurface> {
  render(layout: FrameLayout, surface: TSurface, style?: RenderStyle): void;
}

const fixed2 = (value: number): string => value.toFixed(2);

/**
 * SpecPrinter - plain text report of a bike's dimensions and derived lengths
 */
export class SpecPrinter implements LayoutRenderer<LineSink> {
  render(layout: FrameLayout, sink: LineSink, style: RenderStyle = { color: null }): void {
    const { spec, rider } = layout;

    sink("Info:");
    sink(`\tname:\t${spec.name}`);
    sink(`\tsize:\t${spec.frameSize}`);
    if (style.color !== null) {
      sink(`\tcolor:\t${style.color}`);
    }

    sink("Wheel");
    sink(`\tdiameter:\t${fixed2(spec.wheelDiameter)}`);

    sink("Bottom Bracket");
    sink(`\tbb diameter:\t${fixed2(spec.bbDiameter)}`);
    sink(`\tbb drop:\t${fixed2(spec.bbDrop)}`);

    sink("Chainstay");
    sink(`\tlength:\t${fixed2(spec.chainstayLength)}`);

    sink("Fork");
    sink(`\tlength:\t${fixed2(spec.forkLength)}`);
    sink(`\toffset:\t${fixed2(spec.forkOffset)}`);

    sink("Head Tube");
    sink(`\tangle:\t${fixed2(spec.headTubeAngle)}`);
    sink(`\tlength:\t${fixed2(spec.headTubeLength)}`);

    sink("Seat Tube");
    sink(`\tangle:\t${fixed2(spec.seatTubeAngle)}`);
    sink(`\tlength:\t${fixed2(spec.seatTubeLength)}`);

    sink("Top Tube:");
    sink(`\tlength:\t${fixed2(layout.topTubeLength)}`);
    sink("Down Tube:");
    sink(`\tlength:\t${fixed2(layout.downTubeLength)}`);

    if (spec.stemAngle !== undefined && spec.stemLength !== undefined) {
      sink("Stem");
      sink(`\tangle:\t${fixed2(spec.stemAngle)}`);
      sink(`\tlength:\t${fixed2(spec.stemLength)}`);
    }

    if (rider) {
      sink("Saddle");
      sink(`\theight:\t${fixed2(rider.saddleHeight)}`);
      sink(`\tlength:\t${fixed2(rider.saddleLength)}`);
      sink(`\tset back:\t${fixed2(rider.saddleSetBack)}`);
    }
  }
}
