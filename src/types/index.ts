/**
 * Core type definitions for the frame geometry engine
 */

import type { DomainError } from "@/geometry/errors";

// =============================================================================
// MATH TYPES
// =============================================================================

/** 2D point / vector (immutable), millimeters */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/** Line segment defined by two endpoints */
export interface LineSegment {
  readonly start: Vector2;
  readonly end: Vector2;
}

/** Parallel-array form of a segment: [[x1, x2], [y1, y2]] */
export type SegmentArrays = readonly [
  readonly [number, number],
  readonly [number, number],
];

// =============================================================================
// INPUT TYPES
// =============================================================================

/** Frame dimensions. Lengths in millimeters, angles in degrees from horizontal. */
export interface BicycleSpec {
  readonly name: string;
  readonly frameSize: string;
  readonly bbDrop: number;
  readonly bbDiameter: number;
  readonly chainstayLength: number;
  readonly forkLength: number;
  readonly forkOffset: number;
  readonly headTubeAngle: number;
  readonly headTubeLength: number;
  readonly seatTubeAngle: number;
  readonly seatTubeLength: number;
  readonly wheelbase: number;
  readonly wheelDiameter: number;
  /** Stem rise relative to the perpendicular of the steerer */
  readonly stemAngle?: number;
  readonly stemLength?: number;
}

/** Rider fit dimensions, millimeters */
export interface RiderSpec {
  readonly saddleHeight: number;
  readonly saddleLength: number;
  readonly saddleSetBack: number;
}

/** Tunables that are not part of a frame's published geometry */
export interface EngineOptions {
  /** Steerer length above the head tube (spacers + stem clamp) */
  readonly steerTubeExtension: number;
  /** Handlebar clamp radius added to the stem length */
  readonly handlebarRadius: number;
  /** Denominators with a smaller magnitude are treated as zero */
  readonly tolerance: number;
}

// =============================================================================
// OUTPUT TYPES
// =============================================================================

export interface Wheel {
  readonly center: Vector2;
  readonly diameter: number;
}

/** Fully derived frame layout. Recomputed in full whenever inputs change. */
export interface FrameLayout {
  readonly spec: BicycleSpec;
  readonly rider: RiderSpec | null;

  readonly bottomBracket: Vector2;
  readonly rearHub: Vector2;
  readonly frontHub: Vector2;
  readonly wheels: {
    readonly front: Wheel;
    readonly rear: Wheel;
  };

  readonly headTube: LineSegment;
  readonly seatTube: LineSegment;
  readonly chainstay: LineSegment;
  readonly fork: LineSegment;
  readonly seatStay: LineSegment;
  readonly topTube: LineSegment;
  readonly downTube: LineSegment;
  readonly stem: LineSegment | null; // null without stem parameters
  readonly saddle: LineSegment | null; // null without a rider

  readonly topTubeLength: number;
  readonly downTubeLength: number;
}

/** Result form of a layout computation */
export type LayoutResult =
  | { readonly ok: true; readonly layout: FrameLayout }
  | { readonly ok: false; readonly error: DomainError };
