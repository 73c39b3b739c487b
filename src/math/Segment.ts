import type { LineSegment, SegmentArrays, Vector2 } from "@/types";
import { Vec2 } from "./Vec2";

/**
 * Segment - Pure utility functions for frame tube segments
 */
export const Segment = {
  /**
   * Create a line segment from two points
   */
  create(start: Vector2, end: Vector2): LineSegment {
    return { start, end };
  },

  /**
   * Create a segment from a start point, a length and a frame angle
   */
  fromAngle(start: Vector2, length: number, angleDegrees: number): LineSegment {
    return { start, end: Vec2.vectorEndpoint(start, length, angleDegrees) };
  },

  /**
   * Get length of segment
   */
  length(segment: LineSegment): number {
    return Vec2.distance(segment.start, segment.end);
  },

  /**
   * Parallel-array view: [[startX, endX], [startY, endY]]
   */
  toArrays(segment: LineSegment): SegmentArrays {
    return [
      [segment.start.x, segment.end.x],
      [segment.start.y, segment.end.y],
    ];
  },

  /**
   * Check whether both endpoints are finite
   */
  isFinite(segment: LineSegment): boolean {
    return Vec2.isFinite(segment.start) && Vec2.isFinite(segment.end);
  },
};
