import type { Vector2 } from "@/types";

/**
 * Vec2 - Pure utility functions for 2D points and vectors
 * All functions are immutable and return new vectors
 */
export const Vec2 = {
  /**
   * Create a new vector
   */
  create(x: number, y: number): Vector2 {
    return { x, y };
  },

  /**
   * Subtract vector b from vector a
   */
  subtract(a: Vector2, b: Vector2): Vector2 {
    return { x: a.x - b.x, y: a.y - b.y };
  },

  /**
   * Calculate squared length of a vector
   */
  lengthSquared(v: Vector2): number {
    return v.x * v.x + v.y * v.y;
  },

  /**
   * Calculate length (magnitude) of a vector
   */
  length(v: Vector2): number {
    return Math.sqrt(Vec2.lengthSquared(v));
  },

  /**
   * Calculate distance between two points
   */
  distance(a: Vector2, b: Vector2): number {
    return Vec2.length(Vec2.subtract(b, a));
  },

  /**
   * Degrees to radians
   */
  toRadians(degrees: number): number {
    return (degrees * Math.PI) / 180;
  },

  /**
   * Project a vector of the given length from an origin.
   *
   * Frame angles are measured from the horizontal with the direction taken as
   * π − angle, so 0° points rearward (−x) and 90° points straight up.
   * Head and seat tubes therefore lean back from vertical as they rise.
   *
   * @param origin - Start point
   * @param length - Vector magnitude
   * @param angleDegrees - Frame angle in degrees
   * @returns The endpoint
   */
  vectorEndpoint(origin: Vector2, length: number, angleDegrees: number): Vector2 {
    const direction = Math.PI - Vec2.toRadians(angleDegrees);
    return {
      x: origin.x + length * Math.cos(direction),
      y: origin.y + length * Math.sin(direction),
    };
  },

  /**
   * Check whether every component is a finite number
   */
  isFinite(v: Vector2): boolean {
    return Number.isFinite(v.x) && Number.isFinite(v.y);
  },
};
