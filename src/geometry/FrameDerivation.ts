/**
 * FrameDerivation - one pure function per derived anchor point or tube
 *
 * Coordinate frame: x forward, y up, ground at y = 0. Wheels rest on the
 * ground so both hubs sit at y = wheelDiameter / 2 and the bottom bracket is
 * bbDrop below that line at x = 0.
 *
 * Derivation order (each step only reads earlier results):
 *   bottom bracket → rear hub → front hub → head tube → seat tube
 *   → straight tubes, stem, saddle → tube lengths
 */

import { Segment } from "@/math/Segment";
import { Vec2 } from "@/math/Vec2";
import type { BicycleSpec, EngineOptions, LineSegment, RiderSpec, Vector2 } from "@/types";
import { DomainError } from "./errors";

/** Height of both hubs above the ground */
export function hubHeight(spec: BicycleSpec): number {
  return spec.wheelDiameter / 2;
}

export function bottomBracketPoint(spec: BicycleSpec): Vector2 {
  return Vec2.create(0, hubHeight(spec) - spec.bbDrop);
}

/**
 * Rear hub from the chainstay and bottom bracket drop (right triangle with
 * the chainstay as hypotenuse).
 *
 * @throws DomainError if the chainstay is shorter than the drop
 */
export function rearHubPoint(spec: BicycleSpec): Vector2 {
  const radicand = spec.chainstayLength * spec.chainstayLength - spec.bbDrop * spec.bbDrop;
  // a negative drop can still leave the radicand negative
  if (spec.chainstayLength < spec.bbDrop || radicand < 0) {
    throw new DomainError(
      `chainstay too short for bottom-bracket drop (chainstay ${spec.chainstayLength}, drop ${spec.bbDrop})`,
      "chainstayLength"
    );
  }
  const run = Math.sqrt(radicand);
  // run === 0 would otherwise give -0
  return Vec2.create(run === 0 ? 0 : -run, hubHeight(spec));
}

export function frontHubPoint(spec: BicycleSpec, rearHub: Vector2): Vector2 {
  return Vec2.create(rearHub.x + spec.wheelbase, rearHub.y);
}

/**
 * Horizontal distance between the front hub and the point where the steering
 * axis crosses the hub line.
 *
 * @throws DomainError when the head angle makes the projection singular
 */
export function headTubeAxisOffset(spec: BicycleSpec, tolerance: number): number {
  const divisor = Math.cos(Vec2.toRadians(90 - spec.headTubeAngle));
  if (Math.abs(divisor) <= tolerance) {
    throw new DomainError(
      `head tube angle ${spec.headTubeAngle}° has no intersection with the hub line`,
      "headTubeAngle"
    );
  }
  return spec.forkOffset / divisor;
}

/**
 * Head tube from the steering axis: fork length up the axis from the hub
 * line gives the bottom, head tube length further up gives the top.
 */
export function headTubeSegment(
  spec: BicycleSpec,
  frontHub: Vector2,
  tolerance: number
): LineSegment {
  const axisOrigin = Vec2.create(frontHub.x - headTubeAxisOffset(spec, tolerance), frontHub.y);
  const bottom = Vec2.vectorEndpoint(axisOrigin, spec.forkLength, spec.headTubeAngle);
  return Segment.fromAngle(bottom, spec.headTubeLength, spec.headTubeAngle);
}

export function seatTubeSegment(spec: BicycleSpec, bottomBracket: Vector2): LineSegment {
  return Segment.fromAngle(bottomBracket, spec.seatTubeLength, spec.seatTubeAngle);
}

/**
 * Tubes that join two already-derived points
 */
export interface StraightTubes {
  readonly chainstay: LineSegment;
  readonly seatStay: LineSegment;
  readonly fork: LineSegment;
  readonly topTube: LineSegment;
  readonly downTube: LineSegment;
}

export function straightTubes(
  bottomBracket: Vector2,
  rearHub: Vector2,
  frontHub: Vector2,
  headTube: LineSegment,
  seatTube: LineSegment
): StraightTubes {
  return {
    chainstay: Segment.create(bottomBracket, rearHub),
    seatStay: Segment.create(seatTube.end, rearHub),
    fork: Segment.create(frontHub, headTube.start),
    topTube: Segment.create(headTube.end, seatTube.end),
    downTube: Segment.create(headTube.start, bottomBracket),
  };
}

/**
 * Stem from the steerer top to the handlebar centre. Null unless both stem
 * parameters are present.
 */
export function stemSegment(
  spec: BicycleSpec,
  headTube: LineSegment,
  options: EngineOptions
): LineSegment | null {
  if (spec.stemAngle === undefined || spec.stemLength === undefined) {
    return null;
  }
  const steerTop = Vec2.vectorEndpoint(headTube.end, options.steerTubeExtension, spec.headTubeAngle);
  return Segment.fromAngle(
    steerTop,
    spec.stemLength + options.handlebarRadius,
    spec.headTubeAngle - spec.stemAngle + 90
  );
}

/**
 * Saddle rails, centred on the saddle height point along the seat tube axis
 * and shifted back by the set back. Null without a rider.
 */
export function saddleSegment(
  spec: BicycleSpec,
  rider: RiderSpec | null,
  bottomBracket: Vector2
): LineSegment | null {
  if (rider === null) {
    return null;
  }
  const top = Vec2.vectorEndpoint(bottomBracket, rider.saddleHeight, spec.seatTubeAngle);
  const halfLength = rider.saddleLength / 2;
  return Segment.create(
    Vec2.create(top.x + halfLength - rider.saddleSetBack, top.y),
    Vec2.create(top.x - halfLength - rider.saddleSetBack, top.y)
  );
}
