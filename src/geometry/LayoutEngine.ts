/**
 * LayoutEngine - the public entry point of the geometry engine
 *
 * Turns a bicycle spec (and optional rider) into a frozen FrameLayout. Pure
 * and synchronous: no shared state, no caching, no I/O. Layouts for several
 * bikes are independent of each other.
 */

import { createEngineOptions } from "@/config/engineConfig";
import { Segment } from "@/math/Segment";
import { Vec2 } from "@/math/Vec2";
import type {
  BicycleSpec,
  EngineOptions,
  FrameLayout,
  LayoutResult,
  LineSegment,
  RiderSpec,
  Vector2,
} from "@/types";
import { DomainError } from "./errors";
import {
  bottomBracketPoint,
  frontHubPoint,
  headTubeSegment,
  rearHubPoint,
  saddleSegment,
  seatTubeSegment,
  stemSegment,
  straightTubes,
} from "./FrameDerivation";
import { validateBicycleSpec, validateRiderSpec } from "./validation";

/**
 * Compute the full layout of a frame.
 *
 * @param spec Frame dimensions
 * @param rider Rider dimensions, or null for a frame-only layout
 * @param options Overrides for the engine defaults
 * @throws DomainError for non-finite inputs or geometrically impossible dimensions
 */
export function computeLayout(
  spec: BicycleSpec,
  rider: RiderSpec | null = null,
  options: Partial<EngineOptions> = {}
): FrameLayout {
  const opts = createEngineOptions(options);

  validateBicycleSpec(spec);
  if (rider !== null) {
    validateRiderSpec(rider);
  }

  const bottomBracket = bottomBracketPoint(spec);
  const rearHub = rearHubPoint(spec);
  const frontHub = frontHubPoint(spec, rearHub);
  const headTube = headTubeSegment(spec, frontHub, opts.tolerance);
  const seatTube = seatTubeSegment(spec, bottomBracket);
  const tubes = straightTubes(bottomBracket, rearHub, frontHub, headTube, seatTube);

  // Copies, so freezing the layout leaves the caller's objects alone
  const layout: FrameLayout = {
    spec: { ...spec },
    rider: rider === null ? null : { ...rider },
    bottomBracket,
    rearHub,
    frontHub,
    wheels: {
      front: { center: frontHub, diameter: spec.wheelDiameter },
      rear: { center: rearHub, diameter: spec.wheelDiameter },
    },
    headTube,
    seatTube,
    ...tubes,
    stem: stemSegment(spec, headTube, opts),
    saddle: saddleSegment(spec, rider, bottomBracket),
    topTubeLength: Segment.length(tubes.topTube),
    downTubeLength: Segment.length(tubes.downTube),
  };

  assertFiniteLayout(layout);
  return deepFreeze(layout);
}

/**
 * Same as computeLayout, with domain errors returned as a value.
 * Any other error is rethrown.
 */
export function tryComputeLayout(
  spec: BicycleSpec,
  rider: RiderSpec | null = null,
  options: Partial<EngineOptions> = {}
): LayoutResult {
  try {
    return { ok: true, layout: computeLayout(spec, rider, options) };
  } catch (error) {
    if (error instanceof DomainError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Named points and segments of a layout, in drawing order.
 * Optional elements that are absent are skipped.
 */
export function layoutPoints(layout: FrameLayout): [string, Vector2][] {
  return [
    ["bottomBracket", layout.bottomBracket],
    ["rearHub", layout.rearHub],
    ["frontHub", layout.frontHub],
  ];
}

export function layoutSegments(layout: FrameLayout): [string, LineSegment][] {
  const segments: [string, LineSegment][] = [
    ["chainstay", layout.chainstay],
    ["fork", layout.fork],
    ["headTube", layout.headTube],
    ["seatStay", layout.seatStay],
    ["seatTube", layout.seatTube],
    ["topTube", layout.topTube],
    ["downTube", layout.downTube],
  ];
  if (layout.stem) segments.push(["stem", layout.stem]);
  if (layout.saddle) segments.push(["saddle", layout.saddle]);
  return segments;
}

function assertFiniteLayout(layout: FrameLayout): void {
  for (const [name, point] of layoutPoints(layout)) {
    if (!Vec2.isFinite(point)) {
      throw new DomainError(`Derived point "${name}" is not finite`);
    }
  }
  for (const [name, segment] of layoutSegments(layout)) {
    if (!Segment.isFinite(segment)) {
      throw new DomainError(`Derived segment "${name}" is not finite`);
    }
  }
  if (!Number.isFinite(layout.topTubeLength) || !Number.isFinite(layout.downTubeLength)) {
    throw new DomainError("Derived tube lengths are not finite");
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
