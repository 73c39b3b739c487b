/**
 * Input validation - every numeric field must be a finite number before the
 * derivation chain runs, so that NaN or Infinity never reach a layout.
 */

import type { BicycleSpec, RiderSpec } from "@/types";
import { DomainError } from "./errors";

const REQUIRED_BICYCLE_FIELDS = [
  "bbDrop",
  "bbDiameter",
  "chainstayLength",
  "forkLength",
  "forkOffset",
  "headTubeAngle",
  "headTubeLength",
  "seatTubeAngle",
  "seatTubeLength",
  "wheelbase",
  "wheelDiameter",
] as const satisfies readonly (keyof BicycleSpec)[];

const OPTIONAL_BICYCLE_FIELDS = [
  "stemAngle",
  "stemLength",
] as const satisfies readonly (keyof BicycleSpec)[];

const RIDER_FIELDS = [
  "saddleHeight",
  "saddleLength",
  "saddleSetBack",
] as const satisfies readonly (keyof RiderSpec)[];

function assertFiniteField(value: unknown, field: string): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new DomainError(`Field "${field}" must be a finite number, got ${String(value)}`, field);
  }
}

/**
 * Validate a bicycle spec.
 *
 * @throws DomainError naming the first offending field
 */
export function validateBicycleSpec(spec: BicycleSpec): void {
  for (const field of REQUIRED_BICYCLE_FIELDS) {
    assertFiniteField(spec[field], field);
  }
  for (const field of OPTIONAL_BICYCLE_FIELDS) {
    const value = spec[field];
    if (value !== undefined) {
      assertFiniteField(value, field);
    }
  }
}

/**
 * Validate a rider spec.
 *
 * @throws DomainError naming the first offending field
 */
export function validateRiderSpec(rider: RiderSpec): void {
  for (const field of RIDER_FIELDS) {
    assertFiniteField(rider[field], `rider.${field}`);
  }
}
