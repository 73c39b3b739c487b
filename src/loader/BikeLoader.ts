/**
 * BikeLoader - reads bike documents from JSON and turns them into specs
 *
 * Document shape:
 *   {
 *     "bicycle": { "name": ..., "size": ..., "bb_drop": ..., ... },
 *     "rider": { "saddle_height": ..., "saddle_length": ..., "saddle_set_back": ... }
 *   }
 *
 * A document that cannot be read or validated falls back to DEFAULT_BICYCLE
 * instead of aborting the whole run.
 */

import * as fs from "fs";
import { z } from "zod";
import { DEFAULT_BICYCLE, DEFAULT_WHEEL_DIAMETER } from "@/config/engineConfig";
import { DomainError, MissingFieldError } from "@/geometry/errors";
import type { BicycleSpec, RiderSpec } from "@/types";

const dimension = z.number().finite();

export const BicycleDocumentSchema = z.object({
  name: z.string(),
  size: z.string(),
  bb_drop: dimension,
  bb_diameter: dimension,
  chainstay_length: dimension,
  color_str: z.string().optional(),
  fork_length: dimension,
  fork_offset: dimension,
  head_tube_angle: dimension,
  head_tube_length: dimension,
  seat_tube_angle: dimension,
  seat_tube_length: dimension,
  wheelbase: dimension,
  wheel_diameter: dimension.default(DEFAULT_WHEEL_DIAMETER),
  stem_angle: dimension.optional(),
  stem_length: dimension.optional(),
});

export const RiderDocumentSchema = z.object({
  saddle_height: dimension,
  saddle_length: dimension,
  saddle_set_back: dimension,
});

export const BikeDocumentSchema = z.object({
  bicycle: BicycleDocumentSchema,
  rider: RiderDocumentSchema.optional(),
});

export type BikeDocument = z.infer<typeof BikeDocumentSchema>;

export interface LoadedBike {
  readonly spec: BicycleSpec;
  readonly rider: RiderSpec | null;
  /** Display colour requested by the document, if any */
  readonly color: string | null;
  /** True when DEFAULT_BICYCLE was substituted */
  readonly fallback: boolean;
}

/**
 * Convert a zod failure into the engine's error taxonomy. A missing key
 * becomes MissingFieldError, anything else DomainError.
 */
function toDomainError(error: z.ZodError): DomainError {
  const issue = error.issues[0];
  if (!issue) {
    return new DomainError("Invalid bike document");
  }
  const field = issue.path.join(".");
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined) {
    return new MissingFieldError(field);
  }
  return new DomainError(`Invalid value for "${field}": ${issue.message}`, field);
}

function toBicycleSpec(doc: BikeDocument["bicycle"]): BicycleSpec {
  return {
    name: doc.name,
    frameSize: doc.size,
    bbDrop: doc.bb_drop,
    bbDiameter: doc.bb_diameter,
    chainstayLength: doc.chainstay_length,
    forkLength: doc.fork_length,
    forkOffset: doc.fork_offset,
    headTubeAngle: doc.head_tube_angle,
    headTubeLength: doc.head_tube_length,
    seatTubeAngle: doc.seat_tube_angle,
    seatTubeLength: doc.seat_tube_length,
    wheelbase: doc.wheelbase,
    wheelDiameter: doc.wheel_diameter,
    ...(doc.stem_angle !== undefined && { stemAngle: doc.stem_angle }),
    ...(doc.stem_length !== undefined && { stemLength: doc.stem_length }),
  };
}

function toRiderSpec(doc: NonNullable<BikeDocument["rider"]>): RiderSpec {
  return {
    saddleHeight: doc.saddle_height,
    saddleLength: doc.saddle_length,
    saddleSetBack: doc.saddle_set_back,
  };
}

/**
 * Validate an already parsed JSON value.
 *
 * @throws MissingFieldError when a required key is absent
 * @throws DomainError when a value has the wrong type
 */
export function parseBicycleDocument(data: unknown): Omit<LoadedBike, "fallback"> {
  const result = BikeDocumentSchema.safeParse(data);
  if (!result.success) {
    throw toDomainError(result.error);
  }
  const doc = result.data;
  return {
    spec: toBicycleSpec(doc.bicycle),
    rider: doc.rider ? toRiderSpec(doc.rider) : null,
    color: doc.bicycle.color_str ?? null,
  };
}

/** Parse JSON text, then validate it */
export function parseBicycleJson(text: string): Omit<LoadedBike, "fallback"> {
  return parseBicycleDocument(JSON.parse(text));
}

/**
 * Load a bike document from disk. Any read, parse or validation failure is
 * logged and replaced by DEFAULT_BICYCLE.
 */
export function loadBicycle(filePath: string): LoadedBike {
  try {
    return { ...parseBicycleJson(fs.readFileSync(filePath, "utf-8")), fallback: false };
  } catch (error) {
    const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    console.warn(`[BikeLoader] ${filePath}: ${reason}; using ${DEFAULT_BICYCLE.name} bike`);
    return { spec: DEFAULT_BICYCLE, rider: null, color: null, fallback: true };
  }
}
