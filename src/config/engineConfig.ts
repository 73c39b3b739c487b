import type { BicycleSpec, EngineOptions } from "@/types";

/**
 * Default engine options
 */
export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  steerTubeExtension: 40,
  /** 31.8 mm oversize clamp */
  handlebarRadius: 15.9,
  tolerance: 1e-12,
};

/**
 * Fallback bike used when no file is given or a file cannot be loaded.
 * A large aluminium road frame on 700c wheels.
 */
export const DEFAULT_BICYCLE: BicycleSpec = Object.freeze({
  name: "Example",
  frameSize: "Large",
  bbDrop: 75,
  bbDiameter: 34.8,
  chainstayLength: 450,
  forkLength: 405,
  forkOffset: 50,
  headTubeAngle: 71.5,
  headTubeLength: 205,
  seatTubeAngle: 72.5,
  seatTubeLength: 560,
  wheelbase: 1072.6,
  wheelDiameter: 700,
});

/** Wheel diameter assumed when a bike document omits it */
export const DEFAULT_WHEEL_DIAMETER = 700;

/**
 * Merge caller overrides onto the default engine options
 */
export function createEngineOptions(options: Partial<EngineOptions> = {}): EngineOptions {
  return { ...DEFAULT_ENGINE_OPTIONS, ...options };
}
