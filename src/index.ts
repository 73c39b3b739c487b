/**
 * Frame geometry engine - public API
 *
 * computeLayout() is the entry point; everything else is value types,
 * primitives and consumers of a computed FrameLayout.
 */

export type {
  BicycleSpec,
  EngineOptions,
  FrameLayout,
  LayoutResult,
  LineSegment,
  RiderSpec,
  SegmentArrays,
  Vector2,
  Wheel,
} from "./types";
export { Vec2 } from "./math/Vec2";
export { Segment } from "./math/Segment";
export { DomainError, MissingFieldError } from "./geometry/errors";
export { computeLayout, tryComputeLayout, layoutPoints, layoutSegments } from "./geometry/LayoutEngine";
export { summarizeLayouts, formatComparison, layoutLabel } from "./geometry/summary";
export type { ComparisonRow } from "./geometry/summary";
export { DEFAULT_BICYCLE, DEFAULT_ENGINE_OPTIONS, createEngineOptions } from "./config/engineConfig";
export { loadBicycle, parseBicycleDocument, parseBicycleJson, BikeDocumentSchema } from "./loader/BikeLoader";
export type { BikeDocument, LoadedBike } from "./loader/BikeLoader";
export { SpecPrinter } from "./report/SpecPrinter";
export type { LayoutRenderer, LineSink, RenderStyle } from "./report/SpecPrinter";
