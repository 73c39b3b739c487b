/**
 * Compare run: load every requested bike, print its report, then print the
 * comparison table for the bikes whose layouts could be computed.
 */

import { DEFAULT_BICYCLE } from "@/config/engineConfig";
import { tryComputeLayout } from "@/geometry/LayoutEngine";
import { formatComparison } from "@/geometry/summary";
import { loadBicycle, type LoadedBike } from "@/loader/BikeLoader";
import type { FrameLayout } from "@/types";
import { SpecPrinter, type LineSink } from "./SpecPrinter";

/**
 * Collect the values of every -j / --json flag
 */
export function parseJsonArgs(args: readonly string[]): string[] {
  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-j" || arg === "--json") {
      const value = args[i + 1];
      if (value === undefined) {
        throw new Error(`${arg} expects a file path`);
      }
      files.push(value);
      i++;
    } else if (arg?.startsWith("--json=")) {
      files.push(arg.slice("--json=".length));
    }
  }
  return files;
}

/**
 * @param files Bike documents to compare; the default bike when empty
 * @param sink Output lines
 * @param load Document loader
 * @returns The layouts that were printed
 */
export function runCompare(
  files: readonly string[],
  sink: LineSink,
  load: (path: string) => LoadedBike = loadBicycle
): FrameLayout[] {
  const bikes: LoadedBike[] =
    files.length > 0
      ? files.map(load)
      : [{ spec: DEFAULT_BICYCLE, rider: null, color: null, fallback: true }];

  const printer = new SpecPrinter();
  const layouts: FrameLayout[] = [];

  for (const bike of bikes) {
    const result = tryComputeLayout(bike.spec, bike.rider);
    if (!result.ok) {
      console.warn(`[compare] ${bike.spec.name}: ${result.error.message}`);
      continue;
    }
    printer.render(result.layout, sink, { color: bike.color });
    layouts.push(result.layout);
  }

  if (layouts.length > 0) {
    sink("");
    for (const line of formatComparison(layouts)) {
      sink(line);
    }
  }

  return layouts;
}
