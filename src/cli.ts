#!/usr/bin/env npx tsx
/**
 * CLI Entry Point: Compare Bike Geometries
 *
 * Usage:
 *   npm run compare -- --json bikes/road.json --json bikes/gravel.json
 *
 * Options:
 *   -j, --json <file>   Bike document to compare; repeat for several bikes.
 *                       Without any, the built-in example bike is shown.
 */

import { parseJsonArgs, runCompare } from "@/report/compare";

try {
  const files = parseJsonArgs(process.argv.slice(2));
  runCompare(files, (line) => console.log(line));
} catch (error) {
  console.error("[compare]", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
