/**
 * Side-by-side comparison of already computed layouts.
 */

import type { FrameLayout } from "@/types";

export interface ComparisonRow {
  readonly label: string;
  readonly unit: "mm" | "deg";
  /** One value per layout, in input order */
  readonly values: readonly number[];
}

interface Measurement {
  readonly label: string;
  readonly unit: ComparisonRow["unit"];
  readonly read: (layout: FrameLayout) => number;
}

const MEASUREMENTS: readonly Measurement[] = [
  { label: "Wheelbase", unit: "mm", read: (l) => l.spec.wheelbase },
  { label: "Top tube length", unit: "mm", read: (l) => l.topTubeLength },
  { label: "Down tube length", unit: "mm", read: (l) => l.downTubeLength },
  { label: "Chainstay length", unit: "mm", read: (l) => l.spec.chainstayLength },
  { label: "Head tube angle", unit: "deg", read: (l) => l.spec.headTubeAngle },
  { label: "Seat tube angle", unit: "deg", read: (l) => l.spec.seatTubeAngle },
];

export function summarizeLayouts(layouts: readonly FrameLayout[]): ComparisonRow[] {
  return MEASUREMENTS.map(({ label, unit, read }) => ({
    label,
    unit,
    values: layouts.map(read),
  }));
}

/** Header label for a layout column */
export function layoutLabel(layout: FrameLayout): string {
  return `${layout.spec.name} ${layout.spec.frameSize}`;
}

/**
 * Render comparison rows as a fixed-width text table, two decimals per value.
 */
export function formatComparison(layouts: readonly FrameLayout[]): string[] {
  const rows = summarizeLayouts(layouts);
  const headers = layouts.map(layoutLabel);
  const cells = rows.map((row) => row.values.map((v) => v.toFixed(2)));

  const labelWidth = Math.max(0, ...rows.map((r) => `${r.label} (${r.unit})`.length));
  const columnWidths = headers.map((header, i) =>
    Math.max(header.length, ...cells.map((rowCells) => rowCells[i]?.length ?? 0))
  );

  const line = (label: string, values: readonly string[]): string =>
    [label.padEnd(labelWidth), ...values.map((v, i) => v.padStart(columnWidths[i] ?? 0))]
      .join("  ")
      .trimEnd();

  return [
    line("", headers),
    ...rows.map((row, r) => line(`${row.label} (${row.unit})`, cells[r] ?? [])),
  ];
}
