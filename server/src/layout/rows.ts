import type { NormalizedLine, Row } from './types.js';

/** Median height assumed when a page has no lines (about one line of 10pt text). */
export const DEFAULT_LINE_HEIGHT = 0.012;
export const MIN_ROW_TOLERANCE = 0.003;
export const ROW_TOLERANCE_FACTOR = 0.5;
export const ROW_SEPARATOR = ' · ';

export function median(values: readonly number[], fallback: number): number {
  const finite = values.filter((v) => Number.isFinite(v));
  if (finite.length === 0) return fallback;
  const sorted = [...finite].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Vertical distance within which a line joins the open row. Median rather than
 * mean, so oversized headings and rules do not widen it.
 */
export function rowTolerance(lines: readonly NormalizedLine[]): number {
  const medianHeight = median(lines.map((line) => line.height), DEFAULT_LINE_HEIGHT);
  return Math.max(MIN_ROW_TOLERANCE, medianHeight * ROW_TOLERANCE_FACTOR);
}

function closeRow(members: NormalizedLine[]): Row {
  const ordered = [...members].sort((a, b) => a.left - b.left);
  const top = Math.min(...ordered.map((line) => line.top));
  const bottom = Math.max(...ordered.map((line) => line.bottom));
  return {
    text: ordered.map((line) => line.text).join(ROW_SEPARATOR),
    left: Math.min(...ordered.map((line) => line.left)),
    top,
    bottom,
    height: bottom - top,
    centerY: (top + bottom) / 2,
  };
}

/**
 * Merges the lines of one page into rows. A line joins the open cluster when its
 * centre is within tolerance of the cluster's running mean centre; the mean is
 * recomputed after every join so the band follows the row as it grows.
 */
export function assembleRows(pageLines: readonly NormalizedLine[]): Row[] {
  if (pageLines.length === 0) return [];

  const lines = [...pageLines].sort((a, b) => a.centerY - b.centerY);
  const tolerance = rowTolerance(lines);

  const rows: Row[] = [];
  let members: NormalizedLine[] = [];
  let centerSum = 0;

  for (const line of lines) {
    if (members.length === 0) {
      members = [line];
      centerSum = line.centerY;
      continue;
    }

    const runningCenter = centerSum / members.length;
    if (Math.abs(line.centerY - runningCenter) <= tolerance) {
      members.push(line);
      centerSum += line.centerY;
    } else {
      rows.push(closeRow(members));
      members = [line];
      centerSum = line.centerY;
    }
  }
  if (members.length > 0) rows.push(closeRow(members));

  return rows.sort((a, b) => a.centerY - b.centerY || a.left - b.left);
}
