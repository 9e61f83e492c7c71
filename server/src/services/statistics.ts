import type { Column, ColumnKind, Table } from "../models/table";
import type {
  CategoricalStats,
  NumericStats,
  SummaryReport,
} from "../types/summary";

export const HISTOGRAM_BINS = 10;
export const TOP_CATEGORIES = 10;

export interface Histogram {
  edges: number[];
  counts: number[];
}

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}

function extent(values: number[]): [min: number, max: number] | null {
  if (values.length === 0) return null;
  let min = values[0];
  let max = values[0];
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return [min, max];
}

/**
 * Evenly spaced points from start to stop inclusive; the last point is
 * exactly `stop`.
 */
function linspace(start: number, stop: number, intervals: number): number[] {
  const step = (stop - start) / intervals;
  const points: number[] = [];
  for (let i = 0; i < intervals; i++) {
    points.push(start + i * step);
  }
  points.push(stop);
  return points;
}

/**
 * Equal-width histogram over [min, max].
 * Bin i holds values in [edges[i], edges[i + 1]); the last bin also holds max.
 * A constant column is binned over [value - 0.5, value + 0.5], an empty one over [0, 1].
 */
export function histogram(values: number[], bins = HISTOGRAM_BINS): Histogram {
  let first = 0;
  let last = 1;
  const range = extent(values);
  if (range !== null) {
    [first, last] = range;
    if (first === last) {
      first -= 0.5;
      last += 0.5;
    }
  }

  const edges = linspace(first, last, bins);
  const counts = new Array<number>(bins).fill(0);
  const norm = bins / (last - first);

  for (const value of values) {
    let index = Math.min(Math.floor((value - first) * norm), bins - 1);
    // floating point can put a value one bin off its edges
    if (value < edges[index]) {
      index -= 1;
    } else if (index !== bins - 1 && value >= edges[index + 1]) {
      index += 1;
    }
    counts[index] += 1;
  }

  return { edges, counts };
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

export function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[middle];
  return (sorted[middle - 1] + sorted[middle]) / 2;
}

/** Sample standard deviation (divides by n - 1) */
export function sampleStd(values: number[]): number | null {
  const avg = mean(values);
  if (avg === null || values.length < 2) return null;
  let squares = 0;
  for (const value of values) squares += (value - avg) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

export function summarizeNumeric(column: Array<number | null>): NumericStats {
  const values = column.filter(isPresent);
  const { edges, counts } = histogram(values);
  const range = extent(values);
  return {
    mean: mean(values),
    median: median(values),
    std: sampleStd(values),
    min: range ? range[0] : null,
    max: range ? range[1] : null,
    histogram_bins: edges,
    histogram_values: counts,
  };
}

/**
 * Frequency of each distinct value, most frequent first; equal counts keep
 * the order in which the values first appear.
 */
export function rankCategories(
  column: Array<string | null>
): Array<[label: string, count: number]> {
  const counts = new Map<string, number>();
  for (const value of column) {
    if (value === null) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  // Array#sort is stable, so Map insertion order breaks ties
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

export function summarizeCategorical(
  column: Array<string | null>,
  limit = TOP_CATEGORIES
): CategoricalStats {
  const ranked = rankCategories(column);
  const top = ranked.slice(0, limit);
  return {
    // integer-like labels are enumerated first by JS objects; `labels` keeps rank order
    value_counts: Object.fromEntries(top),
    unique_values: ranked.length,
    labels: top.map(([label]) => label),
    values: top.map(([, count]) => count),
  };
}

function countMissing(column: Column): number {
  let missing = 0;
  for (const value of column.values) {
    if (value === null) missing += 1;
  }
  return missing;
}

/**
 * Describe every column of a table.
 * A table without rows gets no numeric or categorical stats.
 */
export function computeSummary(table: Table): SummaryReport {
  const numeric = table.columns.filter((c) => c.kind === "numeric");
  const hasRows = table.rowCount > 0;

  const numericStats: Array<[string, NumericStats]> = [];
  const categoricalStats: Array<[string, CategoricalStats]> = [];
  if (hasRows) {
    for (const column of table.columns) {
      switch (column.kind) {
        case "numeric":
          numericStats.push([column.name, summarizeNumeric(column.values)]);
          break;
        case "categorical":
          categoricalStats.push([column.name, summarizeCategorical(column.values)]);
          break;
      }
    }
  }

  return {
    basic_info: {
      total_rows: table.rowCount,
      total_columns: table.columns.length,
      numeric_columns: numeric.length,
      categorical_columns: table.columns.length - numeric.length,
      columns: table.columns.map((c) => c.name),
    },
    column_types: Object.fromEntries(
      table.columns.map((c): [string, ColumnKind] => [c.name, c.kind])
    ),
    missing_values: Object.fromEntries(
      table.columns.map((c): [string, number] => [c.name, countMissing(c)])
    ),
    numeric_stats: Object.fromEntries(numericStats),
    categorical_stats: Object.fromEntries(categoricalStats),
  };
}
