import type { ColumnKind } from "../models/table";

/**
 * Summary report returned by GET /analyze.
 * Field names are part of the wire format consumed by dashboards.
 */

export interface BasicInfo {
  total_rows: number;
  total_columns: number;
  numeric_columns: number;
  categorical_columns: number;
  columns: string[];
}

/** null stands in for an undefined statistic (no values, or std of one value) */
export interface NumericStats {
  mean: number | null;
  median: number | null;
  std: number | null;
  min: number | null;
  max: number | null;
  histogram_bins: number[];
  histogram_values: number[];
}

export interface CategoricalStats {
  value_counts: Record<string, number>;
  unique_values: number;
  labels: string[];
  values: number[];
}

export interface SummaryReport {
  basic_info: BasicInfo;
  column_types: Record<string, ColumnKind>;
  missing_values: Record<string, number>;
  numeric_stats: Record<string, NumericStats>;
  categorical_stats: Record<string, CategoricalStats>;
}
