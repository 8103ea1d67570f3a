/**
 * @file types - Shared types for the plot data converters
 */

// ====== CSV ======

/** Parsed CSV file: header names and the raw cell text of every data row */
export interface CsvTable {
  header: string[];
  rows: CsvRow[];
}

export interface CsvRow {
  /** 1-based line number in the source file, for diagnostics */
  line: number;
  cells: string[];
}

/** Numeric output table; `null` cells are written empty */
export interface NumericTable {
  columns: string[];
  rows: Array<Array<number | null>>;
}

// ====== Thrust map ======

export interface ThrustSample {
  line: number;
  time_s: number;
  throttle_pct: number | null;
  rpm: number | null;
  thrust_N: number;
  voltage_V: number | null;
  current_A: number | null;
  power_W: number | null;
}

export interface ThrustMapOptions {
  /** Average rows sharing an independent value and sort ascending */
  aggregate: boolean;
  aliases?: ColumnAliasOverrides;
}

export interface ThrustMapResult {
  throttle: NumericTable;
  rpm: NumericTable;
  clean: NumericTable;
  hasPower: boolean;
  acceptedRows: number;
  rejectedRows: number;
}

// ====== Efficiency ======

export interface FlightSample {
  line: number;
  time_s: number;
  speed_mps: number;
  power_W: number;
  thrust_sum_N: number | null;
}

export interface EfficiencyOptions {
  /** Equal-width speed bins; per-unique-value buckets when undefined */
  bins?: number;
  aliases?: ColumnAliasOverrides;
}

export interface EfficiencyResult {
  table: NumericTable;
  acceptedRows: number;
  rejectedRows: number;
  skippedIntervals: number;
  skippedBuckets: number;
}

// ====== Lookup grid ======

export interface LookupGrid {
  size: number;
  voltages: number[];
  forces: number[];
  /** cmd values, rows indexed by voltage, columns by force */
  cmd: number[][];
}

export interface LookupOptions {
  /** Voltage of the 1-D slice; middle row when undefined */
  voltage?: number;
  minCmd?: number;
  maxCmd?: number;
}

export interface LookupResult {
  long: NumericTable;
  curve: NumericTable;
  sliceVoltage: number;
}

// ====== Columns & configuration ======

export type CanonicalColumn =
  | 'time_s'
  | 'throttle_pct'
  | 'rpm'
  | 'thrust_N'
  | 'voltage_V'
  | 'current_A'
  | 'power_W'
  | 'speed_mps'
  | 'thrust_sum_N';

export type ColumnAliasOverrides = Partial<Record<CanonicalColumn, string[]>>;

/** A file written by a converter run */
export interface WrittenFile {
  path: string;
  rows: number;
}
