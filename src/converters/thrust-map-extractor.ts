/**
 * @file thrust-map-extractor.ts - Thrust map extraction
 * @description Turns a motor test-stand log into throttle→thrust and rpm→thrust tables,
 * plus a cleaned copy of the accepted samples. Power is appended when the log records
 * both voltage and current.
 * @depends types, columns, errors, result, csv-service, logger, path
 */

import * as path from 'path';
import type {
  CsvRow,
  CsvTable,
  NumericTable,
  ThrustMapOptions,
  ThrustMapResult,
  ThrustSample,
  WrittenFile,
} from '../types';
import { ColumnLayout } from '../core/columns';
import { MalformedInputError, NoValidRowsError, RowValidationError } from '../core/errors';
import { err, ok, partition, type Result } from '../../shared/utils';
import { readCsvFile, writeCsvFile } from '../services/csv-service';
import { Logger } from '../utils/logger';

const THRUST_COLUMNS = ['time_s', 'throttle_pct', 'rpm', 'thrust_N', 'voltage_V', 'current_A'] as const;
const REQUIRED_COLUMNS = ['time_s', 'throttle_pct', 'rpm', 'thrust_N'] as const;

type ThrustColumn = (typeof THRUST_COLUMNS)[number];
type IndependentColumn = 'throttle_pct' | 'rpm';

interface CurvePoint {
  x: number;
  thrust: number;
  power: number | null;
}

export interface ThrustMapRunOptions extends ThrustMapOptions {
  input: string;
  name: string;
  outdir: string;
}

/**
 * Validate one row. A sample needs time and thrust, and at least one of throttle or rpm;
 * the missing one only keeps it out of that table.
 */
export function readThrustSample(
  row: CsvRow,
  layout: ColumnLayout<ThrustColumn>,
  hasPower: boolean
): Result<ThrustSample, RowValidationError> {
  const time = layout.read(row, 'time_s');
  const thrust = layout.read(row, 'thrust_N');
  const throttle = layout.read(row, 'throttle_pct');
  const rpm = layout.read(row, 'rpm');

  const invalid: string[] = [];
  if (time === null) invalid.push('time_s');
  if (thrust === null) invalid.push('thrust_N');
  if (throttle === null && rpm === null) invalid.push('throttle_pct', 'rpm');
  if (time === null || thrust === null || invalid.length > 0) {
    return err(new RowValidationError(row.line, invalid));
  }

  const voltage = hasPower ? layout.read(row, 'voltage_V') : null;
  const current = hasPower ? layout.read(row, 'current_A') : null;

  return ok({
    line: row.line,
    time_s: time,
    throttle_pct: throttle,
    rpm,
    thrust_N: thrust,
    voltage_V: voltage,
    current_A: current,
    power_W: voltage !== null && current !== null ? voltage * current : null,
  });
}

/** Average thrust (and power, over the rows that have it) per independent value, ascending */
function aggregateCurve(points: CurvePoint[]): CurvePoint[] {
  const groups = new Map<number, { thrust: number; count: number; power: number; powered: number }>();
  for (const point of points) {
    const group = groups.get(point.x) ?? { thrust: 0, count: 0, power: 0, powered: 0 };
    group.thrust += point.thrust;
    group.count++;
    if (point.power !== null) {
      group.power += point.power;
      group.powered++;
    }
    groups.set(point.x, group);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([x, group]) => ({
      x,
      thrust: group.thrust / group.count,
      power: group.powered > 0 ? group.power / group.powered : null,
    }));
}

function buildCurve(
  samples: ThrustSample[],
  column: IndependentColumn,
  hasPower: boolean,
  aggregate: boolean
): NumericTable {
  const points = samples.flatMap((sample): CurvePoint[] => {
    const x = sample[column];
    return x === null ? [] : [{ x, thrust: sample.thrust_N, power: sample.power_W }];
  });
  const curve = aggregate ? aggregateCurve(points) : points;

  return {
    columns: hasPower ? [column, 'thrust_N', 'power_W'] : [column, 'thrust_N'],
    rows: curve.map((p) => (hasPower ? [p.x, p.thrust, p.power] : [p.x, p.thrust])),
  };
}

function buildCleanTable(samples: ThrustSample[], hasPower: boolean): NumericTable {
  const base = ['time_s', 'throttle_pct', 'rpm', 'thrust_N'];
  return {
    columns: hasPower ? [...base, 'voltage_V', 'current_A', 'power_W'] : base,
    rows: samples.map((s) => {
      const row = [s.time_s, s.throttle_pct, s.rpm, s.thrust_N];
      return hasPower ? [...row, s.voltage_V, s.current_A, s.power_W] : row;
    }),
  };
}

/**
 * Build the thrust map tables from a parsed log
 * @param source - Input path, used in error messages
 * @throws {MalformedInputError} When a required column is missing from the header
 * @throws {NoValidRowsError} When no row passes validation
 */
export function extractThrustMap(
  table: CsvTable,
  source: string,
  options: ThrustMapOptions
): ThrustMapResult {
  const layout = ColumnLayout.resolve(table.header, THRUST_COLUMNS, options.aliases);
  for (const note of layout.aliasNotes()) {
    Logger.debug(note);
  }
  const missing = layout.missing(REQUIRED_COLUMNS);
  if (missing.length > 0) {
    throw MalformedInputError.missingColumns(source, missing);
  }

  // Capability is decided once from the header; rows only decide their own cell
  const hasPower = layout.has('voltage_V') && layout.has('current_A');
  const { values: samples, errors } = partition(
    table.rows.map((row) => readThrustSample(row, layout, hasPower))
  );

  for (const error of errors) {
    Logger.debug(error.message);
  }
  if (errors.length > 0) {
    Logger.warning(`Skipped ${errors.length} of ${table.rows.length} row(s) with missing or non-numeric values`);
  }
  if (samples.length === 0) {
    throw new NoValidRowsError(`${source}: no valid rows (${table.rows.length} data row(s) read)`);
  }

  return {
    throttle: buildCurve(samples, 'throttle_pct', hasPower, options.aggregate),
    rpm: buildCurve(samples, 'rpm', hasPower, options.aggregate),
    clean: buildCleanTable(samples, hasPower),
    hasPower,
    acceptedRows: samples.length,
    rejectedRows: errors.length,
  };
}

export class ThrustMapExtractor {
  convert(options: ThrustMapRunOptions): WrittenFile[] {
    Logger.debug(`Reading thrust log: ${options.input}`);
    const result = extractThrustMap(readCsvFile(options.input), options.input, options);
    if (!result.hasPower) {
      Logger.debug('No voltage_V/current_A columns, power_W omitted');
    }

    const outputs: Array<[string, NumericTable]> = [
      [`thrustmap_throttle_${options.name}.csv`, result.throttle],
      [`thrustmap_rpm_${options.name}.csv`, result.rpm],
      [`thrustmap_clean_${options.name}.csv`, result.clean],
    ];

    const written: WrittenFile[] = [];
    for (const [fileName, table] of outputs) {
      if (table.rows.length === 0) {
        Logger.warning(`Skipping ${fileName}: no rows with a numeric ${table.columns[0]}`);
        continue;
      }
      const filePath = path.join(options.outdir, fileName);
      writeCsvFile(filePath, table);
      written.push({ path: filePath, rows: table.rows.length });
    }
    return written;
  }
}
