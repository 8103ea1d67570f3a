/**
 * @file efficiency-aggregator.ts - Speed-bucketed flight efficiency
 * @description Groups flight-log samples by airspeed and reports, per bucket, the mean
 * electrical power and the energy spent per kilometre flown. Energy and distance are
 * integrated over time with a left Riemann sum: the interval after a sample is charged
 * to that sample's bucket.
 * @depends types, columns, errors, result, csv-service, logger, path
 */

import * as path from 'path';
import type {
  CsvRow,
  CsvTable,
  EfficiencyOptions,
  EfficiencyResult,
  FlightSample,
  WrittenFile,
} from '../types';
import { ColumnLayout } from '../core/columns';
import {
  DivisionByZeroError,
  MalformedInputError,
  NoValidRowsError,
  RowValidationError,
} from '../core/errors';
import { err, ok, partition, type Result } from '../../shared/utils';
import { readCsvFile, writeCsvFile } from '../services/csv-service';
import { Logger } from '../utils/logger';

const FLIGHT_COLUMNS = ['time_s', 'speed_mps', 'voltage_V', 'current_A', 'power_W', 'thrust_sum_N'] as const;

/** Buckets flown for less than this are not reported */
export const MIN_BUCKET_DISTANCE_KM = 1e-9;

type FlightColumn = (typeof FLIGHT_COLUMNS)[number];

/** Electrical power from voltage × current, or a power column the logger already computed */
type PowerSource = 'electrical' | 'logged';

interface SpeedBucket {
  speed: number;
  count: number;
  speedSum: number;
  powerSum: number;
  thrustSum: number;
  thrustCount: number;
  energyJ: number;
  distanceM: number;
}

export interface EfficiencyRunOptions extends EfficiencyOptions {
  input: string;
  name: string;
  outdir: string;
}

export function readFlightSample(
  row: CsvRow,
  layout: ColumnLayout<FlightColumn>,
  powerSource: PowerSource
): Result<FlightSample, RowValidationError> {
  const time = layout.read(row, 'time_s');
  const speed = layout.read(row, 'speed_mps');

  let power: number | null = null;
  const invalid: string[] = [];
  if (time === null) invalid.push('time_s');
  if (speed === null) invalid.push('speed_mps');
  if (powerSource === 'electrical') {
    const voltage = layout.read(row, 'voltage_V');
    const current = layout.read(row, 'current_A');
    if (voltage === null) invalid.push('voltage_V');
    if (current === null) invalid.push('current_A');
    if (voltage !== null && current !== null) power = voltage * current;
  } else {
    power = layout.read(row, 'power_W');
    if (power === null) invalid.push('power_W');
  }

  if (time === null || speed === null || power === null) {
    return err(new RowValidationError(row.line, invalid));
  }

  return ok({
    line: row.line,
    time_s: time,
    speed_mps: speed,
    power_W: power,
    thrust_sum_N: layout.read(row, 'thrust_sum_N'),
  });
}

/**
 * Returns a function mapping a speed to its bucket key. Without `bins` every distinct speed
 * is its own bucket; otherwise `bins` equal-width bins span [min, max] and the maximum
 * falls in the last one.
 */
export function createBucketKey(speeds: number[], bins?: number): (speed: number) => number {
  if (bins === undefined) {
    return (speed) => speed;
  }
  // Not Math.min(...speeds): long logs exceed the engine argument limit
  const min = speeds.reduce((a, b) => Math.min(a, b), Infinity);
  const max = speeds.reduce((a, b) => Math.max(a, b), -Infinity);
  const width = (max - min) / bins;
  if (width === 0) {
    return () => 0;
  }
  return (speed) => Math.min(Math.floor((speed - min) / width), bins - 1);
}

/** Wh/km from integrated energy and distance; a bucket that barely moved has no meaningful ratio */
export function energyPerKm(energyJ: number, distanceM: number): Result<number, DivisionByZeroError> {
  const energyWh = energyJ / 3600;
  const distanceKm = distanceM / 1000;
  if (Math.abs(distanceKm) < MIN_BUCKET_DISTANCE_KM) {
    return err(new DivisionByZeroError(`integrated distance ${distanceKm} km is too small`));
  }
  return ok(energyWh / distanceKm);
}

function resolvePowerSource(layout: ColumnLayout<FlightColumn>, source: string): PowerSource {
  if (layout.has('voltage_V') && layout.has('current_A')) {
    return 'electrical';
  }
  if (layout.has('power_W')) {
    return 'logged';
  }
  throw new MalformedInputError(
    `${source}: missing required columns ${layout.missing(['voltage_V', 'current_A']).join(', ')} (or a power_W column)`
  );
}

/**
 * Aggregate a parsed flight log into one row per speed bucket, ascending by speed
 * @param source - Input path, used in error messages
 * @throws {MalformedInputError} When time, speed or a power source is missing from the header
 * @throws {NoValidRowsError} When no row passes validation or every bucket is degenerate
 */
export function aggregateEfficiency(
  table: CsvTable,
  source: string,
  options: EfficiencyOptions
): EfficiencyResult {
  const layout = ColumnLayout.resolve(table.header, FLIGHT_COLUMNS, options.aliases);
  for (const note of layout.aliasNotes()) {
    Logger.debug(note);
  }
  const missing = layout.missing(['time_s', 'speed_mps']);
  if (missing.length > 0) {
    throw MalformedInputError.missingColumns(source, missing);
  }
  const powerSource = resolvePowerSource(layout, source);
  const hasThrust = layout.has('thrust_sum_N');

  const { values: samples, errors } = partition(
    table.rows.map((row) => readFlightSample(row, layout, powerSource))
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

  const bucketKey = createBucketKey(
    samples.map((s) => s.speed_mps),
    options.bins
  );
  const buckets = new Map<number, SpeedBucket>();
  let skippedIntervals = 0;

  samples.forEach((sample, i) => {
    const key = bucketKey(sample.speed_mps);
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = {
        speed: sample.speed_mps,
        count: 0,
        speedSum: 0,
        powerSum: 0,
        thrustSum: 0,
        thrustCount: 0,
        energyJ: 0,
        distanceM: 0,
      };
      buckets.set(key, bucket);
    }

    bucket.count++;
    bucket.speedSum += sample.speed_mps;
    bucket.powerSum += sample.power_W;
    if (sample.thrust_sum_N !== null) {
      bucket.thrustSum += sample.thrust_sum_N;
      bucket.thrustCount++;
    }

    const next = samples[i + 1];
    if (next) {
      const dt = next.time_s - sample.time_s;
      if (dt > 0) {
        bucket.energyJ += sample.power_W * dt;
        bucket.distanceM += sample.speed_mps * dt;
      } else {
        skippedIntervals++;
      }
    }
  });

  if (skippedIntervals > 0) {
    Logger.warning(`Ignored ${skippedIntervals} interval(s) where time_s did not increase`);
  }

  const rows: Array<Array<number | null>> = [];
  let skippedBuckets = 0;
  const ordered = [...buckets.values()]
    .map((bucket) => ({
      bucket,
      // Unique-value buckets report their exact speed; bins report the mean of their rows
      speed: options.bins === undefined ? bucket.speed : bucket.speedSum / bucket.count,
    }))
    .sort((a, b) => a.speed - b.speed);

  for (const { bucket, speed } of ordered) {
    const efficiency = energyPerKm(bucket.energyJ, bucket.distanceM);
    if (!efficiency.ok) {
      Logger.warning(`Skipping speed bucket ${speed} m/s: ${efficiency.error.message}`);
      skippedBuckets++;
      continue;
    }
    const row = [speed, efficiency.value, bucket.powerSum / bucket.count];
    rows.push(hasThrust ? [...row, bucket.thrustCount > 0 ? bucket.thrustSum / bucket.thrustCount : null] : row);
  }

  if (rows.length === 0) {
    throw new NoValidRowsError(`${source}: no speed bucket covers a non-zero distance`);
  }

  return {
    table: {
      columns: hasThrust
        ? ['speed_mps', 'energy_Wh_per_km', 'power_W', 'thrust_sum_N']
        : ['speed_mps', 'energy_Wh_per_km', 'power_W'],
      rows,
    },
    acceptedRows: samples.length,
    rejectedRows: errors.length,
    skippedIntervals,
    skippedBuckets,
  };
}

export class EfficiencyAggregator {
  convert(options: EfficiencyRunOptions): WrittenFile[] {
    Logger.debug(`Reading flight log: ${options.input}`);
    const result = aggregateEfficiency(readCsvFile(options.input), options.input, options);
    const filePath = path.join(options.outdir, `efficiency_${options.name}.csv`);
    writeCsvFile(filePath, result.table);
    return [{ path: filePath, rows: result.table.rows.length }];
  }
}
