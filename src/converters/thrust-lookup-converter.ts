/**
 * @file thrust-lookup-converter.ts - Thrust lookup grid conversion
 * @description Converts the square command lookup grid of a motor identification run into a
 * tidy long table (for contour plots) and a 1-D throttle→thrust curve at one voltage.
 * @depends types, errors, csv-service, logger, path
 *
 * Grid file layout (no header):
 *   row 0:      N, minForce, maxForce, minVoltage, maxVoltage, 0, ...
 *   rows 1..N:  cmd values; row i is voltage i, column j is force j
 */

import * as path from 'path';
import type {
  CsvRow,
  LookupGrid,
  LookupOptions,
  LookupResult,
  NumericTable,
  WrittenFile,
} from '../types';
import { MalformedInputError } from '../core/errors';
import { parseNumericCell, readCsvRecords, writeCsvFile } from '../services/csv-service';
import { Logger } from '../utils/logger';

const MIN_CMD_SPAN = 1e-9;

export interface LookupRunOptions extends LookupOptions {
  input: string;
  name: string;
  outdir: string;
}

/** `count` evenly spaced values from `start` to `stop` inclusive */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count === 1) {
    return [start];
  }
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, k) => (k === count - 1 ? stop : start + k * step));
}

/**
 * @throws {MalformedInputError} On a short metadata row, fewer than N grid rows,
 * a short grid row or a non-numeric cell
 */
export function readLookupGrid(records: CsvRow[], source: string): LookupGrid {
  const [metaRow, ...gridRows] = records;
  if (!metaRow) {
    throw new MalformedInputError(`${source}: empty lookup file`);
  }

  const meta = metaRow.cells.slice(0, 5).map(parseNumericCell);
  const [rawSize, fmin, fmax, vmin, vmax] = meta;
  if (
    meta.length < 5 ||
    rawSize === null ||
    fmin === null ||
    fmax === null ||
    vmin === null ||
    vmax === null
  ) {
    throw new MalformedInputError(
      `${source}: line ${metaRow.line}: metadata row must start with N, minForce, maxForce, minVoltage, maxVoltage`
    );
  }

  const size = Math.round(rawSize);
  if (size < 1) {
    throw new MalformedInputError(`${source}: grid size ${rawSize} must be at least 1`);
  }
  if (gridRows.length < size) {
    throw new MalformedInputError(`${source}: expected ${size} grid rows, found ${gridRows.length}`);
  }

  // Rows may carry trailing padding beyond N columns
  const cmd = gridRows.slice(0, size).map((row) => {
    const values = row.cells.slice(0, size).map(parseNumericCell);
    const numeric = values.filter((v): v is number => v !== null);
    if (numeric.length < size) {
      throw new MalformedInputError(
        `${source}: line ${row.line}: expected ${size} numeric values, found ${numeric.length}`
      );
    }
    return numeric;
  });

  return {
    size,
    voltages: linspace(vmin, vmax, size),
    forces: linspace(fmin, fmax, size),
    cmd,
  };
}

/** Index of the grid voltage closest to `target`; middle row when no target is given */
export function selectVoltageIndex(voltages: number[], target?: number): number {
  if (target === undefined) {
    return Math.floor(voltages.length / 2);
  }
  let best = 0;
  for (let i = 1; i < voltages.length; i++) {
    if (Math.abs(voltages[i] - target) < Math.abs(voltages[best] - target)) {
      best = i;
    }
  }
  return best;
}

export function convertLookupGrid(grid: LookupGrid, options: LookupOptions): LookupResult {
  const longRows: number[][] = [];
  grid.voltages.forEach((voltage, i) => {
    grid.forces.forEach((force, j) => {
      longRows.push([voltage, force, grid.cmd[i][j]]);
    });
  });

  const index = selectVoltageIndex(grid.voltages, options.voltage);
  const sliceVoltage = grid.voltages[index];

  // Invert cmd(force) to force(cmd); equal commands average their forces
  const byCmd = new Map<number, { sum: number; count: number }>();
  grid.cmd[index].forEach((cmd, j) => {
    const entry = byCmd.get(cmd) ?? { sum: 0, count: 0 };
    entry.sum += grid.forces[j];
    entry.count++;
    byCmd.set(cmd, entry);
  });
  const curve = [...byCmd.entries()]
    .sort(([a], [b]) => a - b)
    .map(([cmd, { sum, count }]) => ({ cmd, thrust: sum / count }));

  // Curve points are sorted by command
  const cmin = options.minCmd ?? curve[0].cmd;
  const cmax = options.maxCmd ?? curve[curve.length - 1].cmd;
  const span = Math.max(cmax - cmin, MIN_CMD_SPAN);

  return {
    long: { columns: ['voltage_V', 'force_N', 'cmd'], rows: longRows },
    curve: {
      columns: ['cmd', 'throttle_pct', 'thrust_N', 'voltage_V'],
      rows: curve.map((p) => [p.cmd, ((p.cmd - cmin) / span) * 100, p.thrust, sliceVoltage]),
    },
    sliceVoltage,
  };
}

export class ThrustLookupConverter {
  convert(options: LookupRunOptions): WrittenFile[] {
    Logger.debug(`Reading lookup grid: ${options.input}`);
    const grid = readLookupGrid(readCsvRecords(options.input), options.input);
    Logger.debug(`Grid ${grid.size}×${grid.size}, ${grid.voltages[0]}–${grid.voltages[grid.size - 1]} V`);

    const result = convertLookupGrid(grid, options);
    Logger.info(`Throttle curve sliced at ${result.sliceVoltage.toFixed(2)} V`);

    const outputs: Array<[string, NumericTable]> = [
      [`thrust_lookup_long_${options.name}.csv`, result.long],
      [`thrustmap_throttle_from_lookup_${options.name}.csv`, result.curve],
    ];
    return outputs.map(([fileName, table]) => {
      const filePath = path.join(options.outdir, fileName);
      writeCsvFile(filePath, table);
      return { path: filePath, rows: table.rows.length };
    });
  }
}
