/**
 * @file efficiency-aggregator.test.ts - Tests for speed-bucketed efficiency
 * @description Covers integration of energy and distance, bucket ordering, binning,
 * degenerate buckets and the error taxonomy
 * @depends efficiency-aggregator, csv-service
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  aggregateEfficiency,
  createBucketKey,
  EfficiencyAggregator,
  energyPerKm,
} from '../../src/converters/efficiency-aggregator';
import { DivisionByZeroError, MalformedInputError, NoValidRowsError } from '../../src/core/errors';
import { parseCsv } from '../../src/services/csv-service';

/** `count` one-second samples at constant speed, voltage and current */
function constantFlight(count: number, speed: number, voltage: number, current: number): string {
  const lines = ['time_s,speed_mps,voltage_V,current_A'];
  for (let t = 0; t < count; t++) {
    lines.push(`${t},${speed},${voltage},${current}`);
  }
  return lines.join('\n');
}

function aggregate(text: string, bins?: number) {
  return aggregateEfficiency(parseCsv(text), 'flight.csv', { bins });
}

describe('aggregateEfficiency', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should report one bucket for a constant-speed flight', () => {
    // 10 m/s for 10 s at 60 W: 600 J over 100 m
    const result = aggregate(constantFlight(11, 10, 12, 5));

    expect(result.table.columns).toEqual(['speed_mps', 'energy_Wh_per_km', 'power_W']);
    expect(result.table.rows).toHaveLength(1);
    const [speed, whPerKm, power] = result.table.rows[0];
    expect(speed).toBe(10);
    expect(power).toBe(60);
    expect(whPerKm).toBeCloseTo(600 / 3600 / 0.1, 9);
  });

  it('should sort buckets ascending by speed', () => {
    const result = aggregate(
      [
        'time_s,speed_mps,voltage_V,current_A',
        '0,20,12,5',
        '1,20,12,5',
        '2,10,12,10',
        '3,10,12,10',
        '4,10,12,10',
      ].join('\n')
    );

    expect(result.table.rows.map((r) => r[0])).toEqual([10, 20]);
    // 10 m/s bucket: 2 intervals at 120 W -> 240 J over 20 m
    expect(result.table.rows[0][1]).toBeCloseTo(240 / 3600 / 0.02, 9);
    expect(result.table.rows[0][2]).toBe(120);
    // 20 m/s bucket: 2 intervals at 60 W -> 120 J over 40 m
    expect(result.table.rows[1][1]).toBeCloseTo(120 / 3600 / 0.04, 9);
    expect(result.table.rows[1][2]).toBe(60);
  });

  it('should weight energy and distance by the interval length', () => {
    const result = aggregate(
      ['time_s,speed_mps,voltage_V,current_A', '0,10,10,5', '4,10,10,7', '5,10,10,7'].join('\n')
    );

    // 50 W for 4 s plus 70 W for 1 s = 270 J over 50 m
    expect(result.table.rows[0][1]).toBeCloseTo(270 / 3600 / 0.05, 9);
    expect(result.table.rows[0][2]).toBeCloseTo((50 + 70 + 70) / 3, 9);
  });

  it('should skip a bucket with zero integrated distance and warn', () => {
    const result = aggregate(
      ['time_s,speed_mps,voltage_V,current_A', '0,0,12,5', '1,0,12,5', '2,10,12,5', '3,10,12,5'].join('\n')
    );

    expect(result.skippedBuckets).toBe(1);
    expect(result.table.rows).toHaveLength(1);
    expect(result.table.rows[0][0]).toBe(10);
    expect(result.table.rows[0][1]).toBeCloseTo(60 / 3600 / 0.01, 9);
    expect(console.warn).toHaveBeenCalledWith(
      expect.anything(),
      'Skipping speed bucket 0 m/s: integrated distance 0 km is too small'
    );
  });

  it('should group speeds into equal-width bins and report their mean speed', () => {
    const result = aggregate(
      [
        'time_s,speed_mps,voltage_V,current_A',
        '0,9,12,5',
        '1,10,12,5',
        '2,11,12,5',
        '3,19,12,5',
        '4,20,12,5',
        '5,21,12,5',
      ].join('\n'),
      2
    );

    expect(result.table.rows.map((r) => r[0])).toEqual([10, 20]);
    // First bin: 3 intervals at 60 W over 9 + 10 + 11 m
    expect(result.table.rows[0][1]).toBeCloseTo(180 / 3600 / 0.03, 9);
    // Second bin: the 21 m/s sample is last, so only 2 intervals over 19 + 20 m
    expect(result.table.rows[1][1]).toBeCloseTo(120 / 3600 / 0.039, 9);
  });

  it('should average thrust_sum_N per bucket when logged', () => {
    const result = aggregate(
      ['time_s,speed_mps,voltage_V,current_A,thrust_sum_N', '0,10,12,5,4', '1,10,12,5,', '2,10,12,5,6'].join('\n')
    );

    expect(result.table.columns).toEqual(['speed_mps', 'energy_Wh_per_km', 'power_W', 'thrust_sum_N']);
    expect(result.table.rows[0][3]).toBe(5);
  });

  it('should use a logged power_W column when voltage and current are absent', () => {
    const result = aggregate(['time_s,speed_mps,power_W', '0,10,80', '1,10,80'].join('\n'));

    expect(result.table.rows[0][2]).toBe(80);
    expect(result.table.rows[0][1]).toBeCloseTo(80 / 3600 / 0.01, 9);
  });

  it('should ignore intervals where time does not increase', () => {
    const result = aggregate(
      ['time_s,speed_mps,voltage_V,current_A', '0,10,12,5', '1,10,12,5', '1,10,12,5', '2,10,12,5'].join('\n')
    );

    expect(result.skippedIntervals).toBe(1);
    expect(result.table.rows[0][1]).toBeCloseTo(120 / 3600 / 0.02, 9);
  });

  it('should reject rows with missing or non-numeric values', () => {
    const result = aggregate(
      ['time_s,speed_mps,voltage_V,current_A', '0,10,12,5', '1,abc,12,5', '2,10,,5', '3,10,12,5'].join('\n')
    );

    expect(result.acceptedRows).toBe(2);
    expect(result.rejectedRows).toBe(2);
  });

  it('should throw MalformedInputError without a speed column', () => {
    expect(() => aggregate('time_s,voltage_V,current_A\n0,12,5')).toThrow(
      'flight.csv: missing required column speed_mps'
    );
  });

  it('should throw MalformedInputError without a power source', () => {
    expect(() => aggregate('time_s,speed_mps,voltage_V\n0,10,12')).toThrow(MalformedInputError);
    expect(() => aggregate('time_s,speed_mps,voltage_V\n0,10,12')).toThrow(
      'flight.csv: missing required columns current_A (or a power_W column)'
    );
  });

  it('should throw NoValidRowsError for a header-only file', () => {
    expect(() => aggregate('time_s,speed_mps,voltage_V,current_A\n')).toThrow(NoValidRowsError);
  });

  it('should throw NoValidRowsError when no bucket covers any distance', () => {
    expect(() => aggregate(constantFlight(1, 10, 12, 5))).toThrow(
      'flight.csv: no speed bucket covers a non-zero distance'
    );
  });

  it('should bin a long flight log without exhausting the call stack', () => {
    // 200k one-second samples cycling through 10, 20, 30 and 40 m/s at 36 W
    const lines = ['time_s,speed_mps,power_W'];
    for (let t = 0; t < 200_000; t++) {
      lines.push(`${t},${10 + (t % 4) * 10},36`);
    }

    const result = aggregate(lines.join('\n'), 4);

    expect(result.acceptedRows).toBe(200_000);
    expect(result.table.rows.map((row) => row[0])).toEqual([10, 20, 30, 40]);
    // 36 J and v metres per interval: 10 / v Wh/km
    const whPerKm = result.table.rows.map((row) => row[1]);
    expect(whPerKm[0]).toBeCloseTo(1, 9);
    expect(whPerKm[1]).toBeCloseTo(0.5, 9);
    expect(whPerKm[2]).toBeCloseTo(1 / 3, 9);
    expect(whPerKm[3]).toBeCloseTo(0.25, 9);
  });
});

describe('createBucketKey', () => {
  it('should key by exact speed without bins', () => {
    const key = createBucketKey([1, 2, 3]);
    expect(key(2.5)).toBe(2.5);
  });

  it('should put the maximum speed in the last bin', () => {
    const key = createBucketKey([0, 10], 4);
    expect([0, 2.4, 2.5, 9.9, 10].map(key)).toEqual([0, 0, 1, 3, 3]);
  });

  it('should span bins from the smallest to the largest speed in any order', () => {
    const key = createBucketKey([8, 2, 6, 4], 2);
    expect([2, 4.9, 5, 8].map(key)).toEqual([0, 0, 1, 1]);
  });

  it('should use a single bin when all speeds are equal', () => {
    const key = createBucketKey([5, 5, 5], 3);
    expect(key(5)).toBe(0);
  });
});

describe('energyPerKm', () => {
  it('should divide integrated energy by integrated distance', () => {
    const result = energyPerKm(600, 100);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toBeCloseTo(5 / 3, 9);
    }
  });

  it('should return DivisionByZeroError for a near-zero distance', () => {
    const result = energyPerKm(10, 1e-9);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DivisionByZeroError);
    }
  });
});

describe('EfficiencyAggregator', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'plotdata-eff-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write efficiency_<name>.csv', () => {
    const input = path.join(tmpDir, 'flight.csv');
    fs.writeFileSync(input, ['time_s,speed_mps,power_W', '0,10,36', '1,10,36'].join('\n'));

    const written = new EfficiencyAggregator().convert({ input, outdir: path.join(tmpDir, 'out'), name: 'xwing' });

    const outPath = path.join(tmpDir, 'out', 'efficiency_xwing.csv');
    expect(written).toEqual([{ path: outPath, rows: 1 }]);
    // 36 J over 10 m = 0.01 Wh / 0.01 km
    expect(fs.readFileSync(outPath, 'utf-8')).toBe('speed_mps,energy_Wh_per_km,power_W\n10,1,36\n');
  });
});
