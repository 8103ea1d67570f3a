/**
 * @file columns.ts - Header column resolution
 * @description Maps canonical SI column names onto whatever a logger wrote in its header,
 * including unit conversion for thrust recorded in grams or kilogram-force.
 * @depends types, csv-service
 */

import type { CanonicalColumn, ColumnAliasOverrides, CsvRow } from '../types';
import { parseNumericCell } from '../services/csv-service';

const STANDARD_GRAVITY = 9.80665;

export const CANONICAL_COLUMNS = [
  'time_s',
  'throttle_pct',
  'rpm',
  'thrust_N',
  'voltage_V',
  'current_A',
  'power_W',
  'speed_mps',
  'thrust_sum_N',
] as const satisfies readonly CanonicalColumn[];

interface ColumnAlias {
  name: string;
  /** Multiplier converting the source unit to the canonical unit */
  scale: number;
}

const BUILTIN_ALIASES: Record<CanonicalColumn, ColumnAlias[]> = {
  time_s: [
    { name: 'time', scale: 1 },
    { name: 't', scale: 1 },
  ],
  throttle_pct: [
    { name: 'throttle_percent', scale: 1 },
    { name: 'throttle', scale: 1 },
  ],
  rpm: [{ name: 'motor_rpm', scale: 1 }],
  thrust_N: [
    { name: 'thrust', scale: 1 },
    { name: 'force_N', scale: 1 },
    { name: 'thrust_g', scale: STANDARD_GRAVITY * 1e-3 },
    { name: 'force_g', scale: STANDARD_GRAVITY * 1e-3 },
    { name: 'thrust_kgf', scale: STANDARD_GRAVITY },
    { name: 'force_kgf', scale: STANDARD_GRAVITY },
  ],
  voltage_V: [
    { name: 'voltage', scale: 1 },
    { name: 'V', scale: 1 },
    { name: 'battery_V', scale: 1 },
  ],
  current_A: [
    { name: 'current', scale: 1 },
    { name: 'I', scale: 1 },
  ],
  power_W: [{ name: 'power', scale: 1 }],
  speed_mps: [
    { name: 'speed', scale: 1 },
    { name: 'airspeed_mps', scale: 1 },
  ],
  thrust_sum_N: [{ name: 'thrust_total_N', scale: 1 }],
};

/** Where a canonical column lives in a particular file */
export interface ResolvedColumn {
  index: number;
  header: string;
  scale: number;
}

/**
 * Canonical columns resolved against one file's header. Exact names win, then configured
 * aliases, then the built-in aliases in order.
 */
export class ColumnLayout<K extends CanonicalColumn> {
  private constructor(private readonly resolved: ReadonlyMap<K, ResolvedColumn>) {}

  static resolve<K extends CanonicalColumn>(
    header: string[],
    wanted: readonly K[],
    overrides: ColumnAliasOverrides = {}
  ): ColumnLayout<K> {
    const positions = new Map<string, number>();
    header.forEach((name, index) => {
      if (!positions.has(name)) {
        positions.set(name, index);
      }
    });

    const resolved = new Map<K, ResolvedColumn>();
    for (const column of wanted) {
      const candidates: ColumnAlias[] = [
        { name: column, scale: 1 },
        ...(overrides[column] ?? []).map((name) => ({ name, scale: 1 })),
        ...BUILTIN_ALIASES[column],
      ];
      for (const candidate of candidates) {
        const index = positions.get(candidate.name);
        if (index !== undefined) {
          resolved.set(column, { index, header: candidate.name, scale: candidate.scale });
          break;
        }
      }
    }
    return new ColumnLayout(resolved);
  }

  get(column: K): ResolvedColumn | null {
    return this.resolved.get(column) ?? null;
  }

  has(column: K): boolean {
    return this.resolved.has(column);
  }

  missing(required: readonly K[]): K[] {
    return required.filter((column) => !this.resolved.has(column));
  }

  /** One line per column found under another header name, e.g. `thrust_N read from thrust_kgf (×9.80665)` */
  aliasNotes(): string[] {
    return [...this.resolved]
      .filter(([column, resolved]) => resolved.header !== column)
      .map(([column, { header, scale }]) =>
        scale === 1 ? `${column} read from ${header}` : `${column} read from ${header} (×${scale})`
      );
  }

  /** Numeric value of a column in a row, in canonical units; `null` when absent or unparsable */
  read(row: CsvRow, column: K): number | null {
    const resolved = this.get(column);
    if (!resolved) {
      return null;
    }
    const value = parseNumericCell(row.cells[resolved.index]);
    return value === null ? null : value * resolved.scale;
  }
}
