/**
 * @file csv-service.ts - CSV reading and writing
 * @description Comma-delimited UTF-8 with optional double quoting. Numbers are written in
 * their shortest round-trip form with `.` as decimal separator, independent of locale.
 * @depends fs, path, types, errors
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CsvRow, CsvTable, NumericTable } from '../types';
import { MalformedInputError } from '../core/errors';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Split CSV text into records. Blank lines are dropped but still counted,
 * so `line` always points at the source line. A `"` opens a quoted field only
 * as the first character of a cell; anywhere else it is kept as text.
 * @param source - Prefix for error messages, usually the file path
 * @throws {MalformedInputError} When a quoted field is still open at the end of the input
 */
export function parseCsvRecords(text: string, source?: string): CsvRow[] {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records: CsvRow[] = [];

  let cells: string[] = [];
  let cell = '';
  let cellStart = true;
  let quoted = false;
  let quoteLine = 0;
  let line = 1;
  let recordLine = 1;

  const endRecord = () => {
    cells.push(cell);
    if (cells.length > 1 || cells[0].trim() !== '') {
      records.push({ line: recordLine, cells });
    }
    cells = [];
    cell = '';
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (quoted) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        if (ch === '\n') line++;
        cell += ch;
      }
      continue;
    }

    switch (ch) {
      case '"':
        if (cellStart) {
          quoted = true;
          quoteLine = line;
        } else {
          cell += ch;
        }
        cellStart = false;
        break;
      case ',':
        cells.push(cell);
        cell = '';
        cellStart = true;
        break;
      case '\r':
        break;
      case '\n':
        endRecord();
        line++;
        recordLine = line;
        cellStart = true;
        break;
      default:
        cell += ch;
        cellStart = false;
    }
  }

  if (quoted) {
    const location = `line ${quoteLine}: unclosed quoted field`;
    throw new MalformedInputError(source ? `${source}: ${location}` : location);
  }
  if (cell !== '' || cells.length > 0) {
    endRecord();
  }

  return records;
}

/** Parse CSV text whose first record is the header */
export function parseCsv(text: string, source?: string): CsvTable {
  const [first, ...rows] = parseCsvRecords(text, source);
  return {
    header: first ? first.cells.map((name) => name.trim()) : [],
    rows,
  };
}

export function readCsvFile(filePath: string): CsvTable {
  return parseCsv(fs.readFileSync(filePath, 'utf-8'), filePath);
}

export function readCsvRecords(filePath: string): CsvRow[] {
  return parseCsvRecords(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/** Decimal number in a cell, or `null` for empty, NaN or otherwise unparsable text */
export function parseNumericCell(raw: string | undefined): number | null {
  if (raw === undefined) {
    return null;
  }
  const text = raw.trim();
  if (!NUMERIC_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function formatNumber(value: number | null): string {
  if (value === null || !Number.isFinite(value)) {
    return '';
  }
  // String() never uses locale separators; it prints -0 as "0"
  return String(value);
}

function csvEscape(s: string): string {
  if (s.includes(',') || s.includes('"') || s.includes('\n')) {
    return '"' + s.replace(/"/g, '""') + '"';
  }
  return s;
}

export function formatCsv(table: NumericTable): string {
  const lines = [table.columns.map(csvEscape).join(',')];
  for (const row of table.rows) {
    lines.push(row.map(formatNumber).join(','));
  }
  return lines.join('\n') + '\n';
}

/** Write a table, creating the parent directory when absent */
export function writeCsvFile(filePath: string, table: NumericTable): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, formatCsv(table), 'utf-8');
}
