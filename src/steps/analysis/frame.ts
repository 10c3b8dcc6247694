import fs from 'node:fs';
import _ from 'lodash';
import { parseCsv } from '../../utils';

export type CellValue = string | number | null;
export type FrameRow = Record<string, CellValue>;

export interface DataFrame {
  columns: string[];
  rows: FrameRow[];
}

export type Dtype = 'int64' | 'float64' | 'object';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isNumericText(value: string): boolean {
  return NUMERIC_PATTERN.test(value.trim());
}

export function frameFromRecords<T extends object>(records: readonly T[], columns: readonly (keyof T & string)[]): DataFrame {
  return {
    columns: [...columns],
    rows: records.map((record) =>
      _.fromPairs(
        columns.map((column): [string, CellValue] => {
          const value: unknown = record[column];
          return [column, typeof value === 'number' || typeof value === 'string' ? value : null];
        }),
      ),
    ),
  };
}

/**
 * Loads a CSV into a frame. Empty cells become null; a column whose non-empty
 * cells are all numeric is read as numbers, anything else stays text.
 */
export function frameFromCsv(text: string): DataFrame {
  const { columns, rows } = parseCsv(text);
  const numericColumns = new Set(
    columns.filter((column) => {
      const filled = rows.map((row) => row[column]).filter((value) => value !== '');
      return filled.length > 0 && filled.every(isNumericText);
    }),
  );

  return {
    columns,
    rows: rows.map((row) =>
      _.mapValues(row, (value, column): CellValue => {
        if (value === '') return null;
        return numericColumns.has(column) ? Number(value) : value;
      }),
    ),
  };
}

export function readCsvFrame(filePath: string): DataFrame {
  if (!fs.existsSync(filePath)) {
    throw new Error(`CSV file not found at ${filePath}`);
  }
  return frameFromCsv(fs.readFileSync(filePath, 'utf-8'));
}

export function columnValues(frame: DataFrame, column: string): CellValue[] {
  return frame.rows.map((row) => row[column] ?? null);
}

export function inferDtype(frame: DataFrame, column: string): Dtype {
  const values = columnValues(frame, column).filter((value) => value !== null);
  if (values.length === 0 || !values.every((value) => typeof value === 'number')) {
    return 'object';
  }
  return values.every((value) => Number.isInteger(value)) ? 'int64' : 'float64';
}

export function selectDtypeColumns(frame: DataFrame, dtype: Dtype): string[] {
  return frame.columns.filter((column) => inferDtype(frame, column) === dtype);
}
