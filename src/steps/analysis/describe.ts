import _ from 'lodash';
import { columnValues, DataFrame, Dtype, inferDtype, selectDtypeColumns } from './frame';

export interface FrameStructure {
  dimensions: number;
  shape: [number, number];
  rowCount: number;
  columnCount: number;
  totalDatapoints: number;
  nullDatapoints: number;
  nonNullDatapoints: number;
}

export const STRUCTURE_LABELS: ReadonlyArray<[keyof FrameStructure, string]> = [
  ['dimensions', 'Dimensions'],
  ['shape', 'Shape'],
  ['rowCount', 'Row Count'],
  ['columnCount', 'Column Count'],
  ['totalDatapoints', 'Total Datapoints'],
  ['nullDatapoints', 'Null Datapoints'],
  ['nonNullDatapoints', 'Non-Null Datapoints'],
];

export interface ObjectFieldCountStats {
  column: string;
  total_rows: number;
  null_rows: number;
  not_null_rows: number;
  unique_item_count: number;
  distinct_item_count: number;
}

export interface ObjectFieldSummary {
  column: string;
  count: number;
  unique_values: number;
  longest_values: number | null;
  average_length_value: number | null;
  shortest_value: number | null;
  max_value_count: number;
  min_value_count: number;
}

export function dataframeStructure(frame: DataFrame): FrameStructure {
  const rowCount = frame.rows.length;
  const columnCount = frame.columns.length;
  const totalDatapoints = rowCount * columnCount;
  const nullDatapoints = _.sumBy(frame.columns, (column) =>
    columnValues(frame, column).filter((value) => value === null).length,
  );

  return {
    dimensions: 2,
    shape: [rowCount, columnCount],
    rowCount,
    columnCount,
    totalDatapoints,
    nullDatapoints,
    nonNullDatapoints: totalDatapoints - nullDatapoints,
  };
}

export function structureAsDict(structure: FrameStructure): Record<string, string> {
  return _.fromPairs(
    STRUCTURE_LABELS.map(([key, label]): [string, string] => {
      const value = structure[key];
      return [label, Array.isArray(value) ? `(${value.join(', ')})` : String(value)];
    }),
  );
}

export function datatypeDetails(frame: DataFrame): string[] {
  const dtypes = _.uniq(frame.columns.map((column) => inferDtype(frame, column)));
  return dtypes.map((dtype: Dtype) => {
    const fieldCount = selectDtypeColumns(frame, dtype).length;
    return `There are ${fieldCount} fields with ${dtype} datatype`;
  });
}

function nonNullText(frame: DataFrame, column: string): string[] {
  return columnValues(frame, column)
    .filter((value) => value !== null)
    .map((value) => String(value));
}

export function objectFieldsCountStats(frame: DataFrame): ObjectFieldCountStats[] {
  return selectDtypeColumns(frame, 'object').map((column) => {
    const values = nonNullText(frame, column);
    const counts = _.countBy(values);
    return {
      column,
      total_rows: frame.rows.length,
      null_rows: frame.rows.length - values.length,
      not_null_rows: values.length,
      unique_item_count: Object.keys(counts).length,
      distinct_item_count: Object.values(counts).filter((count) => count === 1).length,
    };
  });
}

export function describeObjectFields(frame: DataFrame): ObjectFieldSummary[] {
  return selectDtypeColumns(frame, 'object').map((column) => {
    const values = nonNullText(frame, column);
    const lengths = values.map((value) => value.length);
    const longest = _.max(lengths) ?? null;
    const shortest = _.min(lengths) ?? null;
    return {
      column,
      count: values.length,
      unique_values: _.uniq(values).length,
      longest_values: longest,
      average_length_value: lengths.length ? _.mean(lengths) : null,
      shortest_value: shortest,
      max_value_count: lengths.filter((length) => length === longest).length,
      min_value_count: lengths.filter((length) => length === shortest).length,
    };
  });
}
