import fs from 'node:fs';
import path from 'node:path';
import _ from 'lodash';
import { formatTimestamp } from '../../utils';
import { dataframeStructure, structureAsDict } from './describe';
import { columnValues, DataFrame, Dtype, inferDtype } from './frame';
import { formatCell } from './table';

export interface ValueFrequency {
  value: string;
  count: number;
}

export interface ColumnProfile {
  column: string;
  dtype: Dtype;
  missing: number;
  distinct: number;
  min?: number;
  max?: number;
  mean?: number;
  topValues?: ValueFrequency[];
}

const TOP_VALUE_LIMIT = 5;

export function profileColumn(frame: DataFrame, column: string): ColumnProfile {
  const values = columnValues(frame, column);
  const present = values.filter((value) => value !== null);
  const dtype = inferDtype(frame, column);
  const profile: ColumnProfile = {
    column,
    dtype,
    missing: values.length - present.length,
    distinct: _.uniq(present).length,
  };

  const numbers = present.filter((value): value is number => typeof value === 'number');
  if (dtype !== 'object' && numbers.length) {
    return { ...profile, min: _.min(numbers), max: _.max(numbers), mean: _.mean(numbers) };
  }

  const counts = _.countBy(present.map((value) => String(value)));
  const topValues = _.orderBy(
    Object.entries(counts).map(([value, count]) => ({ value, count })),
    ['count', 'value'],
    ['desc', 'asc'],
  ).slice(0, TOP_VALUE_LIMIT);
  return { ...profile, topValues };
}

function htmlTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const head = headers.map((h) => `<th>${_.escape(h)}</th>`).join('');
  const body = rows
    .map((row) => `<tr>${row.map((cell) => `<td>${_.escape(cell)}</td>`).join('')}</tr>`)
    .join('\n');
  return `<table>\n<thead><tr>${head}</tr></thead>\n<tbody>\n${body}\n</tbody>\n</table>`;
}

function describeProfile(profile: ColumnProfile): string {
  if (profile.topValues) {
    return profile.topValues.map(({ value, count }) => `${value} (${count})`).join(', ');
  }
  return `min ${formatCell(profile.min)}, max ${formatCell(profile.max)}, mean ${formatCell(profile.mean)}`;
}

/**
 * Standalone HTML document with the dataset overview and one row per column.
 */
export function buildProfileReport(frame: DataFrame, title: string, generatedAt: Date = new Date()): string {
  const overview = Object.entries(structureAsDict(dataframeStructure(frame)));
  const profiles = frame.columns.map((column) => profileColumn(frame, column));

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${_.escape(title)}</title>`,
    '<style>body{font-family:sans-serif;margin:2rem}table{border-collapse:collapse;margin-bottom:2rem}th,td{border:1px solid #ccc;padding:4px 8px;text-align:left}</style>',
    '</head>',
    '<body>',
    `<h1>${_.escape(title)}</h1>`,
    `<p>Generated ${_.escape(formatTimestamp(generatedAt))}</p>`,
    '<h2>Overview</h2>',
    htmlTable(['Metric', 'Value'], overview),
    '<h2>Columns</h2>',
    htmlTable(
      ['Column', 'Type', 'Missing', 'Distinct', 'Summary'],
      profiles.map((p) => [p.column, p.dtype, String(p.missing), String(p.distinct), describeProfile(p)]),
    ),
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

export function writeProfileReport(filePath: string, html: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, html);
  console.info(`Wrote profile report -> ${filePath}`);
}
