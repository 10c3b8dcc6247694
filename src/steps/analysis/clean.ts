import { CsvRow } from '../../utils';
import { DataError } from '../scraper/errors';
import { TeamRecordColumn } from '../scraper/types';

export interface TeamStats {
  team_name: string;
  year: string;
  wins: number;
  losses: number;
  ot_losses: number;
  win_pct: number;
  goals_for: number;
  goals_against: number;
}

export type TeamStatsColumn = keyof TeamStats;
export type NumericStatColumn = Exclude<TeamStatsColumn, 'team_name' | 'year'>;

export const TEAM_STATS_COLUMNS = [
  'team_name',
  'year',
  'wins',
  'losses',
  'ot_losses',
  'win_pct',
  'goals_for',
  'goals_against',
] as const satisfies readonly TeamStatsColumn[];

export const NUMERIC_STAT_COLUMNS = [
  'wins',
  'losses',
  'ot_losses',
  'win_pct',
  'goals_for',
  'goals_against',
] as const satisfies readonly NumericStatColumn[];

export const DROPPED_COLUMNS = ['scrape_timestamp', 'goals_diff'] as const satisfies readonly TeamRecordColumn[];

const INTEGER_COLUMNS: ReadonlySet<NumericStatColumn> = new Set<NumericStatColumn>(['wins', 'losses', 'ot_losses', 'goals_for', 'goals_against']);

const NUMERIC_COLUMN_NAMES: ReadonlySet<string> = new Set(NUMERIC_STAT_COLUMNS);

export function isNumericStatColumn(column: string): column is NumericStatColumn {
  return NUMERIC_COLUMN_NAMES.has(column);
}

export function assertRawColumns(columns: readonly string[]): void {
  const missing = TEAM_STATS_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length) {
    throw new DataError(`Raw CSV is missing columns: ${missing.join(', ')}`, { missing });
  }
}

function coerceNumber(row: CsvRow, column: NumericStatColumn, line: number): number {
  const raw = (row[column] ?? '').trim();
  // Missing values are filled with zero.
  if (raw === '') return 0;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new DataError(`Line ${line}: "${raw}" in column ${column} is not numeric`, { line, column, value: raw });
  }
  return INTEGER_COLUMNS.has(column) ? Math.trunc(value) : value;
}

/**
 * Turns scraped text rows into typed stats. Drops scrape_timestamp and
 * goals_diff and keeps year as text.
 */
export function cleanTeamRecords(rows: readonly CsvRow[]): TeamStats[] {
  return rows.map((row, index) => {
    // Line 1 is the header.
    const line = index + 2;
    return {
      team_name: (row.team_name ?? '').trim(),
      year: (row.year ?? '').trim(),
      wins: coerceNumber(row, 'wins', line),
      losses: coerceNumber(row, 'losses', line),
      ot_losses: coerceNumber(row, 'ot_losses', line),
      win_pct: coerceNumber(row, 'win_pct', line),
      goals_for: coerceNumber(row, 'goals_for', line),
      goals_against: coerceNumber(row, 'goals_against', line),
    };
  });
}
