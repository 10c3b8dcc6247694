import _ from 'lodash';
import { NumericStatColumn, TeamStats } from './clean';

export const AGG_FUNCS = ['sum', 'mean', 'max', 'min', 'count', 'median'] as const;
export type AggFunc = (typeof AGG_FUNCS)[number];

export interface TeamAggregate {
  team_name: string;
  value: number;
}

function median(values: number[]): number {
  if (values.length === 0) return Number.NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

const AGGREGATORS: Record<AggFunc, (values: number[]) => number> = {
  sum: (values) => _.sum(values),
  mean: (values) => _.mean(values),
  max: (values) => _.max(values) ?? Number.NaN,
  min: (values) => _.min(values) ?? Number.NaN,
  count: (values) => values.length,
  median,
};

export function isAggFunc(value: string): value is AggFunc {
  return AGG_FUNCS.some((fn) => fn === value);
}

/**
 * One aggregate per team, in alphabetical team order.
 */
export function aggregateByTeam(
  rows: readonly TeamStats[],
  column: NumericStatColumn,
  aggFunc: AggFunc,
): TeamAggregate[] {
  const groups = _.groupBy(rows, (row) => row.team_name);
  return Object.keys(groups)
    .sort()
    .map((team_name) => ({
      team_name,
      value: AGGREGATORS[aggFunc](groups[team_name].map((row) => row[column])),
    }));
}

// Ties keep alphabetical team order.
export function topNTeams(
  rows: readonly TeamStats[],
  column: NumericStatColumn,
  aggFunc: AggFunc,
  n: number = 5,
): TeamAggregate[] {
  return _.orderBy(aggregateByTeam(rows, column, aggFunc), ['value'], ['desc']).slice(0, Math.max(n, 0));
}

export function bottomNTeams(
  rows: readonly TeamStats[],
  column: NumericStatColumn,
  aggFunc: AggFunc,
  n: number = 5,
): TeamAggregate[] {
  return _.orderBy(aggregateByTeam(rows, column, aggFunc), ['value'], ['asc']).slice(0, Math.max(n, 0));
}
