export { AGG_FUNCS, aggregateByTeam, bottomNTeams, isAggFunc, topNTeams } from './aggregate';
export type { AggFunc, TeamAggregate } from './aggregate';
export {
  assertRawColumns,
  cleanTeamRecords,
  DROPPED_COLUMNS,
  isNumericStatColumn,
  NUMERIC_STAT_COLUMNS,
  TEAM_STATS_COLUMNS,
} from './clean';
export type { NumericStatColumn, TeamStats } from './clean';
export {
  dataframeStructure,
  datatypeDetails,
  describeObjectFields,
  objectFieldsCountStats,
  structureAsDict,
} from './describe';
export type { FrameStructure, ObjectFieldCountStats, ObjectFieldSummary } from './describe';
export { frameFromCsv, frameFromRecords, readCsvFrame } from './frame';
export type { CellValue, DataFrame, Dtype } from './frame';
export { buildProfileReport, profileColumn, writeProfileReport } from './profile';
export { dictToTable, formatFrameTable, renderTable } from './table';
