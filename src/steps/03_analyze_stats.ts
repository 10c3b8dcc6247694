import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  AGG_FUNCS,
  AggFunc,
  bottomNTeams,
  DataFrame,
  dataframeStructure,
  datatypeDetails,
  describeObjectFields,
  dictToTable,
  formatFrameTable,
  isAggFunc,
  isNumericStatColumn,
  NUMERIC_STAT_COLUMNS,
  NumericStatColumn,
  objectFieldsCountStats,
  readCsvFrame,
  structureAsDict,
  TeamStats,
  topNTeams,
} from './analysis';
import { loadRawTeamStats, PROCESSED_OUTPUT_PATH } from './02_process_data';

export interface AnalyzeStatsOptions {
  inputPath?: string;
  column?: NumericStatColumn;
  aggFunc?: AggFunc;
  top?: number;
}

function printLines(lines: readonly string[]): void {
  lines.forEach((line) => console.info(line));
  console.info('');
}

export function buildAnalysisReport(frame: DataFrame, stats: readonly TeamStats[], options: AnalyzeStatsOptions = {}): string[] {
  const top = options.top ?? 5;
  const column = options.column ?? 'wins';
  const aggFunc = options.aggFunc ?? 'sum';

  return [
    'Dataset structure',
    ...dictToTable(structureAsDict(dataframeStructure(frame)), ['Metric', 'Value']),
    '',
    ...datatypeDetails(frame),
    '',
    ...formatFrameTable('Object field counts', objectFieldsCountStats(frame)),
    '',
    ...formatFrameTable('Object field lengths', describeObjectFields(frame)),
    '',
    ...formatFrameTable(`Top ${top} teams by total wins`, topNTeams(stats, 'wins', 'sum', top)),
    '',
    ...formatFrameTable(`Bottom ${top} teams by total wins`, bottomNTeams(stats, 'wins', 'sum', top)),
    '',
    ...formatFrameTable(`Top ${top} teams by mean goals_for`, topNTeams(stats, 'goals_for', 'mean', top)),
    '',
    ...formatFrameTable(`Top ${top} teams by ${aggFunc} of ${column}`, topNTeams(stats, column, aggFunc, top)),
    '',
    ...formatFrameTable(`Bottom ${top} teams by ${aggFunc} of ${column}`, bottomNTeams(stats, column, aggFunc, top)),
  ];
}

export async function analyzeStats(options: AnalyzeStatsOptions = {}): Promise<void> {
  const inputPath = options.inputPath ?? PROCESSED_OUTPUT_PATH;
  const frame = readCsvFrame(inputPath);
  // The processed file keeps the raw column names, so the same loader types it.
  const stats = loadRawTeamStats(inputPath);
  printLines(buildAnalysisReport(frame, stats, options));
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('input', {
      alias: 'i',
      type: 'string',
      describe: 'Processed CSV to analyze',
      default: PROCESSED_OUTPUT_PATH,
    })
    .option('column', {
      alias: 'c',
      type: 'string',
      choices: NUMERIC_STAT_COLUMNS,
      describe: 'Numeric column to rank teams by',
      default: 'wins',
    })
    .option('agg', {
      alias: 'a',
      type: 'string',
      choices: AGG_FUNCS,
      describe: 'Aggregation applied per team',
      default: 'sum',
    })
    .option('top', {
      alias: 'n',
      type: 'number',
      describe: 'Number of teams to list',
      default: 5,
    })
    .help()
    .parseSync();

  const column = isNumericStatColumn(argv.column) ? argv.column : 'wins';
  const aggFunc = isAggFunc(argv.agg) ? argv.agg : 'sum';

  analyzeStats({ inputPath: path.resolve(argv.input), column, aggFunc, top: argv.top }).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
