import fs from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { parseCsv, toCsv } from '../utils';
import {
  assertRawColumns,
  buildProfileReport,
  cleanTeamRecords,
  DROPPED_COLUMNS,
  frameFromRecords,
  TEAM_STATS_COLUMNS,
  TeamStats,
  writeProfileReport,
} from './analysis';
import { RAW_OUTPUT_PATH } from './01_scrape_teams';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const PROCESSED_OUTPUT_PATH = path.join(PROJECT_ROOT, 'data', 'processed', 'hockey_team_stats.csv');
export const PROFILE_REPORT_PATH = path.join(PROJECT_ROOT, 'reports', 'data_profiling_report.html');
export const PROFILE_REPORT_TITLE = 'Hockey Team Stats - Data Profile Report';

export interface ProcessDataOptions {
  inputPath?: string;
  outputPath?: string;
  reportPath?: string;
}

export function loadRawTeamStats(inputPath: string): TeamStats[] {
  if (!fs.existsSync(inputPath)) {
    throw new Error(`Raw CSV not found at ${inputPath}. Run 01_scrape_teams first.`);
  }
  const { columns, rows } = parseCsv(fs.readFileSync(inputPath, 'utf-8'));
  assertRawColumns(columns);
  return cleanTeamRecords(rows);
}

export async function processData(options: ProcessDataOptions = {}): Promise<TeamStats[]> {
  const inputPath = options.inputPath ?? RAW_OUTPUT_PATH;
  const outputPath = options.outputPath ?? PROCESSED_OUTPUT_PATH;
  const reportPath = options.reportPath ?? PROFILE_REPORT_PATH;

  const stats = loadRawTeamStats(inputPath);
  console.info(`Loaded ${stats.length} rows; dropped columns ${DROPPED_COLUMNS.join(', ')}`);

  const frame = frameFromRecords(stats, TEAM_STATS_COLUMNS);
  writeProfileReport(reportPath, buildProfileReport(frame, PROFILE_REPORT_TITLE));

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, `${toCsv(stats, TEAM_STATS_COLUMNS)}\n`);
  console.info(`Wrote ${stats.length} rows -> ${outputPath}`);

  return stats;
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('input', {
      alias: 'i',
      type: 'string',
      describe: 'Raw scraped CSV',
      default: RAW_OUTPUT_PATH,
    })
    .option('output', {
      alias: 'o',
      type: 'string',
      describe: 'Cleaned CSV destination',
      default: PROCESSED_OUTPUT_PATH,
    })
    .option('report', {
      type: 'string',
      describe: 'HTML profiling report destination',
      default: PROFILE_REPORT_PATH,
    })
    .help()
    .parseSync();

  processData({
    inputPath: path.resolve(argv.input),
    outputPath: path.resolve(argv.output),
    reportPath: path.resolve(argv.report),
  }).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
