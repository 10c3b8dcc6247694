import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { formatElapsed } from '../utils';
import {
  PaginationFetch,
  PageFetcher,
  resolveScrapeConfig,
  resolveStartUrl,
  runScrape,
  ScrapeConfig,
  ScrapeOutcome,
  withCsvSink,
} from './scraper';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const RAW_OUTPUT_PATH = path.join(PROJECT_ROOT, 'data', 'raw', 'hockey_teams_raw.csv');

export interface ScrapeTeamsOptions {
  startUrl?: string;
  outputPath?: string;
  config?: ScrapeConfig;
  fetchPage?: PageFetcher;
  paginationFetch?: PaginationFetch;
}

export async function scrapeTeams(options: ScrapeTeamsOptions = {}): Promise<ScrapeOutcome> {
  const startUrl = options.startUrl ?? resolveStartUrl();
  const outputPath = options.outputPath ?? RAW_OUTPUT_PATH;
  const config = options.config ?? resolveScrapeConfig();

  console.info('Scraping in progress...');
  const startedAt = Date.now();

  const outcome = await withCsvSink(outputPath, (sink) =>
    runScrape(startUrl, sink, {
      config,
      fetchPage: options.fetchPage,
      paginationFetch: options.paginationFetch,
    }),
  );

  if (outcome.status === 'aborted') {
    console.error(outcome.message);
    console.error(`Kept ${outcome.recordsWritten} rows from ${outcome.pagesVisited} pages -> ${outputPath}`);
  } else {
    console.info('Scraping completed.');
    console.info(`Wrote ${outcome.recordsWritten} rows from ${outcome.pagesVisited} pages -> ${outputPath}`);
  }
  console.info(`Time elapsed in scraping: ${formatElapsed(Date.now() - startedAt)}`);

  return outcome;
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('start-url', {
      type: 'string',
      describe: 'First listing page to scrape',
      default: resolveStartUrl(),
    })
    .option('output', {
      alias: 'o',
      type: 'string',
      describe: 'Destination CSV file',
      default: RAW_OUTPUT_PATH,
    })
    .option('refetch-pagination', {
      type: 'boolean',
      describe: 'Request each page a second time to find its "Next" link',
      default: false,
    })
    .help()
    .parseSync();

  scrapeTeams({
    startUrl: argv['start-url'],
    outputPath: path.resolve(argv.output),
    paginationFetch: argv['refetch-pagination'] ? 'refetch' : 'reuse',
  })
    .then((outcome) => {
      if (outcome.status === 'aborted') {
        process.exitCode = 1;
      }
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
