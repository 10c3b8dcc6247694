import { DEFAULT_SCRAPE_CONFIG } from './config';
import { NetworkError } from './errors';
import { extractTeamRecords, ExtractOptions } from './extract';
import { createPageFetcher } from './http';
import { findNextPageUrl, nextPage } from './pagination';
import { PageFetcher, PaginationFetch, RecordSink, ScrapeConfig, ScrapeState } from './types';

export interface RunScrapeOptions {
  config?: ScrapeConfig;
  fetchPage?: PageFetcher;
  /**
   * 'reuse' reads the next link from the page already fetched; 'refetch'
   * requests the page a second time to find it.
   */
  paginationFetch?: PaginationFetch;
  extract?: ExtractOptions;
}

export interface ScrapeOutcome {
  status: 'completed' | 'aborted';
  state: 'DONE';
  pagesVisited: number;
  recordsWritten: number;
  error?: NetworkError;
  message?: string;
}

export function describeNetworkFailure(url: string, error: NetworkError): string {
  return `HTTP error occurred while fetching ${url}: ${error.reason}`;
}

export async function runScrape(
  startUrl: string,
  sink: RecordSink,
  options: RunScrapeOptions = {},
): Promise<ScrapeOutcome> {
  const config = options.config ?? DEFAULT_SCRAPE_CONFIG;
  const fetchPage = options.fetchPage ?? createPageFetcher(config);
  const paginationFetch = options.paginationFetch ?? 'reuse';

  let cursor: ScrapeState = { state: 'FETCHING', url: startUrl };
  let pagesVisited = 0;
  let recordsWritten = 0;

  while (cursor.state === 'FETCHING') {
    const url: string = cursor.url;
    let html: string;
    let nextUrl: string | null;
    try {
      html = await fetchPage(url);
      nextUrl =
        paginationFetch === 'refetch'
          ? await nextPage(url, fetchPage, config)
          : findNextPageUrl(html, config);
    } catch (error) {
      if (!(error instanceof NetworkError)) throw error;
      const message = describeNetworkFailure(url, error);
      return { status: 'aborted', state: 'DONE', pagesVisited, recordsWritten, error, message };
    }

    const records = extractTeamRecords(html, options.extract);
    sink.writeRecords(records);
    pagesVisited += 1;
    recordsWritten += records.length;
    console.info(`   Page ${pagesVisited}: ${records.length} records <- ${url}`);

    cursor = nextUrl === null ? { state: 'DONE' } : { state: 'FETCHING', url: nextUrl };
  }

  return { status: 'completed', state: 'DONE', pagesVisited, recordsWritten };
}
