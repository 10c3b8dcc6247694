export { DEFAULT_SCRAPE_CONFIG, DEFAULT_START_URL, resolveScrapeConfig, resolveStartUrl } from './config';
export { CsvSink, withCsvSink } from './csv_sink';
export { DataError, FilesystemError, MarkupError, NetworkError, ScrapeError } from './errors';
export { extractTeamRecords } from './extract';
export { createPageFetcher, fetchPage } from './http';
export { findNextPageUrl, nextPage } from './pagination';
export { describeNetworkFailure, runScrape } from './orchestrator';
export type { RunScrapeOptions, ScrapeOutcome } from './orchestrator';
export { TEAM_RECORD_COLUMNS } from './types';
export type { PageFetcher, PaginationFetch, RecordSink, ScrapeConfig, TeamRecord, TeamRecordColumn } from './types';
