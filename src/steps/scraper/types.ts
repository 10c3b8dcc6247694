export const TEAM_RECORD_COLUMNS = [
  'team_name',
  'year',
  'wins',
  'losses',
  'ot_losses',
  'win_pct',
  'goals_for',
  'goals_against',
  'goals_diff',
  'scrape_timestamp',
] as const;

export type TeamRecordColumn = (typeof TEAM_RECORD_COLUMNS)[number];

// Raw text as scraped; coercion happens in post-processing.
export type TeamRecord = Readonly<Record<TeamRecordColumn, string>>;

export interface ScrapeConfig {
  readonly rootUrl: string;
  readonly userAgent: string;
  readonly acceptLanguage: string;
  readonly timeoutMs: number;
}

export type PageFetcher = (url: string) => Promise<string>;

export interface RecordSink {
  writeRecords(records: readonly TeamRecord[]): void;
}

export type ScrapeState = { state: 'FETCHING'; url: string } | { state: 'DONE' };

export type PaginationFetch = 'reuse' | 'refetch';
