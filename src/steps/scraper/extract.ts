import * as cheerio from 'cheerio';
import { formatTimestamp } from '../../utils';
import { MarkupError } from './errors';
import { TeamRecord, TeamRecordColumn } from './types';

export const TEAM_ROW_SELECTOR = 'div#page table tbody tr.team';

// Cell selector for every scraped column; scrape_timestamp is stamped, not read.
const CELL_SELECTORS: ReadonlyArray<[Exclude<TeamRecordColumn, 'scrape_timestamp'>, string]> = [
  ['team_name', 'td.name'],
  ['year', 'td.year'],
  ['wins', 'td.wins'],
  ['losses', 'td.losses'],
  ['ot_losses', 'td.ot-losses'],
  ['win_pct', 'td.pct'],
  ['goals_for', 'td.gf'],
  ['goals_against', 'td.ga'],
  ['goals_diff', 'td.diff'],
];

export interface ExtractOptions {
  now?: () => Date;
}

/**
 * Reads every team row of a listing page. Values stay as trimmed text.
 * A row without one of the expected cells raises a MarkupError for the page.
 */
export function extractTeamRecords(pageHtml: string, options: ExtractOptions = {}): TeamRecord[] {
  const now = options.now ?? (() => new Date());
  const $ = cheerio.load(pageHtml);

  return $(TEAM_ROW_SELECTOR)
    .toArray()
    .map((row, index) => {
      const $row = $(row);
      const record: Partial<Record<TeamRecordColumn, string>> = {};
      for (const [column, selector] of CELL_SELECTORS) {
        const cell = $row.find(selector).first();
        if (cell.length === 0) {
          throw new MarkupError(`Team row ${index + 1} is missing cell "${selector}"`, {
            row: index + 1,
            selector,
          });
        }
        record[column] = cell.text().trim();
      }

      return Object.freeze({
        team_name: record.team_name ?? '',
        year: record.year ?? '',
        wins: record.wins ?? '',
        losses: record.losses ?? '',
        ot_losses: record.ot_losses ?? '',
        win_pct: record.win_pct ?? '',
        goals_for: record.goals_for ?? '',
        goals_against: record.goals_against ?? '',
        goals_diff: record.goals_diff ?? '',
        scrape_timestamp: formatTimestamp(now()),
      });
    });
}
