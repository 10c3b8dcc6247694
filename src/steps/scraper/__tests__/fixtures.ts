import { NetworkError } from '../errors';
import { PageFetcher } from '../types';

export interface TeamCells {
  name: string;
  year: string;
  wins: string;
  losses: string;
  otLosses: string;
  pct: string;
  gf: string;
  ga: string;
  diff: string;
}

export function teamRow(cells: TeamCells, omit: string[] = []): string {
  const entries: Array<[string, string]> = [
    ['name', cells.name],
    ['year', cells.year],
    ['wins', cells.wins],
    ['losses', cells.losses],
    ['ot-losses', cells.otLosses],
    ['pct', cells.pct],
    ['gf', cells.gf],
    ['ga', cells.ga],
    ['diff', cells.diff],
  ];
  const tds = entries
    .filter(([cls]) => !omit.includes(cls))
    .map(([cls, text]) => `      <td class="${cls}">\n        ${text}\n      </td>`)
    .join('\n');
  return `    <tr class="team">\n${tds}\n    </tr>`;
}

export function listingPage(rows: string[], nextHref?: string): string {
  const next = nextHref
    ? `<li><a href="${nextHref}" aria-label="Next"><span aria-hidden="true">&raquo;</span></a></li>`
    : '';
  return `<!doctype html>
<html>
<body>
<div id="page">
  <table class="table">
    <tbody>
    <tr><th>Team Name</th><th>Year</th><th>Wins</th><th>Losses</th><th>OT Losses</th><th>Win %</th><th>Goals For (GF)</th><th>Goals Against (GA)</th><th>+ / -</th></tr>
${rows.join('\n')}
    </tbody>
  </table>
  <div class="row pagination-area">
    <ul class="pagination">
      <li><a href="/pages/forms/?page_num=1" aria-label="Previous"><span aria-hidden="true">&laquo;</span></a></li>
      <li class="active"><a href="/pages/forms/?page_num=1">1</a></li>
      ${next}
    </ul>
  </div>
</div>
</body>
</html>`;
}

export function fixedClock(start: Date): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + 1000 * tick++);
}

/**
 * In-process stand-in for the HTTP layer. Unknown URLs fail like a refused connection.
 */
export function fakeFetcher(pages: Record<string, string>): { fetchPage: PageFetcher; requests: string[] } {
  const requests: string[] = [];
  const fetchPage: PageFetcher = async (url) => {
    requests.push(url);
    const html = pages[url];
    if (html === undefined) {
      throw new NetworkError(url, 'connection refused');
    }
    return html;
  };
  return { fetchPage, requests };
}

export const BRUINS_1990: TeamCells = {
  name: 'Boston Bruins',
  year: '1990',
  wins: '44',
  losses: '24',
  otLosses: '',
  pct: '0.55',
  gf: '299',
  ga: '264',
  diff: '35',
};

export const SABRES_1990: TeamCells = {
  name: 'Buffalo Sabres',
  year: '1990',
  wins: '31',
  losses: '30',
  otLosses: '',
  pct: '0.388',
  gf: '292',
  ga: '278',
  diff: '14',
};

export const FLAMES_1990: TeamCells = {
  name: 'Calgary Flames',
  year: '1990',
  wins: '46',
  losses: '26',
  otLosses: '',
  pct: '0.575',
  gf: '344',
  ga: '263',
  diff: '81',
};

export const HAWKS_1990: TeamCells = {
  name: 'Chicago Blackhawks',
  year: '1990',
  wins: '49',
  losses: '23',
  otLosses: '',
  pct: '0.613',
  gf: '284',
  ga: '211',
  diff: '73',
};

export const WINGS_2011: TeamCells = {
  name: 'Detroit Red Wings',
  year: '2011',
  wins: '48',
  losses: '28',
  otLosses: '6',
  pct: '0.585',
  gf: '248',
  ga: '203',
  diff: '45',
};
