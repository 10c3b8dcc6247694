import { test } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_SCRAPE_CONFIG, resolveScrapeConfig } from '../config';
import { MarkupError, NetworkError } from '../errors';
import { extractTeamRecords } from '../extract';
import { fetchPage } from '../http';
import { findNextPageUrl, nextPage } from '../pagination';
import { TEAM_RECORD_COLUMNS } from '../types';
import { BRUINS_1990, fakeFetcher, fixedClock, listingPage, SABRES_1990, teamRow, WINGS_2011 } from './fixtures';

const START = new Date(2024, 2, 9, 14, 5, 7);

test('extractTeamRecords reads every team row as trimmed text', () => {
  const html = listingPage([teamRow(BRUINS_1990), teamRow(SABRES_1990), teamRow(WINGS_2011)]);
  const records = extractTeamRecords(html, { now: fixedClock(START) });

  assert.equal(records.length, 3);
  assert.deepStrictEqual(records[0], {
    team_name: 'Boston Bruins',
    year: '1990',
    wins: '44',
    losses: '24',
    ot_losses: '',
    win_pct: '0.55',
    goals_for: '299',
    goals_against: '264',
    goals_diff: '35',
    scrape_timestamp: '2024-03-09 14:05:07',
  });
  assert.equal(records[2].ot_losses, '6');
  assert.deepStrictEqual(Object.keys(records[1]), [...TEAM_RECORD_COLUMNS]);
});

test('extractTeamRecords stamps each row separately', () => {
  const html = listingPage([teamRow(BRUINS_1990), teamRow(SABRES_1990)]);
  const records = extractTeamRecords(html, { now: fixedClock(START) });

  assert.equal(records[0].scrape_timestamp, '2024-03-09 14:05:07');
  assert.equal(records[1].scrape_timestamp, '2024-03-09 14:05:08');
});

test('extractTeamRecords keeps leading zeros and signs', () => {
  const html = listingPage([teamRow({ ...WINGS_2011, wins: '007', diff: '-12', pct: '.500' })]);
  const [record] = extractTeamRecords(html, { now: fixedClock(START) });

  assert.equal(record.wins, '007');
  assert.equal(record.goals_diff, '-12');
  assert.equal(record.win_pct, '.500');
});

test('extractTeamRecords ignores rows outside the stats table', () => {
  const stray = '<table><tbody><tr class="team"><td class="name">Stray</td></tr></tbody></table>';
  const html = listingPage([teamRow(BRUINS_1990)]).replace('<body>', `<body>\n${stray}`);

  assert.equal(extractTeamRecords(html).length, 1);
  assert.deepStrictEqual(extractTeamRecords('<html><body><div id="page"></div></body></html>'), []);
});

test('extractTeamRecords rejects a row missing a cell', () => {
  const html = listingPage([teamRow(BRUINS_1990), teamRow(SABRES_1990, ['gf'])]);

  assert.throws(
    () => extractTeamRecords(html),
    (err: unknown) => {
      assert.ok(err instanceof MarkupError);
      assert.equal(err.message, 'Team row 2 is missing cell "td.gf"');
      assert.equal(err.code, 'MARKUP_ERROR');
      return true;
    },
  );
});

test('extracting the same page twice differs only in scrape_timestamp', () => {
  const html = listingPage([teamRow(BRUINS_1990), teamRow(WINGS_2011)]);
  const first = extractTeamRecords(html, { now: fixedClock(START) });
  const second = extractTeamRecords(html, { now: fixedClock(new Date(2025, 0, 1, 0, 0, 0)) });

  const withoutStamp = (records: typeof first) =>
    records.map(({ scrape_timestamp: _stamp, ...rest }) => rest);
  assert.deepStrictEqual(withoutStamp(first), withoutStamp(second));
  assert.notEqual(first[0].scrape_timestamp, second[0].scrape_timestamp);
});

test('findNextPageUrl resolves the Next link against the root URL', () => {
  const html = listingPage([], '/pages/forms/?page_num=3');

  assert.equal(
    findNextPageUrl(html, DEFAULT_SCRAPE_CONFIG),
    'https://www.scrapethissite.com/pages/forms/?page_num=3',
  );
});

test('findNextPageUrl decodes entities in the href', () => {
  const html = listingPage([], '/pages/forms/?page_num=2&amp;per_page=100');

  assert.equal(
    findNextPageUrl(html, DEFAULT_SCRAPE_CONFIG),
    'https://www.scrapethissite.com/pages/forms/?page_num=2&per_page=100',
  );
});

test('findNextPageUrl returns null on the last page', () => {
  assert.equal(findNextPageUrl(listingPage([teamRow(BRUINS_1990)]), DEFAULT_SCRAPE_CONFIG), null);
});

test('findNextPageUrl treats a Next link without href as broken markup', () => {
  const html = '<ul class="pagination"><li><a aria-label="Next">&raquo;</a></li></ul>';

  assert.throws(() => findNextPageUrl(html, DEFAULT_SCRAPE_CONFIG), MarkupError);
});

test('nextPage fetches the current page once', async () => {
  const url = 'https://www.scrapethissite.com/pages/forms/?page_num=2';
  const { fetchPage: fetcher, requests } = fakeFetcher({
    [url]: listingPage([], '/pages/forms/?page_num=3'),
  });

  const next = await nextPage(url, fetcher, DEFAULT_SCRAPE_CONFIG);

  assert.equal(next, 'https://www.scrapethissite.com/pages/forms/?page_num=3');
  assert.deepStrictEqual(requests, [url]);
});

test('nextPage propagates network errors', async () => {
  const { fetchPage: fetcher } = fakeFetcher({});

  await assert.rejects(
    nextPage('https://www.scrapethissite.com/missing', fetcher, DEFAULT_SCRAPE_CONFIG),
    NetworkError,
  );
});

test('fetchPage sends the configured headers and returns the body', async (t) => {
  const seen: Array<RequestInit | undefined> = [];
  t.mock.method(globalThis, 'fetch', async (_input: string | URL | Request, init?: RequestInit) => {
    seen.push(init);
    return new Response('<html>ok</html>', { status: 200 });
  });

  const body = await fetchPage('https://www.scrapethissite.com/pages/forms/', DEFAULT_SCRAPE_CONFIG);

  assert.equal(body, '<html>ok</html>');
  assert.equal(seen.length, 1);
  assert.equal(seen[0]?.method, 'GET');
  assert.deepStrictEqual(seen[0]?.headers, {
    'User-Agent': DEFAULT_SCRAPE_CONFIG.userAgent,
    'accept-language': 'en-US',
  });
  assert.ok(seen[0]?.signal instanceof AbortSignal);
});

test('fetchPage maps a non-2xx response to NetworkError', async (t) => {
  t.mock.method(globalThis, 'fetch', async () =>
    new Response('down', { status: 503, statusText: 'Service Unavailable' }),
  );
  const url = 'https://www.scrapethissite.com/pages/forms/?page_num=9';

  await assert.rejects(fetchPage(url, DEFAULT_SCRAPE_CONFIG), (err: unknown) => {
    assert.ok(err instanceof NetworkError);
    assert.equal(err.status, 503);
    assert.equal(err.url, url);
    assert.equal(err.message, `Request to ${url} failed: HTTP 503 Service Unavailable`);
    return true;
  });
});

test('fetchPage releases the body of a failed response', async (t) => {
  let cancelled = false;
  const body = new ReadableStream<Uint8Array>({
    cancel() {
      cancelled = true;
    },
  });
  t.mock.method(globalThis, 'fetch', async () => new Response(body, { status: 502, statusText: 'Bad Gateway' }));

  await assert.rejects(fetchPage('https://www.scrapethissite.com/pages/forms/', DEFAULT_SCRAPE_CONFIG), NetworkError);
  assert.equal(cancelled, true);
});

test('fetchPage maps transport failures to NetworkError with the cause', async (t) => {
  const cause = new TypeError('fetch failed');
  t.mock.method(globalThis, 'fetch', async () => {
    throw cause;
  });

  await assert.rejects(fetchPage('https://example.invalid/', DEFAULT_SCRAPE_CONFIG), (err: unknown) => {
    assert.ok(err instanceof NetworkError);
    assert.equal(err.reason, 'fetch failed');
    assert.equal(err.cause, cause);
    return true;
  });
});

test('fetchPage reports timeouts', async (t) => {
  t.mock.method(globalThis, 'fetch', async () => {
    throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
  });

  await assert.rejects(
    fetchPage('https://example.invalid/', { ...DEFAULT_SCRAPE_CONFIG, timeoutMs: 250 }),
    (err: unknown) => {
      assert.ok(err instanceof NetworkError);
      assert.equal(err.reason, 'timed out after 250ms');
      return true;
    },
  );
});

test('fetchPage reports a timeout while reading the body', async (t) => {
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      controller.error(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));
    },
  });
  t.mock.method(globalThis, 'fetch', async () => new Response(body, { status: 200 }));

  await assert.rejects(
    fetchPage('https://www.scrapethissite.com/pages/forms/', { ...DEFAULT_SCRAPE_CONFIG, timeoutMs: 250 }),
    (err: unknown) => {
      assert.ok(err instanceof NetworkError);
      assert.equal(err.reason, 'timed out after 250ms');
      assert.equal(err.status, 200);
      return true;
    },
  );
});

test('resolveScrapeConfig reads the timeout from the environment', () => {
  assert.equal(resolveScrapeConfig({ SCRAPE_TIMEOUT_MS: '5000' }).timeoutMs, 5000);
  assert.equal(resolveScrapeConfig({}).timeoutMs, 100_000);
  assert.ok(Object.isFrozen(resolveScrapeConfig({})));
  assert.ok(Object.isFrozen(DEFAULT_SCRAPE_CONFIG));
});

test('resolveScrapeConfig falls back on an invalid timeout', (t) => {
  const warn = t.mock.method(console, 'warn', () => undefined);

  assert.equal(resolveScrapeConfig({ SCRAPE_TIMEOUT_MS: 'soon' }).timeoutMs, 100_000);
  assert.equal(warn.mock.callCount(), 1);
});
