import { ScrapeConfig } from './types';

export const DEFAULT_START_URL = 'https://www.scrapethissite.com/pages/forms/?page_num=1&per_page=100';
export const DEFAULT_TIMEOUT_MS = 100_000;

export const DEFAULT_SCRAPE_CONFIG: ScrapeConfig = Object.freeze({
  rootUrl: 'https://www.scrapethissite.com/',
  userAgent: 'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:109.0) Gecko/20100101 Firefox/117.0',
  acceptLanguage: 'en-US',
  timeoutMs: DEFAULT_TIMEOUT_MS,
});

function resolveTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_TIMEOUT_MS;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`Ignoring SCRAPE_TIMEOUT_MS="${raw}"; using ${DEFAULT_TIMEOUT_MS}ms.`);
    return DEFAULT_TIMEOUT_MS;
  }
  return parsed;
}

export function resolveScrapeConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ScrapeConfig> = {},
): ScrapeConfig {
  return Object.freeze({
    ...DEFAULT_SCRAPE_CONFIG,
    timeoutMs: resolveTimeout(env.SCRAPE_TIMEOUT_MS),
    ...overrides,
  });
}

export function resolveStartUrl(env: NodeJS.ProcessEnv = process.env): string {
  return env.SCRAPE_START_URL ?? DEFAULT_START_URL;
}
