import * as cheerio from 'cheerio';
import { MarkupError } from './errors';
import { PageFetcher, ScrapeConfig } from './types';

export const NEXT_LINK_SELECTOR = "ul.pagination li a[aria-label='Next']";

/**
 * Absolute URL of the page's "Next" link, or null on the last page.
 */
export function findNextPageUrl(pageHtml: string, config: ScrapeConfig): string | null {
  const $ = cheerio.load(pageHtml);
  const link = $(NEXT_LINK_SELECTOR).first();
  if (link.length === 0) return null;

  const href = link.attr('href')?.trim();
  if (!href) {
    throw new MarkupError('Pagination "Next" link has no href', { selector: NEXT_LINK_SELECTOR });
  }

  try {
    return new URL(href, config.rootUrl).toString();
  } catch {
    throw new MarkupError(`Pagination "Next" link has an unusable href "${href}"`, {
      selector: NEXT_LINK_SELECTOR,
      href,
    });
  }
}

// Fetches the page on its own, so a caller that already holds the HTML pays a second request.
export async function nextPage(
  currentPageUrl: string,
  fetchPage: PageFetcher,
  config: ScrapeConfig,
): Promise<string | null> {
  const html = await fetchPage(currentPageUrl);
  return findNextPageUrl(html, config);
}
