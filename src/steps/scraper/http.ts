import { describeCause, NetworkError } from './errors';
import { PageFetcher, ScrapeConfig } from './types';

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export async function fetchPage(url: string, config: ScrapeConfig): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': config.userAgent,
        'accept-language': config.acceptLanguage,
      },
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (error) {
    const reason = isTimeout(error) ? `timed out after ${config.timeoutMs}ms` : describeCause(error);
    throw new NetworkError(url, reason, { cause: error });
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new NetworkError(url, `HTTP ${response.status} ${response.statusText}`.trim(), {
      status: response.status,
    });
  }

  try {
    return await response.text();
  } catch (error) {
    const reason = isTimeout(error)
      ? `timed out after ${config.timeoutMs}ms`
      : `unable to read body: ${describeCause(error)}`;
    throw new NetworkError(url, reason, {
      status: response.status,
      cause: error,
    });
  }
}

export function createPageFetcher(config: ScrapeConfig): PageFetcher {
  return (url) => fetchPage(url, config);
}
