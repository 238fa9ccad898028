import type { ArchiveClientOptions, FetchResult } from '../types/archive';
import { TransientFetchError } from '../errors';

/** The `charset` parameter of a Content-Type header, if any. */
export function charsetOf(contentType: string | undefined): string | undefined {
  const match = contentType?.match(/;\s*charset\s*=\s*["']?([^;"'\s]+)/i);
  return match ? match[1].toLowerCase() : undefined;
}

function decodeBody(body: ArrayBuffer, charset: string | undefined, url: string): string {
  if (charset) {
    try {
      return new TextDecoder(charset).decode(body);
    } catch (error) {
      if (!(error instanceof RangeError)) {
        throw error;
      }
      console.warn(`Unknown charset "${charset}" for ${url}, decoding as UTF-8`);
    }
  }
  return new TextDecoder('utf-8').decode(body);
}

/**
 * Single GET against the archive (or an origin), following redirects.
 * Network failures and timeouts become TransientFetchError; HTTP error
 * statuses are returned for the caller to classify.
 */
export async function performFetch(url: string, options: ArchiveClientOptions): Promise<FetchResult> {
  const startTime = Date.now();

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      redirect: 'follow',
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        'User-Agent': options.userAgent,
        'Accept': 'text/html,application/xhtml+xml,text/css,application/javascript,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
        'Accept-Encoding': 'identity',
        'Cache-Control': 'no-cache',
        'Pragma': 'no-cache',
        'Dnt': '1'
      }
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new TransientFetchError(`request to ${url} timed out after ${options.timeoutMs}ms`, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransientFetchError(`request to ${url} failed: ${reason}`, { cause: error });
  }

  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });

  let body: ArrayBuffer;
  try {
    body = await response.arrayBuffer();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransientFetchError(`reading ${url} failed: ${reason}`, { cause: error });
  }

  return {
    content: decodeBody(body, charsetOf(headers['content-type']), url),
    status: response.status,
    headers,
    url,
    finalUrl: response.url || url,
    fetchTime: Date.now() - startTime
  };
}
