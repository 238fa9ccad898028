import { LIVE_TIMESTAMP } from '../types/archive';
import type {
  ArchiveClientOptions,
  Capture,
  FetchCaptureOptions,
  FetchResult,
  SnapshotSource
} from '../types/archive';
import { InvalidRequestError, NotFoundError, TransientFetchError } from '../errors';
import { detectContentType } from './content-type';
import { RequestValidator } from './validator';
import { performFetch } from './http';

const RESOLVED_TIMESTAMP = /\/web\/(\d{14})(?:[a-z]{2}_)?\//;

export interface SnapshotFetcherOptions extends ArchiveClientOptions {
  minContentLength: number;
}

export class SnapshotFetcher implements SnapshotSource {
  private readonly options: SnapshotFetcherOptions;

  constructor(options: SnapshotFetcherOptions) {
    this.options = options;
  }

  /**
   * Fetches the capture of `url` closest to `timestamp`. The `id_` flag asks
   * the archive for the original payload instead of its rewritten page.
   */
  async fetchCapture(url: string, timestamp: string, options: FetchCaptureOptions = {}): Promise<Capture> {
    if (timestamp === LIVE_TIMESTAMP) {
      return this.fetchLive(url, options);
    }

    this.assertUrl(url);
    const resolved = RequestValidator.toArchiveTimestamp(timestamp);
    if (!resolved || resolved === LIVE_TIMESTAMP) {
      throw new InvalidRequestError(`Invalid archive timestamp: ${timestamp}`);
    }

    const mementoUrl = `${this.options.baseUrl}/web/${resolved}id_/${url}`;
    console.log(`Fetching capture ${resolved} of ${url}`);

    const result = await performFetch(mementoUrl, this.options);
    this.assertFound(result, `${url} at ${resolved}`);

    const finalTimestamp = result.finalUrl.match(RESOLVED_TIMESTAMP)?.[1] ?? resolved;

    return this.toCapture(url, finalTimestamp, result, options);
  }

  async fetchLive(url: string, options: FetchCaptureOptions = {}): Promise<Capture> {
    this.assertUrl(url);
    console.log(`Fetching live version of ${url}`);

    const result = await performFetch(url, this.options);
    this.assertFound(result, `the live version of ${url}`);

    return this.toCapture(url, LIVE_TIMESTAMP, result, options);
  }

  private toCapture(url: string, timestamp: string, result: FetchResult, options: FetchCaptureOptions): Capture {
    if (result.content.trim().length < this.options.minContentLength) {
      console.warn(`No content returned for ${result.url}`);
      throw new NotFoundError(`no content returned for ${url} at ${timestamp}`);
    }

    const declaredType = result.headers['content-type'];
    const contentType = detectContentType({
      url,
      header: declaredType,
      content: result.content,
      override: options.contentType
    });

    console.log(`Fetched ${url} at ${timestamp}: ${result.content.length} chars, ${contentType}, ${result.fetchTime}ms`);

    return {
      url,
      timestamp,
      contentType,
      ...(declaredType !== undefined && { declaredType }),
      content: result.content,
      mementoUrl: result.finalUrl,
      status: result.status,
      fetchedAt: new Date().toISOString()
    };
  }

  private assertUrl(url: string): void {
    if (!RequestValidator.validateUrl(url)) {
      throw new InvalidRequestError(`Not an absolute http(s) URL: ${url}`);
    }
  }

  private assertFound(result: FetchResult, what: string): void {
    if (result.status === 404 || result.status === 410) {
      console.warn(`${result.url} does not exist (HTTP ${result.status})`);
      throw new NotFoundError(`the archive does not serve ${what}`);
    }

    if (result.status < 200 || result.status >= 300) {
      console.warn(`Failed to fetch content from ${result.url}. Status code: ${result.status}`);
      throw new TransientFetchError(`HTTP ${result.status} while fetching ${what}`);
    }
  }
}
