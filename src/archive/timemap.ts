import type { ArchiveClientOptions, CaptureEntry, ListCapturesOptions, SnapshotIndex } from '../types/archive';
import { InvalidRequestError, NotFoundError, TransientFetchError } from '../errors';
import { RequestValidator } from './validator';
import { performFetch } from './http';

const LINK_ENTRY = /<([^>]+)>;\s*rel="([^"]*)";\s*datetime="([^"]+)"/g;
const MEMENTO_TIMESTAMP = /\/web\/(\d{14})(?:[a-z]{2}_)?\//;

export interface SnapshotIndexClientOptions extends ArchiveClientOptions {
  historyDays: number;
  maxCaptures: number;
  now?: () => Date;
}

export class SnapshotIndexClient implements SnapshotIndex {
  private readonly options: SnapshotIndexClientOptions;

  constructor(options: SnapshotIndexClientOptions) {
    this.options = options;
  }

  async listCaptures(url: string, options: ListCapturesOptions = {}): Promise<CaptureEntry[]> {
    if (!RequestValidator.validateUrl(url)) {
      throw new InvalidRequestError(`Not an absolute http(s) URL: ${url}`);
    }

    const timemapUrl = `${this.options.baseUrl}/web/timemap/link/${url}`;
    const result = await performFetch(timemapUrl, this.options);

    if (result.status === 404) {
      throw new NotFoundError(`the archive has no captures of ${url}`);
    }
    if (result.status < 200 || result.status >= 300) {
      console.warn(`Failed to fetch TimeMap for ${url}. Status code: ${result.status}`);
      throw new TransientFetchError(`TimeMap request returned HTTP ${result.status}`);
    }

    const all = SnapshotIndexClient.parseTimemap(result.content);
    if (all.length === 0) {
      throw new NotFoundError(`the archive has no captures of ${url}`);
    }

    const historyDays = options.historyDays ?? this.options.historyDays;
    const limit = options.limit ?? this.options.maxCaptures;
    const now = this.options.now ? this.options.now() : new Date();
    const cutoff = now.getTime() - historyDays * 24 * 60 * 60 * 1000;

    const recent = all.filter(entry => Date.parse(entry.capturedAt) >= cutoff);
    const captures = recent.slice(Math.max(0, recent.length - limit));

    console.log(`Found ${all.length} captures of ${url}, ${captures.length} within the last ${historyDays} days`);

    return captures;
  }

  /** Parses a link-format TimeMap into unique captures, oldest first. */
  static parseTimemap(text: string): CaptureEntry[] {
    const byTimestamp = new Map<string, CaptureEntry>();

    for (const match of text.matchAll(LINK_ENTRY)) {
      const [, mementoUrl, rel, datetime] = match;
      if (!rel.split(/\s+/).includes('memento')) {
        continue;
      }

      const timestamp = mementoUrl.match(MEMENTO_TIMESTAMP)?.[1] ?? this.fromHttpDate(datetime);
      if (!timestamp || byTimestamp.has(timestamp)) {
        continue;
      }

      byTimestamp.set(timestamp, {
        timestamp,
        capturedAt: this.toIsoDate(timestamp),
        mementoUrl
      });
    }

    return Array.from(byTimestamp.values()).sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  static toIsoDate(timestamp: string): string {
    const digits = timestamp.padEnd(14, '0');
    return `${digits.slice(0, 4)}-${digits.slice(4, 6)}-${digits.slice(6, 8)}T` +
      `${digits.slice(8, 10)}:${digits.slice(10, 12)}:${digits.slice(12, 14)}Z`;
  }

  private static fromHttpDate(datetime: string): string | null {
    const time = Date.parse(datetime);
    if (Number.isNaN(time)) {
      return null;
    }
    return new Date(time).toISOString().replace(/[-:T]/g, '').slice(0, 14);
  }
}
