export type ContentType = 'html' | 'css' | 'js';

export const CONTENT_TYPES: readonly ContentType[] = ['html', 'css', 'js'];

/** Timestamp used for a capture fetched from the origin instead of the archive. */
export const LIVE_TIMESTAMP = 'live';

export interface ArchiveClientOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
}

export interface CaptureEntry {
  timestamp: string; // YYYYMMDDhhmmss
  capturedAt: string; // ISO
  mementoUrl: string;
}

export interface ListCapturesOptions {
  historyDays?: number;
  limit?: number;
}

export interface FetchCaptureOptions {
  contentType?: ContentType;
}

export interface Capture {
  readonly url: string;
  readonly timestamp: string;
  readonly contentType: ContentType | 'unknown';
  readonly declaredType?: string;
  readonly content: string;
  readonly mementoUrl: string;
  readonly status: number;
  readonly fetchedAt: string;
}

export interface FetchResult {
  content: string;
  status: number;
  headers: Record<string, string>;
  url: string;
  finalUrl: string;
  fetchTime: number;
}

export interface SnapshotIndex {
  listCaptures(url: string, options?: ListCapturesOptions): Promise<CaptureEntry[]>;
}

export interface SnapshotSource {
  fetchCapture(url: string, timestamp: string, options?: FetchCaptureOptions): Promise<Capture>;
  fetchLive(url: string, options?: FetchCaptureOptions): Promise<Capture>;
}
