import { CONTENT_TYPES, LIVE_TIMESTAMP } from '../types/archive';
import type { ContentType, ListCapturesOptions } from '../types/archive';
import { VIEW_MODES } from '../types/diff';
import type { ComparisonRequest, ViewMode } from '../types/diff';
import { InvalidRequestError } from '../errors';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?Z?)?$/;

export class RequestValidator {
  static validateUrl(url: string): boolean {
    try {
      const parsed = new URL(url);
      return ['http:', 'https:'].includes(parsed.protocol);
    } catch {
      return false;
    }
  }

  /**
   * Converts user input into an archive timestamp (4 to 14 digits) or `live`.
   * Accepts raw digits and ISO dates such as `2020-01-01` or `2020-01-01T12:30`.
   */
  static toArchiveTimestamp(input: string): string | null {
    const value = input.trim();

    if (value === LIVE_TIMESTAMP) {
      return LIVE_TIMESTAMP;
    }

    if (/^\d{4,14}$/.test(value)) {
      return value;
    }

    const match = value.match(ISO_DATE);
    if (!match) {
      return null;
    }

    const [, year, month, day, hour, minute, second] = match;
    if (Number(month) < 1 || Number(month) > 12 || Number(day) < 1 || Number(day) > 31) {
      return null;
    }

    let timestamp = `${year}${month}${day}`;
    if (hour !== undefined && minute !== undefined) {
      if (Number(hour) > 23 || Number(minute) > 59) {
        return null;
      }
      timestamp += `${hour}${minute}${second ?? ''}`;
    }

    return timestamp;
  }

  static parseContentType(input: string | null): ContentType | undefined {
    const value = input?.trim().toLowerCase() ?? '';
    if (value === '' || value === 'auto') {
      return undefined;
    }

    const match = CONTENT_TYPES.find(type => type === value);
    if (!match) {
      throw new InvalidRequestError(`Unsupported content type "${value}". Use html, css or js.`);
    }
    return match;
  }

  static parseViewMode(input: string | null): ViewMode {
    const value = input?.trim().toLowerCase() ?? '';
    if (value === '') {
      return 'inline';
    }

    const match = VIEW_MODES.find(mode => mode === value);
    if (!match) {
      throw new InvalidRequestError(`Unknown view mode "${value}". Use inline or side-by-side.`);
    }
    return match;
  }

  static parsePositiveInt(input: string | null, name: string): number | undefined {
    if (input === null || input.trim() === '') {
      return undefined;
    }

    const value = Number(input);
    if (!Number.isInteger(value) || value < 1) {
      throw new InvalidRequestError(`${name} must be a positive whole number`);
    }
    return value;
  }

  static requireUrl(input: string | null): string {
    const url = input?.trim() ?? '';
    if (!this.validateUrl(url)) {
      throw new InvalidRequestError('Enter an absolute http(s) URL, e.g. https://example.com/page');
    }
    return url;
  }

  static parseCaptureQuery(params: URLSearchParams): { url: string; options: ListCapturesOptions } {
    const url = this.requireUrl(params.get('url'));
    const historyDays = this.parsePositiveInt(params.get('days'), 'days');
    const limit = this.parsePositiveInt(params.get('limit'), 'limit');

    return {
      url,
      options: {
        ...(historyDays !== undefined && { historyDays }),
        ...(limit !== undefined && { limit })
      }
    };
  }

  static parseComparisonRequest(params: URLSearchParams): ComparisonRequest {
    const url = this.requireUrl(params.get('url'));

    const timestamps: string[] = [];
    for (const key of ['from', 'to']) {
      const raw = params.get(key)?.trim() ?? '';
      if (raw === '') {
        throw new InvalidRequestError(`Select a capture for "${key}"`);
      }
      const timestamp = this.toArchiveTimestamp(raw);
      if (!timestamp) {
        throw new InvalidRequestError(`Invalid timestamp "${raw}" for "${key}"`);
      }
      timestamps.push(timestamp);
    }

    const contentType = this.parseContentType(params.get('type'));

    return {
      url,
      from: timestamps[0],
      to: timestamps[1],
      ...(contentType && { contentType }),
      viewMode: this.parseViewMode(params.get('view'))
    };
  }
}
