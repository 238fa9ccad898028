import { describe, it, expect } from 'vitest';
import { ConfigValidator, DEFAULT_CONFIG, loadConfig } from './config';

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads and trims environment overrides', () => {
    const config = loadConfig({
      PORT: ' 3000 ',
      ARCHIVE_BASE_URL: 'http://localhost:9000/',
      HISTORY_DAYS: '7',
      MAX_CAPTURES: '20',
      DIFF_TIMEOUT_MS: '2000',
      USER_AGENT: 'test-agent'
    });

    expect(config.port).toBe(3000);
    expect(config.archiveBaseUrl).toBe('http://localhost:9000');
    expect(config.historyDays).toBe(7);
    expect(config.maxCaptures).toBe(20);
    expect(config.diffTimeoutMs).toBe(2000);
    expect(config.userAgent).toBe('test-agent');
    expect(config.fetchTimeoutMs).toBe(120000);
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ PORT: '  ', USER_AGENT: '' }).port).toBe(8787);
  });

  it('lists every invalid value', () => {
    expect(() => loadConfig({ PORT: 'abc', HISTORY_DAYS: '0' })).toThrow(
      'Invalid configuration: PORT must be an integer between 1 and 65535, HISTORY_DAYS must be a positive integer'
    );
  });
});

describe('ConfigValidator', () => {
  it('accepts the defaults', () => {
    expect(ConfigValidator.validate(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
  });

  it('rejects non-http archive URLs', () => {
    const result = ConfigValidator.validate({ ...DEFAULT_CONFIG, archiveBaseUrl: 'ftp://archive.test' });
    expect(result.errors).toEqual(['ARCHIVE_BASE_URL must be an http(s) URL']);
  });

  it('rejects relative archive URLs', () => {
    const result = ConfigValidator.validate({ ...DEFAULT_CONFIG, archiveBaseUrl: 'archive.test' });
    expect(result.errors).toEqual(['ARCHIVE_BASE_URL must be an absolute URL']);
  });

  it('checks timeout and capture bounds', () => {
    const result = ConfigValidator.validate({
      ...DEFAULT_CONFIG,
      fetchTimeoutMs: 10,
      maxCaptures: 0,
      diffTimeoutMs: 0,
      minContentLength: -1,
      userAgent: ' '
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'FETCH_TIMEOUT_MS must be between 1000 and 600000',
      'MAX_CAPTURES must be between 1 and 10000',
      'DIFF_TIMEOUT_MS must be between 100 and 600000',
      'MIN_CONTENT_LENGTH must be zero or a positive integer',
      'USER_AGENT must not be empty'
    ]);
  });
});
