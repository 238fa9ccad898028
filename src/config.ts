export interface AppConfig {
  port: number;
  archiveBaseUrl: string;
  fetchTimeoutMs: number;
  historyDays: number;
  maxCaptures: number;
  maxDiffChars: number;
  diffTimeoutMs: number;
  minContentLength: number;
  userAgent: string;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

export const DEFAULT_CONFIG: AppConfig = {
  port: 8787,
  archiveBaseUrl: 'https://web.archive.org',
  fetchTimeoutMs: 120000,
  historyDays: 30,
  maxCaptures: 100,
  maxDiffChars: 5000000,
  diffTimeoutMs: 5000,
  minContentLength: 50,
  userAgent: DEFAULT_USER_AGENT
};

type Env = Record<string, string | undefined>;

export class ConfigValidator {
  static validate(config: AppConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
      errors.push('PORT must be an integer between 1 and 65535');
    }

    try {
      const parsed = new URL(config.archiveBaseUrl);
      if (!['http:', 'https:'].includes(parsed.protocol)) {
        errors.push('ARCHIVE_BASE_URL must be an http(s) URL');
      }
    } catch {
      errors.push('ARCHIVE_BASE_URL must be an absolute URL');
    }

    if (!Number.isInteger(config.fetchTimeoutMs) || config.fetchTimeoutMs < 1000 || config.fetchTimeoutMs > 600000) {
      errors.push('FETCH_TIMEOUT_MS must be between 1000 and 600000');
    }

    if (!Number.isInteger(config.historyDays) || config.historyDays < 1) {
      errors.push('HISTORY_DAYS must be a positive integer');
    }

    if (!Number.isInteger(config.maxCaptures) || config.maxCaptures < 1 || config.maxCaptures > 10000) {
      errors.push('MAX_CAPTURES must be between 1 and 10000');
    }

    if (!Number.isInteger(config.maxDiffChars) || config.maxDiffChars < 1) {
      errors.push('MAX_DIFF_CHARS must be a positive integer');
    }

    if (!Number.isInteger(config.diffTimeoutMs) || config.diffTimeoutMs < 100 || config.diffTimeoutMs > 600000) {
      errors.push('DIFF_TIMEOUT_MS must be between 100 and 600000');
    }

    if (!Number.isInteger(config.minContentLength) || config.minContentLength < 0) {
      errors.push('MIN_CONTENT_LENGTH must be zero or a positive integer');
    }

    if (config.userAgent.trim().length === 0) {
      errors.push('USER_AGENT must not be empty');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return Number(raw.trim());
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    port: readInt(env, 'PORT', DEFAULT_CONFIG.port),
    archiveBaseUrl: readString(env, 'ARCHIVE_BASE_URL', DEFAULT_CONFIG.archiveBaseUrl).replace(/\/+$/, ''),
    fetchTimeoutMs: readInt(env, 'FETCH_TIMEOUT_MS', DEFAULT_CONFIG.fetchTimeoutMs),
    historyDays: readInt(env, 'HISTORY_DAYS', DEFAULT_CONFIG.historyDays),
    maxCaptures: readInt(env, 'MAX_CAPTURES', DEFAULT_CONFIG.maxCaptures),
    maxDiffChars: readInt(env, 'MAX_DIFF_CHARS', DEFAULT_CONFIG.maxDiffChars),
    diffTimeoutMs: readInt(env, 'DIFF_TIMEOUT_MS', DEFAULT_CONFIG.diffTimeoutMs),
    minContentLength: readInt(env, 'MIN_CONTENT_LENGTH', DEFAULT_CONFIG.minContentLength),
    userAgent: readString(env, 'USER_AGENT', DEFAULT_CONFIG.userAgent)
  };

  const result = ConfigValidator.validate(config);
  if (!result.valid) {
    throw new Error(`Invalid configuration: ${result.errors.join(', ')}`);
  }

  return config;
}
