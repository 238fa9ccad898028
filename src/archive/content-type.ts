import type { ContentType } from '../types/archive';

const MIME_TYPES: Record<string, ContentType> = {
  'text/html': 'html',
  'application/xhtml+xml': 'html',
  'text/css': 'css',
  'application/javascript': 'js',
  'application/x-javascript': 'js',
  'application/ecmascript': 'js',
  'text/javascript': 'js',
  'text/ecmascript': 'js'
};

const EXTENSIONS: Record<string, ContentType> = {
  html: 'html',
  htm: 'html',
  xhtml: 'html',
  shtml: 'html',
  css: 'css',
  js: 'js',
  mjs: 'js',
  cjs: 'js'
};

export function fromContentTypeHeader(header: string | undefined): ContentType | null {
  if (!header) {
    return null;
  }
  const mime = header.split(';')[0].trim().toLowerCase();
  return MIME_TYPES[mime] ?? null;
}

export function fromExtension(url: string): ContentType | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }

  const match = pathname.toLowerCase().match(/\.([a-z0-9]+)$/);
  if (!match) {
    return null;
  }
  return EXTENSIONS[match[1]] ?? null;
}

export function sniffContentType(content: string): ContentType | null {
  const trimmed = content.trim().toLowerCase();

  if (trimmed.startsWith('<!doctype html') || trimmed.startsWith('<html')) {
    return 'html';
  }

  if (trimmed.includes('<html') || trimmed.includes('<body') || trimmed.includes('<div')) {
    return 'html';
  }

  return null;
}

/**
 * Classification order: explicit override, Content-Type header, file
 * extension, HTML sniffing. A header the three types do not cover
 * (text/plain, application/octet-stream) defers to the extension.
 */
export function detectContentType(params: {
  url: string;
  header?: string;
  content: string;
  override?: ContentType;
}): ContentType | 'unknown' {
  return params.override
    ?? fromContentTypeHeader(params.header)
    ?? fromExtension(params.url)
    ?? sniffContentType(params.content)
    ?? 'unknown';
}
