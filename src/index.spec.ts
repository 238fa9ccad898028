import { describe, it, expect } from 'vitest';
import { createApp } from './index';
import { DiffGenerator } from './diff/generator';
import { ContentNormalizer } from './diff/normalizer';
import { LineDiffEngine } from './diff/engine';
import { NotFoundError } from './errors';
import type { Capture, CaptureEntry, SnapshotIndex, SnapshotSource } from './types/archive';

const PAGE = 'https://example.com/';

const ENTRIES: CaptureEntry[] = [
  { timestamp: '20240301000000', capturedAt: '2024-03-01T00:00:00Z', mementoUrl: `https://archive.test/web/20240301000000/${PAGE}` },
  { timestamp: '20240310000000', capturedAt: '2024-03-10T00:00:00Z', mementoUrl: `https://archive.test/web/20240310000000/${PAGE}` }
];

const CONTENT: Record<string, string> = {
  '20240301000000': '<body>\n<p>old & busted</p>\n</body>',
  '20240310000000': '<body>\n<p>old & busted</p>\n<p>new hotness</p>\n</body>'
};

const index: SnapshotIndex = {
  listCaptures: (url: string) => url === PAGE
    ? Promise.resolve(ENTRIES)
    : Promise.reject(new NotFoundError(`the archive has no captures of ${url}`))
};

const fetchCapture = (url: string, timestamp: string): Promise<Capture> => {
  const content = CONTENT[timestamp];
  if (content === undefined) {
    return Promise.reject(new NotFoundError(`the archive does not serve ${url} at ${timestamp}`));
  }
  return Promise.resolve({
    url,
    timestamp,
    contentType: 'html',
    content,
    mementoUrl: `https://archive.test/web/${timestamp}id_/${url}`,
    status: 200,
    fetchedAt: '2024-03-15T00:00:00.000Z'
  });
};

const source: SnapshotSource = {
  fetchCapture,
  fetchLive: (url: string) => fetchCapture(url, 'live')
};

const app = createApp({
  generator: new DiffGenerator({
    index,
    fetcher: source,
    normalizer: new ContentNormalizer({ format: content => Promise.resolve(content) }),
    engine: new LineDiffEngine()
  }),
  historyDays: 30
});

function get(path: string): Promise<Response> {
  return app.fetch(new Request(`http://localhost${path}`));
}

const COMPARE_QUERY = `url=${encodeURIComponent(PAGE)}&from=20240301000000&to=20240310000000`;

describe('HTTP routes', () => {
  it('reports health', async () => {
    const response = await get('/health');
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('serves the URL form', async () => {
    const response = await get('/');
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/html; charset=utf-8');
    expect(await response.text()).toContain('<form class="panel" method="get" action="/">');
  });

  it('lists captures and preselects the two most recent', async () => {
    const html = await (await get(`/?url=${encodeURIComponent(PAGE)}`)).text();

    expect(html).toContain('<h2>Captures (2)</h2>');
    expect(html).toContain('<option value="20240301000000" selected>20240301000000</option>');
    expect(html).toContain('<option value="20240310000000" selected>20240310000000</option>');
    expect(html).toContain('formaction="/diff" formtarget="_blank"');
  });

  it('shows a missing page as a message', async () => {
    const response = await get(`/?url=${encodeURIComponent('https://missing.example/')}`);
    expect(response.status).toBe(404);
    expect(await response.text()).toContain(
      '<div class="error">No snapshot available: the archive has no captures of https://missing.example/</div>'
    );
  });

  it('embeds the diff in the compare page', async () => {
    const response = await get(`/compare?${COMPARE_QUERY}`);
    const html = await response.text();

    expect(response.status).toBe(200);
    expect(html).toContain('<h2>Differences</h2>');
    expect(html).toContain('<span class="code">&lt;p&gt;old &amp; busted&lt;/p&gt;</span>');
    expect(html).toContain('<span class="code"><span class="changed">&lt;p&gt;new hotness&lt;/p&gt;</span></span>');
    expect(html).toContain('<span class="added">+1 added</span>');
  });

  it('shows a failed comparison on the compare page', async () => {
    const response = await get(`/compare?url=${encodeURIComponent(PAGE)}&from=20240301000000&to=20200101000000`);

    expect(response.status).toBe(404);
    expect(await response.text()).toContain(
      `<div class="error">No snapshot available: the archive does not serve ${PAGE} at 20200101000000</div>`
    );
  });

  it('serves the standalone diff document', async () => {
    const html = await (await get(`/diff?${COMPARE_QUERY}&view=side-by-side`)).text();

    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain('<table id="diff-container" class="side-by-side">');
    expect(html).toContain('<div id="sidebar"></div>');
  });

  it('returns captures as JSON', async () => {
    const response = await get(`/api/captures?url=${encodeURIComponent(PAGE)}`);
    expect(await response.json()).toEqual({ url: PAGE, captures: ENTRIES });
  });

  it('returns a comparison as JSON', async () => {
    const response = await get(`/api/compare?${COMPARE_QUERY}`);
    const body = JSON.parse(await response.text());

    expect(response.status).toBe(200);
    expect(body.operations).toEqual([
      { kind: 'equal', lines: ['<body>', '<p>old & busted</p>'] },
      { kind: 'insert', lines: ['<p>new hotness</p>'] },
      { kind: 'equal', lines: ['</body>'] }
    ]);
    expect(body.view.summary).toEqual({ linesAdded: 1, linesRemoved: 0, linesUnchanged: 3, identical: false });
    expect(body.captures[0].content).toBeUndefined();
  });

  it('returns API errors as JSON', async () => {
    const invalid = await get('/api/compare?url=nope&from=2024&to=2025');
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({
      error: 'Enter an absolute http(s) URL, e.g. https://example.com/page',
      kind: 'invalid_request'
    });

    const missing = await get(`/api/captures?url=${encodeURIComponent('https://missing.example/')}`);
    expect(missing.status).toBe(404);
    expect(JSON.parse(await missing.text()).kind).toBe('not_found');
  });

  it('rejects unknown paths and other methods', async () => {
    expect((await get('/nope')).status).toBe(404);
    expect((await app.fetch(new Request('http://localhost/health', { method: 'POST' }))).status).toBe(405);
  });
});
