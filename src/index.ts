import { DiffGenerator } from './diff/generator';
import { DiffRenderer } from './diff/renderer';
import { ViewTemplates } from './views/templates';
import type { HomePageState } from './views/templates';
import { RequestValidator } from './archive/validator';
import { describeError } from './errors';
import type { CaptureEntry } from './types/archive';
import type { ComparisonRequest, ComparisonResult } from './types/diff';

export interface AppDeps {
  generator: DiffGenerator;
  historyDays: number;
}

export interface App {
  fetch(request: Request): Promise<Response>;
}

const JSON_HEADERS = { 'Content-Type': 'application/json' };
const HTML_HEADERS = { 'Content-Type': 'text/html; charset=utf-8' };

export function createApp(deps: AppDeps): App {
  return {
    async fetch(request: Request): Promise<Response> {
      const url = new URL(request.url);

      if (request.method !== 'GET') {
        return new Response('Method not allowed', { status: 405 });
      }

      try {
        return await handleGetRequest(url, deps);
      } catch (error) {
        console.error(`Request ${url.pathname} failed:`, error);
        const { message, status } = describeError(error);
        return html(ViewTemplates.errorPage(message), status);
      }
    }
  };
}

async function handleGetRequest(url: URL, deps: AppDeps): Promise<Response> {
  switch (url.pathname) {
    case '/':
      return handleHomePage(url.searchParams, deps);

    case '/compare':
      return handleComparePage(url.searchParams, deps);

    case '/diff':
      return handleDiffDocument(url.searchParams, deps);

    case '/api/captures':
      return handleCapturesApi(url.searchParams, deps);

    case '/api/compare':
      return handleCompareApi(url.searchParams, deps);

    case '/health':
      return json({ status: 'ok' });

    default:
      return new Response('Not found', { status: 404 });
  }
}

async function handleHomePage(params: URLSearchParams, deps: AppDeps): Promise<Response> {
  const state: HomePageState = { days: deps.historyDays };

  if (!params.has('url')) {
    return html(ViewTemplates.homePage(state));
  }

  try {
    const { url, options } = RequestValidator.parseCaptureQuery(params);
    state.url = url;
    state.days = options.historyDays ?? deps.historyDays;
    state.captures = await deps.generator.listCaptures(url, options);
    return html(ViewTemplates.homePage(state));
  } catch (error) {
    const { message, status } = describeError(error);
    console.warn(`Listing captures failed: ${message}`);
    return html(ViewTemplates.homePage({ ...state, error: message }), status);
  }
}

async function handleComparePage(params: URLSearchParams, deps: AppDeps): Promise<Response> {
  let request: ComparisonRequest;
  let days: number;
  try {
    request = RequestValidator.parseComparisonRequest(params);
    days = RequestValidator.parsePositiveInt(params.get('days'), 'days') ?? deps.historyDays;
  } catch (error) {
    const { message, status } = describeError(error);
    return html(ViewTemplates.homePage({ days: deps.historyDays, error: message }), status);
  }

  const state: HomePageState = { url: request.url, days, request };

  let status = 200;
  try {
    const result = await deps.generator.compare(request);
    state.diffHtml = DiffRenderer.renderFragment(result.view);
  } catch (error) {
    const described = describeError(error);
    console.warn(`Comparison of ${request.url} failed: ${described.message}`);
    state.comparisonError = described.message;
    status = described.status;
  }

  // The capture list is only there to pick the next comparison; its failure doesn't hide the diff.
  try {
    state.captures = await deps.generator.listCaptures(request.url, { historyDays: days });
  } catch (error) {
    console.warn(`Listing captures of ${request.url} failed:`, error);
    state.captures = [];
  }

  return html(ViewTemplates.homePage(state), status);
}

async function handleDiffDocument(params: URLSearchParams, deps: AppDeps): Promise<Response> {
  const request = RequestValidator.parseComparisonRequest(params);
  const result = await deps.generator.compare(request);

  return html(DiffRenderer.renderDocument(result.view, {
    url: request.url,
    from: result.captures[0].timestamp,
    to: result.captures[1].timestamp
  }));
}

async function handleCapturesApi(params: URLSearchParams, deps: AppDeps): Promise<Response> {
  try {
    const { url, options } = RequestValidator.parseCaptureQuery(params);
    const captures: CaptureEntry[] = await deps.generator.listCaptures(url, options);
    return json({ url, captures });
  } catch (error) {
    return jsonError(error);
  }
}

async function handleCompareApi(params: URLSearchParams, deps: AppDeps): Promise<Response> {
  try {
    const request = RequestValidator.parseComparisonRequest(params);
    const result = await deps.generator.compare(request);
    return json(toComparisonPayload(result));
  } catch (error) {
    return jsonError(error);
  }
}

/** Capture metadata without the raw payloads. */
function toComparisonPayload(result: ComparisonResult) {
  return {
    request: result.request,
    captures: result.captures.map(capture => ({
      url: capture.url,
      timestamp: capture.timestamp,
      contentType: capture.contentType,
      mementoUrl: capture.mementoUrl,
      status: capture.status,
      fetchedAt: capture.fetchedAt
    })),
    passthrough: result.documents.map(document => document.passthrough),
    operations: result.operations,
    view: result.view
  };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

function jsonError(error: unknown): Response {
  const { kind, status, message } = describeError(error);
  if (status >= 500) {
    console.error('API request failed:', error);
  }
  return json({ error: message, kind }, status);
}

function html(body: string, status = 200): Response {
  return new Response(body, { status, headers: HTML_HEADERS });
}
