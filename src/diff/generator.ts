import type { CaptureEntry, ContentType, ListCapturesOptions, SnapshotIndex, SnapshotSource } from '../types/archive';
import type { ComparisonRequest, ComparisonResult, DiffEngine } from '../types/diff';
import { ContentNormalizer } from './normalizer';
import { DiffPresenter } from './presenter';

export interface DiffGeneratorDeps {
  index: SnapshotIndex;
  fetcher: SnapshotSource;
  normalizer: ContentNormalizer;
  engine: DiffEngine;
}

export class DiffGenerator {
  private readonly index: SnapshotIndex;
  private readonly fetcher: SnapshotSource;
  private readonly normalizer: ContentNormalizer;
  private readonly engine: DiffEngine;

  constructor(deps: DiffGeneratorDeps) {
    this.index = deps.index;
    this.fetcher = deps.fetcher;
    this.normalizer = deps.normalizer;
    this.engine = deps.engine;
  }

  async listCaptures(url: string, options?: ListCapturesOptions): Promise<CaptureEntry[]> {
    return this.index.listCaptures(url, options);
  }

  /**
   * Fetches both versions, normalizes them as one content type and diffs them.
   * Any failure aborts the comparison; there is no partial result.
   */
  async compare(request: ComparisonRequest): Promise<ComparisonResult> {
    const startTime = Date.now();
    const fetchOptions = request.contentType ? { contentType: request.contentType } : {};

    // One at a time, so a failing first fetch never issues the second.
    const before = await this.fetcher.fetchCapture(request.url, request.from, fetchOptions);
    const after = await this.fetcher.fetchCapture(request.url, request.to, fetchOptions);

    const contentType = this.chooseContentType(request.contentType, before.contentType, after.contentType);

    const docA = await this.normalizer.normalize(before, contentType);
    const docB = await this.normalizer.normalize(after, contentType);

    const operations = this.engine.diff(docA, docB);
    const view = DiffPresenter.render(docA, docB, operations, request.viewMode);

    const { linesAdded, linesRemoved, identical } = view.summary;
    console.log(
      `Compared ${request.url} ${before.timestamp} -> ${after.timestamp}: ` +
      (identical ? 'identical' : `+${linesAdded} -${linesRemoved} lines`) +
      ` (${Date.now() - startTime}ms)`
    );

    return {
      request,
      captures: [before, after],
      documents: [docA, docB],
      operations,
      view
    };
  }

  /** Undefined when neither side has a known type; the normalizer then rejects it. */
  private chooseContentType(
    override: ContentType | undefined,
    first: ContentType | 'unknown',
    second: ContentType | 'unknown'
  ): ContentType | undefined {
    if (override) return override;
    if (first !== 'unknown') return first;
    if (second !== 'unknown') return second;
    return undefined;
  }
}
