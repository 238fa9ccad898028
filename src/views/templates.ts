import { LIVE_TIMESTAMP } from '../types/archive';
import type { CaptureEntry, ContentType } from '../types/archive';
import type { ComparisonRequest, ViewMode } from '../types/diff';
import { DiffRenderer } from '../diff/renderer';

export interface HomePageState {
  url?: string;
  days: number;
  captures?: CaptureEntry[];
  request?: ComparisonRequest;
  error?: string;
  /** Rendered diff fragment; only set on the compare page. */
  diffHtml?: string;
  comparisonError?: string;
}

const PAGE_STYLES = `
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #f5f5f5; color: #333; }
    .container { max-width: 1400px; margin: 0 auto; padding: 20px; }
    .header { background: white; padding: 20px; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); margin-bottom: 20px; }
    .header h1 { font-size: 24px; margin-bottom: 10px; }
    .header p { font-size: 14px; color: #666; line-height: 1.5; }
    .panel { background: white; padding: 20px; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); margin-bottom: 20px; }
    .panel h2 { font-size: 16px; margin-bottom: 12px; }
    .controls { display: flex; gap: 10px; flex-wrap: wrap; align-items: flex-end; }
    .control-group { display: flex; flex-direction: column; gap: 5px; font-size: 12px; color: #666; }
    input, select { padding: 8px 12px; border: 1px solid #ddd; border-radius: 4px; background: white; font-size: 14px; }
    input[name="url"] { min-width: 420px; }
    button { padding: 8px 16px; border: 1px solid #0066cc; border-radius: 4px; background: #0066cc; color: white; cursor: pointer; font-size: 14px; }
    button.secondary { background: white; color: #0066cc; }
    button:hover { opacity: 0.9; }
    .captures { max-height: 300px; overflow-y: auto; font-size: 13px; }
    .captures table { width: 100%; border-collapse: collapse; }
    .captures td { padding: 6px 10px; border-bottom: 1px solid #eee; }
    .captures a { color: #0066cc; text-decoration: none; }
    .empty-state { text-align: center; padding: 20px; color: #999; }
    .notice { background: #dcfce7; color: #166534; padding: 15px; border-radius: 8px; }
    .error { background: #fee2e2; color: #991b1b; padding: 15px; border-radius: 8px; margin-bottom: 20px; }
    @media (max-width: 768px) { .controls { flex-direction: column; align-items: stretch; } input[name="url"] { min-width: 0; } }`;

export class ViewTemplates {
  static homePage(state: HomePageState): string {
    const escape = (text: string) => DiffRenderer.escapeHtml(text);
    const sections: string[] = [this.urlForm(state)];

    if (state.error) {
      sections.push(`<div class="error">${escape(state.error)}</div>`);
    }

    if (state.url && state.captures) {
      sections.push(this.captureList(state.captures, state.days));
      sections.push(this.compareForm(state.url, state.days, state.captures, state.request));
    }

    if (state.comparisonError) {
      sections.push(`<div class="error">${escape(state.comparisonError)}</div>`);
    } else if (state.diffHtml !== undefined) {
      sections.push(`<div class="panel"><h2>Differences</h2>\n${state.diffHtml}\n</div>`);
    }

    return this.layout('Archive Diff', sections.join('\n'));
  }

  static errorPage(message: string): string {
    return this.layout('Archive Diff', `<div class="error">${DiffRenderer.escapeHtml(message)}</div>`);
  }

  private static layout(title: string, body: string): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${DiffRenderer.escapeHtml(title)}</title>
  <style>${PAGE_STYLES}${DiffRenderer.STYLES}
  </style>
</head>
<body>
  <div class="container">
    <div class="header">
      <h1>${DiffRenderer.escapeHtml(title)}</h1>
      <p>Compare two archived versions of a web page, or an archived version against the live page. HTML, CSS and JavaScript are reformatted first, so only real changes show up.</p>
    </div>
${body}
  </div>
</body>
</html>`;
  }

  private static urlForm(state: HomePageState): string {
    const url = state.url ? DiffRenderer.escapeHtml(state.url) : '';

    return `<form class="panel" method="get" action="/">
      <h2>1. Choose a page</h2>
      <div class="controls">
        <label class="control-group">URL
          <input type="url" name="url" value="${url}" placeholder="https://example.com/page" required>
        </label>
        <label class="control-group">History (days)
          <input type="number" name="days" value="${state.days}" min="1">
        </label>
        <button type="submit">List captures</button>
      </div>
    </form>`;
  }

  private static captureList(captures: CaptureEntry[], days: number): string {
    if (captures.length === 0) {
      return `<div class="panel"><div class="empty-state">No captures in the last ${days} days. Widen the history or compare against the live page.</div></div>`;
    }

    const rows = [...captures].reverse().map(capture =>
      `<tr><td>${DiffRenderer.escapeHtml(capture.capturedAt)}</td>` +
      `<td><a href="${DiffRenderer.escapeHtml(capture.mementoUrl)}" target="_blank" rel="noopener">${capture.timestamp}</a></td></tr>`
    );

    return `<div class="panel">
      <h2>Captures (${captures.length})</h2>
      <div class="captures"><table>
${rows.join('\n')}
      </table></div>
    </div>`;
  }

  private static compareForm(
    url: string,
    days: number,
    captures: CaptureEntry[],
    request?: ComparisonRequest
  ): string {
    const newestFirst = [...captures].reverse();
    // Default to the two most recent captures, or the latest against the live page.
    const defaultTo = newestFirst.length > 1 ? newestFirst[0].timestamp : LIVE_TIMESTAMP;
    const defaultFrom = newestFirst.length > 1 ? newestFirst[1].timestamp : (newestFirst[0]?.timestamp ?? LIVE_TIMESTAMP);

    const from = request?.from ?? defaultFrom;
    const to = request?.to ?? defaultTo;
    const contentType = request?.contentType;
    const viewMode = request?.viewMode ?? 'inline';

    return `<form class="panel" method="get" action="/compare">
      <h2>2. Compare two versions</h2>
      <input type="hidden" name="url" value="${DiffRenderer.escapeHtml(url)}">
      <input type="hidden" name="days" value="${days}">
      <div class="controls">
        <label class="control-group">From
          <select name="from">${this.timestampOptions(newestFirst, from)}</select>
        </label>
        <label class="control-group">To
          <select name="to">${this.timestampOptions(newestFirst, to)}</select>
        </label>
        <label class="control-group">Content type
          <select name="type">${this.contentTypeOptions(contentType)}</select>
        </label>
        <label class="control-group">View
          <select name="view">${this.viewModeOptions(viewMode)}</select>
        </label>
        <button type="submit">Compare</button>
        <button type="submit" class="secondary" formaction="/diff" formtarget="_blank">Open in new window</button>
      </div>
    </form>`;
  }

  private static timestampOptions(captures: CaptureEntry[], selected: string): string {
    const values = [LIVE_TIMESTAMP, ...captures.map(capture => capture.timestamp)];
    if (!values.includes(selected)) {
      values.push(selected);
    }

    return values
      .map(value => {
        const label = value === LIVE_TIMESTAMP ? 'Live version' : value;
        return this.option(value, label, value === selected);
      })
      .join('');
  }

  private static contentTypeOptions(selected: ContentType | undefined): string {
    const choices: Array<[string, string]> = [['auto', 'Detect'], ['html', 'HTML'], ['css', 'CSS'], ['js', 'JavaScript']];
    return choices.map(([value, label]) => this.option(value, label, value === (selected ?? 'auto'))).join('');
  }

  private static viewModeOptions(selected: ViewMode): string {
    const choices: Array<[ViewMode, string]> = [['inline', 'Inline'], ['side-by-side', 'Side by side']];
    return choices.map(([value, label]) => this.option(value, label, value === selected)).join('');
  }

  private static option(value: string, label: string, selected: boolean): string {
    const escaped = DiffRenderer.escapeHtml(value);
    return `<option value="${escaped}"${selected ? ' selected' : ''}>${DiffRenderer.escapeHtml(label)}</option>`;
  }
}
