import type { DiffSummary, DiffView, EditKind, InlineRow, Segment, SideBySideRow, SideCell } from '../types/diff';

export interface DiffDocumentMeta {
  url: string;
  from: string;
  to: string;
}

const DIFF_STYLES = `
    #diff-container { font-family: 'SF Mono', Monaco, 'Cascadia Code', monospace; font-size: 13px; background: #fbfbfb; border-collapse: collapse; width: 100%; }
    #diff-container .line { display: flex; white-space: pre-wrap; word-break: break-all; }
    #diff-container .line-num { color: #999; padding: 0 10px; min-width: 48px; text-align: right; border-right: 1px solid #ececec; user-select: none; flex-shrink: 0; vertical-align: top; }
    #diff-container .code { padding: 0 10px; white-space: pre-wrap; word-break: break-all; vertical-align: top; }
    #diff-container .insert { background-color: #cfc; }
    #diff-container .delete { background-color: #fdd; }
    #diff-container .insert .changed { background-color: #8e8; }
    #diff-container .delete .changed { background-color: #f99; }
    #diff-container td.empty { background: #f0f0f0; }
    #diff-container td.code { width: 50%; }
    .diff-summary { display: flex; gap: 15px; margin-bottom: 10px; font-size: 14px; }
    .diff-summary .added { color: #166534; }
    .diff-summary .removed { color: #991b1b; }
    .diff-summary .unchanged { color: #666; }`;

const SIDEBAR_STYLES = `
    #sidebar { position: fixed; top: 0; right: 0; width: 20px; height: 100%; background-color: #ddd; opacity: 0.25; overflow: hidden; }
    #sidebar:hover { opacity: 1; }
    #sidebar .marker { width: 100%; cursor: pointer; }`;

// Draws one marker per diff line in the sidebar; clicking a marker scrolls to its line.
const MARKER_SCRIPT = `
    document.addEventListener('DOMContentLoaded', function() {
      const sidebar = document.getElementById('sidebar');
      const lines = document.querySelectorAll('#diff-container [data-kind]');
      if (!sidebar || lines.length === 0) return;

      const height = window.innerHeight / lines.length;
      const colors = { insert: 'green', delete: 'red', change: 'orange' };

      lines.forEach(function(line) {
        const marker = document.createElement('div');
        marker.className = 'marker';
        marker.style.height = height + 'px';
        marker.style.backgroundColor = colors[line.dataset.kind] || 'transparent';
        marker.addEventListener('click', function() {
          line.scrollIntoView({ behavior: 'smooth', block: 'center' });
        });
        sidebar.appendChild(marker);
      });
    });`;

export class DiffRenderer {
  static readonly STYLES = DIFF_STYLES;

  static escapeHtml(text: string): string {
    return text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&#39;');
  }

  /** Summary plus diff body, for embedding in the application page. */
  static renderFragment(view: DiffView): string {
    const body = view.mode === 'side-by-side'
      ? this.renderSideBySide(view.rows)
      : this.renderInline(view.rows);

    return `${this.renderSummary(view.summary)}\n${body}`;
  }

  /** A self-contained page with the line-number gutter and the change-marker sidebar. */
  static renderDocument(view: DiffView, meta: DiffDocumentMeta): string {
    const title = `${meta.url}: ${meta.from} vs ${meta.to}`;

    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${this.escapeHtml(title)}</title>
  <style>
    body { margin: 0; padding: 10px 30px 10px 10px; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #fbfbfb; color: #333; }
    h1 { font-size: 16px; font-weight: 600; margin-bottom: 10px; word-break: break-all; }${DIFF_STYLES}${SIDEBAR_STYLES}
  </style>
</head>
<body>
  <h1>${this.escapeHtml(title)}</h1>
  ${this.renderFragment(view)}
  <div id="sidebar"></div>
  <script>${MARKER_SCRIPT}
  </script>
</body>
</html>`;
  }

  static renderSummary(summary: DiffSummary): string {
    if (summary.identical) {
      return '<div class="diff-summary"><span class="unchanged">The content is the same.</span></div>';
    }

    return '<div class="diff-summary">' +
      `<span class="added">+${summary.linesAdded} added</span>` +
      `<span class="removed">-${summary.linesRemoved} removed</span>` +
      `<span class="unchanged">${summary.linesUnchanged} unchanged</span>` +
      '</div>';
  }

  private static renderInline(rows: InlineRow[]): string {
    const lines = rows.map(row => {
      const kindClass = row.kind === 'equal' ? '' : ` ${row.kind}`;
      return `<div class="line${kindClass}" data-kind="${row.kind}">` +
        `<span class="line-num">${row.oldLine ?? ''}</span>` +
        `<span class="line-num">${row.newLine ?? ''}</span>` +
        `<span class="code">${this.renderSegments(row.segments)}</span>` +
        '</div>';
    });

    return `<div id="diff-container" class="inline">\n${lines.join('\n')}\n</div>`;
  }

  private static renderSideBySide(rows: SideBySideRow[]): string {
    const lines = rows.map(row =>
      `<tr data-kind="${this.rowKind(row)}">${this.renderCell(row.left)}${this.renderCell(row.right)}</tr>`
    );

    return `<table id="diff-container" class="side-by-side">\n${lines.join('\n')}\n</table>`;
  }

  private static renderCell(cell: SideCell | null): string {
    if (!cell) {
      return '<td class="line-num empty"></td><td class="code empty"></td>';
    }

    const kindClass = cell.kind === 'equal' ? '' : ` ${cell.kind}`;
    return `<td class="line-num${kindClass}">${cell.line}</td>` +
      `<td class="code${kindClass}">${this.renderSegments(cell.segments)}</td>`;
  }

  private static rowKind(row: SideBySideRow): EditKind | 'change' {
    if (row.left && row.right && row.left.kind !== row.right.kind) {
      return 'change';
    }
    return row.left?.kind ?? row.right?.kind ?? 'equal';
  }

  private static renderSegments(segments: Segment[]): string {
    return segments
      .map(segment => segment.changed
        ? `<span class="changed">${this.escapeHtml(segment.text)}</span>`
        : this.escapeHtml(segment.text))
      .join('');
  }
}
