import type { Capture, ContentType } from './archive';

export type ViewMode = 'inline' | 'side-by-side';

export const VIEW_MODES: readonly ViewMode[] = ['inline', 'side-by-side'];

export type EditKind = 'equal' | 'insert' | 'delete';

export interface NormalizedDocument {
  readonly lines: readonly string[];
  readonly contentType: ContentType;
  readonly source: { url: string; timestamp: string };
  /** Set when formatting failed and the cleaned raw text was kept. */
  readonly passthrough: boolean;
}

export interface EditOperation {
  kind: EditKind;
  lines: string[];
}

export interface ComparisonRequest {
  url: string;
  from: string;
  to: string;
  contentType?: ContentType;
  viewMode: ViewMode;
}

export interface Segment {
  text: string;
  changed: boolean;
}

export interface InlineRow {
  kind: EditKind;
  oldLine: number | null;
  newLine: number | null;
  segments: Segment[];
}

export interface SideCell {
  kind: EditKind;
  line: number;
  segments: Segment[];
}

export interface SideBySideRow {
  left: SideCell | null;
  right: SideCell | null;
}

export interface DiffSummary {
  linesAdded: number;
  linesRemoved: number;
  linesUnchanged: number;
  identical: boolean;
}

export type DiffView =
  | { mode: 'inline'; rows: InlineRow[]; summary: DiffSummary }
  | { mode: 'side-by-side'; rows: SideBySideRow[]; summary: DiffSummary };

export interface ComparisonResult {
  request: ComparisonRequest;
  captures: [Capture, Capture];
  documents: [NormalizedDocument, NormalizedDocument];
  operations: EditOperation[];
  view: DiffView;
}

export interface DiffEngine {
  diff(docA: NormalizedDocument, docB: NormalizedDocument): EditOperation[];
}
