import type {
  DiffSummary,
  DiffView,
  EditOperation,
  InlineRow,
  NormalizedDocument,
  Segment,
  SideBySideRow,
  SideCell,
  ViewMode
} from '../types/diff';
import { DiffComputeError } from '../errors';
import { diffInline } from './engine';

interface NumberedLine {
  line: number;
  text: string;
}

/** One equal run, or one run of adjacent deletes and inserts. */
type Block =
  | { kind: 'equal'; lines: Array<{ oldLine: number; newLine: number; text: string }> }
  | { kind: 'change'; removed: NumberedLine[]; added: NumberedLine[] };

interface PairedChange {
  removed: Array<NumberedLine & { segments: Segment[] }>;
  added: Array<NumberedLine & { segments: Segment[] }>;
}

export class DiffPresenter {
  static render(
    docA: NormalizedDocument,
    docB: NormalizedDocument,
    operations: readonly EditOperation[],
    viewMode: ViewMode
  ): DiffView {
    const blocks = this.toBlocks(docA, docB, operations);
    const summary = this.summarize(blocks);

    if (viewMode === 'side-by-side') {
      return { mode: 'side-by-side', rows: this.sideBySideRows(blocks), summary };
    }
    return { mode: 'inline', rows: this.inlineRows(blocks), summary };
  }

  private static toBlocks(
    docA: NormalizedDocument,
    docB: NormalizedDocument,
    operations: readonly EditOperation[]
  ): Block[] {
    const blocks: Block[] = [];
    let oldLine = 1;
    let newLine = 1;

    for (const operation of operations) {
      if (operation.kind === 'equal') {
        const lines = operation.lines.map(text => ({ oldLine: oldLine++, newLine: newLine++, text }));
        blocks.push({ kind: 'equal', lines });
        continue;
      }

      let block = blocks[blocks.length - 1];
      if (!block || block.kind !== 'change') {
        block = { kind: 'change', removed: [], added: [] };
        blocks.push(block);
      }

      for (const text of operation.lines) {
        if (operation.kind === 'delete') {
          block.removed.push({ line: oldLine++, text });
        } else {
          block.added.push({ line: newLine++, text });
        }
      }
    }

    if (oldLine - 1 !== docA.lines.length || newLine - 1 !== docB.lines.length) {
      throw new DiffComputeError(
        `edit script covers ${oldLine - 1}/${docA.lines.length} old and ${newLine - 1}/${docB.lines.length} new lines`
      );
    }

    return blocks;
  }

  /** Pairs removed and added lines in order; each pair gets intra-line segments. */
  private static pairChange(removed: NumberedLine[], added: NumberedLine[]): PairedChange {
    const whole = (text: string): Segment[] => (text ? [{ text, changed: true }] : []);
    const result: PairedChange = {
      removed: removed.map(entry => ({ ...entry, segments: whole(entry.text) })),
      added: added.map(entry => ({ ...entry, segments: whole(entry.text) }))
    };

    const pairs = Math.min(removed.length, added.length);
    for (let i = 0; i < pairs; i++) {
      const inline = diffInline(removed[i].text, added[i].text);
      result.removed[i].segments = inline.removed;
      result.added[i].segments = inline.added;
    }

    return result;
  }

  private static inlineRows(blocks: Block[]): InlineRow[] {
    const rows: InlineRow[] = [];

    for (const block of blocks) {
      if (block.kind === 'equal') {
        for (const entry of block.lines) {
          rows.push({
            kind: 'equal',
            oldLine: entry.oldLine,
            newLine: entry.newLine,
            segments: this.plain(entry.text)
          });
        }
        continue;
      }

      const paired = this.pairChange(block.removed, block.added);
      for (const entry of paired.removed) {
        rows.push({ kind: 'delete', oldLine: entry.line, newLine: null, segments: entry.segments });
      }
      for (const entry of paired.added) {
        rows.push({ kind: 'insert', oldLine: null, newLine: entry.line, segments: entry.segments });
      }
    }

    return rows;
  }

  private static sideBySideRows(blocks: Block[]): SideBySideRow[] {
    const rows: SideBySideRow[] = [];

    for (const block of blocks) {
      if (block.kind === 'equal') {
        for (const entry of block.lines) {
          rows.push({
            left: { kind: 'equal', line: entry.oldLine, segments: this.plain(entry.text) },
            right: { kind: 'equal', line: entry.newLine, segments: this.plain(entry.text) }
          });
        }
        continue;
      }

      const paired = this.pairChange(block.removed, block.added);
      const height = Math.max(paired.removed.length, paired.added.length);
      for (let i = 0; i < height; i++) {
        const removed = paired.removed[i];
        const added = paired.added[i];
        const left: SideCell | null = removed
          ? { kind: 'delete', line: removed.line, segments: removed.segments }
          : null;
        const right: SideCell | null = added
          ? { kind: 'insert', line: added.line, segments: added.segments }
          : null;
        rows.push({ left, right });
      }
    }

    return rows;
  }

  private static plain(text: string): Segment[] {
    return text ? [{ text, changed: false }] : [];
  }

  private static summarize(blocks: Block[]): DiffSummary {
    let linesAdded = 0;
    let linesRemoved = 0;
    let linesUnchanged = 0;

    for (const block of blocks) {
      if (block.kind === 'equal') {
        linesUnchanged += block.lines.length;
      } else {
        linesAdded += block.added.length;
        linesRemoved += block.removed.length;
      }
    }

    return {
      linesAdded,
      linesRemoved,
      linesUnchanged,
      identical: linesAdded === 0 && linesRemoved === 0
    };
  }
}
