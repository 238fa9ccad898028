import { diff_match_patch, DIFF_DELETE, DIFF_INSERT, DIFF_EQUAL } from 'diff-match-patch';
import type { DiffEngine, EditKind, EditOperation, NormalizedDocument, Segment } from '../types/diff';
import { DiffComputeError } from '../errors';

export interface LineDiffEngineOptions {
  maxChars?: number;
  /** Upper bound on (changed lines) x (lines known to differ) before diffing. */
  maxCost?: number;
  /** Wall-clock budget for one diff; exceeding it is a DiffComputeError. */
  timeoutMs?: number;
}

const DEFAULT_MAX_CHARS = 5000000;
const DEFAULT_MAX_COST = 200000000;
const DEFAULT_TIMEOUT_MS = 5000;
const MAX_INLINE_CHARS = 20000;

// One UTF-16 code unit per distinct line, skipping 0 and the surrogate block.
const SURROGATE_START = 0xd800;
const SURROGATE_SIZE = 0x800;
export const MAX_ENCODED_LINES = 0xffff - SURROGATE_SIZE;

function toKind(op: number): EditKind {
  if (op === DIFF_INSERT) return 'insert';
  if (op === DIFF_DELETE) return 'delete';
  return 'equal';
}

function createDmp(timeoutMs = 0): InstanceType<typeof diff_match_patch> {
  const dmp = new diff_match_patch();
  dmp.Diff_Timeout = timeoutMs / 1000;
  return dmp;
}

function lineCode(index: number): number {
  const code = index + 1;
  return code >= SURROGATE_START ? code + SURROGATE_SIZE : code;
}

interface EncodedLines {
  charsA: string;
  charsB: string;
  lineByCode: Map<number, string>;
}

function encodeLines(linesA: readonly string[], linesB: readonly string[]): EncodedLines {
  const codeByLine = new Map<string, number>();
  const lineByCode = new Map<number, string>();

  const encode = (lines: readonly string[]): string => {
    const codes: string[] = [];
    for (const line of lines) {
      let code = codeByLine.get(line);
      if (code === undefined) {
        if (codeByLine.size >= MAX_ENCODED_LINES) {
          throw new DiffComputeError(`too many distinct changed lines to diff (limit ${MAX_ENCODED_LINES})`);
        }
        code = lineCode(codeByLine.size);
        codeByLine.set(line, code);
        lineByCode.set(code, line);
      }
      codes.push(String.fromCharCode(code));
    }
    return codes.join('');
  };

  return { charsA: encode(linesA), charsB: encode(linesB), lineByCode };
}

function decodeLines(chars: string, lineByCode: Map<number, string>): string[] {
  const lines: string[] = [];
  for (let i = 0; i < chars.length; i++) {
    const line = lineByCode.get(chars.charCodeAt(i));
    if (line === undefined) {
      throw new DiffComputeError(`unknown line code at offset ${i}`);
    }
    lines.push(line);
  }
  return lines;
}

/**
 * Lines present more often on one side than the other. Every edit script
 * deletes or inserts at least this many lines.
 */
function minimumEdits(linesA: readonly string[], linesB: readonly string[]): number {
  const balance = new Map<string, number>();
  for (const line of linesA) balance.set(line, (balance.get(line) ?? 0) + 1);
  for (const line of linesB) balance.set(line, (balance.get(line) ?? 0) - 1);

  let total = 0;
  for (const count of balance.values()) total += Math.abs(count);
  return total;
}

function pushLines(operations: EditOperation[], kind: EditKind, lines: string[]): void {
  if (lines.length === 0) {
    return;
  }
  const last = operations[operations.length - 1];
  if (last && last.kind === kind) {
    last.lines.push(...lines);
  } else {
    operations.push({ kind, lines });
  }
}

/**
 * Line-granularity diff on diff-match-patch. Common leading and trailing
 * lines are split off, each remaining distinct line is encoded as a single
 * character, the encoded strings are diffed, cleaned up at line granularity
 * and decoded back to lines.
 */
export class LineDiffEngine implements DiffEngine {
  private readonly maxChars: number;
  private readonly maxCost: number;
  private readonly timeoutMs: number;

  constructor(options: LineDiffEngineOptions = {}) {
    this.maxChars = options.maxChars ?? DEFAULT_MAX_CHARS;
    this.maxCost = options.maxCost ?? DEFAULT_MAX_COST;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  diff(docA: NormalizedDocument, docB: NormalizedDocument): EditOperation[] {
    if (docA.contentType !== docB.contentType) {
      throw new DiffComputeError(`cannot diff ${docA.contentType} against ${docB.contentType}`);
    }

    const linesA = docA.lines;
    const linesB = docB.lines;

    let totalChars = linesA.length + linesB.length;
    for (const line of linesA) totalChars += line.length;
    for (const line of linesB) totalChars += line.length;
    if (totalChars > this.maxChars) {
      throw new DiffComputeError(`input too large to diff (${totalChars} characters, limit ${this.maxChars})`);
    }
    if (linesA.some(line => line.includes('\u0000')) || linesB.some(line => line.includes('\u0000'))) {
      throw new DiffComputeError('content looks binary');
    }

    const shorter = Math.min(linesA.length, linesB.length);
    let prefix = 0;
    while (prefix < shorter && linesA[prefix] === linesB[prefix]) {
      prefix++;
    }
    let suffix = 0;
    while (
      suffix < shorter - prefix &&
      linesA[linesA.length - 1 - suffix] === linesB[linesB.length - 1 - suffix]
    ) {
      suffix++;
    }

    const middleA = linesA.slice(prefix, linesA.length - suffix);
    const middleB = linesB.slice(prefix, linesB.length - suffix);

    const operations: EditOperation[] = [];
    pushLines(operations, 'equal', linesA.slice(0, prefix));
    for (const [kind, lines] of this.diffMiddle(middleA, middleB)) {
      pushLines(operations, kind, lines);
    }
    pushLines(operations, 'equal', linesA.slice(linesA.length - suffix));

    return operations;
  }

  private diffMiddle(linesA: string[], linesB: string[]): Array<[EditKind, string[]]> {
    if (linesA.length === 0 || linesB.length === 0) {
      return [['delete', linesA], ['insert', linesB]];
    }

    const changed = linesA.length + linesB.length;
    const cost = changed * minimumEdits(linesA, linesB);
    if (cost > this.maxCost) {
      throw new DiffComputeError(
        `changes too extensive to diff (${changed} changed lines, cost ${cost}, limit ${this.maxCost})`
      );
    }

    const { charsA, charsB, lineByCode } = encodeLines(linesA, linesB);

    const startTime = Date.now();
    const dmp = createDmp(this.timeoutMs);
    const diffs = dmp.diff_main(charsA, charsB, false);
    const elapsed = Date.now() - startTime;
    // Past the deadline diff-match-patch gives up on minimality; discard that.
    if (this.timeoutMs > 0 && elapsed >= this.timeoutMs) {
      throw new DiffComputeError(`diff did not finish within ${this.timeoutMs}ms`);
    }
    dmp.diff_cleanupSemantic(diffs);

    return diffs.map(([op, chars]): [EditKind, string[]] => [toKind(op), decodeLines(chars, lineByCode)]);
  }
}

/**
 * Replays an edit script against `source`. Throws if an equal or delete
 * operation does not match the source lines it claims to cover.
 */
export function applyEditScript(source: readonly string[], operations: readonly EditOperation[]): string[] {
  const result: string[] = [];
  let cursor = 0;

  for (const operation of operations) {
    if (operation.kind === 'insert') {
      result.push(...operation.lines);
      continue;
    }

    for (const line of operation.lines) {
      if (source[cursor] !== line) {
        throw new DiffComputeError(`edit script does not match the source at line ${cursor + 1}`);
      }
      if (operation.kind === 'equal') {
        result.push(line);
      }
      cursor++;
    }
  }

  if (cursor !== source.length) {
    throw new DiffComputeError(`edit script covers ${cursor} of ${source.length} source lines`);
  }

  return result;
}

/** Character-level diff of one changed line pair, split into per-side segments. */
export function diffInline(before: string, after: string): { removed: Segment[]; added: Segment[] } {
  if (before.length + after.length > MAX_INLINE_CHARS) {
    return {
      removed: before ? [{ text: before, changed: true }] : [],
      added: after ? [{ text: after, changed: true }] : []
    };
  }

  const dmp = createDmp();
  const diffs = dmp.diff_main(before, after);
  dmp.diff_cleanupSemantic(diffs);

  const removed: Segment[] = [];
  const added: Segment[] = [];

  const push = (segments: Segment[], text: string, changed: boolean) => {
    const last = segments[segments.length - 1];
    if (last && last.changed === changed) {
      last.text += text;
    } else {
      segments.push({ text, changed });
    }
  };

  for (const [op, text] of diffs) {
    if (op === DIFF_EQUAL) {
      push(removed, text, false);
      push(added, text, false);
    } else if (op === DIFF_DELETE) {
      push(removed, text, true);
    } else {
      push(added, text, true);
    }
  }

  return { removed, added };
}
