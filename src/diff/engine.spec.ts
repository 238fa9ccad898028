import { describe, it, expect } from 'vitest';
import { LineDiffEngine, MAX_ENCODED_LINES, applyEditScript, diffInline } from './engine';
import { DiffComputeError } from '../errors';
import type { NormalizedDocument } from '../types/diff';
import type { ContentType } from '../types/archive';

function doc(lines: string[], contentType: ContentType = 'html'): NormalizedDocument {
  return {
    lines,
    contentType,
    source: { url: 'https://example.com/', timestamp: '20240101000000' },
    passthrough: false
  };
}

const BEFORE = ['<html>', '  <body>', '    <div class="a">', '      hello', '    </div>', '  </body>', '</html>'];
const AFTER = ['<html>', '  <body>', '    <div class="b">', '      hello', '    </div>', '    <p>new</p>', '  </body>', '</html>'];

describe('LineDiffEngine', () => {
  const engine = new LineDiffEngine();

  it('describes a changed line as a delete followed by an insert', () => {
    expect(engine.diff(doc(BEFORE), doc(AFTER))).toEqual([
      { kind: 'equal', lines: ['<html>', '  <body>'] },
      { kind: 'delete', lines: ['    <div class="a">'] },
      { kind: 'insert', lines: ['    <div class="b">'] },
      { kind: 'equal', lines: ['      hello', '    </div>'] },
      { kind: 'insert', lines: ['    <p>new</p>'] },
      { kind: 'equal', lines: ['  </body>', '</html>'] }
    ]);
  });

  it('produces a script that turns the first document into the second', () => {
    const operations = engine.diff(doc(BEFORE), doc(AFTER));
    expect(applyEditScript(BEFORE, operations)).toEqual(AFTER);

    const reverse = engine.diff(doc(AFTER), doc(BEFORE));
    expect(applyEditScript(AFTER, reverse)).toEqual(BEFORE);
  });

  it('reports identical documents as a single equal run', () => {
    expect(engine.diff(doc(BEFORE), doc(BEFORE))).toEqual([{ kind: 'equal', lines: BEFORE }]);
  });

  it('handles empty documents', () => {
    expect(engine.diff(doc([]), doc([]))).toEqual([]);
    expect(engine.diff(doc([]), doc(['a', 'b']))).toEqual([{ kind: 'insert', lines: ['a', 'b'] }]);
    expect(engine.diff(doc(['a']), doc([]))).toEqual([{ kind: 'delete', lines: ['a'] }]);
  });

  it('keeps blank lines', () => {
    const operations = engine.diff(doc(['a', '', 'b']), doc(['a', '', '', 'b']));
    expect(applyEditScript(['a', '', 'b'], operations)).toEqual(['a', '', '', 'b']);
  });

  it('rejects documents of different types', () => {
    expect(() => engine.diff(doc(['a'], 'css'), doc(['a'], 'js'))).toThrow('cannot diff css against js');
  });

  it('rejects oversized input', () => {
    const small = new LineDiffEngine({ maxChars: 10 });
    expect(() => small.diff(doc(['0123456789']), doc(['x']))).toThrow(DiffComputeError);
  });

  it('rejects binary content', () => {
    expect(() => engine.diff(doc(['PNG\u0000']), doc(['a']))).toThrow('content looks binary');
  });

  it('diffs documents with more distinct lines than fit one code unit each', () => {
    const before = Array.from({ length: 70000 }, (_, i) => `line ${i}`);
    const after = [...before];
    after[50000] = 'changed 50000';
    after[69000] = 'changed 69000';

    const operations = engine.diff(doc(before), doc(after));

    expect(operations.map(operation => [operation.kind, operation.lines.length])).toEqual([
      ['equal', 50000],
      ['delete', 1],
      ['insert', 1],
      ['equal', 18999],
      ['delete', 1],
      ['insert', 1],
      ['equal', 999]
    ]);
    expect(operations[1].lines).toEqual(['line 50000']);
    expect(operations[2].lines).toEqual(['changed 50000']);
    expect(applyEditScript(before, operations)).toEqual(after);
  });

  it('refuses large, completely different documents without diffing them', () => {
    const before = Array.from({ length: 30000 }, (_, i) => `old line ${i}`);
    const after = Array.from({ length: 30000 }, (_, i) => `new line ${i}`);

    const startTime = Date.now();
    expect(() => engine.diff(doc(before), doc(after))).toThrow(
      'changes too extensive to diff (60000 changed lines, cost 3600000000, limit 200000000)'
    );
    expect(Date.now() - startTime).toBeLessThan(2000);
  });

  it('gives up when the diff runs past its deadline', () => {
    const before = Array.from({ length: 5000 }, (_, i) => `line ${i}`);
    const after = [...before].reverse();
    const hurried = new LineDiffEngine({ timeoutMs: 1 });

    expect(() => hurried.diff(doc(before), doc(after))).toThrow('diff did not finish within 1ms');
  });

  it('refuses more distinct changed lines than it can encode', () => {
    const before = Array.from({ length: MAX_ENCODED_LINES + 1 }, (_, i) => `${i}`);
    const after = [...before].reverse();

    expect(() => engine.diff(doc(before), doc(after))).toThrow(
      `too many distinct changed lines to diff (limit ${MAX_ENCODED_LINES})`
    );
  });
});

describe('applyEditScript', () => {
  it('throws when the script does not match the source', () => {
    expect(() => applyEditScript(['a', 'b'], [{ kind: 'equal', lines: ['a', 'c'] }])).toThrow(
      'edit script does not match the source at line 2'
    );
    expect(() => applyEditScript(['a', 'b'], [{ kind: 'equal', lines: ['a'] }])).toThrow(
      'edit script covers 1 of 2 source lines'
    );
  });
});

describe('diffInline', () => {
  it('marks the changed characters on each side', () => {
    expect(diffInline('<div class="a">', '<div class="b">')).toEqual({
      removed: [
        { text: '<div class="', changed: false },
        { text: 'a', changed: true },
        { text: '">', changed: false }
      ],
      added: [
        { text: '<div class="', changed: false },
        { text: 'b', changed: true },
        { text: '">', changed: false }
      ]
    });
  });

  it('treats very long lines as wholly changed', () => {
    const before = 'a'.repeat(15000);
    const after = 'b'.repeat(15000);
    expect(diffInline(before, after)).toEqual({
      removed: [{ text: before, changed: true }],
      added: [{ text: after, changed: true }]
    });
  });
});
