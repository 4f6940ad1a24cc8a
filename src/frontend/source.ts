import type { SourcePosition, SourceSpan } from './ast.js';

/**
 * Program text indexed by line, so token offsets can be reported as line/column positions.
 */
export interface SourceFile {
  path: string;
  text: string;
  /** Offset of the first character of each line; `lineStarts[0]` is 0. */
  lineStarts: number[];
}

export function makeSourceFile(path: string, text: string): SourceFile {
  const lineStarts = [0];
  for (const m of text.matchAll(/\n/g)) {
    lineStarts.push((m.index ?? 0) + 1);
  }
  return { path, text, lineStarts };
}

/**
 * Index of the last line starting at or before `offset`.
 */
function lineIndexAt(lineStarts: number[], offset: number): number {
  let found = 0;
  let left = 1;
  let right = lineStarts.length;
  while (left < right) {
    const probe = (left + right) >>> 1;
    if ((lineStarts[probe] ?? Infinity) <= offset) {
      found = probe;
      left = probe + 1;
    } else {
      right = probe;
    }
  }
  return found;
}

/**
 * 1-based line/column for a 0-based offset. Offsets past the end land on the end of the text.
 */
export function posAtOffset(file: SourceFile, offset: number): SourcePosition {
  const at = offset < 0 ? 0 : Math.min(offset, file.text.length);
  const index = lineIndexAt(file.lineStarts, at);
  const column = at - (file.lineStarts[index] ?? 0) + 1;
  return { line: index + 1, column, offset: at };
}

/**
 * Span for the half-open offset range `[startOffset, endOffset)`.
 */
export function span(file: SourceFile, startOffset: number, endOffset: number): SourceSpan {
  const start = posAtOffset(file, startOffset);
  const end = posAtOffset(file, endOffset);
  return { file: file.path, start, end };
}

export function joinSpans(from: SourceSpan, to: SourceSpan): SourceSpan {
  return { file: from.file, start: from.start, end: to.end };
}
