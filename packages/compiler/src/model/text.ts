// Canonical text/offset helpers to avoid ad-hoc span math across layers.

/** Half-open range `[offset, offset + length)` over a document's UTF-16 code units. */
export interface TextSpan {
  readonly offset: number;
  readonly length: number;
}

export interface Position {
  line: number;
  character: number;
}

export interface TextRange {
  start: Position;
  end: Position;
}

export function spanFromBounds(start: number, end: number): TextSpan {
  return { offset: start, length: Math.max(0, end - start) };
}

export function spanEnd(span: TextSpan): number {
  return span.offset + span.length;
}

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charCodeAt(i);
    if (ch === 13 /* CR */ || ch === 10 /* LF */) {
      if (ch === 13 /* CR */ && text.charCodeAt(i + 1) === 10 /* LF */) i += 1;
      starts.push(i + 1);
    }
  }
  return starts;
}

/** Line/character of an offset; offsets past the last line start land on the last line. */
export function positionAt(lineStarts: readonly number[], offset: number): Position {
  const clamped = Math.max(0, offset);
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((lineStarts[mid] ?? Number.POSITIVE_INFINITY) <= clamped) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return { line: low, character: clamped - (lineStarts[low] ?? 0) };
}

/**
 * Offset of a position. Lines past the end clamp to the end of `text`; characters
 * past the end of a line clamp to the end of its content, before the line break.
 */
export function offsetAt(lineStarts: readonly number[], position: Position, text: string): number {
  if (position.line < 0) return 0;
  const lineStart = lineStarts[position.line];
  if (lineStart === undefined) return text.length;
  let contentEnd = lineStarts[position.line + 1] ?? text.length;
  if (contentEnd > lineStart && text.charCodeAt(contentEnd - 1) === 10 /* LF */) contentEnd -= 1;
  if (contentEnd > lineStart && text.charCodeAt(contentEnd - 1) === 13 /* CR */) contentEnd -= 1;
  return Math.min(contentEnd, lineStart + Math.max(0, position.character));
}

export function spanToRange(span: TextSpan, lineStarts: readonly number[]): TextRange {
  return {
    start: positionAt(lineStarts, span.offset),
    end: positionAt(lineStarts, spanEnd(span)),
  };
}
