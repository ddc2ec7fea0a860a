import { offsetAt, spanEnd, spanToRange, type Position, type TextRange, type TextSpan } from "../model/text.js";

/** Replace `span` of a document with `text`. */
export interface CodeReplacement {
  readonly span: TextSpan;
  readonly text: string;
}

/** One text edit addressed to a document, ready for the editor. */
export interface EditDescriptor {
  readonly uri: string;
  readonly range: TextRange;
  readonly newText: string;
}

/**
 * Zero-length replacement at `offset`: inserts `text`, deletes nothing.
 * Throws RangeError when `offset` falls outside a document of `documentLength`.
 */
export function makeInsertion(offset: number, text: string, documentLength: number): CodeReplacement {
  const replacement: CodeReplacement = { span: { offset, length: 0 }, text };
  assertWithinDocument(replacement, documentLength);
  return replacement;
}

export function assertWithinDocument(replacement: CodeReplacement, documentLength: number): void {
  const { offset, length } = replacement.span;
  if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0) {
    throw new RangeError(`Invalid replacement span (offset ${offset}, length ${length})`);
  }
  if (spanEnd(replacement.span) > documentLength) {
    throw new RangeError(
      `Replacement span (offset ${offset}, length ${length}) exceeds document length ${documentLength}`,
    );
  }
}

export function replacementToRange(replacement: CodeReplacement, lineStarts: readonly number[]): TextRange {
  return spanToRange(replacement.span, lineStarts);
}

/** Caret position to document offset, clamped to the line and the document. */
export function offsetAtPosition(lineStarts: readonly number[], position: Position, text: string): number {
  return offsetAt(lineStarts, position, text);
}

export function applyReplacement(text: string, replacement: CodeReplacement): string {
  assertWithinDocument(replacement, text.length);
  const { offset } = replacement.span;
  return text.slice(0, offset) + replacement.text + text.slice(spanEnd(replacement.span));
}

export function createEditDescriptor(
  uri: string,
  replacement: CodeReplacement,
  lineStarts: readonly number[],
): EditDescriptor {
  return { uri, range: replacementToRange(replacement, lineStarts), newText: replacement.text };
}
