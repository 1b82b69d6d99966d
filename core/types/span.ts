/**
 * Source spans and span-tagged values.
 *
 * Spans are opaque metadata to the syntax tree: nothing in the tree reads them
 * except to copy, compare or translate them.
 */

import { SpanError } from '@core/errors/SpanError';

/** A zero-based location in source text. */
export interface Position {
  line: number;
  column: number;
  offset: number;
}

/** A half-open range `[start, end)` of source text, with `start <= end`. */
export interface Span {
  start: Position;
  end: Position;
}

/** A value paired with the span of source it came from. */
export interface Spanned<T> {
  span: Span;
  value: T;
}

/** Span-tagged values in document order. */
export type SpanVec<T> = Spanned<T>[];

export const ZERO_POSITION: Readonly<Position> = Object.freeze({ line: 0, column: 0, offset: 0 });

export const ZERO_SPAN: Readonly<Span> = Object.freeze({ start: ZERO_POSITION, end: ZERO_POSITION });

export function createPosition(line: number, column: number, offset = 0): Position {
  return { line, column, offset };
}

/**
 * Orders positions by line, then column. Offsets are not consulted since a
 * parser may leave them at zero.
 */
export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) return a.line - b.line;
  return a.column - b.column;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.line === b.line && a.column === b.column && a.offset === b.offset;
}

export function createSpan(start: Position, end: Position): Span {
  if (comparePositions(start, end) > 0) {
    throw new SpanError(start, end);
  }
  return { start: { ...start }, end: { ...end } };
}

/** A zero-width span at `position`. */
export function spanAt(position: Position): Span {
  return { start: { ...position }, end: { ...position } };
}

export function spansEqual(a: Span, b: Span): boolean {
  return positionsEqual(a.start, b.start) && positionsEqual(a.end, b.end);
}

/** The smallest span covering both `a` and `b`. */
export function mergeSpans(a: Span, b: Span): Span {
  return {
    start: { ...(comparePositions(a.start, b.start) <= 0 ? a.start : b.start) },
    end: { ...(comparePositions(a.end, b.end) >= 0 ? a.end : b.end) }
  };
}

/** Grows `span` in place so that it also covers `other`. */
export function expandSpan(span: Span, other: Span): void {
  const merged = mergeSpans(span, other);
  span.start = merged.start;
  span.end = merged.end;
}

/**
 * Translates a position that was measured relative to `start`. Columns only
 * shift on the first line; later lines already start at column zero.
 */
export function offsetPosition(position: Position, start: Position): Position {
  return {
    line: start.line + position.line,
    column: position.line === 0 ? start.column + position.column : position.column,
    offset: start.offset + position.offset
  };
}

export function offsetSpan(span: Span, start: Position): Span {
  return {
    start: offsetPosition(span.start, start),
    end: offsetPosition(span.end, start)
  };
}

export function spanned<T>(value: T, span: Span): Spanned<T> {
  return { span, value };
}

export function zeroSpanned<T>(value: T): Spanned<T> {
  return { span: { start: { ...ZERO_POSITION }, end: { ...ZERO_POSITION } }, value };
}

/** Maps the value and keeps the span. */
export function mapSpanned<T, U>(item: Spanned<T>, fn: (value: T) => U): Spanned<U> {
  return { span: item.span, value: fn(item.value) };
}

export function offsetSpanned<T>(item: Spanned<T>, start: Position): Spanned<T> {
  return { span: offsetSpan(item.span, start), value: item.value };
}

export function offsetSpans<T>(items: SpanVec<T>, start: Position): SpanVec<T> {
  return items.map(item => offsetSpanned(item, start));
}
