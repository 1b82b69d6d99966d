import type { Position, Span } from '@core/types/span';

/**
 * Positions are stored zero-based; everything shown to a person is one-based.
 */
export function formatPosition(position: Position): string {
  return `${position.line + 1}:${position.column + 1}`;
}

export function formatSpan(span: Span): string {
  return `${formatPosition(span.start)}-${formatPosition(span.end)}`;
}
