import { QuireError, ErrorSeverity } from './QuireError';
import type { Position } from '@core/types/span';
import { formatPosition } from '@core/utils/locationFormatter';

/**
 * Thrown when a span is built with its end before its start.
 */
export class SpanError extends QuireError {
  constructor(start: Position, end: Position) {
    super(`Span end ${formatPosition(end)} lies before its start ${formatPosition(start)}`, {
      code: 'INVALID_SPAN',
      severity: ErrorSeverity.Fatal,
      details: { start, end }
    });
  }
}
