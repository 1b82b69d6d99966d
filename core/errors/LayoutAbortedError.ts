import { QuireError, ErrorSeverity } from './QuireError';
import type { Span } from '@core/types/span';

/**
 * Thrown by the layout driver when the layout context's signal is aborted.
 * Commands already handed to the sink stay delivered; the tree is untouched.
 */
export class LayoutAbortedError extends QuireError {
  constructor(options: { span?: Span; cause?: unknown } = {}) {
    super('Layout was abandoned', {
      code: 'LAYOUT_ABORTED',
      severity: ErrorSeverity.Recoverable,
      span: options.span,
      cause: options.cause
    });
  }
}
