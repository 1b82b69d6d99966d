/**
 * Defines the severity levels for quire errors.
 */
export enum ErrorSeverity {
  /** The operation can potentially continue */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
  /** Informational message, not strictly an error */
  Info = 'info',
  /** Warning message */
  Warning = 'warning',
}

import type { Span } from '@core/types/span';
import { formatSpan } from '@core/utils/locationFormatter';

/**
 * Base interface for quire error details.
 * Specific error types should extend this.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating a QuireError instance.
 */
export interface QuireErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  span?: Span;
  cause?: unknown;
}

/**
 * Base class for all errors thrown by quire.
 *
 * Only programming errors and abandoned layouts are thrown. Problems found in
 * the document itself travel as diagnostics inside a `Feedback` bundle.
 */
export class QuireError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;
  /** Optional source span where the error occurred */
  public readonly span?: Span;

  constructor(message: string, options: QuireErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;
    this.span = options.span;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Recoverable errors and explicit warnings may be reported as warnings
   * instead of aborting.
   */
  public canBeWarning(): boolean {
    return (
      this.severity === ErrorSeverity.Recoverable ||
      this.severity === ErrorSeverity.Warning
    );
  }

  public toString(): string {
    let result = `[${this.code}] ${this.message}`;

    if (this.span) {
      result += ` at ${formatSpan(this.span)}`;
    }

    result += ` (Severity: ${this.severity})`;
    return result;
  }

  /**
   * Serializes the error to JSON with a formatted span string.
   */
  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
    };

    if (this.details) {
      result.details = this.details;
    }

    if (this.span) {
      result.span = formatSpan(this.span);
    }

    return result;
  }
}
