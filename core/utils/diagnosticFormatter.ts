import chalk from 'chalk';
import type { Diagnostic, Feedback } from '@core/types/feedback';
import type { Spanned } from '@core/types/span';
import { formatSpan } from './locationFormatter';

export interface DiagnosticDisplayOptions {
  useColors?: boolean;
  /** The document the spans point into; enables the source line and caret. */
  source?: string;
}

function colorLevel(diagnostic: Diagnostic, useColors: boolean): string {
  if (!useColors) {
    return diagnostic.level;
  }
  return diagnostic.level === 'error'
    ? chalk.red.bold(diagnostic.level)
    : chalk.yellow.bold(diagnostic.level);
}

/**
 * Renders the source line a span starts on with a caret run underneath it.
 * Spans reaching past the line are underlined up to its end.
 */
function formatSourceExcerpt(diagnostic: Spanned<Diagnostic>, source: string, useColors: boolean): string | undefined {
  const { start, end } = diagnostic.span;
  const lines = source.split('\n');
  if (start.line >= lines.length) {
    return undefined;
  }

  const line = lines[start.line];
  const lastColumn = end.line === start.line ? end.column : line.length;
  const width = Math.max(1, lastColumn - start.column);
  const gutter = String(start.line + 1).padStart(4, ' ');
  const marker = '^'.repeat(width);

  return [
    `${gutter} | ${line}`,
    `${' '.repeat(gutter.length)} | ${' '.repeat(start.column)}${useColors ? chalk.red(marker) : marker}`
  ].join('\n');
}

export function formatDiagnostic(diagnostic: Spanned<Diagnostic>, options: DiagnosticDisplayOptions = {}): string {
  const { useColors = false, source } = options;
  const location = formatSpan(diagnostic.span);
  const header = `${colorLevel(diagnostic.value, useColors)}: ${diagnostic.value.message} ` +
    (useColors ? chalk.dim(`(at ${location})`) : `(at ${location})`);

  if (source === undefined) {
    return header;
  }

  const excerpt = formatSourceExcerpt(diagnostic, source, useColors);
  return excerpt ? `${header}\n${excerpt}` : header;
}

/** One entry per diagnostic, in the order they were gathered. */
export function formatFeedback(feedback: Feedback, options: DiagnosticDisplayOptions = {}): string {
  return feedback.diagnostics
    .map(diagnostic => formatDiagnostic(diagnostic, options))
    .join('\n');
}
