import { describe, it, expect, afterEach } from 'vitest';
import chalk from 'chalk';
import { formatDiagnostic, formatFeedback } from './diagnosticFormatter';
import { createFeedback, error, warning } from '@core/types/feedback';
import { createPosition, createSpan } from '@core/types/span';

const blabla = error(createSpan(createPosition(0, 5, 5), createPosition(0, 11, 11)), 'unknown function: `blabla`');

describe('formatDiagnostic', () => {
  const originalLevel = chalk.level;

  afterEach(() => {
    chalk.level = originalLevel;
  });

  it('renders level, message and one-based location', () => {
    expect(formatDiagnostic(blabla)).toBe('error: unknown function: `blabla` (at 1:6-1:12)');
  });

  it('underlines the span in the source line', () => {
    const output = formatDiagnostic(blabla, { source: 'see [blabla]\nnext line' });

    expect(output.split('\n')).toEqual([
      'error: unknown function: `blabla` (at 1:6-1:12)',
      '   1 | see [blabla]',
      '    ' + ' | ' + ' '.repeat(5) + '^^^^^^'
    ]);
  });

  it('underlines to the end of the line for multi-line spans', () => {
    const diagnostic = warning(createSpan(createPosition(1, 2, 10), createPosition(2, 1, 15)), 'unclosed group');
    const output = formatDiagnostic(diagnostic, { source: 'first\nab{cd\ne}' });

    expect(output.split('\n')).toEqual([
      'warning: unclosed group (at 2:3-3:2)',
      '   2 | ab{cd',
      '    ' + ' | ' + '  ' + '^^^'
    ]);
  });

  it('marks zero-width spans with a single caret', () => {
    const diagnostic = error(createSpan(createPosition(0, 3, 3), createPosition(0, 3, 3)), 'expected value');
    expect(formatDiagnostic(diagnostic, { source: 'a: ' }).split('\n')[2]).toBe('    ' + ' | ' + '   ' + '^');
  });

  it('skips the excerpt when the span lies outside the source', () => {
    const diagnostic = error(createSpan(createPosition(4, 0), createPosition(4, 1)), 'far away');
    expect(formatDiagnostic(diagnostic, { source: 'one line' })).toBe('error: far away (at 5:1-5:2)');
  });

  it('colors output when asked to', () => {
    chalk.level = 1;
    const output = formatDiagnostic(blabla, { useColors: true });

    expect(output).toContain('\u001b[31m');
    expect(output.replace(/\u001b\[\d+m/g, '')).toBe('error: unknown function: `blabla` (at 1:6-1:12)');
  });
});

describe('formatFeedback', () => {
  it('renders one entry per diagnostic in order', () => {
    const feedback = createFeedback();
    feedback.diagnostics.push(blabla);
    feedback.diagnostics.push(warning(createSpan(createPosition(1, 0), createPosition(1, 4)), 'unused'));

    expect(formatFeedback(feedback)).toBe(
      'error: unknown function: `blabla` (at 1:6-1:12)\nwarning: unused (at 2:1-2:5)'
    );
  });

  it('renders nothing for empty feedback', () => {
    expect(formatFeedback(createFeedback())).toBe('');
  });
});
