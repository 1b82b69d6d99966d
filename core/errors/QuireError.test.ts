import { describe, it, expect } from 'vitest';
import { QuireError, ErrorSeverity } from './QuireError';
import { LayoutAbortedError } from './LayoutAbortedError';
import { ConfigError } from './ConfigError';
import { createPosition, createSpan } from '@core/types/span';

describe('QuireError', () => {
  const span = createSpan(createPosition(2, 0, 14), createPosition(2, 4, 18));

  it('carries code, severity, span and the class name', () => {
    const error = new QuireError('Something broke', {
      code: 'TEST_CODE',
      severity: ErrorSeverity.Fatal,
      span
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('QuireError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.span).toBe(span);
    expect(error.toString()).toBe('[TEST_CODE] Something broke at 3:1-3:5 (Severity: fatal)');
  });

  it('serializes with a formatted span', () => {
    const error = new QuireError('Something broke', {
      code: 'TEST_CODE',
      severity: ErrorSeverity.Warning,
      details: { hint: 'check the input' },
      span
    });

    expect(error.toJSON()).toEqual({
      name: 'QuireError',
      message: 'Something broke',
      code: 'TEST_CODE',
      severity: 'warning',
      details: { hint: 'check the input' },
      span: '3:1-3:5'
    });
  });

  it('only lets recoverable errors and warnings pass as warnings', () => {
    const make = (severity: ErrorSeverity) => new QuireError('x', { code: 'X', severity });

    expect(make(ErrorSeverity.Recoverable).canBeWarning()).toBe(true);
    expect(make(ErrorSeverity.Warning).canBeWarning()).toBe(true);
    expect(make(ErrorSeverity.Fatal).canBeWarning()).toBe(false);
    expect(make(ErrorSeverity.Info).canBeWarning()).toBe(false);
  });

  it('names subclasses after themselves', () => {
    const reason = new Error('user closed the document');
    const aborted = new LayoutAbortedError({ cause: reason });

    expect(aborted.name).toBe('LayoutAbortedError');
    expect(aborted.code).toBe('LAYOUT_ABORTED');
    expect(aborted.cause).toBe(reason);
    expect(aborted.canBeWarning()).toBe(true);
    expect(new ConfigError('layout', 3, 'an object').toString())
      .toBe('[INVALID_CONFIG] Invalid value for layout: 3 (expected an object) (Severity: fatal)');
  });
});
