import { describe, it, expect } from 'vitest';
import {
  createFeedback,
  error,
  extendFeedback,
  extendFeedbackOffset,
  hasErrors,
  mapPass,
  mergeFeedback,
  passOf,
  warning
} from './feedback';
import { Decoration } from './decoration';
import { createPosition, createSpan } from './span';

const span = (line: number, from: number, to: number) =>
  createSpan(createPosition(line, from), createPosition(line, to));

describe('Feedback', () => {
  it('starts empty', () => {
    expect(createFeedback()).toEqual({ diagnostics: [], decorations: [] });
  });

  it('builds spanned diagnostics', () => {
    expect(error(span(0, 1, 4), 'unknown function')).toEqual({
      span: span(0, 1, 4),
      value: { level: 'error', message: 'unknown function' }
    });
    expect(warning(span(0, 1, 4), 'unused argument').value.level).toBe('warning');
  });

  it('merges by concatenation, first bundle first', () => {
    const a = createFeedback();
    a.diagnostics.push(warning(span(0, 0, 1), 'first'));
    const b = createFeedback();
    b.diagnostics.push(error(span(1, 0, 1), 'second'));
    b.decorations.push({ span: span(1, 0, 1), value: Decoration.Bold });

    const merged = mergeFeedback(a, b);

    expect(merged.diagnostics.map(d => d.value.message)).toEqual(['first', 'second']);
    expect(merged.decorations).toHaveLength(1);
    expect(a.diagnostics).toHaveLength(1);
  });

  it('extends in place', () => {
    const target = createFeedback();
    const more = createFeedback();
    more.decorations.push({ span: span(0, 0, 2), value: Decoration.Italic });

    extendFeedback(target, more);

    expect(target.decorations).toEqual(more.decorations);
  });

  it('extends with spans translated to the given start', () => {
    const target = createFeedback();
    const more = createFeedback();
    more.diagnostics.push(error(span(0, 1, 4), 'unknown function'));

    extendFeedbackOffset(target, more, createPosition(5, 10, 0));

    expect(target.diagnostics[0].span).toEqual(
      createSpan(createPosition(5, 11), createPosition(5, 14))
    );
    expect(more.diagnostics[0].span.start.line).toBe(0);
  });

  it('reports errors but not warnings', () => {
    const feedback = createFeedback();
    feedback.diagnostics.push(warning(span(0, 0, 1), 'just a warning'));
    expect(hasErrors(feedback)).toBe(false);

    feedback.diagnostics.push(error(span(0, 0, 1), 'an error'));
    expect(hasErrors(feedback)).toBe(true);
  });

  it('maps the output of a pass and keeps its feedback', () => {
    const feedback = createFeedback();
    feedback.diagnostics.push(warning(span(0, 0, 1), 'kept'));

    const pass = mapPass(passOf([1, 2, 3], feedback), output => output.length);

    expect(pass.output).toBe(3);
    expect(pass.feedback).toBe(feedback);
  });
});
