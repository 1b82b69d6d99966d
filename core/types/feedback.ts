/**
 * Diagnostics and decorations gathered while processing a tree, and the
 * result-plus-feedback bundle every layout step returns.
 */

import type { Position, Span, Spanned, SpanVec } from './span';
import { offsetSpans } from './span';
import type { Decoration } from './decoration';

export type DiagnosticLevel = 'error' | 'warning';

export interface Diagnostic {
  level: DiagnosticLevel;
  message: string;
}

/**
 * Non-fatal problems and highlighting metadata. Feedback never aborts
 * anything by itself; callers decide what to do with errors.
 */
export interface Feedback {
  diagnostics: SpanVec<Diagnostic>;
  decorations: SpanVec<Decoration>;
}

/** A primary output together with the feedback gathered while producing it. */
export interface Pass<T> {
  output: T;
  feedback: Feedback;
}

export function createFeedback(): Feedback {
  return { diagnostics: [], decorations: [] };
}

export function error(span: Span, message: string): Spanned<Diagnostic> {
  return { span, value: { level: 'error', message } };
}

export function warning(span: Span, message: string): Spanned<Diagnostic> {
  return { span, value: { level: 'warning', message } };
}

/** Concatenates `a` then `b` into a fresh bundle. */
export function mergeFeedback(a: Feedback, b: Feedback): Feedback {
  return {
    diagnostics: [...a.diagnostics, ...b.diagnostics],
    decorations: [...a.decorations, ...b.decorations]
  };
}

export function extendFeedback(target: Feedback, more: Feedback): void {
  target.diagnostics.push(...more.diagnostics);
  target.decorations.push(...more.decorations);
}

/**
 * Appends feedback whose spans are relative to `start`, e.g. feedback from a
 * submodel laid out in isolation.
 */
export function extendFeedbackOffset(target: Feedback, more: Feedback, start: Position): void {
  target.diagnostics.push(...offsetSpans(more.diagnostics, start));
  target.decorations.push(...offsetSpans(more.decorations, start));
}

export function hasErrors(feedback: Feedback): boolean {
  return feedback.diagnostics.some(diagnostic => diagnostic.value.level === 'error');
}

export function passOf<T>(output: T, feedback: Feedback = createFeedback()): Pass<T> {
  return { output, feedback };
}

export function mapPass<T, U>(pass: Pass<T>, fn: (output: T) => U): Pass<U> {
  return { output: fn(pass.output), feedback: pass.feedback };
}
