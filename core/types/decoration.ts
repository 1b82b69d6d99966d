/**
 * Decorations for semantic syntax highlighting.
 *
 * The enum values are the serialized tag names editors receive, so they must
 * stay stable.
 */

import type { SpanVec } from './span';
import { comparePositions } from './span';

export enum Decoration {
  /** A valid function name, e.g. `box` in `[box]`. */
  ValidFuncName = 'validFuncName',
  /** A function name that does not resolve, e.g. `blabla` in `[blabla]`. */
  InvalidFuncName = 'invalidFuncName',
  /** The key of a keyword argument, e.g. `width` in `[box: width=5cm]`. */
  ArgumentKey = 'argumentKey',
  /** A key in an object literal, e.g. `left` in `{ left: 1cm }`. */
  ObjectKey = 'objectKey',
  /** An italic word. */
  Italic = 'italic',
  /** A bold word. */
  Bold = 'bold',
}

export const DECORATIONS: readonly Decoration[] = Object.freeze([
  Decoration.ValidFuncName,
  Decoration.InvalidFuncName,
  Decoration.ArgumentKey,
  Decoration.ObjectKey,
  Decoration.Italic,
  Decoration.Bold
]);

export function isDecoration(value: unknown): value is Decoration {
  return typeof value === 'string' && DECORATIONS.some(decoration => decoration === value);
}

/** Reads a serialized tag name back, e.g. from an editor request. */
export function parseDecoration(name: string): Decoration | undefined {
  return isDecoration(name) ? name : undefined;
}

/**
 * Orders decorations by span start. `Array.prototype.sort` is stable, so
 * decorations starting at the same position keep their relative order.
 */
export function sortDecorations(decorations: SpanVec<Decoration>): SpanVec<Decoration> {
  return [...decorations].sort((a, b) => comparePositions(a.span.start, b.span.start));
}
