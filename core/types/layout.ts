/**
 * The contract between models and the layout engine. Geometry, styles and
 * fonts belong to the engine; the core only names the commands it must be
 * able to emit itself.
 */

import type { SyntaxModel } from '@core/model/SyntaxModel';

/**
 * Read-only input shared by every layout call of one traversal. Engines can
 * pass a wider object; models must not mutate it.
 */
export interface LayoutContext {
  /** Whether this layout runs inside another model's layout. */
  readonly nested: boolean;
  readonly debug: boolean;
  /** Aborting it makes the driver abandon the traversal at its next suspension point. */
  readonly signal?: AbortSignal;
}

/**
 * `LayoutSyntaxModel` is the only command the core emits. The line, space,
 * paragraph and page commands are engine vocabulary for models to emit; the
 * driver passes them through to the sink.
 */
export type Command =
  /** Lay out every node of the referenced tree, in order. */
  | { type: 'LayoutSyntaxModel'; model: SyntaxModel }
  | { type: 'FinishLine' }
  | { type: 'FinishSpace' }
  | { type: 'BreakParagraph' }
  | { type: 'BreakPage' }
  /** Engine-specific instruction the core passes through untouched. */
  | { type: 'Engine'; payload: unknown };

export type Commands = Command[];

export function createLayoutContext(options: Partial<LayoutContext> = {}): LayoutContext {
  return {
    nested: options.nested ?? false,
    debug: options.debug ?? false,
    signal: options.signal
  };
}
