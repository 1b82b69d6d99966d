import type { IModel } from '@core/model/Model';
import type { Command, LayoutContext } from '@core/types/layout';
import type { Pass } from '@core/types/feedback';
import type { Spanned } from '@core/types/span';
import type { DataNode } from '@core/types/node';

/** Every command except the tree walk, which the service performs itself. */
export type EngineCommand = Exclude<Command, { type: 'LayoutSyntaxModel' }>;

/**
 * The receiving end of a traversal, implemented by the layout engine.
 * Both methods may suspend; the service waits before moving on.
 */
export interface ILayoutSink {
  /**
   * A built-in node, with its span translated to document coordinates.
   */
  node(node: Spanned<DataNode>, ctx: LayoutContext): void | Promise<void>;

  command(command: EngineCommand, ctx: LayoutContext): void | Promise<void>;
}

export interface LayoutOptions {
  /**
   * Deepest submodel nesting to follow. Deeper submodels are skipped with an
   * error diagnostic.
   * @default 64
   */
  maxDepth?: number;
  /**
   * Overrides `debug` on the context handed to every model. Left unset, the
   * caller's context decides.
   */
  debug?: boolean;
}

export interface ILayoutService {
  /**
   * Lays out `model` and everything it nests, in document order, feeding the
   * sink. Resolves with all feedback gathered on the way, with spans in
   * document coordinates.
   * @throws {LayoutAbortedError} If `ctx.signal` is aborted during the traversal
   */
  layout(model: IModel, ctx: LayoutContext): Promise<Pass<void>>;
}
