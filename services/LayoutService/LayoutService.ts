import type { ILayoutService, ILayoutSink, LayoutOptions } from './ILayoutService';
import type { IModel } from '@core/model/Model';
import type { SyntaxModel } from '@core/model/SyntaxModel';
import type { Command, LayoutContext } from '@core/types/layout';
import type { Feedback, Pass } from '@core/types/feedback';
import { createFeedback, error, extendFeedbackOffset, passOf } from '@core/types/feedback';
import type { Position } from '@core/types/span';
import { ZERO_POSITION, offsetPosition, offsetSpan } from '@core/types/span';
import type { ResolvedConfig } from '@core/config/types';
import { DEFAULT_MAX_DEPTH } from '@core/config/types';
import { LayoutAbortedError } from '@core/errors/LayoutAbortedError';
import { layoutLogger as logger } from '@core/utils/logger';

/**
 * Bookkeeping for one model in the traversal. Spans inside a submodel are
 * relative to the node holding it; `origin` is that node's start in
 * document coordinates.
 */
interface Frame {
  ctx: LayoutContext;
  depth: number;
  origin: Position;
  feedback: Feedback;
}

/**
 * Drives layout through the model capability: asks each model for its
 * commands, walks syntax trees node by node and recurses into submodels.
 * Nodes are visited strictly in sequence order.
 */
export class LayoutService implements ILayoutService {
  private readonly maxDepth: number;
  private readonly debug?: boolean;

  constructor(private readonly sink: ILayoutSink, options: LayoutOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.debug = options.debug;
  }

  static fromConfig(sink: ILayoutSink, config: ResolvedConfig): LayoutService {
    return new LayoutService(sink, { maxDepth: config.layout.maxDepth, debug: config.layout.debug });
  }

  async layout(model: IModel, ctx: LayoutContext): Promise<Pass<void>> {
    const rootCtx = this.debug === undefined ? ctx : { ...ctx, debug: this.debug };
    const frame: Frame = { ctx: rootCtx, depth: 0, origin: { ...ZERO_POSITION }, feedback: createFeedback() };
    await this.layoutModel(model, frame);

    logger.debug('Layout finished', {
      diagnostics: frame.feedback.diagnostics.length,
      decorations: frame.feedback.decorations.length
    });
    return passOf(undefined, frame.feedback);
  }

  private async layoutModel(model: IModel, frame: Frame): Promise<void> {
    this.checkAborted(frame.ctx);
    logger.debug('Laying out model', { model: model.constructor.name, depth: frame.depth });

    const pass = await model.layout(frame.ctx);
    this.checkAborted(frame.ctx);

    extendFeedbackOffset(frame.feedback, pass.feedback, frame.origin);
    for (const command of pass.output) {
      await this.execute(command, frame);
    }
  }

  private async execute(command: Command, frame: Frame): Promise<void> {
    if (command.type === 'LayoutSyntaxModel') {
      await this.layoutTree(command.model, frame);
      return;
    }

    await this.sink.command(command, frame.ctx);
    this.checkAborted(frame.ctx);
  }

  private async layoutTree(tree: SyntaxModel, frame: Frame): Promise<void> {
    for (const { span, value: node } of tree.nodes) {
      const absolute = offsetSpan(span, frame.origin);

      if (node.type !== 'Model') {
        await this.sink.node({ span: absolute, value: node }, frame.ctx);
        this.checkAborted(frame.ctx);
        continue;
      }

      if (frame.depth >= this.maxDepth) {
        logger.warn('Skipping submodel beyond maximum depth', {
          model: node.model.constructor.name,
          maxDepth: this.maxDepth
        });
        frame.feedback.diagnostics.push(
          error(absolute, `maximum layout depth of ${this.maxDepth} exceeded`)
        );
        continue;
      }

      await this.layoutModel(node.model, {
        ctx: { ...frame.ctx, nested: true },
        depth: frame.depth + 1,
        origin: offsetPosition(span.start, frame.origin),
        feedback: frame.feedback
      });
    }
  }

  private checkAborted(ctx: LayoutContext): void {
    if (ctx.signal?.aborted) {
      throw new LayoutAbortedError({ cause: ctx.signal.reason });
    }
  }
}
