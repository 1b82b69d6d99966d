import { Model } from './Model';
import type { LayoutContext, Commands } from '@core/types/layout';
import type { Pass } from '@core/types/feedback';
import { passOf } from '@core/types/feedback';
import type { Spanned, SpanVec } from '@core/types/span';
import { spansEqual } from '@core/types/span';
import type { Node } from '@core/types/node';
import { cloneNode, nodesEqual } from '@core/types/node';

/**
 * A tree representation of source code: the spanned nodes of a document in
 * the order the parser produced them.
 *
 * The tree only grows by appending. Nested structure lives inside the
 * submodels held by `Model` nodes.
 */
export class SyntaxModel extends Model implements Iterable<Spanned<Node>> {
  private readonly items: SpanVec<Node> = [];

  /** The syntactical elements making up this model. */
  get nodes(): ReadonlyArray<Spanned<Node>> {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  add(node: Spanned<Node>): void {
    this.items.push(node);
  }

  [Symbol.iterator](): Iterator<Spanned<Node>> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Hands the whole tree to the driver as a single command. Per-node work
   * and its diagnostics happen when the driver walks the nodes.
   */
  async layout(_ctx: LayoutContext): Promise<Pass<Commands>> {
    return passOf<Commands>([{ type: 'LayoutSyntaxModel', model: this }]);
  }

  protected isEqual(other: SyntaxModel): boolean {
    return (
      this.items.length === other.items.length &&
      this.items.every((item, index) => {
        const theirs = other.items[index];
        return spansEqual(item.span, theirs.span) && nodesEqual(item.value, theirs.value);
      })
    );
  }

  protected copy(): SyntaxModel {
    const copy = new SyntaxModel();
    for (const item of this.items) {
      copy.add({
        span: { start: { ...item.span.start }, end: { ...item.span.end } },
        value: cloneNode(item.value)
      });
    }
    return copy;
  }
}
