/**
 * The model capability and the adapter that lets any model live behind a
 * single erased slot of the syntax tree while keeping value semantics.
 */

import type { LayoutContext, Commands } from '@core/types/layout';
import type { Pass } from '@core/types/feedback';
import { ModelContractError } from '@core/errors/ModelContractError';
import { modelLogger as logger } from '@core/utils/logger';

/**
 * Something that can be laid out into a sequence of commands.
 *
 * Layout may suspend and must not mutate the model: laying out the same model
 * twice with the same context yields the same commands and feedback.
 * Problems found along the way go into the returned feedback, never into a
 * rejected promise.
 */
export interface IModel {
  layout(ctx: LayoutContext): Promise<Pass<Commands>>;
}

/** A concrete model class, used as the key for checked downcasts. */
export type ModelClass<T extends Model> = abstract new (...args: never[]) => T;

/**
 * Base class for every model that can be stored in a {@link Node}.
 *
 * A subclass provides `layout`, its own structural `isEqual` and a deep
 * `copy`. From those the adapter derives equality against any other model,
 * verified cloning and checked downcasting. The tree never needs to know the
 * set of subclasses.
 *
 * Subclasses must own all of their data: `copy` has to return a new instance
 * that shares nothing mutable with the original.
 *
 * @example
 * ```ts
 * class FuncCall extends Model {
 *   constructor(readonly name: string, readonly args: string[]) { super(); }
 *
 *   async layout(ctx: LayoutContext): Promise<Pass<Commands>> {
 *     return passOf<Commands>([{ type: 'Engine', payload: { call: this.name } }]);
 *   }
 *
 *   protected isEqual(other: FuncCall): boolean {
 *     return this.name === other.name && this.args.join() === other.args.join();
 *   }
 *
 *   protected copy(): FuncCall {
 *     return new FuncCall(this.name, [...this.args]);
 *   }
 * }
 * ```
 */
export abstract class Model implements IModel {
  abstract layout(ctx: LayoutContext): Promise<Pass<Commands>>;

  /** Structural equality against a value of the same concrete class. */
  protected abstract isEqual(other: this): boolean;

  /** A deep copy of this value, of the same concrete class. */
  protected abstract copy(): Model;

  /**
   * Equality across the erasure: `false` whenever the concrete classes differ,
   * otherwise whatever the concrete class says.
   */
  equals(other: Model): boolean {
    return this.sameClassAs(other) && this.isEqual(other);
  }

  /**
   * Deep copy through the concrete `copy`, checked to be a fresh instance of
   * the same class.
   */
  clone(): this {
    const copy = this.copy();
    if (copy === this) {
      logger.error('clone() returned the original instance', { model: this.constructor.name });
      throw new ModelContractError(this.constructor.name, 'clone-aliases-original');
    }
    if (!this.sameClassAs(copy)) {
      logger.error('clone() returned an instance of another class', {
        model: this.constructor.name,
        copy: copy.constructor.name
      });
      throw new ModelContractError(this.constructor.name, 'clone-changes-type');
    }
    return copy;
  }

  /**
   * Views this model as `type` if that is exactly its runtime class.
   * Subclasses of `type` do not match.
   */
  downcast<T extends Model>(type: ModelClass<T>): T | undefined {
    if (this.constructor === type && this instanceof type) {
      return this;
    }
    return undefined;
  }

  is<T extends Model>(type: ModelClass<T>): boolean {
    return this.downcast(type) !== undefined;
  }

  private sameClassAs(other: Model): other is this {
    return other.constructor === this.constructor;
  }
}

export function modelsEqual(a: Model, b: Model): boolean {
  return a.equals(b);
}

export function cloneModel<T extends Model>(model: T): T {
  return model.clone();
}

export function downcastModel<T extends Model>(model: Model, type: ModelClass<T>): T | undefined {
  return model.downcast(type);
}
