/**
 * Node types for the syntax tree.
 *
 * The built-in kinds are plain data. Everything else the language grows
 * (function calls and the like) arrives through the single `Model` kind, which
 * owns one erased {@link Model} value.
 */

import type { Model, ModelClass } from '@core/model/Model';
import { cloneModel, modelsEqual } from '@core/model/Model';

/** Whitespace containing less than two newlines. */
export interface SpaceNode {
  type: 'Space';
}

/** Whitespace with two or more newlines. */
export interface ParbreakNode {
  type: 'Parbreak';
}

/** A forced line break. */
export interface LinebreakNode {
  type: 'Linebreak';
}

export interface TextNode {
  type: 'Text';
  text: string;
}

/** Lines of raw text, without their line terminators. */
export interface RawNode {
  type: 'Raw';
  lines: string[];
}

export interface ToggleItalicNode {
  type: 'ToggleItalic';
}

export interface ToggleBolderNode {
  type: 'ToggleBolder';
}

/** A submodel, typically a function invocation. */
export interface ModelNode {
  type: 'Model';
  model: Model;
}

export type Node =
  | SpaceNode
  | ParbreakNode
  | LinebreakNode
  | TextNode
  | RawNode
  | ToggleItalicNode
  | ToggleBolderNode
  | ModelNode;

export type NodeType = Node['type'];

/** Data nodes are every kind except the extension kind. */
export type DataNode = Exclude<Node, ModelNode>;

export const Node = {
  space: (): SpaceNode => ({ type: 'Space' }),
  parbreak: (): ParbreakNode => ({ type: 'Parbreak' }),
  linebreak: (): LinebreakNode => ({ type: 'Linebreak' }),
  text: (text: string): TextNode => ({ type: 'Text', text }),
  raw: (lines: string[]): RawNode => ({ type: 'Raw', lines: [...lines] }),
  toggleItalic: (): ToggleItalicNode => ({ type: 'ToggleItalic' }),
  toggleBolder: (): ToggleBolderNode => ({ type: 'ToggleBolder' }),
  model: (model: Model): ModelNode => ({ type: 'Model', model })
} as const;

export function isModelNode(node: Node): node is ModelNode {
  return node.type === 'Model';
}

function linesEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((line, index) => line === b[index]);
}

/**
 * Same-kind structural equality. Submodels compare through the erased
 * equality, so submodels of different classes are never equal.
 */
export function nodesEqual(a: Node, b: Node): boolean {
  switch (a.type) {
    case 'Text':
      return b.type === 'Text' && a.text === b.text;
    case 'Raw':
      return b.type === 'Raw' && linesEqual(a.lines, b.lines);
    case 'Model':
      return b.type === 'Model' && modelsEqual(a.model, b.model);
    default:
      return a.type === b.type;
  }
}

/** A deep copy; submodels are copied through their own clone. */
export function cloneNode(node: Node): Node {
  switch (node.type) {
    case 'Text':
      return { type: 'Text', text: node.text };
    case 'Raw':
      return { type: 'Raw', lines: [...node.lines] };
    case 'Model':
      return { type: 'Model', model: cloneModel(node.model) };
    default:
      return { type: node.type };
  }
}

/** Checked downcast of a node's submodel. Data nodes never match. */
export function downcastNode<T extends Model>(node: Node, type: ModelClass<T>): T | undefined {
  return node.type === 'Model' ? node.model.downcast(type) : undefined;
}
