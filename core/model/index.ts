export { Model, modelsEqual, cloneModel, downcastModel } from './Model';
export type { IModel, ModelClass } from './Model';
export { SyntaxModel } from './SyntaxModel';
